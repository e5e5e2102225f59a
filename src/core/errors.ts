/*
Purpose: error types shared by discovery, teardown and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new TeardownError({ step, target, cause }); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class DdevError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "DdevError";
  }
}

export class ConfigError extends DdevError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(public readonly startPath: string) {
    super(`No .ddev/config.yaml file was found in ${startPath} or any parent directory.`);
    this.name = "ConfigNotFoundError";
  }
}

export class AppConfigError extends ConfigError {
  constructor(
    message: string,
    public readonly configPath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "AppConfigError";
  }
}

export class DockerError extends DdevError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DockerError";
  }
}

export class AppRecoveryError extends DdevError {
  constructor(
    message: string,
    public readonly containerName: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "AppRecoveryError";
  }
}

export type TeardownStep = "stop" | "remove" | "volume";

export type TeardownTarget = {
  type: "container" | "volume";
  name: string;
};

const TEARDOWN_VERBS: Record<TeardownStep, string> = {
  stop: "stop",
  remove: "remove",
  volume: "remove",
};

export class TeardownError extends DdevError {
  public readonly step: TeardownStep;
  public readonly target: TeardownTarget;

  constructor(input: { step: TeardownStep; target: TeardownTarget; cause?: unknown }) {
    super(
      `Could not ${TEARDOWN_VERBS[input.step]} ${input.target.type} ${input.target.name}: ${describeCause(input.cause)}`,
      input.cause,
    );
    this.name = "TeardownError";
    this.step = input.step;
    this.target = input.target;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error && cause.message.trim()) return cause.message.trim();
  if (typeof cause === "string" && cause.trim()) return cause.trim();
  return "unknown error";
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  docker: "DOCKER_ERROR",
  teardown: "TEARDOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

const DOCKER_HINT = "Check that Docker is running and reachable (docker info).";

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ConfigNotFoundError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "No ddev application found.",
      message: error.message,
      hint: "Run the command inside an application directory or pass the application name.",
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Application config error.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof TeardownError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.teardown,
      title: "Application removal failed.",
      message: error.message,
      hint: "Re-run the command once the Docker engine has settled; removal is not retried.",
      cause: error,
    });
  }

  if (error instanceof DockerError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.docker,
      title: "Docker request failed.",
      message: error.message,
      hint: DOCKER_HINT,
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}
