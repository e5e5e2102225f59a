/*
Purpose: turn errors into user-facing lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: renderErrorLines(err, { mode: "debug", color }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import { toUserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stdout;
  const env = options.env ?? process.env;
  const isTty = Boolean(stream?.isTTY);

  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    return false;
  }

  if (options.useColor === undefined) {
    return isTty;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [];

  const title = normalizeText(normalized.title) ?? DEFAULT_ERROR_TITLE;
  const message = normalizeText(normalized.message) ?? DEFAULT_ERROR_MESSAGE;

  lines.push({ kind: "title", text: title });

  if (message !== title) {
    lines.push({ kind: "message", text: message });
  }

  const hint = normalizeText(normalized.hint);
  if (hint) {
    lines.push({ kind: "hint", text: hint });
  }

  const next = normalizeText(normalized.next);
  if (next) {
    lines.push({ kind: "next", text: next });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const cause = normalized.cause;
    const name = resolveDebugName(error, cause);
    if (name) {
      lines.push({ kind: "name", text: name });
    }

    const causeMessage = cause === undefined || cause === null ? undefined : formatErrorMessage(cause);
    if (causeMessage && causeMessage !== message) {
      lines.push({ kind: "cause", text: causeMessage });
    }

    const stack = resolveDebugStack(error, cause);
    if (stack) {
      lines.push({ kind: "stack", text: stack });
    }
  }

  return lines;
}

const LINE_PREFIX: Record<ErrorFormatLineKind, string> = {
  title: "",
  message: "",
  hint: "Hint: ",
  next: "Next: ",
  code: "Code: ",
  name: "Name: ",
  cause: "Cause: ",
  stack: "",
};

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  name: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

export function renderErrorLines(
  error: unknown,
  options: ErrorFormatOptions & { color?: boolean } = {},
): string[] {
  const format = createAnsiFormatter(options.color ?? false);
  return formatErrorLines(error, options).map((line) =>
    format(`${LINE_PREFIX[line.kind]}${line.text}`, LINE_STYLES[line.kind]),
  );
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return normalizeText(error.message) ?? normalizeText(error.name) ?? String(error);
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) {
      return message.trim();
    }
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeText(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveDebugName(error: unknown, cause?: unknown): string | undefined {
  if (cause instanceof Error) {
    return normalizeText(cause.name);
  }

  if (error instanceof Error) {
    return normalizeText(error.name);
  }

  return undefined;
}

function resolveDebugStack(error: unknown, cause?: unknown): string | undefined {
  if (cause instanceof Error && cause.stack) {
    return cause.stack;
  }

  if (error instanceof Error && error.stack) {
    return error.stack;
  }

  return undefined;
}
