import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

const EVENT_LOG_OFF = "off";

const SettingsEnvSchema = z.object({
  DDEV_LITE_HOME: z.string().trim().min(1).optional(),
  DDEV_LITE_EVENT_LOG: z.string().trim().min(1).optional(),
  NO_COLOR: z.string().optional(),
});

export type Settings = {
  /** Global directory holding the router compose file and event logs. */
  homeDir: string;
  routerComposePath: string;
  /** null when event logging is switched off. */
  eventLogPath: string | null;
  noColor: boolean;
};

// =============================================================================
// LOADING
// =============================================================================

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  userHome: string = os.homedir(),
): Settings {
  const parsed = SettingsEnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<env>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment settings: ${detail}`, parsed.error);
  }

  const values = parsed.data;
  const homeDir = path.resolve(expandHome(values.DDEV_LITE_HOME ?? "~/.ddev", userHome));

  let eventLogPath: string | null = path.join(homeDir, "logs", "events.jsonl");
  if (values.DDEV_LITE_EVENT_LOG === EVENT_LOG_OFF) {
    eventLogPath = null;
  } else if (values.DDEV_LITE_EVENT_LOG) {
    eventLogPath = path.resolve(expandHome(values.DDEV_LITE_EVENT_LOG, userHome));
  }

  return {
    homeDir,
    routerComposePath: path.join(homeDir, "router-compose.yaml"),
    eventLogPath,
    noColor: values.NO_COLOR !== undefined && values.NO_COLOR !== "",
  };
}

function expandHome(value: string, userHome: string): string {
  if (value === "~") return userHome;
  if (value.startsWith("~/")) return path.join(userHome, value.slice(2));
  return value;
}
