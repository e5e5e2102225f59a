/*
Purpose: append structured events as JSON lines.
Assumptions: one process writes a given log file at a time; writes are synchronous.
Usage: const logger = new JsonlLogger(file); logEvent(logger, "cleanup.start", { app: "site1" }).
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export type EventLogger = {
  log(event: LogEvent): void;
};

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly filePath: string;
  private readonly now: () => Date;
  private ensured = false;

  constructor(filePath: string, opts: { now?: () => Date } = {}) {
    this.filePath = path.resolve(filePath);
    this.now = opts.now ?? (() => new Date());
  }

  log(event: LogEvent): void {
    if (!this.ensured) {
      fse.ensureDirSync(path.dirname(this.filePath));
      this.ensured = true;
    }

    const record: JsonObject = {
      ts: this.now().toISOString(),
      type: event.type,
      ...(event.payload ?? {}),
    };
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export function logEvent(
  logger: EventLogger | undefined,
  type: string,
  payload?: JsonObject,
): void {
  logger?.log(payload ? { type, payload } : { type });
}
