import os from "node:os";

import { createAnsiFormatter, type AnsiStyle } from "../core/error-format.js";

import { SITE_STATUS, type App } from "./app.js";

export type StatusTone = "warning" | "error" | "normal";

export type AppRow = {
  app: App;
  status: string;
};

export type RenderOptions = {
  color?: boolean;
  homeDir?: string;
};

const MAX_COL_WIDTH = 140;
const COLUMN_SEPARATOR = "  ";
const TABLE_HEADER = ["NAME", "TYPE", "LOCATION", "URL", "STATUS"];

const TONE_STYLES: Record<StatusTone, AnsiStyle[]> = {
  warning: ["yellow"],
  error: ["red"],
  normal: ["cyan"],
};

const ERROR_STATUSES = [SITE_STATUS.notFound, SITE_STATUS.dirMissing, SITE_STATUS.configMissing];

export function classifyStatus(status: string): StatusTone {
  if (status.includes(SITE_STATUS.stopped)) return "warning";
  if (ERROR_STATUSES.some((value) => status.includes(value))) return "error";
  return "normal";
}

/** Replace the user's home directory with `~` and use forward slashes. */
export function renderHomeRootedDir(dir: string, homeDir: string = os.homedir()): string {
  return dir.replace(homeDir, "~").replace(/\\/g, "/");
}

export function renderAppRow(row: AppRow, opts: RenderOptions = {}): string[] {
  return [
    row.app.getName(),
    row.app.getType(),
    renderHomeRootedDir(row.app.getRoot(), opts.homeDir),
    row.app.getURL(),
    row.status,
  ].map(truncateCell);
}

/**
 * Render the list output for one application kind, e.g. "2 local sites found." followed
 * by the table. Nothing is rendered for an empty list.
 */
export function renderAppTable(
  kind: string,
  rows: AppRow[],
  opts: RenderOptions & { routerStatus?: string } = {},
): string[] {
  if (rows.length === 0) return [];

  const format = createAnsiFormatter(opts.color ?? false);
  const cells = [TABLE_HEADER, ...rows.map((row) => renderAppRow(row, opts))];
  const widths = TABLE_HEADER.map((_, i) => Math.max(...cells.map((r) => r[i]?.length ?? 0)));
  const last = TABLE_HEADER.length - 1;

  const lines = [`${rows.length} ${kind} ${rows.length === 1 ? "site" : "sites"} found.`];
  cells.forEach((cellRow, rowIndex) => {
    const padded = cellRow.map((cell, i) => (i === last ? cell : cell.padEnd(widths[i] ?? 0)));
    if (rowIndex > 0) {
      const status = padded[last] ?? "";
      padded[last] = format(status, TONE_STYLES[classifyStatus(status)]);
    }
    lines.push(padded.join(COLUMN_SEPARATOR));
  });

  if (opts.routerStatus) {
    lines.push("", `Router status: ${opts.routerStatus}`);
  }
  return lines;
}

function truncateCell(value: string): string {
  if (value.length <= MAX_COL_WIDTH) return value;
  return `${value.slice(0, MAX_COL_WIDTH - 3)}...`;
}
