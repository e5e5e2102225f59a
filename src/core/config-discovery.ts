import fs from "node:fs";
import path from "node:path";

import { ConfigNotFoundError } from "./errors.js";

export const APP_CONFIG_DIR = ".ddev";
export const APP_CONFIG_FILE = "config.yaml";

export function appConfigPath(appRoot: string): string {
  return path.join(appRoot, APP_CONFIG_DIR, APP_CONFIG_FILE);
}

export function hasAppConfig(dir: string): boolean {
  return fs.existsSync(appConfigPath(dir));
}

/**
 * Find the nearest directory, starting at `startPath` and walking up through its
 * parents, that contains `.ddev/config.yaml`. Only the marker's presence is checked.
 *
 * The walk is bounded by the number of segments in the resolved start path, so it
 * ends at the filesystem root.
 */
export function locateAppRoot(startPath: string): string {
  let current = path.resolve(startPath);
  if (hasAppConfig(current)) {
    return current;
  }

  const segments = current.split(path.sep).length;
  for (let i = 0; i < segments; i++) {
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;

    if (hasAppConfig(current)) {
      return current;
    }
  }

  throw new ConfigNotFoundError(startPath);
}
