#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { main } from "./src/index.js";

export { main };

// npm links the bin through a symlink, so compare resolved paths.
function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (invokedDirectly()) {
  void main(process.argv);
}
