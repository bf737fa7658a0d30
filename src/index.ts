#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner.
// WHY: Importing the CLI helpers must not trigger command parsing.

import { existsSync, realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

/**
 * File URL of the script node was started with, symlinks resolved when the file exists.
 */
export function invokedPath(script: string | undefined): string | undefined {
  if (!script) {
    return undefined;
  }
  // npm installs the bin as a symlink.
  const resolved = existsSync(script) ? realpathSync(script) : script;
  return pathToFileURL(resolved).href;
}

if (invokedPath(process.argv[1]) === import.meta.url) {
  void runCli(process.argv);
}

export { runCli };
