#!/usr/bin/env node
/**
 * CLI Entry Point
 */

import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { runCLI } from "./program.js";

export { createProgram, runCLI, type CLIOutput, type ProgramDeps } from "./program.js";

// Handle symlinks (npm bin shims) by resolving the real path
function isMainModule(): boolean {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const entryFile = realpathSync(process.argv[1] ?? "");
    return currentFile === entryFile;
  } catch {
    return false;
  }
}

const isTestEnvironment = typeof process !== "undefined" && !!process.env.VITEST;

if (!isTestEnvironment && isMainModule()) {
  runCLI().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
