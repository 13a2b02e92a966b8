#!/usr/bin/env -S node --import tsx
/**
 * roadman - Roadman Language CLI
 */
import { COMMAND_NAMES, createProgram } from "./program.js";

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(COMMAND_NAMES);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await createProgram({ exit: (code) => process.exit(code) }).parseAsync();
