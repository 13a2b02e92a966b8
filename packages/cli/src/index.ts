/**
 * @roadman/cli - CLI entry point re-exports
 */
export { runRun } from "./cmd-run.js";
export { runRepl, ReplSession } from "./cmd-repl.js";
export { runTranspile } from "./cmd-transpile.js";
export { runCheck } from "./cmd-check.js";
export { runTokens, formatToken } from "./cmd-tokens.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export { runHelp } from "./cmd-help.js";
export { resolveConfig, loadConfig, configSchema, DEFAULT_CONFIG } from "./config.js";
export type { RoadmanConfig, ResolvedConfig } from "./config.js";
export { createProgram, COMMAND_NAMES } from "./program.js";
export type { ProgramContext } from "./program.js";
