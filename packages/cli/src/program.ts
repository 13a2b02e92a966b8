/**
 * Command definitions for the roadman CLI.
 */
import { createRequire } from "node:module";
import { Command, InvalidArgumentError } from "commander";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runRepl } from "./cmd-repl.js";
import { runTranspile } from "./cmd-transpile.js";
import { runTokens } from "./cmd-tokens.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";
import { runHelp, QUICKREF } from "./cmd-help.js";
import { configSchema } from "./config.js";
import type { ConfigLocation } from "./source.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export const COMMAND_NAMES = ["run", "repl", "transpile", "check", "tokens", "trace", "config", "help"];

export interface ProgramContext extends ConfigLocation {
  /** Receives each command's exit code. */
  exit: (code: number) => void;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
}

function parseIndent(value: string): number {
  const parsed = configSchema.shape.indent.safeParse(Number(value));
  if (!parsed.success) {
    throw new InvalidArgumentError("Indent must be an integer from 0 to 8.");
  }
  return parsed.data;
}

export function createProgram(ctx: ProgramContext): Command {
  const location: ConfigLocation = { cwd: ctx.cwd, homeDir: ctx.homeDir };
  const program = new Command();

  program
    .name("roadman")
    .description("Roadman: a small scripting language with an interpreter and a JavaScript transpiler")
    .version(pkg.version)
    .addHelpText("after", "\n" + QUICKREF);

  program
    .command("run")
    .description("Run a Roadman program")
    .argument("<file>", "Roadman source file to run (or - for stdin)")
    .option("--trace <path>", "Write JSONL trace to file")
    .option("--json", "Machine-readable diagnostics", false)
    .action(async (file: string, opts: { trace?: string; json?: boolean }) => {
      ctx.exit(await runRun(file, { ...opts, ...location }));
    });

  program
    .command("repl")
    .description("Start an interactive session")
    .action(async () => {
      ctx.exit(
        await runRepl({ ...location, input: ctx.input, output: ctx.output, errorOutput: ctx.errorOutput })
      );
    });

  program
    .command("transpile")
    .description("Render a Roadman program as JavaScript")
    .argument("<file>", "Roadman source file to transpile")
    .option("--out <path>", "Write the JavaScript to a file instead of stdout")
    .option("--indent <n>", "Spaces per indentation level (0-8)", parseIndent)
    .option("--json", "Machine-readable diagnostics", false)
    .action(async (file: string, opts: { out?: string; indent?: number; json?: boolean }) => {
      ctx.exit(await runTranspile(file, { ...opts, ...location }));
    });

  program
    .command("check")
    .description("Static validation without execution")
    .argument("<file>", "Roadman source file to check")
    .option("--json", "Machine-readable diagnostics", false)
    .action(async (file: string, opts: { json?: boolean }) => {
      ctx.exit(await runCheck(file, { ...opts, ...location }));
    });

  program
    .command("tokens")
    .description("Print the token stream of a source file")
    .argument("<file>", "Roadman source file to tokenize")
    .option("--json", "Output as JSON", false)
    .action(async (file: string, opts: { json?: boolean }) => {
      ctx.exit(await runTokens(file, opts));
    });

  program
    .command("trace")
    .description("Display trace summary")
    .argument("<file>", "JSONL trace file")
    .option("--json", "Output as JSON", false)
    .action(async (file: string, opts: { json?: boolean }) => {
      ctx.exit(await runTrace(file, opts));
    });

  program
    .command("config")
    .description("Display effective configuration and where it came from")
    .option("--json", "Output as JSON", false)
    .action(async (opts: { json?: boolean }) => {
      ctx.exit(await runConfig({ ...opts, ...location }));
    });

  program
    .command("help")
    .description("Language reference; run 'roadman help <topic>' for details")
    .argument("[topic]", "Topic: syntax, types, flow, functions, errors, transpile, config")
    .option("--index", "For the syntax topic, print the keyword index", false)
    .action((topic: string | undefined, opts: { index?: boolean }) => {
      runHelp(topic, opts);
    });

  return program;
}
