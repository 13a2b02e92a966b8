/**
 * roadman repl - interactive session
 */
import * as readline from "node:readline";
import { Interpreter, parse, validate, formatDiagnostics } from "@roadman/core";
import type { Diagnostic, ParseResult } from "@roadman/core";
import { loadConfig } from "./config.js";
import type { RoadmanConfig } from "./config.js";
import type { ConfigLocation } from "./source.js";

export const BANNER = "Roadman REPL v0.1\nType 'exit()' or press Ctrl+C to exit.\n";
export const CONTINUATION_PROMPT = "... ";
const REPL_FILE = "<repl>";

export interface ReplIo {
  write(text: string): void;
  error(text: string): void;
}

// An unterminated string may still be closed on a later line.
function needsMoreInput(result: ParseResult): boolean {
  return (
    result.incomplete === true &&
    result.diagnostics.every((d) => d.code !== "E_LEX" || d.message === "Unterminated string.")
  );
}

/**
 * Line-at-a-time evaluation over one interpreter. Input that stops short
 * of a complete statement is buffered until a later line completes it; an
 * empty line while buffering evaluates what is there.
 */
export class ReplSession {
  private buffer: string[] = [];
  private readonly interpreter: Interpreter;
  private readonly pretty: boolean;

  constructor(
    private readonly config: RoadmanConfig,
    private readonly io: ReplIo
  ) {
    this.pretty = config.diagnostics === "pretty";
    this.interpreter = new Interpreter({
      output: (line) => io.write(line + "\n"),
      maxCallDepth: config.maxCallDepth,
    });
  }

  get prompt(): string {
    return this.buffer.length > 0 ? CONTINUATION_PROMPT : this.config.prompt;
  }

  /** Returns false once the user asks to leave. */
  feed(line: string): boolean {
    const pending = this.buffer.length > 0;
    const trimmed = line.trim();
    if (!pending && trimmed.toLowerCase() === "exit()") return false;
    if (!pending && trimmed === "") return true;

    this.buffer.push(line);
    const result = parse(this.buffer.join("\n"), REPL_FILE);
    if (trimmed !== "" && needsMoreInput(result)) return true;
    this.buffer = [];

    if (result.diagnostics.length > 0 || !result.program) {
      this.report(result.diagnostics);
      return true;
    }
    const checkDiags = validate(result.program);
    if (checkDiags.length > 0) {
      this.report(checkDiags);
      return true;
    }
    const exec = this.interpreter.interpret(result.program);
    if (exec.diagnostics.length > 0) {
      this.report(exec.diagnostics);
    }
    return true;
  }

  private report(diags: Diagnostic[]): void {
    this.io.error(formatDiagnostics(diags, this.pretty) + "\n");
  }
}

export interface ReplOptions extends ConfigLocation {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
}

export async function runRepl(opts: ReplOptions = {}): Promise<number> {
  const config = loadConfig(opts.cwd, opts.homeDir);
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;
  const errorOutput = opts.errorOutput ?? process.stderr;

  const session = new ReplSession(config, {
    write: (text) => output.write(text),
    error: (text) => errorOutput.write(text),
  });

  output.write(BANNER);
  const rl = readline.createInterface({ input, output });
  rl.on("SIGINT", () => rl.close());

  let exited = false;
  rl.setPrompt(session.prompt);
  rl.prompt();
  for await (const line of rl) {
    if (!session.feed(line)) {
      exited = true;
      break;
    }
    rl.setPrompt(session.prompt);
    rl.prompt();
  }
  rl.close();

  if (!exited) {
    output.write("\nExiting...\n");
  }
  return 0;
}
