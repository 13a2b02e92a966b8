/**
 * roadman run - execute Roadman programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import { Interpreter, formatDiagnostics } from "@roadman/core";
import type { TraceEvent } from "@roadman/core";
import { loadConfig } from "./config.js";
import { emitCliError, loadProgram } from "./source.js";
import type { ConfigLocation } from "./source.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export interface RunOptions extends ConfigLocation {
  trace?: string;
  json?: boolean;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const config = loadConfig(opts.cwd, opts.homeDir);
  const pretty = !opts.json && config.diagnostics === "pretty";

  const loaded = loadProgram(file, pretty);
  if (!loaded.ok) return loaded.exitCode;

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`, pretty);
      return 4;
    }
  }

  const fd = traceFd;
  const traceHandler =
    fd !== null
      ? (event: TraceEvent) => {
          try {
            fs.writeSync(fd, JSON.stringify(event) + "\n");
          } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            throw new CliIoError(`Error writing trace file: ${msg}`);
          }
        }
      : undefined;

  const interpreter = new Interpreter({
    output: (line) => console.log(line),
    maxCallDepth: config.maxCallDepth,
    trace: traceHandler,
    runId: crypto.randomUUID(),
  });

  try {
    const result = interpreter.interpret(loaded.value);
    if (result.diagnostics.length > 0) {
      console.error(formatDiagnostics(result.diagnostics, pretty));
      return 4;
    }
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message, pretty);
      return 4;
    }
    throw e;
  } finally {
    if (fd !== null) {
      fs.closeSync(fd);
    }
  }
}
