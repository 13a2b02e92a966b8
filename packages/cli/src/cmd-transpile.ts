/**
 * roadman transpile - render a Roadman program as JavaScript
 */
import * as fs from "node:fs";
import { transpile } from "@roadman/core";
import { loadConfig } from "./config.js";
import { emitCliError, loadProgram } from "./source.js";
import type { ConfigLocation } from "./source.js";

export interface TranspileCommandOptions extends ConfigLocation {
  out?: string;
  indent?: number;
  json?: boolean;
}

export async function runTranspile(file: string, opts: TranspileCommandOptions): Promise<number> {
  const config = loadConfig(opts.cwd, opts.homeDir);
  const pretty = !opts.json && config.diagnostics === "pretty";

  const loaded = loadProgram(file, pretty);
  if (!loaded.ok) return loaded.exitCode;

  const output = transpile(loaded.value, { indent: opts.indent ?? config.indent });

  if (!opts.out) {
    console.log(output);
    return 0;
  }

  try {
    fs.writeFileSync(opts.out, output + "\n", "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error writing file: ${msg}`, pretty);
    return 4;
  }
  return 0;
}
