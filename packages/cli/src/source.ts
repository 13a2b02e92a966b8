/**
 * Source loading shared by the file-based commands.
 */
import * as fs from "node:fs";
import { parse, validate, formatDiagnostic, formatDiagnostics } from "@roadman/core";
import type { DiagnosticCode, Program } from "@roadman/core";

export type Loaded<T> = { ok: true; value: T } | { ok: false; exitCode: number };

/** Common options for commands that read configuration. */
export interface ConfigLocation {
  cwd?: string;
  homeDir?: string;
}

export function emitCliError(code: DiagnosticCode, message: string, pretty: boolean): void {
  console.error(formatDiagnostic({ code, message }, pretty));
}

/** Display name used in spans; `-` reads standard input. */
export function sourceName(file: string): string {
  return file === "-" ? "<stdin>" : file;
}

export function readSource(file: string, pretty: boolean): Loaded<string> {
  try {
    const value = file === "-" ? fs.readFileSync(0, "utf-8") : fs.readFileSync(file, "utf-8");
    return { ok: true, value };
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`, pretty);
    return { ok: false, exitCode: 4 };
  }
}

/** Lex, parse and check; diagnostics go to stderr with exit code 2. */
export function compileSource(source: string, file: string, pretty: boolean): Loaded<Program> {
  const result = parse(source, file);
  if (result.diagnostics.length > 0 || !result.program) {
    console.error(formatDiagnostics(result.diagnostics, pretty));
    return { ok: false, exitCode: 2 };
  }

  const checkDiags = validate(result.program);
  if (checkDiags.length > 0) {
    console.error(formatDiagnostics(checkDiags, pretty));
    return { ok: false, exitCode: 2 };
  }
  return { ok: true, value: result.program };
}

export function loadProgram(file: string, pretty: boolean): Loaded<Program> {
  const source = readSource(file, pretty);
  if (!source.ok) return source;
  return compileSource(source.value, sourceName(file), pretty);
}
