/**
 * Diagnostics shared by the lexer, parser, checker, interpreter and CLI.
 */
import type { Span } from "./ast.js";

export type DiagnosticCode =
  // lexing and parsing
  | "E_LEX"
  | "E_PARSE"
  // static checks
  | "E_BREAK_OUTSIDE_LOOP"
  | "E_RETURN_OUTSIDE_FN"
  | "E_DUP_PARAM"
  | "E_CONST_ASSIGN"
  // runtime
  | "E_UNDEFINED"
  | "E_TYPE"
  | "E_DIV_ZERO"
  | "E_NOT_CALLABLE"
  | "E_ARITY"
  | "E_STACK"
  | "E_CONTROL"
  // host
  | "E_IO"
  | "E_CONFIG";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  span?: Span;
  hint?: string;
}

export function makeDiag(
  code: DiagnosticCode,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

/** Zero-width span at a single position. */
export function pointSpan(file: string, line: number, col: number): Span {
  return { file, startLine: line, startCol: col, endLine: line, endCol: col + 1 };
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
    : "<unknown>";
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
