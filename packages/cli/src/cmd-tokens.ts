/**
 * roadman tokens - dump the token stream of a source file
 */
import { tokenize, formatDiagnostics } from "@roadman/core";
import type { Token } from "@roadman/core";
import { readSource, sourceName } from "./source.js";

export function formatToken(token: Token): string {
  const position = `${token.line}:${token.column}`;
  const text = token.kind === "StringLit" ? JSON.stringify(token.text) : token.text;
  return text.length > 0 ? `${position} ${token.kind} ${text}` : `${position} ${token.kind}`;
}

export async function runTokens(file: string, opts: { json?: boolean }): Promise<number> {
  const pretty = !opts.json;
  const source = readSource(file, pretty);
  if (!source.ok) return source.exitCode;

  const { tokens, diagnostics } = tokenize(source.value, sourceName(file));

  if (opts.json) {
    console.log(JSON.stringify(tokens, null, 2));
  } else {
    for (const token of tokens) {
      console.log(formatToken(token));
    }
  }

  if (diagnostics.length > 0) {
    console.error(formatDiagnostics(diagnostics, pretty));
    return 2;
  }
  return 0;
}
