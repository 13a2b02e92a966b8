/**
 * roadman check - static validation command
 */
import { loadConfig } from "./config.js";
import { loadProgram } from "./source.js";
import type { ConfigLocation } from "./source.js";

export interface CheckOptions extends ConfigLocation {
  json?: boolean;
}

export async function runCheck(file: string, opts: CheckOptions): Promise<number> {
  const config = loadConfig(opts.cwd, opts.homeDir);
  const pretty = !opts.json && config.diagnostics === "pretty";

  const loaded = loadProgram(file, pretty);
  if (!loaded.ok) return loaded.exitCode;

  console.log(pretty ? "No errors found." : "[]");
  return 0;
}
