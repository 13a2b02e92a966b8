/**
 * roadman config - effective configuration summary command
 */
import { resolveConfig } from "./config.js";
import type { ConfigLocation } from "./source.js";

export async function runConfig(opts: { json?: boolean } & ConfigLocation): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  for (const warning of resolved.warnings) {
    console.error(`warning[E_CONFIG]: ${warning}`);
  }

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: resolved.config,
        },
        null,
        2
      )
    );
    return 0;
  }

  const { config } = resolved;
  console.log("Effective Roadman configuration");
  console.log(`  Source:         ${resolved.source}`);
  console.log(`  Path:           ${resolved.path ?? "(none)"}`);
  console.log(`  Prompt:         ${JSON.stringify(config.prompt)}`);
  console.log(`  Indent:         ${config.indent}`);
  console.log(`  Max call depth: ${config.maxCallDepth}`);
  console.log(`  Diagnostics:    ${config.diagnostics}`);
  return 0;
}
