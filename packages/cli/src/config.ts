/**
 * Roadman CLI configuration loader.
 * Precedence: ./.roadmanrc.json > ~/.roadman/config.json > defaults
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { DEFAULT_MAX_CALL_DEPTH } from "@roadman/core";

export const configSchema = z
  .object({
    version: z.literal(1).default(1),
    prompt: z.string().default("> "),
    indent: z.number().int().min(0).max(8).default(2),
    maxCallDepth: z.number().int().positive().default(DEFAULT_MAX_CALL_DEPTH),
    diagnostics: z.enum(["pretty", "json"]).default("pretty"),
  })
  .strict();

export type RoadmanConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: RoadmanConfig = configSchema.parse({});

export interface ResolvedConfig {
  config: RoadmanConfig;
  source: "project" | "user" | "default";
  path: string | null;
  /** Files that existed but were skipped, with the reason. */
  warnings: string[];
}

type LoadOutcome =
  | { kind: "missing" }
  | { kind: "loaded"; config: RoadmanConfig }
  | { kind: "invalid"; reason: string };

function tryLoadConfigFile(filePath: string): LoadOutcome {
  if (!fs.existsSync(filePath)) return { kind: "missing" };

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { kind: "invalid", reason: msg };
  }

  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    return { kind: "invalid", reason };
  }
  return { kind: "loaded", config: parsed.data };
}

export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const candidates: Array<{ source: "project" | "user"; path: string }> = [
    { source: "project", path: path.join(cwd ?? process.cwd(), ".roadmanrc.json") },
    { source: "user", path: path.join(homeDir ?? os.homedir(), ".roadman", "config.json") },
  ];
  const warnings: string[] = [];

  for (const candidate of candidates) {
    const outcome = tryLoadConfigFile(candidate.path);
    if (outcome.kind === "loaded") {
      return { config: outcome.config, source: candidate.source, path: candidate.path, warnings };
    }
    if (outcome.kind === "invalid") {
      warnings.push(`Ignoring ${candidate.path}: ${outcome.reason}`);
    }
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null, warnings };
}

/** Resolves the config and reports skipped files on stderr. */
export function loadConfig(cwd?: string, homeDir?: string): RoadmanConfig {
  const resolved = resolveConfig(cwd, homeDir);
  for (const warning of resolved.warnings) {
    console.error(`warning[E_CONFIG]: ${warning}`);
  }
  return resolved.config;
}
