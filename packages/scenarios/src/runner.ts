/**
 * Runs one scenario against the CLI in-process: the scenario folder is
 * copied into a scratch directory, which becomes the working directory
 * while the command line goes through the real command definitions.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Readable, Writable } from "node:stream";
import { createProgram } from "@roadman/cli";
import type { ScenarioConfig } from "./types.js";

export interface RunResult {
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  workDir: string;
}

function copyDirRecursive(src: string, dest: string): void {
  fs.mkdirSync(dest, { recursive: true });
  for (const entry of fs.readdirSync(src, { withFileTypes: true })) {
    if (entry.name === "scenario.json") continue;
    const srcPath = path.join(src, entry.name);
    const destPath = path.join(dest, entry.name);
    if (entry.isDirectory()) {
      copyDirRecursive(srcPath, destPath);
    } else {
      fs.copyFileSync(srcPath, destPath);
    }
  }
}

function collector(chunks: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf-8"));
      callback();
    },
  });
}

export function normalizeLF(s: string): string {
  return s.replace(/\r\n/g, "\n");
}

/** The caller removes `workDir` (and `homeDir`) when done. */
export async function runScenario(
  scenarioDir: string,
  config: ScenarioConfig,
  homeDir: string
): Promise<RunResult> {
  const workDir = fs.mkdtempSync(path.join(os.tmpdir(), "roadman-scenario-"));
  copyDirRecursive(scenarioDir, workDir);
  if (config.config) {
    fs.writeFileSync(path.join(workDir, ".roadmanrc.json"), JSON.stringify(config.config));
  }

  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  const origCwd = process.cwd();
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" ") + "\n");
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" ") + "\n");

  let exitCode: number | undefined;
  try {
    process.chdir(workDir);
    const program = createProgram({
      cwd: workDir,
      homeDir,
      exit: (code) => {
        exitCode = code;
      },
      input: Readable.from(config.stdin !== undefined ? [config.stdin] : []),
      output: collector(out),
      errorOutput: collector(err),
    });
    await program.parseAsync(config.cmd, { from: "user" });
  } finally {
    process.chdir(origCwd);
    console.log = origLog;
    console.error = origError;
  }

  return { exitCode, stdout: out.join(""), stderr: err.join(""), workDir };
}
