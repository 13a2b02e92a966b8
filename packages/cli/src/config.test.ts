/**
 * Tests for configuration resolution and the config command.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_CONFIG, resolveConfig } from "./config.js";
import { runConfig } from "./cmd-config.js";

async function captureCmd(
  fn: () => Promise<number>
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await fn();
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("Roadman config", () => {
  let cwd: string;
  let home: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), "roadman-config-cwd-"));
    home = fs.mkdtempSync(path.join(os.tmpdir(), "roadman-config-home-"));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(home, { recursive: true, force: true });
  });

  function writeUserConfig(content: string): string {
    const dir = path.join(home, ".roadman");
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("falls back to defaults", () => {
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "default");
    assert.equal(resolved.path, null);
    assert.deepEqual(resolved.warnings, []);
    assert.deepEqual(resolved.config, {
      version: 1,
      prompt: "> ",
      indent: 2,
      maxCallDepth: 1000,
      diagnostics: "pretty",
    });
    assert.deepEqual(DEFAULT_CONFIG, resolved.config);
  });

  it("fills defaults around the keys a file sets", () => {
    const file = writeUserConfig(JSON.stringify({ prompt: "rm> " }));
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "user");
    assert.equal(resolved.path, file);
    assert.equal(resolved.config.prompt, "rm> ");
    assert.equal(resolved.config.indent, 2);
  });

  it("prefers the project file over the user file", () => {
    writeUserConfig(JSON.stringify({ indent: 4 }));
    fs.writeFileSync(path.join(cwd, ".roadmanrc.json"), JSON.stringify({ indent: 0 }), "utf-8");
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "project");
    assert.equal(resolved.config.indent, 0);
  });

  it("skips an invalid project file with a warning", () => {
    const projectFile = path.join(cwd, ".roadmanrc.json");
    fs.writeFileSync(projectFile, JSON.stringify({ indent: 9 }), "utf-8");
    writeUserConfig(JSON.stringify({ maxCallDepth: 50 }));
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "user");
    assert.equal(resolved.config.maxCallDepth, 50);
    assert.equal(resolved.warnings.length, 1);
    assert.ok(resolved.warnings[0]?.startsWith(`Ignoring ${projectFile}: indent: `));
  });

  it("rejects unknown keys", () => {
    fs.writeFileSync(path.join(cwd, ".roadmanrc.json"), JSON.stringify({ colour: "blue" }), "utf-8");
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "default");
    assert.equal(resolved.warnings.length, 1);
  });

  it("rejects a diagnostics mode it does not know", () => {
    writeUserConfig(JSON.stringify({ diagnostics: "xml" }));
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "default");
    assert.ok(resolved.warnings[0]?.includes("diagnostics: "));
  });

  it("prints the effective config as JSON", async () => {
    const file = writeUserConfig(JSON.stringify({ indent: 4, diagnostics: "json" }));
    const result = await captureCmd(() => runConfig({ json: true, cwd, homeDir: home }));
    assert.equal(result.code, 0);
    assert.deepEqual(JSON.parse(result.stdout), {
      source: "user",
      path: file,
      config: { version: 1, prompt: "> ", indent: 4, maxCallDepth: 1000, diagnostics: "json" },
    });
  });

  it("prints a readable summary", async () => {
    const result = await captureCmd(() => runConfig({ cwd, homeDir: home }));
    assert.deepEqual(result.stdout.split("\n"), [
      "Effective Roadman configuration",
      "  Source:         default",
      "  Path:           (none)",
      '  Prompt:         "> "',
      "  Indent:         2",
      "  Max call depth: 1000",
      "  Diagnostics:    pretty",
    ]);
  });

  it("reports skipped files on stderr", async () => {
    fs.writeFileSync(path.join(cwd, ".roadmanrc.json"), "[", "utf-8");
    const result = await captureCmd(() => runConfig({ cwd, homeDir: home }));
    assert.ok(result.stderr.startsWith("warning[E_CONFIG]: Ignoring "));
  });
});
