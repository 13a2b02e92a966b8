/**
 * roadman trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  span: z.unknown().optional(),
  data: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

export type TraceLine = z.infer<typeof traceLineSchema>;

export interface TraceSummary {
  runId: string;
  runs: number;
  totalEvents: number;
  statements: number;
  functionCalls: number;
  callsByName: Record<string, number>;
  loops: number;
  loopIterations: number;
  failures: number;
  errors: string[];
  skippedLines: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = traceLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function summarizeTrace(events: TraceLine[], skippedLines: number = 0): TraceSummary {
  const summary: TraceSummary = {
    runId: events[0]?.runId ?? "",
    runs: 0,
    totalEvents: events.length,
    statements: 0,
    functionCalls: 0,
    callsByName: {},
    loops: 0,
    loopIterations: 0,
    failures: 0,
    errors: [],
    skippedLines,
  };

  for (const ev of events) {
    const data = ev.data ?? {};
    switch (ev.event) {
      case "run_start":
        summary.runs++;
        if (!summary.startTime) summary.startTime = ev.ts;
        break;
      case "run_end": {
        summary.endTime = ev.ts;
        const error = data["error"];
        const message = data["message"];
        if (typeof error === "string") {
          summary.failures++;
          summary.errors.push(typeof message === "string" ? `${error}: ${message}` : error);
        }
        break;
      }
      case "stmt_start":
        summary.statements++;
        break;
      case "fn_call_start": {
        summary.functionCalls++;
        const fn = data["fn"];
        const name = typeof fn === "string" ? fn : "unknown";
        summary.callsByName[name] = (summary.callsByName[name] ?? 0) + 1;
        break;
      }
      case "loop_start":
        summary.loops++;
        break;
      case "loop_end": {
        const iterations = data["iterations"];
        if (typeof iterations === "number") summary.loopIterations += iterations;
        break;
      }
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }
  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let skipped = 0;
  for (const line of lines) {
    const ev = parseLine(line);
    if (ev) {
      events.push(ev);
    } else {
      skipped++;
    }
  }

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary = summarizeTrace(events, skipped);

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:           ${summary.runId}`);
  console.log(`  Runs:             ${summary.runs}`);
  console.log(`  Total events:     ${summary.totalEvents}`);
  console.log(`  Statements:       ${summary.statements}`);
  console.log(`  Function calls:   ${summary.functionCalls}`);
  if (Object.keys(summary.callsByName).length > 0) {
    console.log(`  Functions called:`);
    for (const [name, count] of Object.entries(summary.callsByName)) {
      console.log(`    ${name}: ${count}`);
    }
  }
  console.log(`  Loops:            ${summary.loops}`);
  console.log(`  Loop iterations:  ${summary.loopIterations}`);
  console.log(`  Failures:         ${summary.failures}`);
  for (const error of summary.errors) {
    console.log(`    ${error}`);
  }
  if (summary.skippedLines > 0) {
    console.log(`  Skipped lines:    ${summary.skippedLines}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:         ${summary.durationMs}ms`);
  }
  return 0;
}
