/**
 * roadman help - language reference by topic
 */
import { KEYWORDS } from "@roadman/core";
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";

export { QUICKREF };

function resolveTopic(topic: string): string | null {
  const normalized = topic.toLowerCase().trim();

  // Guard against prototype-chain keys like "constructor" or "__proto__".
  if (Object.prototype.hasOwnProperty.call(TOPICS, normalized)) {
    return normalized;
  }

  // Prefix matching: "fun" -> "functions", "tr" -> "transpile"
  const matches = TOPIC_LIST.filter((t) => t.startsWith(normalized));
  if (matches.length === 1) {
    return matches[0] ?? null;
  }

  return null;
}

function renderKeywordIndex(): string {
  const entries = [...KEYWORDS.entries()].sort(([a], [b]) => a.localeCompare(b));
  const width = Math.max(...entries.map(([spelling]) => spelling.length));
  return [
    "ROADMAN KEYWORD INDEX",
    "=====================",
    "",
    ...entries.map(([spelling, tokenType]) => `  ${spelling.padEnd(width, " ")}  ${tokenType.name}`),
    "",
    `Total: ${entries.length}`,
    "",
    "More details:",
    "  roadman help syntax",
  ].join("\n");
}

function renderUsage(commands: string[]): string {
  return ["Usage:", ...commands.map((command) => `  ${command}`)].join("\n");
}

function renderTopicList(): string {
  return ["Available topics:", ...TOPIC_LIST.map((name) => `  - ${name}`)].join("\n");
}

export function runHelp(topic?: string, opts: { index?: boolean } = {}): void {
  if (opts.index) {
    if (!topic || resolveTopic(topic) !== "syntax") {
      console.error("The --index flag is only supported with the syntax topic.");
      console.error(renderUsage(["roadman help syntax --index"]));
      process.exitCode = 1;
      return;
    }

    console.log(renderKeywordIndex());
    return;
  }

  if (!topic) {
    console.log(QUICKREF);
    return;
  }

  const resolved = resolveTopic(topic);
  if (resolved) {
    console.log(TOPICS[resolved]);
    return;
  }

  console.error(`Unknown help topic: "${topic}"`);
  console.error(renderTopicList());
  console.error(renderUsage(["roadman help <topic>", "roadman help syntax --index"]));
  process.exitCode = 1;
}
