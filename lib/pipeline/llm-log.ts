import fs from "node:fs";
import path from "node:path";
import type { LlmLogEntry } from "./core/llm";

export const LLM_LOG_FILE = "llm-log.jsonl";

export const MAX_LOG_ENTRIES = 250;

/**
 * Append a log entry to the run's JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(runDir: string, entry: LlmLogEntry): void {
  const filePath = path.join(runDir, LLM_LOG_FILE);
  fs.mkdirSync(runDir, { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  // Trim if over limit
  const content = fs.readFileSync(filePath, "utf-8");
  const lines = content.split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}
