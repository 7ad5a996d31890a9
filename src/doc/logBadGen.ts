import fs from "node:fs";
import path from "node:path";

export type BadGenKind = "json-parse-error" | "schema-validation-failed" | "batch-structure-rejected";

export function badGenLogFile(): string {
  const dir = process.env.LLM_BAD_GEN_LOG_DIR || path.join(process.cwd(), "logs");
  return path.join(dir, "llm-bad-gen.log");
}

/** Appends one JSON line per rejected generation so prompts can be tuned later. */
export function logBadGen(kind: BadGenKind, payload: unknown): void {
  const file = badGenLogFile();
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const line = `[${new Date().toISOString()}] ${kind} ${JSON.stringify(payload)}\n`;
    fs.appendFileSync(file, line, { encoding: "utf8" });
  } catch (e) {
    // log dir unavailable
    console.warn("logBadGen fallback:", kind, payload, e);
  }
}
