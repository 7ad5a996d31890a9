import { LlmParseError } from "../utils/errors";

const PREVIEW_CHARS = 200;

/** Strip a leading ``` / ```json fence line and a trailing ``` fence. */
export function stripCodeFence(text: string): string {
  let s = String(text ?? "").trim();
  if (s.startsWith("```")) {
    const nl = s.indexOf("\n");
    s = nl === -1 ? s.slice(3) : s.slice(nl + 1);
    s = s.trimEnd();
    if (s.endsWith("```")) s = s.slice(0, -3);
    s = s.trim();
  }
  return s;
}

/**
 * Slice of `text` from the first `{` to its matching `}`, or null when there is
 * no opening brace or it is never closed. Braces inside JSON strings do not count.
 */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Turns a raw completion into a parsed JSON value: fence stripping first, then
 * brace matching when the remainder still carries prose around the object.
 */
export function parseModelJson(raw: string): unknown {
  const cleaned = stripCodeFence(raw);
  try {
    return JSON.parse(cleaned);
  } catch {
    // not pure JSON, fall through to brace matching
  }

  const span = extractFirstJsonObject(cleaned);
  if (span !== null) {
    try {
      return JSON.parse(span);
    } catch (e) {
      throw new LlmParseError(
        "Failed to parse LLM response as JSON",
        raw.slice(0, PREVIEW_CHARS),
        span.slice(0, PREVIEW_CHARS),
        { cause: e }
      );
    }
  }

  throw new LlmParseError(
    "No JSON object found in LLM response",
    raw.slice(0, PREVIEW_CHARS),
    cleaned.slice(0, PREVIEW_CHARS)
  );
}
