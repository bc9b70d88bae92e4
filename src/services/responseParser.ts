// src/services/responseParser.ts
// -----------------------------
// Turns a model's raw text into a field mapping.
// - "strict":   the whole response decoded as a JSON object
// - "fallback": the slice between the first "{" and the last "}" decoded
// - "empty":    neither worked; callers treat every field as absent
// Null values become the sentinel on both success paths.
// =============================
import { SENTINEL, type RawTaskFields } from "../types/task";

export type ParseOutcome =
  | { kind: "strict"; fields: RawTaskFields }
  | { kind: "fallback"; fields: RawTaskFields }
  | { kind: "empty"; fields: RawTaskFields; reason: string };

export function parseModelResponse(raw: string): ParseOutcome {
  // Fast path: already pure JSON
  const strict = decodeObject(raw);
  if (strict) return { kind: "strict", fields: replaceNulls(strict) };

  const first = raw.indexOf("{");
  if (first === -1) return { kind: "empty", fields: {}, reason: "no JSON object found" };

  const last = raw.lastIndexOf("}");
  if (last < first) return { kind: "empty", fields: {}, reason: "unterminated JSON object" };

  const sliced = decodeObject(raw.slice(first, last + 1));
  if (!sliced) return { kind: "empty", fields: {}, reason: "embedded JSON could not be decoded" };

  return { kind: "fallback", fields: replaceNulls(sliced) };
}

function decodeObject(s: string): RawTaskFields | null {
  let value: unknown;
  try {
    value = JSON.parse(s);
  } catch {
    return null;
  }
  return isPlainObject(value) ? value : null;
}

function isPlainObject(value: unknown): value is RawTaskFields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function replaceNulls(fields: RawTaskFields): RawTaskFields {
  const out: RawTaskFields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = value === null ? SENTINEL : value;
  }
  return out;
}
