//  TaskRecord: one scheduling request pulled out of a transcript
// -----------------------------
// - Every field is always present once normalized.
// - Unknown values are the literal sentinel "N/A", never null/undefined.
// - `participants` is never empty: no one known => ["N/A"].
// =============================

/** Marks a field that was recognized but could not be determined. */
export const SENTINEL = "N/A";

export type TaskRecord = {
  /** Free text describing the activity, becomes the event summary */
  task: string;
  /** Counterpart name(s) */
  with_whom: string;
  /** "H:MM AM/PM", an ISO-8601 timestamp (iso mode) or the sentinel */
  time: string;
  location: string;
  agenda: string;
  duration: string;
  /** Ordered, non-empty */
  participants: string[];
};

export type TaskField = keyof TaskRecord;

/** Field order used in the extraction prompt. */
export const TASK_FIELDS: readonly TaskField[] = [
  "task",
  "with_whom",
  "time",
  "location",
  "agenda",
  "duration",
  "participants",
];

/** Fields the user is asked about when they come back as the sentinel. */
export const PROMPTABLE_FIELDS = ["time", "location", "agenda", "duration", "participants"] as const;

export type PromptableField = (typeof PROMPTABLE_FIELDS)[number];

/** Whatever the model handed back, before normalization. */
export type RawTaskFields = Record<string, unknown>;

/**
 * How `time` is interpreted:
 * - "clock": 12-hour wall clock ("3:00 PM")
 * - "iso":   ISO-8601 timestamp with offset, required for calendar payloads
 */
export type TimeFormat = "clock" | "iso";

export function isSentinel(value: string | string[]): boolean {
  if (Array.isArray(value)) return value.length === 1 && value[0] === SENTINEL;
  return value === SENTINEL;
}
