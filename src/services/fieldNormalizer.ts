// src/services/fieldNormalizer.ts
import type { Logger } from "pino";
import { SENTINEL, type RawTaskFields, type TaskRecord, type TimeFormat } from "../types/task";
import { validateTime } from "./timeValidator";

export type NormalizeOptions = {
  timeFormat?: TimeFormat;
  logger?: Logger;
};

/**
 * Loose model output -> complete TaskRecord.
 * Pure and idempotent; every branch has a fallback, nothing throws.
 */
export function normalizeTaskFields(raw: RawTaskFields, options: NormalizeOptions = {}): TaskRecord {
  const { timeFormat = "clock", logger } = options;

  return {
    task: fieldValue(raw.task, "task", logger),
    with_whom: fieldValue(raw.with_whom, "with_whom", logger),
    time: timeFormat === "clock" ? validateTime(raw.time, logger) : isoTimeValue(raw.time, logger),
    location: fieldValue(raw.location, "location", logger),
    agenda: fieldValue(raw.agenda, "agenda", logger),
    duration: fieldValue(raw.duration, "duration", logger),
    participants: participantList(raw.participants, logger),
  };
}

/** Value if truthy, else the sentinel. */
export function fieldValue(value: unknown, field: string, logger?: Logger): string {
  const text = asText(value);
  if (!text) {
    logger?.info({ field }, `No ${field} provided. Setting to 'N/A'.`);
    return SENTINEL;
  }
  return text;
}

/** Comma-separated string or array -> trimmed, non-empty names; never empty. */
export function participantList(value: unknown, logger?: Logger): string[] {
  let names: string[] = [];
  if (typeof value === "string") {
    names = splitNames(value);
  } else if (Array.isArray(value)) {
    names = value
      .filter((v): v is string => typeof v === "string")
      .map((v) => v.trim())
      .filter(Boolean);
  }

  if (!names.length) {
    logger?.info({ field: "participants" }, "No participants provided. Setting to 'N/A'.");
    return [SENTINEL];
  }
  return names;
}

export function splitNames(value: string): string[] {
  return value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
}

// ISO timestamps are checked strictly when the calendar payload is built
function isoTimeValue(value: unknown, logger?: Logger): string {
  if (typeof value !== "string" || !value.trim()) {
    logger?.info({ field: "time" }, "No time provided. Setting to 'N/A'.");
    return SENTINEL;
  }
  const trimmed = value.trim();
  return trimmed.toUpperCase() === SENTINEL ? SENTINEL : trimmed;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return value !== 0 && Number.isFinite(value) ? String(value) : "";
  if (value === true) return "true";
  if (Array.isArray(value)) {
    return value
      .filter((v): v is string => typeof v === "string" && v.trim() !== "")
      .join(", ");
  }
  return "";
}
