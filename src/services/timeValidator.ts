// src/services/timeValidator.ts
import type { Logger } from "pino";
import { SENTINEL } from "../types/task";

// 12-hour wall clock: "9:05 am", "09:05PM", "12:30 PM". No "00", no 24h.
const CLOCK_RE = /^(1[0-2]|0?[1-9]):([0-5][0-9])\s?(am|pm)$/i;

/**
 * Normalizes a free-text time into "H:MM AM/PM", or the sentinel.
 * Never throws: anything unrecognized degrades to "N/A".
 */
export function validateTime(input: unknown, logger?: Logger): string {
  if (input === undefined || input === null || input === "") {
    logger?.info("No time provided. Setting to 'N/A'.");
    return SENTINEL;
  }

  if (typeof input !== "string") {
    logger?.warn({ field: "time", value: input }, "Invalid time format. Setting to 'N/A'.");
    return SENTINEL;
  }

  if (input.trim().toUpperCase() === SENTINEL) return SENTINEL;

  const m = CLOCK_RE.exec(input);
  if (!m) {
    logger?.warn({ field: "time", value: input }, "Invalid time format. Setting to 'N/A'.");
    return SENTINEL;
  }

  const hour = Number.parseInt(m[1], 10);
  return `${hour}:${m[2]} ${m[3].toUpperCase()}`;
}
