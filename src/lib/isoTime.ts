// Strict ISO-8601 handling for calendar payloads. Unlike the clock validator,
// a bad timestamp here is an error: the event cannot be created without one.
import { addMinutes, isValid, parseISO } from "date-fns";
import { InvalidTimestampError } from "./errors";
import { SENTINEL } from "../types/task";

// Date part followed by the date/time separator; parseISO judges the rest
const DATE_TIME_RE = /^\d{4}-?\d{2}-?\d{2}[T ]/;
const ZONE_RE = /(Z|[+-]\d{2}(?::?\d{2})?)$/i;

export type IsoTimestamp = {
  instant: Date;
  /** Minutes east of UTC the value was written in */
  offsetMinutes: number;
  /** "UTC" when zone-less or "Z", "UTC+05:30" style otherwise */
  zoneLabel: string;
};

export function parseIsoTimestamp(value: string | undefined): IsoTimestamp {
  const input = (value ?? "").trim();
  if (!input || input.toUpperCase() === SENTINEL) {
    throw new InvalidTimestampError(input, "a start time is required");
  }

  const m = DATE_TIME_RE.exec(input);
  if (!m) throw new InvalidTimestampError(input, "expected YYYY-MM-DDTHH:mm[:ss][Z|±HH:MM]");

  const written = ZONE_RE.exec(input.slice(m[0].length))?.[1];
  const zone = (written ?? "Z").toUpperCase();
  // Zone-less values are read as UTC
  const base = written ? input.slice(0, -written.length) : input;
  const instant = parseISO(`${base}${zone}`);
  if (!isValid(instant)) throw new InvalidTimestampError(input, "not a real calendar date/time");

  const offsetMinutes = zone === "Z" ? 0 : parseOffset(zone);
  return { instant, offsetMinutes, zoneLabel: zoneLabel(offsetMinutes) };
}

/** Render an instant in a fixed offset, e.g. "2025-03-10T15:00:00+05:30". */
export function formatInOffset(instant: Date, offsetMinutes: number): string {
  const shifted = new Date(instant.getTime() + offsetMinutes * 60_000);
  const local = shifted.toISOString().slice(0, 19);
  return `${local}${offsetSuffix(offsetMinutes)}`;
}

export function shiftMinutes(ts: IsoTimestamp, minutes: number): IsoTimestamp {
  return { ...ts, instant: addMinutes(ts.instant, minutes) };
}

function parseOffset(zone: string): number {
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? Number.parseInt(digits.slice(2, 4), 10) : 0;
  return sign * (hours * 60 + minutes);
}

function offsetSuffix(offsetMinutes: number): string {
  if (offsetMinutes === 0) return "Z";
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, "0");
  const mm = String(abs % 60).padStart(2, "0");
  return `${sign}${hh}:${mm}`;
}

function zoneLabel(offsetMinutes: number): string {
  return offsetMinutes === 0 ? "UTC" : `UTC${offsetSuffix(offsetMinutes)}`;
}
