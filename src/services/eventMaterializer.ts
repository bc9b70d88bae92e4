// src/services/eventMaterializer.ts
// Finalized TaskRecord -> printable summary, calendar payload, or ICS event.
import type { DateArray, EventAttributes } from "ics";
import { parseISO } from "date-fns";
import type { CalendarEventPayload } from "../types/events";
import { SENTINEL, type TaskRecord } from "../types/task";
import { formatInOffset, parseIsoTimestamp, shiftMinutes } from "../lib/isoTime";

/**
 * Every payload spans this long. The record's `duration` is free text
 * ("half an hour", "2h") and is not consulted here.
 */
export const DEFAULT_EVENT_DURATION_MINUTES = 60;

const BANNER = "=== Calendar Event ===";

export function renderEventSummary(record: TaskRecord): string[] {
  return [
    BANNER,
    `Task: ${record.task}`,
    `With Whom: ${record.with_whom}`,
    `Time: ${record.time}`,
    `Location: ${record.location}`,
    `Agenda: ${record.agenda}`,
    `Duration: ${record.duration}`,
    `Participants: ${record.participants.join(", ")}`,
    "=".repeat(BANNER.length),
  ];
}

/**
 * Throws InvalidTimestampError when `time` is missing or not strict ISO-8601;
 * callers skip the calendar step on that.
 */
export function buildCalendarPayload(record: TaskRecord): CalendarEventPayload {
  const start = parseIsoTimestamp(record.time);
  const end = shiftMinutes(start, DEFAULT_EVENT_DURATION_MINUTES);

  const description = [`With: ${record.with_whom}`];
  if (record.agenda !== SENTINEL) description.push(`Agenda: ${record.agenda}`);

  return {
    summary: record.task,
    description: description.join("\n"),
    ...(record.location !== SENTINEL ? { location: record.location } : {}),
    start: { dateTime: formatInOffset(start.instant, start.offsetMinutes), timeZone: start.zoneLabel },
    end: { dateTime: formatInOffset(end.instant, end.offsetMinutes), timeZone: end.zoneLabel },
  };
}

/** Payload -> `ics` event attributes, in UTC. */
export function toIcsEvent(payload: CalendarEventPayload): EventAttributes {
  return {
    title: payload.summary,
    description: payload.description,
    ...(payload.location ? { location: payload.location } : {}),
    start: utcDateArray(parseISO(payload.start.dateTime)),
    end: utcDateArray(parseISO(payload.end.dateTime)),
    startInputType: "utc",
    startOutputType: "utc",
    endInputType: "utc",
    endOutputType: "utc",
  };
}

function utcDateArray(d: Date): DateArray {
  return [d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate(), d.getUTCHours(), d.getUTCMinutes()];
}
