// src/clients/icsCalendar.ts
// Writes each event to its own .ics file. Upcoming events are the ones this
// process has written.
import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { compareAsc, parseISO } from "date-fns";
import { createEvent } from "ics";
import type { CalendarSink } from "../types/providers";
import type { CalendarEventPayload, CreatedEvent, UpcomingEvent } from "../types/events";
import { ProviderError } from "../lib/errors";
import { toIcsEvent } from "../services/eventMaterializer";

export class IcsCalendarSink implements CalendarSink {
  private readonly outputDir: string;
  private readonly now: () => Date;
  private readonly written: Array<UpcomingEvent & { at: Date }> = [];

  constructor(opts: { outputDir: string; now?: () => Date }) {
    this.outputDir = resolve(opts.outputDir);
    this.now = opts.now ?? (() => new Date());
  }

  async createEvent(payload: CalendarEventPayload): Promise<CreatedEvent> {
    const { error, value } = createEvent(toIcsEvent(payload));
    if (error || !value) {
      throw new ProviderError("E_CALENDAR", "ics", error ? error.message : "empty calendar output", { cause: error });
    }

    await mkdir(this.outputDir, { recursive: true });
    const file = join(this.outputDir, fileName(payload));
    await writeFile(file, value, "utf8");

    this.written.push({
      summary: payload.summary,
      start: payload.start.dateTime,
      link: file,
      at: parseISO(payload.start.dateTime),
    });
    return { link: file };
  }

  async listUpcoming(max: number): Promise<UpcomingEvent[]> {
    const now = this.now();
    return this.written
      .filter((e) => compareAsc(e.at, now) >= 0)
      .sort((a, b) => compareAsc(a.at, b.at))
      .slice(0, max)
      .map(({ summary, start, link }) => ({ summary, start, link }));
  }
}

function fileName(payload: CalendarEventPayload): string {
  const slug =
    payload.summary
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-+|-+$/g, "")
      .slice(0, 40) || "event";
  const stamp = payload.start.dateTime.replace(/[^0-9]/g, "").slice(0, 12);
  return `${stamp}-${slug}.ics`;
}
