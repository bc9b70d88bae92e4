// src/clients/googleCalendar.ts
// Google Calendar v3 through googleapis. Takes a ready access token; obtaining
// and refreshing it is somebody else's job.
import { google, type calendar_v3 } from "googleapis";
import type { CalendarSink } from "../types/providers";
import type { CalendarEventPayload, CreatedEvent, EventDateTime, UpcomingEvent } from "../types/events";
import { ProviderError } from "../lib/errors";

export class GoogleCalendarSink implements CalendarSink {
  private readonly calendar: calendar_v3.Calendar;
  private readonly calendarId: string;
  private readonly now: () => Date;

  constructor(opts: { accessToken: string; calendarId?: string; now?: () => Date }) {
    if (!opts.accessToken) throw new ProviderError("E_CALENDAR", "google", "access token is required");
    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: opts.accessToken });
    this.calendar = google.calendar({ version: "v3", auth });
    this.calendarId = opts.calendarId ?? "primary";
    this.now = opts.now ?? (() => new Date());
  }

  async createEvent(payload: CalendarEventPayload): Promise<CreatedEvent> {
    try {
      const resp = await this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: payload.summary,
          description: payload.description,
          location: payload.location,
          start: toGoogleTime(payload.start),
          end: toGoogleTime(payload.end),
        },
      });
      return { link: resp.data.htmlLink ?? "" };
    } catch (e) {
      throw wrapError(e);
    }
  }

  async listUpcoming(max: number): Promise<UpcomingEvent[]> {
    try {
      const resp = await this.calendar.events.list({
        calendarId: this.calendarId,
        timeMin: this.now().toISOString(),
        maxResults: max,
        singleEvents: true,
        orderBy: "startTime",
      });
      return (resp.data.items ?? []).map((e) => ({
        summary: e.summary ?? "(no title)",
        start: e.start?.dateTime ?? e.start?.date ?? "",
        link: e.htmlLink ?? undefined,
      }));
    } catch (e) {
      throw wrapError(e);
    }
  }
}

// Offsets live in dateTime; only real IANA names go in timeZone
function toGoogleTime(t: EventDateTime): calendar_v3.Schema$EventDateTime {
  return t.timeZone === "UTC" ? { dateTime: t.dateTime, timeZone: "UTC" } : { dateTime: t.dateTime };
}

function wrapError(e: unknown): ProviderError {
  const status = statusOf(e);
  const message = e instanceof Error ? e.message : String(e);
  return new ProviderError("E_CALENDAR", "google", status ? `HTTP ${status}: ${message}` : message, { status, cause: e });
}

// googleapis errors carry the HTTP response
function statusOf(e: unknown): number | undefined {
  if (typeof e !== "object" || e === null || !("response" in e)) return undefined;
  const resp = e.response;
  if (typeof resp !== "object" || resp === null || !("status" in resp)) return undefined;
  return typeof resp.status === "number" ? resp.status : undefined;
}
