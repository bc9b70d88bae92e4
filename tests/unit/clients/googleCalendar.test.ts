import { describe, it, expect, vi, beforeEach } from "vitest";
import { GoogleCalendarSink } from "../../../src/clients/googleCalendar";
import type { CalendarEventPayload } from "../../../src/types/events";

const mocks = vi.hoisted(() => ({
  insert: vi.fn(),
  list: vi.fn(),
  setCredentials: vi.fn(),
  calendar: vi.fn(),
}));

vi.mock("googleapis", () => ({
  google: {
    auth: {
      OAuth2: class {
        setCredentials = mocks.setCredentials;
      },
    },
    calendar: mocks.calendar,
  },
}));

const PAYLOAD: CalendarEventPayload = {
  summary: "call",
  description: "With: Priya",
  start: { dateTime: "2025-03-10T15:00:00Z", timeZone: "UTC" },
  end: { dateTime: "2025-03-10T16:00:00Z", timeZone: "UTC" },
};

describe("GoogleCalendarSink", () => {
  let sink: GoogleCalendarSink;

  beforeEach(() => {
    mocks.insert.mockReset();
    mocks.list.mockReset();
    mocks.setCredentials.mockReset();
    mocks.calendar.mockReset();
    mocks.calendar.mockReturnValue({ events: { insert: mocks.insert, list: mocks.list } });
    sink = new GoogleCalendarSink({
      accessToken: "test-token",
      now: () => new Date("2025-03-09T12:00:00Z"),
    });
  });

  it("requires an access token", () => {
    expect(() => new GoogleCalendarSink({ accessToken: "" })).toThrow("google: access token is required");
  });

  it("authorizes the v3 client with the access token", () => {
    expect(mocks.setCredentials).toHaveBeenCalledWith({ access_token: "test-token" });
    expect(mocks.calendar).toHaveBeenCalledWith(expect.objectContaining({ version: "v3" }));
  });

  it("creates the event on the primary calendar", async () => {
    mocks.insert.mockResolvedValueOnce({ data: { id: "ev1", htmlLink: "https://calendar.google.com/event?eid=ev1" } });

    await expect(sink.createEvent(PAYLOAD)).resolves.toEqual({ link: "https://calendar.google.com/event?eid=ev1" });
    expect(mocks.insert).toHaveBeenCalledWith({
      calendarId: "primary",
      requestBody: {
        summary: "call",
        description: "With: Priya",
        location: undefined,
        start: { dateTime: "2025-03-10T15:00:00Z", timeZone: "UTC" },
        end: { dateTime: "2025-03-10T16:00:00Z", timeZone: "UTC" },
      },
    });
  });

  it("leaves offset-only zones to the dateTime", async () => {
    mocks.insert.mockResolvedValueOnce({ data: { htmlLink: "https://calendar.google.com/e" } });

    await sink.createEvent({
      ...PAYLOAD,
      start: { dateTime: "2025-03-10T15:00:00+05:30", timeZone: "UTC+05:30" },
      end: { dateTime: "2025-03-10T16:00:00+05:30", timeZone: "UTC+05:30" },
    });

    expect(mocks.insert.mock.calls[0][0].requestBody.start).toEqual({ dateTime: "2025-03-10T15:00:00+05:30" });
  });

  it("lists upcoming events from now", async () => {
    mocks.list.mockResolvedValueOnce({
      data: {
        items: [
          { summary: "call", start: { dateTime: "2025-03-10T15:00:00Z" }, htmlLink: "https://calendar.google.com/1" },
          { start: { date: "2025-03-12" } },
        ],
      },
    });

    await expect(sink.listUpcoming(5)).resolves.toEqual([
      { summary: "call", start: "2025-03-10T15:00:00Z", link: "https://calendar.google.com/1" },
      { summary: "(no title)", start: "2025-03-12", link: undefined },
    ]);
    expect(mocks.list).toHaveBeenCalledWith({
      calendarId: "primary",
      timeMin: "2025-03-09T12:00:00.000Z",
      maxResults: 5,
      singleEvents: true,
      orderBy: "startTime",
    });
  });

  it("wraps API errors with the HTTP status", async () => {
    mocks.insert.mockRejectedValueOnce(Object.assign(new Error("Forbidden"), { response: { status: 403 } }));

    await expect(sink.createEvent(PAYLOAD)).rejects.toMatchObject({
      code: "E_CALENDAR",
      status: 403,
      message: "google: HTTP 403: Forbidden",
    });
  });

  it("wraps transport errors without a status", async () => {
    mocks.list.mockRejectedValueOnce(new Error("socket hang up"));

    await expect(sink.listUpcoming(3)).rejects.toMatchObject({ code: "E_CALENDAR", message: "google: socket hang up" });
  });
});
