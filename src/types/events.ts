//  CalendarEventPayload: what a calendar sink receives
// -----------------------------
// - Built from a finalized TaskRecord by the event materializer.
// - `dateTime` is a full ISO 8601 string that keeps its own offset.
// - `timeZone` is "UTC" for zone-less or "Z" timestamps, "UTC+05:30" style otherwise.
// - Shape follows the Google Calendar v3 event resource so the Google sink
//   can post it almost as-is.
// =============================
export type EventDateTime = {
    /** e.g. "2025-08-29T17:00:00Z" or "2025-08-29T17:00:00+05:30" */
    dateTime: string;

    /** Label of the zone the timestamp was written in */
    timeZone: string;
};

export type CalendarEventPayload = {
    /** Short human-readable label, taken from the task */
    summary: string;

    /** Who the event is with, plus the agenda when known */
    description: string;

    /** Only set when the location is known */
    location?: string;

    start: EventDateTime;

    /** Always start + the default event duration */
    end: EventDateTime;
};




//  Sink results
// -----------------------------
// - `link` is whatever the sink can point a user at (web URL, file path).
// =============================

export type CreatedEvent = {
    link: string;
};

export type UpcomingEvent = {
    summary: string;

    /** ISO 8601 start, or a date for all-day events */
    start: string;

    link?: string;
};
