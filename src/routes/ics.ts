// src/routes/ics.ts
import { Router } from "express";
import { createEvents, type EventAttributes } from "ics";
import { IcsBody } from "../schemas/extract.schema";
import { sendErr } from "../lib/http";
import { InvalidTimestampError } from "../lib/errors";
import { normalizeTaskFields } from "../services/fieldNormalizer";
import { buildCalendarPayload, toIcsEvent } from "../services/eventMaterializer";

/**
 * POST /api/ics
 * { records: TaskRecord[] } with ISO-8601 times -> text/calendar download.
 */
export function createIcsRouter() {
  const router = Router();

  router.post("/", (req, res) => {
    const parsed = IcsBody.safeParse(req.body);
    if (!parsed.success) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", parsed.error.flatten(), 422);
    }

    let events: EventAttributes[];
    try {
      events = parsed.data.records.map((r) =>
        toIcsEvent(buildCalendarPayload(normalizeTaskFields(r, { timeFormat: "iso" })))
      );
    } catch (e) {
      if (e instanceof InvalidTimestampError) {
        return sendErr(res, e.code, e.message, { value: e.value }, 422);
      }
      throw e;
    }

    const { error, value } = createEvents(events);
    if (error || !value) {
      return sendErr(res, "E_CALENDAR", error ? error.message : "empty calendar output", undefined, 500);
    }

    res.setHeader("Content-Type", "text/calendar; charset=utf-8");
    res.setHeader("Content-Disposition", 'attachment; filename="events.ics"');
    return res.send(value);
  });

  return router;
}
