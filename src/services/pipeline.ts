// src/services/pipeline.ts
// =============================
// One audio source -> one calendar event, strictly in order:
//   transcribe -> extract -> complete (optional) -> normalize -> materialize -> sink (optional)
// - Provider failures end the run with { ok:false } and are logged, never thrown.
// - A missing/invalid ISO time only skips the calendar step.
// - Batches run sources one after another; one failure never stops the next.
// =============================
import type { Logger } from "pino";
import type { AudioRef, CalendarSink, TranscriptionProvider } from "../types/providers";
import { describeAudio } from "../types/providers";
import type { CalendarEventPayload, UpcomingEvent } from "../types/events";
import type { TaskRecord, TimeFormat } from "../types/task";
import { errorMessage, InvalidTimestampError } from "../lib/errors";
import type { TaskExtractor } from "./extractService";
import type { InteractiveCompleter } from "./interactiveCompletion";
import { normalizeTaskFields } from "./fieldNormalizer";
import { buildCalendarPayload, renderEventSummary } from "./eventMaterializer";

export type PipelineDeps = {
  transcriber?: TranscriptionProvider;
  extractor: TaskExtractor;
  completer?: InteractiveCompleter;
  sink?: CalendarSink;
  timeFormat: TimeFormat;
  /** 0 disables the upcoming-events listing */
  upcomingLimit: number;
  logger: Logger;
  /** Human-facing output (the CLI prints it, the API ignores it) */
  out?: (line: string) => void;
};

export type CalendarOutcome =
  | { status: "created"; link: string; payload: CalendarEventPayload }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string; payload: CalendarEventPayload };

export type PipelineFailureStage = "transcription" | "extraction" | "internal";

export type PipelineResult =
  | {
      ok: true;
      source: string;
      transcript: string;
      /** As the model gave it, normalized */
      extracted: TaskRecord;
      /** After completion, ready for the calendar */
      record: TaskRecord;
      summary: string[];
      calendar?: CalendarOutcome;
      upcoming?: UpcomingEvent[];
    }
  | { ok: false; source: string; stage: PipelineFailureStage; reason: string; transcript?: string };

/* ============================== Public API ============================== */

export async function runPipeline(audio: AudioRef, deps: PipelineDeps): Promise<PipelineResult> {
  const source = describeAudio(audio);
  const log = deps.logger.child({ source });

  if (!deps.transcriber) {
    return fail(log, { source, stage: "transcription", reason: "no transcription provider configured" });
  }

  let transcript: string;
  try {
    log.info("Transcribing audio...");
    const result = await deps.transcriber.transcribe(audio);
    if (result.status !== "ok") {
      return fail(log, { source, stage: "transcription", reason: `Transcription failed: ${result.error}` });
    }
    transcript = result.text;
  } catch (e) {
    return fail(log, { source, stage: "transcription", reason: `Transcription error: ${errorMessage(e)}` });
  }

  return processTranscript(transcript, { ...deps, logger: log }, source);
}

/** Everything after transcription; used directly when the text is already known. */
export async function processTranscript(
  transcript: string,
  deps: PipelineDeps,
  source = "text"
): Promise<PipelineResult> {
  const log = deps.logger;
  const out = deps.out ?? (() => {});

  out(`\nTranscript:\n${transcript}`);

  const extracted = await deps.extractor.extract(transcript);
  if (!extracted) {
    return fail(log, { source, stage: "extraction", reason: "Failed to extract task details.", transcript });
  }

  out("\nExtracted Task Details:");
  out(JSON.stringify(extracted, null, 2));

  let record = extracted;
  if (deps.completer) {
    record = await deps.completer.complete(extracted);
    out("\nUpdated Task Details:");
    out(JSON.stringify(record, null, 2));
  }

  // Answers typed during completion go through the same rules
  record = normalizeTaskFields(record, { timeFormat: deps.timeFormat, logger: log });

  const summary = renderEventSummary(record);
  out("");
  summary.forEach((line) => out(line));

  if (!deps.sink) return { ok: true, source, transcript, extracted, record, summary };

  const calendar = await writeToCalendar(record, deps.sink, log);
  if (calendar.status === "created") out(`Event created: ${calendar.link}`);
  else out(`Calendar event not created: ${calendar.reason}`);

  const upcoming = deps.upcomingLimit > 0 ? await listUpcoming(deps.sink, deps.upcomingLimit, log) : undefined;
  if (upcoming) {
    out(upcoming.length ? "\nUpcoming events:" : "\nNo upcoming events found.");
    upcoming.forEach((e) => out(`${e.start} ${e.summary}`));
  }

  return { ok: true, source, transcript, extracted, record, summary, calendar, upcoming };
}

export async function runBatch(
  sources: AudioRef[],
  deps: PipelineDeps
): Promise<PipelineResult[]> {
  const out = deps.out ?? (() => {});
  const results: PipelineResult[] = [];

  for (const audio of sources) {
    const source = describeAudio(audio);
    out(`\nProcessing file: ${source}\n${"=".repeat(30)}`);
    try {
      results.push(await runPipeline(audio, deps));
    } catch (e) {
      results.push(fail(deps.logger, { source, stage: "internal", reason: errorMessage(e) }));
    }
  }
  return results;
}

/* ============================== Helpers ================================= */

async function writeToCalendar(record: TaskRecord, sink: CalendarSink, log: Logger): Promise<CalendarOutcome> {
  let payload: CalendarEventPayload;
  try {
    payload = buildCalendarPayload(record);
  } catch (e) {
    if (!(e instanceof InvalidTimestampError)) throw e;
    log.error({ field: "time", value: e.value }, `Skipping calendar event: ${e.message}`);
    return { status: "skipped", reason: e.message };
  }

  try {
    const { link } = await sink.createEvent(payload);
    log.info({ link }, "Calendar event created");
    return { status: "created", link, payload };
  } catch (e) {
    log.error({ err: errorMessage(e) }, "Failed to create calendar event");
    return { status: "failed", reason: errorMessage(e), payload };
  }
}

async function listUpcoming(sink: CalendarSink, max: number, log: Logger): Promise<UpcomingEvent[] | undefined> {
  try {
    return await sink.listUpcoming(max);
  } catch (e) {
    log.error({ err: errorMessage(e) }, "Failed to list upcoming events");
    return undefined;
  }
}

function fail(
  log: Logger,
  result: { source: string; stage: PipelineFailureStage; reason: string; transcript?: string }
): PipelineResult {
  log.error({ stage: result.stage }, result.reason);
  return { ok: false, ...result };
}
