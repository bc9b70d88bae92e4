// src/services/extractService.ts
// =============================
// Transcript text -> TaskRecord via the language model.
// - Crafts a strict JSON-only prompt
// - Logs the raw response before any parsing
// - Parses (strict JSON, then first "{" .. last "}") and normalizes
// - Model failure => null; no retries here
// =============================
import type { Logger } from "pino";
import type { LanguageModel } from "../types/providers";
import { SENTINEL, TASK_FIELDS, type TaskRecord, type TimeFormat } from "../types/task";
import { errorMessage } from "../lib/errors";
import { parseModelResponse } from "./responseParser";
import { normalizeTaskFields } from "./fieldNormalizer";

export type TaskExtractorOptions = {
  llm: LanguageModel;
  logger: Logger;
  timeFormat?: TimeFormat;
  /** IANA zone the speaker is in; only used for ISO times */
  timezone?: string;
  /** "Now" for resolving relative dates; defaults to the wall clock */
  now?: () => Date;
};

export class TaskExtractor {
  private readonly llm: LanguageModel;
  private readonly logger: Logger;
  private readonly timeFormat: TimeFormat;
  private readonly timezone: string;
  private readonly now: () => Date;

  constructor(options: TaskExtractorOptions) {
    this.llm = options.llm;
    this.logger = options.logger;
    this.timeFormat = options.timeFormat ?? "clock";
    this.timezone = options.timezone ?? "UTC";
    this.now = options.now ?? (() => new Date());
  }

  async extract(transcriptText: string): Promise<TaskRecord | null> {
    const prompt = buildExtractionPrompt(transcriptText, {
      timeFormat: this.timeFormat,
      timezone: this.timezone,
      referenceDate: this.now(),
    });

    let raw: string;
    try {
      this.logger.info("Extracting task details with LLM...");
      raw = (await this.llm.complete(prompt)).text;
    } catch (e) {
      this.logger.error({ err: errorMessage(e) }, "LLM processing failed");
      return null;
    }

    this.logger.info({ response: raw }, "Raw LLM response");

    const outcome = parseModelResponse(raw);
    if (outcome.kind === "empty") {
      this.logger.warn({ reason: outcome.reason }, "Could not parse LLM response; every field defaults");
    } else if (outcome.kind === "fallback") {
      this.logger.info("Response is not pure JSON; used the embedded object");
    }

    return normalizeTaskFields(outcome.fields, { timeFormat: this.timeFormat, logger: this.logger });
  }
}

/* ============================== Prompts ================================= */

export function buildExtractionPrompt(
  text: string,
  ctx: { timeFormat: TimeFormat; timezone: string; referenceDate: Date }
): string {
  const fields = TASK_FIELDS.map((f) => `'${f}'`).join(", ");

  const timeRule =
    ctx.timeFormat === "iso"
      ? "The 'time' field must be an ISO 8601 timestamp with a timezone offset " +
        "(e.g. 2025-08-29T15:00:00-04:00). Resolve relative dates like \"tomorrow\" " +
        `against the reference date ${ctx.referenceDate.toISOString()} in timezone ${ctx.timezone}. `
      : "The 'time' field must look like '3:00 PM'. ";

  return (
    "Understand the following text and extract structured information about a task. " +
    `Return only a JSON object with the following fields: ${fields}. ` +
    "'participants' is a list of names. " +
    timeRule +
    `If any field is not mentioned in the text, set it to '${SENTINEL}'. ` +
    "Do not include any additional text or explanations.\n\n" +
    `Text: ${text}\n\n` +
    "Response:"
  );
}
