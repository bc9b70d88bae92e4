// src/services/factory.ts
// Builds the collaborators named in AppConfig. The only place that reads config.
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { CalendarSink, LanguageModel, Prompter, TranscriptionProvider } from "../types/providers";
import { ConfigError } from "../lib/errors";
import { AssemblyAITranscriber } from "../clients/assemblyai";
import { OllamaLanguageModel } from "../clients/ollama";
import { LemurLanguageModel } from "../clients/lemur";
import { GoogleCalendarSink } from "../clients/googleCalendar";
import { IcsCalendarSink } from "../clients/icsCalendar";
import { TaskExtractor } from "./extractService";
import { InteractiveCompleter } from "./interactiveCompletion";
import type { PipelineDeps } from "./pipeline";

export function createLanguageModel(config: AppConfig): LanguageModel {
  const { llm } = config;
  if (llm.provider === "lemur") {
    if (!config.assemblyAiApiKey) {
      throw new ConfigError("ASSEMBLYAI_API_KEY is required when LLM_PROVIDER=lemur");
    }
    return new LemurLanguageModel({ apiKey: config.assemblyAiApiKey, model: llm.lemurModel, timeoutMs: llm.timeoutMs });
  }
  return new OllamaLanguageModel({ baseUrl: llm.ollamaUrl, model: llm.model, timeoutMs: llm.timeoutMs });
}

export function createTranscriber(config: AppConfig, logger: Logger): TranscriptionProvider {
  if (!config.assemblyAiApiKey) {
    throw new ConfigError("API key is not set. Please set ASSEMBLYAI_API_KEY in your .env file.");
  }
  return new AssemblyAITranscriber({ apiKey: config.assemblyAiApiKey, logger: logger.child({ module: "assemblyai" }) });
}

export function createCalendarSink(config: AppConfig): CalendarSink | undefined {
  const { calendar } = config;
  switch (calendar.sink) {
    case "none":
      return undefined;
    case "ics":
      return new IcsCalendarSink({ outputDir: calendar.icsOutputDir });
    case "google":
      if (!calendar.googleAccessToken) {
        throw new ConfigError("GOOGLE_CALENDAR_ACCESS_TOKEN is required when CALENDAR_SINK=google");
      }
      return new GoogleCalendarSink({ accessToken: calendar.googleAccessToken, calendarId: calendar.googleCalendarId });
  }
}

export type ServiceOptions = {
  /** Needed for audio; text-only callers can go without */
  withTranscriber?: boolean;
  /** Enables interactive completion through this channel */
  prompter?: Prompter;
  out?: (line: string) => void;
  /** Test seam: replaces the configured model */
  llm?: LanguageModel;
};

export function createPipelineDeps(config: AppConfig, logger: Logger, opts: ServiceOptions = {}): PipelineDeps {
  const llm = opts.llm ?? createLanguageModel(config);
  const { timeFormat, timezone, enhanceInput } = config.extraction;

  return {
    transcriber: opts.withTranscriber ? createTranscriber(config, logger) : undefined,
    extractor: new TaskExtractor({ llm, logger: logger.child({ module: "extract" }), timeFormat, timezone }),
    completer: opts.prompter
      ? new InteractiveCompleter({
          prompter: opts.prompter,
          logger: logger.child({ module: "complete" }),
          enhancer: enhanceInput ? llm : undefined,
        })
      : undefined,
    sink: createCalendarSink(config),
    timeFormat,
    upcomingLimit: config.calendar.upcomingLimit,
    logger,
    out: opts.out,
  };
}
