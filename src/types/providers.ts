import type { CalendarEventPayload, CreatedEvent, UpcomingEvent } from "./events";

/** A URL, a local file path, or bytes already in memory (e.g. an upload). */
export type AudioRef = string | { name: string; data: Buffer };

export type TranscriptionResult =
  | { status: "ok"; text: string }
  | { status: "error"; text: string; error: string };

export interface TranscriptionProvider {
  transcribe(audio: AudioRef): Promise<TranscriptionResult>;
}

export interface LanguageModel {
  /** Throws on transport or provider failure. */
  complete(prompt: string): Promise<{ text: string }>;
}

export interface CalendarSink {
  createEvent(payload: CalendarEventPayload): Promise<CreatedEvent>;
  listUpcoming(max: number): Promise<UpcomingEvent[]>;
}

/** Line-based question/answer channel. */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export function describeAudio(audio: AudioRef): string {
  return typeof audio === "string" ? audio : audio.name;
}
