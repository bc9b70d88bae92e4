/**
 * AssemblyAI speech-to-text.
 *
 * URLs are submitted directly; local paths and in-memory uploads are pushed
 * to /v2/upload first. The job is then polled until it completes or errors.
 */
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { Logger } from "pino";
import type { AudioRef, TranscriptionProvider, TranscriptionResult } from "../types/providers";
import { ProviderError } from "../lib/errors";

const BASE_URL = "https://api.assemblyai.com/v2";

export type AssemblyAIOptions = {
  apiKey: string;
  logger: Logger;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  languageCode?: string;
};

interface ApiTranscriptResponse {
  id: string;
  status: "queued" | "processing" | "completed" | "error";
  text: string | null;
  error: string | null;
}

export class AssemblyAITranscriber implements TranscriptionProvider {
  private readonly apiKey: string;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts: number;
  private readonly languageCode: string;

  constructor(opts: AssemblyAIOptions) {
    if (!opts.apiKey) throw new ProviderError("E_TRANSCRIBE", "assemblyai", "API key is required");
    this.apiKey = opts.apiKey;
    this.logger = opts.logger;
    this.pollIntervalMs = opts.pollIntervalMs ?? 3_000;
    this.maxPollAttempts = opts.maxPollAttempts ?? 200; // 10 min at the default interval
    this.languageCode = opts.languageCode ?? "en";
  }

  async transcribe(audio: AudioRef): Promise<TranscriptionResult> {
    const audioUrl = await this.resolveAudioUrl(audio);
    const id = await this.submitJob(audioUrl);
    const done = await this.pollUntilDone(id);

    if (done.status === "error") {
      return { status: "error", text: "", error: done.error ?? "unknown error" };
    }
    return { status: "ok", text: done.text ?? "" };
  }

  private async resolveAudioUrl(audio: AudioRef): Promise<string> {
    if (typeof audio === "string" && /^https?:\/\//i.test(audio)) return audio;

    const { name, data } =
      typeof audio === "string" ? { name: basename(audio), data: await readFile(audio) } : audio;

    this.logger.info({ file: name, bytes: data.length }, "Uploading audio to AssemblyAI");
    const resp = await fetch(`${BASE_URL}/upload`, {
      method: "POST",
      headers: { authorization: this.apiKey, "content-type": "application/octet-stream" },
      body: new Uint8Array(data),
      signal: AbortSignal.timeout(120_000),
    });
    const body = await this.readJson<{ upload_url: string }>(resp, "upload");
    return body.upload_url;
  }

  private async submitJob(audioUrl: string): Promise<string> {
    this.logger.info({ audioUrl }, "Submitting transcription job");
    const resp = await fetch(`${BASE_URL}/transcript`, {
      method: "POST",
      headers: { authorization: this.apiKey, "content-type": "application/json" },
      body: JSON.stringify({ audio_url: audioUrl, language_code: this.languageCode }),
      signal: AbortSignal.timeout(30_000),
    });
    const body = await this.readJson<{ id: string }>(resp, "submit");
    return body.id;
  }

  private async pollUntilDone(id: string): Promise<ApiTranscriptResponse> {
    for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
      const resp = await fetch(`${BASE_URL}/transcript/${id}`, {
        headers: { authorization: this.apiKey },
        signal: AbortSignal.timeout(15_000),
      });
      const data = await this.readJson<ApiTranscriptResponse>(resp, "poll");

      if (data.status === "completed" || data.status === "error") {
        this.logger.info({ transcriptId: id, status: data.status, attempt }, "Transcription finished");
        return data;
      }

      if (attempt < this.maxPollAttempts) {
        await new Promise<void>((resolve) => setTimeout(resolve, this.pollIntervalMs));
      }
    }

    throw new ProviderError(
      "E_TRANSCRIBE",
      "assemblyai",
      `transcript ${id} did not complete after ${this.maxPollAttempts} polls`
    );
  }

  private async readJson<T>(resp: Response, step: string): Promise<T> {
    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      throw new ProviderError("E_TRANSCRIBE", "assemblyai", `${step} failed with HTTP ${resp.status}: ${text}`, {
        status: resp.status,
      });
    }
    return (await resp.json()) as T;
  }
}
