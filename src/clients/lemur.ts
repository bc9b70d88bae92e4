// src/clients/lemur.ts
// AssemblyAI LeMUR task endpoint as a plain text-in/text-out model.
import type { LanguageModel } from "../types/providers";
import { ProviderError } from "../lib/errors";

const LEMUR_URL = "https://api.assemblyai.com/lemur/v3/generate/task";

export class LemurLanguageModel implements LanguageModel {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(opts: { apiKey: string; model: string; timeoutMs?: number }) {
    if (!opts.apiKey) throw new ProviderError("E_LLM", "lemur", "AssemblyAI API key is required");
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs ?? 60_000;
  }

  async complete(prompt: string): Promise<{ text: string }> {
    let resp: Response;
    try {
      resp = await fetch(LEMUR_URL, {
        method: "POST",
        headers: { authorization: this.apiKey, "content-type": "application/json" },
        // The prompt already embeds the transcript, so input_text only carries a marker
        body: JSON.stringify({ prompt, final_model: this.model, input_text: "(see prompt)" }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      throw new ProviderError("E_LLM", "lemur", String(e), { cause: e });
    }

    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      throw new ProviderError("E_LLM", "lemur", `HTTP ${resp.status}: ${text}`, { status: resp.status });
    }

    const data = (await resp.json()) as { response?: unknown };
    return { text: typeof data.response === "string" ? data.response : "" };
  }
}
