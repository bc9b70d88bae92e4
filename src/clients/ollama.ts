// src/clients/ollama.ts
// Local LLM through Ollama's /api/generate (non-streaming).
import type { LanguageModel } from "../types/providers";
import { ProviderError } from "../lib/errors";

export type OllamaOptions = {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  /** Forwarded as Ollama's `options` (temperature, num_ctx, ...) */
  options?: Record<string, number>;
};

export class OllamaLanguageModel implements LanguageModel {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly options: Record<string, number>;

  constructor(opts: OllamaOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.model = opts.model;
    this.timeoutMs = clampPositive(opts.timeoutMs ?? 60_000, 1_000, 600_000);
    this.options = opts.options ?? { temperature: 0 };
  }

  async complete(prompt: string): Promise<{ text: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const resp = await fetch(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.model, prompt, stream: false, options: this.options }),
        signal: controller.signal,
      });

      if (!resp.ok) {
        const text = await resp.text().catch(() => "");
        throw new ProviderError("E_LLM", "ollama", `HTTP ${resp.status}: ${text}`, { status: resp.status });
      }

      // Ollama returns { response: string, ... }
      const data = (await resp.json()) as { response?: unknown };
      return { text: typeof data.response === "string" ? data.response : "" };
    } catch (e) {
      if (e instanceof ProviderError) throw e;
      const reason = e instanceof Error && e.name === "AbortError" ? `timeout after ${this.timeoutMs}ms` : String(e);
      throw new ProviderError("E_LLM", "ollama", reason, { cause: e });
    } finally {
      clearTimeout(timeout);
    }
  }
}

function clampPositive(n: number, min: number, max: number) {
  return Math.max(min, Math.min(n, max));
}
