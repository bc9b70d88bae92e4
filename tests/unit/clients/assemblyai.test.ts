import { describe, it, expect, vi, beforeEach } from "vitest";
import { AssemblyAITranscriber } from "../../../src/clients/assemblyai";
import { ProviderError } from "../../../src/lib/errors";
import { silentLogger } from "../../../src/lib/logger";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function makeFetchResponse(body: unknown, ok = true, status = 200) {
  return {
    ok,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

function transcript(overrides: Record<string, unknown> = {}) {
  return { id: "tr-1", status: "completed", text: "Call Priya at 3pm", error: null, ...overrides };
}

describe("AssemblyAITranscriber", () => {
  let client: AssemblyAITranscriber;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new AssemblyAITranscriber({ apiKey: "test-api-key", logger: silentLogger(), pollIntervalMs: 0 });
  });

  it("requires an API key", () => {
    expect(() => new AssemblyAITranscriber({ apiKey: "", logger: silentLogger() })).toThrow(ProviderError);
  });

  it("submits URLs directly and polls until completed", async () => {
    mockFetch
      .mockResolvedValueOnce(makeFetchResponse({ id: "tr-1" }))
      .mockResolvedValueOnce(makeFetchResponse(transcript({ status: "queued", text: null })))
      .mockResolvedValueOnce(makeFetchResponse(transcript({ status: "processing", text: null })))
      .mockResolvedValueOnce(makeFetchResponse(transcript()));

    await expect(client.transcribe("https://example.com/memo.wav")).resolves.toEqual({
      status: "ok",
      text: "Call Priya at 3pm",
    });

    expect(mockFetch).toHaveBeenCalledTimes(4);
    const [submitUrl, submitInit] = mockFetch.mock.calls[0];
    expect(submitUrl).toBe("https://api.assemblyai.com/v2/transcript");
    expect(submitInit.headers.authorization).toBe("test-api-key");
    expect(JSON.parse(submitInit.body)).toEqual({ audio_url: "https://example.com/memo.wav", language_code: "en" });
    expect(mockFetch.mock.calls[1][0]).toBe("https://api.assemblyai.com/v2/transcript/tr-1");
  });

  it("uploads in-memory audio first", async () => {
    mockFetch
      .mockResolvedValueOnce(makeFetchResponse({ upload_url: "https://cdn.assemblyai.test/up/1" }))
      .mockResolvedValueOnce(makeFetchResponse({ id: "tr-1" }))
      .mockResolvedValueOnce(makeFetchResponse(transcript()));

    await client.transcribe({ name: "memo.wav", data: Buffer.from("RIFF") });

    expect(mockFetch.mock.calls[0][0]).toBe("https://api.assemblyai.com/v2/upload");
    expect(JSON.parse(mockFetch.mock.calls[1][1].body).audio_url).toBe("https://cdn.assemblyai.test/up/1");
  });

  it("reports a failed transcript as an error status", async () => {
    mockFetch
      .mockResolvedValueOnce(makeFetchResponse({ id: "tr-1" }))
      .mockResolvedValueOnce(makeFetchResponse(transcript({ status: "error", text: null, error: "unsupported audio" })));

    await expect(client.transcribe("https://example.com/memo.wav")).resolves.toEqual({
      status: "error",
      text: "",
      error: "unsupported audio",
    });
  });

  it("throws on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce(makeFetchResponse({ error: "unauthorized" }, false, 401));

    await expect(client.transcribe("https://example.com/memo.wav")).rejects.toThrow(
      'assemblyai: submit failed with HTTP 401: {"error":"unauthorized"}'
    );
  });

  it("gives up after the poll budget", async () => {
    const impatient = new AssemblyAITranscriber({
      apiKey: "test-api-key",
      logger: silentLogger(),
      pollIntervalMs: 0,
      maxPollAttempts: 2,
    });
    mockFetch
      .mockResolvedValueOnce(makeFetchResponse({ id: "tr-9" }))
      .mockResolvedValue(makeFetchResponse(transcript({ id: "tr-9", status: "processing", text: null })));

    await expect(impatient.transcribe("https://example.com/memo.wav")).rejects.toThrow(
      "transcript tr-9 did not complete after 2 polls"
    );
  });
});
