import { describe, it, expect, afterEach } from "vitest";
import type { Server } from "node:http";
import { once } from "node:events";
import { createApp } from "../../src/app";
import { MAX_FILES } from "../../src/routes/upload";
import { TaskExtractor } from "../../src/services/extractService";
import type { PipelineDeps } from "../../src/services/pipeline";
import { silentLogger } from "../../src/lib/logger";
import type { TaskRecord } from "../../src/types/task";
import { FakeLanguageModel, FakeTranscriber, modelJson } from "../helpers/fakes";

let server: Server | undefined;

async function start(replies: Array<string | Error>, transcriber?: FakeTranscriber): Promise<string> {
  const logger = silentLogger();
  const deps: PipelineDeps = {
    transcriber,
    extractor: new TaskExtractor({ llm: new FakeLanguageModel(replies), logger }),
    timeFormat: "clock",
    upcomingLimit: 0,
    logger,
  };
  server = createApp(deps, logger).listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  return `http://127.0.0.1:${address.port}`;
}

type ApiError = { code: string; message: string; details?: unknown };
type ApiBody<T> = { ok: true; data: T } | { ok: false; error: ApiError };

async function dataOf<T>(resp: Response): Promise<T> {
  const body = (await resp.json()) as ApiBody<T>;
  if (!body.ok) throw new Error(`expected ok response, got ${body.error.code}`);
  return body.data;
}

async function errorOf(resp: Response): Promise<ApiError> {
  const body = (await resp.json()) as ApiBody<unknown>;
  if (body.ok) throw new Error("expected an error response");
  return body.error;
}

function postJson(url: string, body: unknown) {
  return fetch(url, { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) });
}

afterEach(async () => {
  if (!server) return;
  server.closeAllConnections();
  server.close();
  await once(server, "close");
  server = undefined;
});

describe("HTTP API", () => {
  it("answers the health check", async () => {
    const base = await start([]);
    const resp = await fetch(`${base}/api/healthz`);
    expect(await resp.json()).toEqual({ ok: true });
  });

  it("extracts a task record from text", async () => {
    const base = await start([modelJson({ task: "call", with_whom: "Priya", time: "3:00pm", participants: "Priya, Sam" })]);

    const resp = await postJson(`${base}/api/extract`, { text: "Call Priya and Sam at 3pm" });
    expect(resp.status).toBe(200);

    const data = await dataOf<{ record: TaskRecord; summary: string[] }>(resp);
    expect(data.record).toEqual({
      task: "call",
      with_whom: "Priya",
      time: "3:00 PM",
      location: "N/A",
      agenda: "N/A",
      duration: "N/A",
      participants: ["Priya", "Sam"],
    });
    expect(data.summary).toContain("Participants: Priya, Sam");
  });

  it("rejects an empty text", async () => {
    const base = await start([]);
    const resp = await postJson(`${base}/api/extract`, { text: "  " });

    expect(resp.status).toBe(422);
    expect((await errorOf(resp)).code).toBe("E_BAD_INPUT");
  });

  it("reports model failures as 502", async () => {
    const base = await start([new Error("model offline")]);
    const resp = await postJson(`${base}/api/extract`, { text: "Call Priya" });

    expect(resp.status).toBe(502);
    expect(await errorOf(resp)).toEqual({
      code: "E_EXTRACT",
      message: "Failed to extract task details.",
      details: { stage: "extraction" },
    });
  });

  it("exports records with ISO times as .ics", async () => {
    const base = await start([]);
    const resp = await postJson(`${base}/api/ics`, {
      records: [{ task: "call", with_whom: "Priya", time: "2025-03-10T15:00:00Z" }],
    });

    expect(resp.status).toBe(200);
    expect(resp.headers.get("content-type")).toBe("text/calendar; charset=utf-8");
    const ics = await resp.text();
    expect(ics).toContain("BEGIN:VCALENDAR");
    expect(ics).toContain("SUMMARY:call");
  });

  it("refuses .ics export without a usable time", async () => {
    const base = await start([]);
    const resp = await postJson(`${base}/api/ics`, { records: [{ task: "call", time: "3:00 PM" }] });

    expect(resp.status).toBe(422);
    expect((await errorOf(resp)).code).toBe("E_TIMESTAMP");
  });

  it("requires files on upload", async () => {
    const base = await start([], new FakeTranscriber({}));
    const resp = await postJson(`${base}/api/upload`, {});

    expect(resp.status).toBe(400);
    expect((await errorOf(resp)).message).toBe("No audio files uploaded");
  });

  it("rejects oversized audio as 413", async () => {
    const base = await start([], new FakeTranscriber({}));

    const form = new FormData();
    form.append("files", new Blob([new Uint8Array(26 * 1024 * 1024)], { type: "audio/wav" }), "long.wav");
    const resp = await fetch(`${base}/api/upload`, { method: "POST", body: form });

    expect(resp.status).toBe(413);
    expect(await errorOf(resp)).toEqual({
      code: "E_BAD_INPUT",
      message: "File too large",
      details: { reason: "LIMIT_FILE_SIZE", field: "files" },
    });
  });

  it("rejects more files than the upload limit", async () => {
    const base = await start([], new FakeTranscriber({}));

    const form = new FormData();
    for (let i = 0; i <= MAX_FILES; i++) {
      form.append("files", new Blob(["fake audio"], { type: "audio/wav" }), `memo-${i}.wav`);
    }
    const resp = await fetch(`${base}/api/upload`, { method: "POST", body: form });

    expect(resp.status).toBe(400);
    expect((await errorOf(resp)).code).toBe("E_BAD_INPUT");
  });

  it("transcribes uploaded audio", async () => {
    const transcriber = new FakeTranscriber({ "memo.wav": { status: "ok", text: "Call Priya at 3pm" } });
    const base = await start([modelJson({ task: "call", time: "3:00 pm" })], transcriber);

    const form = new FormData();
    form.append("files", new Blob(["fake audio"], { type: "audio/wav" }), "memo.wav");
    const resp = await fetch(`${base}/api/upload`, { method: "POST", body: form });
    expect(resp.status).toBe(200);

    const data = await dataOf<{ count: number; results: unknown[] }>(resp);
    expect(data.count).toBe(1);
    expect(data.results[0]).toMatchObject({ ok: true, source: "memo.wav", record: { task: "call", time: "3:00 PM" } });
  });
});
