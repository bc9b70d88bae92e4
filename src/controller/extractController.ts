// controllers/extractController.ts
import type { Request, Response } from "express";
import { ExtractBody } from "../schemas/extract.schema";
import { sendOk, sendErr } from "../lib/http";
import { errorMessage } from "../lib/errors";
import { processTranscript, type PipelineDeps } from "../services/pipeline";

// POST /api/extract: text in, normalized task record (+ event outcome when a sink is set) out
export function postExtract(deps: PipelineDeps) {
  return async (req: Request, res: Response) => {
    const parsed = ExtractBody.safeParse(req.body);
    if (!parsed.success) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", parsed.error.flatten(), 422);
    }

    try {
      // No one to ask over HTTP: missing fields stay "N/A"
      const result = await processTranscript(parsed.data.text, { ...deps, completer: undefined, out: undefined });
      if (!result.ok) {
        return sendErr(res, "E_EXTRACT", result.reason, { stage: result.stage }, 502);
      }

      const { record, summary, calendar } = result;
      return sendOk(res, { record, summary, calendar });
    } catch (e) {
      return sendErr(res, "E_EXTRACT", errorMessage(e), undefined, 500);
    }
  };
}
