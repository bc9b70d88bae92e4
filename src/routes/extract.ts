// src/routes/extract.ts
import { Router } from "express";
import { postExtract } from "../controller/extractController";
import type { PipelineDeps } from "../services/pipeline";

/**
 * POST /api/extract
 * - Validates the body with Zod (inside the controller)
 * - Runs extraction + normalization on the given text
 * - Responds with { ok, data } or { ok:false, error }
 */
export function createExtractRouter(deps: PipelineDeps) {
  const router = Router();
  router.post("/", postExtract(deps));
  return router;
}
