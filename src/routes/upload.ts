import { Router, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { sendOk, sendErr } from "../lib/http";
import { errorMessage } from "../lib/errors";
import { runBatch, type PipelineDeps } from "../services/pipeline";

export const MAX_FILES = 10;

/**
 * Multer config:
 * - memoryStorage so the audio bytes can go straight to the transcriber
 * - up to 10 files, 25 MB each
 */
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 25 * 1024 * 1024, files: MAX_FILES },
  fileFilter: (_req, file, cb) => {
    cb(null, file.mimetype.startsWith("audio/") || /\.(wav|mp3|m4a|ogg|flac|webm)$/i.test(file.originalname));
  },
});

/**
 * POST /api/upload
 * multipart/form-data with key "files"
 * Transcribes each recording in upload order and returns one pipeline
 * result per file. Nothing is asked interactively.
 */
export function createUploadRouter(deps: PipelineDeps) {
  const router = Router();

  router.post("/", upload.array("files", MAX_FILES), async (req, res) => {
    const files = Array.isArray(req.files) ? req.files : [];
    if (!files.length) return sendErr(res, "E_BAD_INPUT", "No audio files uploaded");
    if (!deps.transcriber) return sendErr(res, "E_CONFIG", "Transcription is not configured", undefined, 503);

    try {
      const results = await runBatch(
        files.map((f) => ({ name: f.originalname, data: f.buffer })),
        { ...deps, completer: undefined, out: undefined }
      );
      return sendOk(res, { count: results.length, results });
    } catch (e) {
      return sendErr(res, "E_TRANSCRIBE", "Upload processing failed", errorMessage(e), 500);
    }
  });

  // Limit breaches are the caller's fault, not ours
  router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (!(err instanceof multer.MulterError)) return next(err);
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    return sendErr(res, "E_BAD_INPUT", err.message, { reason: err.code, field: err.field }, status);
  });

  return router;
}
