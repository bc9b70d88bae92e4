import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { Logger } from "pino";

import { createExtractRouter } from "./routes/extract";
import { createUploadRouter } from "./routes/upload";
import { createIcsRouter } from "./routes/ics";
import { sendErr } from "./lib/http";
import { errorMessage } from "./lib/errors";
import type { PipelineDeps } from "./services/pipeline";

export function createApp(deps: PipelineDeps, logger: Logger) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "5mb" }));

  app.get("/api/healthz", (_req, res) => res.json({ ok: true }));

  app.use("/api/extract", createExtractRouter(deps));   // text -> task record
  app.use("/api/upload", createUploadRouter(deps));     // audio -> task records
  app.use("/api/ics", createIcsRouter());               // task records -> .ics

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err: errorMessage(err) }, "Unhandled request error");
    sendErr(res, "E_INTERNAL", errorMessage(err), undefined, 500);
  });

  return app;
}
