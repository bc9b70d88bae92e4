import type { Response } from "express";
import type { ErrorCode } from "./errors";

export function sendOk<T>(res: Response, data: T, status = 200) {
  return res.status(status).json({ ok: true, data });
}

export function sendErr(
  res: Response,
  code: ErrorCode,
  message: string,
  details?: unknown,
  status = 400
) {
  return res.status(status).json({ ok: false, error: { code, message, details } });
}
