export type ErrorCode =
  | "E_BAD_INPUT"
  | "E_CONFIG"
  | "E_TRANSCRIBE"
  | "E_LLM"
  | "E_EXTRACT"
  | "E_CALENDAR"
  | "E_TIMESTAMP"
  | "E_INTERNAL";

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super("E_CONFIG", message);
  }
}

/** A collaborator (transcription, model, calendar) failed or answered with an error. */
export class ProviderError extends AppError {
  readonly provider: string;
  readonly status?: number;

  constructor(
    code: "E_TRANSCRIBE" | "E_LLM" | "E_CALENDAR",
    provider: string,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(code, `${provider}: ${message}`, { cause: options?.cause });
    this.provider = provider;
    this.status = options?.status;
  }
}

export class InvalidTimestampError extends AppError {
  readonly value: string;

  constructor(value: string, reason: string) {
    super("E_TIMESTAMP", `Invalid ISO-8601 timestamp "${value}": ${reason}`);
    this.value = value;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
