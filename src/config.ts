// src/config.ts
// Reads process.env (populated by `import "dotenv/config"` in the entry points)
// into one explicit AppConfig that is handed to whatever needs it.
import { z } from "zod";
import { ConfigError } from "./lib/errors";

/* ============================== Zod Schemas ============================== */

const BoolFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const Optional = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  ASSEMBLYAI_API_KEY: Optional,

  LLM_PROVIDER: z.enum(["ollama", "lemur"]).default("ollama"),
  OLLAMA_URL: z.string().url().default("http://localhost:11434"),
  LLM_MODEL: z.string().min(1).default("phi3:mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LEMUR_MODEL: z.string().min(1).default("anthropic/claude-3-5-sonnet"),

  TIME_FORMAT: z.enum(["clock", "iso"]).default("clock"),
  TIMEZONE: z.string().min(1).default("UTC"),
  ENHANCE_INPUT: BoolFlag.default("true"),

  CALENDAR_SINK: z.enum(["none", "ics", "google"]).default("none"),
  ICS_OUTPUT_DIR: z.string().min(1).default("./calendar"),
  GOOGLE_CALENDAR_ID: z.string().min(1).default("primary"),
  GOOGLE_CALENDAR_ACCESS_TOKEN: Optional,
  UPCOMING_LIMIT: z.coerce.number().int().min(0).default(10),
});

export type SinkKind = "none" | "ics" | "google";

export type AppConfig = {
  port: number;
  logLevel: string;
  assemblyAiApiKey?: string;
  llm: {
    provider: "ollama" | "lemur";
    ollamaUrl: string;
    model: string;
    timeoutMs: number;
    lemurModel: string;
  };
  extraction: {
    timeFormat: "clock" | "iso";
    timezone: string;
    enhanceInput: boolean;
  };
  calendar: {
    sink: SinkKind;
    icsOutputDir: string;
    googleCalendarId: string;
    googleAccessToken?: string;
    upcomingLimit: number;
  };
};

/* ============================== Public API ============================== */

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank entries in .env mean "not set"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    assemblyAiApiKey: e.ASSEMBLYAI_API_KEY,
    llm: {
      provider: e.LLM_PROVIDER,
      ollamaUrl: e.OLLAMA_URL,
      model: e.LLM_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
      lemurModel: e.LEMUR_MODEL,
    },
    extraction: {
      timeFormat: e.TIME_FORMAT,
      timezone: e.TIMEZONE,
      enhanceInput: e.ENHANCE_INPUT,
    },
    calendar: {
      sink: e.CALENDAR_SINK,
      icsOutputDir: e.ICS_OUTPUT_DIR,
      googleCalendarId: e.GOOGLE_CALENDAR_ID,
      googleAccessToken: e.GOOGLE_CALENDAR_ACCESS_TOKEN,
      upcomingLimit: e.UPCOMING_LIMIT,
    },
  };
}
