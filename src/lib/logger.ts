// Structured logging (pino). One root logger per process, modules take a child.

import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export function createLogger(name: string, level = "info"): Logger {
  return pino({
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  });
}

/** Discards everything; handy default for tests and library callers. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
