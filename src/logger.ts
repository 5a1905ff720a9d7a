/**
 * Structured logging.
 *
 * Level comes from LOG_LEVEL (default "info"); the tests run with "silent".
 */

import { pino, type Logger } from "pino";

export type { Logger };

function createLogger(): Logger {
  return pino({
    level: process.env.LOG_LEVEL ?? "info",
    base: { service: "crossref-deposit" },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Main logger instance */
export const logger = createLogger();

/** Create a child logger with additional context. */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
