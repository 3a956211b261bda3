/**
 * pino logger shared by every module.
 *
 * Writes to stderr so that stdout stays reserved for command output
 * (plain text or canonical JSON).
 */

import pino from "pino";

const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "info";

export const logger = pino(
  {
    level: LOG_LEVEL,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: "scan-curator" },
  },
  pino.destination(2),
);

export type Logger = typeof logger;

/** Child logger tagged with the calling module. */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
