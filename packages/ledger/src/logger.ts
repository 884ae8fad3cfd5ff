// packages/ledger/src/logger.ts
import pino from "pino";

export type Logger = pino.Logger;

const REDACTION_PATHS = ["password", "secret", "token", "*.password", "*.secret", "*.token"];

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  // keep test output clean unless a level is asked for
  return process.env.VITEST ? "silent" : "info";
}

/**
 * Structured JSON logger.
 * - ISO 8601 timestamps
 * - secret-looking keys are redacted
 */
export function createLogger(options: pino.LoggerOptions = {}): Logger {
  return pino({
    level: defaultLevel(),
    base: { service: "edc-ledger" },
    redact: { paths: REDACTION_PATHS, censor: "[REDACTED]" },
    serializers: { err: pino.stdSerializers.err },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  });
}

export const logger = createLogger();
