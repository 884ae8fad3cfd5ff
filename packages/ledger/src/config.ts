// packages/ledger/src/config.ts
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const LedgerEnvSchema = z.object({
  LEDGER_DB_PATH: z.string().min(1).default("ledger.sqlite"),
  LEDGER_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LEDGER_READ_PAGE_SIZE: z.coerce.number().int().positive().default(500),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LedgerConfig = {
  dbPath: string;
  lockTimeoutMs: number;
  readPageSize: number;
  logLevel: LogLevel;
};

export function loadLedgerConfig(env: Record<string, string | undefined> = process.env): LedgerConfig {
  const parsed = LedgerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`);
    throw new Error(`Invalid ledger configuration:\n  ${issues.join("\n  ")}`);
  }

  const e = parsed.data;
  return {
    dbPath: e.LEDGER_DB_PATH,
    lockTimeoutMs: e.LEDGER_LOCK_TIMEOUT_MS,
    readPageSize: e.LEDGER_READ_PAGE_SIZE,
    logLevel: e.LOG_LEVEL,
  };
}
