// packages/ledger/src/store-history.ts
import { normalizeTimestamp } from "./canonicalize.js";
import { LedgerError } from "./errors.js";
import type { LedgerStore } from "./ledger-store.js";
import { MAX_SEQ } from "./ledger-store.js";
import type { LedgerRecord, StreamRef } from "./record.js";
import { fieldValue } from "./record.js";
import { HistoryFiltersSchema } from "./schema.js";

export type HistoryFilters = {
  actor?: string;
  /** top-level field equality, e.g. `{ event: "APPROVE" }` */
  where?: Record<string, string | number | boolean | null>;
  since?: string | Date;
  until?: string | Date;
  from?: number;
  to?: number;
  limit?: number;
};

/**
 * Read-only projection of a stream for reporting and export.
 * Not part of the integrity contract: filtered output is not verifiable on its own.
 */
export function readHistory(
  store: LedgerStore,
  stream: StreamRef,
  filters: HistoryFilters = {}
): AsyncIterable<LedgerRecord> {
  const parsed = HistoryFiltersSchema.safeParse(filters);
  if (!parsed.success) {
    throw new LedgerError("INVALID_RANGE", parsed.error.issues.map((i) => i.message).join("; "));
  }

  const f = parsed.data;
  const since = f.since === undefined ? null : normalizeTimestamp(f.since);
  const until = f.until === undefined ? null : normalizeTimestamp(f.until);
  const where = Object.entries(f.where ?? {});

  const matches = (r: LedgerRecord): boolean => {
    if (f.actor !== undefined && r.actor !== f.actor) return false;
    if (since !== null && r.timestamp < since) return false;
    if (until !== null && r.timestamp > until) return false;
    return where.every(([name, value]) => fieldValue(r, name) === value);
  };

  async function* scan(): AsyncGenerator<LedgerRecord> {
    let emitted = 0;
    for await (const r of store.readRange(stream, f.from ?? 1, f.to ?? MAX_SEQ)) {
      if (!matches(r)) continue;
      yield r;
      if (f.limit !== undefined && ++emitted >= f.limit) return;
    }
  }

  return scan();
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}
