// packages/ledger/src/ledger-export.ts
import { normalizeTimestamp } from "./canonicalize.js";
import type { LedgerStore } from "./ledger-store.js";
import { MAX_SEQ } from "./ledger-store.js";
import type { LedgerRecord, StreamRef } from "./record.js";
import { collect } from "./store-history.js";
import type { IntegrityReport, VerifyOptions } from "./verify-integrity.js";
import { verifyRecords } from "./verify-integrity.js";

export type LedgerExportBundle = {
  kind: "LEDGER_EXPORT_V1";
  exported_at: string;
  stream: StreamRef;
  anchor_hash: string | null;
  integrity: IntegrityReport;
  records: LedgerRecord[];
};

export type ExportOptions = Omit<VerifyOptions, "stop_at_first_break"> & {
  now?: () => string | Date;
};

/**
 * Snapshot of a range together with the verification of exactly those records.
 * Broken chains are still exported; the bundle carries the report.
 */
export async function exportStream(
  store: LedgerStore,
  stream: StreamRef,
  opts: ExportOptions = {}
): Promise<LedgerExportBundle> {
  const from = opts.from ?? 1;
  const tail = await store.readTail(stream);
  const records = await collect(store.readRange(stream, from, opts.to ?? MAX_SEQ));

  const integrity = await verifyRecords(stream, records, {
    from,
    to: opts.to,
    anchor_hash: opts.anchor_hash,
    tail,
  });

  return {
    kind: "LEDGER_EXPORT_V1",
    exported_at: normalizeTimestamp((opts.now ?? (() => new Date()))()),
    stream,
    anchor_hash: opts.anchor_hash ?? null,
    integrity,
    records,
  };
}

/**
 * Re-verifies a bundle offline, without access to the store.
 * A hole at the end of a bounded range cannot be seen from the bundle alone.
 */
export async function verifyExportBundle(bundle: LedgerExportBundle): Promise<IntegrityReport> {
  return verifyRecords(bundle.stream, bundle.records, {
    from: bundle.integrity.from,
    to: bundle.integrity.to ?? undefined,
    anchor_hash: bundle.anchor_hash ?? undefined,
  });
}
