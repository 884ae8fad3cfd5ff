// packages/ledger/src/ledger-store.ts
import type { LedgerRecord, LedgerTail, StreamRef } from "./record.js";

/** Upper bound used for open-ended ranges. */
export const MAX_SEQ = Number.MAX_SAFE_INTEGER;

/**
 * Durable, ordered storage of records per stream.
 * Only the ChainManager writes through it; it hashes and validates nothing
 * beyond refusing to overwrite or skip a sequence number.
 */
export interface LedgerStore {
  /**
   * Serialization point for read-tail + insert.
   * Must be safe for async callbacks and must not let two callbacks overlap.
   */
  runInTransaction?<T>(fn: () => Promise<T>): Promise<T>;

  readTail(stream: StreamRef): Promise<LedgerTail | null>;

  /**
   * Fails with SEQUENCE_CONFLICT unless record.sequence_number is exactly
   * tail + 1 for its stream. Never overwrites.
   */
  insert(record: LedgerRecord): Promise<void>;

  /** Records with from <= sequence_number <= to, ascending. Each call is a fresh scan. */
  readRange(stream: StreamRef, from: number, to: number): AsyncIterable<LedgerRecord>;

  listStreams(): Promise<StreamRef[]>;

  close?(): Promise<void>;
}
