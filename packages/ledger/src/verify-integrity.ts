// packages/ledger/src/verify-integrity.ts
import { LedgerError } from "./errors.js";
import { GENESIS, computeContentHash } from "./hash.js";
import type { LedgerStore } from "./ledger-store.js";
import { MAX_SEQ } from "./ledger-store.js";
import type { Logger } from "./logger.js";
import { logger as rootLogger } from "./logger.js";
import type { LedgerRecord, LedgerTail, StreamRef } from "./record.js";
import { streamIdOf } from "./record.js";
import { RangeSchema } from "./schema.js";

export type ChainBreakCode =
  | "GENESIS_MISMATCH"
  | "ANCHOR_MISMATCH"
  | "SEQUENCE_GAP"
  | "SEQUENCE_DUPLICATE"
  | "PREVIOUS_HASH_MISMATCH"
  | "CONTENT_HASH_MISMATCH";

export type ChainBreak = {
  sequence_number: number;
  code: ChainBreakCode;
  expected: string | number | null;
  actual: string | number | null;
};

/** How the first record of the range was checked. */
export type RangeAnchor = "GENESIS" | "CALLER" | "UNANCHORED";

export type IntegrityReport = {
  stream_kind: string;
  stream_key: string | null;

  valid: boolean;
  records_checked: number;
  first_break: number | null;
  breaks: ChainBreak[];

  from: number;
  to: number | null; // null = through the tail
  anchor: RangeAnchor;

  last_sequence_number: number | null;
  last_hash: string | null; // stored content_hash of the last record checked
};

export type VerifyOptions = {
  from?: number;
  to?: number;
  /** content_hash of record `from - 1`, for verifying a partial range. */
  anchor_hash?: string;
  stop_at_first_break?: boolean;
};

type Link = {
  seq: number;
  stored: string;
  recomputed: string;
};

function parseRange(opts: VerifyOptions) {
  const parsed = RangeSchema.safeParse(opts);
  if (!parsed.success) {
    throw new LedgerError("INVALID_RANGE", parsed.error.issues.map((i) => i.message).join("; "));
  }
  const from = parsed.data.from ?? 1;
  if (from === 1 && parsed.data.anchor_hash !== undefined && parsed.data.anchor_hash !== GENESIS) {
    throw new LedgerError("INVALID_RANGE", "anchor_hash given for a range that starts at the genesis record");
  }
  return { ...parsed.data, from };
}

/**
 * Replays records and reports every point where the chain does not hold.
 *
 * Each record is re-hashed from its stored content. Record n must point at
 * both the stored and the recomputed hash of record n-1, so an edit to the
 * content of record k shows up as a break at k+1. The last record of the
 * range is checked against its own recomputed hash.
 *
 * `tail` (read before the scan) lets a hole at the end of a bounded range be
 * told apart from the true end of the stream.
 */
export async function verifyRecords(
  stream: StreamRef,
  records: AsyncIterable<LedgerRecord> | Iterable<LedgerRecord>,
  opts: VerifyOptions & { tail?: LedgerTail | null } = {}
): Promise<IntegrityReport> {
  const range = parseRange(opts);
  const from = range.from;
  const to = range.to ?? MAX_SEQ;
  const stopEarly = range.stop_at_first_break === true;
  const anchorHash = from === 1 ? GENESIS : range.anchor_hash ?? null;

  const breaks: ChainBreak[] = [];
  let checked = 0;
  let expectedSeq = from;
  let prev: Link | null = null;
  let stopped = false;

  for await (const r of records) {
    const seq = r.sequence_number;
    if (seq < from || seq > to) continue;
    checked++;

    if (seq < expectedSeq) {
      breaks.push({ sequence_number: seq, code: "SEQUENCE_DUPLICATE", expected: expectedSeq, actual: seq });
      if (stopEarly) {
        stopped = true;
        break;
      }
      continue;
    }

    if (seq > expectedSeq) {
      breaks.push({ sequence_number: expectedSeq, code: "SEQUENCE_GAP", expected: expectedSeq, actual: seq });
      if (stopEarly) {
        stopped = true;
        break;
      }
    }

    if (prev) {
      if (r.previous_hash !== prev.stored) {
        breaks.push({ sequence_number: seq, code: "PREVIOUS_HASH_MISMATCH", expected: prev.stored, actual: r.previous_hash });
      } else if (r.previous_hash !== prev.recomputed) {
        // predecessor's content no longer produces the hash we link to
        breaks.push({ sequence_number: seq, code: "PREVIOUS_HASH_MISMATCH", expected: prev.recomputed, actual: r.previous_hash });
      }
    } else if (seq === 1) {
      if (r.previous_hash !== GENESIS) {
        breaks.push({ sequence_number: 1, code: "GENESIS_MISMATCH", expected: GENESIS, actual: r.previous_hash });
      }
    } else if (seq === from && anchorHash !== null && r.previous_hash !== anchorHash) {
      breaks.push({ sequence_number: seq, code: "ANCHOR_MISMATCH", expected: anchorHash, actual: r.previous_hash });
    }

    if (stopEarly && breaks.length) {
      stopped = true;
      break;
    }

    prev = {
      seq,
      stored: r.content_hash,
      recomputed: computeContentHash({
        timestamp: r.timestamp,
        actor: r.actor,
        fields: r.fields,
        previous_hash: r.previous_hash,
      }),
    };
    expectedSeq = seq + 1;
  }

  if (!stopped) {
    if (prev && prev.stored !== prev.recomputed) {
      breaks.push({ sequence_number: prev.seq, code: "CONTENT_HASH_MISMATCH", expected: prev.recomputed, actual: prev.stored });
    }

    const missing = prev ? prev.seq + 1 : from;
    const tail = opts.tail ?? null;
    if (tail && missing <= to && tail.sequence_number >= missing) {
      breaks.push({ sequence_number: missing, code: "SEQUENCE_GAP", expected: missing, actual: null });
    }
  }

  const first = breaks.reduce<number | null>(
    (min, b) => (min === null || b.sequence_number < min ? b.sequence_number : min),
    null
  );

  return {
    stream_kind: stream.kind,
    stream_key: stream.key,
    valid: breaks.length === 0,
    records_checked: checked,
    first_break: first,
    breaks,
    from,
    to: range.to ?? null,
    anchor: from === 1 ? "GENESIS" : range.anchor_hash !== undefined ? "CALLER" : "UNANCHORED",
    last_sequence_number: prev?.seq ?? null,
    last_hash: prev?.stored ?? null,
  };
}

/** Reads a stream (or sub-range) from the store and verifies it. Read-only. */
export async function verifyStream(
  store: LedgerStore,
  stream: StreamRef,
  opts: VerifyOptions = {},
  log: Logger = rootLogger
): Promise<IntegrityReport> {
  const range = parseRange(opts);
  const tail = await store.readTail(stream);
  const records = store.readRange(stream, range.from, range.to ?? MAX_SEQ);

  const report = await verifyRecords(stream, records, { ...opts, tail });

  if (!report.valid) {
    log.warn(
      { stream: streamIdOf(stream), first_break: report.first_break, breaks: report.breaks.length },
      "hash chain broken"
    );
  }
  return report;
}
