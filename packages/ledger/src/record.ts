// packages/ledger/src/record.ts

/** JSON-safe value stored in a record's content. */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/** Values accepted on append; Dates are stored as their ISO string. */
export type FieldInput =
  | FieldValue
  | Date
  | undefined
  | readonly FieldInput[]
  | { readonly [key: string]: FieldInput };

export type ContentField = {
  name: string;
  value: FieldValue;
};

export type ContentFieldInput = {
  name: string;
  value: FieldInput;
};

/**
 * Identifies one independent chain.
 * `key` is null for singleton streams (global audit, global signatures).
 */
export type StreamRef = {
  kind: string;
  key: string | null;
};

export type LedgerRecord = {
  stream_kind: string;
  stream_key: string | null;

  sequence_number: number; // 1-based, contiguous per stream
  timestamp: string; // ISO-8601 UTC

  actor: string;
  fields: ContentField[];

  previous_hash: string; // GENESIS for the first record
  content_hash: string;
};

export type LedgerTail = {
  sequence_number: number;
  content_hash: string;
};

export type Receipt = {
  stream_kind: string;
  stream_key: string | null;
  sequence_number: number;
  content_hash: string;
  timestamp: string;
};

/** Map key for a stream. Kinds and keys are free text, so no separator can be reserved. */
export function streamIdOf(ref: StreamRef): string {
  return JSON.stringify([ref.kind, ref.key]);
}

export function streamRefOf(record: Pick<LedgerRecord, "stream_kind" | "stream_key">): StreamRef {
  return { kind: record.stream_kind, key: record.stream_key };
}

export function receiptOf(record: LedgerRecord): Receipt {
  return {
    stream_kind: record.stream_kind,
    stream_key: record.stream_key,
    sequence_number: record.sequence_number,
    content_hash: record.content_hash,
    timestamp: record.timestamp,
  };
}

/** Value of the first top-level field with this name, or undefined. */
export function fieldValue(record: Pick<LedgerRecord, "fields">, name: string): FieldValue | undefined {
  return record.fields.find((f) => f.name === name)?.value;
}
