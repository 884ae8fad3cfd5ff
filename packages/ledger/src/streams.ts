// packages/ledger/src/streams.ts
import { LedgerError } from "./errors.js";
import type { LedgerTail, StreamRef } from "./record.js";
import { streamIdOf } from "./record.js";
import { StreamLock } from "./stream-lock.js";

export type StreamKindDefinition = {
  kind: string;
  keyed: boolean; // false => singleton stream, key must be null
  description?: string;
};

export const STREAM_KINDS = {
  SYSTEM_AUDIT: "SYSTEM_AUDIT",
  SIGNATURES: "SIGNATURES",
  LEGAL_HOLDS: "LEGAL_HOLDS",
  REQUEST_HISTORY: "REQUEST_HISTORY",
  HOLD_HISTORY: "HOLD_HISTORY",
  SIGNATURE_HISTORY: "SIGNATURE_HISTORY",
} as const;

export const DEFAULT_STREAM_KINDS: readonly StreamKindDefinition[] = [
  { kind: STREAM_KINDS.SYSTEM_AUDIT, keyed: false, description: "system and security audit log" },
  { kind: STREAM_KINDS.SIGNATURES, keyed: false, description: "electronic signatures, all records" },
  { kind: STREAM_KINDS.LEGAL_HOLDS, keyed: false, description: "legal hold placements and releases" },
  { kind: STREAM_KINDS.REQUEST_HISTORY, keyed: true, description: "history of one DSAR/erasure/rectification/restriction request" },
  { kind: STREAM_KINDS.HOLD_HISTORY, keyed: true, description: "history of one legal hold" },
  { kind: STREAM_KINDS.SIGNATURE_HISTORY, keyed: true, description: "lifecycle of one signature" },
];

/**
 * Chain state owned by the ChainManager. `tail` is undefined until the
 * stream's tail has been read from the store (or after a failed append).
 */
export type StreamState = {
  readonly ref: StreamRef;
  readonly id: string;
  readonly lock: StreamLock;
  tail: LedgerTail | null | undefined;
};

export class StreamRegistry {
  private readonly kinds = new Map<string, StreamKindDefinition>();
  private readonly states = new Map<string, StreamState>();

  constructor(kinds: readonly StreamKindDefinition[] = DEFAULT_STREAM_KINDS) {
    for (const k of kinds) {
      if (this.kinds.has(k.kind)) throw new Error(`Duplicate stream kind: ${k.kind}`);
      this.kinds.set(k.kind, k);
    }
  }

  definitions(): StreamKindDefinition[] {
    return [...this.kinds.values()];
  }

  /** Checks the kind/key combination and returns a normalized ref. */
  ref(kind: string, key: string | null | undefined): StreamRef {
    const def = this.kinds.get(kind);
    if (!def) throw new LedgerError("INVALID_STREAM", `unknown stream kind ${kind}`);

    const k = key ?? null;
    if (!def.keyed && k !== null) {
      throw new LedgerError("INVALID_STREAM", `${kind} is a singleton stream and takes no key`);
    }
    if (def.keyed && (k === null || k.length === 0)) {
      throw new LedgerError("INVALID_STREAM", `${kind} requires a stream key`);
    }
    return { kind, key: k };
  }

  /**
   * Get-or-create is synchronous, so concurrent first appends to an unseen
   * stream always end up sharing one state (and one lock).
   */
  resolve(kind: string, key: string | null | undefined): StreamState {
    const ref = this.ref(kind, key);
    const id = streamIdOf(ref);

    let state = this.states.get(id);
    if (!state) {
      state = { ref, id, lock: new StreamLock(id), tail: undefined };
      this.states.set(id, state);
    }
    return state;
  }

  /** Streams touched through this registry in this process. */
  known(): StreamRef[] {
    return [...this.states.values()].map((s) => s.ref);
  }
}
