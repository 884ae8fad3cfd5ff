// packages/ledger/src/chain-manager.ts
import { normalizeActor, normalizeFields, normalizeTimestamp } from "./canonicalize.js";
import { isLedgerError, toStorageError } from "./errors.js";
import { GENESIS, computeContentHash } from "./hash.js";
import type { LedgerStore } from "./ledger-store.js";
import type { Logger } from "./logger.js";
import { logger as rootLogger } from "./logger.js";
import type { ContentField, ContentFieldInput, LedgerRecord, StreamRef } from "./record.js";
import type { StreamRegistry, StreamState } from "./streams.js";

export type AppendInput = {
  actor: string;
  fields: readonly ContentFieldInput[];
};

export type ChainManagerOptions = {
  lockTimeoutMs?: number;
  now?: () => string | Date;
  logger?: Logger;
  /**
   * Keep each stream's tail in memory between appends. Turn off when other
   * processes append to the same database.
   */
  cacheTails?: boolean;
};

/**
 * Owns the append protocol: lock the stream, read its tail, link, insert.
 * Nothing outside this class reads-and-advances a tail.
 */
export class ChainManager {
  private readonly lockTimeoutMs: number;
  private readonly now: () => string | Date;
  private readonly cacheTails: boolean;
  private readonly log: Logger;

  constructor(
    private readonly store: LedgerStore,
    private readonly registry: StreamRegistry,
    opts: ChainManagerOptions = {}
  ) {
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 5000;
    this.now = opts.now ?? (() => new Date());
    this.cacheTails = opts.cacheTails ?? true;
    this.log = (opts.logger ?? rootLogger).child({ component: "chain-manager" });
  }

  async append(stream: StreamRef, input: AppendInput): Promise<LedgerRecord> {
    const state = this.registry.resolve(stream.kind, stream.key);

    // Bad content is rejected before we queue on the lock.
    const actor = normalizeActor(input.actor);
    const fields = normalizeFields(input.fields);

    let release: () => void;
    try {
      release = await state.lock.acquire(this.lockTimeoutMs);
    } catch (e) {
      this.log.warn({ stream: state.id, waiting: state.lock.waiting }, "stream lock timeout");
      throw e;
    }

    try {
      const record = await this.inTransaction(() => this.link(state, actor, fields));
      state.tail = this.cacheTails
        ? { sequence_number: record.sequence_number, content_hash: record.content_hash }
        : undefined;

      this.log.debug(
        { stream: state.id, seq: record.sequence_number, hash: record.content_hash },
        "record appended"
      );
      return record;
    } catch (e) {
      // Never retry against a tail we may have misread.
      state.tail = undefined;

      const err = toStorageError(e, state.id);
      if (isLedgerError(err, "SEQUENCE_CONFLICT")) {
        this.log.error({ stream: state.id, err }, "sequence conflict on append");
      } else if (isLedgerError(err, "STORAGE_UNAVAILABLE")) {
        this.log.error({ stream: state.id, err }, "storage failure on append");
      }
      throw err;
    } finally {
      release();
    }
  }

  private inTransaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.store.runInTransaction ? this.store.runInTransaction(fn) : fn();
  }

  private async link(state: StreamState, actor: string, fields: ContentField[]): Promise<LedgerRecord> {
    const tail = state.tail !== undefined ? state.tail : await this.store.readTail(state.ref);

    const previous_hash = tail ? tail.content_hash : GENESIS;
    const sequence_number = tail ? tail.sequence_number + 1 : 1;
    const timestamp = normalizeTimestamp(this.now());

    const record: LedgerRecord = {
      stream_kind: state.ref.kind,
      stream_key: state.ref.key,
      sequence_number,
      timestamp,
      actor,
      fields,
      previous_hash,
      content_hash: computeContentHash({ timestamp, actor, fields, previous_hash }),
    };

    await this.store.insert(record);
    return record;
  }
}
