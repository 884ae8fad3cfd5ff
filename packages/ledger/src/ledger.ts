// packages/ledger/src/ledger.ts
import { ChainManager } from "./chain-manager.js";
import type { LedgerConfig } from "./config.js";
import type { ExportOptions, LedgerExportBundle } from "./ledger-export.js";
import { exportStream } from "./ledger-export.js";
import type { LedgerStore } from "./ledger-store.js";
import type { Logger } from "./logger.js";
import { createLogger, logger as rootLogger } from "./logger.js";
import type { ContentFieldInput, LedgerRecord, Receipt, StreamRef } from "./record.js";
import { receiptOf } from "./record.js";
import { SqliteLedgerStore } from "./sqlite-ledger-store.js";
import type { HistoryFilters } from "./store-history.js";
import { readHistory } from "./store-history.js";
import type { StreamKindDefinition } from "./streams.js";
import { StreamRegistry } from "./streams.js";
import type { IntegrityReport, VerifyOptions } from "./verify-integrity.js";
import { verifyStream } from "./verify-integrity.js";

export type HashChainLedgerOptions = {
  store: LedgerStore;
  kinds?: readonly StreamKindDefinition[];
  lockTimeoutMs?: number;
  now?: () => string | Date;
  logger?: Logger;
  cacheTails?: boolean;
};

/**
 * Entry point for domain collaborators (audit logging, signatures, request
 * workflows, legal holds). Streams are addressed by (kind, key); key is
 * null for singleton streams.
 */
export class HashChainLedger {
  readonly registry: StreamRegistry;
  private readonly store: LedgerStore;
  private readonly chain: ChainManager;
  private readonly now: () => string | Date;
  private readonly log: Logger;

  constructor(opts: HashChainLedgerOptions) {
    this.store = opts.store;
    this.registry = new StreamRegistry(opts.kinds);
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: "ledger" });
    this.chain = new ChainManager(this.store, this.registry, {
      lockTimeoutMs: opts.lockTimeoutMs,
      now: this.now,
      logger: opts.logger,
      cacheTails: opts.cacheTails,
    });
  }

  async append(
    stream_kind: string,
    stream_key: string | null,
    content_fields: readonly ContentFieldInput[],
    actor: string
  ): Promise<Receipt> {
    const record = await this.appendRecord(stream_kind, stream_key, content_fields, actor);
    return receiptOf(record);
  }

  /** Same as append, but returns the full stored record. */
  appendRecord(
    stream_kind: string,
    stream_key: string | null,
    content_fields: readonly ContentFieldInput[],
    actor: string
  ): Promise<LedgerRecord> {
    return this.chain.append({ kind: stream_kind, key: stream_key }, { actor, fields: content_fields });
  }

  verify(stream_kind: string, stream_key: string | null, range: VerifyOptions = {}): Promise<IntegrityReport> {
    return verifyStream(this.store, this.registry.ref(stream_kind, stream_key), range, this.log);
  }

  history(stream_kind: string, stream_key: string | null, filters: HistoryFilters = {}): AsyncIterable<LedgerRecord> {
    return readHistory(this.store, this.registry.ref(stream_kind, stream_key), filters);
  }

  export(stream_kind: string, stream_key: string | null, opts: ExportOptions = {}): Promise<LedgerExportBundle> {
    return exportStream(this.store, this.registry.ref(stream_kind, stream_key), { now: this.now, ...opts });
  }

  /** Every stream with at least one stored record. */
  streams(): Promise<StreamRef[]> {
    return this.store.listStreams();
  }

  async close(): Promise<void> {
    await this.store.close?.();
  }
}

/** SQLite-backed ledger wired from configuration. */
export function openLedger(
  config: LedgerConfig,
  opts: Omit<HashChainLedgerOptions, "store" | "lockTimeoutMs"> = {}
): HashChainLedger {
  return new HashChainLedger({
    ...opts,
    store: new SqliteLedgerStore(config.dbPath, { pageSize: config.readPageSize }),
    lockTimeoutMs: config.lockTimeoutMs,
    logger: opts.logger ?? createLogger({ level: config.logLevel }),
  });
}
