// packages/ledger/src/sqlite-ledger-store.ts
import Database from "better-sqlite3";

import { LedgerError, toStorageError } from "./errors.js";
import type { LedgerStore } from "./ledger-store.js";
import type { ContentField, LedgerRecord, LedgerTail, StreamRef } from "./record.js";
import { streamIdOf, streamRefOf } from "./record.js";
import { ContentFieldsSchema } from "./schema.js";

type RecordRow = {
  stream_kind: string;
  stream_key: string;
  sequence_number: number;
  timestamp: string;
  actor: string;
  fields_json: string;
  previous_hash: string;
  content_hash: string;
};

type InsertParams = [
  string, string, number, string, string, string, string, string, // record
  string, string, number, // guard
];

export type SqliteLedgerStoreOptions = {
  /** Rows fetched per page by readRange. */
  pageSize?: number;
};

// Singleton streams are stored with an empty key; the registry never hands out "" as a real key.
const SINGLETON_KEY = "";

function keyColumn(stream: StreamRef): string {
  if (stream.key === SINGLETON_KEY) {
    throw new LedgerError("INVALID_STREAM", `empty stream key for ${stream.kind}`);
  }
  return stream.key ?? SINGLETON_KEY;
}

function isConstraintViolation(e: unknown): boolean {
  return (
    typeof e === "object" &&
    e !== null &&
    "code" in e &&
    typeof e.code === "string" &&
    e.code.startsWith("SQLITE_CONSTRAINT")
  );
}

function decodeFields(raw: string): ContentField[] {
  // A corrupted column must still load so verification can report it.
  const unparseable: ContentField[] = [{ name: "$unparseable", value: raw }];

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return unparseable;
  }

  const parsed = ContentFieldsSchema.safeParse(json);
  return parsed.success ? parsed.data : unparseable;
}

function rowToRecord(r: RecordRow): LedgerRecord {
  return {
    stream_kind: r.stream_kind,
    stream_key: r.stream_key === SINGLETON_KEY ? null : r.stream_key,
    sequence_number: Number(r.sequence_number),
    timestamp: String(r.timestamp),
    actor: String(r.actor),
    fields: decodeFields(String(r.fields_json)),
    previous_hash: String(r.previous_hash),
    content_hash: String(r.content_hash),
  };
}

export class SqliteLedgerStore implements LedgerStore {
  private db: Database.Database;
  private readonly pageSize: number;
  private txQueue: Promise<unknown> = Promise.resolve();

  constructor(source: string | Database.Database = "ledger.sqlite", opts: SqliteLedgerStoreOptions = {}) {
    this.db = typeof source === "string" ? new Database(source) : source;
    this.pageSize = Math.max(1, Math.floor(opts.pageSize ?? 500));
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_records (
        stream_kind      TEXT NOT NULL,
        stream_key       TEXT NOT NULL, -- '' for singleton streams
        sequence_number  INTEGER NOT NULL,
        timestamp        TEXT NOT NULL,
        actor            TEXT NOT NULL,
        fields_json      TEXT NOT NULL,
        previous_hash    TEXT NOT NULL,
        content_hash     TEXT NOT NULL,
        PRIMARY KEY (stream_kind, stream_key, sequence_number)
      );

      CREATE INDEX IF NOT EXISTS idx_ledger_records_actor
        ON ledger_records(stream_kind, stream_key, actor);
    `);
  }

  /**
   * BEGIN IMMEDIATE per callback. One connection cannot hold two
   * transactions, so callbacks are queued and run one at a time.
   *
   * SQLite has a single writer per database: appends to different streams
   * are independent under the ChainManager's per-stream locks but commit one
   * after another here. Reads do not go through this queue.
   */
  async runInTransaction<T>(fn: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      this.db.exec("BEGIN IMMEDIATE;");
      try {
        const out = await fn();
        this.db.exec("COMMIT;");
        return out;
      } catch (e) {
        if (this.db.inTransaction) this.db.exec("ROLLBACK;");
        throw e;
      }
    };

    const next = this.txQueue.then(run, run);
    this.txQueue = next.catch(() => undefined);
    return next;
  }

  async readTail(stream: StreamRef): Promise<LedgerTail | null> {
    const key = keyColumn(stream);
    try {
      const row = this.db
        .prepare<[string, string], LedgerTail>(
          `SELECT sequence_number, content_hash
           FROM ledger_records
           WHERE stream_kind=? AND stream_key=?
           ORDER BY sequence_number DESC
           LIMIT 1;`
        )
        .get(stream.kind, key);

      return row ? { sequence_number: Number(row.sequence_number), content_hash: String(row.content_hash) } : null;
    } catch (e) {
      throw toStorageError(e, streamIdOf(stream));
    }
  }

  async insert(record: LedgerRecord): Promise<void> {
    const stream = streamRefOf(record);
    const id = streamIdOf(stream);
    const key = keyColumn(stream);

    let changes: number;
    try {
      // Guarded insert: only lands when sequence_number is exactly tail + 1.
      const info = this.db
        .prepare<InsertParams>(
          `INSERT INTO ledger_records
             (stream_kind, stream_key, sequence_number, timestamp, actor, fields_json, previous_hash, content_hash)
           SELECT ?, ?, ?, ?, ?, ?, ?, ?
           WHERE (SELECT COALESCE(MAX(sequence_number), 0)
                  FROM ledger_records
                  WHERE stream_kind=? AND stream_key=?) = ? - 1;`
        )
        .run(
          record.stream_kind,
          key,
          record.sequence_number,
          record.timestamp,
          record.actor,
          JSON.stringify(record.fields),
          record.previous_hash,
          record.content_hash,
          record.stream_kind,
          key,
          record.sequence_number
        );
      changes = info.changes;
    } catch (e) {
      if (isConstraintViolation(e)) {
        throw new LedgerError("SEQUENCE_CONFLICT", `stream ${id} already has sequence ${record.sequence_number}`, {
          stream: id,
          cause: e,
        });
      }
      throw toStorageError(e, id);
    }

    if (changes === 0) {
      throw new LedgerError(
        "SEQUENCE_CONFLICT",
        `stream ${id} rejected sequence ${record.sequence_number} (not tail + 1)`,
        { stream: id }
      );
    }
  }

  async *readRange(stream: StreamRef, from: number, to: number): AsyncIterable<LedgerRecord> {
    const key = keyColumn(stream);
    const id = streamIdOf(stream);
    let cursor = Math.max(1, Math.floor(from));
    const last = Math.floor(to);

    while (cursor <= last) {
      let rows: RecordRow[];
      try {
        rows = this.db
          .prepare<[string, string, number, number, number], RecordRow>(
            `SELECT stream_kind, stream_key, sequence_number, timestamp, actor,
                    fields_json, previous_hash, content_hash
             FROM ledger_records
             WHERE stream_kind=? AND stream_key=? AND sequence_number BETWEEN ? AND ?
             ORDER BY sequence_number ASC
             LIMIT ?;`
          )
          .all(stream.kind, key, cursor, last, this.pageSize);
      } catch (e) {
        throw toStorageError(e, id);
      }

      for (const r of rows) yield rowToRecord(r);

      const tail = rows[rows.length - 1];
      if (!tail || rows.length < this.pageSize) return;
      cursor = Number(tail.sequence_number) + 1;
    }
  }

  async listStreams(): Promise<StreamRef[]> {
    try {
      return this.db
        .prepare<[], { stream_kind: string; stream_key: string }>(
          `SELECT DISTINCT stream_kind, stream_key
           FROM ledger_records
           ORDER BY stream_kind ASC, stream_key ASC;`
        )
        .all()
        .map((r) => ({ kind: r.stream_kind, key: r.stream_key === SINGLETON_KEY ? null : r.stream_key }));
    } catch (e) {
      throw toStorageError(e, null);
    }
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
