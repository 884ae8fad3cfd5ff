// packages/ledger/src/in-memory-store.ts
import { LedgerError } from "./errors.js";
import type { LedgerStore } from "./ledger-store.js";
import type { LedgerRecord, LedgerTail, StreamRef } from "./record.js";
import { streamIdOf, streamRefOf } from "./record.js";

export class InMemoryLedgerStore implements LedgerStore {
  private logs = new Map<string, LedgerRecord[]>();

  async readTail(stream: StreamRef): Promise<LedgerTail | null> {
    const list = this.logs.get(streamIdOf(stream)) ?? [];
    const last = list.length ? list[list.length - 1] : undefined;
    return last ? { sequence_number: last.sequence_number, content_hash: last.content_hash } : null;
  }

  async insert(record: LedgerRecord): Promise<void> {
    const id = streamIdOf(streamRefOf(record));
    const list = this.logs.get(id) ?? [];

    const expected = list.length + 1;
    if (record.sequence_number !== expected) {
      throw new LedgerError(
        "SEQUENCE_CONFLICT",
        `stream ${id} expects sequence ${expected}, got ${record.sequence_number}`,
        { stream: id }
      );
    }

    list.push(structuredClone(record));
    this.logs.set(id, list);
  }

  async *readRange(stream: StreamRef, from: number, to: number): AsyncIterable<LedgerRecord> {
    const list = this.logs.get(streamIdOf(stream)) ?? [];
    for (const r of list) {
      if (r.sequence_number < from) continue;
      if (r.sequence_number > to) break;
      yield structuredClone(r);
    }
  }

  async listStreams(): Promise<StreamRef[]> {
    return [...this.logs.values()]
      .map((list) => list[0])
      .filter((r): r is LedgerRecord => r !== undefined)
      .map(streamRefOf);
  }
}
