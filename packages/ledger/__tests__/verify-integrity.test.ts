// packages/ledger/__tests__/verify-integrity.test.ts
import { describe, expect, test } from "vitest";

import { isLedgerError } from "../src/errors.js";
import { GENESIS } from "../src/hash.js";
import { MAX_SEQ } from "../src/ledger-store.js";
import type { LedgerRecord, Receipt, StreamRef } from "../src/record.js";
import { collect } from "../src/store-history.js";
import { verifyRecords } from "../src/verify-integrity.js";
import { createMemoryLedger, createSqliteLedger } from "./_helpers/ledger.js";

const AUDIT: StreamRef = { kind: "SYSTEM_AUDIT", key: null };

async function seed(n: number) {
  const ctx = createSqliteLedger();
  const receipts: Receipt[] = [];
  for (let i = 1; i <= n; i++) {
    receipts.push(await ctx.ledger.append("SYSTEM_AUDIT", null, [{ name: "event", value: `E${i}` }], `user-${i}`));
  }
  const hashes = receipts.map((r) => r.content_hash);
  const hashAt = (seq: number): string => hashes[seq - 1] ?? "";
  return { ...ctx, hashAt };
}

function tamper(db: ReturnType<typeof createSqliteLedger>["db"], column: string, value: string, seq: number) {
  db.prepare(
    `UPDATE ledger_records SET ${column}=? WHERE stream_kind='SYSTEM_AUDIT' AND stream_key='' AND sequence_number=?`
  ).run(value, seq);
}

describe("verify", () => {
  test("empty stream is valid", async () => {
    const { ledger } = createMemoryLedger();
    expect(await ledger.verify("SYSTEM_AUDIT", null)).toEqual({
      stream_kind: "SYSTEM_AUDIT",
      stream_key: null,
      valid: true,
      records_checked: 0,
      first_break: null,
      breaks: [],
      from: 1,
      to: null,
      anchor: "GENESIS",
      last_sequence_number: null,
      last_hash: null,
    });
  });

  test("untouched chain is valid and reports its tail", async () => {
    const { ledger, hashAt } = await seed(3);
    const report = await ledger.verify("SYSTEM_AUDIT", null);
    expect(report.valid).toBe(true);
    expect(report.records_checked).toBe(3);
    expect(report.last_sequence_number).toBe(3);
    expect(report.last_hash).toBe(hashAt(3));
  });

  test("edited content of record 1 breaks the link at record 2", async () => {
    const { ledger, db, hashAt } = await seed(2);
    tamper(db, "fields_json", '[{"name":"event","value":"DELETE"}]', 1);

    const report = await ledger.verify("SYSTEM_AUDIT", null);
    expect(report.valid).toBe(false);
    expect(report.first_break).toBe(2);
    expect(report.records_checked).toBe(2);
    expect(report.breaks).toHaveLength(1);
    expect(report.breaks[0]).toMatchObject({ sequence_number: 2, code: "PREVIOUS_HASH_MISMATCH", actual: hashAt(1) });
  });

  test("edited actor of the last record is caught by its own hash", async () => {
    const { ledger, db, hashAt } = await seed(3);
    tamper(db, "actor", "mallory", 3);

    const report = await ledger.verify("SYSTEM_AUDIT", null);
    expect(report.first_break).toBe(3);
    expect(report.breaks).toEqual([
      expect.objectContaining({ sequence_number: 3, code: "CONTENT_HASH_MISMATCH", actual: hashAt(3) }),
    ]);
  });

  test("deleted middle record is reported as a gap at its sequence number", async () => {
    const { ledger, db, hashAt } = await seed(3);
    db.prepare("DELETE FROM ledger_records WHERE sequence_number=2").run();

    const report = await ledger.verify("SYSTEM_AUDIT", null);
    expect(report.first_break).toBe(2);
    expect(report.records_checked).toBe(2);
    expect(report.breaks).toEqual([
      { sequence_number: 2, code: "SEQUENCE_GAP", expected: 2, actual: 3 },
      { sequence_number: 3, code: "PREVIOUS_HASH_MISMATCH", expected: hashAt(1), actual: hashAt(2) },
    ]);
  });

  test("stop_at_first_break returns after the first finding", async () => {
    const { ledger, db } = await seed(3);
    db.prepare("DELETE FROM ledger_records WHERE sequence_number=2").run();

    const report = await ledger.verify("SYSTEM_AUDIT", null, { stop_at_first_break: true });
    expect(report.breaks).toEqual([{ sequence_number: 2, code: "SEQUENCE_GAP", expected: 2, actual: 3 }]);
    expect(report.first_break).toBe(2);
  });

  test("rewritten previous_hash is caught at that record", async () => {
    const { ledger, db, hashAt } = await seed(2);
    tamper(db, "previous_hash", "f".repeat(64), 2);

    const report = await ledger.verify("SYSTEM_AUDIT", null);
    expect(report.first_break).toBe(2);
    expect(report.breaks.map((b) => b.code)).toEqual(["PREVIOUS_HASH_MISMATCH", "CONTENT_HASH_MISMATCH"]);
    expect(report.breaks[0]).toMatchObject({ expected: hashAt(1), actual: "f".repeat(64) });
  });

  test("first record must link to GENESIS", async () => {
    const { ledger, db } = await seed(1);
    tamper(db, "previous_hash", "not-genesis", 1);

    const report = await ledger.verify("SYSTEM_AUDIT", null);
    expect(report.breaks.map((b) => [b.sequence_number, b.code])).toEqual([
      [1, "GENESIS_MISMATCH"],
      [1, "CONTENT_HASH_MISMATCH"],
    ]);
  });

  test("rewritten stored hash breaks the successor link", async () => {
    const { ledger, db } = await seed(3);
    tamper(db, "content_hash", "0".repeat(64), 1);

    const report = await ledger.verify("SYSTEM_AUDIT", null);
    expect(report.first_break).toBe(2);
    expect(report.breaks[0]).toMatchObject({ sequence_number: 2, code: "PREVIOUS_HASH_MISMATCH", expected: "0".repeat(64) });
  });

  test("unparseable stored content still loads and fails verification", async () => {
    const { ledger, db, store } = await seed(2);
    tamper(db, "fields_json", "not json", 1);

    const [first] = await collect(store.readRange(AUDIT, 1, 1));
    expect(first?.fields).toEqual([{ name: "$unparseable", value: "not json" }]);
    expect((await ledger.verify("SYSTEM_AUDIT", null)).first_break).toBe(2);
  });
});

describe("verify ranges", () => {
  test("partial range with the right anchor is valid, with a wrong anchor is not", async () => {
    const { ledger, hashAt } = await seed(4);

    const ok = await ledger.verify("SYSTEM_AUDIT", null, { from: 3, anchor_hash: hashAt(2) });
    expect(ok).toMatchObject({ valid: true, records_checked: 2, anchor: "CALLER", from: 3 });

    const bad = await ledger.verify("SYSTEM_AUDIT", null, { from: 3, anchor_hash: hashAt(1) });
    expect(bad.breaks).toEqual([{ sequence_number: 3, code: "ANCHOR_MISMATCH", expected: hashAt(1), actual: hashAt(2) }]);
  });

  test("partial range without an anchor trusts its first link", async () => {
    const { ledger } = await seed(4);
    const report = await ledger.verify("SYSTEM_AUDIT", null, { from: 2, to: 3 });
    expect(report).toMatchObject({ valid: true, records_checked: 2, anchor: "UNANCHORED", to: 3 });
  });

  test("consecutive ranges compose: last_hash of one anchors the next", async () => {
    const { ledger, db, hashAt } = await seed(5);
    expect((await ledger.verify("SYSTEM_AUDIT", null)).valid).toBe(true);

    for (let k = 1; k <= 5; k++) {
      const head = await ledger.verify("SYSTEM_AUDIT", null, { from: 1, to: k });
      expect(head.valid).toBe(true);
      expect(head.last_hash).toBe(hashAt(k));
      const rest = await ledger.verify("SYSTEM_AUDIT", null, k === 1 ? { from: 1 } : { from: k, anchor_hash: hashAt(k - 1) });
      expect(rest.valid).toBe(true);
    }

    tamper(db, "fields_json", '[{"name":"event","value":"EDITED"}]', 3);
    expect((await ledger.verify("SYSTEM_AUDIT", null)).valid).toBe(false);

    for (let k = 1; k <= 5; k++) {
      const head = await ledger.verify("SYSTEM_AUDIT", null, { from: 1, to: k });
      const rest = await ledger.verify("SYSTEM_AUDIT", null, k === 1 ? { from: 1 } : { from: k, anchor_hash: hashAt(k - 1) });
      expect(head.valid && rest.valid).toBe(false);
    }
  });

  test("missing first record of a range is a gap", async () => {
    const { ledger, db } = await seed(5);
    db.prepare("DELETE FROM ledger_records WHERE sequence_number=3").run();

    const report = await ledger.verify("SYSTEM_AUDIT", null, { from: 3, to: 5 });
    expect(report.breaks).toEqual([{ sequence_number: 3, code: "SEQUENCE_GAP", expected: 3, actual: 4 }]);
  });

  test("missing last record of a bounded range is a gap", async () => {
    const { ledger, db } = await seed(6);
    db.prepare("DELETE FROM ledger_records WHERE sequence_number=5").run();

    const report = await ledger.verify("SYSTEM_AUDIT", null, { from: 1, to: 5 });
    expect(report.records_checked).toBe(4);
    expect(report.breaks).toEqual([{ sequence_number: 5, code: "SEQUENCE_GAP", expected: 5, actual: null }]);
  });

  test("range past the tail checks nothing", async () => {
    const { ledger } = await seed(3);
    const report = await ledger.verify("SYSTEM_AUDIT", null, { from: 10 });
    expect(report).toMatchObject({ valid: true, records_checked: 0, last_hash: null });
  });

  test("invalid ranges are rejected", async () => {
    const { ledger } = await seed(1);
    const codes: string[] = [];
    for (const range of [{ from: 0 }, { from: 3, to: 2 }, { from: 1, anchor_hash: "abc" }]) {
      try {
        await ledger.verify("SYSTEM_AUDIT", null, range);
        codes.push("ok");
      } catch (e) {
        codes.push(isLedgerError(e, "INVALID_RANGE") ? "INVALID_RANGE" : "other");
      }
    }
    expect(codes).toEqual(["INVALID_RANGE", "INVALID_RANGE", "INVALID_RANGE"]);

    expect((await ledger.verify("SYSTEM_AUDIT", null, { from: 1, anchor_hash: GENESIS })).valid).toBe(true);
  });
});

describe("verifyRecords", () => {
  test("reports a repeated sequence number as a duplicate", async () => {
    const { ledger, store } = createMemoryLedger();
    for (const e of ["A", "B", "C"]) await ledger.append("SYSTEM_AUDIT", null, [{ name: "event", value: e }], "alice");

    const records = await collect(store.readRange(AUDIT, 1, MAX_SEQ));
    const [r1, r2, r3] = records;
    if (!r1 || !r2 || !r3) throw new Error("expected three records");

    const withDuplicate: LedgerRecord[] = [r1, r2, { ...r2 }, r3];
    const report = await verifyRecords(AUDIT, withDuplicate);
    expect(report.records_checked).toBe(4);
    expect(report.breaks).toEqual([{ sequence_number: 2, code: "SEQUENCE_DUPLICATE", expected: 3, actual: 2 }]);
  });
});
