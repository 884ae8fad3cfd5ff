//
// Negative test: prove tamper detection on a file-backed ledger.
// Appends a small audit trail, verifies it, edits one row directly in SQLite,
// then verifies again and expects the break one record later.
//
// Run:
//   tsx examples/run-ledger-tamper-sqlite.ts
//

import os from "node:os";
import path from "node:path";
import fs from "node:fs";

import Database from "better-sqlite3";

import { openLedger } from "../packages/ledger/src/ledger.js";
import { loadLedgerConfig } from "../packages/ledger/src/config.js";
import { logAuditEvent, verifyAuditLog } from "../packages/compliance/src/audit-log.js";

function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

function tmpDbPath(name: string) {
  const p = path.join(os.tmpdir(), name);
  fs.rmSync(p, { force: true });
  return p;
}

async function main() {
  const dbPath = tmpDbPath(`ledger-tamper-${Date.now()}.sqlite`);
  const ledger = openLedger({ ...loadLedgerConfig(), dbPath, logLevel: "warn" });

  // ---- 1) Append ----
  const actions = ["LOGIN_ATTEMPT", "RECORD_CREATE", "RECORD_UPDATE", "RECORD_SIGN"];
  for (const action of actions) {
    await logAuditEvent(ledger, { user_id: "seed", action, resource: "batch_records/1" });
  }

  // ---- 2) Verify passes before tamper ----
  const before = await verifyAuditLog(ledger);
  assert(before.valid, `expected intact chain, got break at ${before.first_break}`);
  console.log(`before tamper: ${before.records_checked} records, last_hash=${before.last_hash}`);
  await ledger.close();

  // ---- 3) Tamper directly in DB ----
  const db = new Database(dbPath);
  db.prepare(
    `UPDATE ledger_records SET actor='mallory'
     WHERE stream_kind='SYSTEM_AUDIT' AND sequence_number=2`
  ).run();
  db.close();

  // ---- 4) Verify must FAIL ----
  const reopened = openLedger({ ...loadLedgerConfig(), dbPath, logLevel: "silent" });
  const after = await verifyAuditLog(reopened);
  await reopened.close();

  assert(!after.valid, "tampered chain verified as intact");
  assert(after.first_break === 3, `expected first_break=3, got ${after.first_break}`);
  console.log("after tamper:", JSON.stringify(after.breaks, null, 2));

  fs.rmSync(dbPath, { force: true });
  console.log("OK: tamper detected");
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
