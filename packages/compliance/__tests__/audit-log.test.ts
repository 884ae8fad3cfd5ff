// packages/compliance/__tests__/audit-log.test.ts
import { fieldValue } from "@edc-ledger/ledger";
import { describe, expect, test } from "vitest";

import { exportAuditLog, logAuditEvent, queryAuditLog, verifyAuditLog } from "../src/audit-log.js";
import { memoryLedger } from "./_helpers/ledger.js";

async function seeded() {
  const ledger = memoryLedger();
  await logAuditEvent(ledger, { user_id: "alice", action: "LOGIN_ATTEMPT", resource: "auth" });
  await logAuditEvent(ledger, {
    user_id: "bob",
    action: "RECORD_UPDATE",
    resource: "patients/7",
    old_value: "a",
    new_value: "b",
  });
  await logAuditEvent(ledger, {
    user_id: "alice",
    action: "LOGIN_ATTEMPT",
    resource: "auth",
    status: "failure",
    error_message: "bad password",
  });
  return ledger;
}

describe("audit log", () => {
  test("events are chained on the system audit stream", async () => {
    const ledger = await seeded();
    const report = await verifyAuditLog(ledger);
    expect(report).toMatchObject({ stream_kind: "SYSTEM_AUDIT", valid: true, records_checked: 3 });
  });

  test("stores every column as a field, with defaults", async () => {
    const ledger = await seeded();
    const [first] = await queryAuditLog(ledger, { limit: 1 });
    expect(first?.actor).toBe("alice");
    expect(first?.fields).toEqual([
      { name: "event", value: "LOGIN_ATTEMPT" },
      { name: "resource", value: "auth" },
      { name: "old_value", value: null },
      { name: "new_value", value: null },
      { name: "status", value: "success" },
      { name: "error_message", value: null },
    ]);
  });

  test("queries by user, action and resource", async () => {
    const ledger = await seeded();
    expect((await queryAuditLog(ledger, { user_id: "alice" })).map((r) => r.sequence_number)).toEqual([1, 3]);
    expect((await queryAuditLog(ledger, { action: "RECORD_UPDATE" })).map((r) => r.actor)).toEqual(["bob"]);

    const [update] = await queryAuditLog(ledger, { resource: "patients/7" });
    expect(update && fieldValue(update, "new_value")).toBe("b");

    const window = await queryAuditLog(ledger, { since: "2026-03-01T09:00:01Z" });
    expect(window.map((r) => r.sequence_number)).toEqual([2, 3]);
  });

  test("export records itself after the exported range", async () => {
    const ledger = await seeded();
    const { bundle, receipt } = await exportAuditLog(ledger, "auditor");

    expect(bundle.records).toHaveLength(3);
    expect(bundle.integrity.valid).toBe(true);
    expect(receipt.sequence_number).toBe(4);

    const [exportEvent] = await queryAuditLog(ledger, { action: "AUDIT_EXPORT" });
    expect(exportEvent?.actor).toBe("auditor");
    expect(exportEvent && fieldValue(exportEvent, "resource")).toBe("SYSTEM_AUDIT#1-3");
    expect(exportEvent && fieldValue(exportEvent, "status")).toBe("success");
  });
});
