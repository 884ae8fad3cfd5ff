// packages/compliance/__tests__/request-history.test.ts
import { describe, expect, test } from "vitest";

import { ComplianceError } from "../src/errors.js";
import {
  assertRequestHistoryIntact,
  getRequestHistory,
  liftRestriction,
  logRequestAction,
  requestStreamKey,
} from "../src/request-history.js";
import { memoryLedger, rejectionOf, sqliteLedger } from "./_helpers/ledger.js";
import type { HashChainLedger } from "@edc-ledger/ledger";

async function restrict(ledger: HashChainLedger, request_id: string) {
  await logRequestAction(ledger, {
    request_type: "RESTRICTION",
    request_id,
    action: "REQUEST_CREATED",
    details: "subject asked to restrict processing",
    performed_by: "dpo",
  });
  await logRequestAction(ledger, {
    request_type: "RESTRICTION",
    request_id,
    action: "RESTRICTION_APPLIED",
    details: "marketing processing restricted",
    performed_by: "dpo",
    extra: { scope: ["marketing"] },
  });
}

describe("request history", () => {
  test("each request has its own chain", async () => {
    const ledger = memoryLedger();
    await restrict(ledger, "R-1");
    await logRequestAction(ledger, {
      request_type: "DSAR",
      request_id: "R-1",
      action: "REQUEST_CREATED",
      details: "access request",
      performed_by: "dpo",
    });

    expect(requestStreamKey("DSAR", "R-1")).toBe("DSAR:R-1");
    expect((await getRequestHistory(ledger, "RESTRICTION", "R-1")).map((r) => r.sequence_number)).toEqual([1, 2]);
    expect((await getRequestHistory(ledger, "DSAR", "R-1")).map((r) => r.sequence_number)).toEqual([1]);
    expect((await assertRequestHistoryIntact(ledger, "RESTRICTION", "R-1")).records_checked).toBe(2);
  });

  test("lifting an active restriction appends RESTRICTION_LIFTED", async () => {
    const ledger = memoryLedger();
    await restrict(ledger, "R-1");

    const receipt = await liftRestriction(ledger, "R-1", { lifted_by: "dpo", reason: "subject withdrew" });
    expect(receipt).toMatchObject({ stream_key: "RESTRICTION:R-1", sequence_number: 3 });

    const again = await rejectionOf(liftRestriction(ledger, "R-1", { lifted_by: "dpo", reason: "twice" }));
    expect(again instanceof ComplianceError && again.code).toBe("INVALID_STATE");
  });

  test("concurrent lifts append exactly one RESTRICTION_LIFTED", async () => {
    const ledger = memoryLedger();
    await restrict(ledger, "R-1");

    const results = await Promise.allSettled([
      liftRestriction(ledger, "R-1", { lifted_by: "dpo", reason: "withdrawn" }),
      liftRestriction(ledger, "R-1", { lifted_by: "dpo", reason: "withdrawn" }),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
    const [, second] = results;
    expect(second?.status === "rejected" && second.reason instanceof ComplianceError && second.reason.code).toBe(
      "INVALID_STATE"
    );

    const history = await getRequestHistory(ledger, "RESTRICTION", "R-1");
    expect(history.map((r) => r.fields.find((f) => f.name === "event")?.value)).toEqual([
      "REQUEST_CREATED",
      "RESTRICTION_APPLIED",
      "RESTRICTION_LIFTED",
    ]);
  });

  test("lifting an unknown request is NOT_FOUND", async () => {
    const err = await rejectionOf(liftRestriction(memoryLedger(), "R-9", { lifted_by: "dpo", reason: "n/a" }));
    expect(err instanceof ComplianceError && err.code).toBe("NOT_FOUND");
  });

  test("lifting is refused on a tampered history and nothing is appended", async () => {
    const { db, ledger } = sqliteLedger();
    await restrict(ledger, "R-1");

    db.prepare(
      `UPDATE ledger_records SET fields_json='[{"name":"event","value":"REQUEST_REJECTED"}]'
       WHERE stream_kind='REQUEST_HISTORY' AND stream_key='RESTRICTION:R-1' AND sequence_number=1`
    ).run();

    const err = await rejectionOf(liftRestriction(ledger, "R-1", { lifted_by: "dpo", reason: "x" }));
    expect(err instanceof ComplianceError && err.code).toBe("CHAIN_INTEGRITY_FAILED");
    expect(err instanceof ComplianceError && err.report?.first_break).toBe(2);
    expect(await getRequestHistory(ledger, "RESTRICTION", "R-1")).toHaveLength(2);
  });
});
