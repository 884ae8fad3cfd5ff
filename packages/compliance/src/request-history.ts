// packages/compliance/src/request-history.ts
import type { FieldValue, HashChainLedger, IntegrityReport, LedgerRecord, Receipt } from "@edc-ledger/ledger";
import { STREAM_KINDS, collect, fieldValue } from "@edc-ledger/ledger";

import { withEntityLock } from "./entity-lock.js";
import { ComplianceError, requireIntact } from "./errors.js";

export type RequestType = "DSAR" | "ERASURE" | "RECTIFICATION" | "RESTRICTION";

export type RequestAction = {
  request_type: RequestType;
  request_id: string;
  action: string; // e.g. REQUEST_CREATED, ITEM_REVIEWED, RESTRICTION_APPLIED
  details: string;
  performed_by: string;
  item_id?: string | null;
  hold_id?: string | null;
  extra?: Record<string, FieldValue>;
};

/** One chain per request, never interleaved with another request's history. */
export function requestStreamKey(request_type: RequestType, request_id: string): string {
  return `${request_type}:${request_id}`;
}

export function logRequestAction(ledger: HashChainLedger, a: RequestAction): Promise<Receipt> {
  return ledger.append(
    STREAM_KINDS.REQUEST_HISTORY,
    requestStreamKey(a.request_type, a.request_id),
    [
      { name: "event", value: a.action },
      { name: "details", value: a.details },
      { name: "item_id", value: a.item_id ?? null },
      { name: "hold_id", value: a.hold_id ?? null },
      { name: "extra", value: a.extra ?? null },
    ],
    a.performed_by
  );
}

export function getRequestHistory(
  ledger: HashChainLedger,
  request_type: RequestType,
  request_id: string
): Promise<LedgerRecord[]> {
  return collect(ledger.history(STREAM_KINDS.REQUEST_HISTORY, requestStreamKey(request_type, request_id)));
}

export async function assertRequestHistoryIntact(
  ledger: HashChainLedger,
  request_type: RequestType,
  request_id: string
): Promise<IntegrityReport> {
  const report = await ledger.verify(STREAM_KINDS.REQUEST_HISTORY, requestStreamKey(request_type, request_id));
  requireIntact(report, `${request_type} ${request_id} history`);
  return report;
}

/**
 * Lifting is allowed only on an intact history whose latest restriction
 * event is RESTRICTION_APPLIED.
 */
export function liftRestriction(
  ledger: HashChainLedger,
  request_id: string,
  input: { lifted_by: string; reason: string }
): Promise<Receipt> {
  const key = requestStreamKey("RESTRICTION", request_id);
  return withEntityLock(ledger, `request:${key}`, () => lift(ledger, request_id, input));
}

async function lift(
  ledger: HashChainLedger,
  request_id: string,
  input: { lifted_by: string; reason: string }
): Promise<Receipt> {
  await assertRequestHistoryIntact(ledger, "RESTRICTION", request_id);

  const history = await getRequestHistory(ledger, "RESTRICTION", request_id);
  if (history.length === 0) throw new ComplianceError("NOT_FOUND", `restriction request ${request_id}`);

  const latest = [...history]
    .reverse()
    .find((r) => ["RESTRICTION_APPLIED", "RESTRICTION_LIFTED"].includes(String(fieldValue(r, "event"))));

  if (!latest || fieldValue(latest, "event") !== "RESTRICTION_APPLIED") {
    throw new ComplianceError("INVALID_STATE", `restriction request ${request_id} has no active restriction`);
  }

  return logRequestAction(ledger, {
    request_type: "RESTRICTION",
    request_id,
    action: "RESTRICTION_LIFTED",
    details: input.reason,
    performed_by: input.lifted_by,
  });
}
