// packages/compliance/src/audit-log.ts
import type { HashChainLedger, IntegrityReport, LedgerExportBundle, LedgerRecord, Receipt } from "@edc-ledger/ledger";
import { STREAM_KINDS, collect } from "@edc-ledger/ledger";

export type AuditStatus = "success" | "failure";

export type AuditEvent = {
  user_id: string;
  action: string; // e.g. LOGIN_ATTEMPT, RECORD_UPDATE, AUDIT_EXPORT
  resource: string;
  old_value?: string | null;
  new_value?: string | null;
  status?: AuditStatus;
  error_message?: string | null;
};

export type AuditQuery = {
  user_id?: string;
  action?: string;
  resource?: string;
  since?: string | Date;
  until?: string | Date;
  limit?: number;
};

const AUDIT = STREAM_KINDS.SYSTEM_AUDIT;

export function logAuditEvent(ledger: HashChainLedger, e: AuditEvent): Promise<Receipt> {
  return ledger.append(
    AUDIT,
    null,
    [
      { name: "event", value: e.action },
      { name: "resource", value: e.resource },
      { name: "old_value", value: e.old_value ?? null },
      { name: "new_value", value: e.new_value ?? null },
      { name: "status", value: e.status ?? "success" },
      { name: "error_message", value: e.error_message ?? null },
    ],
    e.user_id
  );
}

export function queryAuditLog(ledger: HashChainLedger, q: AuditQuery = {}): Promise<LedgerRecord[]> {
  const where: Record<string, string> = {};
  if (q.action !== undefined) where.event = q.action;
  if (q.resource !== undefined) where.resource = q.resource;

  return collect(
    ledger.history(AUDIT, null, {
      actor: q.user_id,
      where,
      since: q.since,
      until: q.until,
      limit: q.limit,
    })
  );
}

export function verifyAuditLog(ledger: HashChainLedger): Promise<IntegrityReport> {
  return ledger.verify(AUDIT, null);
}

/**
 * Exports the whole audit stream with its verification, then records the
 * export itself as an AUDIT_EXPORT event (outside the exported range).
 */
export async function exportAuditLog(
  ledger: HashChainLedger,
  exported_by: string
): Promise<{ bundle: LedgerExportBundle; receipt: Receipt }> {
  const bundle = await ledger.export(AUDIT, null);
  const last = bundle.integrity.last_sequence_number ?? 0;

  const receipt = await logAuditEvent(ledger, {
    user_id: exported_by,
    action: "AUDIT_EXPORT",
    resource: `${AUDIT}#1-${last}`,
    status: bundle.integrity.valid ? "success" : "failure",
    error_message: bundle.integrity.valid ? null : `chain broken at ${bundle.integrity.first_break}`,
  });

  return { bundle, receipt };
}
