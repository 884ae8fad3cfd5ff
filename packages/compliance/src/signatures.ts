// packages/compliance/src/signatures.ts
import { randomUUID } from "node:crypto";

import type { HashChainLedger, LedgerRecord, Receipt } from "@edc-ledger/ledger";
import { STREAM_KINDS, collect, fieldValue } from "@edc-ledger/ledger";

import { withEntityLock } from "./entity-lock.js";
import { ComplianceError, requireIntact } from "./errors.js";

export const SIGNATURE_MEANINGS = {
  CREATED_BY: "I created this record and certify the data is accurate",
  REVIEWED_BY: "I have reviewed this record and found it complete",
  APPROVED_BY: "I approve this record for the intended purpose",
  VERIFIED_BY: "I have verified the accuracy of this record",
  MONITORED_BY: "I have monitored this record as part of oversight",
  LOCKED_BY: "I am locking this record to prevent further changes",
  CORRECTED_BY: "I have made corrections to this record",
  CERTIFIED_BY: "I certify this record meets all requirements",
} as const;

export type SignatureMeaning = keyof typeof SIGNATURE_MEANINGS;

export type ApplySignatureInput = {
  signature_code?: string;
  table_name: string;
  record_id: string;
  meaning: SignatureMeaning;
  signer_user_id: string;
  signer_full_name: string;
  /** hash of the signed record's content, computed by the caller */
  record_hash: string;
};

export type SignatureStatus = {
  signature_code: string;
  table_name: string;
  record_id: string;
  meaning: string;
  signer_user_id: string;
  signed_at: string;
  valid: boolean;
  invalidated_at: string | null;
  invalidated_by: string | null;
  invalidation_reason: string | null;
  /** record_hash captured at signing */
  record_hash: string;
  /** null unless a current record hash was given */
  record_unchanged: boolean | null;
};

const text = (r: LedgerRecord, name: string): string => String(fieldValue(r, name) ?? "");

/**
 * Writes the signature to the global SIGNATURES chain and opens its own history chain.
 * A caller-supplied code that already has a history is refused.
 */
export function applySignature(
  ledger: HashChainLedger,
  input: ApplySignatureInput
): Promise<{ signature_code: string; receipt: Receipt }> {
  const signature_code = input.signature_code ?? `SIG-${randomUUID()}`;
  return withEntityLock(ledger, `signature:${signature_code}`, () => sign(ledger, signature_code, input));
}

async function sign(
  ledger: HashChainLedger,
  signature_code: string,
  input: ApplySignatureInput
): Promise<{ signature_code: string; receipt: Receipt }> {
  const existing = await collect(ledger.history(STREAM_KINDS.SIGNATURE_HISTORY, signature_code, { limit: 1 }));
  if (existing.length) {
    throw new ComplianceError("INVALID_STATE", `signature ${signature_code} already exists`);
  }

  const receipt = await ledger.append(
    STREAM_KINDS.SIGNATURES,
    null,
    [
      { name: "event", value: "SIGNATURE_APPLIED" },
      { name: "signature_code", value: signature_code },
      { name: "table_name", value: input.table_name },
      { name: "record_id", value: input.record_id },
      { name: "meaning", value: input.meaning },
      { name: "statement", value: SIGNATURE_MEANINGS[input.meaning] },
      { name: "signer_full_name", value: input.signer_full_name },
      { name: "record_hash", value: input.record_hash },
    ],
    input.signer_user_id
  );

  await ledger.append(
    STREAM_KINDS.SIGNATURE_HISTORY,
    signature_code,
    [
      { name: "event", value: "SIGNATURE_APPLIED" },
      { name: "table_name", value: input.table_name },
      { name: "record_id", value: input.record_id },
      { name: "meaning", value: input.meaning },
      { name: "record_hash", value: input.record_hash },
      { name: "signatures_seq", value: receipt.sequence_number },
    ],
    input.signer_user_id
  );

  return { signature_code, receipt };
}

/**
 * Replays one signature's history chain. Refuses a chain that does not verify.
 * With `current_record_hash`, also reports whether the signed record changed since signing.
 */
export async function getSignatureStatus(
  ledger: HashChainLedger,
  signature_code: string,
  current_record_hash?: string
): Promise<SignatureStatus> {
  requireIntact(
    await ledger.verify(STREAM_KINDS.SIGNATURE_HISTORY, signature_code),
    `signature ${signature_code} history`
  );

  const history = await collect(ledger.history(STREAM_KINDS.SIGNATURE_HISTORY, signature_code));
  const applied = history[0];
  if (!applied) throw new ComplianceError("NOT_FOUND", `signature ${signature_code}`);

  const revoked = history.find((r) => fieldValue(r, "event") === "SIGNATURE_INVALIDATED") ?? null;

  return {
    signature_code,
    table_name: text(applied, "table_name"),
    record_id: text(applied, "record_id"),
    meaning: text(applied, "meaning"),
    signer_user_id: applied.actor,
    signed_at: applied.timestamp,
    valid: revoked === null,
    invalidated_at: revoked?.timestamp ?? null,
    invalidated_by: revoked?.actor ?? null,
    invalidation_reason: revoked ? text(revoked, "reason") : null,
    record_hash: text(applied, "record_hash"),
    record_unchanged: current_record_hash === undefined ? null : current_record_hash === text(applied, "record_hash"),
  };
}

/** Revocation is a new record on both chains; the original signature record is untouched. */
export function invalidateSignature(
  ledger: HashChainLedger,
  signature_code: string,
  input: { invalidated_by: string; reason: string }
): Promise<Receipt> {
  return withEntityLock(ledger, `signature:${signature_code}`, () => invalidate(ledger, signature_code, input));
}

async function invalidate(
  ledger: HashChainLedger,
  signature_code: string,
  input: { invalidated_by: string; reason: string }
): Promise<Receipt> {
  const status = await getSignatureStatus(ledger, signature_code);
  if (!status.valid) {
    throw new ComplianceError("INVALID_STATE", `signature ${signature_code} is already invalidated`);
  }

  await ledger.append(
    STREAM_KINDS.SIGNATURES,
    null,
    [
      { name: "event", value: "SIGNATURE_INVALIDATED" },
      { name: "signature_code", value: signature_code },
      { name: "reason", value: input.reason },
    ],
    input.invalidated_by
  );

  return ledger.append(
    STREAM_KINDS.SIGNATURE_HISTORY,
    signature_code,
    [
      { name: "event", value: "SIGNATURE_INVALIDATED" },
      { name: "reason", value: input.reason },
    ],
    input.invalidated_by
  );
}

export function listRecordSignatures(
  ledger: HashChainLedger,
  table_name: string,
  record_id: string
): Promise<LedgerRecord[]> {
  return collect(
    ledger.history(STREAM_KINDS.SIGNATURES, null, {
      where: { event: "SIGNATURE_APPLIED", table_name, record_id },
    })
  );
}
