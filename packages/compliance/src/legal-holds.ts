// packages/compliance/src/legal-holds.ts
import { randomUUID } from "node:crypto";

import type { HashChainLedger, LedgerRecord, Receipt } from "@edc-ledger/ledger";
import { STREAM_KINDS, collect, fieldValue } from "@edc-ledger/ledger";

import { withEntityLock } from "./entity-lock.js";
import { ComplianceError, requireIntact } from "./errors.js";

export const LEGAL_HOLD_TYPES = ["REGULATORY", "LITIGATION", "AUDIT", "INVESTIGATION", "OTHER"] as const;
export type LegalHoldType = (typeof LEGAL_HOLD_TYPES)[number];

export type CreateLegalHoldInput = {
  hold_number?: string;
  hold_type: LegalHoldType;
  hold_reason: string;
  legal_basis: string;
  created_by: string;
  affected_subjects?: string[];
  start_date?: string;
  end_date?: string | null;
};

export type LegalHold = {
  hold_number: string;
  hold_type: string;
  hold_reason: string;
  legal_basis: string;
  affected_subjects: string[];
  created_by: string;
  created_at: string;
};

function toHold(r: LedgerRecord): LegalHold {
  const subjects = fieldValue(r, "affected_subjects");
  return {
    hold_number: String(fieldValue(r, "hold_number")),
    hold_type: String(fieldValue(r, "hold_type")),
    hold_reason: String(fieldValue(r, "hold_reason")),
    legal_basis: String(fieldValue(r, "legal_basis")),
    affected_subjects: Array.isArray(subjects) ? subjects.map(String) : [],
    created_by: r.actor,
    created_at: r.timestamp,
  };
}

function findCreation(ledger: HashChainLedger, hold_number: string): Promise<LedgerRecord[]> {
  return collect(
    ledger.history(STREAM_KINDS.LEGAL_HOLDS, null, { where: { event: "HOLD_CREATED", hold_number }, limit: 1 })
  );
}

/** A caller-supplied hold number that was already used is refused. */
export function createLegalHold(
  ledger: HashChainLedger,
  input: CreateLegalHoldInput
): Promise<{ hold_number: string; receipt: Receipt }> {
  const hold_number = input.hold_number ?? `HOLD-${randomUUID()}`;
  return withEntityLock(ledger, `hold:${hold_number}`, () => create(ledger, hold_number, input));
}

async function create(
  ledger: HashChainLedger,
  hold_number: string,
  input: CreateLegalHoldInput
): Promise<{ hold_number: string; receipt: Receipt }> {
  if ((await findCreation(ledger, hold_number)).length) {
    throw new ComplianceError("INVALID_STATE", `hold ${hold_number} already exists`);
  }

  const receipt = await ledger.append(
    STREAM_KINDS.LEGAL_HOLDS,
    null,
    [
      { name: "event", value: "HOLD_CREATED" },
      { name: "hold_number", value: hold_number },
      { name: "hold_type", value: input.hold_type },
      { name: "hold_reason", value: input.hold_reason },
      { name: "legal_basis", value: input.legal_basis },
      { name: "affected_subjects", value: input.affected_subjects ?? [] },
      { name: "start_date", value: input.start_date ?? null },
      { name: "end_date", value: input.end_date ?? null },
    ],
    input.created_by
  );

  await ledger.append(
    STREAM_KINDS.HOLD_HISTORY,
    hold_number,
    [
      { name: "event", value: "HOLD_CREATED" },
      { name: "legal_holds_seq", value: receipt.sequence_number },
    ],
    input.created_by
  );

  return { hold_number, receipt };
}

/** Holds created and not yet released, replayed from the global LEGAL_HOLDS chain. */
export async function listActiveLegalHolds(ledger: HashChainLedger): Promise<LegalHold[]> {
  requireIntact(await ledger.verify(STREAM_KINDS.LEGAL_HOLDS, null), "legal holds");

  const active = new Map<string, LegalHold>();
  for await (const r of ledger.history(STREAM_KINDS.LEGAL_HOLDS, null)) {
    const number = String(fieldValue(r, "hold_number"));
    const event = fieldValue(r, "event");
    if (event === "HOLD_CREATED") active.set(number, toHold(r));
    else if (event === "HOLD_RELEASED") active.delete(number);
  }
  return [...active.values()];
}

export async function isSubjectUnderHold(ledger: HashChainLedger, subject_id: string): Promise<boolean> {
  const holds = await listActiveLegalHolds(ledger);
  return holds.some((h) => h.affected_subjects.includes(subject_id));
}

/** Release is appended, never an update of the creation record. */
export function releaseLegalHold(
  ledger: HashChainLedger,
  hold_number: string,
  input: { released_by: string; release_reason: string }
): Promise<Receipt> {
  return withEntityLock(ledger, `hold:${hold_number}`, () => release(ledger, hold_number, input));
}

async function release(
  ledger: HashChainLedger,
  hold_number: string,
  input: { released_by: string; release_reason: string }
): Promise<Receipt> {
  const active = await listActiveLegalHolds(ledger);
  if (!active.some((h) => h.hold_number === hold_number)) {
    const created = await findCreation(ledger, hold_number);
    throw created.length
      ? new ComplianceError("INVALID_STATE", `hold ${hold_number} is already released`)
      : new ComplianceError("NOT_FOUND", `hold ${hold_number}`);
  }

  requireIntact(await ledger.verify(STREAM_KINDS.HOLD_HISTORY, hold_number), `hold ${hold_number} history`);

  const receipt = await ledger.append(
    STREAM_KINDS.LEGAL_HOLDS,
    null,
    [
      { name: "event", value: "HOLD_RELEASED" },
      { name: "hold_number", value: hold_number },
      { name: "release_reason", value: input.release_reason },
    ],
    input.released_by
  );

  await ledger.append(
    STREAM_KINDS.HOLD_HISTORY,
    hold_number,
    [
      { name: "event", value: "HOLD_RELEASED" },
      { name: "legal_holds_seq", value: receipt.sequence_number },
    ],
    input.released_by
  );

  return receipt;
}
