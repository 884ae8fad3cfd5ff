// packages/compliance/src/errors.ts
import type { IntegrityReport } from "@edc-ledger/ledger";

export type ComplianceErrorCode = "CHAIN_INTEGRITY_FAILED" | "NOT_FOUND" | "INVALID_STATE";

export class ComplianceError extends Error {
  readonly code: ComplianceErrorCode;
  /** Set for CHAIN_INTEGRITY_FAILED; needs manual investigation, never auto-correction. */
  readonly report: IntegrityReport | null;

  constructor(code: ComplianceErrorCode, detail: string, report: IntegrityReport | null = null) {
    super(`${code}: ${detail}`);
    this.name = "ComplianceError";
    this.code = code;
    this.report = report;
  }
}

/** Hard stop unless the report says the chain is intact. */
export function requireIntact(report: IntegrityReport, what: string): void {
  if (report.valid) return;
  throw new ComplianceError(
    "CHAIN_INTEGRITY_FAILED",
    `${what} failed verification at sequence ${report.first_break ?? "?"}`,
    report
  );
}
