// packages/ledger/src/hash.ts
import { createHash } from "node:crypto";

import { canonicalizeContent } from "./canonicalize.js";
import type { ContentField } from "./record.js";

/** previous_hash of the first record in every stream. */
export const GENESIS = "GENESIS";

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

/** content_hash = sha256(canonical content ‖ previous_hash) */
export function computeContentHash(input: {
  timestamp: string;
  actor: string;
  fields: readonly ContentField[];
  previous_hash: string;
}): string {
  return createHash("sha256")
    .update(canonicalizeContent(input), "utf8")
    .update(input.previous_hash, "utf8")
    .digest("hex");
}
