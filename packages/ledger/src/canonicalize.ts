// packages/ledger/src/canonicalize.ts
import { LedgerError } from "./errors.js";
import type { ContentField, ContentFieldInput, FieldInput, FieldValue } from "./record.js";

// In unicode mode a well-formed surrogate pair is one code point, so this only matches lone halves.
const LONE_SURROGATE = /\p{Cs}/u;

function invalid(detail: string): LedgerError {
  return new LedgerError("INVALID_CONTENT", detail);
}

function checkText(s: string, where: string): string {
  if (LONE_SURROGATE.test(s)) throw invalid(`${where} contains an unpaired surrogate`);
  return s;
}

function isPlainObject(v: object): boolean {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function normalizeValue(v: FieldInput, path: string, ancestors: Set<object>): FieldValue {
  if (v === null || v === undefined) return null;

  if (typeof v === "string") return checkText(v, path);
  if (typeof v === "boolean") return v;

  if (typeof v === "number") {
    if (!Number.isFinite(v)) throw invalid(`${path} is not a finite number`);
    return Object.is(v, -0) ? 0 : v;
  }

  if (v instanceof Date) {
    if (Number.isNaN(v.getTime())) throw invalid(`${path} is an invalid date`);
    return v.toISOString();
  }

  if (typeof v !== "object") throw invalid(`${path} has unsupported type ${typeof v}`);

  if (ancestors.has(v)) throw invalid(`${path} is cyclic`);
  ancestors.add(v);
  try {
    if (Array.isArray(v)) {
      const items: readonly FieldInput[] = v;
      return items.map((item, i) => normalizeValue(item, `${path}[${i}]`, ancestors));
    }

    if (!isPlainObject(v)) throw invalid(`${path} is not a plain object`);

    const out: { [key: string]: FieldValue } = {};
    for (const [k, vv] of Object.entries(v)) {
      if (vv === undefined) continue;
      // assigning it would replace the prototype and drop the value
      if (k === "__proto__") throw invalid(`${path} has a "__proto__" key`);
      checkText(k, `${path} key`);
      out[k] = normalizeValue(vv, `${path}.${k}`, ancestors);
    }
    return out;
  } finally {
    ancestors.delete(v);
  }
}

/**
 * Validates and normalizes caller-supplied fields into their stored form.
 * Field order is kept; it is part of the hashed content.
 */
export function normalizeFields(input: readonly ContentFieldInput[]): ContentField[] {
  if (!Array.isArray(input)) throw invalid("fields must be an array");

  const names = new Set<string>();
  return input.map((f, i) => {
    if (typeof f?.name !== "string" || f.name.length === 0) {
      throw invalid(`field #${i} has no name`);
    }
    checkText(f.name, `field #${i} name`);
    if (names.has(f.name)) throw invalid(`duplicate field "${f.name}"`);
    names.add(f.name);

    return { name: f.name, value: normalizeValue(f.value, f.name, new Set()) };
  });
}

export function normalizeActor(actor: string): string {
  if (typeof actor !== "string" || actor.trim().length === 0) throw invalid("actor is required");
  return checkText(actor, "actor");
}

/** Fixed textual form of a capture time: `Date#toISOString`. */
export function normalizeTimestamp(at: string | Date): string {
  const d = at instanceof Date ? at : new Date(at);
  if (Number.isNaN(d.getTime())) throw invalid(`invalid timestamp ${String(at)}`);
  return d.toISOString();
}

function sortKeys(v: FieldValue): FieldValue {
  if (v === null || typeof v !== "object") return v;
  if (Array.isArray(v)) return v.map(sortKeys);

  // own "__proto__" keys in stored records must survive; plain assignment would set the prototype
  const out: { [key: string]: FieldValue } = {};
  for (const k of Object.keys(v).sort()) {
    const vv = v[k];
    if (vv !== undefined) {
      Object.defineProperty(out, k, { value: sortKeys(vv), enumerable: true, writable: true, configurable: true });
    }
  }
  return out;
}

/**
 * Deterministic text for hashing: `[timestamp, actor, [[name, value], ...]]`.
 * Top-level field order is significant, nested object keys are sorted.
 */
export function canonicalizeContent(input: {
  timestamp: string;
  actor: string;
  fields: readonly ContentField[];
}): string {
  return JSON.stringify([
    input.timestamp,
    input.actor,
    input.fields.map((f) => [f.name, sortKeys(f.value)]),
  ]);
}
