// packages/compliance/src/entity-lock.ts
import type { HashChainLedger } from "@edc-ledger/ledger";
import { StreamLock } from "@edc-ledger/ledger";

export const ENTITY_LOCK_TIMEOUT_MS = 10_000;

const locks = new WeakMap<HashChainLedger, Map<string, StreamLock>>();

/**
 * Runs a check-then-append step for one entity (a signature, a hold, a
 * request) while no other step for the same entity on the same ledger runs.
 */
export async function withEntityLock<T>(
  ledger: HashChainLedger,
  entity: string,
  fn: () => Promise<T>
): Promise<T> {
  let byEntity = locks.get(ledger);
  if (!byEntity) {
    byEntity = new Map();
    locks.set(ledger, byEntity);
  }

  let lock = byEntity.get(entity);
  if (!lock) {
    lock = new StreamLock(entity);
    byEntity.set(entity, lock);
  }

  try {
    return await lock.run(ENTITY_LOCK_TIMEOUT_MS, fn);
  } finally {
    if (!lock.locked && lock.waiting === 0 && byEntity.get(entity) === lock) byEntity.delete(entity);
  }
}
