export * from "./record.js";
export * from "./errors.js";
export * from "./canonicalize.js";
export * from "./hash.js";

export type { LedgerStore } from "./ledger-store.js";
export { MAX_SEQ } from "./ledger-store.js";
export * from "./in-memory-store.js";
export * from "./sqlite-ledger-store.js";

export * from "./stream-lock.js";
export * from "./streams.js";
export * from "./chain-manager.js";
export * from "./verify-integrity.js";
export * from "./store-history.js";
export * from "./ledger-export.js";
export * from "./ledger.js";

export * from "./config.js";
export type { Logger } from "./logger.js";
export { createLogger, logger } from "./logger.js";
