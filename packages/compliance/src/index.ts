export * from "./errors.js";
export * from "./entity-lock.js";
export * from "./audit-log.js";
export * from "./signatures.js";
export * from "./request-history.js";
export * from "./legal-holds.js";
