// ---------------------------------------------------------------------------
// Public API of the Lending Desk library.
// ---------------------------------------------------------------------------

export * from "./core/types.js";
export * from "./core/errors.js";
export { loadConfig } from "./config/config.js";
export { createLogger } from "./logging/logger.js";
export { openLibrary } from "./app.js";
export {
  Library,
  DEFAULT_FINE_RATE,
  DEFAULT_LOAN_PERIOD_DAYS,
} from "./library/library.js";
export type { LibraryOptions } from "./library/library.js";
export { JsonFileSnapshotStore } from "./persistence/json-file-store.js";
export {
  decodeSnapshot,
  parseSnapshot,
  serializeSnapshot,
} from "./persistence/snapshot-codec.js";
export type {
  PersistedLibrary,
  SectionShape,
} from "./persistence/snapshot-codec.js";
