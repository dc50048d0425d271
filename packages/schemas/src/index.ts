export * from "./types.js";
export * from "./errors.js";
export { TimeoutError, withTimeout } from "./timeout.js";
export { stableStringify, hashValue } from "./hash.js";
export {
  validateJournalEventData,
  validateSessionRecordData,
  isJournalEvent,
  isSessionRecord,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { JournalEventSchema } from "./journal-event.schema.js";
export { SessionRecordSchema } from "./session-record.schema.js";
