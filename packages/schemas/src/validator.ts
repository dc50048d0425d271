import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";
import { JournalEventSchema } from "./journal-event.schema.js";
import { SessionRecordSchema } from "./session-record.schema.js";
import type { JournalEvent, SessionRecord } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats keeps its function under .default when loaded from ESM
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateJournalEvent = ajv.compile(JournalEventSchema);
const validateSessionRecord = ajv.compile(SessionRecordSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

export function validateSessionRecordData(data: unknown): ValidationResult {
  const valid = validateSessionRecord(data);
  return toResult(valid, validateSessionRecord.errors);
}

export function isJournalEvent(data: unknown): data is JournalEvent {
  return validateJournalEvent(data);
}

export function isSessionRecord(data: unknown): data is SessionRecord {
  return validateSessionRecord(data);
}
