import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { SessionRecord } from "@tickweave/schemas";
import { errorMessage, isSessionRecord, validateSessionRecordData } from "@tickweave/schemas";

export function serializeSessionRecord(record: SessionRecord<unknown, unknown>): string {
  return JSON.stringify(record, null, 2) + "\n";
}

/** Parses and validates a session record. Accepts JSON text or an already-parsed value. */
export function parseSessionRecord(input: unknown): SessionRecord {
  let data: unknown = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (err) {
      throw new Error(`Session record is not valid JSON: ${errorMessage(err)}`);
    }
  }
  if (isSessionRecord(data)) return data;
  const { errors } = validateSessionRecordData(data);
  throw new Error(`Invalid session record: ${errors.join(", ")}`);
}

export async function readSessionRecord(filePath: string): Promise<SessionRecord> {
  return parseSessionRecord(await readFile(filePath, "utf-8"));
}

export async function writeSessionRecord(filePath: string, record: SessionRecord<unknown, unknown>): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, serializeSessionRecord(record), "utf-8");
}
