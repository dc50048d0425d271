import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, open } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType, Logger } from "@tickweave/schemas";
import { validateJournalEventData, isJournalEvent, errorMessage } from "@tickweave/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
  logger?: Logger;
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only JSONL log of session activity. Every line carries the sha256
 * of the previous line, so any edit after the fact breaks the chain.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private sessionIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private recovery: "truncate" | "strict";
  private logger: Logger | undefined;

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.recovery = options?.recovery ?? "truncate";
    this.logger = options?.logger;
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.split("\n").filter(Boolean);

    // A crash mid-append leaves an unparseable last line
    const last = lines[lines.length - 1];
    if (last !== undefined && parseLine(last) === null) {
      lines.pop();
      await writeFile(this.filePath, joinLines(lines), "utf-8");
      this.logger?.warn("Journal: truncated incomplete last line", { path: this.filePath });
    }

    let prevHash: string | undefined;
    let maxSeq = -1;
    const index = new Map<string, JournalEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === null || (i > 0 && event.hash_prev !== prevHash)) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i}: hash chain broken`);
        }
        await writeFile(this.filePath, joinLines(lines.slice(0, i)), "utf-8");
        this.logger?.warn("Journal: recovered from corruption", { at: i, dropped: lines.length - i });
        break;
      }
      prevHash = this.hash(line);
      const bucket = index.get(event.session_id);
      if (bucket) bucket.push(event);
      else index.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.sessionIndex = index;
    this.lastHash = prevHash;
    this.nextSeq = maxSeq + 1;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
  ): Promise<JournalEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        session_id: sessionId,
        type,
        payload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only advance in-memory state once the line is on disk
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.sessionIndex.get(sessionId);
      if (bucket) bucket.push(event);
      else this.sessionIndex.set(sessionId, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger?.warn("Journal listener failed", { type, error: errorMessage(err) });
        }
      }
      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like emit, but reports failure instead of throwing. */
  async tryEmit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(sessionId, type, payload);
    } catch (err) {
      this.logger?.warn("Journal write failed", { session_id: sessionId, type, error: errorMessage(err) });
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events: JournalEvent[] = [];
    for (const line of content.split("\n")) {
      const event = line ? parseLine(line) : null;
      if (event) events.push(event);
    }
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readSession(sessionId: string, options?: { offset?: number; limit?: number }): JournalEvent[] {
    const events = this.sessionIndex.get(sessionId) ?? [];
    if (!options) return [...events];
    const start = options.offset ?? 0;
    const end = options.limit !== undefined ? start + options.limit : undefined;
    return events.slice(start, end);
  }

  listSessions(): string[] {
    return [...this.sessionIndex.keys()];
  }

  getSessionEventCount(sessionId: string): number {
    return (this.sessionIndex.get(sessionId) ?? []).length;
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === null || (i > 0 && event.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(line);
    }
    return { valid: true };
  }

  /** Wait for pending writes. Call before process exit. */
  async close(): Promise<void> {
    await this.writeLock;
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }
}

function parseLine(line: string): JournalEvent | null {
  try {
    const parsed: unknown = JSON.parse(line);
    return isJournalEvent(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function joinLines(lines: string[]): string {
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}
