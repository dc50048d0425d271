import * as readline from "node:readline";
import type { InputCapability, OutputCapability, SequenceIndex } from "@tickweave/schemas";

/** Writable output, injectable for testing. */
export interface TextWriter {
  write(data: string): unknown;
}

interface Waiter {
  resolve(line: string): void;
  reject(err: Error): void;
}

/**
 * Reads one line per poll. Lines typed ahead of a poll are queued, so piped
 * input plays back in order.
 */
export class LineInput implements InputCapability<string> {
  private readonly rl: readline.Interface;
  private readonly queued: string[] = [];
  private waiter: Waiter | null = null;
  private closed = false;

  constructor(input: NodeJS.ReadableStream) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.rl.on("line", (line) => {
      if (this.waiter) {
        const { resolve } = this.waiter;
        this.waiter = null;
        resolve(line);
      } else {
        this.queued.push(line);
      }
    });
    this.rl.on("close", () => {
      this.closed = true;
      this.waiter?.reject(new Error("Input closed"));
      this.waiter = null;
    });
  }

  poll(signal: AbortSignal): Promise<string> {
    const line = this.queued.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.reject(new Error("Input closed"));
    if (signal.aborted) return Promise.reject(new Error("Input poll aborted"));
    if (this.waiter) return Promise.reject(new Error("A poll is already waiting for input"));
    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(new Error("Input poll aborted"));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.waiter = {
        resolve: (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        reject: (err) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
    });
  }

  close(): void {
    this.rl.close();
  }
}

/** Prints each frame under a tick header. */
export class FrameOutput implements OutputCapability<string> {
  private readonly writer: TextWriter;
  private readonly prompt: string;

  constructor(writer: TextWriter, prompt = "> ") {
    this.writer = writer;
    this.prompt = prompt;
  }

  pushFrame(frame: string, tick: SequenceIndex): void {
    this.writer.write(`\n-- tick ${tick} --\n${frame}\n${this.prompt}`);
  }
}
