// Line reads over a readable stream.
//
// Lines are queued as readline emits them; `next()` hands them out one at a
// time, resolving `null` once the stream has closed.

import readline from "node:readline";
import type { Readable } from "node:stream";
import { ChannelError } from "@framewire/wire";

export class LineReader {
  private rl: readline.Interface;
  private lines: string[] = [];
  private closed = false;
  private waiting: ((line: string | null) => void) | null = null;

  constructor(input: Readable) {
    this.rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

    this.rl.on("line", (line: string) => {
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.on("close", () => {
      this.closed = true;
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(null);
      }
    });
  }

  /**
   * Next line, or `null` once the input has closed.
   *
   * Aborting `signal` rejects with `receive_aborted`; a line arriving later
   * stays queued for the next call.
   */
  next(signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) return Promise.reject(ChannelError.receiveAborted());

    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);
    if (this.waiting) {
      return Promise.reject(new Error("LineReader: a read is already in progress"));
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.waiting = null;
        reject(ChannelError.receiveAborted());
      };
      this.waiting = (value) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Stop reading from the input. */
  close(): void {
    this.rl.close();
  }
}
