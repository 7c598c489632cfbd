// Buffered reads over a socket.
//
// Incoming chunks are appended to one buffer; reads take either exactly the
// number of bytes asked for or one whole frame, waiting for more chunks as
// needed. Bytes that nobody has read yet stay buffered across reads,
// including after an aborted read, which is what lets `tryRepair()` pick up
// a late response.

import { ChannelError, decodeFrame } from "@framewire/wire";
import type { TransportSocket } from "./types.ts";

export interface ReadOptions {
  /** Abort the read with a `receive_aborted` ChannelError. */
  signal?: AbortSignal;
  /** Give up (resolving `null`) if the bytes have not arrived in time. */
  timeoutMs?: number;
}

type WaitOutcome = "data" | "timeout";

export class SocketReader {
  private buf: Buffer = Buffer.alloc(0);
  private ended = false;
  private error: ChannelError | null = null;
  private wake: (() => void) | null = null;

  constructor(socket: TransportSocket) {
    socket.on("data", (chunk: Buffer) => {
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      this.notify();
    });

    socket.on("error", (err: Error) => {
      this.error = ChannelError.transport(`socket error: ${err.message}`, err);
      this.notify();
    });

    socket.on("end", () => {
      this.ended = true;
      this.notify();
    });

    socket.on("close", () => {
      this.ended = true;
      this.notify();
    });
  }

  /** Number of bytes received but not yet read. */
  get buffered(): number {
    return this.buf.length;
  }

  /** Whether the peer has closed its side of the stream. */
  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Read exactly `length` bytes.
   *
   * Returns `null` if the stream ends first, or if `timeoutMs` elapses first.
   * Rejects with the socket's error if it failed, or with `receive_aborted`
   * if the signal is (or becomes) aborted.
   */
  readExact(length: number, options: ReadOptions = {}): Promise<Uint8Array | null> {
    return this.readWhen(() => (this.buf.length >= length ? this.take(length) : null), options);
  }

  /**
   * Read one whole frame and return its payload.
   *
   * Header and payload leave the buffer together, once the payload has fully
   * arrived; a read that ends early (abort, timeout, end of stream) leaves
   * the partial frame buffered for the next read. Settles like `readExact`,
   * and rejects with `protocol_violation` on a malformed header.
   */
  readFrame(options: ReadOptions = {}): Promise<Uint8Array | null> {
    return this.readWhen(() => {
      const frame = decodeFrame(this.buf);
      if (!frame) return null;
      this.buf = this.buf.subarray(frame.next);
      return new Uint8Array(frame.value);
    }, options);
  }

  /**
   * Wait up to `timeoutMs` for at least one unread byte.
   *
   * Resolves `false` on timeout, end of stream or socket error.
   */
  async waitReadable(timeoutMs: number): Promise<boolean> {
    if (this.buf.length > 0) return true;
    if (this.ended || this.error) return false;

    const outcome = await this.waitForData(undefined, timeoutMs);
    return outcome === "data" && this.buf.length > 0;
  }

  private take(length: number): Uint8Array {
    const bytes = new Uint8Array(this.buf.subarray(0, length));
    this.buf = this.buf.subarray(length);
    return bytes;
  }

  // Retries `attempt` each time data arrives until it yields a value.
  private async readWhen<T>(attempt: () => T | null, options: ReadOptions): Promise<T | null> {
    const deadline = options.timeoutMs === undefined ? undefined : Date.now() + options.timeoutMs;

    for (;;) {
      if (options.signal?.aborted) throw ChannelError.receiveAborted();

      const result = attempt();
      if (result !== null) return result;

      if (this.error) throw this.error;
      if (this.ended) return null;

      const remaining = deadline === undefined ? undefined : deadline - Date.now();
      if (remaining !== undefined && remaining <= 0) return null;

      const outcome = await this.waitForData(options.signal, remaining);
      if (outcome === "timeout") return null;
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private waitForData(signal: AbortSignal | undefined, timeoutMs: number | undefined): Promise<WaitOutcome> {
    if (this.wake) {
      return Promise.reject(new Error("SocketReader: a read is already in progress"));
    }

    return new Promise<WaitOutcome>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => {
        cleanup();
        this.wake = null;
        reject(ChannelError.receiveAborted());
      };

      const cleanup = () => {
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      this.wake = () => {
        cleanup();
        resolve("data");
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          this.wake = null;
          resolve("timeout");
        }, timeoutMs);
      }

      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
