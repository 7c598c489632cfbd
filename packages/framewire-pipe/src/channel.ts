// Pipe channel: one line per message over a pair of text streams.
//
// Used when the server runs this process as its child and talks to it over
// stdin/stdout. There is no framing and nothing to reconnect to.

import type { Readable, Writable } from "node:stream";
import { ChannelError, decodeResponse } from "@framewire/wire";
import {
  BaseChannel,
  createLogger,
  type Logger,
  type RepairResult,
  type SendOptions,
} from "@framewire/core";
import { LineReader } from "./lines.ts";

export const DEFAULT_PIPE_TRANSMISSION_LENGTH = 10_000;

export interface PipeChannelOptions {
  /** Stream responses are read from. Default: process.stdin */
  input?: Readable;
  /** Stream requests are written to. Default: process.stdout */
  output?: Writable;
  /** Maximum request size in bytes. Default: 10_000 */
  maxTransmissionLength?: number;
  logger?: Logger;
}

/** Newlines inside a request would end the line early, so they travel escaped. */
export function escapeLine(data: string): string {
  return data.replace(/\n/g, "\\n");
}

export class PipeChannel extends BaseChannel {
  private output: Writable;
  private lines: LineReader;
  private logger: Logger;
  private closed = false;

  constructor(options: PipeChannelOptions = {}) {
    super(options.maxTransmissionLength ?? DEFAULT_PIPE_TRANSMISSION_LENGTH);
    this.output = options.output ?? process.stdout;
    this.lines = new LineReader(options.input ?? process.stdin);
    this.logger = options.logger ?? createLogger("framewire:pipe");
  }

  async send(data: string, options: SendOptions = {}): Promise<string> {
    if (this.closed) throw ChannelError.closed();

    this.encodePayload(data);
    await this.writeLine(`${escapeLine(data)}\n`);

    const line = await this.lines.next(options.signal);
    if (line === null) throw ChannelError.peerTerminated();

    return decodeResponse(line);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.lines.close();
    this.logger.debug("closed");
  }

  async flush(): Promise<void> {}

  async tryRepair(): Promise<RepairResult> {
    return { ok: false, error: ChannelError.unsupported("tryRepair") };
  }

  private writeLine(line: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.output.write(line, (err) => {
        if (err) reject(ChannelError.transport(`write failed: ${err.message}`, err));
        else resolve();
      });
    });
  }
}

export function createPipeChannel(options: PipeChannelOptions = {}): PipeChannel {
  return new PipeChannel(options);
}
