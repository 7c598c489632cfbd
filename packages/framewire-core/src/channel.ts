/**
 * Channel capability.
 *
 * A channel carries one textual request and its response at a time to an
 * interpreter server. Implementations:
 * - SocketChannel (framewire-socket) for length-prefixed frames over a socket
 * - PipeChannel (framewire-pipe) for one line per message over stdio
 *
 * Callers must await each `send` before issuing the next: the protocol has no
 * message identifiers, so interleaved responses cannot be told apart.
 */

import { checkPayloadLength, encodeText } from "@framewire/wire";

export interface SendOptions {
  /**
   * Aborting this signal while the response is awaited rejects the send with
   * a `receive_aborted` ChannelError. The response may still arrive later;
   * `tryRepair()` can read it.
   */
  signal?: AbortSignal;
}

/** Outcome of `tryRepair()`: the pending payload, or the error met reading it. */
export type RepairResult = { ok: true; value: string } | { ok: false; error: Error };

export interface Channel {
  /** Maximum payload size in UTF-8 bytes accepted by `send`. */
  maxTransmissionLength: number;

  /** Send a request and resolve with the body of a `success` response. */
  send(data: string, options?: SendOptions): Promise<string>;

  /** Tell the peer no further requests will arrive and release the transport. */
  close(): Promise<void>;

  /** Discard responses the peer sent that nobody read. Never rejects. */
  flush(): Promise<void>;

  /** Read one pending frame after a desynchronizing failure. Never rejects. */
  tryRepair(): Promise<RepairResult>;
}

/** Shared transmission-length handling for channel variants. */
export abstract class BaseChannel implements Channel {
  private _maxTransmissionLength: number;

  constructor(maxTransmissionLength: number) {
    this._maxTransmissionLength = validateLength(maxTransmissionLength);
  }

  get maxTransmissionLength(): number {
    return this._maxTransmissionLength;
  }

  set maxTransmissionLength(value: number) {
    this._maxTransmissionLength = validateLength(value);
  }

  /**
   * UTF-8 encode a request, refusing it if it exceeds the transmission length.
   *
   * @throws OversizedPayloadError
   */
  protected encodePayload(data: string): Uint8Array {
    const payload = encodeText(data);
    checkPayloadLength(payload, this._maxTransmissionLength);
    return payload;
  }

  abstract send(data: string, options?: SendOptions): Promise<string>;
  abstract close(): Promise<void>;
  abstract flush(): Promise<void>;
  abstract tryRepair(): Promise<RepairResult>;
}

function validateLength(value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`max transmission length must be a positive integer, got ${value}`);
  }
  return value;
}
