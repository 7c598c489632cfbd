// Socket channel: length-prefixed request/response over a socket.

import {
  CLOSE_FRAME,
  ChannelError,
  ChannelErrorKind,
  decodeResponse,
  decodeText,
  encodeFrameHeader,
  isChannelError,
  toError,
} from "@framewire/wire";
import {
  BaseChannel,
  createLogger,
  type Logger,
  type RepairResult,
  type SendOptions,
} from "@framewire/core";
import { ConnectionManager } from "./connection.ts";
import { platformProfile } from "./platform.ts";
import type { ReadOptions } from "./reader.ts";
import {
  describeAddress,
  type ConfigureSocket,
  type SocketAddress,
  type TransportSocket,
} from "./types.ts";

export const DEFAULT_SOCKET_TRANSMISSION_LENGTH = 1_000_000;

/** Configuration for a socket channel. */
export interface SocketChannelOptions {
  /** Endpoint to connect to. Resolved from `id` through the platform profile when omitted. */
  address?: SocketAddress;
  /** Server identifier: a port on Windows, a socket name elsewhere. */
  id?: string | number;
  /** Platform whose profile picks addressing and socket tuning. Default: process.platform */
  platform?: NodeJS.Platform;
  /** Environment consulted for FRAMEWIRE_SOCK_FILE. Default: process.env */
  env?: Record<string, string | undefined>;
  /** Maximum request size in bytes. Default: 1_000_000 */
  maxTransmissionLength?: number;
  /** Bound on the connect call. Default: 1000 */
  connectTimeoutMs?: number;
  /** How long `flush()` waits for stray data before stopping. Default: 100 */
  flushPollMs?: number;
  /** Socket tuning hook. Defaults to the platform profile's. */
  configure?: ConfigureSocket;
  /** Socket factory. Default: `new net.Socket()` */
  createSocket?: () => TransportSocket;
  /** Called when a failed write triggers a reconnect. */
  onReconnect?: (address: SocketAddress) => void;
  logger?: Logger;
}

/**
 * Channel to an interpreter server over a TCP or Unix domain socket.
 *
 * Requests and responses are frames: a 10-byte space-padded decimal length
 * followed by the UTF-8 payload. A write that fails at the transport level is
 * retried once on a fresh connection; nothing else is retried.
 */
export class SocketChannel extends BaseChannel {
  private connection: ConnectionManager;
  private flushPollMs: number;
  private logger: Logger;
  private _connected = false;

  private constructor(connection: ConnectionManager, options: SocketChannelOptions, logger: Logger) {
    super(options.maxTransmissionLength ?? DEFAULT_SOCKET_TRANSMISSION_LENGTH);
    this.connection = connection;
    this.flushPollMs = options.flushPollMs ?? 100;
    this.logger = logger;
  }

  /**
   * Connect to the server and return a ready channel.
   *
   * @throws ChannelError (`transport`) if the server cannot be reached
   */
  static async connect(options: SocketChannelOptions = {}): Promise<SocketChannel> {
    const profile = platformProfile(options.platform);
    const address = options.address ?? profile.resolveAddress(options.id, options.env ?? process.env);
    const logger = options.logger ?? createLogger("framewire:socket");

    const connection = new ConnectionManager(address, {
      connectTimeoutMs: options.connectTimeoutMs,
      configure: options.configure ?? profile.configure,
      createSocket: options.createSocket,
      onReconnect: options.onReconnect,
      logger,
    });

    const channel = new SocketChannel(connection, options, logger);
    await connection.start();
    channel._connected = true;
    return channel;
  }

  get address(): SocketAddress {
    return this.connection.address;
  }

  /** True between a successful connect and `close()`. */
  get connected(): boolean {
    return this._connected;
  }

  async send(data: string, options: SendOptions = {}): Promise<string> {
    if (!this._connected) throw ChannelError.closed();

    const payload = this.encodePayload(data);
    await this.transmit(payload);
    return this.receive(options);
  }

  async close(): Promise<void> {
    if (!this._connected) return;

    try {
      await this.connection.write(CLOSE_FRAME);
    } finally {
      this.connection.close();
      this._connected = false;
      this.logger.debug("closed", { address: describeAddress(this.address) });
    }
  }

  async flush(): Promise<void> {
    if (!this._connected) return;

    let drained = 0;
    try {
      const reader = this.connection.reader;

      // The poll bounds the wait for a stray frame to start; one that has
      // started is read to its end so no partial frame is left behind.
      while (await reader.waitReadable(this.flushPollMs)) {
        if (!(await reader.readFrame())) break;
        drained++;
      }
    } catch (error) {
      this.logger.debug("flush stopped", { error: toError(error).message });
    }

    if (drained > 0) this.logger.debug("flushed stray frames", { count: drained });
  }

  async tryRepair(): Promise<RepairResult> {
    try {
      const message = await this.receiveFrame({});
      return { ok: true, value: decodeText(message) };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  private async transmit(payload: Uint8Array): Promise<void> {
    const header = encodeFrameHeader(payload.length);

    try {
      await this.connection.write(header);
      await this.connection.write(payload);
    } catch (error) {
      if (!isChannelError(error, ChannelErrorKind.TRANSPORT)) throw error;

      this.logger.warn("attempting to reconnect", {
        address: describeAddress(this.address),
        error: error.message,
      });
      await this.connection.reconnect();
      await this.connection.write(header);
      await this.connection.write(payload);
    }
  }

  private async receive(options: SendOptions): Promise<string> {
    const message = await this.receiveFrame({ signal: options.signal });
    return decodeResponse(decodeText(message));
  }

  private async receiveFrame(options: ReadOptions): Promise<Uint8Array> {
    const body = await this.connection.reader.readFrame(options);
    if (!body) throw ChannelError.peerTerminated();
    return body;
  }
}

/** Connect a socket channel; see `SocketChannel.connect`. */
export function createSocketChannel(options: SocketChannelOptions = {}): Promise<SocketChannel> {
  return SocketChannel.connect(options);
}
