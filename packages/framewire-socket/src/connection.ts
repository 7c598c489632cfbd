// Connection management for the socket channel.
//
// Owns the one live socket of a channel: opens it with a bounded connect
// timeout, replaces it wholesale on reconnect, and destroys it on close.

import net from "node:net";
import { ChannelError } from "@framewire/wire";
import type { Logger } from "@framewire/core";
import { SocketReader } from "./reader.ts";
import {
  describeAddress,
  toConnectOptions,
  type ConfigureSocket,
  type SocketAddress,
  type TransportSocket,
} from "./types.ts";

/** Connection state. */
export type ConnectionState = "unconnected" | "connecting" | "connected" | "closed";

export interface ConnectionOptions {
  /** Bound on the connect call only. Default: 1000 */
  connectTimeoutMs?: number;
  /** Platform tuning applied to each fresh socket before connecting. */
  configure?: ConfigureSocket;
  /** Socket factory. Default: `new net.Socket()` */
  createSocket?: () => TransportSocket;
  /** Called when a reconnection attempt starts. */
  onReconnect?: (address: SocketAddress) => void;
  logger: Logger;
}

export class ConnectionManager {
  readonly address: SocketAddress;

  private connectTimeoutMs: number;
  private configure: ConfigureSocket;
  private createSocket: () => TransportSocket;
  private onReconnect?: (address: SocketAddress) => void;
  private logger: Logger;

  private state: ConnectionState = "unconnected";
  private current: { socket: TransportSocket; reader: SocketReader } | null = null;

  constructor(address: SocketAddress, options: ConnectionOptions) {
    this.address = address;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 1000;
    this.configure = options.configure ?? (() => {});
    this.createSocket = options.createSocket ?? (() => new net.Socket());
    this.onReconnect = options.onReconnect;
    this.logger = options.logger;
  }

  /** Get the current connection state. */
  getState(): ConnectionState {
    return this.state;
  }

  /** Reader over the live socket. */
  get reader(): SocketReader {
    return this.live().reader;
  }

  /**
   * Open a fresh socket to the address.
   *
   * @throws ChannelError (`transport`) if the connect is refused or times out
   */
  async start(): Promise<void> {
    this.state = "connecting";
    const socket = this.createSocket();
    const reader = new SocketReader(socket);
    this.configure(socket);

    try {
      await this.connect(socket);
    } catch (error) {
      this.state = "unconnected";
      throw error;
    }

    this.current = { socket, reader };
    this.state = "connected";
    this.logger.debug("connected", { address: describeAddress(this.address) });
  }

  /** Destroy the current socket and open a new one to the same address. */
  async reconnect(): Promise<void> {
    this.onReconnect?.(this.address);
    this.destroyCurrent();
    await this.start();
  }

  /**
   * Write bytes to the live socket.
   *
   * Rejects with `closed` after `close()`, and with `transport` when there
   * is no live socket or the socket refuses the write.
   */
  async write(data: Uint8Array): Promise<void> {
    const { socket } = this.live();
    await new Promise<void>((resolve, reject) => {
      socket.write(data, (err) => {
        if (err) reject(ChannelError.transport(`write failed: ${err.message}`, err));
        else resolve();
      });
    });
  }

  /** Destroy the socket for good. */
  close(): void {
    this.destroyCurrent();
    this.state = "closed";
  }

  private live(): { socket: TransportSocket; reader: SocketReader } {
    if (this.state === "closed") throw ChannelError.closed();
    if (!this.current) {
      throw ChannelError.transport(`not connected to ${describeAddress(this.address)}`);
    }
    return this.current;
  }

  private destroyCurrent(): void {
    const current = this.current;
    this.current = null;
    if (!current) return;
    try {
      current.socket.destroy();
    } catch (error) {
      this.logger.debug("ignored error destroying socket", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // The timer only bounds the connect; once the socket is open it is cleared,
  // so later reads and writes can block as long as the server needs.
  private connect(socket: TransportSocket): Promise<void> {
    const target = describeAddress(this.address);

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const settle = (error?: ChannelError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.removeListener("error", onError);
        if (error) {
          socket.destroy();
          reject(error);
        } else {
          resolve();
        }
      };

      const onError = (err: Error) => {
        settle(ChannelError.transport(`connect to ${target} failed: ${err.message}`, err));
      };

      const timer = setTimeout(() => {
        settle(ChannelError.transport(`connect to ${target} timed out after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      socket.once("error", onError);
      socket.connect(toConnectOptions(this.address), () => settle());
    });
  }
}
