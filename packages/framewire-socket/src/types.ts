// Socket-facing types for the socket channel.

/** Resolved endpoint of the interpreter server. */
export type SocketAddress =
  | { kind: "tcp"; host: string; port: number }
  | { kind: "ipc"; path: string };

/**
 * The subset of `net.Socket` the channel relies on.
 *
 * `net.Socket` satisfies it; tests substitute an in-process double.
 */
export interface TransportSocket {
  connect(options: { host: string; port: number } | { path: string }, connectListener: () => void): this;
  write(data: Uint8Array, callback: (err?: Error | null) => void): boolean;
  setNoDelay(noDelay?: boolean): this;
  destroy(): this;

  on(event: "data", listener: (chunk: Buffer) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  on(event: "end", listener: () => void): this;
  on(event: "close", listener: (hadError: boolean) => void): this;
  once(event: "error", listener: (err: Error) => void): this;
  removeListener(event: "error", listener: (err: Error) => void): this;
}

/** Platform-specific socket tuning, applied before connecting. */
export type ConfigureSocket = (socket: TransportSocket) => void;

/** Describe an address for log and error messages. */
export function describeAddress(address: SocketAddress): string {
  return address.kind === "tcp" ? `${address.host}:${address.port}` : address.path;
}

/** Options for `socket.connect()`. */
export function toConnectOptions(address: SocketAddress): { host: string; port: number } | { path: string } {
  return address.kind === "tcp" ? { host: address.host, port: address.port } : { path: address.path };
}
