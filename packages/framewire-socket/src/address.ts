// Address resolution.
//
// Maps a server identifier to the endpoint the channel connects to. Windows
// uses a TCP loopback port; everywhere else a Unix domain socket path.

import type { SocketAddress } from "./types.ts";

export const DEFAULT_TCP_HOST = "localhost";
export const DEFAULT_TCP_PORT = 7777;
export const DEFAULT_SERVER_ID = "default";

/** Environment variable overriding the Unix socket path. */
export const SOCK_FILE_ENV = "FRAMEWIRE_SOCK_FILE";

export function resolveTcpAddress(id?: string | number): SocketAddress {
  if (id === undefined) {
    return { kind: "tcp", host: DEFAULT_TCP_HOST, port: DEFAULT_TCP_PORT };
  }
  const port = typeof id === "number" ? id : Number(id);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new RangeError(`server id ${JSON.stringify(id)} is not a TCP port`);
  }
  return { kind: "tcp", host: DEFAULT_TCP_HOST, port };
}

export function resolveIpcAddress(
  id?: string | number,
  env: Record<string, string | undefined> = process.env,
): SocketAddress {
  const override = env[SOCK_FILE_ENV];
  if (override) {
    return { kind: "ipc", path: override };
  }
  return { kind: "ipc", path: `/tmp/framewire-server-${id ?? DEFAULT_SERVER_ID}.sock` };
}
