// Per-platform socket profiles.
//
// A profile bundles address resolution with the socket tuning hook. The
// channel picks one when it is constructed and never inspects the platform
// again.

import { resolveIpcAddress, resolveTcpAddress } from "./address.ts";
import type { ConfigureSocket, SocketAddress } from "./types.ts";

export interface PlatformProfile {
  name: "windows" | "unix";
  resolveAddress(id: string | number | undefined, env: Record<string, string | undefined>): SocketAddress;
  configure: ConfigureSocket;
}

/** TCP loopback with Nagle disabled, since every request waits on its response. */
export const windowsProfile: PlatformProfile = {
  name: "windows",
  resolveAddress: (id) => resolveTcpAddress(id),
  configure: (socket) => {
    socket.setNoDelay(true);
  },
};

export const unixProfile: PlatformProfile = {
  name: "unix",
  resolveAddress: (id, env) => resolveIpcAddress(id, env),
  configure: () => {},
};

export function platformProfile(platform: NodeJS.Platform = process.platform): PlatformProfile {
  return platform === "win32" ? windowsProfile : unixProfile;
}
