// @framewire/socket - socket channel for framewire (Node.js only)
//
// Provides socket-specific I/O: address resolution, connection management,
// buffered frame reads and the channel itself.

export {
  SocketChannel,
  createSocketChannel,
  DEFAULT_SOCKET_TRANSMISSION_LENGTH,
  type SocketChannelOptions,
} from "./channel.ts";
export { ConnectionManager, type ConnectionState, type ConnectionOptions } from "./connection.ts";
export { SocketReader, type ReadOptions } from "./reader.ts";
export {
  DEFAULT_TCP_HOST,
  DEFAULT_TCP_PORT,
  DEFAULT_SERVER_ID,
  SOCK_FILE_ENV,
  resolveTcpAddress,
  resolveIpcAddress,
} from "./address.ts";
export { platformProfile, unixProfile, windowsProfile, type PlatformProfile } from "./platform.ts";
export {
  describeAddress,
  toConnectOptions,
  type ConfigureSocket,
  type SocketAddress,
  type TransportSocket,
} from "./types.ts";
