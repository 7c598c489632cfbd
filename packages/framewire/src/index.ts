// framewire - request/response channels to a long-lived interpreter server
//
// Re-exports the transports and their shared vocabulary, plus the factory
// that picks one.

export { openChannel, useChannel, type ChannelConfig } from "./open.ts";

export {
  BaseChannel,
  closeQuietly,
  createLogger,
  loggingChannel,
  withChannel,
  type Channel,
  type Logger,
  type LoggingOptions,
  type RepairResult,
  type SendOptions,
} from "@framewire/core";

export {
  ChannelError,
  ChannelErrorKind,
  OversizedPayloadError,
  RemoteFailureError,
  isChannelError,
  decodeResponse,
  encodeFrame,
  decodeFrame,
  CLOSE_FRAME,
  FRAME_HEADER_LENGTH,
} from "@framewire/wire";

export {
  SocketChannel,
  createSocketChannel,
  platformProfile,
  resolveIpcAddress,
  resolveTcpAddress,
  SOCK_FILE_ENV,
  type SocketAddress,
  type SocketChannelOptions,
} from "@framewire/socket";

export { PipeChannel, createPipeChannel, type PipeChannelOptions } from "@framewire/pipe";
