// @framewire/core - channel capability shared by every framewire transport

export { BaseChannel, type Channel, type RepairResult, type SendOptions } from "./channel.ts";
export {
  createLogger,
  isEnabled,
  loggingChannel,
  type Logger,
  type LoggingOptions,
} from "./logging.ts";
export { closeQuietly, withChannel } from "./scope.ts";
