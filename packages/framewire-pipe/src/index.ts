// @framewire/pipe - line-based pipe channel for framewire (Node.js only)

export {
  PipeChannel,
  createPipeChannel,
  escapeLine,
  DEFAULT_PIPE_TRANSMISSION_LENGTH,
  type PipeChannelOptions,
} from "./channel.ts";
export { LineReader } from "./lines.ts";
