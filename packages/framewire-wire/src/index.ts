// @framewire/wire - frame codec and error taxonomy for framewire channels

export {
  ChannelError,
  ChannelErrorKind,
  OversizedPayloadError,
  RemoteFailureError,
  isChannelError,
  toError,
} from "./errors.ts";

export {
  FRAME_HEADER_LENGTH,
  MAX_FRAME_LENGTH,
  CLOSE_TOKEN,
  CLOSE_FRAME,
  encodeText,
  decodeText,
  encodeFrameHeader,
  parseFrameHeader,
  checkPayloadLength,
  encodeFrame,
  decodeFrame,
} from "./frame.ts";

export {
  RESPONSE_SUCCESS,
  RESPONSE_FAILURE,
  TIMEOUT_SENTINEL,
  type ResponseStatus,
  type StatusLine,
  parseStatusLine,
  decodeResponse,
} from "./response.ts";
