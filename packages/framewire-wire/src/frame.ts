// Length-prefixed framing.
//
// Every message, in either direction, is a 10-byte header holding the payload
// length as right-justified, space-padded ASCII decimal, followed by exactly
// that many payload bytes.

import { ChannelError, ChannelErrorKind, OversizedPayloadError } from "./errors.ts";

/** Width of the length header in bytes. */
export const FRAME_HEADER_LENGTH = 10;

/** Exclusive upper bound on a payload length the header can express. */
export const MAX_FRAME_LENGTH = 10 ** FRAME_HEADER_LENGTH;

/** Payload of the control frame announcing that no further requests will arrive. */
export const CLOSE_TOKEN = "$close";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

const HEADER_PATTERN = /^[ \t\r\n]*(\d+)[ \t\r\n]*$/;

export function encodeText(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/** Decode UTF-8 payload bytes. Invalid sequences are a protocol violation. */
export function decodeText(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (e) {
    throw new ChannelError(
      ChannelErrorKind.PROTOCOL_VIOLATION,
      `payload is not valid UTF-8 (${bytes.length} bytes)`,
      { cause: e },
    );
  }
}

/** Encode a payload length as the 10-byte header. */
export function encodeFrameHeader(length: number): Uint8Array {
  if (!Number.isInteger(length) || length < 0 || length >= MAX_FRAME_LENGTH) {
    throw new RangeError(`frame length ${length} does not fit a ${FRAME_HEADER_LENGTH}-digit header`);
  }
  return utf8Encoder.encode(String(length).padStart(FRAME_HEADER_LENGTH, " "));
}

/**
 * Parse a 10-byte header into the payload length.
 *
 * @throws ChannelError (`protocol_violation`) if the header is short or not a decimal number
 */
export function parseFrameHeader(header: Uint8Array): number {
  if (header.length !== FRAME_HEADER_LENGTH) {
    throw ChannelError.protocol(
      `frame header must be ${FRAME_HEADER_LENGTH} bytes, got ${header.length}`,
    );
  }
  const text = String.fromCharCode(...header);
  const match = HEADER_PATTERN.exec(text);
  if (!match) {
    throw ChannelError.protocol(`invalid frame header ${JSON.stringify(text)}`);
  }
  return Number(match[1]);
}

/** Throw if the payload is larger than `maxLength` bytes. */
export function checkPayloadLength(payload: Uint8Array, maxLength: number): void {
  if (payload.length > maxLength) {
    throw new OversizedPayloadError(payload.length, maxLength);
  }
}

/** Header + payload in one buffer. */
export function encodeFrame(payload: Uint8Array, maxLength: number = Infinity): Uint8Array {
  checkPayloadLength(payload, maxLength);
  const header = encodeFrameHeader(payload.length);
  const framed = new Uint8Array(FRAME_HEADER_LENGTH + payload.length);
  framed.set(header, 0);
  framed.set(payload, FRAME_HEADER_LENGTH);
  return framed;
}

/**
 * Decode one frame starting at `offset`.
 *
 * Returns `null` when `buf` does not yet hold the whole frame.
 */
export function decodeFrame(buf: Uint8Array, offset = 0): { value: Uint8Array; next: number } | null {
  const bodyStart = offset + FRAME_HEADER_LENGTH;
  if (buf.length < bodyStart) return null;

  const length = parseFrameHeader(buf.subarray(offset, bodyStart));
  const next = bodyStart + length;
  if (buf.length < next) return null;

  return { value: buf.slice(bodyStart, next), next };
}

/** The 16 bytes `"         6$close"`. */
export const CLOSE_FRAME: Uint8Array = encodeFrame(encodeText(CLOSE_TOKEN));
