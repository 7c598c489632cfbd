import { describe, it, expect } from "vitest";
import {
  CLOSE_FRAME,
  FRAME_HEADER_LENGTH,
  decodeFrame,
  decodeText,
  encodeFrame,
  encodeFrameHeader,
  encodeText,
  parseFrameHeader,
} from "./frame.ts";
import { ChannelError, OversizedPayloadError } from "./errors.ts";

function ascii(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes);
}

describe("encodeFrameHeader", () => {
  it("right-justifies the length in 10 characters", () => {
    expect(ascii(encodeFrameHeader(6))).toBe("         6");
    expect(ascii(encodeFrameHeader(0))).toBe("         0");
    expect(ascii(encodeFrameHeader(1234567890 - 1))).toBe("1234567889");
  });

  it("rejects lengths the header cannot hold", () => {
    expect(() => encodeFrameHeader(10_000_000_000)).toThrow(RangeError);
    expect(() => encodeFrameHeader(-1)).toThrow(RangeError);
    expect(() => encodeFrameHeader(1.5)).toThrow(RangeError);
  });
});

describe("parseFrameHeader", () => {
  it("parses space-padded decimals", () => {
    expect(parseFrameHeader(encodeText("        42"))).toBe(42);
    expect(parseFrameHeader(encodeText("0000000007"))).toBe(7);
  });

  it("tolerates trailing whitespace", () => {
    expect(parseFrameHeader(encodeText("12        "))).toBe(12);
  });

  it("rejects non-numeric headers as protocol violations", () => {
    let caught: unknown;
    try {
      parseFrameHeader(encodeText("success ok"));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ChannelError);
    expect(caught).toMatchObject({ kind: "protocol_violation" });
  });

  it("rejects short headers", () => {
    expect(() => parseFrameHeader(encodeText("   6"))).toThrow(/must be 10 bytes, got 4/);
  });

  it("tolerates only ASCII whitespace around the digits", () => {
    expect(parseFrameHeader(encodeText("\t\r\n    42 "))).toBe(42);

    const nbsp = new Uint8Array(FRAME_HEADER_LENGTH);
    nbsp.fill(0x20);
    nbsp[0] = 0xa0;
    nbsp[9] = 0x35;
    expect(() => parseFrameHeader(nbsp)).toThrow(ChannelError);
  });

  it("rejects signed numbers", () => {
    expect(() => parseFrameHeader(encodeText("        -6"))).toThrow(ChannelError);
  });
});

describe("encodeFrame", () => {
  it("prefixes the payload with its byte length", () => {
    const framed = encodeFrame(encodeText("hello"));
    expect(framed.length).toBe(FRAME_HEADER_LENGTH + 5);
    expect(ascii(framed)).toBe("         5hello");
  });

  it("counts UTF-8 bytes, not characters", () => {
    const framed = encodeFrame(encodeText("héllo"));
    expect(ascii(framed.subarray(0, FRAME_HEADER_LENGTH))).toBe("         6");
  });

  it("rejects payloads above the limit with both sizes", () => {
    let caught: unknown;
    try {
      encodeFrame(encodeText("abcdef"), 4);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(OversizedPayloadError);
    expect(caught).toMatchObject({
      actual: 6,
      allowed: 4,
      kind: "oversized_payload",
      message: "Data exceeds max transmission length 6 > 4",
    });
  });

  it("accepts payloads exactly at the limit", () => {
    expect(encodeFrame(encodeText("abcd"), 4).length).toBe(14);
  });
});

describe("decodeFrame", () => {
  it("returns the payload and the offset after it", () => {
    const framed = encodeFrame(encodeText("success hi there"));
    const decoded = decodeFrame(framed);
    expect(decoded).not.toBeNull();
    expect(decodeText(decoded?.value ?? new Uint8Array())).toBe("success hi there");
    expect(decoded?.next).toBe(framed.length);
  });

  it("decodes consecutive frames", () => {
    const a = encodeFrame(encodeText("one"));
    const b = encodeFrame(encodeText("two"));
    const both = new Uint8Array(a.length + b.length);
    both.set(a, 0);
    both.set(b, a.length);

    const first = decodeFrame(both);
    expect(first?.next).toBe(13);
    const second = decodeFrame(both, first?.next);
    expect(decodeText(second?.value ?? new Uint8Array())).toBe("two");
    expect(second?.next).toBe(26);
  });

  it("returns null for an incomplete header or body", () => {
    expect(decodeFrame(encodeText("     "))).toBeNull();
    expect(decodeFrame(encodeText("         5hel"))).toBeNull();
  });

  it("round-trips multi-byte payloads byte for byte", () => {
    const text = "λ → (car '(1 2 3))\nnext line";
    const decoded = decodeFrame(encodeFrame(encodeText(text)));
    expect(decodeText(decoded?.value ?? new Uint8Array())).toBe(text);
  });
});

describe("CLOSE_FRAME", () => {
  it("is the 16-byte close handshake", () => {
    expect(CLOSE_FRAME.length).toBe(16);
    expect(ascii(CLOSE_FRAME)).toBe("         6$close");
  });
});

describe("decodeText", () => {
  it("rejects invalid UTF-8", () => {
    expect(() => decodeText(new Uint8Array([0xff, 0xfe]))).toThrow(/not valid UTF-8/);
  });
});
