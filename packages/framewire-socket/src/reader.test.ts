import { describe, it, expect } from "vitest";
import { ChannelError, decodeText, encodeText } from "@framewire/wire";
import { SocketReader } from "./reader.ts";
import { FakeSocket } from "./testing/fake-socket.ts";

function setup() {
  const socket = new FakeSocket();
  const reader = new SocketReader(socket);
  return { socket, reader };
}

function text(bytes: Uint8Array | null): string | null {
  return bytes === null ? null : decodeText(bytes);
}

describe("SocketReader", () => {
  it("reads exactly the requested length and keeps the rest", async () => {
    const { socket, reader } = setup();
    socket.push(encodeText("abcdef"));

    expect(text(await reader.readExact(4))).toBe("abcd");
    expect(reader.buffered).toBe(2);
    expect(text(await reader.readExact(2))).toBe("ef");
  });

  it("accumulates partial chunks", async () => {
    const { socket, reader } = setup();
    const pending = reader.readExact(6);
    socket.push(encodeText("ab"));
    setTimeout(() => socket.push(encodeText("cd")), 1);
    setTimeout(() => socket.push(encodeText("efgh")), 3);

    expect(text(await pending)).toBe("abcdef");
    expect(reader.buffered).toBe(2);
  });

  it("resolves zero-length reads immediately", async () => {
    const { reader } = setup();
    expect(await reader.readExact(0)).toEqual(new Uint8Array(0));
  });

  it("returns null when the stream ends short", async () => {
    const { socket, reader } = setup();
    const pending = reader.readExact(10);
    socket.push(encodeText("abc"));
    socket.endStream();

    expect(await pending).toBeNull();
    expect(reader.isEnded).toBe(true);
  });

  it("returns null when the timeout elapses", async () => {
    const { reader } = setup();
    expect(await reader.readExact(1, { timeoutMs: 5 })).toBeNull();
  });

  it("rejects with a transport error after a socket error", async () => {
    const { socket, reader } = setup();
    const pending = reader.readExact(4);
    socket.emit("error", new Error("read ECONNRESET"));

    await expect(pending).rejects.toMatchObject({
      kind: "transport",
      message: "socket error: read ECONNRESET",
    });
  });

  it("rejects with receive_aborted when the signal fires mid-read", async () => {
    const { socket, reader } = setup();
    const controller = new AbortController();
    const pending = reader.readExact(4, { signal: controller.signal });
    setTimeout(() => controller.abort(), 1);

    await expect(pending).rejects.toBeInstanceOf(ChannelError);
    await expect(pending).rejects.toMatchObject({ kind: "receive_aborted" });

    socket.push(encodeText("late"));
    expect(text(await reader.readExact(4))).toBe("late");
  });

  it("rejects at once when the signal is already aborted", async () => {
    const { socket, reader } = setup();
    socket.push(encodeText("ready"));
    const controller = new AbortController();
    controller.abort();

    await expect(reader.readExact(5, { signal: controller.signal })).rejects.toMatchObject({
      kind: "receive_aborted",
    });
    expect(reader.buffered).toBe(5);
  });

  it("refuses overlapping reads", async () => {
    const { socket, reader } = setup();
    const first = reader.readExact(2);
    await expect(reader.readExact(2)).rejects.toThrow("a read is already in progress");
    socket.push(encodeText("ok"));
    expect(text(await first)).toBe("ok");
  });

  describe("readFrame", () => {
    it("returns the payload of a whole frame and keeps what follows", async () => {
      const { socket, reader } = setup();
      socket.push(encodeText("         2ok   "));

      expect(text(await reader.readFrame())).toBe("ok");
      expect(reader.buffered).toBe(3);
    });

    it("leaves a partial frame buffered when the read times out", async () => {
      const { socket, reader } = setup();
      socket.push(encodeText("         5ab"));

      expect(await reader.readFrame({ timeoutMs: 5 })).toBeNull();
      expect(reader.buffered).toBe(12);

      socket.push(encodeText("cde"));
      expect(text(await reader.readFrame())).toBe("abcde");
      expect(reader.buffered).toBe(0);
    });

    it("leaves a partial frame buffered when the read is aborted", async () => {
      const { socket, reader } = setup();
      const controller = new AbortController();
      socket.push(encodeText("         3"));
      const pending = reader.readFrame({ signal: controller.signal });
      setTimeout(() => controller.abort(), 1);

      await expect(pending).rejects.toMatchObject({ kind: "receive_aborted" });
      expect(reader.buffered).toBe(10);
    });

    it("returns null when the stream ends mid-frame", async () => {
      const { socket, reader } = setup();
      socket.push(encodeText("         9abc"));
      socket.endStream();

      expect(await reader.readFrame()).toBeNull();
    });

    it("rejects a malformed header", async () => {
      const { socket, reader } = setup();
      socket.push(encodeText("oops!!!!!!"));

      await expect(reader.readFrame()).rejects.toMatchObject({ kind: "protocol_violation" });
    });
  });

  describe("waitReadable", () => {
    it("is true when bytes are already buffered", async () => {
      const { socket, reader } = setup();
      socket.push(encodeText("x"));
      expect(await reader.waitReadable(5)).toBe(true);
    });

    it("is true when bytes arrive before the timeout", async () => {
      const { socket, reader } = setup();
      const pending = reader.waitReadable(1000);
      socket.push(encodeText("x"));
      expect(await pending).toBe(true);
    });

    it("is false on timeout", async () => {
      const { reader } = setup();
      expect(await reader.waitReadable(5)).toBe(false);
    });

    it("is false once the stream has ended", async () => {
      const { socket, reader } = setup();
      socket.endStream();
      expect(await reader.waitReadable(1000)).toBe(false);
    });
  });
});
