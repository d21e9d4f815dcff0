import { Readable } from "node:stream";
import { describe, it, expect } from "vitest";
import { encodeControl, encodeFrame, FrameDecoder, readFrames, type Frame } from "../../src/protocols/frame/codec.js";
import { TransportError } from "../../src/shared/errors.js";

async function collect(chunks: Array<Buffer | string>): Promise<Frame[]> {
  const frames: Frame[] = [];
  for await (const frame of readFrames(Readable.from(chunks))) frames.push(frame);
  return frames;
}

describe("encodeFrame", () => {
  it("prefixes the byte length of channel and payload", () => {
    expect(encodeFrame("ch", "hello").toString("utf8")).toBe("8\nch\nhello");
  });

  it("counts bytes, not characters", () => {
    expect(encodeFrame("c", "é").toString("utf8")).toBe("4\nc\né");
  });

  it("encodes control messages on the empty channel", () => {
    expect(encodeControl({ command: "ping" }).toString("utf8")).toBe('19\n\n{"command":"ping"}');
  });
});

describe("FrameDecoder", () => {
  it("decodes several frames from one chunk", () => {
    const decoder = new FrameDecoder();
    const frames = decoder.push(Buffer.concat([encodeFrame("a", "one"), encodeFrame("b", "two")]));
    expect(frames.map((f) => [f.channel, f.payload.toString("utf8")])).toEqual([
      ["a", "one"],
      ["b", "two"],
    ]);
    expect(decoder.pending).toBe(0);
  });

  it("reassembles a frame delivered one byte at a time", () => {
    const decoder = new FrameDecoder();
    const bytes = encodeFrame("chan", "payload");
    const frames: Frame[] = [];
    for (const byte of bytes) frames.push(...decoder.push(Buffer.from([byte])));
    expect(frames).toHaveLength(1);
    expect(frames[0]?.channel).toBe("chan");
    expect(frames[0]?.payload.toString("utf8")).toBe("payload");
  });

  it("keeps an incomplete tail pending", () => {
    const decoder = new FrameDecoder();
    expect(decoder.push(Buffer.from("10\nch\nab"))).toEqual([]);
    expect(decoder.pending).toBe(8);
  });

  it("allows an empty payload", () => {
    const frames = new FrameDecoder().push(Buffer.from("3\nch\n"));
    expect(frames[0]?.channel).toBe("ch");
    expect(frames[0]?.payload.length).toBe(0);
  });

  it("rejects a non-numeric length", () => {
    expect(() => new FrameDecoder().push(Buffer.from("abc\nx\n"))).toThrow('Invalid frame length prefix: "abc"');
  });

  it("rejects a length with a leading zero", () => {
    expect(() => new FrameDecoder().push(Buffer.from("05\nx\nabc"))).toThrow(TransportError);
  });

  it("rejects a length prefix longer than eight digits", () => {
    expect(() => new FrameDecoder().push(Buffer.from("123456789"))).toThrow("Frame length prefix is too long");
  });

  it("rejects frames over the size limit", () => {
    expect(() => new FrameDecoder(10).push(Buffer.from("11\n"))).toThrow("Frame size 11 exceeds maximum 10");
  });

  it("rejects a frame without a channel terminator", () => {
    expect(() => new FrameDecoder().push(Buffer.from("3\nabc"))).toThrow("Frame is missing its channel terminator");
  });
});

describe("readFrames", () => {
  it("yields frames split across chunks and ends with the stream", async () => {
    const frames = await collect(["5\nx\nab", "c3\ny\nz"]);
    expect(frames.map((f) => [f.channel, f.payload.toString("utf8")])).toEqual([
      ["x", "abc"],
      ["y", "z"],
    ]);
  });

  it("throws when the stream ends inside a frame", async () => {
    await expect(collect(["10\nch\nab"])).rejects.toThrow("Transport closed with 8 bytes of an incomplete frame");
  });
});
