/**
 * Frame codec for the multiplexed stream.
 *
 * Wire format: `<length>\n<channel>\n<payload>`, where `<length>` is the ASCII
 * decimal byte count of `<channel>\n<payload>`. An empty channel marks a control
 * frame whose payload is a single JSON object.
 */

import { DEFAULT_MAX_FRAME_SIZE } from "../../shared/constants.js";
import { TransportError } from "../../shared/errors.js";

const NEWLINE = 0x0a;
const MAX_LENGTH_DIGITS = 8;

export interface Frame {
  channel: string;
  payload: Buffer;
}

/** Encode one frame as a single contiguous buffer, so a write never interleaves with another. */
export function encodeFrame(channel: string, payload: Buffer | string): Buffer {
  const body = Buffer.concat([
    Buffer.from(`${channel}\n`, "utf8"),
    typeof payload === "string" ? Buffer.from(payload, "utf8") : payload,
  ]);
  return Buffer.concat([Buffer.from(`${body.length}\n`, "ascii"), body]);
}

export function encodeControl(message: object): Buffer {
  return encodeFrame("", JSON.stringify(message));
}

/**
 * Stateful decoder that handles partial reads and several frames per chunk.
 *
 * Throws TransportError on a malformed length prefix, a frame larger than
 * `maxFrameSize`, or a frame body without the channel terminator.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE) {}

  push(chunk: Buffer): Frame[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: Frame[] = [];

    for (;;) {
      const lineEnd = this.buffer.indexOf(NEWLINE);
      if (lineEnd === -1) {
        if (this.buffer.length > MAX_LENGTH_DIGITS) this.fail("Frame length prefix is too long");
        break;
      }

      const prefix = this.buffer.subarray(0, lineEnd).toString("ascii");
      if (!/^[1-9][0-9]{0,7}$/.test(prefix)) {
        this.fail(`Invalid frame length prefix: ${JSON.stringify(prefix.slice(0, 16))}`);
      }
      const length = Number(prefix);
      if (length > this.maxFrameSize) {
        this.fail(`Frame size ${length} exceeds maximum ${this.maxFrameSize}`);
      }

      const start = lineEnd + 1;
      if (this.buffer.length < start + length) break;

      const body = this.buffer.subarray(start, start + length);
      const channelEnd = body.indexOf(NEWLINE);
      if (channelEnd === -1) this.fail("Frame is missing its channel terminator");

      frames.push({
        channel: body.subarray(0, channelEnd).toString("utf8"),
        payload: Buffer.from(body.subarray(channelEnd + 1)),
      });
      this.buffer = this.buffer.subarray(start + length);
    }

    return frames;
  }

  /** Bytes received that do not yet form a complete frame. */
  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }

  private fail(message: string): never {
    this.buffer = Buffer.alloc(0);
    throw new TransportError(message);
  }
}

/**
 * Lazily decode frames from a byte source. Ends when the source ends cleanly;
 * throws TransportError on malformed framing or a frame cut off by the end of
 * the stream.
 */
export async function* readFrames(
  source: AsyncIterable<Buffer | string>,
  maxFrameSize?: number
): AsyncGenerator<Frame, void, undefined> {
  const decoder = new FrameDecoder(maxFrameSize);
  for await (const chunk of source) {
    yield* decoder.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  if (decoder.pending > 0) {
    throw new TransportError(`Transport closed with ${decoder.pending} bytes of an incomplete frame`);
  }
}
