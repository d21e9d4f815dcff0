import { PassThrough } from "node:stream";
import { expect } from "vitest";
import { encodeFrame, FrameDecoder, type Frame } from "../../src/protocols/frame/codec.js";
import type { ControlMessage } from "../../src/protocols/control/types.js";
import { parseControl } from "../../src/protocols/control/validate.js";
import { isRecord } from "../../src/bridge/helpers.js";

const NEXT_TIMEOUT_MS = 2_000;

/**
 * Front end for a session under test: writes frames into `toBridge`, decodes
 * what the bridge writes to `fromBridge` and hands it out one frame at a time.
 */
export class MockTransport {
  readonly toBridge = new PassThrough();
  readonly fromBridge = new PassThrough();
  private readonly decoder = new FrameDecoder();
  private readonly queue: Frame[] = [];
  private waiters: Array<() => boolean> = [];
  private ended = false;

  constructor() {
    this.fromBridge.on("data", (chunk: Buffer) => {
      this.queue.push(...this.decoder.push(chunk));
      this.wake();
    });
    this.fromBridge.on("end", () => {
      this.ended = true;
      this.wake();
    });
  }

  send(channel: string, payload: Buffer | string): void {
    this.toBridge.write(encodeFrame(channel, payload));
  }

  sendJson(channel: string, message: object): void {
    this.send(channel, JSON.stringify(message));
  }

  control(command: string, fields: Record<string, unknown> = {}): void {
    this.sendJson("", { command, ...fields });
  }

  /** Close the front end's side of the connection. */
  end(): void {
    this.toBridge.end();
  }

  async next(): Promise<Frame> {
    const frame = await this.take();
    if (!frame) throw new Error("Bridge closed its output");
    return frame;
  }

  async nextControl(): Promise<ControlMessage> {
    const frame = await this.next();
    expect(frame.channel).toBe("");
    return parseControl(frame.payload);
  }

  async assertControl(command: string, fields: Record<string, unknown> = {}): Promise<ControlMessage> {
    const message = await this.nextControl();
    expect(message).toMatchObject({ command, ...fields });
    return message;
  }

  async assertData(channel: string, data: string): Promise<void> {
    const frame = await this.next();
    expect(frame.channel).toBe(channel);
    expect(frame.payload.toString("utf8")).toBe(data);
  }

  async nextJson(channel: string): Promise<Record<string, unknown>> {
    const frame = await this.next();
    expect(frame.channel).toBe(channel);
    return parseRecord(frame.payload);
  }

  async collectJson(channel: string, count: number): Promise<Array<Record<string, unknown>>> {
    const messages: Array<Record<string, unknown>> = [];
    while (messages.length < count) messages.push(await this.nextJson(channel));
    return messages;
  }

  /** Resolves once the bridge has ended its output with nothing left unread. */
  async assertEnd(): Promise<void> {
    const frame = await this.take();
    expect(frame).toBeNull();
  }

  /** Exchange `init` messages; returns the bridge's. */
  async init(fields: Record<string, unknown> = {}): Promise<ControlMessage> {
    const init = await this.assertControl("init", { version: 1 });
    this.control("init", { version: 1, ...fields });
    return init;
  }

  async open(channel: string, payload: string, options: Record<string, unknown> = {}): Promise<void> {
    this.control("open", { channel, payload, ...options });
    await this.assertControl("ready", { channel });
  }

  async openBus(channel: string, options: Record<string, unknown> = {}): Promise<void> {
    await this.open(channel, "dbus-json3", { bus: "internal", ...options });
  }

  /** Send a bus call and return the next message on the channel (normally its reply). */
  async call(
    channel: string,
    id: string,
    path: string,
    iface: string,
    method: string,
    args: unknown[] = []
  ): Promise<Record<string, unknown>> {
    this.sendJson(channel, { call: [path, iface, method, args], id });
    return this.nextJson(channel);
  }

  watch(channel: string, id: string, path: string, iface?: string): void {
    this.sendJson(channel, { watch: { path, ...(iface !== undefined && { interface: iface }) }, id });
  }

  private take(): Promise<Frame | null> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== attempt);
        reject(new Error(`No frame within ${NEXT_TIMEOUT_MS}ms`));
      }, NEXT_TIMEOUT_MS);
      const attempt = () => {
        const frame = this.queue.shift();
        if (frame) {
          clearTimeout(timer);
          resolve(frame);
          return true;
        }
        if (this.ended) {
          clearTimeout(timer);
          resolve(null);
          return true;
        }
        return false;
      };
      if (!attempt()) this.waiters.push(attempt);
    });
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const attempt of waiters) {
      if (!attempt()) this.waiters.push(attempt);
    }
  }
}

function parseRecord(payload: Buffer): Record<string, unknown> {
  const value: unknown = JSON.parse(payload.toString("utf8"));
  if (!isRecord(value)) throw new Error(`Expected a JSON object, got ${payload.toString("utf8")}`);
  return value;
}
