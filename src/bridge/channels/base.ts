import type { ControlMessage } from "../../protocols/control/types.js";
import { ChannelError, errorMessage } from "../../shared/errors.js";
import type { Logger } from "../../shared/logging.js";
import type { InternalBus } from "../bus/bus.js";
import type { FrameSink } from "../transport.js";
import { FlowControlGate } from "./gate.js";

export type ChannelState = "opening" | "ready" | "active" | "done-received" | "done-sent" | "closed";

/** What an endpoint needs from its session. */
export interface ChannelContext {
  readonly transport: FrameSink;
  readonly bus: InternalBus;
  readonly logger: Logger;
  /** Called once the channel's `close` has actually been written. */
  release(channel: Channel): void;
}

type Outbound = { data: Buffer } | { control: ControlMessage };

/**
 * Abstract base for channel endpoints (echo, null, internal bus, ...).
 *
 * The router drives the public capability set: start, receive, receiveDone,
 * close, freeze, thaw. Subclasses implement the `on*` hooks and talk back with
 * ready/sendData/sendMessage/sendDone/close; everything they send goes through
 * the channel's FlowControlGate.
 */
export abstract class Channel {
  private currentState: ChannelState = "opening";
  private doneSent = false;
  private doneReceived = false;
  private readonly gate: FlowControlGate<Outbound>;
  protected readonly logger: Logger;

  constructor(
    readonly id: string,
    readonly options: Readonly<ControlMessage>,
    protected readonly ctx: ChannelContext
  ) {
    this.logger = ctx.logger;
    this.gate = new FlowControlGate<Outbound>((item) => this.write(item));
  }

  /** Called when the endpoint is being constructed; throw ChannelError to refuse the open. */
  protected abstract onStart(): void | Promise<void>;

  protected onData(_data: Buffer): void {
    this.close("protocol-error", { message: "This channel does not accept data" });
  }

  protected onDone(): void {}

  /** Release resources. Runs once, before the `close` frame is queued. */
  protected onClose(): void {}

  get state(): ChannelState {
    return this.currentState;
  }

  get isClosed(): boolean {
    return this.currentState === "closed";
  }

  get payload(): string {
    return typeof this.options.payload === "string" ? this.options.payload : "";
  }

  get group(): string {
    return typeof this.options.group === "string" ? this.options.group : "default";
  }

  start(): void {
    let pending: void | Promise<void>;
    try {
      pending = this.onStart();
    } catch (err) {
      this.fail(err);
      return;
    }
    if (pending instanceof Promise) {
      pending.catch((err: unknown) => this.fail(err));
    }
  }

  receive(data: Buffer): void {
    if (this.isClosed) return;
    if (this.doneReceived) {
      this.close("protocol-error", { message: "Received data after done" });
      return;
    }
    this.markActive();
    this.onData(data);
  }

  receiveDone(): void {
    if (this.isClosed) return;
    if (this.doneReceived) {
      this.close("protocol-error", { message: "Received done twice" });
      return;
    }
    this.doneReceived = true;
    this.currentState = "done-received";
    this.onDone();
  }

  /** Answer a channel-addressed ping through the gate, after any data already queued. */
  ping(message: Readonly<ControlMessage>): void {
    if (this.isClosed) return;
    this.gate.send({ control: { ...message, command: "pong", channel: this.id } });
  }

  /** Close the channel, optionally with a problem code. Idempotent. */
  close(problem?: string, extra: Record<string, unknown> = {}): void {
    if (this.isClosed) return;
    this.currentState = "closed";
    try {
      this.onClose();
    } catch (err) {
      this.logger.warn({ err }, "Channel cleanup failed");
    }
    this.gate.send({
      control: {
        command: "close",
        channel: this.id,
        ...extra,
        ...(problem !== undefined && { problem }),
      },
    });
  }

  freeze(): void {
    this.gate.freeze();
  }

  thaw(): void {
    this.gate.thaw();
  }

  get isFrozen(): boolean {
    return this.gate.isFrozen;
  }

  protected ready(extra: Record<string, unknown> = {}): void {
    if (this.currentState !== "opening") return;
    this.currentState = "ready";
    this.gate.send({ control: { ...extra, command: "ready", channel: this.id } });
  }

  protected sendData(data: Buffer | string): void {
    if (this.isClosed || this.doneSent) return;
    this.markActive();
    this.gate.send({ data: typeof data === "string" ? Buffer.from(data, "utf8") : data });
  }

  /** Send a JSON object as one data frame. */
  protected sendMessage(message: object): void {
    this.sendData(JSON.stringify(message));
  }

  protected sendDone(): void {
    if (this.isClosed || this.doneSent) return;
    this.doneSent = true;
    this.currentState = "done-sent";
    this.gate.send({ control: { command: "done", channel: this.id } });
  }

  private markActive(): void {
    if (this.currentState === "ready") this.currentState = "active";
  }

  private fail(err: unknown): void {
    if (err instanceof ChannelError) {
      this.close(err.problem, { ...err.extra, ...(err.message !== err.problem && { message: err.message }) });
      return;
    }
    this.logger.error({ err }, "Channel failed");
    this.close("internal-error", { message: errorMessage(err) });
  }

  private write(item: Outbound): void {
    if ("data" in item) {
      this.ctx.transport.writeFrame(this.id, item.data);
      return;
    }
    this.ctx.transport.writeControl(item.control);
    if (item.control.command === "close") this.ctx.release(this);
  }
}

export interface ChannelType {
  /** The `payload` tag this endpoint serves. */
  readonly payload: string;
  new (id: string, options: Readonly<ControlMessage>, ctx: ChannelContext): Channel;
}
