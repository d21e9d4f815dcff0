import type { SuperuserBridgeConfig } from "../../config.js";
import { checkSchema } from "../../protocols/assert.js";
import {
  PeerAuthorizeSchema,
  PeerInitSchema,
  type ControlMessage,
  type PeerAuthorizeMessage,
} from "../../protocols/control/types.js";
import { parseControl } from "../../protocols/control/validate.js";
import { PROTOCOL_VERSION } from "../../shared/constants.js";
import { PeerError, errorMessage } from "../../shared/errors.js";
import type { Logger } from "../../shared/logging.js";
import { FrameTransport, type PeerProcess } from "../transport.js";

export type PeerState = "connecting" | "running" | "closed";

export interface PeerHandlers {
  /** The peer wants a secret answered with `answer(cookie, response)`. */
  onAuthorize(request: PeerAuthorizeMessage): void;
  /** Data frame for a routed channel. */
  onData(channel: string, payload: Buffer): void;
  /** Channel-addressed control message from a running peer. */
  onControl(message: ControlMessage): void;
  /** A running peer went away without `close()`. */
  onExit(reason: string): void;
}

export interface PeerBridgeOptions {
  hostname: string;
  logger: Logger;
  handlers: PeerHandlers;
}

/**
 * A nested bridge in a child process. The peer speaks the same framed
 * protocol; it may ask for authentication, then sends `init`, which we answer
 * with our own. From then on channel traffic is relayed in both directions.
 */
export class PeerBridge {
  private currentState: PeerState = "connecting";
  private readonly transport: FrameTransport;
  private readonly logger: Logger;
  private stderr = "";
  private started: { resolve: () => void; reject: (err: PeerError) => void } | null = null;

  constructor(
    readonly config: SuperuserBridgeConfig,
    private readonly child: PeerProcess,
    private readonly options: PeerBridgeOptions
  ) {
    this.logger = options.logger.child({ peer: config.label });
    this.transport = new FrameTransport(child.stdout, child.stdin, this.logger);
    child.stdin.on("error", (err: Error) => this.logger.debug({ err }, "Peer stdin error"));
    child.stderr?.on("data", (chunk: Buffer | string) => {
      const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      this.stderr += text;
      this.logger.debug({ stderr: text.trimEnd() }, "peer stderr");
    });
    child.onExit((code, error) => this.handleExit(code, error));
  }

  get state(): PeerState {
    return this.currentState;
  }

  get label(): string {
    return this.config.label;
  }

  /** Resolves once the peer's `init` arrives; rejects with the peer's own failure text. */
  start(): Promise<void> {
    const ready = new Promise<void>((resolve, reject) => {
      this.started = { resolve, reject };
    });
    this.pump().catch((err: unknown) => this.fail(errorMessage(err)));
    return ready;
  }

  answer(cookie: string, response: string): void {
    this.transport.writeControl({ command: "authorize", cookie, response });
  }

  sendFrame(channel: string, payload: Buffer): void {
    this.transport.writeFrame(channel, payload);
  }

  sendControl(message: ControlMessage): void {
    this.transport.writeControl(message);
  }

  /** Stop relaying and terminate the peer. Idempotent. */
  close(): void {
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.settle(new PeerError("Superuser bridge was stopped"));
    this.transport.close();
    this.child.kill();
  }

  private async pump(): Promise<void> {
    for await (const frame of this.transport.frames()) {
      if (this.currentState === "closed") return;
      if (frame.channel === "") {
        this.handleControl(parseControl(frame.payload));
      } else if (this.currentState === "running") {
        this.options.handlers.onData(frame.channel, frame.payload);
      } else {
        this.logger.debug({ channel: frame.channel }, "Dropping peer data before init");
      }
    }
  }

  private handleControl(message: ControlMessage): void {
    this.logger.debug({ message }, `peer ${message.command}`);
    if (message.command === "init") {
      this.handleInit(message);
      return;
    }
    if (message.command === "authorize") {
      const request = checkSchema(PeerAuthorizeSchema, message);
      if (request) this.options.handlers.onAuthorize(request);
      else this.logger.warn("Ignoring malformed authorize from peer");
      return;
    }
    if (message.command === "ping" && message.channel === undefined) {
      this.transport.writeControl({ ...message, command: "pong" });
      return;
    }
    if (this.currentState === "running" && message.channel !== undefined) {
      this.options.handlers.onControl(message);
      return;
    }
    this.logger.debug({ command: message.command }, "Ignoring peer control message");
  }

  private handleInit(message: ControlMessage): void {
    if (this.currentState !== "connecting") return;
    const init = checkSchema(PeerInitSchema, message);
    if (!init) {
      this.fail("Superuser bridge sent an invalid init message");
      return;
    }
    if (init.problem !== undefined) {
      this.fail(init.message ?? init.problem);
      return;
    }
    this.transport.writeControl({ command: "init", version: PROTOCOL_VERSION, host: this.options.hostname });
    this.currentState = "running";
    this.settle();
  }

  private fail(reason: string): void {
    if (this.currentState === "closed") return;
    const wasRunning = this.currentState === "running";
    this.logger.warn({ reason }, "Superuser bridge failed");
    this.settle(new PeerError(reason));
    this.close();
    if (wasRunning) this.options.handlers.onExit(reason);
  }

  private handleExit(code: number | null, error?: Error): void {
    if (this.currentState === "closed") return;
    const stderr = this.stderr.trim();
    const reason = stderr || error?.message || `Superuser bridge exited with code ${String(code)}`;
    const wasRunning = this.currentState === "running";
    this.settle(new PeerError(reason));
    this.currentState = "closed";
    this.transport.close();
    if (wasRunning) this.options.handlers.onExit(reason);
  }

  private settle(error?: PeerError): void {
    const pending = this.started;
    if (!pending) return;
    this.started = null;
    if (error) pending.reject(error);
    else pending.resolve();
  }
}
