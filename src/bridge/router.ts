import { assertSchema } from "../protocols/assert.js";
import {
  AuthorizeSchema,
  ChannelCommandSchema,
  CloseSchema,
  InitSchema,
  KillSchema,
  OpenSchema,
  type ControlMessage,
  type InitMessage,
  type KillMessage,
  type OpenMessage,
} from "../protocols/control/types.js";
import { parseControl } from "../protocols/control/validate.js";
import type { Frame } from "../protocols/frame/codec.js";
import { PROTOCOL_VERSION, RESERVED_CHANNEL_PREFIX } from "../shared/constants.js";
import { ProtocolError } from "../shared/errors.js";
import type { Logger } from "../shared/logging.js";
import type { ChannelRegistry } from "./registry.js";
import type { SuperuserRule } from "./superuser/rule.js";
import type { PeerBridge } from "./superuser/peer.js";
import type { FrameSink } from "./transport.js";

export interface RouterContext {
  readonly transport: FrameSink;
  readonly registry: ChannelRegistry;
  readonly superuser: SuperuserRule;
  /** Host names that mean "this machine" in `open`. */
  readonly localHosts: ReadonlySet<string>;
  readonly logger: Logger;
  onInit(message: InitMessage): void;
  onAuthorize(cookie: string, response: string): void;
}

/**
 * Dispatches inbound frames: control messages by command, data frames to the
 * local endpoint or the peer the channel is routed to. Throws ProtocolError
 * for anything that must end the session.
 */
export class ControlRouter {
  private initialized = false;
  private readonly logger: Logger;

  constructor(private readonly ctx: RouterContext) {
    this.logger = ctx.logger.child({ component: "router" });
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  handleFrame(frame: Frame): void {
    if (frame.channel === "") {
      this.handleControl(parseControl(frame.payload));
      return;
    }
    if (!this.initialized) {
      throw new ProtocolError("Received data before init");
    }
    this.logger.trace({ channel: frame.channel, size: frame.payload.length }, "recv data");
    const channel = this.ctx.registry.get(frame.channel);
    if (channel) {
      channel.receive(frame.payload);
      return;
    }
    const peer = this.ctx.registry.routeOf(frame.channel);
    if (peer) {
      peer.sendFrame(frame.channel, frame.payload);
      return;
    }
    this.logger.debug({ channel: frame.channel }, "Dropping data for unknown channel");
  }

  handleControl(message: ControlMessage): void {
    this.logger.debug({ message }, `recv ${message.command}`);
    if (!this.initialized && message.command !== "init") {
      throw new ProtocolError(`Received "${message.command}" before init`);
    }

    switch (message.command) {
      case "init":
        this.handleInit(message);
        return;
      case "open":
        this.handleOpen(assertSchema(OpenSchema, message, "open message"), message);
        return;
      case "done":
        this.handleDone(message);
        return;
      case "close":
        this.handleClose(message);
        return;
      case "ready":
      case "pong":
        this.relayIfRouted(message);
        return;
      case "ping":
        this.handlePing(message);
        return;
      case "kill":
        this.handleKill(assertSchema(KillSchema, message, "kill message"), message);
        return;
      case "authorize": {
        const auth = assertSchema(AuthorizeSchema, message, "authorize message");
        this.ctx.onAuthorize(auth.cookie, auth.response);
        return;
      }
      default:
        throw new ProtocolError(`Unknown control command "${message.command}"`);
    }
  }

  private handleInit(message: ControlMessage): void {
    if (this.initialized) {
      throw new ProtocolError("Received init twice");
    }
    const init = assertSchema(InitSchema, message, "init message");
    if (init.version !== PROTOCOL_VERSION) {
      throw new ProtocolError(`Unsupported protocol version ${init.version}`);
    }
    this.initialized = true;
    this.ctx.onInit(init);
  }

  private handleOpen(open: OpenMessage, message: ControlMessage): void {
    const id = open.channel;
    if (id.includes("\n")) {
      throw new ProtocolError(`Channel id ${JSON.stringify(id)} contains a newline`);
    }
    if (id.startsWith(RESERVED_CHANNEL_PREFIX)) {
      throw new ProtocolError(`Channel id "${id}" uses the reserved prefix "${RESERVED_CHANNEL_PREFIX}"`);
    }
    if (this.ctx.registry.has(id)) {
      throw new ProtocolError(`Channel id "${id}" is already open`);
    }

    if (open.host !== undefined && !this.ctx.localHosts.has(open.host)) {
      this.refuse(id, "no-host");
      return;
    }

    if (open.superuser === true || open.superuser === "require" || open.superuser === "try") {
      const peer = this.ctx.superuser.activePeer;
      if (peer) {
        this.forwardOpen(peer, message);
        return;
      }
      if (open.superuser !== "try") {
        this.refuse(id, "access-denied");
        return;
      }
    }

    this.ctx.registry.open(id, message);
  }

  private forwardOpen(peer: PeerBridge, message: ControlMessage): void {
    const { superuser: _superuser, host: _host, ...forwarded } = message;
    const id = message.channel ?? "";
    this.ctx.registry.route(id, peer);
    this.logger.debug({ channel: id, peer: peer.label }, "Routing channel to superuser bridge");
    peer.sendControl({ ...forwarded, command: "open", channel: id });
  }

  private handleDone(message: ControlMessage): void {
    const { channel: id } = assertSchema(ChannelCommandSchema, message, "done message");
    const channel = this.ctx.registry.get(id);
    if (channel) channel.receiveDone();
    else this.relayIfRouted(message);
  }

  private handleClose(message: ControlMessage): void {
    const close = assertSchema(CloseSchema, message, "close message");
    if (close.channel === undefined) {
      throw new ProtocolError("Received close without a channel");
    }
    const channel = this.ctx.registry.get(close.channel);
    if (channel) channel.close();
    else this.relayIfRouted(message);
  }

  private handlePing(message: ControlMessage): void {
    if (message.channel === undefined) {
      this.ctx.transport.writeControl({ ...message, command: "pong" });
      return;
    }
    const channel = this.ctx.registry.get(message.channel);
    if (channel) channel.ping(message);
    else this.relayIfRouted(message);
  }

  private handleKill(kill: KillMessage, message: ControlMessage): void {
    const hostMatches = kill.host === undefined || this.ctx.localHosts.has(kill.host);
    if (hostMatches) {
      for (const channel of this.ctx.registry.list()) {
        if (kill.group === undefined || channel.group === kill.group) channel.close("terminated");
      }
    }
    this.ctx.superuser.activePeer?.sendControl(message);
  }

  private relayIfRouted(message: ControlMessage): void {
    const id = message.channel;
    const peer = id === undefined ? undefined : this.ctx.registry.routeOf(id);
    if (peer) {
      peer.sendControl(message);
      return;
    }
    this.logger.debug({ command: message.command, channel: id }, "Ignoring message for unknown channel");
  }

  private refuse(channel: string, problem: string): void {
    this.ctx.transport.writeControl({ command: "close", channel, problem });
  }
}
