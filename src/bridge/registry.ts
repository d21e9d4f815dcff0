import type { ControlMessage } from "../protocols/control/types.js";
import { ChannelError, ProtocolError, errorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logging.js";
import type { Channel, ChannelContext, ChannelType } from "./channels/index.js";
import type { PeerBridge } from "./superuser/peer.js";

/**
 * Open local channels by id, plus the ids whose traffic is routed to the
 * superuser peer. An id lives in at most one of the two.
 */
export class ChannelRegistry {
  private readonly channels = new Map<string, Channel>();
  private readonly routes = new Map<string, PeerBridge>();
  private readonly context: ChannelContext;

  constructor(
    private readonly types: ReadonlyMap<string, ChannelType>,
    context: Omit<ChannelContext, "release">,
    private readonly logger: Logger
  ) {
    this.context = { ...context, release: (channel) => this.release(channel) };
  }

  has(id: string): boolean {
    return this.channels.has(id) || this.routes.has(id);
  }

  get(id: string): Channel | undefined {
    return this.channels.get(id);
  }

  list(): Channel[] {
    return [...this.channels.values()];
  }

  /**
   * Construct and start the endpoint for `options.payload`. Refusals are sent
   * as `close` and leave nothing registered; a duplicate id throws.
   */
  open(id: string, options: Readonly<ControlMessage>): Channel | undefined {
    if (this.has(id)) {
      throw new ProtocolError(`Channel id "${id}" is already open`);
    }
    const payload = typeof options.payload === "string" ? options.payload : "";
    const Type = this.types.get(payload);
    if (!Type) {
      this.logger.debug({ channel: id, payload }, "Unsupported payload");
      this.context.transport.writeControl({ command: "close", channel: id, problem: "not-supported" });
      return undefined;
    }

    let channel: Channel;
    try {
      channel = new Type(id, options, {
        ...this.context,
        logger: this.context.logger.child({ channel: id }),
      });
    } catch (err) {
      this.refuse(id, payload, err);
      return undefined;
    }
    this.channels.set(id, channel);
    channel.start();
    return channel;
  }

  private refuse(id: string, payload: string, err: unknown): void {
    if (err instanceof ChannelError) {
      this.logger.debug({ channel: id, payload, problem: err.problem }, "Channel refused");
      this.context.transport.writeControl({
        command: "close",
        channel: id,
        ...err.extra,
        ...(err.message !== err.problem && { message: err.message }),
        problem: err.problem,
      });
      return;
    }
    this.logger.error({ err, channel: id, payload }, "Channel construction failed");
    this.context.transport.writeControl({
      command: "close",
      channel: id,
      problem: "internal-error",
      message: errorMessage(err),
    });
  }

  /** Forget a channel whose `close` has been written. */
  release(channel: Channel): void {
    if (this.channels.get(channel.id) === channel) this.channels.delete(channel.id);
  }

  close(id: string, problem?: string): void {
    this.channels.get(id)?.close(problem);
  }

  closeAll(problem?: string): void {
    for (const channel of this.list()) channel.close(problem);
  }

  route(id: string, peer: PeerBridge): void {
    if (this.has(id)) {
      throw new ProtocolError(`Channel id "${id}" is already open`);
    }
    this.routes.set(id, peer);
  }

  routeOf(id: string): PeerBridge | undefined {
    return this.routes.get(id);
  }

  unroute(id: string): void {
    this.routes.delete(id);
  }

  routedTo(peer: PeerBridge): string[] {
    const ids: string[] = [];
    for (const [id, target] of this.routes) if (target === peer) ids.push(id);
    return ids;
  }
}
