import type { SuperuserBridgeConfig } from "../../config.js";
import type { ControlMessage, PeerAuthorizeMessage } from "../../protocols/control/types.js";
import { SUPERUSER_ERROR, SUPERUSER_INTERFACE } from "../../shared/constants.js";
import { BusError, errorMessage } from "../../shared/errors.js";
import type { Logger } from "../../shared/logging.js";
import { BusObject, method, property, signal, type BusMember } from "../bus/object.js";
import { stringValue } from "../helpers.js";
import type { ChannelRegistry } from "../registry.js";
import type { FrameSink, PeerSpawner } from "../transport.js";
import { PeerBridge } from "./peer.js";

/** Receives authentication requests when elevation is driven by the front end's `init`. */
export type Prompter = (request: PeerAuthorizeMessage) => void;

export interface SuperuserRuleOptions {
  bridges: readonly SuperuserBridgeConfig[];
  /** This bridge already runs as root. */
  privileged: boolean;
  hostname: string;
  spawnPeer: PeerSpawner;
  registry: ChannelRegistry;
  transport: FrameSink;
  logger: Logger;
}

/**
 * `/superuser`: starts and stops the privileged peer bridge and exposes its
 * state as `Current` ("none", "init", a bridge label, or "root" when this
 * bridge is itself privileged).
 */
export class SuperuserRule extends BusObject {
  readonly interfaceName = SUPERUSER_INTERFACE;
  private current: string;
  private peer: PeerBridge | null = null;
  private pendingPrompt: { peer: PeerBridge; cookie: string } | null = null;
  private readonly bridges: readonly SuperuserBridgeConfig[];
  private readonly logger: Logger;

  constructor(private readonly options: SuperuserRuleOptions) {
    super();
    this.current = options.privileged ? "root" : "none";
    this.bridges = options.privileged ? [] : options.bridges.filter((b) => b.privileged);
    this.logger = options.logger.child({ component: "superuser" });
  }

  protected members(): readonly BusMember[] {
    return [
      property("Bridges", "as", () => this.bridges.map((b) => b.label)),
      property("Current", "s", () => this.current),
      property("Methods", "a{sv}", () => {
        const methods: Record<string, { t: string; v: Record<string, { t: string; v: string }> }> = {};
        for (const b of this.bridges) {
          methods[b.label] = { t: "a{sv}", v: { label: { t: "s", v: b.label } } };
        }
        return methods;
      }),
      method("Start", ["s"], [], async ([label]) => {
        await this.start(stringValue(label) ?? "");
        return [];
      }),
      method("Stop", [], [], () => {
        this.stop();
        return [];
      }),
      method("Answer", ["s"], [], ([response]) => {
        this.answer(stringValue(response) ?? "");
        return [];
      }),
      signal("Prompt", ["s", "s", "s", "b", "s"]),
    ];
  }

  get state(): string {
    return this.current;
  }

  /** The peer once its handshake is complete. */
  get activePeer(): PeerBridge | null {
    return this.peer?.state === "running" ? this.peer : null;
  }

  /** Label of the first bridge, for `superuser: {id: "any"}`. */
  get defaultLabel(): string | undefined {
    return this.bridges[0]?.label;
  }

  /**
   * Spawn the named bridge and wait for its handshake. Prompts go to `prompter`
   * when given, otherwise out as the Prompt signal.
   */
  async start(label: string, prompter?: Prompter): Promise<void> {
    if (this.options.privileged) {
      throw new BusError(SUPERUSER_ERROR, "This bridge already runs with administrative access");
    }
    const config = this.bridges.find((b) => b.label === label);
    if (!config) {
      throw new BusError(SUPERUSER_ERROR, `Unknown superuser bridge type "${label}"`);
    }
    if (this.peer) {
      throw new BusError(
        SUPERUSER_ERROR,
        this.peer.state === "running" ? "A superuser bridge is already running" : "A superuser bridge is already starting"
      );
    }

    let peer: PeerBridge;
    try {
      peer = new PeerBridge(config, this.options.spawnPeer(config), {
        hostname: this.options.hostname,
        logger: this.logger,
        handlers: {
          onAuthorize: (request) => this.prompt(peer, request, prompter),
          onData: (channel, payload) => this.relayData(peer, channel, payload),
          onControl: (message) => this.relayControl(peer, message),
          onExit: (reason) => {
            this.logger.warn({ reason }, "Superuser bridge exited");
            if (this.peer === peer) this.stop();
          },
        },
      });
    } catch (err) {
      throw new BusError(SUPERUSER_ERROR, errorMessage(err));
    }
    this.peer = peer;
    this.setCurrent("init");
    this.logger.info({ label }, "Starting superuser bridge");

    try {
      await peer.start();
    } catch (err) {
      if (this.peer === peer) {
        this.peer = null;
        this.pendingPrompt = null;
        peer.close();
        this.setCurrent("none");
      }
      throw new BusError(SUPERUSER_ERROR, errorMessage(err));
    }
    this.pendingPrompt = null;
    this.setCurrent(label);
  }

  /** Close every channel routed to the peer, then terminate it. */
  stop(): void {
    const peer = this.peer;
    if (!peer) return;
    this.peer = null;
    this.pendingPrompt = null;
    for (const id of this.options.registry.routedTo(peer)) {
      this.options.registry.unroute(id);
      this.options.transport.writeControl({ command: "close", channel: id });
    }
    peer.close();
    this.setCurrent("none");
  }

  answer(response: string): void {
    const pending = this.pendingPrompt;
    if (!pending) {
      throw new BusError(SUPERUSER_ERROR, "No authentication prompt is pending");
    }
    this.pendingPrompt = null;
    pending.peer.answer(pending.cookie, response);
  }

  /** Answer a prompt that was forwarded to the front end. Returns false when the cookie is not pending. */
  answerCookie(cookie: string, response: string): boolean {
    if (this.pendingPrompt?.cookie !== cookie) return false;
    this.answer(response);
    return true;
  }

  private prompt(peer: PeerBridge, request: PeerAuthorizeMessage, prompter?: Prompter): void {
    if (this.peer !== peer) return;
    this.pendingPrompt = { peer, cookie: request.cookie };
    if (prompter) {
      prompter(request);
      return;
    }
    this.emitSignal("Prompt", [
      request.message ?? "",
      request.prompt ?? "",
      request.default ?? "",
      request.echo ?? false,
      request.error ?? "",
    ]);
  }

  private relayData(peer: PeerBridge, channel: string, payload: Buffer): void {
    if (this.options.registry.routeOf(channel) !== peer) {
      this.logger.debug({ channel }, "Dropping peer data for unrouted channel");
      return;
    }
    this.options.transport.writeFrame(channel, payload);
  }

  private relayControl(peer: PeerBridge, message: ControlMessage): void {
    const channel = message.channel;
    if (channel === undefined || this.options.registry.routeOf(channel) !== peer) {
      this.logger.debug({ command: message.command, channel }, "Dropping peer control for unrouted channel");
      return;
    }
    if (message.command === "close") this.options.registry.unroute(channel);
    this.options.transport.writeControl(message);
  }

  private setCurrent(value: string): void {
    if (this.current === value) return;
    this.current = value;
    this.propertiesChanged("Current");
  }
}
