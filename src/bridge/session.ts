import { hostname as osHostname } from "node:os";
import type { Readable, Writable } from "node:stream";
import type { SuperuserBridgeConfig } from "../config.js";
import type { InitMessage, PeerAuthorizeMessage } from "../protocols/control/types.js";
import { LOGIN_MESSAGES_PATH, PROTOCOL_VERSION, SUPERUSER_PATH } from "../shared/constants.js";
import { ProtocolError, errorMessage } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logging.js";
import { InternalBus } from "./bus/bus.js";
import { createChannelTypes, type ChannelType } from "./channels/index.js";
import { LoginMessages } from "./login-messages.js";
import { ChannelRegistry } from "./registry.js";
import { ControlRouter } from "./router.js";
import { SuperuserRule } from "./superuser/rule.js";
import { FrameTransport, spawnPeerProcess, type PeerSpawner } from "./transport.js";

export interface BridgeSessionOptions {
  input: Readable;
  output: Writable;
  /** Already running as root: no superuser bridges, `Current` is "root". */
  privileged?: boolean;
  hostname?: string;
  /** Extra host names accepted as local in `open`. */
  hosts?: readonly string[];
  superuserBridges?: readonly SuperuserBridgeConfig[];
  spawnPeer?: PeerSpawner;
  /** Descriptor holding the login messages; `null` for none. Read from the environment when omitted. */
  loginMessagesFd?: number | null;
  /** Additional endpoint types, by payload tag. */
  channelTypes?: readonly ChannelType[];
  logger?: Logger;
}

/**
 * One front-end connection: owns the transport, bus, registry and superuser
 * state, and tears them down together.
 */
export class BridgeSession {
  readonly hostname: string;
  readonly transport: FrameTransport;
  readonly bus: InternalBus;
  readonly registry: ChannelRegistry;
  readonly superuser: SuperuserRule;
  readonly loginMessages: LoginMessages;
  readonly router: ControlRouter;
  private readonly privileged: boolean;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: BridgeSessionOptions) {
    this.logger = options.logger ?? silentLogger();
    this.privileged = options.privileged ?? false;
    this.hostname = options.hostname ?? osHostname();
    this.transport = new FrameTransport(options.input, options.output, this.logger);
    this.bus = new InternalBus(this.logger.child({ component: "bus" }));
    this.registry = new ChannelRegistry(
      createChannelTypes(options.channelTypes),
      { transport: this.transport, bus: this.bus, logger: this.logger },
      this.logger.child({ component: "registry" })
    );
    this.superuser = new SuperuserRule({
      bridges: options.superuserBridges ?? [],
      privileged: this.privileged,
      hostname: this.hostname,
      spawnPeer: options.spawnPeer ?? spawnPeerProcess,
      registry: this.registry,
      transport: this.transport,
      logger: this.logger,
    });
    this.loginMessages =
      options.loginMessagesFd === undefined
        ? LoginMessages.fromEnvironment(this.logger)
        : new LoginMessages(options.loginMessagesFd, this.logger);
    this.bus.export(SUPERUSER_PATH, this.superuser);
    this.bus.export(LOGIN_MESSAGES_PATH, this.loginMessages);

    this.router = new ControlRouter({
      transport: this.transport,
      registry: this.registry,
      superuser: this.superuser,
      localHosts: new Set(["localhost", this.hostname, ...(options.hosts ?? [])]),
      logger: this.logger,
      onInit: (message) => this.handleInit(message),
      onAuthorize: (cookie, response) => {
        if (!this.superuser.answerCookie(cookie, response)) {
          this.logger.debug({ cookie }, "Ignoring authorize for unknown cookie");
        }
      },
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Send our `init` and process frames until the input ends. Rejects with the
   * ProtocolError that ended the session, after reporting it to the front end.
   */
  async run(): Promise<void> {
    this.transport.writeControl({
      command: "init",
      version: PROTOCOL_VERSION,
      host: this.hostname,
      superuser: { privileged: this.privileged },
      capabilities: { "explicit-superuser": true },
    });

    try {
      for await (const frame of this.transport.frames()) {
        if (this.closed) break;
        this.router.handleFrame(frame);
      }
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.logger.warn({ problem: err.problem }, err.message);
        this.transport.writeControl({ command: "close", problem: err.problem, message: err.message });
      } else {
        this.logger.error({ err }, "Session failed");
        this.transport.writeControl({ command: "close", problem: "internal-error", message: errorMessage(err) });
      }
      this.shutdown();
      throw err;
    }
    this.logger.debug("Input closed");
    this.shutdown();
  }

  /** Stop all output, close every channel and stop the superuser bridge. Idempotent. */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    this.transport.close();
    this.registry.closeAll();
    this.superuser.stop();
    this.loginMessages.dismiss();
  }

  private handleInit(init: InitMessage): void {
    const requested = init.superuser;
    if (typeof requested !== "object") return;

    const label = requested.id === "any" ? this.superuser.defaultLabel : requested.id;
    const done = () => this.transport.writeControl({ command: "superuser-init-done" });
    if (label === undefined) {
      this.logger.info("No superuser bridge configured for init");
      done();
      return;
    }
    const prompter = (request: PeerAuthorizeMessage) =>
      this.transport.writeControl({
        command: "authorize",
        cookie: request.cookie,
        challenge: "plain1:",
        prompt: request.prompt ?? "",
        ...(request.message !== undefined && { message: request.message }),
        ...(request.echo !== undefined && { echo: request.echo }),
      });

    this.superuser.start(label, prompter).then(
      () => done(),
      (err: unknown) => {
        this.logger.warn({ err: errorMessage(err) }, "Superuser elevation at init failed");
        done();
      }
    );
  }
}
