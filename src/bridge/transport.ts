import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import type { SuperuserBridgeConfig } from "../config.js";
import { readFrames, encodeFrame, type Frame } from "../protocols/frame/codec.js";
import type { ControlMessage } from "../protocols/control/types.js";
import type { Logger } from "../shared/logging.js";
import { parseEnviron } from "./helpers.js";

/** Where outbound frames go. Writes after close are dropped. */
export interface FrameSink {
  writeFrame(channel: string, payload: Buffer | string): void;
  writeControl(message: ControlMessage): void;
}

/** One framed connection over a readable/writable byte stream pair (stdio, child pipes, test streams). */
export class FrameTransport implements FrameSink {
  private closed = false;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    private readonly logger: Logger
  ) {}

  frames(): AsyncGenerator<Frame, void, undefined> {
    return readFrames(this.input);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  writeFrame(channel: string, payload: Buffer | string): void {
    if (this.closed) {
      this.logger.trace({ channel }, "Dropping frame for closed transport");
      return;
    }
    this.output.write(encodeFrame(channel, payload));
  }

  writeControl(message: ControlMessage): void {
    this.logger.debug({ message }, `send ${message.command}`);
    this.writeFrame("", JSON.stringify(message));
  }

  /** Stop writing and end the output stream. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.output.writableEnded) this.output.end();
  }
}

const DEFAULT_ENV_ALLOWLIST = [
  "PATH",
  "HOME",
  "USER",
  "LOGNAME",
  "SHELL",
  "TERM",
  "LANG",
  "LC_ALL",
  "XDG_RUNTIME_DIR",
];

export function buildChildEnv(allowlist?: string[]): NodeJS.ProcessEnv {
  const keys = allowlist ?? DEFAULT_ENV_ALLOWLIST;
  const env: NodeJS.ProcessEnv = {};
  for (const key of keys) {
    if (process.env[key]) {
      env[key] = process.env[key];
    }
  }
  return env;
}

/** The parts of a spawned peer the superuser bridge relies on. */
export interface PeerProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable | null;
  kill(): void;
  /** Called once, after the process has exited and its stdio has closed. */
  onExit(listener: (code: number | null, error?: Error) => void): void;
}

export type PeerSpawner = (config: SuperuserBridgeConfig) => PeerProcess;

/** Spawn a peer bridge with piped stdio; `environ` entries override the allow-listed environment. */
export function spawnPeerProcess(config: SuperuserBridgeConfig): PeerProcess {
  const [command, ...args] = config.spawn;
  if (!command) {
    throw new Error(`Superuser bridge "${config.label}" has an empty spawn command`);
  }
  const child = spawn(command, args, {
    stdio: ["pipe", "pipe", "pipe"],
    env: { ...buildChildEnv(), ...parseEnviron(config.environ) },
  });

  let exited = false;
  const listeners: Array<(code: number | null, error?: Error) => void> = [];
  const finish = (code: number | null, error?: Error) => {
    if (exited) return;
    exited = true;
    for (const listener of listeners) listener(code, error);
  };
  child.once("close", (code) => finish(code));
  child.once("error", (error) => finish(null, error));

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    kill: () => {
      if (child.exitCode === null && child.signalCode === null) child.kill();
    },
    onExit: (listener) => {
      listeners.push(listener);
    },
  };
}
