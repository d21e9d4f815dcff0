import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  PROTOCOL_ERROR: 3,
  PEER_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/**
 * A condition that ends the whole session: malformed control messages, unknown
 * commands, duplicate channel ids. The session answers with a channel-less
 * `close` carrying `problem` and stops reading.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    readonly problem = "protocol-error"
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** Malformed framing on the byte stream. */
export class TransportError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

/** Per-channel failure, reported as `close{channel, problem, ...extra}`. */
export class ChannelError extends Error {
  constructor(
    readonly problem: string,
    message?: string,
    readonly extra: Record<string, unknown> = {}
  ) {
    super(message ?? problem);
    this.name = "ChannelError";
  }
}

/** Failure of an internal bus call; `errorName` is the D-Bus style error name sent on the wire. */
export class BusError extends Error {
  constructor(
    readonly errorName: string,
    message: string
  ) {
    super(message);
    this.name = "BusError";
  }
}

/** The superuser peer failed to start, authenticate or stay alive. */
export class PeerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PeerError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
