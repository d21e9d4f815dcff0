import { closeSync, fstatSync, readSync } from "node:fs";
import { LOGIN_MESSAGES_INTERFACE } from "../shared/constants.js";
import { takeEnv } from "../shared/env.js";
import type { Logger } from "../shared/logging.js";
import { BusObject, method, type BusMember } from "./bus/object.js";

const EMPTY = "{}";

/**
 * `/LoginMessages`: the JSON blob the login process left behind (last login,
 * failed attempts), handed over as an open file descriptor.
 */
export class LoginMessages extends BusObject {
  readonly interfaceName = LOGIN_MESSAGES_INTERFACE;
  private content: string | null = null;

  constructor(
    private fd: number | null,
    private readonly logger: Logger
  ) {
    super();
    if (fd !== null) this.content = this.readAll(fd);
  }

  /** Takes the descriptor named in the environment, so children never inherit the variable. */
  static fromEnvironment(logger: Logger): LoginMessages {
    const raw = takeEnv("LOGIN_MESSAGES_FD");
    const fd = raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : null;
    if (raw !== undefined && fd === null) logger.warn({ value: raw }, "Ignoring invalid login messages descriptor");
    return new LoginMessages(fd, logger);
  }

  protected members(): readonly BusMember[] {
    return [
      method("Get", [], ["s"], () => [this.get()]),
      method("Dismiss", [], [], () => {
        this.dismiss();
        return [];
      }),
    ];
  }

  get(): string {
    return this.content ?? EMPTY;
  }

  dismiss(): void {
    this.content = null;
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (err) {
      this.logger.warn({ err, fd }, "Closing login messages descriptor failed");
    }
  }

  private readAll(fd: number): string | null {
    try {
      const { size } = fstatSync(fd);
      if (size === 0) return null;
      const buffer = Buffer.alloc(size);
      let offset = 0;
      while (offset < size) {
        const n = readSync(fd, buffer, offset, size - offset, offset);
        if (n === 0) break;
        offset += n;
      }
      const text = buffer.subarray(0, offset).toString("utf8");
      return text.length > 0 ? text : null;
    } catch (err) {
      this.logger.warn({ err, fd }, "Reading login messages failed");
      return null;
    }
  }
}
