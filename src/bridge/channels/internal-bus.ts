import { checkSchema } from "../../protocols/assert.js";
import {
  BusAddMatchSchema,
  BusCallSchema,
  BusRemoveMatchSchema,
  BusUnwatchSchema,
  BusWatchSchema,
} from "../../protocols/dbus-json/types.js";
import { DBUS_ERROR } from "../../shared/constants.js";
import { BusError, ChannelError, errorMessage } from "../../shared/errors.js";
import type { BusClient } from "../bus/bus.js";
import { Channel } from "./base.js";

/** `dbus-json3` channel against the bridge's own object bus (`bus: "internal"`). */
export class InternalBusChannel extends Channel {
  static readonly payload = "dbus-json3";
  private client: BusClient | null = null;

  protected onStart(): void {
    if (this.options.bus !== "internal") {
      throw new ChannelError("not-supported", "Only the internal bus is available");
    }
    this.client = this.ctx.bus.connect((message) => this.sendMessage(message));
    this.ready();
  }

  protected override onData(data: Buffer): void {
    let message: unknown;
    try {
      message = JSON.parse(data.toString("utf8"));
    } catch {
      this.close("protocol-error", { message: "Bus channel received invalid JSON" });
      return;
    }
    const client = this.client;
    if (!client) return;

    const call = checkSchema(BusCallSchema, message);
    if (call) {
      const [path, iface, method, args] = call.call;
      this.logger.debug({ channel: this.id, path, iface, method }, "bus call");
      client.call(path, iface, method, args).then(
        (out) => this.sendMessage({ reply: [out], ...withId(call.id) }),
        (err: unknown) => this.sendMessage({ error: errorTuple(err), ...withId(call.id) })
      );
      return;
    }

    const watch = checkSchema(BusWatchSchema, message);
    if (watch) {
      client.watch(watch.watch.path, watch.watch.interface);
      this.sendMessage({ reply: [], ...withId(watch.id) });
      return;
    }

    const unwatch = checkSchema(BusUnwatchSchema, message);
    if (unwatch) {
      client.unwatch(unwatch.unwatch.path, unwatch.unwatch.interface);
      if (unwatch.id !== undefined) this.sendMessage({ reply: [], id: unwatch.id });
      return;
    }

    const addMatch = checkSchema(BusAddMatchSchema, message);
    if (addMatch) {
      client.addMatch(addMatch["add-match"]);
      if (addMatch.id !== undefined) this.sendMessage({ reply: [], id: addMatch.id });
      return;
    }

    const removeMatch = checkSchema(BusRemoveMatchSchema, message);
    if (removeMatch) {
      client.removeMatch(removeMatch["remove-match"]);
      if (removeMatch.id !== undefined) this.sendMessage({ reply: [], id: removeMatch.id });
      return;
    }

    this.close("protocol-error", { message: "Unsupported bus channel message" });
  }

  protected override onDone(): void {
    this.sendDone();
    this.close();
  }

  protected override onClose(): void {
    this.client?.disconnect();
    this.client = null;
  }
}

function withId(id: string | undefined): { id?: string } {
  return id === undefined ? {} : { id };
}

function errorTuple(err: unknown): [string, [string]] {
  if (err instanceof BusError) return [err.errorName, [err.message]];
  return [DBUS_ERROR.FAILED, [errorMessage(err)]];
}
