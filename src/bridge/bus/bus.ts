import { checkSchema } from "../../protocols/assert.js";
import { VariantSchema, type BusMatchRule, type BusWireMessage } from "../../protocols/dbus-json/types.js";
import { DBUS_ERROR, PROPERTIES_INTERFACE } from "../../shared/constants.js";
import { BusError, errorMessage } from "../../shared/errors.js";
import type { Logger } from "../../shared/logging.js";
import type { BusObject, InterfaceTable, BusProperty } from "./object.js";
import { matchesSignature } from "./signature.js";

export type BusSend = (message: BusWireMessage) => void;

interface Export {
  readonly object: BusObject;
  readonly table: InterfaceTable;
}

/** One connection to the bus: its watches, signal matches and the interfaces it has been described. */
export class BusClient {
  private readonly watches: Array<{ path: string; interface?: string }> = [];
  private readonly matches: BusMatchRule[] = [];
  private readonly described = new Set<string>();
  private connected = true;

  constructor(
    private readonly bus: InternalBus,
    private readonly send: BusSend
  ) {}

  call(path: string, iface: string, method: string, args: readonly unknown[]): Promise<unknown[]> {
    return this.bus.call(path, iface, method, args);
  }

  /**
   * Start watching `path` (optionally one interface). Sends `meta` for interfaces
   * this client has not been described yet, then one `notify` with the current values.
   * The caller sends the reply afterwards.
   */
  watch(path: string, iface?: string): void {
    if (!this.connected) return;
    this.watches.push({ path, ...(iface !== undefined && { interface: iface }) });
    const target = this.bus.lookup(path);
    if (!target || (iface !== undefined && iface !== target.table.name)) return;

    const name = target.table.name;
    if (!this.described.has(name)) {
      this.described.add(name);
      this.send({ meta: { [name]: target.table.describe() } });
    }
    this.send({ notify: { [path]: { [name]: target.table.values() } } });
  }

  unwatch(path: string, iface?: string): void {
    const index = this.watches.findIndex((w) => w.path === path && w.interface === iface);
    if (index !== -1) this.watches.splice(index, 1);
  }

  addMatch(rule: BusMatchRule): void {
    this.matches.push(rule);
  }

  removeMatch(rule: BusMatchRule): void {
    const index = this.matches.findIndex(
      (m) => m.path === rule.path && m.interface === rule.interface && m.member === rule.member
    );
    if (index !== -1) this.matches.splice(index, 1);
  }

  disconnect(): void {
    if (!this.connected) return;
    this.connected = false;
    this.watches.length = 0;
    this.matches.length = 0;
    this.bus.disconnect(this);
  }

  /** @internal */
  deliverNotify(path: string, iface: string, values: Record<string, unknown>): void {
    const watching = this.watches.some(
      (w) => w.path === path && (w.interface === undefined || w.interface === iface)
    );
    if (watching) this.send({ notify: { [path]: { [iface]: values } } });
  }

  /** @internal */
  deliverSignal(path: string, iface: string, member: string, args: unknown[]): void {
    const matched = this.matches.some(
      (m) =>
        (m.path === undefined || m.path === path) &&
        (m.interface === undefined || m.interface === iface) &&
        (m.member === undefined || m.member === member)
    );
    if (matched) this.send({ signal: [path, iface, member, args] });
  }
}

/**
 * In-process object bus with D-Bus call, property and signal semantics. Objects
 * export one interface each, plus the standard Properties interface.
 */
export class InternalBus {
  private readonly objects = new Map<string, Export>();
  private readonly clients = new Set<BusClient>();

  constructor(private readonly logger: Logger) {}

  export(path: string, object: BusObject): void {
    if (this.objects.has(path)) {
      throw new Error(`An object is already exported at ${path}`);
    }
    const table = object.bind(this, path);
    this.objects.set(path, { object, table });
    this.logger.debug({ path, interface: table.name }, "Exported bus object");
  }

  unexport(path: string): void {
    const entry = this.objects.get(path);
    if (!entry) return;
    entry.object.unbind();
    this.objects.delete(path);
  }

  lookup(path: string): Export | undefined {
    return this.objects.get(path);
  }

  connect(send: BusSend): BusClient {
    const client = new BusClient(this, send);
    this.clients.add(client);
    return client;
  }

  /** @internal Use BusClient.disconnect. */
  disconnect(client: BusClient): void {
    this.clients.delete(client);
  }

  /** Deliver a notify holding the named properties to every watcher, synchronously. */
  propertiesChanged(path: string, iface: string, names: readonly string[]): void {
    const entry = this.objects.get(path);
    if (!entry || names.length === 0) return;
    const values = entry.table.values(names);
    for (const client of [...this.clients]) client.deliverNotify(path, iface, values);
  }

  emitSignal(path: string, iface: string, member: string, args: unknown[]): void {
    for (const client of [...this.clients]) client.deliverSignal(path, iface, member, args);
  }

  async call(path: string, iface: string, method: string, args: readonly unknown[]): Promise<unknown[]> {
    const entry = this.objects.get(path);
    if (!entry) {
      throw new BusError(DBUS_ERROR.UNKNOWN_OBJECT, `Object does not exist at path "${path}"`);
    }
    const { table } = entry;
    if (iface === PROPERTIES_INTERFACE) {
      return this.callProperties(table, method, args);
    }
    if (iface !== table.name) {
      throw new BusError(DBUS_ERROR.UNKNOWN_INTERFACE, `No such interface "${iface}" on object at path ${path}`);
    }
    const target = table.methods.get(method);
    if (!target) {
      throw new BusError(DBUS_ERROR.UNKNOWN_METHOD, `No such method "${method}" on interface ${iface}`);
    }
    checkArguments(method, target.in, args);

    try {
      return await target.invoke(args);
    } catch (err) {
      if (err instanceof BusError) throw err;
      this.logger.warn({ err, path, method }, "Bus method failed");
      throw new BusError(DBUS_ERROR.FAILED, errorMessage(err));
    }
  }

  private callProperties(table: InterfaceTable, method: string, args: readonly unknown[]): unknown[] {
    switch (method) {
      case "GetAll": {
        checkArguments(method, ["s"], args);
        requireInterface(table, args[0]);
        const all: Record<string, { t: string; v: unknown }> = {};
        for (const p of table.properties.values()) all[p.name] = { t: p.type, v: p.get() };
        return [all];
      }
      case "Get": {
        checkArguments(method, ["s", "s"], args);
        requireInterface(table, args[0]);
        const p = requireProperty(table, args[1]);
        return [{ t: p.type, v: p.get() }];
      }
      case "Set": {
        checkArguments(method, ["s", "s", "v"], args);
        requireInterface(table, args[0]);
        const p = requireProperty(table, args[1]);
        if (!p.set) {
          throw new BusError(DBUS_ERROR.PROPERTY_READ_ONLY, `Property "${p.name}" is read-only`);
        }
        const variant = checkSchema(VariantSchema, args[2]);
        if (!variant || variant.t !== p.type || !matchesSignature(p.type, variant.v)) {
          throw new BusError(DBUS_ERROR.INVALID_ARGS, `Property "${p.name}" expects a value of type ${p.type}`);
        }
        p.set(variant.v);
        return [];
      }
      default:
        throw new BusError(DBUS_ERROR.UNKNOWN_METHOD, `No such method "${method}" on interface ${PROPERTIES_INTERFACE}`);
    }
  }
}

function checkArguments(method: string, signature: readonly string[], args: readonly unknown[]): void {
  if (args.length !== signature.length) {
    throw new BusError(
      DBUS_ERROR.INVALID_ARGS,
      `${method} expects ${signature.length} argument(s), got ${args.length}`
    );
  }
  signature.forEach((sig, i) => {
    if (!matchesSignature(sig, args[i])) {
      throw new BusError(DBUS_ERROR.INVALID_ARGS, `Argument ${i} of ${method} is not of type ${sig}`);
    }
  });
}

function requireInterface(table: InterfaceTable, iface: unknown): void {
  if (iface !== table.name) {
    throw new BusError(DBUS_ERROR.UNKNOWN_INTERFACE, `No such interface "${String(iface)}"`);
  }
}

function requireProperty(table: InterfaceTable, name: unknown): BusProperty {
  const p = typeof name === "string" ? table.properties.get(name) : undefined;
  if (!p) {
    throw new BusError(DBUS_ERROR.UNKNOWN_PROPERTY, `No such property "${String(name)}"`);
  }
  return p;
}
