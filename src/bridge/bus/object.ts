import type { InternalBus } from "./bus.js";

export interface BusMethod {
  readonly kind: "method";
  readonly name: string;
  readonly in: readonly string[];
  readonly out: readonly string[];
  invoke(args: readonly unknown[]): unknown[] | Promise<unknown[]>;
}

export interface BusProperty {
  readonly kind: "property";
  readonly name: string;
  readonly type: string;
  get(): unknown;
  /** Present for writable properties. Implementations must report the change. */
  set?(value: unknown): void;
}

export interface BusSignal {
  readonly kind: "signal";
  readonly name: string;
  readonly in: readonly string[];
}

export type BusMember = BusMethod | BusProperty | BusSignal;

export function method(
  name: string,
  inSignature: readonly string[],
  outSignature: readonly string[],
  invoke: BusMethod["invoke"]
): BusMethod {
  return { kind: "method", name, in: inSignature, out: outSignature, invoke };
}

export function property(
  name: string,
  type: string,
  get: () => unknown,
  set?: (value: unknown) => void
): BusProperty {
  return { kind: "property", name, type, get, ...(set && { set }) };
}

export function signal(name: string, inSignature: readonly string[]): BusSignal {
  return { kind: "signal", name, in: inSignature };
}

/** Introspection data as sent in `meta` messages. */
export interface InterfaceDescriptor {
  methods: Record<string, { in: string[]; out: string[] }>;
  properties: Record<string, { flags: "r" | "rw"; type: string }>;
  signals: Record<string, { in: string[] }>;
}

/**
 * The member table of one exported interface, built once at export time and
 * used both for introspection and for dispatch.
 */
export class InterfaceTable {
  readonly methods = new Map<string, BusMethod>();
  readonly properties = new Map<string, BusProperty>();
  readonly signals = new Map<string, BusSignal>();

  constructor(
    readonly name: string,
    members: readonly BusMember[]
  ) {
    for (const member of members) {
      if (this.methods.has(member.name) || this.properties.has(member.name) || this.signals.has(member.name)) {
        throw new Error(`Duplicate member "${member.name}" in interface ${name}`);
      }
      if (member.kind === "method") this.methods.set(member.name, member);
      else if (member.kind === "property") this.properties.set(member.name, member);
      else this.signals.set(member.name, member);
    }
  }

  describe(): InterfaceDescriptor {
    const descriptor: InterfaceDescriptor = { methods: {}, properties: {}, signals: {} };
    for (const m of this.methods.values()) {
      descriptor.methods[m.name] = { in: [...m.in], out: [...m.out] };
    }
    for (const p of this.properties.values()) {
      descriptor.properties[p.name] = { flags: p.set ? "rw" : "r", type: p.type };
    }
    for (const s of this.signals.values()) {
      descriptor.signals[s.name] = { in: [...s.in] };
    }
    return descriptor;
  }

  /** Current values of the named properties, or of all of them. */
  values(names?: readonly string[]): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const p of this.properties.values()) {
      if (!names || names.includes(p.name)) out[p.name] = p.get();
    }
    return out;
  }
}

/**
 * Base class for objects exported on the internal bus. Subclasses list their
 * members and report property changes with `propertiesChanged`, which reaches
 * every watcher before it returns.
 */
export abstract class BusObject {
  abstract readonly interfaceName: string;
  private binding: { bus: InternalBus; path: string } | null = null;

  protected abstract members(): readonly BusMember[];

  /** Called by InternalBus.export. */
  bind(bus: InternalBus, path: string): InterfaceTable {
    if (this.binding) {
      throw new Error(`Object is already exported at ${this.binding.path}`);
    }
    this.binding = { bus, path };
    return new InterfaceTable(this.interfaceName, this.members());
  }

  unbind(): void {
    this.binding = null;
  }

  get path(): string | null {
    return this.binding?.path ?? null;
  }

  protected propertiesChanged(...names: string[]): void {
    this.binding?.bus.propertiesChanged(this.binding.path, this.interfaceName, names);
  }

  protected emitSignal(name: string, args: unknown[]): void {
    this.binding?.bus.emitSignal(this.binding.path, this.interfaceName, name, args);
  }
}
