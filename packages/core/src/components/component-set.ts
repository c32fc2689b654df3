/**
 * A concrete, flat set of components: the output of template resolution
 * and the storage of a live entity.
 */

import type { BuiltinComponents, BuiltinKind } from "./schemas.js";

/** Data of a component kind without a built-in schema. */
export type ComponentData = Readonly<Record<string, unknown>>;

/** The reading side of a `ComponentSet`. `clone()` gives a writable copy. */
export type ReadonlyComponentSet = Pick<
  ComponentSet,
  "kinds" | "has" | "hasAll" | "get" | "getExtension" | "clone" | "toJSON" | "isFrozen"
>;

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}

export class ComponentSet {
  private readonly builtin: Partial<BuiltinComponents>;
  private readonly extensions: Map<string, ComponentData>;
  private readonly order: string[];
  private frozen = false;

  constructor(
    builtin: Partial<BuiltinComponents> = {},
    extensions: ReadonlyMap<string, ComponentData> = new Map(),
    order: readonly string[] = [],
  ) {
    this.builtin = builtin;
    this.extensions = new Map(extensions);
    this.order = [...order];
  }

  /** Component kinds present, in the order they were first added. */
  kinds(): readonly string[] {
    return this.order;
  }

  has(kind: string): boolean {
    return this.order.includes(kind);
  }

  hasAll(kinds: readonly string[]): boolean {
    return kinds.every((kind) => this.has(kind));
  }

  get<K extends BuiltinKind>(kind: K): BuiltinComponents[K] | undefined {
    return this.builtin[kind];
  }

  getExtension(kind: string): ComponentData | undefined {
    return this.extensions.get(kind);
  }

  setBuiltin<K extends BuiltinKind>(kind: K, value: BuiltinComponents[K]): void {
    this.assertWritable(kind);
    this.track(kind);
    this.builtin[kind] = value;
  }

  setExtension(kind: string, value: ComponentData): void {
    this.assertWritable(kind);
    this.track(kind);
    this.extensions.set(kind, value);
  }

  /** Deep copy; mutations on the copy never reach this set. */
  clone(): ComponentSet {
    return new ComponentSet(
      structuredClone(this.builtin),
      structuredClone(this.extensions),
      this.order,
    );
  }

  /**
   * Freeze this set and every component value in it, nested arrays and
   * records included. Values are frozen in place; `clone()` first when
   * they may be shared with other data.
   */
  freeze(): ReadonlyComponentSet {
    this.frozen = true;
    deepFreeze(this.builtin);
    for (const value of this.extensions.values()) deepFreeze(value);
    Object.freeze(this.order);
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Plain-object view keyed by kind, in insertion order. */
  toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const kind of this.order) {
      result[kind] = this.extensions.get(kind) ?? this.builtinValue(kind);
    }
    return result;
  }

  private builtinValue(kind: string): unknown {
    for (const [key, value] of Object.entries(this.builtin)) {
      if (key === kind) return value;
    }
    return undefined;
  }

  private assertWritable(kind: string): void {
    if (this.frozen) {
      throw new TypeError(`Cannot set "${kind}" on a frozen component set`);
    }
  }

  private track(kind: string): void {
    if (!this.order.includes(kind)) {
      this.order.push(kind);
    }
  }
}
