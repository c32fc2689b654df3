/**
 * System dispatch registry: named systems run once per tick, in
 * registration order.
 */

import type { SystemsSection } from "@spritekin/schema";
import { EntityError, formatZodIssues } from "../errors.js";
import type { EntitySystem, SystemProvider, SystemServices, SystemWorld } from "./types.js";

export class SystemRegistry {
  private readonly systems = new Map<string, EntitySystem>();

  /** @throws {EntityError} `DUPLICATE_SYSTEM` */
  register(system: EntitySystem): void {
    if (this.systems.has(system.name)) {
      throw new EntityError("DUPLICATE_SYSTEM", `System "${system.name}" is already registered`, {
        system: system.name,
      });
    }
    this.systems.set(system.name, system);
  }

  /** Returns whether a system was removed. */
  unregister(name: string): boolean {
    return this.systems.delete(name);
  }

  get(name: string): EntitySystem | undefined {
    return this.systems.get(name);
  }

  /** Registered names, in run order. */
  names(): string[] {
    return [...this.systems.keys()];
  }

  get size(): number {
    return this.systems.size;
  }

  /**
   * Create and register a system per provider, configured from the
   * matching entry of the document's `systems` section.
   *
   * @throws {EntityError} `INVALID_SYSTEM_CONFIG` or `DUPLICATE_SYSTEM`
   */
  registerFromProviders(
    providers: readonly SystemProvider[],
    section: SystemsSection | undefined,
    services: SystemServices,
  ): void {
    for (const provider of providers) {
      const tunables = section?.[provider.name];
      const parsed = provider.configSchema.safeParse(typeof tunables === "object" ? tunables : {});
      if (!parsed.success) {
        throw new EntityError(
          "INVALID_SYSTEM_CONFIG",
          `Invalid tunables for system "${provider.name}"`,
          { system: provider.name, issues: formatZodIssues(parsed.error) },
        );
      }
      this.register(provider.create(parsed.data, services));
    }
  }

  /** Run every system once. */
  run(world: SystemWorld, dt: number): void {
    const context = { world, dt };
    for (const system of [...this.systems.values()]) {
      system.run?.(context);
      if (!system.update) continue;
      for (const entity of world.query(system.requires)) {
        system.update(entity, context);
      }
    }
  }

  clear(): void {
    this.systems.clear();
  }
}
