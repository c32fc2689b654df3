import type { z } from "zod";
import type { Logger } from "../logger.js";
import type { Entity } from "../world/entity.js";
import type { ManaField } from "./mana-field.js";

/** What systems may ask of the world they run in. */
export interface SystemWorld {
  /** Live entities holding every listed kind, in spawn order. */
  query(kinds: readonly string[]): readonly Entity[];
  /** Returns whether the entity's playback switched to `state`. */
  setAnimationState(id: string, state: string): boolean;
  /** Emit the world's death notification for `entity`. */
  notifyDied(entity: Entity): void;
}

export interface SystemContext {
  readonly world: SystemWorld;
  /** Milliseconds since the previous tick. */
  readonly dt: number;
}

/**
 * A named unit of per-tick game logic.
 *
 * `update` runs for each entity holding every kind in `requires`;
 * `run` runs once per tick, before any `update`.
 */
export interface EntitySystem {
  readonly name: string;
  readonly requires: readonly string[];
  run?(context: SystemContext): void;
  update?(entity: Entity, context: SystemContext): void;
}

/** Shared state and helpers handed to every system on creation. */
export interface SystemServices {
  readonly manaField: ManaField;
  readonly logger: Logger;
}

/**
 * Creates a system from its document tunables.
 *
 * `configSchema` validates `entities.systems.<name>` and fills defaults.
 */
export interface SystemProvider<Config = unknown> {
  readonly name: string;
  readonly configSchema: z.ZodType<Config, z.ZodTypeDef, unknown>;
  create(config: Config, services: SystemServices): EntitySystem;
}
