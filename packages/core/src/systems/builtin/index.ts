import type { SystemProvider } from "../types.js";
import { animationStateSystem } from "./animation-state.js";
import { deathSystem } from "./death.js";
import { healthRegenerationSystem } from "./health-regeneration.js";
import { manaGatheringSystem } from "./mana-gathering.js";
import { manaReplenishmentSystem } from "./mana-replenishment.js";
import { movementSystem } from "./movement.js";
import { velocitySystem } from "./velocity.js";

export {
  animationStateSystem,
  deathSystem,
  healthRegenerationSystem,
  manaGatheringSystem,
  manaReplenishmentSystem,
  movementSystem,
  velocitySystem,
};
export { directionOf } from "./movement.js";
export type { HealthRegenerationConfig } from "./health-regeneration.js";
export type { ManaGatheringConfig } from "./mana-gathering.js";
export type { ManaReplenishmentConfig } from "./mana-replenishment.js";

/** Built-in systems in run order. */
export const BUILTIN_SYSTEMS: readonly SystemProvider[] = [
  velocitySystem,
  movementSystem,
  deathSystem,
  animationStateSystem,
  healthRegenerationSystem,
  manaGatheringSystem,
  manaReplenishmentSystem,
];
