export { SystemRegistry } from "./registry.js";
export { ManaField } from "./mana-field.js";
export type { ManaPool, ManaTileRef } from "./mana-field.js";
export * from "./builtin/index.js";
export type {
  EntitySystem,
  SystemContext,
  SystemProvider,
  SystemServices,
  SystemWorld,
} from "./types.js";
