export { EntityWorld } from "./entity-world.js";
export type { EntityDiedListener, EntityWorldOptions } from "./entity-world.js";
export type { Entity } from "./entity.js";
