import type { ComponentSet } from "../components/index.js";

/** A live entity: its own copy of a resolved template's components. */
export interface Entity {
  /** `entity-<n>`, unique within one world. */
  readonly id: string;
  /** Name of the template it was spawned from. */
  readonly template: string;
  readonly components: ComponentSet;
}
