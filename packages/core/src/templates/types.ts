import type { ComponentOverride } from "@spritekin/schema";
import type { ReadonlyComponentSet } from "../components/index.js";

/**
 * How a template treats one component kind.
 *
 * `default` comes from an authored `null`: the kind is present with its
 * schema defaults, discarding anything inherited. Kinds a template does not
 * list have no entry and are inherited unchanged.
 */
export type ComponentEntry =
  | { readonly kind: "default" }
  | { readonly kind: "override"; readonly value: ComponentOverride };

/** A template as stored: authored entries, not yet merged with its ancestors. */
export interface EntityTemplate {
  readonly name: string;
  readonly parent?: string;
  readonly components: ReadonlyMap<string, ComponentEntry>;
}

/** The flat, concrete result of merging a template with its ancestors. */
export interface ResolvedTemplate {
  readonly name: string;
  /** Template names from the root ancestor down to `name`. */
  readonly chain: readonly string[];
  /**
   * Shared by every caller resolving the same name, and deeply frozen.
   * `clone()` for a writable copy.
   */
  readonly components: ReadonlyComponentSet;
}
