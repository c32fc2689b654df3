/**
 * Applying one template's entries on top of what its ancestors produced.
 *
 * Works on raw (unparsed) component data; schema defaults are filled once
 * the whole chain has been applied.
 */

import { z } from "zod";
import type { ComponentOverride } from "@spritekin/schema";
import { EntityError, formatZodIssues } from "../errors.js";
import { animationBlockSchema } from "../components/index.js";
import type { AnimationBlock, ComponentSchemaRegistry } from "../components/index.js";
import type { EntityTemplate } from "./types.js";

/** Component data keyed by kind, before default-fill. */
export type RawComponents = ReadonlyMap<string, Readonly<Record<string, unknown>>>;

const animationListSchema = z.array(animationBlockSchema);

function parseAnimations(raw: unknown, template: string): AnimationBlock[] {
  if (raw === undefined) return [];
  const parsed = animationListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EntityError("INVALID_COMPONENT", `Template "${template}": invalid "sprite" component`, {
      template,
      kind: "sprite",
      issues: formatZodIssues(parsed.error).map((issue) => `animations.${issue}`),
    });
  }
  return parsed.data;
}

/**
 * Merge animation blocks per state. Each state belongs to the last block
 * claiming it; earlier blocks lose the states claimed after them and are
 * dropped once they claim nothing.
 */
export function mergeAnimationBlocks(
  inherited: readonly AnimationBlock[],
  incoming: readonly AnimationBlock[],
): AnimationBlock[] {
  let merged = inherited.map((block) => ({ ...block, states: [...block.states] }));
  for (const block of incoming) {
    const claimed = new Set(block.states);
    merged = merged
      .map((earlier) => ({ ...earlier, states: earlier.states.filter((s) => !claimed.has(s)) }))
      .filter((earlier) => earlier.states.length > 0);
    merged.push({ ...block, states: [...claimed] });
  }
  return merged;
}

/**
 * Field-wise override: every field the override names replaces the
 * inherited one wholesale. `sprite.animations` is the exception and merges
 * per state.
 */
export function mergeComponent(
  kind: string,
  inherited: Readonly<Record<string, unknown>>,
  override: ComponentOverride,
  template: string,
): Readonly<Record<string, unknown>> {
  const merged = { ...inherited, ...override };
  if (kind === "sprite" && "animations" in override) {
    merged["animations"] = mergeAnimationBlocks(
      parseAnimations(inherited["animations"], template),
      parseAnimations(override["animations"], template),
    );
  }
  return merged;
}

/** Apply `template`'s entries over `base`, returning a new map. */
export function applyTemplate(
  base: RawComponents,
  template: EntityTemplate,
  registry: ComponentSchemaRegistry,
): RawComponents {
  const next = new Map(base);
  for (const [kind, entry] of template.components) {
    registry.schemaFor(kind, template.name);
    if (entry.kind === "default") {
      next.set(kind, {});
    } else {
      next.set(kind, mergeComponent(kind, base.get(kind) ?? {}, entry.value, template.name));
    }
  }
  return next;
}
