/**
 * Advisory checks on a loaded engine.
 *
 * Finds authoring slips that load fine but misbehave at run time. Does
 * not throw: returns warnings for the host or the CLI to print.
 */

import { DIRECTIONS } from "@spritekin/core";
import type { Engine } from "./engine.js";

/** Result of linting an engine's templates and systems. */
export interface LintResult {
  /** Whether nothing was found. */
  readonly valid: boolean;
  readonly warnings: readonly string[];
}

/**
 * Checks:
 * - a sprite with animations claims the state its entities start in
 * - every activity a sprite animates covers all four directions
 * - every entry of the `systems` section names a registered system
 */
export function lintEngine(engine: Engine): LintResult {
  const warnings: string[] = [];

  for (const name of engine.store.names()) {
    const sprite = engine.resolver.resolve(name).components.get("sprite");
    if (!sprite) continue;

    const compiled = engine.world.spriteFor(name);
    if (compiled.size === 0) continue;

    const preferred = `${sprite.activity}_${sprite.direction}`;
    const fallback = engine.config.initialAnimationState;
    if (!compiled.has(preferred) && !compiled.has(fallback)) {
      warnings.push(
        `Template '${name}': does not claim its starting state '${preferred}'; entities start in '${compiled.states()[0] ?? ""}'.`,
      );
    }

    const directionsByActivity = new Map<string, Set<string>>();
    for (const state of compiled.states()) {
      const split = state.lastIndexOf("_");
      if (split <= 0) continue;
      const direction = state.slice(split + 1);
      if (!DIRECTIONS.some((d) => d === direction)) continue;
      const activity = state.slice(0, split);
      const seen = directionsByActivity.get(activity) ?? new Set<string>();
      seen.add(direction);
      directionsByActivity.set(activity, seen);
    }
    for (const [activity, seen] of directionsByActivity) {
      const missing = DIRECTIONS.filter((d) => !seen.has(d));
      if (missing.length > 0) {
        warnings.push(`Template '${name}': '${activity}' has no animation facing ${missing.join(", ")}.`);
      }
    }
  }

  for (const [key, value] of Object.entries(engine.document.entities.systems ?? {})) {
    if (key === "entry_point_group" || typeof value !== "object") continue;
    if (!engine.world.systems.get(key)) {
      warnings.push(`Systems: tunables given for unknown system '${key}'.`);
    }
  }

  return { valid: warnings.length === 0, warnings };
}
