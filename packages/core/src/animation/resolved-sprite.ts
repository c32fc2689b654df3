import { EntityError } from "../errors.js";
import type { CompiledAnimation, Vec2 } from "./types.js";

/**
 * Compiled animations of one sprite, keyed by state name.
 * Immutable; shared by every entity spawned from the same template.
 */
export class ResolvedSprite {
  readonly spriteSize: Vec2;
  private readonly animations: ReadonlyMap<string, CompiledAnimation>;

  constructor(spriteSize: Vec2, animations: ReadonlyMap<string, CompiledAnimation>) {
    this.spriteSize = spriteSize;
    this.animations = animations;
    Object.freeze(this);
  }

  has(state: string): boolean {
    return this.animations.has(state);
  }

  /** Claimed state names, in the order first claimed. */
  states(): string[] {
    return [...this.animations.keys()];
  }

  /** @throws {EntityError} `UNCLAIMED_STATE_REFERENCE` */
  animation(state: string): CompiledAnimation {
    const animation = this.animations.get(state);
    if (!animation) throw EntityError.unclaimedStateReference(state);
    return animation;
  }

  get size(): number {
    return this.animations.size;
  }
}
