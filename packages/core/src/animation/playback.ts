/**
 * Per-entity animation playback.
 *
 * Tracks the current state, the frame index and the time accumulated
 * towards the next frame. Call `advance(dt)` once per tick.
 */

import { EntityError } from "../errors.js";
import type { ResolvedSprite } from "./resolved-sprite.js";
import type { CompiledAnimation, FrameLayer, PlaybackSnapshot } from "./types.js";

/**
 * Called once when a non-looping animation finishes: on the advance that
 * would step past its last frame, one frame interval after that frame is
 * first shown.
 */
export type FinishedListener = (state: string) => void;

export class AnimationPlayback {
  readonly sprite: ResolvedSprite;
  private current: CompiledAnimation | undefined;
  private accumulator = 0;
  private frame = 0;
  private done = false;
  private readonly listeners = new Set<FinishedListener>();

  /**
   * @param initialState - Falls back to the first claimed state when the
   *   sprite does not claim it. A sprite with no states plays nothing.
   */
  constructor(sprite: ResolvedSprite, initialState?: string) {
    this.sprite = sprite;
    const start = initialState !== undefined && sprite.has(initialState) ? initialState : sprite.states()[0];
    this.current = start === undefined ? undefined : sprite.animation(start);
  }

  get state(): string | undefined {
    return this.current?.state;
  }

  get animation(): CompiledAnimation | undefined {
    return this.current;
  }

  get frameIndex(): number {
    return this.frame;
  }

  /** Milliseconds accumulated towards the next frame. */
  get elapsed(): number {
    return this.accumulator;
  }

  get finished(): boolean {
    return this.done;
  }

  /**
   * Switch to another state, restarting at its first frame.
   * Setting the current state again changes nothing.
   *
   * @throws {EntityError} `UNKNOWN_ANIMATION_STATE`
   */
  setState(state: string): void {
    if (this.current?.state === state) return;
    if (!this.sprite.has(state)) {
      throw EntityError.unknownAnimationState(state, this.sprite.states());
    }
    this.current = this.sprite.animation(state);
    this.frame = 0;
    this.accumulator = 0;
    this.done = false;
  }

  /**
   * Advance by `dt` milliseconds. A non-looping animation stops on its last
   * frame; advancing it further changes nothing. Negative `dt` is ignored.
   */
  advance(dt: number): void {
    const animation = this.current;
    if (!animation || this.done || !(dt > 0)) return;

    this.accumulator += dt;
    if (this.accumulator < animation.frameInterval) return;

    const steps = Math.floor(this.accumulator / animation.frameInterval);
    this.accumulator -= steps * animation.frameInterval;
    const next = this.frame + steps;

    if (next < animation.frameCount) {
      this.frame = next;
    } else if (animation.loop) {
      this.frame = next % animation.frameCount;
    } else {
      this.frame = animation.frameCount - 1;
      this.accumulator = 0;
      this.done = true;
      for (const listener of [...this.listeners]) {
        listener(animation.state);
      }
    }
  }

  /** The frame to draw: one entry per layer, back to front. */
  currentFrame(): FrameLayer[] {
    const animation = this.current;
    if (!animation) return [];

    const [w, h] = animation.frameSize;
    return animation.layers.map((layer) => {
      const cell = animation.frameRow * layer.columns + animation.frameOffset + this.frame;
      return {
        asset: layer.asset,
        rect: { x: (cell % layer.columns) * w, y: Math.floor(cell / layer.columns) * h, w, h },
        offset: animation.renderOffset,
      };
    });
  }

  /** Subscribe to completion of non-looping animations. Returns an unsubscribe function. */
  onFinished(listener: FinishedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): PlaybackSnapshot {
    return {
      currentState: this.current?.state,
      elapsed: this.accumulator,
      frameIndex: this.frame,
      finished: this.done,
    };
  }
}
