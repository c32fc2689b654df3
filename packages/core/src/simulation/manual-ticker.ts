/**
 * ManualTicker: fixed-step tick source for tests.
 *
 * Nothing happens until `tick()` is called; each call delivers its steps
 * synchronously.
 */

import type { StopTicking, TickSource } from "./tick-source.js";

/**
 * @example
 * ```ts
 * const ticker = new ManualTicker(16);
 * new Simulation({ source: ticker, world }).start();
 *
 * ticker.tick();        // world.tick(16)
 * ticker.tick(3, 100);  // world.tick(100) three times
 * ```
 */
export class ManualTicker implements TickSource {
  private listener: ((dt: number) => void) | undefined;
  private delivered = 0;

  /** @param step - Milliseconds per tick when `tick()` is given none. */
  constructor(readonly step = 16) {}

  start(onTick: (dt: number) => void): StopTicking {
    if (this.listener) {
      throw new Error("ManualTicker already drives a simulation");
    }
    this.listener = onTick;
    return () => {
      if (this.listener === onTick) this.listener = undefined;
    };
  }

  /** Deliver `count` ticks of `dt` ms. Ticks left once the listener stops are dropped. */
  tick(count = 1, dt = this.step): void {
    for (let i = 0; i < count; i++) {
      const listener = this.listener;
      if (!listener) return;
      this.delivered++;
      listener(dt);
    }
  }

  get attached(): boolean {
    return this.listener !== undefined;
  }

  get ticksDelivered(): number {
    return this.delivered;
  }
}
