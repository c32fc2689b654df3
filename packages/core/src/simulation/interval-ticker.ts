/**
 * IntervalTicker: real-time tick source for Node.js.
 *
 * Fires on a `setInterval` and reports the `performance.now()` time since
 * the previous step, so late timers still advance by the real elapsed time.
 */

import type { StopTicking, TickSource } from "./tick-source.js";

export class IntervalTicker implements TickSource {
  /** @param interval - Milliseconds between steps. */
  constructor(private readonly interval: number) {}

  start(onTick: (dt: number) => void): StopTicking {
    let previous = performance.now();
    const timer = setInterval(() => {
      const now = performance.now();
      const dt = now - previous;
      previous = now;
      onTick(dt);
    }, this.interval);
    return () => clearInterval(timer);
  }
}
