/**
 * Simulation: the step loop that drives a world from a tick source.
 *
 * Each step ticks the world by the milliseconds the source reports. A step
 * either completes or throws; a throwing step stops the loop.
 */

import { createConsoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { StopTicking, TickSource } from "./tick-source.js";

/** Anything advanced in steps of elapsed milliseconds, e.g. an `EntityWorld`. */
export interface Tickable {
  tick(dt: number): void;
}

export interface SimulationOptions {
  readonly source: TickSource;
  readonly world: Tickable;
  readonly logger?: Logger;
}

export class Simulation {
  private readonly source: TickSource;
  private readonly world: Tickable;
  private readonly logger: Logger;
  private stopTicking: StopTicking | null = null;
  private steps = 0;

  constructor(options: SimulationOptions) {
    this.source = options.source;
    this.world = options.world;
    this.logger = options.logger ?? createConsoleLogger("spritekin:simulation");
  }

  /** Subscribe to the tick source. Calling it while running does nothing. */
  start(): void {
    if (this.stopTicking) return;
    this.stopTicking = this.source.start((dt) => this.step(dt));
    this.logger.debug("Started");
  }

  /** Unsubscribe from the tick source. A step in progress completes. */
  stop(): void {
    const stopTicking = this.stopTicking;
    if (!stopTicking) return;
    this.stopTicking = null;
    stopTicking();
    this.logger.debug(`Stopped after ${this.steps} ticks`);
  }

  get running(): boolean {
    return this.stopTicking !== null;
  }

  get tickCount(): number {
    return this.steps;
  }

  private step(dt: number): void {
    this.steps++;
    try {
      this.world.tick(dt);
    } catch (err) {
      this.logger.error(`Tick ${this.steps} failed, stopping`, err);
      this.stop();
      throw err;
    }
  }
}
