/**
 * Tick sources drive the simulation loop.
 *
 * A source reports how many milliseconds each step covers; the simulation
 * never reads the time itself.
 */

/** Ends the ticks begun by one `TickSource.start` call. */
export type StopTicking = () => void;

export interface TickSource {
  /** Call `onTick(dt)` once per step until the returned function is called. */
  start(onTick: (dt: number) => void): StopTicking;
}
