export type { StopTicking, TickSource } from "./tick-source.js";
export { ManualTicker } from "./manual-ticker.js";
export { IntervalTicker } from "./interval-ticker.js";
export { Simulation } from "./simulation.js";
export type { SimulationOptions, Tickable } from "./simulation.js";
