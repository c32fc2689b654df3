import { z } from "zod";
import type { SystemProvider } from "../types.js";

const configSchema = z.object({}).strict();

const MOVE_INPUTS = [
  ["move_up", [0, -1]],
  ["move_down", [0, 1]],
  ["move_left", [-1, 0]],
  ["move_right", [1, 0]],
] as const;

/** Points the velocity along the first held movement input, or stops it. */
export const velocitySystem: SystemProvider<z.infer<typeof configSchema>> = {
  name: "velocity",
  configSchema,
  create: () => ({
    name: "velocity",
    requires: ["input", "velocity"],
    update(entity) {
      const input = entity.components.get("input");
      const velocity = entity.components.get("velocity");
      if (!input || !velocity) return;

      const held = MOVE_INPUTS.find(([key]) => input[key]);
      velocity.direction = held ? [held[1][0], held[1][1]] : [0, 0];
    },
  }),
};
