import { z } from "zod";
import { EntityStateFlag } from "../../components/index.js";
import type { Direction } from "../../components/index.js";
import type { SystemProvider } from "../types.js";

const configSchema = z.object({}).strict();

/** Facing for a velocity; a diagonal faces along its horizontal part. */
export function directionOf(dx: number, dy: number): Direction {
  if (dx > 0) return "east";
  if (dx < 0) return "west";
  return dy < 0 ? "north" : "south";
}

/**
 * Moves entities along their velocity and keeps the sprite's activity and
 * facing in step. Entities whose state lacks `CAN_MOVE` are left alone.
 */
export const movementSystem: SystemProvider<z.infer<typeof configSchema>> = {
  name: "movement",
  configSchema,
  create: () => ({
    name: "movement",
    requires: ["position", "velocity", "sprite"],
    update(entity, { dt }) {
      const position = entity.components.get("position");
      const velocity = entity.components.get("velocity");
      const sprite = entity.components.get("sprite");
      const state = entity.components.get("state");
      if (!position || !velocity || !sprite) return;
      if (state && (state.state & EntityStateFlag.CAN_MOVE) === 0) return;

      const [dx, dy] = velocity.direction;
      if (dx === 0 && dy === 0) {
        sprite.activity = "stationary";
        return;
      }

      sprite.activity = "moving";
      sprite.direction = directionOf(dx, dy);

      const distance = (velocity.speed * dt) / 1000;
      const target = position[`${position.primary}_position` as const];
      target[0] += dx * distance;
      target[1] += dy * distance;
    },
  }),
};
