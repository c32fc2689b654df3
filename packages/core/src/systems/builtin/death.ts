import { z } from "zod";
import { EntityStateFlag } from "../../components/index.js";
import type { SystemProvider } from "../types.js";

const configSchema = z.object({}).strict();

/** Marks dead entities' sprites dead, releases their inputs and announces the death once. */
export const deathSystem: SystemProvider<z.infer<typeof configSchema>> = {
  name: "death",
  configSchema,
  create: () => ({
    name: "death",
    requires: ["state", "sprite"],
    update(entity, { world }) {
      const state = entity.components.get("state");
      const sprite = entity.components.get("sprite");
      if (!state || !sprite) return;
      if (state.state !== EntityStateFlag.DEAD || sprite.activity === "dead") return;

      sprite.activity = "dead";

      const input = entity.components.get("input");
      if (input) {
        input.move_up = false;
        input.move_down = false;
        input.move_left = false;
        input.move_right = false;
        input.mana_gather = false;
        input.skill_usage = false;
      }

      world.notifyDied(entity);
    },
  }),
};
