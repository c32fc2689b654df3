import { z } from "zod";
import { EntityStateFlag } from "../../components/index.js";
import type { SystemProvider } from "../types.js";

const configSchema = z.object({}).strict();

/** Plays `<activity>_<direction>` on each sprite; dead entities play `dead_<direction>`. */
export const animationStateSystem: SystemProvider<z.infer<typeof configSchema>> = {
  name: "animation_state",
  configSchema,
  create: () => ({
    name: "animation_state",
    requires: ["sprite"],
    update(entity, { world }) {
      const sprite = entity.components.get("sprite");
      if (!sprite) return;
      const dead = entity.components.get("state")?.state === EntityStateFlag.DEAD;
      const activity = dead ? "dead" : sprite.activity;
      world.setAnimationState(entity.id, `${activity}_${sprite.direction}`);
    },
  }),
};
