import { z } from "zod";
import { EntityStateFlag } from "../../components/index.js";
import type { SystemProvider } from "../types.js";

const configSchema = z
  .object({
    /** Health per second. */
    default_regeneration_amount: z.number().nonnegative().default(1),
  })
  .strict();

export type HealthRegenerationConfig = z.infer<typeof configSchema>;

export const healthRegenerationSystem: SystemProvider<HealthRegenerationConfig> = {
  name: "health_regeneration",
  configSchema,
  create: (config) => ({
    name: "health_regeneration",
    requires: ["health", "state"],
    update(entity, { dt }) {
      const health = entity.components.get("health");
      const state = entity.components.get("state");
      if (!health || !state) return;
      if ((state.state & EntityStateFlag.CAN_REPLENISH_HEALTH) === 0) return;
      if (health.health >= health.max) return;

      health.health = Math.min(health.max, health.health + (config.default_regeneration_amount * dt) / 1000);
    },
  }),
};
