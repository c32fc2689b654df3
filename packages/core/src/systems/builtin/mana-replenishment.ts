import { z } from "zod";
import type { SystemProvider } from "../types.js";

const configSchema = z
  .object({
    /** Mana per second restored to each drained tile. */
    default_replenishment_amount: z.number().nonnegative().default(0.01),
  })
  .strict();

export type ManaReplenishmentConfig = z.infer<typeof configSchema>;

/** Refills drained tiles of the mana field until they are full again. */
export const manaReplenishmentSystem: SystemProvider<ManaReplenishmentConfig> = {
  name: "mana_replenishment",
  configSchema,
  create: (config, { manaField }) => ({
    name: "mana_replenishment",
    requires: [],
    run({ dt }) {
      const amount = (config.default_replenishment_amount * dt) / 1000;
      for (const ref of manaField.pendingReplenishment()) {
        const pool = manaField.tile(ref.x, ref.y)?.get(ref.type);
        if (!pool) {
          manaField.unmark(ref);
          continue;
        }
        pool.amount += amount;
        if (pool.amount >= pool.capacity) {
          pool.amount = pool.capacity;
          manaField.unmark(ref);
        }
      }
    },
  }),
};
