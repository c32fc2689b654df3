import { z } from "zod";
import type { ManaComponent } from "../../components/index.js";
import type { SystemProvider } from "../types.js";

const configSchema = z
  .object({
    /** Declared by town documents; gathering itself does not read it. */
    default_regeneration_rate: z.number().nonnegative().default(1),
    /** Mana per second drawn from each tile in reach. */
    default_gather_amount: z.number().positive().default(1),
    /** Tiles holding less than this are left alone. */
    minimum_gather_amount: z.number().nonnegative().default(0.1),
    /** Reach in tiles around the gatherer. */
    default_gather_radius: z.number().int().nonnegative().default(1),
  })
  .strict();

export type ManaGatheringConfig = z.infer<typeof configSchema>;

/** Carry limit for types missing from a per-type `max`. */
const DEFAULT_MANA_LIMIT = 100;

function carryLimit(mana: ManaComponent, type: string): number {
  return typeof mana.max === "number" ? mana.max : (mana.max[type] ?? DEFAULT_MANA_LIMIT);
}

/**
 * While `mana_gather` is held, drains every mana type from the tiles around
 * the entity's map position into its reserves.
 */
export const manaGatheringSystem: SystemProvider<ManaGatheringConfig> = {
  name: "mana_gathering",
  configSchema,
  create: (config, { manaField }) => ({
    name: "mana_gathering",
    requires: ["input", "mana", "position"],
    update(entity, { dt }) {
      const input = entity.components.get("input");
      const mana = entity.components.get("mana");
      const position = entity.components.get("position");
      if (!input || !mana || !position || !input.mana_gather) return;

      const cx = Math.trunc(position.map_position[0]);
      const cy = Math.trunc(position.map_position[1]);
      const radius = config.default_gather_radius;
      const amount = (config.default_gather_amount * dt) / 1000;

      for (let x = cx - radius; x <= cx + radius; x++) {
        for (let y = cy - radius; y <= cy + radius; y++) {
          const pools = manaField.tile(x, y);
          if (!pools) continue;

          for (const [type, pool] of pools) {
            if (pool.amount < config.minimum_gather_amount) continue;

            const drawn = Math.min(amount, pool.amount);
            pool.amount -= drawn;

            const carried = (mana.mana[type] ?? 0) + drawn;
            const limit = carryLimit(mana, type);
            if (carried > limit) {
              pool.amount += carried - limit;
              mana.mana[type] = limit;
            } else {
              mana.mana[type] = carried;
            }
            manaField.markForReplenishment(x, y, type);
          }
        }
      }
    },
  }),
};
