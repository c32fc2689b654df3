import type { EntityDocument } from "@spritekin/schema";

/** A hero with a two-state walk and a scarecrow without animations. */
export function smallDocument(): EntityDocument {
  return {
    entities: {
      templates: {
        actor: {
          components: {
            position: null,
            state: null,
            sprite: {
              sprite_size: [64, 64],
              animations: [
                {
                  layers: ["walk/body.png", "walk/hat.png"],
                  states: ["stationary_north", "stationary_east", "stationary_south", "stationary_west"],
                  frame_count: 1,
                },
              ],
            },
          },
        },
        hero: {
          parent: "actor",
          components: {
            health: null,
            velocity: { speed: 120 },
            sprite: {
              animations: [
                {
                  layers: ["walk/body.png", "walk/hat.png"],
                  states: ["moving_south", "moving_north"],
                  frame_count: 4,
                  frame_offset: 1,
                  loop: true,
                },
              ],
            },
          },
        },
        scarecrow: {
          components: { position: null, banner: { colour: "red" } },
        },
      },
      components: { kinds: ["banner"] },
      systems: {
        health_regeneration: { default_regeneration_amount: 2 },
      },
    },
  };
}
