import type { TemplateDefinition } from "@spritekin/schema";

const DIRECTIONS = ["north", "west", "south", "east"];

export function statesFor(activity: string): string[] {
  return DIRECTIONS.map((direction) => `${activity}_${direction}`);
}

export const GUARD_LAYERS = [
  "walkcycle/BODY_male.png",
  "walkcycle/FEET_shoes_brown.png",
  "walkcycle/LEGS_plate_armor_pants.png",
  "walkcycle/TORSO_plate_armor_torso.png",
  "walkcycle/BELT_leather.png",
  "walkcycle/TORSO_plate_armor_arms_shoulders.png",
  "walkcycle/HANDS_plate_armor_gloves.png",
  "walkcycle/HEAD_hair_blonde.png",
  "walkcycle/WEAPON_shield_cutout_body.png",
];

/** A small town: humans, guards inheriting from them, a player and a cursor. */
export const TOWN_TEMPLATES: Record<string, TemplateDefinition> = {
  human: {
    components: {
      position: null,
      state: null,
      physics: { core_offset: [0, 20], core_size: [24, 16] },
      sprite: {
        sprite_size: [192, 192],
        animations: [
          {
            layers: ["walkcycle/BODY_male.png"],
            states: statesFor("stationary"),
            frame_size: [64, 64],
            frame_count: 1,
          },
        ],
      },
    },
  },
  town_guard: {
    parent: "human",
    components: {
      health: null,
      character: { name: "Town Guard" },
      sprite: {
        sprite_size: [192, 192],
        animations: [
          {
            layers: ["death/BODY_male.png"],
            states: statesFor("dead"),
            frame_size: [64, 64],
            frame_interval: 30,
            frame_count: 6,
          },
          {
            layers: GUARD_LAYERS,
            states: statesFor("stationary"),
            frame_size: [64, 64],
            frame_count: 1,
          },
          {
            layers: GUARD_LAYERS,
            states: statesFor("moving"),
            frame_size: [64, 64],
            frame_count: 8,
            frame_offset: 1,
            loop: true,
          },
        ],
      },
    },
  },
  player: {
    parent: "town_guard",
    components: {
      player: null,
      character: { name: "The Hero" },
      velocity: null,
      health: null,
      mana: null,
      input: null,
    },
  },
  cursor: {
    components: { position: null },
  },
};
