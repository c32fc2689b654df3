/**
 * Built-in component kinds and their zod schemas.
 *
 * A schema's defaults are the kind's "empty" value: parsing `{}` yields
 * the component an authored `null` stands for. Array and object defaults
 * are factories so parsed values never share storage.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Shared value types
// ---------------------------------------------------------------------------

export const DIRECTIONS = ["north", "east", "south", "west"] as const;

/** Facing of an entity; animation state names end in one of these. */
export type Direction = (typeof DIRECTIONS)[number];

export const ACTIVITIES = ["stationary", "moving", "dead"] as const;

/** What an entity is doing; animation state names start with one of these. */
export type Activity = (typeof ACTIVITIES)[number];

/**
 * Bit flags of the `state` component.
 * `DEAD` is the absence of every capability.
 */
export const EntityStateFlag = {
  DEAD: 0,
  STATIONARY: 1,
  CAN_MOVE: 2,
  CAN_USE_SKILLS: 4,
  CAN_CHANGE_INPUT: 8,
  CAN_REPLENISH_HEALTH: 16,
  CAN_BE_DAMAGED: 32,
  NORMAL: 2 | 4 | 8 | 16 | 32,
} as const;

export type EntityStateFlagName = keyof typeof EntityStateFlag;

const STATE_FLAG_NAMES = [
  "DEAD",
  "STATIONARY",
  "CAN_MOVE",
  "CAN_USE_SKILLS",
  "CAN_CHANGE_INPUT",
  "CAN_REPLENISH_HEALTH",
  "CAN_BE_DAMAGED",
  "NORMAL",
] as const satisfies readonly EntityStateFlagName[];

const vec2 = z.tuple([z.number(), z.number()]);
const extent = z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]);
const frameExtent = z.tuple([z.number().int().positive(), z.number().int().positive()]);

// ---------------------------------------------------------------------------
// Animation blocks (authored inside the sprite component)
// ---------------------------------------------------------------------------

/**
 * One layer of an animation block: an asset reference, optionally with the
 * frame geometry its sheet was cut for. Declared geometry must agree with
 * the block's.
 */
export const animationLayerSchema = z.union([
  z.string().min(1),
  z
    .object({
      asset: z.string().min(1),
      frame_size: frameExtent.optional(),
      frame_count: z.number().int().min(1).optional(),
      frame_offset: z.number().int().min(0).optional(),
    })
    .strict(),
]);

export type AnimationLayer = z.infer<typeof animationLayerSchema>;

export const animationBlockSchema = z
  .object({
    layers: z.array(animationLayerSchema).min(1),
    states: z.array(z.string().min(1)).min(1),
    frame_size: frameExtent.optional(),
    frame_count: z.number().int().min(1),
    frame_offset: z.number().int().min(0).default(0),
    frame_interval: z.number().positive().optional(),
    loop: z.boolean().default(false),
    render_offset: vec2.optional(),
    state_rows: z.record(z.number().int().min(0)).optional(),
  })
  .strict();

export type AnimationBlock = z.infer<typeof animationBlockSchema>;

// ---------------------------------------------------------------------------
// Component schemas
// ---------------------------------------------------------------------------

export const positionSchema = z
  .object({
    screen_position: vec2.default((): [number, number] => [0, 0]),
    layer_position: vec2.default((): [number, number] => [0, 0]),
    map_position: vec2.default((): [number, number] => [0, 0]),
    primary: z.enum(["screen", "layer", "map"]).default("layer"),
  })
  .strict();

export const stateSchema = z
  .object({
    state: z
      .union([
        z.number().int().min(0),
        z.enum(STATE_FLAG_NAMES).transform((name) => EntityStateFlag[name]),
      ])
      .default(EntityStateFlag.NORMAL),
  })
  .strict();

export const physicsSchema = z
  .object({
    core_size: extent.default((): [number, number] => [0, 0]),
    core_offset: vec2.default((): [number, number] => [0, 0]),
  })
  .strict();

export const spriteSchema = z
  .object({
    sprite_size: extent.default((): [number, number] => [0, 0]),
    animations: z.array(animationBlockSchema).default(() => []),
    activity: z.enum(ACTIVITIES).default("stationary"),
    direction: z.enum(DIRECTIONS).default("south"),
  })
  .strict();

export const healthSchema = z
  .object({
    min: z.number().default(0),
    max: z.number().default(100),
    health: z.number().default(1),
  })
  .strict();

export const manaSchema = z
  .object({
    /** Current reserves, keyed by mana type. */
    mana: z.record(z.number().nonnegative()).default(() => ({})),
    /** Carry limit: one value for every type, or a limit per type. */
    max: z.union([z.number().positive(), z.record(z.number().positive())]).default(100),
  })
  .strict();

export const characterSchema = z
  .object({
    name: z.string().default(""),
  })
  .strict();

export const playerSchema = z.object({}).strict();

export const inputSchema = z
  .object({
    move_up: z.boolean().default(false),
    move_down: z.boolean().default(false),
    move_left: z.boolean().default(false),
    move_right: z.boolean().default(false),
    mana_gather: z.boolean().default(false),
    skill_usage: z.boolean().default(false),
    selected_skill: z.string().nullable().default(null),
    target_point: vec2.nullable().default(null),
    target_entity: z.string().nullable().default(null),
  })
  .strict();

export const velocitySchema = z
  .object({
    direction: vec2.default((): [number, number] => [0, 0]),
    /** Pixels per second. */
    speed: z.number().nonnegative().default(200),
  })
  .strict();

export type PositionComponent = z.infer<typeof positionSchema>;
export type StateComponent = z.infer<typeof stateSchema>;
export type PhysicsComponent = z.infer<typeof physicsSchema>;
export type SpriteComponent = z.infer<typeof spriteSchema>;
export type HealthComponent = z.infer<typeof healthSchema>;
export type ManaComponent = z.infer<typeof manaSchema>;
export type CharacterComponent = z.infer<typeof characterSchema>;
export type PlayerComponent = z.infer<typeof playerSchema>;
export type InputComponent = z.infer<typeof inputSchema>;
export type VelocityComponent = z.infer<typeof velocitySchema>;

/** Data of every built-in kind, keyed by kind name. */
export interface BuiltinComponents {
  position: PositionComponent;
  state: StateComponent;
  physics: PhysicsComponent;
  sprite: SpriteComponent;
  health: HealthComponent;
  mana: ManaComponent;
  character: CharacterComponent;
  player: PlayerComponent;
  input: InputComponent;
  velocity: VelocityComponent;
}

export type BuiltinKind = keyof BuiltinComponents;

type BuiltinSchemaMap = {
  readonly [K in BuiltinKind]: z.ZodType<BuiltinComponents[K], z.ZodTypeDef, unknown>;
};

export const BUILTIN_COMPONENT_SCHEMAS: BuiltinSchemaMap = {
  position: positionSchema,
  state: stateSchema,
  physics: physicsSchema,
  sprite: spriteSchema,
  health: healthSchema,
  mana: manaSchema,
  character: characterSchema,
  player: playerSchema,
  input: inputSchema,
  velocity: velocitySchema,
};

export const BUILTIN_KINDS: readonly BuiltinKind[] = [
  "position",
  "state",
  "physics",
  "sprite",
  "health",
  "mana",
  "character",
  "player",
  "input",
  "velocity",
];

export function isBuiltinKind(kind: string): kind is BuiltinKind {
  return BUILTIN_KINDS.some((builtin) => builtin === kind);
}

/** Parse raw data as the given built-in kind, filling defaults. Throws `ZodError`. */
export function parseBuiltinComponent<K extends BuiltinKind>(
  kind: K,
  raw: unknown,
): BuiltinComponents[K] {
  return BUILTIN_COMPONENT_SCHEMAS[kind].parse(raw);
}
