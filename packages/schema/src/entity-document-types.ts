/**
 * TypeScript types for the Spritekin entity document format.
 *
 * These types are aligned with entity-document.schema.json; the JSON Schema
 * is the source of truth. When updating, change the schema first, then
 * update these types to match.
 */

// ---------------------------------------------------------------------------
// Sprite animation blocks
// ---------------------------------------------------------------------------

/** `[width, height]` in pixels. */
export type PixelSize = readonly [number, number];

/**
 * A sprite layer declared with the frame geometry its sheet was cut for.
 * Any geometry given here must match the enclosing block.
 */
export interface AnimationLayerDefinition {
  readonly asset: string;
  readonly frame_size?: PixelSize;
  readonly frame_count?: number;
  readonly frame_offset?: number;
}

/**
 * One authored group of sprite layers sharing frame geometry and timing,
 * claiming a set of animation states.
 */
export interface AnimationBlockDefinition {
  /** Sheets in back-to-front compositing order: body first, weapon last. */
  readonly layers: readonly (string | AnimationLayerDefinition)[];
  /** State names this block animates, e.g. `"moving_north"`. */
  readonly states: readonly string[];
  /** Size of one frame cell. Defaults to the sprite's `sprite_size`. */
  readonly frame_size?: PixelSize;
  readonly frame_count: number;
  /** Index of the first frame cell in the sheet. Default: 0. */
  readonly frame_offset?: number;
  /** Milliseconds per frame. Defaults to the engine-wide frame interval. */
  readonly frame_interval?: number;
  /** Default: false (play once, then hold the last frame). */
  readonly loop?: boolean;
  /** Where the frame is drawn inside the sprite. Defaults to centred. */
  readonly render_offset?: readonly [number, number];
  /** Sheet row per state, for sheets that keep one direction per row. */
  readonly state_rows?: Readonly<Record<string, number>>;
}

/** Authored `sprite` component. */
export interface SpriteComponentDefinition {
  readonly sprite_size?: PixelSize;
  readonly animations?: readonly AnimationBlockDefinition[];
  readonly activity?: "stationary" | "moving" | "dead";
  readonly direction?: "north" | "east" | "south" | "west";
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

/** Field values overriding those inherited for one component kind. */
export type ComponentOverride = Readonly<Record<string, unknown>>;

/**
 * An authored entity template.
 *
 * Each `components` entry either overrides fields (an object) or resets the
 * kind to its defaults (`null`). Kinds not listed are inherited from `parent`.
 */
export interface TemplateDefinition {
  readonly parent?: string;
  readonly components?: Readonly<Record<string, ComponentOverride | null>>;
}

// ---------------------------------------------------------------------------
// Extension points
// ---------------------------------------------------------------------------

/** Declares where extra component kinds come from. */
export interface ComponentsSection {
  /** Name of the plugin group that contributes component schemas. */
  readonly entry_point_group?: string;
  /** Extra kinds with free-form data. */
  readonly kinds?: readonly string[];
}

/** Numeric (or flag) tunables of one system. */
export type SystemTunables = Readonly<Record<string, number | boolean | string>>;

/** Declares where systems come from, plus per-system tunables. */
export interface SystemsSection {
  readonly entry_point_group?: string;
  readonly [system: string]: SystemTunables | string | undefined;
}

// ---------------------------------------------------------------------------
// Top-level document
// ---------------------------------------------------------------------------

/**
 * Top-level structure of an entity document (`entities.json`).
 *
 * @example
 * ```json
 * {
 *   "entities": {
 *     "templates": {
 *       "human": { "components": { "position": null, "physics": { "core_size": [24, 16] } } },
 *       "guard": { "parent": "human", "components": { "health": null } }
 *     },
 *     "systems": { "health_regeneration": { "default_regeneration_amount": 1 } }
 *   }
 * }
 * ```
 */
export interface EntityDocument {
  readonly entities: {
    readonly templates: Readonly<Record<string, TemplateDefinition>>;
    readonly components?: ComponentsSection;
    readonly systems?: SystemsSection;
  };
}
