/**
 * Animation layer compiler: turns the animation blocks of a resolved
 * `sprite` component into per-state playback data.
 */

import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import { EntityError } from "../errors.js";
import type { AnimationBlock, AnimationLayer, SpriteComponent } from "../components/index.js";
import { ResolvedSprite } from "./resolved-sprite.js";
import type { AssetSizeProvider, CompiledAnimation, CompiledLayer, Vec2 } from "./types.js";

export interface CompileOptions {
  /** Milliseconds per frame for blocks without `frame_interval`. Default: 100. */
  readonly defaultFrameInterval?: number;
  /** Sheet sizes; when a sheet's size is known its frame range is checked. */
  readonly assetSizes?: AssetSizeProvider;
}

function sameSize(a: Vec2, b: Vec2): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/** Reject a layer object whose declared geometry differs from its block's. */
function checkLayerGeometry(layer: AnimationLayer, block: AnimationBlock, frameSize: Vec2): void {
  if (typeof layer === "string") return;

  const mismatch = (field: string, expected: unknown, actual: unknown): EntityError =>
    new EntityError(
      "DUPLICATE_LAYER_COUNT_MISMATCH",
      `Layer "${layer.asset}" declares ${field} ${JSON.stringify(actual)}, but its block (${block.states.join(", ")}) uses ${JSON.stringify(expected)}`,
      { asset: layer.asset, states: [...block.states], field, expected, actual },
    );

  if (layer.frame_size !== undefined && !sameSize(layer.frame_size, frameSize)) {
    throw mismatch("frame_size", frameSize, layer.frame_size);
  }
  if (layer.frame_count !== undefined && layer.frame_count !== block.frame_count) {
    throw mismatch("frame_count", block.frame_count, layer.frame_count);
  }
  if (layer.frame_offset !== undefined && layer.frame_offset !== block.frame_offset) {
    throw mismatch("frame_offset", block.frame_offset, layer.frame_offset);
  }
}

function compileLayer(
  layer: AnimationLayer,
  block: AnimationBlock,
  frameSize: Vec2,
  assetSizes: AssetSizeProvider | undefined,
): CompiledLayer {
  checkLayerGeometry(layer, block, frameSize);
  const asset = typeof layer === "string" ? layer : layer.asset;
  const sheet = assetSizes?.sizeOf(asset);

  // Without a known sheet size, assume one row just wide enough.
  if (!sheet) {
    return Object.freeze({ asset, columns: block.frame_offset + block.frame_count });
  }

  const columns = Math.floor(sheet.width / frameSize[0]);
  const rows = Math.floor(sheet.height / frameSize[1]);
  for (const state of block.states) {
    const row = block.state_rows?.[state] ?? 0;
    const end = row * columns + block.frame_offset + block.frame_count;
    if (columns === 0 || end > columns * rows) {
      throw new EntityError(
        "FRAME_RANGE_EXCEEDS_SHEET",
        `State "${state}" needs frame cells up to ${end} of "${asset}", which holds ${columns * rows}`,
        { asset, state, frameRow: row, cellsNeeded: end, cellsAvailable: columns * rows },
      );
    }
  }
  return Object.freeze({ asset, columns });
}

/**
 * Compile every animation block of a sprite.
 *
 * A state claimed by several blocks takes the last one.
 *
 * @throws {EntityError} `DUPLICATE_LAYER_COUNT_MISMATCH`, `FRAME_RANGE_EXCEEDS_SHEET`
 *   or `INVALID_COMPONENT` when a block has no usable frame size.
 */
export function compileSprite(sprite: SpriteComponent, options: CompileOptions = {}): ResolvedSprite {
  const defaultFrameInterval = options.defaultFrameInterval ?? DEFAULT_ENGINE_CONFIG.defaultFrameInterval;
  const [spriteW, spriteH] = sprite.sprite_size;
  const animations = new Map<string, CompiledAnimation>();

  for (const block of sprite.animations) {
    const [frameW, frameH] = block.frame_size ?? sprite.sprite_size;
    const frameSize: Vec2 = [frameW, frameH];
    if (frameW <= 0 || frameH <= 0) {
      throw new EntityError(
        "INVALID_COMPONENT",
        `Animation block (${block.states.join(", ")}) has no frame_size and the sprite_size is ${spriteW}x${spriteH}`,
        { kind: "sprite", states: [...block.states] },
      );
    }

    const layers = Object.freeze(
      block.layers.map((layer) => compileLayer(layer, block, frameSize, options.assetSizes)),
    );
    const [offsetX, offsetY] = block.render_offset ?? [(spriteW - frameW) / 2, (spriteH - frameH) / 2];
    const renderOffset: Vec2 = [offsetX, offsetY];

    for (const state of block.states) {
      animations.set(
        state,
        Object.freeze({
          state,
          layers,
          frameSize,
          frameCount: block.frame_count,
          frameOffset: block.frame_offset,
          frameRow: block.state_rows?.[state] ?? 0,
          frameInterval: block.frame_interval ?? defaultFrameInterval,
          loop: block.loop,
          renderOffset,
        }),
      );
    }
  }

  return new ResolvedSprite([spriteW, spriteH], animations);
}
