export { compileSprite } from "./compiler.js";
export type { CompileOptions } from "./compiler.js";
export { ResolvedSprite } from "./resolved-sprite.js";
export { AnimationPlayback } from "./playback.js";
export type { FinishedListener } from "./playback.js";
export type {
  AssetSizeProvider,
  CompiledAnimation,
  CompiledLayer,
  FrameLayer,
  FrameRect,
  PlaybackSnapshot,
  Vec2,
} from "./types.js";
