/** `[width, height]` or `[x, y]` in pixels. */
export type Vec2 = readonly [number, number];

/** One sheet of a compiled animation. */
export interface CompiledLayer {
  readonly asset: string;
  /** Frame cells per sheet row. */
  readonly columns: number;
}

/** Everything needed to play one animation state. Frozen once compiled. */
export interface CompiledAnimation {
  readonly state: string;
  /** Back-to-front compositing order. */
  readonly layers: readonly CompiledLayer[];
  readonly frameSize: Vec2;
  readonly frameCount: number;
  /** Index of the first frame cell, counted in frames, not pixels. */
  readonly frameOffset: number;
  readonly frameRow: number;
  /** Milliseconds per frame. */
  readonly frameInterval: number;
  readonly loop: boolean;
  /** Where the frame is drawn inside the sprite canvas. */
  readonly renderOffset: Vec2;
}

/** Source rectangle of a frame inside its sheet, in pixels. */
export interface FrameRect {
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

/** One layer of the composited frame, ready for the renderer to blit. */
export interface FrameLayer {
  readonly asset: string;
  readonly rect: FrameRect;
  readonly offset: Vec2;
}

/** Pixel dimensions of sprite sheets, when the host knows them. */
export interface AssetSizeProvider {
  sizeOf(asset: string): { readonly width: number; readonly height: number } | undefined;
}

export interface PlaybackSnapshot {
  readonly currentState: string | undefined;
  readonly elapsed: number;
  readonly frameIndex: number;
  readonly finished: boolean;
}
