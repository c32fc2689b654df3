/**
 * Inspection reports: what a template resolves to and what its sprite
 * draws after a number of playback ticks.
 */

import type { FrameLayer } from "@spritekin/core";
import type { Engine } from "./engine.js";

export interface TemplateSummary {
  readonly name: string;
  readonly parent?: string;
}

export interface PlaybackReport {
  readonly state: string;
  /** Milliseconds played. */
  readonly played: number;
  readonly frameIndex: number;
  readonly finished: boolean;
  readonly layers: readonly FrameLayer[];
}

export interface TemplateReport {
  readonly name: string;
  /** Root ancestor first. */
  readonly chain: readonly string[];
  readonly components: Record<string, unknown>;
  readonly states: readonly string[];
  readonly playback?: PlaybackReport;
}

export interface InspectOptions {
  readonly state?: string;
  readonly ticks?: number;
  /** Default: the engine's frame interval. */
  readonly dt?: number;
}

export function listTemplates(engine: Engine): TemplateSummary[] {
  return engine.store.names().map((name) => {
    const parent = engine.store.get(name)?.parent;
    return parent === undefined ? { name } : { name, parent };
  });
}

/**
 * Spawn `name` into the engine's world and play its animation for
 * `ticks × dt` milliseconds. Systems do not run.
 *
 * @throws {EntityError} `UNKNOWN_TEMPLATE`, or `UNKNOWN_ANIMATION_STATE`
 *   when `options.state` is not claimed by the sprite.
 */
export function inspectTemplate(engine: Engine, name: string, options: InspectOptions = {}): TemplateReport {
  const resolved = engine.resolver.resolve(name);
  const entity = engine.world.spawn(name);
  const report = {
    name,
    chain: resolved.chain,
    components: resolved.components.toJSON(),
    states: engine.world.spriteFor(name).states(),
  };

  try {
    const playback = engine.world.playback(entity.id);
    if (!playback) return report;

    if (options.state !== undefined) playback.setState(options.state);
    const ticks = options.ticks ?? 0;
    const dt = options.dt ?? engine.config.defaultFrameInterval;
    for (let i = 0; i < ticks; i++) {
      playback.advance(dt);
    }

    const state = playback.state;
    if (state === undefined) return report;
    return {
      ...report,
      playback: {
        state,
        played: ticks * dt,
        frameIndex: playback.frameIndex,
        finished: playback.finished,
        layers: playback.currentFrame(),
      },
    };
  } finally {
    engine.world.destroy(entity.id);
  }
}

export function formatTemplateList(templates: readonly TemplateSummary[]): string {
  return templates.map((t) => (t.parent === undefined ? t.name : `${t.name} (parent: ${t.parent})`)).join("\n");
}

export function formatTemplateReport(report: TemplateReport): string {
  const lines = [
    `${report.name} (${report.chain.join(" -> ")})`,
    `components: ${Object.keys(report.components).join(", ")}`,
    `states: ${report.states.length > 0 ? report.states.join(", ") : "(none)"}`,
  ];

  const playback = report.playback;
  if (playback) {
    const status = playback.finished ? ", finished" : "";
    lines.push(`${playback.state} frame ${playback.frameIndex} after ${playback.played} ms${status}:`);
    for (const layer of playback.layers) {
      const { x, y, w, h } = layer.rect;
      lines.push(`  ${layer.asset} [${x}, ${y}, ${w}, ${h}] at [${layer.offset.join(", ")}]`);
    }
  }
  return lines.join("\n");
}
