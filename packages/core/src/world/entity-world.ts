/**
 * Entity world: the live entities of one game session, their component
 * data and their animation playbacks.
 */

import { AnimationPlayback, compileSprite } from "../animation/index.js";
import type { AssetSizeProvider, ResolvedSprite } from "../animation/index.js";
import { parseBuiltinComponent } from "../components/index.js";
import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import type { EngineConfig } from "../config.js";
import { EntityError } from "../errors.js";
import { createConsoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { ManaField, SystemRegistry } from "../systems/index.js";
import type { SystemWorld } from "../systems/index.js";
import type { TemplateResolver } from "../templates/index.js";
import type { Entity } from "./entity.js";

export interface EntityWorldOptions {
  readonly resolver: TemplateResolver;
  readonly config?: EngineConfig;
  readonly logger?: Logger;
  /** Enables frame range checks when compiling sprites. */
  readonly assetSizes?: AssetSizeProvider;
  readonly systems?: SystemRegistry;
  readonly manaField?: ManaField;
}

export type EntityDiedListener = (entity: Entity) => void;

export class EntityWorld implements SystemWorld {
  readonly systems: SystemRegistry;
  readonly manaField: ManaField;
  readonly config: EngineConfig;
  private readonly resolver: TemplateResolver;
  private readonly logger: Logger;
  private readonly assetSizes: AssetSizeProvider | undefined;
  private readonly live = new Map<string, Entity>();
  private readonly playbacks = new Map<string, AnimationPlayback>();
  private readonly sprites = new Map<string, ResolvedSprite>();
  /** Last unknown state requested per entity, so repeated requests warn once. */
  private readonly rejected = new Map<string, string>();
  private readonly diedListeners = new Set<EntityDiedListener>();
  private nextId = 1;

  constructor(options: EntityWorldOptions) {
    this.resolver = options.resolver;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.logger = options.logger ?? createConsoleLogger("spritekin:world", this.config.logLevel);
    this.assetSizes = options.assetSizes;
    this.systems = options.systems ?? new SystemRegistry();
    this.manaField = options.manaField ?? new ManaField();
  }

  /**
   * Create an entity from a template. Its components are a deep copy of the
   * resolved template, so changing them affects no other entity.
   */
  spawn(templateName: string): Entity {
    const resolved = this.resolver.resolve(templateName);
    const entity: Entity = {
      id: `entity-${this.nextId++}`,
      template: templateName,
      components: resolved.components.clone(),
    };
    this.live.set(entity.id, entity);

    const sprite = entity.components.get("sprite");
    if (sprite) {
      const compiled = this.spriteFor(templateName);
      const preferred = `${sprite.activity}_${sprite.direction}`;
      const initial = compiled.has(preferred) ? preferred : this.config.initialAnimationState;
      this.playbacks.set(entity.id, new AnimationPlayback(compiled, initial));
    }

    this.logger.debug(`Spawned ${entity.id} from "${templateName}"`);
    return entity;
  }

  /** @throws {EntityError} `UNKNOWN_ENTITY` */
  destroy(id: string): void {
    this.require(id);
    this.live.delete(id);
    this.playbacks.delete(id);
    this.rejected.delete(id);
    this.logger.debug(`Destroyed ${id}`);
  }

  get(id: string): Entity | undefined {
    return this.live.get(id);
  }

  /** @throws {EntityError} `UNKNOWN_ENTITY` */
  require(id: string): Entity {
    const entity = this.live.get(id);
    if (!entity) {
      throw new EntityError("UNKNOWN_ENTITY", `Unknown entity "${id}"`, { entity: id });
    }
    return entity;
  }

  /** Live entities in spawn order. */
  entities(): Entity[] {
    return [...this.live.values()];
  }

  query(kinds: readonly string[]): Entity[] {
    return this.entities().filter((entity) => entity.components.hasAll(kinds));
  }

  /**
   * The entity's playback, or `undefined` when it has no sprite.
   *
   * @throws {EntityError} `UNKNOWN_ENTITY`
   */
  playback(id: string): AnimationPlayback | undefined {
    this.require(id);
    return this.playbacks.get(id);
  }

  /**
   * Switch an entity's animation. States its sprite does not claim are
   * logged and ignored, keeping the current animation.
   *
   * @returns Whether the playback switched to `state`.
   * @throws {EntityError} `UNKNOWN_ENTITY`
   */
  setAnimationState(id: string, state: string): boolean {
    const playback = this.playback(id);
    if (!playback || playback.state === state) return false;

    try {
      playback.setState(state);
    } catch (err) {
      if (!EntityError.isEntityError(err) || err.code !== "UNKNOWN_ANIMATION_STATE") throw err;
      if (this.rejected.get(id) !== state) {
        this.rejected.set(id, state);
        this.logger.warn(`${id}: ${err.message}, keeping "${playback.state ?? "(none)"}"`);
      }
      return false;
    }

    this.rejected.delete(id);
    return true;
  }

  /** The compiled sprite of a template, shared by all its entities. */
  spriteFor(templateName: string): ResolvedSprite {
    const cached = this.sprites.get(templateName);
    if (cached) return cached;

    const sprite =
      this.resolver.resolve(templateName).components.get("sprite") ?? parseBuiltinComponent("sprite", {});
    const compiled = compileSprite(sprite, {
      defaultFrameInterval: this.config.defaultFrameInterval,
      ...(this.assetSizes && { assetSizes: this.assetSizes }),
    });
    this.sprites.set(templateName, compiled);
    return compiled;
  }

  /** Subscribe to deaths reported by systems. Returns an unsubscribe function. */
  onEntityDied(listener: EntityDiedListener): () => void {
    this.diedListeners.add(listener);
    return () => {
      this.diedListeners.delete(listener);
    };
  }

  notifyDied(entity: Entity): void {
    this.logger.info(`${entity.id} ("${entity.template}") died`);
    for (const listener of [...this.diedListeners]) {
      listener(entity);
    }
  }

  /** Run every system, then advance every playback by `dt` milliseconds. */
  tick(dt: number): void {
    this.systems.run(this, dt);
    for (const playback of this.playbacks.values()) {
      playback.advance(dt);
    }
  }

  get size(): number {
    return this.live.size;
  }
}
