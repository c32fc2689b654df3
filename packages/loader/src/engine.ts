/**
 * Engine assembly: turns a validated entity document into a template
 * store, a resolver and a world with its systems registered.
 *
 * Every template is resolved and every sprite compiled up front, so a
 * broken document fails here rather than at the first spawn.
 */

import {
  BUILTIN_SYSTEMS,
  ComponentSchemaRegistry,
  EntityWorld,
  IntervalTicker,
  Simulation,
  TemplateResolver,
  TemplateStore,
  createConsoleLogger,
  openComponentProvider,
  resolveEngineConfig,
} from "@spritekin/core";
import type {
  AssetSizeProvider,
  ComponentSchemaProvider,
  EngineConfig,
  Logger,
  SystemProvider,
  TickSource,
} from "@spritekin/core";
import type { EntityDocument } from "@spritekin/schema";

export interface EngineOptions {
  /** Default: `resolveEngineConfig()`, i.e. defaults plus `SPRITEKIN_*` variables. */
  readonly config?: EngineConfig;
  readonly logger?: Logger;
  /** Sheet sizes for frame range checks. */
  readonly assetSizes?: AssetSizeProvider;
  /** Component kinds beyond the built-in ones and the document's own `kinds`. */
  readonly componentProviders?: readonly ComponentSchemaProvider[];
  /** Default: `BUILTIN_SYSTEMS`. */
  readonly systemProviders?: readonly SystemProvider[];
}

export interface Engine {
  readonly document: EntityDocument;
  readonly store: TemplateStore;
  readonly registry: ComponentSchemaRegistry;
  readonly resolver: TemplateResolver;
  readonly world: EntityWorld;
  readonly config: EngineConfig;
}

export function createTemplateStore(document: EntityDocument): TemplateStore {
  return new TemplateStore(document.entities.templates);
}

/**
 * @throws {EntityError} Any load-time error: unknown or cyclic parents,
 *   unknown or invalid components, mismatched layers, bad system tunables.
 */
export function createEngine(document: EntityDocument, options: EngineOptions = {}): Engine {
  const config = options.config ?? resolveEngineConfig();
  const logger = options.logger ?? createConsoleLogger("spritekin:loader", config.logLevel);

  const documentKinds = document.entities.components?.kinds ?? [];
  const registry = new ComponentSchemaRegistry([
    ...(documentKinds.length > 0 ? [openComponentProvider("document", documentKinds)] : []),
    ...(options.componentProviders ?? []),
  ]);

  const store = createTemplateStore(document);
  const resolver = new TemplateResolver(store, { registry, logger: options.logger });
  const world = new EntityWorld({
    resolver,
    config,
    logger: options.logger,
    assetSizes: options.assetSizes,
  });

  world.systems.registerFromProviders(options.systemProviders ?? BUILTIN_SYSTEMS, document.entities.systems, {
    manaField: world.manaField,
    logger,
  });

  for (const name of store.names()) {
    world.spriteFor(name);
  }

  logger.info(`Loaded ${store.size} templates and ${world.systems.size} systems`);
  return { document, store, registry, resolver, world, config };
}

/**
 * A stopped simulation of the engine's world. Ticks every
 * `config.tickInterval` ms of real time unless given another source.
 */
export function createSimulation(engine: Engine, source?: TickSource, logger?: Logger): Simulation {
  return new Simulation({
    source: source ?? new IntervalTicker(engine.config.tickInterval),
    world: engine.world,
    logger: logger ?? createConsoleLogger("spritekin:simulation", engine.config.logLevel),
  });
}
