import { describe, it, expect, beforeEach, vi } from "vitest";
import type { SystemsSection } from "@spritekin/schema";
import {
  BUILTIN_SYSTEMS,
  EntityError,
  EntityStateFlag,
  EntityWorld,
  SystemRegistry,
  TemplateResolver,
  TemplateStore,
  animationStateSystem,
  deathSystem,
  directionOf,
  healthRegenerationSystem,
  manaGatheringSystem,
  manaReplenishmentSystem,
  movementSystem,
  silentLogger,
  velocitySystem,
} from "../src/index.js";
import type { BuiltinComponents, BuiltinKind, Entity, SystemProvider } from "../src/index.js";
import { TOWN_TEMPLATES } from "./fixtures.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function component<K extends BuiltinKind>(entity: Entity, kind: K): BuiltinComponents[K] {
  const value = entity.components.get(kind);
  if (!value) throw new Error(`${entity.id} has no ${kind}`);
  return value;
}

function createWorld(): EntityWorld {
  const resolver = new TemplateResolver(new TemplateStore(TOWN_TEMPLATES), { logger: silentLogger });
  return new EntityWorld({ resolver, logger: silentLogger });
}

function install(world: EntityWorld, providers: readonly SystemProvider[], section?: SystemsSection): void {
  world.systems.registerFromProviders(providers, section, {
    manaField: world.manaField,
    logger: silentLogger,
  });
}

function catchError(fn: () => unknown): EntityError {
  try {
    fn();
  } catch (err) {
    if (EntityError.isEntityError(err)) return err;
    throw err;
  }
  throw new Error("expected an EntityError");
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

describe("SystemRegistry", () => {
  it("runs systems once per tick in registration order", () => {
    const calls: string[] = [];
    const registry = new SystemRegistry();
    registry.register({ name: "b", requires: [], run: () => calls.push("b") });
    registry.register({ name: "a", requires: [], run: () => calls.push("a") });

    registry.run(createWorld(), 16);
    expect(calls).toEqual(["b", "a"]);
    expect(registry.names()).toEqual(["b", "a"]);
  });

  it("updates only entities holding every required kind", () => {
    const world = createWorld();
    world.spawn("human");
    const player = world.spawn("player");
    const seen: string[] = [];
    world.systems.register({
      name: "players",
      requires: ["player", "sprite"],
      update: (entity) => seen.push(entity.id),
    });

    world.tick(16);
    expect(seen).toEqual([player.id]);
  });

  it("passes the tick delta to every system", () => {
    const world = createWorld();
    const run = vi.fn();
    world.systems.register({ name: "spy", requires: [], run });
    world.tick(42);
    expect(run).toHaveBeenCalledWith({ world, dt: 42 });
  });

  it("rejects a duplicate name", () => {
    const registry = new SystemRegistry();
    registry.register({ name: "death", requires: [] });
    const err = catchError(() => registry.register({ name: "death", requires: [] }));
    expect(err.code).toBe("DUPLICATE_SYSTEM");
  });

  it("unregisters by name", () => {
    const registry = new SystemRegistry();
    registry.register({ name: "death", requires: [] });
    expect(registry.unregister("death")).toBe(true);
    expect(registry.unregister("death")).toBe(false);
    expect(registry.get("death")).toBeUndefined();
  });

  it("creates the built-in systems in run order", () => {
    const world = createWorld();
    install(world, BUILTIN_SYSTEMS);
    expect(world.systems.names()).toEqual([
      "velocity",
      "movement",
      "death",
      "animation_state",
      "health_regeneration",
      "mana_gathering",
      "mana_replenishment",
    ]);
  });

  it("rejects invalid tunables", () => {
    const world = createWorld();
    const err = catchError(() =>
      install(world, [healthRegenerationSystem], {
        health_regeneration: { default_regeneration_amount: -1 },
      }),
    );
    expect(err.code).toBe("INVALID_SYSTEM_CONFIG");
    expect(err.details?.["system"]).toBe("health_regeneration");
  });

  it("rejects tunables a system does not have", () => {
    const world = createWorld();
    const err = catchError(() =>
      install(world, [manaReplenishmentSystem], { mana_replenishment: { replenish_rate: 1 } }),
    );
    expect(err.code).toBe("INVALID_SYSTEM_CONFIG");
  });
});

// ---------------------------------------------------------------------------
// Built-in systems
// ---------------------------------------------------------------------------

describe("built-in systems", () => {
  let world: EntityWorld;
  let player: Entity;

  beforeEach(() => {
    world = createWorld();
    player = world.spawn("player");
  });

  describe("velocity", () => {
    it("follows the first held movement input", () => {
      install(world, [velocitySystem]);
      const input = component(player, "input");
      input.move_left = true;
      input.move_right = true;

      world.tick(16);
      expect(component(player, "velocity").direction).toEqual([-1, 0]);

      input.move_left = false;
      input.move_right = false;
      world.tick(16);
      expect(component(player, "velocity").direction).toEqual([0, 0]);
    });
  });

  describe("movement", () => {
    it("moves the primary position by speed and elapsed time", () => {
      install(world, [movementSystem]);
      component(player, "velocity").direction = [1, 0];

      world.tick(500);
      expect(component(player, "position").layer_position).toEqual([100, 0]);
      expect(component(player, "position").map_position).toEqual([0, 0]);
      expect(component(player, "sprite").activity).toBe("moving");
      expect(component(player, "sprite").direction).toBe("east");
    });

    it("turns stationary when the velocity stops", () => {
      install(world, [movementSystem]);
      component(player, "velocity").direction = [0, -1];
      world.tick(100);
      component(player, "velocity").direction = [0, 0];
      world.tick(100);

      expect(component(player, "sprite").activity).toBe("stationary");
      expect(component(player, "sprite").direction).toBe("north");
    });

    it("leaves entities that cannot move", () => {
      install(world, [movementSystem]);
      component(player, "state").state = EntityStateFlag.DEAD;
      component(player, "velocity").direction = [1, 0];

      world.tick(500);
      expect(component(player, "position").layer_position).toEqual([0, 0]);
      expect(component(player, "sprite").activity).toBe("stationary");
    });

    it("faces along the horizontal part of a diagonal", () => {
      expect(directionOf(1, 1)).toBe("east");
      expect(directionOf(-1, -1)).toBe("west");
      expect(directionOf(0, 1)).toBe("south");
      expect(directionOf(0, -1)).toBe("north");
    });
  });

  describe("animation_state", () => {
    it("plays the state matching activity and direction", () => {
      install(world, [movementSystem, animationStateSystem]);
      component(player, "velocity").direction = [-1, 0];

      world.tick(16);
      expect(world.playback(player.id)?.state).toBe("moving_west");
    });
  });

  describe("death", () => {
    it("marks the sprite dead, releases inputs and announces the death once", () => {
      install(world, [deathSystem, animationStateSystem]);
      const died = vi.fn();
      world.onEntityDied(died);
      component(player, "input").move_up = true;
      component(player, "input").mana_gather = true;
      component(player, "state").state = EntityStateFlag.DEAD;

      world.tick(16);
      world.tick(16);

      expect(component(player, "sprite").activity).toBe("dead");
      expect(component(player, "input").move_up).toBe(false);
      expect(component(player, "input").mana_gather).toBe(false);
      expect(died).toHaveBeenCalledTimes(1);
      expect(died).toHaveBeenCalledWith(player);
      expect(world.playback(player.id)?.state).toBe("dead_south");
    });
  });

  describe("health_regeneration", () => {
    it("adds the per-second amount scaled by elapsed time", () => {
      install(world, [healthRegenerationSystem], {
        health_regeneration: { default_regeneration_amount: 2 },
      });
      world.tick(1000);
      expect(component(player, "health").health).toBe(3);
    });

    it("stops at max", () => {
      install(world, [healthRegenerationSystem]);
      component(player, "health").health = 99.5;
      world.tick(1000);
      expect(component(player, "health").health).toBe(100);
    });

    it("skips entities that cannot replenish health", () => {
      install(world, [healthRegenerationSystem]);
      component(player, "state").state = EntityStateFlag.CAN_MOVE;
      world.tick(1000);
      expect(component(player, "health").health).toBe(1);
    });
  });

  describe("mana_gathering", () => {
    beforeEach(() => {
      install(world, [manaGatheringSystem]);
      component(player, "position").map_position = [0.4, 0.7];
      component(player, "input").mana_gather = true;
    });

    it("draws mana from tiles in reach into the entity", () => {
      world.manaField.setTile(0, 0, "fire", 5, 10);
      world.manaField.setTile(1, 1, "water", 2, 10);

      world.tick(1000);
      expect(component(player, "mana").mana).toEqual({ fire: 1, water: 1 });
      expect(world.manaField.tile(0, 0)?.get("fire")?.amount).toBe(4);
      expect(world.manaField.pendingReplenishment()).toEqual([
        { x: 0, y: 0, type: "fire" },
        { x: 1, y: 1, type: "water" },
      ]);
    });

    it("ignores tiles out of reach or nearly empty", () => {
      world.manaField.setTile(2, 0, "fire", 5, 10);
      world.manaField.setTile(0, 0, "fire", 0.05, 10);

      world.tick(1000);
      expect(component(player, "mana").mana).toEqual({});
      expect(world.manaField.pendingReplenishment()).toEqual([]);
    });

    it("returns what the entity cannot carry", () => {
      component(player, "mana").max = { fire: 0.5 };
      world.manaField.setTile(0, 0, "fire", 5, 10);

      world.tick(1000);
      expect(component(player, "mana").mana).toEqual({ fire: 0.5 });
      expect(world.manaField.tile(0, 0)?.get("fire")?.amount).toBe(4.5);
    });

    it("does nothing while the input is released", () => {
      component(player, "input").mana_gather = false;
      world.manaField.setTile(0, 0, "fire", 5, 10);
      world.tick(1000);
      expect(world.manaField.tile(0, 0)?.get("fire")?.amount).toBe(5);
    });
  });

  describe("mana_replenishment", () => {
    it("refills marked tiles up to capacity, then unmarks them", () => {
      install(world, [manaReplenishmentSystem], {
        mana_replenishment: { default_replenishment_amount: 2 },
      });
      world.manaField.setTile(0, 0, "fire", 4, 10);
      world.manaField.markForReplenishment(0, 0, "fire");

      world.tick(1000);
      expect(world.manaField.tile(0, 0)?.get("fire")?.amount).toBe(6);
      expect(world.manaField.pendingReplenishment()).toHaveLength(1);

      world.tick(3000);
      expect(world.manaField.tile(0, 0)?.get("fire")?.amount).toBe(10);
      expect(world.manaField.pendingReplenishment()).toEqual([]);
    });
  });
});
