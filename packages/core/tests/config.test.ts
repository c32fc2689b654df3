import { describe, it, expect, vi, afterEach } from "vitest";
import {
  DEFAULT_ENGINE_CONFIG,
  EntityError,
  createConsoleLogger,
  resolveEngineConfig,
} from "../src/index.js";

// ---------------------------------------------------------------------------
// Engine config
// ---------------------------------------------------------------------------

describe("resolveEngineConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(resolveEngineConfig({}, {})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("reads SPRITEKIN_* variables", () => {
    const config = resolveEngineConfig(
      {},
      { SPRITEKIN_FRAME_INTERVAL: "250", SPRITEKIN_TICK_INTERVAL: "33", SPRITEKIN_LOG_LEVEL: "debug" },
    );
    expect(config).toEqual({
      defaultFrameInterval: 250,
      tickInterval: 33,
      initialAnimationState: "stationary_south",
      logLevel: "debug",
    });
  });

  it("lets explicit overrides win over the environment", () => {
    const config = resolveEngineConfig({ defaultFrameInterval: 50 }, { SPRITEKIN_FRAME_INTERVAL: "250" });
    expect(config.defaultFrameInterval).toBe(50);
  });

  it("rejects a malformed environment variable", () => {
    let caught: unknown;
    try {
      resolveEngineConfig({}, { SPRITEKIN_LOG_LEVEL: "loud" });
    } catch (err) {
      caught = err;
    }
    expect(EntityError.isEntityError(caught) && caught.code).toBe("INVALID_CONFIG");
    expect(EntityError.isEntityError(caught) && caught.message).toBe("Invalid SPRITEKIN_* environment settings");
  });

  it("lists the failing fields of an invalid override", () => {
    let caught: unknown;
    try {
      resolveEngineConfig({ tickInterval: 0 }, {});
    } catch (err) {
      caught = err;
    }
    expect(EntityError.isEntityError(caught) && caught.details).toEqual({
      issues: ["tickInterval: Number must be greater than 0"],
    });
  });
});

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createConsoleLogger("spritekin:test").warn("low mana", 3);
    expect(warn).toHaveBeenCalledWith("[spritekin:test] low mana", 3);
  });

  it("drops messages below its level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createConsoleLogger("spritekin:test", "error");

    logger.info("spawned");
    logger.error("failed");

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[spritekin:test] failed");
  });

  it("logs nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger("spritekin:test", "silent").error("failed");
    expect(error).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe("EntityError", () => {
  it("names the child of a missing parent", () => {
    const err = EntityError.unknownTemplate("human", "town_guard");
    expect(err.message).toBe('Unknown template "human" (parent of "town_guard")');
    expect(err.details).toEqual({ template: "human", referencedBy: "town_guard" });
  });

  it("spells out an inheritance cycle", () => {
    const err = EntityError.cyclicInheritance(["a", "b", "a"]);
    expect(err.message).toBe("Cyclic template inheritance: a -> b -> a");
    expect(err.details).toEqual({ chain: ["a", "b", "a"] });
  });

  it("serializes to JSON without empty details", () => {
    const err = new EntityError("UNKNOWN_ENTITY", 'Unknown entity "entity-9"');
    expect(JSON.parse(JSON.stringify(err))).toEqual({
      name: "EntityError",
      code: "UNKNOWN_ENTITY",
      message: 'Unknown entity "entity-9"',
    });
  });

  it("is an Error", () => {
    const err = EntityError.unclaimedStateReference("idle");
    expect(err).toBeInstanceOf(Error);
    expect(EntityError.isEntityError(err)).toBe(true);
    expect(EntityError.isEntityError(new Error("idle"))).toBe(false);
  });
});
