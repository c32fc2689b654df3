/**
 * Tests for the entity document JSON Schema.
 *
 * Uses ajv to validate sample documents against entity-document.schema.json.
 */

import { describe, it, expect, beforeAll } from "vitest";
import Ajv2020 from "ajv/dist/2020.js";
import type { ValidateFunction } from "ajv";
import { entityDocumentSchema } from "../src/index.js";
import type { EntityDocument } from "../src/index.js";

describe("entity-document.schema.json", () => {
  let validate: ValidateFunction<EntityDocument>;

  beforeAll(() => {
    const ajv = new Ajv2020({ allErrors: true, allowUnionTypes: true });
    validate = ajv.compile<EntityDocument>(entityDocumentSchema);
  });

  it("accepts templates with overrides, null resets and a parent", () => {
    const doc = {
      entities: {
        templates: {
          human: {
            components: {
              position: null,
              physics: { core_size: [24, 16] },
              sprite: {
                sprite_size: [64, 64],
                animations: [
                  {
                    layers: ["body.png", { asset: "hair.png", frame_count: 8 }],
                    states: ["moving_south"],
                    frame_count: 8,
                    frame_offset: 1,
                    loop: true,
                  },
                ],
              },
            },
          },
          guard: { parent: "human", components: { health: null } },
        },
        components: { kinds: ["inventory"] },
        systems: {
          entry_point_group: "town.systems",
          health_regeneration: { default_regeneration_amount: 1 },
        },
      },
    };

    expect(validate(doc)).toBe(true);
  });

  it("accepts a document with no templates", () => {
    expect(validate({ entities: { templates: {} } })).toBe(true);
  });

  it("rejects a document without templates", () => {
    expect(validate({ entities: {} })).toBe(false);
    expect(validate.errors?.[0]?.params).toEqual({ missingProperty: "templates" });
  });

  it("rejects unknown template fields", () => {
    const doc = { entities: { templates: { human: { extends: "base" } } } };
    expect(validate(doc)).toBe(false);
  });

  it("rejects a component value that is neither an object nor null", () => {
    const doc = { entities: { templates: { human: { components: { health: 5 } } } } };
    expect(validate(doc)).toBe(false);
    expect(validate.errors?.[0]?.instancePath).toBe("/entities/templates/human/components/health");
  });

  it("rejects an animation block without frame_count", () => {
    const doc = {
      entities: {
        templates: {
          human: {
            components: {
              sprite: { animations: [{ layers: ["body.png"], states: ["dead_south"] }] },
            },
          },
        },
      },
    };
    expect(validate(doc)).toBe(false);
  });

  it("rejects an animation block with no layers", () => {
    const doc = {
      entities: {
        templates: {
          human: {
            components: {
              sprite: { animations: [{ layers: [], states: ["dead_south"], frame_count: 6 }] },
            },
          },
        },
      },
    };
    expect(validate(doc)).toBe(false);
  });

  it("rejects a frame_size with three entries", () => {
    const doc = {
      entities: {
        templates: {
          human: {
            components: {
              sprite: {
                animations: [
                  { layers: ["a.png"], states: ["s"], frame_count: 1, frame_size: [64, 64, 64] },
                ],
              },
            },
          },
        },
      },
    };
    expect(validate(doc)).toBe(false);
  });

  it("rejects a zero frame_interval", () => {
    const doc = {
      entities: {
        templates: {
          human: {
            components: {
              sprite: {
                animations: [{ layers: ["a.png"], states: ["s"], frame_count: 1, frame_interval: 0 }],
              },
            },
          },
        },
      },
    };
    expect(validate(doc)).toBe(false);
  });

  it("rejects non-scalar system tunables", () => {
    const doc = {
      entities: {
        templates: {},
        systems: { mana_gathering: { default_gather_radius: [1, 2] } },
      },
    };
    expect(validate(doc)).toBe(false);
  });

  it("rejects an unknown sprite activity", () => {
    const doc = {
      entities: {
        templates: { human: { components: { sprite: { activity: "flying" } } } },
      },
    };
    expect(validate(doc)).toBe(false);
  });
});
