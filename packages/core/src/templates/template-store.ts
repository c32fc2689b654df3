/**
 * Named entity templates as authored.
 */

import type { TemplateDefinition } from "@spritekin/schema";
import { EntityError } from "../errors.js";
import type { ComponentEntry, EntityTemplate } from "./types.js";

/** Turn an authored definition into stored entries: `null` means default, an object overrides. */
export function normalizeTemplate(name: string, definition: TemplateDefinition): EntityTemplate {
  const components = new Map<string, ComponentEntry>();
  for (const [kind, value] of Object.entries(definition.components ?? {})) {
    components.set(kind, value === null ? { kind: "default" } : { kind: "override", value });
  }
  return {
    name,
    ...(definition.parent !== undefined && { parent: definition.parent }),
    components,
  };
}

export class TemplateStore {
  private readonly templates = new Map<string, EntityTemplate>();

  constructor(definitions: Readonly<Record<string, TemplateDefinition>> = {}) {
    for (const [name, definition] of Object.entries(definitions)) {
      this.add(name, definition);
    }
  }

  /** Add a template. Names are unique; adding one never alters another's resolution. */
  add(name: string, definition: TemplateDefinition): void {
    if (this.templates.has(name)) {
      throw new EntityError("DUPLICATE_TEMPLATE", `Template "${name}" is already defined`, {
        template: name,
      });
    }
    this.templates.set(name, normalizeTemplate(name, definition));
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  get(name: string): EntityTemplate | undefined {
    return this.templates.get(name);
  }

  /** Template names in the order they were added. */
  names(): readonly string[] {
    return [...this.templates.keys()];
  }

  get size(): number {
    return this.templates.size;
  }
}
