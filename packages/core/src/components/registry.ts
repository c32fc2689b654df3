/**
 * Component schema registry: the set of component kinds templates may use.
 *
 * Kinds come from `ComponentSchemaProvider`s. The built-in provider is
 * always registered; hosts add their own kinds through further providers.
 */

import { z } from "zod";
import { EntityError, formatZodIssues } from "../errors.js";
import type { ComponentData, ComponentSet } from "./component-set.js";
import {
  BUILTIN_COMPONENT_SCHEMAS,
  BUILTIN_KINDS,
  isBuiltinKind,
  parseBuiltinComponent,
} from "./schemas.js";

/** A component kind and the schema its data must satisfy. */
export interface ComponentSchema {
  readonly kind: string;
  readonly schema: z.ZodType<ComponentData, z.ZodTypeDef, unknown>;
}

/** Source of component kinds, e.g. a game plugin. */
export interface ComponentSchemaProvider {
  readonly name: string;
  schemas(): readonly ComponentSchema[];
}

export const builtinComponentProvider: ComponentSchemaProvider = {
  name: "builtin",
  schemas: () => BUILTIN_KINDS.map((kind) => ({ kind, schema: BUILTIN_COMPONENT_SCHEMAS[kind] })),
};

/**
 * A provider for kinds that carry free-form data (default `{}`), used for
 * kinds an entity document declares without a schema.
 */
export function openComponentProvider(
  name: string,
  kinds: readonly string[],
): ComponentSchemaProvider {
  const schema = z.record(z.unknown());
  return {
    name,
    schemas: () => kinds.map((kind) => ({ kind, schema })),
  };
}

export class ComponentSchemaRegistry {
  private readonly schemas = new Map<string, ComponentSchema>();
  private readonly owners = new Map<string, string>();

  constructor(providers: readonly ComponentSchemaProvider[] = []) {
    this.register(builtinComponentProvider);
    for (const provider of providers) {
      this.register(provider);
    }
  }

  /** Add every kind of a provider. A kind may only be declared once. */
  register(provider: ComponentSchemaProvider): void {
    for (const entry of provider.schemas()) {
      const owner = this.owners.get(entry.kind);
      if (owner !== undefined) {
        throw new EntityError(
          "DUPLICATE_COMPONENT_KIND",
          `Component kind "${entry.kind}" from "${provider.name}" is already declared by "${owner}"`,
          { kind: entry.kind, provider: provider.name, owner },
        );
      }
      this.schemas.set(entry.kind, entry);
      this.owners.set(entry.kind, provider.name);
    }
  }

  has(kind: string): boolean {
    return this.schemas.has(kind);
  }

  kinds(): readonly string[] {
    return [...this.schemas.keys()];
  }

  /** The value an authored `null` stands for. */
  defaultValue(kind: string): ComponentData {
    return this.schemaFor(kind).schema.parse({});
  }

  /**
   * Validate `raw` as `kind`, fill its defaults and store it in `target`.
   *
   * @param context - Template name, used in error messages.
   */
  parseInto(target: ComponentSet, kind: string, raw: unknown, context: string): void {
    const schema = this.schemaFor(kind, context);
    try {
      if (isBuiltinKind(kind)) {
        target.setBuiltin(kind, parseBuiltinComponent(kind, raw));
      } else {
        target.setExtension(kind, schema.schema.parse(raw));
      }
    } catch (err) {
      if (err instanceof z.ZodError) {
        throw new EntityError(
          "INVALID_COMPONENT",
          `Template "${context}": invalid "${kind}" component`,
          { template: context, kind, issues: formatZodIssues(err) },
        );
      }
      throw err;
    }
  }

  /**
   * The schema registered for `kind`.
   *
   * @param context - Template name, used in error messages.
   */
  schemaFor(kind: string, context?: string): ComponentSchema {
    const schema = this.schemas.get(kind);
    if (!schema) {
      const where = context ? `Template "${context}": ` : "";
      throw new EntityError("UNKNOWN_COMPONENT_KIND", `${where}unknown component kind "${kind}"`, {
        kind,
        ...(context && { template: context }),
        known: this.kinds(),
      });
    }
    return schema;
  }
}
