/**
 * Template resolver: merges a template with its ancestor chain into a
 * flat, default-filled component set.
 *
 * Parent chains are walked iteratively, so inheritance depth is bounded by
 * memory, not by the call stack. Every template resolved on the way is
 * memoized, including intermediate ancestors.
 */

import { ComponentSchemaRegistry, ComponentSet } from "../components/index.js";
import { EntityError } from "../errors.js";
import { createConsoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { applyTemplate } from "./merge.js";
import type { RawComponents } from "./merge.js";
import type { TemplateStore } from "./template-store.js";
import type { EntityTemplate, ResolvedTemplate } from "./types.js";

export interface TemplateResolverOptions {
  /** Component kinds templates may use. Default: built-in kinds only. */
  readonly registry?: ComponentSchemaRegistry;
  readonly logger?: Logger;
}

const NO_COMPONENTS: RawComponents = new Map();

interface CacheEntry {
  readonly resolved: ResolvedTemplate;
  readonly raw: RawComponents;
}

export class TemplateResolver {
  readonly registry: ComponentSchemaRegistry;
  private readonly store: TemplateStore;
  private readonly logger: Logger;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(store: TemplateStore, options: TemplateResolverOptions = {}) {
    this.store = store;
    this.registry = options.registry ?? new ComponentSchemaRegistry();
    this.logger = options.logger ?? createConsoleLogger("spritekin:templates");
  }

  /**
   * Resolve a template by name.
   *
   * @throws {EntityError} `UNKNOWN_TEMPLATE`, `CYCLIC_INHERITANCE`,
   *   `UNKNOWN_COMPONENT_KIND` or `INVALID_COMPONENT`.
   */
  resolve(name: string): ResolvedTemplate {
    const cached = this.cache.get(name);
    if (cached) return cached.resolved;

    // Walk up until the root or the nearest memoized ancestor.
    const pending: EntityTemplate[] = [];
    const visited = new Set<string>();
    let base: CacheEntry | undefined;
    let current: string | undefined = name;
    let child: string | undefined;

    while (current !== undefined) {
      base = this.cache.get(current);
      if (base) break;
      if (visited.has(current)) {
        throw EntityError.cyclicInheritance([...pending.map((t) => t.name), current]);
      }
      visited.add(current);

      const template = this.store.get(current);
      if (!template) throw EntityError.unknownTemplate(current, child);
      pending.push(template);
      child = current;
      current = template.parent;
    }

    // Apply root-first.
    let entry = base;
    for (const template of pending.reverse()) {
      const raw = applyTemplate(entry?.raw ?? NO_COMPONENTS, template, this.registry);
      const chain = [...(entry?.resolved.chain ?? []), template.name];
      entry = { raw, resolved: this.finish(template.name, chain, raw) };
      this.cache.set(template.name, entry);
    }

    if (!entry) throw EntityError.unknownTemplate(name);
    this.logger.debug(`Resolved "${name}" (${entry.resolved.chain.join(" -> ")})`);
    return entry.resolved;
  }

  /** Resolve every stored template, in store order. */
  resolveAll(): ResolvedTemplate[] {
    return this.store.names().map((name) => this.resolve(name));
  }

  /** Names of the stored templates. */
  names(): readonly string[] {
    return this.store.names();
  }

  private finish(name: string, chain: readonly string[], raw: RawComponents): ResolvedTemplate {
    const components = new ComponentSet();
    for (const [kind, value] of raw) {
      this.registry.parseInto(components, kind, value, name);
    }
    // Parsed values may share nested data with the authored document.
    return { name, chain, components: components.clone().freeze() };
  }
}
