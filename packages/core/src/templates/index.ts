export { TemplateStore, normalizeTemplate } from "./template-store.js";
export { TemplateResolver } from "./template-resolver.js";
export type { TemplateResolverOptions } from "./template-resolver.js";
export { applyTemplate, mergeAnimationBlocks, mergeComponent } from "./merge.js";
export type { RawComponents } from "./merge.js";
export type { ComponentEntry, EntityTemplate, ResolvedTemplate } from "./types.js";
