/**
 * @spritekin/loader: entity documents in, a ready engine out.
 */

export { formatSchemaErrors, loadEntityDocument, parseEntityDocument } from "./document.js";
export { createEngine, createSimulation, createTemplateStore } from "./engine.js";
export type { Engine, EngineOptions } from "./engine.js";
export { lintEngine } from "./lint.js";
export type { LintResult } from "./lint.js";
export {
  formatTemplateList,
  formatTemplateReport,
  inspectTemplate,
  listTemplates,
} from "./inspect.js";
export type { InspectOptions, PlaybackReport, TemplateReport, TemplateSummary } from "./inspect.js";
export { parseInspectConfig } from "./config.js";
export type { InspectConfig } from "./config.js";
