/**
 * @spritekin/schema: JSON Schema and TypeScript types for entity documents.
 *
 * The schema is the source of truth; the TypeScript types are aligned with it.
 */

import entityDocumentSchema from "./entity-document.schema.json";

export { entityDocumentSchema };

export type {
  PixelSize,
  AnimationLayerDefinition,
  AnimationBlockDefinition,
  SpriteComponentDefinition,
  ComponentOverride,
  TemplateDefinition,
  ComponentsSection,
  SystemTunables,
  SystemsSection,
  EntityDocument,
} from "./entity-document-types.js";
