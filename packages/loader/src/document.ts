/**
 * Entity document parsing: JSON text or a parsed value in, a
 * schema-checked `EntityDocument` out.
 */

import { readFile } from "node:fs/promises";
import Ajv2020 from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";
import { EntityError } from "@spritekin/core";
import { entityDocumentSchema } from "@spritekin/schema";
import type { EntityDocument } from "@spritekin/schema";

let validator: ValidateFunction<EntityDocument> | undefined;

function getValidator(): ValidateFunction<EntityDocument> {
  if (!validator) {
    const ajv = new Ajv2020({ allErrors: true, allowUnionTypes: true });
    validator = ajv.compile<EntityDocument>(entityDocumentSchema);
  }
  return validator;
}

/** One `<pointer>: <message>` line per ajv error. */
export function formatSchemaErrors(errors: readonly ErrorObject[]): string[] {
  return errors.map((error) => `${error.instancePath || "/"}: ${error.message ?? "is invalid"}`);
}

/**
 * Validate an entity document against `entity-document.schema.json`.
 *
 * @param input - JSON text, or an already parsed value.
 * @param source - File name or label, used in error messages.
 * @throws {EntityError} `INVALID_DOCUMENT`
 */
export function parseEntityDocument(input: unknown, source = "entity document"): EntityDocument {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (err) {
      throw new EntityError("INVALID_DOCUMENT", `${source}: not valid JSON`, {
        source,
        issues: [err instanceof Error ? err.message : String(err)],
      });
    }
  }

  const validate = getValidator();
  if (!validate(value)) {
    throw new EntityError("INVALID_DOCUMENT", `${source}: does not match the entity document schema`, {
      source,
      issues: formatSchemaErrors(validate.errors ?? []),
    });
  }
  return value;
}

/** Read and validate an entity document from disk. */
export async function loadEntityDocument(path: string): Promise<EntityDocument> {
  const text = await readFile(path, "utf8");
  return parseEntityDocument(text, path);
}
