/**
 * Error type shared by every Spritekin module.
 *
 * A single class with a discriminated `code` keeps `catch` sites simple:
 * narrow with `EntityError.isEntityError(err)` and switch on `err.code`.
 */

import type { ZodError } from "zod";

export type EntityErrorCode =
  | "UNKNOWN_TEMPLATE"
  | "DUPLICATE_TEMPLATE"
  | "CYCLIC_INHERITANCE"
  | "UNKNOWN_COMPONENT_KIND"
  | "DUPLICATE_COMPONENT_KIND"
  | "INVALID_COMPONENT"
  | "DUPLICATE_LAYER_COUNT_MISMATCH"
  | "FRAME_RANGE_EXCEEDS_SHEET"
  | "UNCLAIMED_STATE_REFERENCE"
  | "UNKNOWN_ANIMATION_STATE"
  | "DUPLICATE_SYSTEM"
  | "INVALID_SYSTEM_CONFIG"
  | "UNKNOWN_ENTITY"
  | "INVALID_DOCUMENT"
  | "INVALID_CONFIG";

/**
 * Raised by template loading, resolution, animation compilation and playback.
 *
 * @example
 * ```ts
 * try {
 *   resolver.resolve("knight");
 * } catch (err) {
 *   if (EntityError.isEntityError(err) && err.code === "UNKNOWN_TEMPLATE") {
 *     // ...
 *   }
 * }
 * ```
 */
export class EntityError extends Error {
  readonly name = "EntityError";

  constructor(
    public readonly code: EntityErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EntityError);
    }
  }

  static unknownTemplate(name: string, referencedBy?: string): EntityError {
    const suffix = referencedBy ? ` (parent of "${referencedBy}")` : "";
    return new EntityError("UNKNOWN_TEMPLATE", `Unknown template "${name}"${suffix}`, {
      template: name,
      ...(referencedBy && { referencedBy }),
    });
  }

  static cyclicInheritance(chain: readonly string[]): EntityError {
    return new EntityError(
      "CYCLIC_INHERITANCE",
      `Cyclic template inheritance: ${chain.join(" -> ")}`,
      { chain: [...chain] },
    );
  }

  static unknownAnimationState(state: string, available: readonly string[]): EntityError {
    return new EntityError("UNKNOWN_ANIMATION_STATE", `Unknown animation state "${state}"`, {
      state,
      available: [...available],
    });
  }

  static unclaimedStateReference(state: string): EntityError {
    return new EntityError(
      "UNCLAIMED_STATE_REFERENCE",
      `No animation block claims state "${state}"`,
      { state },
    );
  }

  /** Type guard for catch sites. */
  static isEntityError(error: unknown): error is EntityError {
    return error instanceof EntityError;
  }

  toJSON(): {
    name: string;
    code: EntityErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/** One `path: message` line per zod issue, for `details.issues`. */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
