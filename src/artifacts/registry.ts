import type { AnyArtifactType, ArtifactType } from "./artifact-type.js";
import { ArtifactError, formatIssues } from "./errors.js";

/**
 * Name → handle table for one blackboard.
 * A name is bound to the first schema registered under it.
 */
export class TypeRegistry {
  private readonly types = new Map<string, AnyArtifactType>();

  register(type: AnyArtifactType): void {
    const existing = this.types.get(type.name);
    if (existing === undefined) {
      this.types.set(type.name, type);
      return;
    }
    if (existing.schema !== type.schema) {
      throw new ArtifactError(
        "TYPE_CONFLICT",
        `Type "${type.name}" is already registered with a different schema`,
        { type: type.name },
      );
    }
  }

  /**
   * Register the handle, then parse the payload with its schema.
   * Throws VALIDATION_FAILED with the zod issues; never coerces beyond the schema.
   */
  validate<T>(type: ArtifactType<T>, payload: unknown): T {
    this.register(type);
    const result = type.safeParse(payload);
    if (!result.success) {
      throw new ArtifactError(
        "VALIDATION_FAILED",
        `Payload for "${type.name}" failed validation: ${formatIssues(result.issues)}`,
        { type: type.name, issues: result.issues },
      );
    }
    return result.data;
  }
}
