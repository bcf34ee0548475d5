import type { ZodIssue, z } from "zod";
import { ArtifactError } from "./errors.js";
import type { Artifact } from "./types.js";

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; issues: ZodIssue[] };

/**
 * Typed handle for one artifact type: a name plus the zod schema
 * every payload of that type is parsed with.
 */
export interface ArtifactType<T> {
  readonly name: string;
  readonly schema: z.ZodTypeAny;
  parse(value: unknown): T;
  safeParse(value: unknown): ParseResult<T>;
  /**
   * Narrow a stored artifact to this type by name. Stored payloads already
   * went through the schema, so they are never parsed a second time.
   */
  is(artifact: Artifact): artifact is Artifact<T>;
}

export type AnyArtifactType = ArtifactType<unknown>;

/** Payload type carried by a handle */
export type PayloadOf<H> = H extends ArtifactType<infer T> ? T : never;

export function defineType<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
): ArtifactType<z.output<S>> {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ArtifactError("INVALID_REQUEST", "Type name must not be empty");
  }

  return {
    name: trimmed,
    schema,
    parse(value) {
      return schema.parse(value);
    },
    safeParse(value) {
      const result = schema.safeParse(value);
      return result.success
        ? { success: true, data: result.data }
        : { success: false, issues: result.error.issues };
    },
    is(artifact: Artifact): artifact is Artifact<z.output<S>> {
      return artifact.type === trimmed;
    },
  };
}
