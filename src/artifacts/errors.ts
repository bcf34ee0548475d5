import type { ZodIssue } from "zod";

/**
 * Error codes for artifact and type operations.
 */
export type ErrorCode =
  | "VALIDATION_FAILED"    // payload does not conform to its type's schema
  | "TYPE_CONFLICT"        // same type name registered with a different schema
  | "DUPLICATE_ID"         // store already holds an artifact with this id
  | "INVALID_REQUEST"      // invalid parameter combination
  | "DATA_TOO_LARGE";      // payload exceeds 200K chars

/**
 * Custom error class for artifact operations.
 * Enables typed error handling via error.code.
 */
export class ArtifactError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: {
      type?: string;
      artifact_id?: string;
      issues?: ZodIssue[];
    },
  ) {
    super(message);
    this.name = "ArtifactError";
  }
}

/** One line per issue: `path: message` */
export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
