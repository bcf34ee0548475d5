import { type Visibility, VisibilitySchema } from "../schemas/visibility.js";
import { normalizeTag, normalizeTags } from "./normalize.js";

/**
 * Who is asking. Every agent carries one; visibility is checked against it.
 */
export interface AgentIdentity {
  readonly name: string;
  readonly labels: readonly string[]; // normalized
  readonly tenant_id?: string;
}

export function publicVisibility(): Visibility {
  return { kind: "public" };
}

export function privateVisibility(agents: Iterable<string>): Visibility {
  return VisibilitySchema.parse({ kind: "private", agents: [...new Set(agents)] });
}

export function labelledVisibility(labels: Iterable<string>): Visibility {
  return VisibilitySchema.parse({
    kind: "labelled",
    required_labels: normalizeTags(labels),
  });
}

export function tenantVisibility(tenant_id: string): Visibility {
  return VisibilitySchema.parse({ kind: "tenant", tenant_id });
}

export function isVisibleTo(
  visibility: Visibility,
  identity: AgentIdentity,
): boolean {
  switch (visibility.kind) {
    case "public":
      return true;
    case "private":
      return visibility.agents.includes(identity.name);
    case "labelled":
      return visibility.required_labels.every((label) =>
        identity.labels.includes(normalizeTag(label)),
      );
    case "tenant":
      return (
        identity.tenant_id !== undefined &&
        identity.tenant_id === visibility.tenant_id
      );
  }
}

/** Short form for logs and match-log reasons */
export function describeVisibility(visibility: Visibility): string {
  switch (visibility.kind) {
    case "public":
      return "public";
    case "private":
      return `private(${visibility.agents.join(",")})`;
    case "labelled":
      return `labelled(${visibility.required_labels.join(",")})`;
    case "tenant":
      return `tenant(${visibility.tenant_id})`;
  }
}
