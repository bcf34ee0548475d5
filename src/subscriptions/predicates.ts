import type { Artifact } from "../artifacts/types.js";
import { type AgentIdentity, isVisibleTo } from "../artifacts/visibility.js";
import { cosineSimilarity, type Embedder } from "./embedder.js";
import type { SemanticSpec, Subscription } from "./types.js";

/** Filter stages, in evaluation order */
export type FilterKind =
  | "self"
  | "visibility"
  | "from_agents"
  | "tags"
  | "where"
  | "semantic";

/**
 * One stage of subscription matching. A throwing or rejecting predicate
 * drops the artifact for its subscription only.
 */
export interface ArtifactPredicate {
  readonly kind: FilterKind;
  evaluate(artifact: Artifact): boolean | Promise<boolean>;
}

export function selfTriggerPredicate(agent: string): ArtifactPredicate {
  return {
    kind: "self",
    evaluate: (artifact) => artifact.produced_by !== agent,
  };
}

export function visibilityPredicate(identity: AgentIdentity): ArtifactPredicate {
  return {
    kind: "visibility",
    evaluate: (artifact) => isVisibleTo(artifact.visibility, identity),
  };
}

export function fromAgentsPredicate(agents: readonly string[]): ArtifactPredicate {
  return {
    kind: "from_agents",
    evaluate: (artifact) => agents.includes(artifact.produced_by),
  };
}

/** Artifact must carry at least one of `tags` (both sides normalized) */
export function tagsPredicate(tags: readonly string[]): ArtifactPredicate {
  return {
    kind: "tags",
    evaluate: (artifact) => artifact.tags.some((tag) => tags.includes(tag)),
  };
}

export function wherePredicate(
  where: (payload: unknown) => boolean,
): ArtifactPredicate {
  return {
    kind: "where",
    evaluate: (artifact) => where(artifact.payload) === true,
  };
}

function readPath(value: unknown, path: string): unknown {
  let current = value;
  for (const segment of path.split(".")) {
    if (current === null || typeof current !== "object") return undefined;
    current = Object.entries(current).find(([key]) => key === segment)?.[1];
  }
  return current;
}

function collectStrings(value: unknown, out: string[]): string[] {
  if (typeof value === "string") {
    out.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) collectStrings(item, out);
  } else if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) collectStrings(item, out);
  }
  return out;
}

/** Text the semantic predicate compares: one field, or every string in the payload */
export function extractText(payload: unknown, field?: string): string {
  if (field !== undefined) {
    const value = readPath(payload, field);
    return typeof value === "string" ? value : collectStrings(value, []).join(" ");
  }
  return collectStrings(payload, []).join(" ");
}

export function semanticPredicate(
  spec: SemanticSpec,
  embedder: Embedder,
  defaultThreshold: number,
): ArtifactPredicate {
  const threshold = spec.threshold ?? defaultThreshold;
  return {
    kind: "semantic",
    async evaluate(artifact) {
      const text = extractText(artifact.payload, spec.field);
      if (text.trim().length === 0) return false;
      const [query, candidate] = await embedder.embed([spec.query, text]);
      if (query === undefined || candidate === undefined) return false;
      return cosineSimilarity(query, candidate) >= threshold;
    },
  };
}

export interface PredicateOptions {
  identity: AgentIdentity;
  preventSelfTrigger: boolean;
  embedder: Embedder;
  semanticThreshold: number;
}

/**
 * Filter chain for one subscription, in the fixed order
 * self → visibility → from_agents → tags → where → semantic.
 * The type check happens before the chain.
 */
export function buildPredicates(
  subscription: Subscription,
  opts: PredicateOptions,
): ArtifactPredicate[] {
  const chain: ArtifactPredicate[] = [];
  if (opts.preventSelfTrigger) {
    chain.push(selfTriggerPredicate(subscription.agent));
  }
  chain.push(visibilityPredicate(opts.identity));
  if (subscription.from_agents !== undefined) {
    chain.push(fromAgentsPredicate(subscription.from_agents));
  }
  if (subscription.tags !== undefined) {
    chain.push(tagsPredicate(subscription.tags));
  }
  if (subscription.where !== undefined) {
    chain.push(wherePredicate((payload) => subscription.where?.(payload) === true));
  }
  if (subscription.semantic !== undefined) {
    chain.push(
      semanticPredicate(subscription.semantic, opts.embedder, opts.semanticThreshold),
    );
  }
  return chain;
}

export type PredicateVerdict =
  | { outcome: "pass" }
  | { outcome: "filtered"; kind: FilterKind }
  | { outcome: "error"; kind: FilterKind; error: unknown };

/** Run the chain; stops at the first stage that rejects or throws */
export async function runPredicates(
  chain: readonly ArtifactPredicate[],
  artifact: Artifact,
): Promise<PredicateVerdict> {
  for (const predicate of chain) {
    try {
      if (!(await predicate.evaluate(artifact))) {
        return { outcome: "filtered", kind: predicate.kind };
      }
    } catch (error) {
      return { outcome: "error", kind: predicate.kind, error };
    }
  }
  return { outcome: "pass" };
}
