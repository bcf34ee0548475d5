import { ArtifactError } from "../artifacts/errors.js";

/** TTL constants in seconds */
export const TTL = {
  EPHEMERAL: 3600, // 1 hour
  SESSION: 7200, // 2 hours
  DAY: 24 * 3600,
  WEEK: 7 * 24 * 3600,
  PERSISTENT: null, // no expiry
} as const;

/**
 * Type name → ttl_seconds. `null` keeps artifacts for the life of the store.
 */
export interface RetentionPolicy {
  default_ttl_seconds?: number | null;
  types?: Record<string, number | null>;
}

function assertTtl(value: number | null | undefined, where: string): void {
  if (value === null || value === undefined) return;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ArtifactError(
      "INVALID_REQUEST",
      `${where} must be a positive number of seconds or null (got ${value})`,
    );
  }
}

export function validateRetentionPolicy(policy: RetentionPolicy): RetentionPolicy {
  assertTtl(policy.default_ttl_seconds, "default_ttl_seconds");
  for (const [type, ttl] of Object.entries(policy.types ?? {})) {
    assertTtl(ttl, `ttl for "${type}"`);
  }
  return policy;
}

/**
 * TTL for one publish.
 * Important: undefined override means "use policy", null means "never expire".
 */
export function resolveTtl(
  policy: RetentionPolicy,
  type: string,
  override?: number | null,
): number | null {
  if (override !== undefined) {
    assertTtl(override, "ttl_seconds");
    return override;
  }
  // Own keys only: "constructor" must not resolve to Object.prototype
  if (policy.types !== undefined && Object.hasOwn(policy.types, type)) {
    const perType = policy.types[type];
    if (perType !== undefined) return perType;
  }
  return policy.default_ttl_seconds ?? TTL.PERSISTENT;
}

/** expires_at for an artifact created at `created_at`, or undefined when retained */
export function expiresAt(
  policy: RetentionPolicy,
  type: string,
  created_at: number,
  override?: number | null,
): number | undefined {
  const ttl = resolveTtl(policy, type, override);
  return ttl === null ? undefined : created_at + ttl * 1000;
}
