import { ArtifactError } from "./errors.js";
import { normalizeTag } from "./normalize.js";
import type { BlackboardStore } from "./store.js";
import {
  type Artifact,
  type GetByTypeOpts,
  type ListOpts,
  MAX_PAYLOAD_CHARS,
} from "./types.js";

interface InMemoryBlackboardStoreOptions {
  now?: () => number; // clock used for expiry checks
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Process-local store. Artifacts are deep-frozen copies kept in publish order.
 */
export class InMemoryBlackboardStore implements BlackboardStore {
  private readonly artifacts: Artifact[] = [];
  private readonly byId = new Map<string, Artifact>();
  private readonly now: () => number;

  constructor(opts: InMemoryBlackboardStoreOptions = {}) {
    this.now = opts.now ?? (() => Date.now());
  }

  close(): void {
    this.artifacts.length = 0;
    this.byId.clear();
  }

  private isExpired(artifact: Artifact, now: number): boolean {
    return artifact.expires_at !== undefined && artifact.expires_at <= now;
  }

  async publish(artifact: Artifact): Promise<string> {
    await this.publishMany([artifact]);
    return artifact.id;
  }

  async publishMany(artifacts: readonly Artifact[]): Promise<string[]> {
    // Check the whole set before the first push
    const seen = new Set<string>();
    for (const artifact of artifacts) {
      if (this.byId.has(artifact.id) || seen.has(artifact.id)) {
        throw new ArtifactError(
          "DUPLICATE_ID",
          `Artifact "${artifact.id}" already exists`,
          { artifact_id: artifact.id },
        );
      }
      seen.add(artifact.id);
      const payloadJson = JSON.stringify(artifact.payload);
      if (payloadJson.length > MAX_PAYLOAD_CHARS) {
        throw new ArtifactError(
          "DATA_TOO_LARGE",
          `payload exceeds ${MAX_PAYLOAD_CHARS} chars`,
          { type: artifact.type },
        );
      }
    }

    const stored = artifacts.map((artifact) => deepFreeze(structuredClone(artifact)));
    for (const artifact of stored) {
      this.artifacts.push(artifact);
      this.byId.set(artifact.id, artifact);
    }
    return stored.map((artifact) => artifact.id);
  }

  async get(id: string): Promise<Artifact | null> {
    return this.byId.get(id) ?? null;
  }

  async getByType(type: string, opts: GetByTypeOpts = {}): Promise<Artifact[]> {
    return this.list({
      type,
      correlation_id: opts.correlation_id,
      include_expired: opts.include_expired,
    });
  }

  async list(opts: ListOpts = {}): Promise<Artifact[]> {
    const offset = opts.offset ?? 0;
    if (offset < 0 || (opts.limit !== undefined && opts.limit < 0)) {
      throw new ArtifactError(
        "INVALID_REQUEST",
        "limit and offset must be non-negative",
      );
    }

    const now = this.now();
    const tag = opts.tag !== undefined ? normalizeTag(opts.tag) : undefined;
    const matches = this.artifacts.filter((artifact) => {
      if (!opts.include_expired && this.isExpired(artifact, now)) return false;
      if (opts.type !== undefined && artifact.type !== opts.type) return false;
      if (
        opts.produced_by !== undefined &&
        artifact.produced_by !== opts.produced_by
      ) {
        return false;
      }
      if (
        opts.correlation_id !== undefined &&
        artifact.correlation_id !== opts.correlation_id
      ) {
        return false;
      }
      if (tag !== undefined && !artifact.tags.includes(tag)) return false;
      return true;
    });

    const end = opts.limit !== undefined ? offset + opts.limit : undefined;
    return matches.slice(offset, end);
  }

  async purgeExpired(now: number = this.now()): Promise<number> {
    let removed = 0;
    for (let i = this.artifacts.length - 1; i >= 0; i--) {
      const artifact = this.artifacts[i];
      if (artifact !== undefined && this.isExpired(artifact, now)) {
        this.artifacts.splice(i, 1);
        this.byId.delete(artifact.id);
        removed++;
      }
    }
    return removed;
  }
}
