import type { Artifact } from "../artifacts/types.js";

interface JoinEntry {
  artifact: Artifact;
  arrived_at: number;
}

export interface JoinOfferResult {
  /** One artifact per consumed type, in subscription type order */
  group?: Artifact[];
  /** Entries of this key dropped because their window closed */
  expired: Artifact[];
}

/**
 * Pending-correlation table for one join subscription.
 *
 * Entries older than `now - within_ms` are dropped, never requeued.
 * When every type has an entry under a key, the earliest entry per type
 * forms the group and only those entries are removed.
 */
export class JoinCorrelator {
  // key → type → entries in arrival order
  private readonly pending = new Map<string, Map<string, JoinEntry[]>>();

  constructor(
    private readonly types: readonly string[],
    private readonly within_ms: number,
  ) {}

  offer(artifact: Artifact, key: string, now: number): JoinOfferResult {
    let byType = this.pending.get(key);
    if (byType === undefined) {
      byType = new Map(this.types.map((type) => [type, []]));
      this.pending.set(key, byType);
    }

    const expired = this.expireKey(byType, now);

    const bucket = byType.get(artifact.type);
    if (bucket === undefined) {
      return { expired };
    }
    bucket.push({ artifact, arrived_at: now });

    const group: Artifact[] = [];
    for (const type of this.types) {
      const head = byType.get(type)?.[0];
      if (head === undefined) {
        return { expired };
      }
      group.push(head.artifact);
    }

    for (const type of this.types) {
      byType.get(type)?.shift();
    }
    if (this.isEmpty(byType)) this.pending.delete(key);

    return { group, expired };
  }

  /** Drop every expired entry across all keys */
  sweep(now: number): Artifact[] {
    const expired: Artifact[] = [];
    for (const [key, byType] of this.pending) {
      expired.push(...this.expireKey(byType, now));
      if (this.isEmpty(byType)) this.pending.delete(key);
    }
    return expired;
  }

  /** Number of artifacts waiting for partners */
  get pendingCount(): number {
    let count = 0;
    for (const byType of this.pending.values()) {
      for (const entries of byType.values()) count += entries.length;
    }
    return count;
  }

  clear(): void {
    this.pending.clear();
  }

  private expireKey(byType: Map<string, JoinEntry[]>, now: number): Artifact[] {
    const cutoff = now - this.within_ms;
    const expired: Artifact[] = [];
    for (const [type, entries] of byType) {
      const live = entries.filter((entry) => entry.arrived_at >= cutoff);
      if (live.length !== entries.length) {
        for (const entry of entries) {
          if (entry.arrived_at < cutoff) expired.push(entry.artifact);
        }
        byType.set(type, live);
      }
    }
    return expired;
  }

  private isEmpty(byType: Map<string, JoinEntry[]>): boolean {
    for (const entries of byType.values()) {
      if (entries.length > 0) return false;
    }
    return true;
  }
}
