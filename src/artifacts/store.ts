import type { Artifact, GetByTypeOpts, ListOpts } from "./types.js";

/**
 * Append-only artifact storage.
 * Implementations: SqliteBlackboardStore (persistent), InMemoryBlackboardStore (default)
 */
export interface BlackboardStore {
  /**
   * Append a fully built artifact. Returns its id.
   * Fails with DUPLICATE_ID if the id is taken, DATA_TOO_LARGE on oversized payloads.
   */
  publish(artifact: Artifact): Promise<string>;

  /**
   * Append several artifacts as one unit: either every one is stored or none is.
   * Same failures as publish(); a repeated id within the set is DUPLICATE_ID.
   */
  publishMany(artifacts: readonly Artifact[]): Promise<string[]>;

  /** Single artifact by id, expired or not. Null if absent. */
  get(id: string): Promise<Artifact | null>;

  /** Live artifacts of one type, in publish order. */
  getByType(type: string, opts?: GetByTypeOpts): Promise<Artifact[]>;

  /** Filtered listing, in publish order. */
  list(opts?: ListOpts): Promise<Artifact[]>;

  /** Hard-delete expired artifacts. Returns how many were removed. */
  purgeExpired(now?: number): Promise<number>;

  close(): void;
}
