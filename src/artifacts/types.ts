import type { Visibility } from "../schemas/visibility.js";

/** Max serialized payload size accepted by any store */
export const MAX_PAYLOAD_CHARS = 200_000;

/** `produced_by` value for artifacts published from outside any agent */
export const EXTERNAL_PRODUCER = "external";

/**
 * Immutable record on the blackboard.
 * `payload` has already been parsed by the schema of `type`.
 */
export interface Artifact<T = unknown> {
  readonly id: string; // monotonic ULID
  readonly type: string; // registered type name
  readonly payload: T;
  readonly produced_by: string; // agent name or "external"
  readonly correlation_id?: string;
  readonly tags: readonly string[]; // normalized, sorted
  readonly visibility: Visibility;
  readonly created_at: number; // Unix timestamp (ms)
  readonly expires_at?: number; // from retention policy; undefined = retained
}

/**
 * Options for reading artifacts of one type.
 */
export type GetByTypeOpts = {
  correlation_id?: string;
  include_expired?: boolean;
};

/**
 * Options for listing artifacts. Results are always in publish order.
 */
export type ListOpts = {
  type?: string;
  produced_by?: string;
  correlation_id?: string;
  tag?: string; // matched after normalization
  include_expired?: boolean;
  limit?: number; // default: no limit
  offset?: number;
};
