export interface SemanticSpec {
  query: string;
  threshold?: number; // cosine similarity floor, default from config
  field?: string; // dotted path into the payload; default: every string value
}

/**
 * Correlation rule: artifacts of every consumed type that share a key
 * and arrived within `within_ms` of each other form one group.
 */
export interface JoinSpec<T> {
  by(payload: T): unknown;
  within_ms: number;
}

/** Flush on `size` units or `timeout_ms` after the first buffered unit */
export interface BatchSpec {
  size?: number;
  timeout_ms?: number;
}

/**
 * Options accepted by `consumes()`. `T` is the union of the consumed payload types.
 */
export interface ConsumeOpts<T> {
  where?(payload: T): boolean;
  semantic?: SemanticSpec;
  from_agents?: readonly string[];
  tags?: readonly string[];
  join?: JoinSpec<T>;
  batch?: BatchSpec;
}

/**
 * Registered subscription. Immutable once the agent is built.
 */
export interface Subscription<T = unknown> {
  readonly id: string; // "<agent>#<index>"
  readonly agent: string;
  readonly types: readonly string[]; // declaration order; join groups follow it
  where?(payload: T): boolean;
  readonly semantic?: SemanticSpec;
  readonly from_agents?: readonly string[];
  readonly tags?: readonly string[]; // normalized
  readonly join?: JoinSpec<T>;
  readonly batch?: BatchSpec;
}
