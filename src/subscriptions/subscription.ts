import { normalizeTags } from "../artifacts/normalize.js";
import { EngineError } from "../engine/errors.js";
import type { ConsumeOpts, Subscription } from "./types.js";

function invalid(agent: string, id: string, message: string): EngineError {
  return new EngineError("INVALID_SUBSCRIPTION", `${id}: ${message}`, {
    agent,
    subscription_id: id,
  });
}

/**
 * Validate `consumes()` options and freeze them into a Subscription.
 */
export function createSubscription<T>(
  agent: string,
  index: number,
  types: readonly string[],
  opts: ConsumeOpts<T> = {},
): Subscription<T> {
  const id = `${agent}#${index}`;

  if (types.length === 0) {
    throw invalid(agent, id, "consumes() needs at least one type");
  }
  if (new Set(types).size !== types.length) {
    throw invalid(agent, id, `duplicate consumed types: ${types.join(", ")}`);
  }

  if (opts.join !== undefined) {
    if (types.length < 2) {
      throw invalid(agent, id, "join needs at least two distinct types");
    }
    if (!Number.isFinite(opts.join.within_ms) || opts.join.within_ms <= 0) {
      throw invalid(agent, id, "join.within_ms must be a positive number");
    }
  }

  if (opts.batch !== undefined) {
    const { size, timeout_ms } = opts.batch;
    if (size === undefined && timeout_ms === undefined) {
      throw invalid(agent, id, "batch needs size, timeout_ms, or both");
    }
    if (size !== undefined && (!Number.isInteger(size) || size < 1)) {
      throw invalid(agent, id, "batch.size must be a positive integer");
    }
    if (timeout_ms !== undefined && (!Number.isFinite(timeout_ms) || timeout_ms <= 0)) {
      throw invalid(agent, id, "batch.timeout_ms must be a positive number");
    }
  }

  if (opts.semantic !== undefined) {
    if (opts.semantic.query.trim().length === 0) {
      throw invalid(agent, id, "semantic.query must not be empty");
    }
    const { threshold } = opts.semantic;
    if (threshold !== undefined && (threshold < 0 || threshold > 1)) {
      throw invalid(agent, id, "semantic.threshold must be within [0, 1]");
    }
  }

  const tags = opts.tags !== undefined ? normalizeTags(opts.tags) : undefined;
  if (tags !== undefined && tags.length === 0) {
    throw invalid(agent, id, "tags filter must name at least one tag");
  }

  return Object.freeze({
    id,
    agent,
    types: Object.freeze([...types]),
    where: opts.where,
    semantic: opts.semantic,
    from_agents:
      opts.from_agents !== undefined ? Object.freeze([...opts.from_agents]) : undefined,
    tags,
    join: opts.join,
    batch: opts.batch,
  });
}
