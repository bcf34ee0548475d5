import type { Artifact } from "../artifacts/types.js";
import type { Logger } from "../logger.js";
import type { InvocationTrigger } from "../schemas/invocation-record.js";
import { BatchAccumulator } from "../subscriptions/batch.js";
import type { Embedder } from "../subscriptions/embedder.js";
import { JoinCorrelator } from "../subscriptions/join.js";
import { correlationKey } from "../subscriptions/key.js";
import { buildPredicates, runPredicates } from "../subscriptions/predicates.js";
import type { Subscription } from "../subscriptions/types.js";
import { type AgentDefinition, identityOf } from "./agent.js";
import { EngineError } from "./errors.js";

/** Match log keeps at most this many entries, oldest dropped first */
export const MATCH_LOG_LIMIT = 10_000;

export type MatchOutcome = "delivered" | "filtered" | "error" | "expired";

/**
 * One evaluated (artifact, subscription) pair. Type mismatches are not logged.
 */
export interface MatchLogEntry {
  readonly artifact_id: string;
  readonly artifact_type: string;
  readonly agent: string;
  readonly subscription_id: string;
  readonly outcome: MatchOutcome;
  readonly reason?: string; // filter stage, "duplicate", "join" or "join_window"
  readonly at: number;
}

export interface MatchLogFilter {
  agent?: string;
  artifact_id?: string;
  outcome?: MatchOutcome;
}

export interface DispatchTarget {
  readonly agent: AgentDefinition;
  readonly subscription: Subscription;
}

/** A satisfied match: exactly one invocation of `agent` */
export interface MatchGroup extends DispatchTarget {
  readonly trigger: InvocationTrigger;
  readonly inputs: readonly Artifact[];
}

export interface DispatcherOptions {
  embedder: Embedder;
  semanticThreshold: number;
  logger: Logger;
  now: () => number;
  onGroup(group: MatchGroup): void;
  onBatchChange(): void;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Routes each published artifact through every subscription's filter chain,
 * then into join tables and batch buffers, emitting match groups.
 * Callers serialize dispatch() calls.
 */
export class Dispatcher {
  private readonly delivered = new Map<string, Set<string>>(); // subscription id → artifact ids
  private readonly joins = new Map<string, JoinCorrelator>();
  private readonly batches = new Map<
    string,
    { target: DispatchTarget; buffer: BatchAccumulator<readonly Artifact[]> }
  >();
  private log: MatchLogEntry[] = [];

  constructor(private readonly opts: DispatcherOptions) {}

  /**
   * Match one artifact against a snapshot of subscriptions taken at publish time.
   */
  async dispatch(artifact: Artifact, targets: readonly DispatchTarget[]): Promise<void> {
    for (const target of targets) {
      if (!target.subscription.types.includes(artifact.type)) continue;
      await this.match(artifact, target);
    }
  }

  private async match(artifact: Artifact, target: DispatchTarget): Promise<void> {
    const { agent, subscription } = target;
    const chain = buildPredicates(subscription, {
      identity: identityOf(agent),
      preventSelfTrigger: agent.prevent_self_trigger,
      embedder: this.opts.embedder,
      semanticThreshold: this.opts.semanticThreshold,
    });

    const verdict = await runPredicates(chain, artifact);
    if (verdict.outcome === "filtered") {
      this.record(artifact, target, "filtered", verdict.kind);
      return;
    }
    if (verdict.outcome === "error") {
      this.opts.logger.warn(
        `${subscription.id}: ${verdict.kind} predicate failed on ${artifact.type} ${artifact.id}: ${describeError(verdict.error)}`,
      );
      this.record(artifact, target, "error", verdict.kind);
      return;
    }

    let seen = this.delivered.get(subscription.id);
    if (seen === undefined) {
      seen = new Set();
      this.delivered.set(subscription.id, seen);
    }
    if (seen.has(artifact.id)) {
      this.record(artifact, target, "filtered", "duplicate");
      return;
    }

    if (subscription.join !== undefined) {
      let key: string;
      try {
        key = correlationKey(subscription.join.by(artifact.payload));
      } catch (err) {
        this.opts.logger.warn(
          `${subscription.id}: join key failed on ${artifact.type} ${artifact.id}: ${describeError(err)}`,
        );
        this.record(artifact, target, "error", "join");
        return;
      }

      seen.add(artifact.id);
      this.record(artifact, target, "delivered");

      const correlator = this.correlatorFor(subscription);
      const now = this.opts.now();
      const swept = correlator.sweep(now);
      const offered = correlator.offer(artifact, key, now);
      for (const stale of [...swept, ...offered.expired]) {
        this.record(stale, target, "expired", "join_window");
      }
      if (offered.group !== undefined) {
        this.route(target, offered.group, "join");
      }
      return;
    }

    seen.add(artifact.id);
    this.record(artifact, target, "delivered");
    this.route(target, [artifact], "direct");
  }

  private route(
    target: DispatchTarget,
    unit: readonly Artifact[],
    trigger: InvocationTrigger,
  ): void {
    if (target.subscription.batch === undefined) {
      this.opts.onGroup({ ...target, trigger, inputs: unit });
      return;
    }
    const buffer = this.bufferFor(target);
    const flushed = buffer.add(unit);
    if (flushed !== undefined) this.emitBatch(target, flushed);
    this.opts.onBatchChange();
  }

  private emitBatch(target: DispatchTarget, units: readonly (readonly Artifact[])[]): void {
    this.opts.onGroup({ ...target, trigger: "batch", inputs: units.flat() });
  }

  private correlatorFor(subscription: Subscription): JoinCorrelator {
    let correlator = this.joins.get(subscription.id);
    if (correlator === undefined && subscription.join !== undefined) {
      correlator = new JoinCorrelator(subscription.types, subscription.join.within_ms);
      this.joins.set(subscription.id, correlator);
    }
    if (correlator === undefined) {
      throw new EngineError("INVARIANT_VIOLATION", `${subscription.id} has no join spec`, {
        subscription_id: subscription.id,
      });
    }
    return correlator;
  }

  private bufferFor(target: DispatchTarget): BatchAccumulator<readonly Artifact[]> {
    const existing = this.batches.get(target.subscription.id);
    if (existing !== undefined) return existing.buffer;

    const buffer = new BatchAccumulator<readonly Artifact[]>(
      target.subscription.batch ?? {},
      (units) => {
        this.emitBatch(target, units);
        this.opts.onBatchChange();
      },
    );
    this.batches.set(target.subscription.id, { target, buffer });
    return buffer;
  }

  /** Force every non-empty batch buffer to flush now. Returns groups emitted. */
  flushBatches(): number {
    let emitted = 0;
    for (const { target, buffer } of this.batches.values()) {
      const units = buffer.flush();
      if (units.length > 0) {
        this.emitBatch(target, units);
        emitted++;
      }
    }
    this.opts.onBatchChange();
    return emitted;
  }

  /** Batch buffers with a timeout flush pending */
  get openBatches(): number {
    let open = 0;
    for (const { buffer } of this.batches.values()) {
      if (buffer.armed) open++;
    }
    return open;
  }

  /** Units buffered across all batch subscriptions */
  get bufferedUnits(): number {
    let units = 0;
    for (const { buffer } of this.batches.values()) units += buffer.size;
    return units;
  }

  /** Artifacts waiting in join tables (never block idle) */
  get pendingJoins(): number {
    let pending = 0;
    for (const correlator of this.joins.values()) pending += correlator.pendingCount;
    return pending;
  }

  matchLog(filter: MatchLogFilter = {}): MatchLogEntry[] {
    return this.log.filter(
      (entry) =>
        (filter.agent === undefined || entry.agent === filter.agent) &&
        (filter.artifact_id === undefined || entry.artifact_id === filter.artifact_id) &&
        (filter.outcome === undefined || entry.outcome === filter.outcome),
    );
  }

  /** Drop buffered batches, join tables and timers without emitting */
  dispose(): void {
    for (const { buffer } of this.batches.values()) buffer.flush();
    this.batches.clear();
    for (const correlator of this.joins.values()) correlator.clear();
  }

  private record(
    artifact: Artifact,
    target: DispatchTarget,
    outcome: MatchOutcome,
    reason?: string,
  ): void {
    this.log.push({
      artifact_id: artifact.id,
      artifact_type: artifact.type,
      agent: target.agent.name,
      subscription_id: target.subscription.id,
      outcome,
      reason,
      at: this.opts.now(),
    });
    if (this.log.length > MATCH_LOG_LIMIT) {
      this.log = this.log.slice(-MATCH_LOG_LIMIT);
    }
  }
}
