import { monotonicFactory } from "ulid";
import type { ArtifactType } from "../artifacts/artifact-type.js";
import { normalizeTags } from "../artifacts/normalize.js";
import { TypeRegistry } from "../artifacts/registry.js";
import type { BlackboardStore } from "../artifacts/store.js";
import {
  type Artifact,
  EXTERNAL_PRODUCER,
  type GetByTypeOpts,
  type ListOpts,
} from "../artifacts/types.js";
import { publicVisibility } from "../artifacts/visibility.js";
import { createStore, resolveConfig } from "../config.js";
import { createLogger, type Logger } from "../logger.js";
import { expiresAt, type RetentionPolicy, validateRetentionPolicy } from "../policies/retention.js";
import type { BlackboardConfig, BlackboardConfigInput } from "../schemas/config.js";
import type { InvocationRecord } from "../schemas/invocation-record.js";
import type { Visibility } from "../schemas/visibility.js";
import { type Embedder, LexicalEmbedder } from "../subscriptions/embedder.js";
import { AgentBuilder, type AgentDefinition, createAgentDefinition } from "./agent.js";
import type { BlackboardComponent, ComponentHook } from "./components.js";
import {
  type DispatchTarget,
  Dispatcher,
  type MatchGroup,
  type MatchLogEntry,
  type MatchLogFilter,
} from "./dispatcher.js";
import { EngineError } from "./errors.js";
import type { MaterializedOutput } from "./fan-out.js";
import { type IdleSnapshot, IdleTracker } from "./idle.js";
import { type InvocationFilter, type InvocationRequest, Scheduler } from "./scheduler.js";
import { SerialQueue } from "./serial-queue.js";
import { AgentTimers, type TimerFire } from "./timers.js";

export interface BlackboardOptions {
  store?: BlackboardStore;
  config?: BlackboardConfigInput;
  logger?: Logger;
  embedder?: Embedder;
  components?: BlackboardComponent[];
  retention?: RetentionPolicy;
  /** Clock in ms. Default: Date.now */
  now?: () => number;
}

export interface PublishOpts {
  correlation_id?: string;
  tags?: readonly string[];
  visibility?: Visibility;
  ttl_seconds?: number | null; // overrides the retention policy
}

export interface RunUntilIdleOpts {
  /** Default: config.idle_timeout_ms */
  timeout_ms?: number;
  /** Abort in-flight invocations when the timeout elapses */
  cancel_on_timeout?: boolean;
  /** Throw IDLE_TIMEOUT instead of returning idle: false */
  raise_on_timeout?: boolean;
}

export type RunUntilIdleResult =
  | { idle: true }
  | ({ idle: false; cancelled: number } & IdleSnapshot);

interface ArtifactFields {
  produced_by: string;
  correlation_id?: string;
  tags?: readonly string[];
  visibility?: Visibility;
  ttl_seconds?: number | null;
}

/**
 * Shared artifact store plus the agents subscribed to it.
 *
 * Publishing stores the artifact, then queues it for matching. Matching runs
 * one artifact at a time in publish order; invocations run concurrently under
 * the configured limits. runUntilIdle() is the synchronization point.
 */
export class Blackboard {
  readonly config: BlackboardConfig;
  readonly logger: Logger;
  readonly registry = new TypeRegistry();

  private readonly store: BlackboardStore;
  private readonly retention: RetentionPolicy;
  private readonly now: () => number;
  private readonly agents = new Map<string, AgentDefinition>();
  private readonly components: BlackboardComponent[];
  private readonly dispatcher: Dispatcher;
  private readonly scheduler: Scheduler;
  private readonly queue: SerialQueue;
  private readonly idle: IdleTracker;
  private readonly timers: AgentTimers;
  private readonly nextId = monotonicFactory();
  private readonly pendingHooks = new Set<Promise<void>>();
  private publishing = 0; // publishes not yet handed to the queue
  private closing = false;
  private closed = false;

  constructor(opts: BlackboardOptions = {}) {
    this.config = resolveConfig(opts.config ?? {});
    this.now = opts.now ?? (() => Date.now());
    this.logger = opts.logger ?? createLogger({ level: this.config.log_level });
    this.store = opts.store ?? createStore(this.config, this.now);
    this.retention = validateRetentionPolicy(opts.retention ?? {});
    this.components = [...(opts.components ?? [])];

    this.idle = new IdleTracker(() => this.snapshot());
    this.queue = new SerialQueue(() => this.idle.notify());
    this.dispatcher = new Dispatcher({
      embedder: opts.embedder ?? new LexicalEmbedder(),
      semanticThreshold: this.config.semantic_threshold,
      logger: this.logger,
      now: this.now,
      onGroup: (group) => this.onGroup(group),
      onBatchChange: () => this.idle.notify(),
    });
    this.scheduler = new Scheduler({
      config: this.config,
      store: this.store,
      logger: this.logger,
      now: this.now,
      publishOutputs: (outputs, group, claim) => this.publishOutputs(outputs, group, claim),
      onComplete: (record) => this.onInvocationComplete(record),
    });
    this.timers = new AgentTimers({
      now: this.now,
      logger: this.logger,
      onFire: (agent, fire) => this.onTimer(agent, fire),
      onChange: () => this.idle.notify(),
    });
  }

  /**
   * Register an agent and return its builder.
   */
  agent(name: string): AgentBuilder {
    this.assertOpen();
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new EngineError("INVALID_CONFIG", "agent name must be non-empty");
    }
    if (trimmed === EXTERNAL_PRODUCER) {
      throw new EngineError("INVALID_CONFIG", `"${EXTERNAL_PRODUCER}" is reserved`, {
        agent: trimmed,
      });
    }
    if (this.agents.has(trimmed)) {
      throw new EngineError("DUPLICATE_AGENT", `agent "${trimmed}" already exists`, {
        agent: trimmed,
      });
    }
    const definition = createAgentDefinition(trimmed);
    this.agents.set(trimmed, definition);
    return new AgentBuilder(definition, this.registry, (scheduled) => {
      if (scheduled.schedule !== undefined) this.timers.start(scheduled, scheduled.schedule);
    });
  }

  /**
   * Validate, store and queue one artifact for matching.
   * Fails with VALIDATION_FAILED, storing nothing, when the payload does not
   * satisfy the type's schema.
   */
  async publish<T>(type: ArtifactType<T>, payload: T, opts: PublishOpts = {}): Promise<Artifact<T>> {
    this.assertOpen();
    const parsed = this.registry.validate(type, payload);
    const artifact = this.build(type.name, parsed, { ...opts, produced_by: EXTERNAL_PRODUCER });
    await this.commit([artifact]);
    return artifact;
  }

  /**
   * Publish several payloads of one type. All are validated, then stored as
   * one unit: either every artifact is stored or none is.
   */
  async publishMany<T>(
    type: ArtifactType<T>,
    payloads: readonly T[],
    opts: PublishOpts = {},
  ): Promise<Artifact<T>[]> {
    this.assertOpen();
    const parsed = payloads.map((payload) => this.registry.validate(type, payload));
    const artifacts = parsed.map((payload) =>
      this.build(type.name, payload, { ...opts, produced_by: EXTERNAL_PRODUCER }),
    );
    await this.commit(artifacts);
    return artifacts;
  }

  /**
   * Live artifacts of one type, payloads as stored. Fails with TYPE_CONFLICT
   * when the handle's schema differs from the one bound to its name.
   */
  async getByType<T>(type: ArtifactType<T>, opts?: GetByTypeOpts): Promise<Artifact<T>[]> {
    this.registry.register(type);
    const stored = await this.store.getByType(type.name, opts);
    return stored.filter((artifact): artifact is Artifact<T> => type.is(artifact));
  }

  async get(id: string): Promise<Artifact | null> {
    return this.store.get(id);
  }

  async list(opts?: ListOpts): Promise<Artifact[]> {
    return this.store.list(opts);
  }

  async purgeExpired(): Promise<number> {
    const removed = await this.store.purgeExpired(this.now());
    if (removed > 0) this.logger.debug(`purged ${removed} expired artifact(s)`);
    return removed;
  }

  /**
   * Wait until nothing is pending, or until the timeout elapses.
   * A timeout is advisory: it resolves `idle: false` unless raise_on_timeout is set.
   */
  async runUntilIdle(opts: RunUntilIdleOpts = {}): Promise<RunUntilIdleResult> {
    const timeoutMs = opts.timeout_ms ?? this.config.idle_timeout_ms;
    if (await this.idle.wait(timeoutMs)) {
      await this.callHooks("onIdle", (component) => component.onIdle?.());
      return { idle: true };
    }

    const snapshot = this.idle.snapshot();
    let cancelled = 0;
    if (opts.cancel_on_timeout === true) {
      cancelled = this.scheduler.cancelAll(`idle timeout after ${timeoutMs}ms`);
      await this.scheduler.drain();
    }
    this.logger.warn(
      `runUntilIdle timed out after ${timeoutMs}ms: in_flight=${snapshot.in_flight} pending_dispatch=${snapshot.pending_dispatch} open_batches=${snapshot.open_batches} pending_timers=${snapshot.pending_timers}` +
        (cancelled > 0 ? `, cancelled ${cancelled}` : ""),
    );
    if (opts.raise_on_timeout === true) {
      throw new EngineError("IDLE_TIMEOUT", `not idle after ${timeoutMs}ms`, { ...snapshot });
    }
    return { idle: false, cancelled, ...snapshot };
  }

  /** Force every open batch buffer to flush. Returns groups emitted. */
  flushBatches(): number {
    const emitted = this.dispatcher.flushBatches();
    this.idle.notify();
    return emitted;
  }

  invocations(filter?: InvocationFilter): InvocationRecord[] {
    return this.scheduler.invocations(filter);
  }

  matchLog(filter?: MatchLogFilter): MatchLogEntry[] {
    return this.dispatcher.matchLog(filter);
  }

  addComponent(component: BlackboardComponent): void {
    this.components.push(component);
  }

  /** Current idle counters */
  status(): IdleSnapshot & {
    pending_joins: number;
    buffered_units: number;
    active_timers: number;
  } {
    return {
      ...this.snapshot(),
      pending_joins: this.dispatcher.pendingJoins,
      buffered_units: this.dispatcher.bufferedUnits,
      active_timers: this.timers.active,
    };
  }

  /**
   * Disarm agent timers, then drain: flush batches and wait for dispatch and
   * invocations until nothing is left, then close the store. Later calls are
   * no-ops.
   */
  async shutdown(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    this.timers.clear();
    do {
      await this.queue.drain();
      this.dispatcher.flushBatches();
      await this.scheduler.drain();
    } while (
      this.publishing > 0 ||
      this.queue.size > 0 ||
      this.scheduler.inFlight > 0 ||
      this.dispatcher.bufferedUnits > 0
    );
    await Promise.all([...this.pendingHooks]);
    this.dispatcher.dispose();
    this.store.close();
    this.closed = true;
    this.logger.debug("blackboard closed");
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private snapshot(): IdleSnapshot {
    return {
      in_flight: this.scheduler.inFlight,
      pending_dispatch: this.publishing + this.queue.size,
      open_batches: this.dispatcher.openBatches,
      pending_timers: this.timers.pending,
    };
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new EngineError("BLACKBOARD_CLOSED", "blackboard is shut down");
    }
  }

  private build<T>(type: string, payload: T, fields: ArtifactFields): Artifact<T> {
    const created_at = this.now();
    const artifact: Artifact<T> = {
      id: this.nextId(created_at),
      type,
      payload,
      produced_by: fields.produced_by,
      correlation_id: fields.correlation_id,
      tags: normalizeTags(fields.tags ?? []),
      visibility: fields.visibility ?? publicVisibility(),
      created_at,
      expires_at: expiresAt(this.retention, type, created_at, fields.ttl_seconds),
    };
    return Object.freeze(artifact);
  }

  /**
   * Store the set as one unit, then queue each artifact for matching against
   * the subscriptions that exist now. Counted as pending dispatch from the
   * first line. Returns false, storing nothing, when `claim` refuses.
   */
  private async commit(
    artifacts: readonly Artifact[],
    claim: () => boolean = () => true,
  ): Promise<boolean> {
    this.publishing++;
    try {
      for (const artifact of artifacts) {
        await this.callHooks("onPrePublish", (component) => component.onPrePublish?.(artifact));
      }
      // Nothing awaits between the claim and the store call
      if (!claim()) return false;
      await this.store.publishMany(artifacts);
      const targets = this.targets();
      for (const artifact of artifacts) {
        await this.callHooks("onPostPublish", (component) => component.onPostPublish?.(artifact));
        this.queue
          .enqueue(() => this.dispatcher.dispatch(artifact, targets))
          .catch((err: unknown) => {
            this.logger.error(`dispatch of ${artifact.type} ${artifact.id} failed: ${String(err)}`);
          });
        this.logger.debug(`published ${artifact.type} ${artifact.id} by ${artifact.produced_by}`);
      }
      return true;
    } finally {
      this.publishing--;
      this.idle.notify();
    }
  }

  private targets(): DispatchTarget[] {
    const targets: DispatchTarget[] = [];
    for (const agent of this.agents.values()) {
      for (const subscription of agent.subscriptions) {
        targets.push({ agent, subscription });
      }
    }
    return targets;
  }

  private onTimer(agent: AgentDefinition, fire: TimerFire): void {
    const id = this.scheduler.submit({
      agent,
      subscription: { id: `${agent.name}#timer` },
      trigger: "timer",
      inputs: [],
      timer: fire,
    });
    this.logger.debug(`${agent.name}: timer fire ${fire.iteration} → ${id}`);
  }

  private onGroup(group: MatchGroup): void {
    const id = this.scheduler.submit(group);
    this.logger.debug(
      `${group.subscription.id} matched [${group.inputs.map((input) => input.id).join(", ")}] → ${id}`,
    );
  }

  private async publishOutputs(
    outputs: readonly MaterializedOutput[],
    request: InvocationRequest,
    claim: () => boolean,
  ): Promise<readonly Artifact[] | null> {
    const correlation_id = request.inputs.find(
      (input) => input.correlation_id !== undefined,
    )?.correlation_id;
    const artifacts = outputs.map(({ declaration, payload }) =>
      this.build(declaration.type.name, payload, {
        produced_by: request.agent.name,
        correlation_id,
        tags: declaration.tags,
        visibility: declaration.visibility,
        ttl_seconds: declaration.ttl_seconds,
      }),
    );
    return (await this.commit(artifacts, claim)) ? artifacts : null;
  }

  private onInvocationComplete(record: InvocationRecord): void {
    const hooks: Promise<void> = this.callHooks("onInvocationComplete", (component) =>
      component.onInvocationComplete?.(record),
    ).finally(() => {
      this.pendingHooks.delete(hooks);
    });
    this.pendingHooks.add(hooks);
    this.idle.notify();
  }

  /** Run one hook on every component. Never rejects. */
  private async callHooks(
    hook: ComponentHook,
    call: (component: BlackboardComponent) => void | Promise<void> | undefined,
  ): Promise<void> {
    for (const component of this.components) {
      try {
        await call(component);
      } catch (err) {
        this.logger.warn(`component ${component.name} ${hook} failed: ${String(err)}`);
      }
    }
  }
}
