import type {
  AnyArtifactType,
  ArtifactType,
  PayloadOf,
} from "../artifacts/artifact-type.js";
import { normalizeTags } from "../artifacts/normalize.js";
import type { TypeRegistry } from "../artifacts/registry.js";
import type { Artifact } from "../artifacts/types.js";
import type { AgentIdentity } from "../artifacts/visibility.js";
import type { InvocationTrigger } from "../schemas/invocation-record.js";
import { createSubscription } from "../subscriptions/subscription.js";
import type { ConsumeOpts, Subscription } from "../subscriptions/types.js";
import type { AgentComponent } from "./components.js";
import { EngineError } from "./errors.js";
import {
  declareOutput,
  type EngineResult,
  type OutputDeclaration,
  type PublishesOpts,
} from "./fan-out.js";
import { normalizeSchedule, type Schedule, type ScheduleSpec } from "./timers.js";

export interface HistoryOpts {
  correlation_id?: string;
  limit?: number; // most recent N
}

/**
 * Everything an engine sees for one invocation attempt.
 */
export interface EvaluationContext {
  readonly agent: string;
  readonly invocation_id: string;
  readonly subscription_id: string;
  readonly trigger: InvocationTrigger;
  readonly is_batch: boolean;
  readonly attempt: number; // 0 on first try
  readonly inputs: readonly Artifact[];
  readonly correlation_id?: string;
  readonly outputs: readonly string[]; // declared output type names
  readonly signal: AbortSignal; // aborted on timeout or cancellation
  /** Per-invocation scratch space shared with the agent's components */
  readonly state: Map<string, unknown>;
  readonly timer_iteration?: number; // timer fires only, 0 on the first
  readonly fire_time?: number; // timer fires only
  /** Every input of `type`, parsed */
  all<T>(type: ArtifactType<T>): T[];
  first<T>(type: ArtifactType<T>): T | undefined;
  /** Stored artifacts of `type` this agent is allowed to see */
  history<T>(type: ArtifactType<T>, opts?: HistoryOpts): Promise<Artifact<T>[]>;
}

export type AgentEngine = (
  ctx: EvaluationContext,
) => EngineResult | void | Promise<EngineResult | void>;

export interface EngineObject {
  evaluate(ctx: EvaluationContext): EngineResult | void | Promise<EngineResult | void>;
}

/**
 * Mutable agent state behind an AgentBuilder.
 */
export interface AgentDefinition {
  readonly name: string;
  description?: string;
  readonly subscriptions: Subscription[];
  readonly outputs: OutputDeclaration[];
  engine?: AgentEngine;
  max_concurrency?: number;
  timeout_ms?: number;
  labels: string[];
  tenant_id?: string;
  prevent_self_trigger: boolean;
  readonly components: AgentComponent[];
  schedule?: Schedule;
}

export function createAgentDefinition(name: string): AgentDefinition {
  return {
    name,
    subscriptions: [],
    outputs: [],
    labels: [],
    prevent_self_trigger: true,
    components: [],
  };
}

export function identityOf(agent: AgentDefinition): AgentIdentity {
  return { name: agent.name, labels: agent.labels, tenant_id: agent.tenant_id };
}

function isList<H>(value: H | readonly H[]): value is readonly H[] {
  return Array.isArray(value);
}

function toList<H>(types: H | readonly H[]): readonly H[] {
  return isList(types) ? types : [types];
}

/**
 * Fluent configuration surface returned by `blackboard.agent(name)`.
 */
export class AgentBuilder {
  constructor(
    private readonly definition: AgentDefinition,
    private readonly registry: TypeRegistry,
    private readonly onSchedule: (definition: AgentDefinition) => void = () => {},
  ) {}

  get name(): string {
    return this.definition.name;
  }

  description(text: string): this {
    this.definition.description = text;
    return this;
  }

  /**
   * Subscribe to one type, or to several (all of them for a join).
   */
  consumes<H extends AnyArtifactType>(
    types: H | readonly H[],
    opts?: ConsumeOpts<PayloadOf<H>>,
  ): this {
    const list = toList(types);
    for (const type of list) this.registry.register(type);
    const subscription = createSubscription(
      this.definition.name,
      this.definition.subscriptions.length,
      list.map((type) => type.name),
      opts,
    );
    this.definition.subscriptions.push(subscription);
    return this;
  }

  publishes<H extends AnyArtifactType>(
    types: H | readonly H[],
    opts?: PublishesOpts<PayloadOf<H>>,
  ): this {
    for (const type of toList(types)) {
      if (this.definition.outputs.some((decl) => decl.type.name === type.name)) {
        throw new EngineError(
          "DUPLICATE_OUTPUT",
          `${this.definition.name} already publishes "${type.name}"`,
          { agent: this.definition.name, output_type: type.name },
        );
      }
      this.registry.register(type);
      this.definition.outputs.push(declareOutput(this.definition.name, type, opts));
    }
    return this;
  }

  evaluates(engine: AgentEngine | EngineObject): this {
    if (typeof engine === "function") {
      this.definition.engine = engine;
    } else {
      const target = engine;
      this.definition.engine = (ctx) => target.evaluate(ctx);
    }
    return this;
  }

  withEngine(engine: AgentEngine | EngineObject): this {
    return this.evaluates(engine);
  }

  maxConcurrency(n: number): this {
    if (!Number.isInteger(n) || n < 1) {
      throw new EngineError(
        "INVALID_CONFIG",
        `${this.definition.name}: maxConcurrency must be a positive integer`,
        { agent: this.definition.name },
      );
    }
    this.definition.max_concurrency = n;
    return this;
  }

  timeout(ms: number): this {
    if (!Number.isFinite(ms) || ms <= 0) {
      throw new EngineError(
        "INVALID_CONFIG",
        `${this.definition.name}: timeout must be a positive number of ms`,
        { agent: this.definition.name },
      );
    }
    this.definition.timeout_ms = ms;
    return this;
  }

  labels(...labels: string[]): this {
    this.definition.labels = normalizeTags([...this.definition.labels, ...labels]);
    return this;
  }

  tenant(tenant_id: string): this {
    this.definition.tenant_id = tenant_id;
    return this;
  }

  preventSelfTrigger(enabled = true): this {
    this.definition.prevent_self_trigger = enabled;
    return this;
  }

  /**
   * Also run on a timer, with no input artifacts. Replaces an earlier schedule.
   */
  schedule(spec: ScheduleSpec): this {
    this.definition.schedule = normalizeSchedule(this.definition.name, spec);
    this.onSchedule(this.definition);
    return this;
  }

  withUtilities(...components: AgentComponent[]): this {
    this.definition.components.push(...components);
    return this;
  }
}
