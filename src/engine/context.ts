import type { ArtifactType } from "../artifacts/artifact-type.js";
import type { BlackboardStore } from "../artifacts/store.js";
import type { Artifact } from "../artifacts/types.js";
import { type AgentIdentity, isVisibleTo } from "../artifacts/visibility.js";
import type { InvocationTrigger } from "../schemas/invocation-record.js";
import type { EvaluationContext, HistoryOpts } from "./agent.js";
import type { TimerFire } from "./timers.js";

export interface ContextInit {
  identity: AgentIdentity;
  invocation_id: string;
  subscription_id: string;
  trigger: InvocationTrigger;
  attempt: number;
  inputs: readonly Artifact[];
  outputs: readonly string[];
  signal: AbortSignal;
  store: BlackboardStore;
  state?: Map<string, unknown>;
  timer?: TimerFire;
}

function payloadsOf<T>(type: ArtifactType<T>, artifacts: readonly Artifact[]): T[] {
  return artifacts.flatMap((artifact) => (type.is(artifact) ? [artifact.payload] : []));
}

export function createEvaluationContext(init: ContextInit): EvaluationContext {
  const { identity, inputs, store } = init;
  return {
    agent: identity.name,
    invocation_id: init.invocation_id,
    subscription_id: init.subscription_id,
    trigger: init.trigger,
    is_batch: init.trigger === "batch",
    attempt: init.attempt,
    inputs,
    correlation_id: inputs.find((input) => input.correlation_id !== undefined)
      ?.correlation_id,
    outputs: init.outputs,
    signal: init.signal,
    state: init.state ?? new Map(),
    timer_iteration: init.timer?.iteration,
    fire_time: init.timer?.fire_time,
    all: (type) => payloadsOf(type, inputs),
    first: (type) => payloadsOf(type, inputs)[0],
    async history<T>(type: ArtifactType<T>, opts: HistoryOpts = {}) {
      const stored = await store.getByType(type.name, {
        correlation_id: opts.correlation_id,
      });
      const visible = stored.filter(
        (artifact): artifact is Artifact<T> =>
          type.is(artifact) && isVisibleTo(artifact.visibility, identity),
      );
      if (opts.limit === undefined) return visible;
      return opts.limit > 0 ? visible.slice(-opts.limit) : [];
    },
  };
}
