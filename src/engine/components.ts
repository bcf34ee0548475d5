import type { Artifact } from "../artifacts/types.js";
import type { InvocationRecord } from "../schemas/invocation-record.js";
import type { EvaluationContext } from "./agent.js";
import type { Output } from "./fan-out.js";

/**
 * Optional lifecycle hooks. A throwing or rejecting hook is logged at warn
 * level and never affects publishing or dispatch.
 */
export interface BlackboardComponent {
  readonly name: string;
  /** Before the artifact is stored */
  onPrePublish?(artifact: Artifact): void | Promise<void>;
  /** After the artifact is stored, before it is matched */
  onPostPublish?(artifact: Artifact): void | Promise<void>;
  onInvocationComplete?(record: InvocationRecord): void | Promise<void>;
  onIdle?(): void | Promise<void>;
}

export type ComponentHook = Exclude<keyof BlackboardComponent, "name">;

/**
 * Hooks attached to one agent with `withUtilities()`, sharing `ctx.state`
 * with its engine.
 *
 * onPreEvaluate and onPostEvaluate run inside the attempt: a throw fails the
 * attempt like an engine error and counts toward its timeout. onPostPublish
 * runs once per published artifact; a throw there is only logged.
 */
export interface AgentComponent {
  readonly name: string;
  onPreEvaluate?(ctx: EvaluationContext): void | Promise<void>;
  /** Raw engine outputs, before validation and fan-out checks */
  onPostEvaluate?(ctx: EvaluationContext, outputs: readonly Output[]): void | Promise<void>;
  onPostPublish?(ctx: EvaluationContext, artifact: Artifact): void | Promise<void>;
}
