import { monotonicFactory } from "ulid";
import type { BlackboardStore } from "../artifacts/store.js";
import type { Artifact } from "../artifacts/types.js";
import type { Logger } from "../logger.js";
import type { BlackboardConfig } from "../schemas/config.js";
import type {
  InvocationErrorCode,
  InvocationEvent,
  InvocationRecord,
  InvocationStatus,
  InvocationTrigger,
} from "../schemas/invocation-record.js";
import { type AgentDefinition, type EvaluationContext, identityOf } from "./agent.js";
import type { AgentComponent } from "./components.js";
import { createEvaluationContext } from "./context.js";
import { InvocationFailure } from "./errors.js";
import { appendEvent } from "./event-fold.js";
import {
  collectOutputs,
  type MaterializedOutput,
  type MaterializeResult,
  materializeOutputs,
  outputTypeNames,
} from "./fan-out.js";
import { Semaphore } from "./semaphore.js";
import type { TimerFire } from "./timers.js";
import { calculateBackoff, sleep, withTimeout } from "./timing.js";

/** One unit of work: a match group from the dispatcher, or a timer fire */
export interface InvocationRequest {
  readonly agent: AgentDefinition;
  readonly subscription: { readonly id: string };
  readonly trigger: InvocationTrigger;
  readonly inputs: readonly Artifact[];
  readonly timer?: TimerFire;
}

export interface SchedulerOptions {
  config: BlackboardConfig;
  store: BlackboardStore;
  logger: Logger;
  now: () => number;
  /**
   * Publish an invocation's surviving outputs as one unit; returns the stored
   * artifacts. `claim` is the commit point: it returns false once the
   * invocation is cancelled, and after it returns true the invocation can no
   * longer be cancelled. Resolves null when the claim was refused.
   */
  publishOutputs(
    outputs: readonly MaterializedOutput[],
    request: InvocationRequest,
    claim: () => boolean,
  ): Promise<readonly Artifact[] | null>;
  onComplete(record: InvocationRecord): void;
}

export interface InvocationFilter {
  agent?: string;
  status?: InvocationStatus;
}

type Terminal =
  | { status: "OK"; output_ids: string[]; dropped_count: number }
  | { status: "FAILED"; code?: InvocationErrorCode; message: string }
  | { status: "CANCELLED"; message: string };

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toFailure(err: unknown): InvocationFailure {
  if (err instanceof InvocationFailure) return err;
  return new InvocationFailure("ENGINE_ERROR", describeError(err));
}

interface Evaluated {
  result: MaterializeResult;
  ctx: EvaluationContext; // context of the successful attempt
}

/**
 * Runs one invocation per request under the global and per-agent
 * concurrency limits, with timeout, retry and cancellation.
 */
export class Scheduler {
  private readonly global: Semaphore;
  private readonly perAgent = new Map<string, Semaphore>();
  private readonly controllers = new Map<string, AbortController>(); // cancellable only
  private readonly running = new Set<Promise<void>>();
  private readonly records = new Map<string, InvocationRecord>();
  private readonly nextId = monotonicFactory();

  constructor(private readonly opts: SchedulerOptions) {
    this.global = new Semaphore(opts.config.max_concurrency);
  }

  /**
   * Start an invocation. Counted as in flight before this returns.
   */
  submit(request: InvocationRequest): string {
    const now = this.opts.now();
    const invocation_id = this.nextId(now);
    this.records.set(invocation_id, {
      invocation_id,
      agent: request.agent.name,
      subscription_id: request.subscription.id,
      trigger: request.trigger,
      input_ids: request.inputs.map((input) => input.id),
      timer_iteration: request.timer?.iteration,
      status: "PENDING",
      events: [],
      output_ids: [],
      dropped_count: 0,
      retry_count: 0,
      started_at: new Date(now).toISOString(),
    });

    const controller = new AbortController();
    this.controllers.set(invocation_id, controller);

    const task: Promise<void> = this.execute(invocation_id, request, controller.signal)
      .catch((err: unknown) => {
        this.finish(invocation_id, {
          status: "FAILED",
          message: `scheduler error: ${describeError(err)}`,
        });
      })
      .finally(() => {
        this.controllers.delete(invocation_id);
        this.running.delete(task);
        const record = this.records.get(invocation_id);
        if (record !== undefined) this.opts.onComplete(record);
      });
    this.running.add(task);
    return invocation_id;
  }

  private async execute(id: string, request: InvocationRequest, signal: AbortSignal): Promise<void> {
    const agentLimit = this.semaphoreFor(request);
    const body = () => this.invoke(id, request, signal);
    try {
      // Per-agent slot first so queued work of a saturated agent holds no global slot
      await (agentLimit === undefined
        ? this.global.run(body, signal)
        : agentLimit.run(() => this.global.run(body, signal), signal));
    } catch (err) {
      if (!signal.aborted) throw err;
      this.finish(id, { status: "CANCELLED", message: "cancelled before start" });
    }
  }

  private async invoke(id: string, request: InvocationRequest, signal: AbortSignal): Promise<void> {
    this.event(id, { type: "STARTED", at: this.isoNow() });
    this.opts.logger.debug(
      `${request.agent.name}: invoking ${id} on ${request.inputs.length} input(s) (${request.trigger})`,
    );

    const evaluated = await this.attempt(id, request, signal);
    if (evaluated === undefined) return;
    const { result, ctx } = evaluated;

    if (signal.aborted) {
      this.finish(id, { status: "CANCELLED", message: "cancelled before publish" });
      return;
    }

    let published: readonly Artifact[] | null;
    try {
      published = await this.opts.publishOutputs(result.outputs, request, () =>
        this.claimCommit(id, signal),
      );
    } catch (err) {
      this.finish(id, {
        status: "FAILED",
        message: `publishing outputs failed: ${describeError(err)}`,
      });
      return;
    }
    if (published === null) {
      this.finish(id, { status: "CANCELLED", message: "cancelled before publish" });
      return;
    }

    for (const artifact of published) {
      await this.afterPublish(request.agent, ctx, artifact);
    }
    this.finish(id, {
      status: "OK",
      output_ids: published.map((artifact) => artifact.id),
      dropped_count: result.dropped_count,
    });
  }

  /** Agent onPostPublish hooks. Failures are only logged. */
  private async afterPublish(
    agent: AgentDefinition,
    ctx: EvaluationContext,
    artifact: Artifact,
  ): Promise<void> {
    for (const component of agent.components) {
      try {
        await component.onPostPublish?.(ctx, artifact);
      } catch (err) {
        this.opts.logger.warn(
          `${agent.name}: component ${component.name} onPostPublish failed: ${describeError(err)}`,
        );
      }
    }
  }

  /**
   * Attempt loop. Returns the materialized outputs, or undefined once the
   * record has been finished as FAILED or CANCELLED.
   */
  private async attempt(
    id: string,
    request: InvocationRequest,
    signal: AbortSignal,
  ): Promise<Evaluated | undefined> {
    const { agent } = request;
    const { config, logger } = this.opts;
    const engine = agent.engine;
    if (engine === undefined) {
      this.finish(id, {
        status: "FAILED",
        code: "NO_ENGINE",
        message: `${agent.name} has no engine`,
      });
      return undefined;
    }
    const timeoutMs = agent.timeout_ms ?? config.invocation_timeout_ms;
    const components: readonly AgentComponent[] = agent.components;
    const state = new Map<string, unknown>(); // survives retries

    for (let attempt = 0; ; attempt++) {
      if (signal.aborted) {
        this.finish(id, { status: "CANCELLED", message: "cancelled" });
        return undefined;
      }

      const attemptController = new AbortController();
      const onAbort = () => attemptController.abort(signal.reason);
      signal.addEventListener("abort", onAbort, { once: true });

      try {
        const ctx = createEvaluationContext({
          identity: identityOf(agent),
          invocation_id: id,
          subscription_id: request.subscription.id,
          trigger: request.trigger,
          attempt,
          inputs: request.inputs,
          outputs: outputTypeNames(agent.outputs),
          signal: attemptController.signal,
          store: this.opts.store,
          state,
          timer: request.timer,
        });
        const run = Promise.resolve()
          .then(async () => {
            for (const component of components) await component.onPreEvaluate?.(ctx);
            return engine(ctx);
          })
          .then((result) => collectOutputs(result, config.max_outputs_per_invocation))
          .then(async (outputs) => {
            for (const component of components) await component.onPostEvaluate?.(ctx, outputs);
            return outputs;
          });

        const outcome = await withTimeout(run, timeoutMs, signal);
        if (outcome.type !== "resolved") {
          attemptController.abort(new Error(outcome.type));
          // The abandoned engine may still settle; its outputs are discarded.
          run.catch((err: unknown) => {
            logger.debug(`${agent.name}: abandoned attempt of ${id} settled: ${describeError(err)}`);
          });
        }
        if (outcome.type === "aborted") {
          this.finish(id, { status: "CANCELLED", message: "cancelled while running" });
          return undefined;
        }
        if (outcome.type === "timeout") {
          throw new InvocationFailure("TIMEOUT", `${agent.name} timed out after ${timeoutMs}ms`);
        }
        return {
          result: materializeOutputs(agent.name, outcome.value, agent.outputs, logger),
          ctx,
        };
      } catch (err) {
        if (signal.aborted) {
          this.finish(id, { status: "CANCELLED", message: "cancelled while running" });
          return undefined;
        }
        const failure = toFailure(err);
        if (failure.retryable && attempt < config.max_retries) {
          this.event(id, { type: "RETRY", at: this.isoNow(), error: failure.code });
          const delay = calculateBackoff(attempt, config.backoff);
          logger.warn(
            `${agent.name}: attempt ${attempt + 1} of ${id} failed (${failure.code}): ${failure.message}; retrying in ${delay}ms`,
          );
          await sleep(delay, signal);
          continue;
        }
        this.finish(id, { status: "FAILED", code: failure.code, message: failure.message });
        return undefined;
      } finally {
        signal.removeEventListener("abort", onAbort);
      }
    }
  }

  /** Past this point cancelAll() no longer reaches the invocation */
  private claimCommit(id: string, signal: AbortSignal): boolean {
    if (signal.aborted) return false;
    this.controllers.delete(id);
    return true;
  }

  private semaphoreFor(request: InvocationRequest): Semaphore | undefined {
    const { name, max_concurrency } = request.agent;
    if (max_concurrency === undefined) return undefined;
    let sem = this.perAgent.get(name);
    if (sem === undefined) {
      sem = new Semaphore(max_concurrency);
      this.perAgent.set(name, sem);
    }
    return sem;
  }

  private event(id: string, event: InvocationEvent): void {
    const record = this.records.get(id);
    if (record === undefined) return;
    this.records.set(id, appendEvent(record, event));
  }

  private finish(id: string, terminal: Terminal): void {
    const record = this.records.get(id);
    if (record === undefined || record.finished_at !== undefined) return;

    const at = this.isoNow();
    let next = appendEvent(record, { type: terminal.status, at });
    next = { ...next, finished_at: at };

    switch (terminal.status) {
      case "OK":
        next = {
          ...next,
          output_ids: terminal.output_ids,
          dropped_count: terminal.dropped_count,
        };
        this.opts.logger.info(
          `${record.agent}: ${id} published ${terminal.output_ids.length} artifact(s)` +
            (terminal.dropped_count > 0 ? `, dropped ${terminal.dropped_count}` : ""),
        );
        break;
      case "FAILED":
        next = { ...next, error_code: terminal.code, error_message: terminal.message };
        this.opts.logger.error(
          `${record.agent}: ${id} failed${terminal.code === undefined ? "" : ` (${terminal.code})`}: ${terminal.message}`,
        );
        break;
      case "CANCELLED":
        next = { ...next, error_code: "CANCELLED", error_message: terminal.message };
        this.opts.logger.warn(`${record.agent}: ${id} ${terminal.message}`);
        break;
    }
    this.records.set(id, next);
  }

  private isoNow(): string {
    return new Date(this.opts.now()).toISOString();
  }

  /**
   * Abort every in-flight invocation that has not reached its commit point.
   * Returns how many were signalled.
   */
  cancelAll(reason = "cancelled"): number {
    const controllers = [...this.controllers.values()];
    for (const controller of controllers) controller.abort(new Error(reason));
    return controllers.length;
  }

  /** Invocations submitted and not yet settled, waiting ones included */
  get inFlight(): number {
    return this.running.size;
  }

  /** Resolves once every invocation submitted so far has settled */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  invocations(filter: InvocationFilter = {}): InvocationRecord[] {
    return [...this.records.values()].filter(
      (record) =>
        (filter.agent === undefined || record.agent === filter.agent) &&
        (filter.status === undefined || record.status === filter.status),
    );
  }

  get(id: string): InvocationRecord | undefined {
    return this.records.get(id);
  }
}
