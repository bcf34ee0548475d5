import type { Logger } from "../logger.js";
import type { AgentDefinition } from "./agent.js";
import { EngineError } from "./errors.js";

/** Accepted by `AgentBuilder.schedule()`: an interval, or one fire at a point in time */
export type ScheduleSpec =
  | { every_ms: number; after_ms?: number; max_repeats?: number }
  | { at: Date | number };

export interface Schedule {
  readonly every_ms?: number; // absent for a one-shot
  readonly after_ms?: number; // delay before the first fire; default every_ms
  readonly at?: number; // Unix timestamp (ms)
  readonly max_repeats?: number; // absent = until shutdown
}

export interface TimerFire {
  readonly iteration: number; // 0 on the first fire
  readonly fire_time: number; // Unix timestamp (ms)
}

export function normalizeSchedule(agent: string, spec: ScheduleSpec): Schedule {
  const invalid = (message: string) =>
    new EngineError("INVALID_CONFIG", `${agent}: ${message}`, { agent });

  if ("at" in spec) {
    const at = spec.at instanceof Date ? spec.at.getTime() : spec.at;
    if (!Number.isFinite(at)) throw invalid("schedule.at must be a valid time");
    return { at, max_repeats: 1 };
  }

  const { every_ms, after_ms, max_repeats } = spec;
  if (!Number.isFinite(every_ms) || every_ms <= 0) {
    throw invalid("schedule.every_ms must be a positive number");
  }
  if (after_ms !== undefined && (!Number.isFinite(after_ms) || after_ms < 0)) {
    throw invalid("schedule.after_ms must be a non-negative number");
  }
  if (max_repeats !== undefined && (!Number.isInteger(max_repeats) || max_repeats < 1)) {
    throw invalid("schedule.max_repeats must be a positive integer");
  }
  return { every_ms, after_ms, max_repeats };
}

export interface AgentTimersOptions {
  now: () => number;
  logger: Logger;
  /** Start the invocation for one fire. It must count as in flight on return. */
  onFire(agent: AgentDefinition, fire: TimerFire): void;
  onChange(): void;
}

interface ArmedTimer {
  readonly handle: ReturnType<typeof setTimeout>;
  readonly bounded: boolean;
}

/**
 * One chained setTimeout per scheduled agent.
 *
 * A bounded timer (one-shot, or max_repeats) is pending work until its last
 * fire. An open-ended interval never holds up idle; it runs until stopped.
 */
export class AgentTimers {
  private readonly armed = new Map<string, ArmedTimer>();

  constructor(private readonly opts: AgentTimersOptions) {}

  /** Arm the agent's timer, replacing any previous one */
  start(agent: AgentDefinition, schedule: Schedule): void {
    this.stop(agent.name);
    const delay =
      schedule.at !== undefined
        ? Math.max(0, schedule.at - this.opts.now())
        : (schedule.after_ms ?? schedule.every_ms ?? 0);
    this.arm(agent, schedule, delay, 0);
    this.opts.logger.debug(`${agent.name}: timer armed, first fire in ${delay}ms`);
    this.opts.onChange();
  }

  private arm(agent: AgentDefinition, schedule: Schedule, delay: number, iteration: number): void {
    const handle = setTimeout(() => this.fire(agent, schedule, iteration), delay);
    this.armed.set(agent.name, { handle, bounded: schedule.max_repeats !== undefined });
  }

  private fire(agent: AgentDefinition, schedule: Schedule, iteration: number): void {
    this.armed.delete(agent.name);
    this.opts.onFire(agent, { iteration, fire_time: this.opts.now() });

    const fired = iteration + 1;
    if (
      schedule.every_ms !== undefined &&
      (schedule.max_repeats === undefined || fired < schedule.max_repeats)
    ) {
      this.arm(agent, schedule, schedule.every_ms, fired);
    } else {
      this.opts.logger.debug(`${agent.name}: timer done after ${fired} fire(s)`);
    }
    this.opts.onChange();
  }

  stop(name: string): void {
    const timer = this.armed.get(name);
    if (timer === undefined) return;
    clearTimeout(timer.handle);
    this.armed.delete(name);
  }

  /** Disarm every timer */
  clear(): void {
    for (const timer of this.armed.values()) clearTimeout(timer.handle);
    this.armed.clear();
  }

  /** Bounded timers with fires left */
  get pending(): number {
    let count = 0;
    for (const timer of this.armed.values()) if (timer.bounded) count++;
    return count;
  }

  /** Armed timers, bounded or not */
  get active(): number {
    return this.armed.size;
  }
}
