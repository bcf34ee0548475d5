import type { InvocationErrorCode } from "../schemas/invocation-record.js";

export type EngineErrorCode =
  | "DUPLICATE_AGENT" // two agents registered under one name
  | "INVALID_SUBSCRIPTION" // consumes() options fail structural checks
  | "INVALID_FAN_OUT" // publishes() cardinality out of range
  | "DUPLICATE_OUTPUT" // same output type declared twice on one agent
  | "IDLE_TIMEOUT" // runUntilIdle elapsed with raise_on_timeout
  | "BLACKBOARD_CLOSED" // operation after shutdown()
  | "INVALID_CONFIG" // config failed schema validation
  | "INVARIANT_VIOLATION"; // internal invariant violated

export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    public readonly details?: {
      agent?: string;
      subscription_id?: string;
      output_type?: string;
      in_flight?: number;
      pending_dispatch?: number;
      open_batches?: number;
      pending_timers?: number;
      issues?: string[];
    },
  ) {
    super(message);
    this.name = "EngineError";
  }
}

/**
 * Terminal or retryable failure of one invocation attempt.
 * Caught by the scheduler and folded into the invocation record.
 */
export class InvocationFailure extends Error {
  constructor(
    public readonly code: InvocationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "InvocationFailure";
  }

  /** Only engine throws and timeouts are worth another attempt */
  get retryable(): boolean {
    return this.code === "ENGINE_ERROR" || this.code === "TIMEOUT";
  }
}
