export {
  Blackboard,
  type BlackboardOptions,
  type PublishOpts,
  type RunUntilIdleOpts,
  type RunUntilIdleResult,
} from "./blackboard.js";
export {
  type AgentDefinition,
  type AgentEngine,
  AgentBuilder,
  type EngineObject,
  type EvaluationContext,
  type HistoryOpts,
} from "./agent.js";
export type { AgentComponent, BlackboardComponent, ComponentHook } from "./components.js";
export {
  type DispatchTarget,
  Dispatcher,
  MATCH_LOG_LIMIT,
  type MatchGroup,
  type MatchLogEntry,
  type MatchLogFilter,
  type MatchOutcome,
} from "./dispatcher.js";
export { EngineError, type EngineErrorCode, InvocationFailure } from "./errors.js";
export { appendEvent, type FoldedState, foldInvocationEvents } from "./event-fold.js";
export {
  type EngineResult,
  type FanOut,
  type Output,
  output,
  type OutputDeclaration,
  type PublishesOpts,
} from "./fan-out.js";
export { type IdleSnapshot, IdleTracker, isQuiet } from "./idle.js";
export {
  type InvocationFilter,
  type InvocationRequest,
  Scheduler,
  type SchedulerOptions,
} from "./scheduler.js";
export { Semaphore } from "./semaphore.js";
export { SerialQueue } from "./serial-queue.js";
export {
  calculateBackoff,
  DEFAULT_BACKOFF,
  sleep,
  type TimeoutResult,
  withTimeout,
} from "./timing.js";
export {
  AgentTimers,
  normalizeSchedule,
  type Schedule,
  type ScheduleSpec,
  type TimerFire,
} from "./timers.js";
