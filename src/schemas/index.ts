export {
  type BackoffConfig,
  BackoffConfigSchema,
  type BlackboardConfig,
  type BlackboardConfigInput,
  BlackboardConfigSchema,
  type LogLevel,
  LogLevelSchema,
  type StoreConfig,
  StoreConfigSchema,
} from "./config.js";
export {
  type InvocationErrorCode,
  InvocationErrorCodeSchema,
  type InvocationEvent,
  type InvocationRecord,
  InvocationRecordSchema,
  type InvocationStatus,
  InvocationStatusSchema,
  type InvocationTrigger,
  InvocationTriggerSchema,
} from "./invocation-record.js";
export { type Visibility, VisibilitySchema } from "./visibility.js";
