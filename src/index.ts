export * from "./artifacts/index.js";
export * from "./engine/index.js";
export * from "./schemas/index.js";
export {
  type BatchSpec,
  type ConsumeOpts,
  cosineSimilarity,
  type Embedder,
  type JoinSpec,
  LexicalEmbedder,
  type SemanticSpec,
  type Subscription,
  type TermVector,
} from "./subscriptions/index.js";
export {
  expiresAt,
  resolveTtl,
  type RetentionPolicy,
  TTL,
  validateRetentionPolicy,
} from "./policies/retention.js";
export { createStore, loadConfig, loadConfigFromEnv, resolveConfig } from "./config.js";
export { createLogger, type Logger, type LoggerOptions, withPrefix } from "./logger.js";
