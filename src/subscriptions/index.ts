export type {
  BatchSpec,
  ConsumeOpts,
  JoinSpec,
  SemanticSpec,
  Subscription,
} from "./types.js";
export { correlationKey, stableStringify } from "./key.js";
export {
  cosineSimilarity,
  type Embedder,
  LexicalEmbedder,
  stem,
  termCounts,
  type TermVector,
  tokenize,
} from "./embedder.js";
export {
  type ArtifactPredicate,
  buildPredicates,
  extractText,
  type FilterKind,
  fromAgentsPredicate,
  type PredicateOptions,
  type PredicateVerdict,
  runPredicates,
  selfTriggerPredicate,
  semanticPredicate,
  tagsPredicate,
  visibilityPredicate,
  wherePredicate,
} from "./predicates.js";
export { JoinCorrelator, type JoinOfferResult } from "./join.js";
export { BatchAccumulator } from "./batch.js";
export { createSubscription } from "./subscription.js";
