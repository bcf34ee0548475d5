// Types
export type {
  Artifact,
  GetByTypeOpts,
  ListOpts,
} from "./types.js";
export { EXTERNAL_PRODUCER, MAX_PAYLOAD_CHARS } from "./types.js";
export type {
  AnyArtifactType,
  ArtifactType,
  ParseResult,
  PayloadOf,
} from "./artifact-type.js";

// Errors
export { ArtifactError, formatIssues } from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Types and registry
export { defineType } from "./artifact-type.js";
export { TypeRegistry } from "./registry.js";

// Visibility
export type { AgentIdentity } from "./visibility.js";
export {
  describeVisibility,
  isVisibleTo,
  labelledVisibility,
  privateVisibility,
  publicVisibility,
  tenantVisibility,
} from "./visibility.js";

// Interface and implementations
export type { BlackboardStore } from "./store.js";
export { InMemoryBlackboardStore } from "./memory.js";
export { SqliteBlackboardStore } from "./sqlite.js";

// Utilities
export { normalizeTag, normalizeTags } from "./normalize.js";
