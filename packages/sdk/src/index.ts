/**
 * orbitrag SDK
 *
 * Local keyword retrieval over content-hashed fragments, feeding a remote
 * completion endpoint
 */

// Re-export types
export type {
  RandomSource,
  SlotAddress,
  Slot,
  UnitOptions,
  Fragment,
  StoreFragmentResult,
  DocumentSummary,
  StoreStats,
  FragmentStoreOptions,
  RetrievalHit,
  Ranking,
  CompletionOptions,
  AskOptions,
  InitResult,
  LoadResult,
  SessionStats,
  ErrorResult,
} from "./types.js";

// State bank and units
export { GROUND_ENERGY, slotCount, slotEnergy, slotAddresses, generateSlots } from "./state-bank.js";
export { EncodableUnit } from "./unit.js";
export { defaultRandom, seededRandom } from "./random.js";

// Fragments, index and retrieval
export { contentHash, fragmentId } from "./hash.js";
export { tokenize, stripToken, splitWords, codePointLength, STRIP_CHARACTERS } from "./tokenize.js";
export { KeywordIndex } from "./indexes.js";
export { FragmentStore, chunkWords, compressionRatio } from "./store.js";
export { KeywordRetriever, CONTEXT_SEPARATOR } from "./retriever.js";

// Completion endpoint
export type { CompletionClientOptions, CompletionRequest } from "./completion/client.js";
export { CompletionClient } from "./completion/client.js";
export type { CompletionShape, ShapeKind } from "./completion/shapes.js";
export { classifyResponse, extractAnswer, serializeResponse } from "./completion/shapes.js";

// Sessions and boundary operations
export type { SessionOptions } from "./session.js";
export { Session, buildPrompt, COMPLETION_ERROR_PREFIX } from "./session.js";
export {
  init,
  load,
  ask,
  stats,
  formatRatio,
  toLoadResult,
  isErrorResult,
  NOT_INITIALIZED,
} from "./boundary.js";

// Validation and configuration
export {
  validateLevel,
  validatePositiveInt,
  validateNonNegativeInt,
  toEncodableValue,
} from "./validation.js";
export {
  DEFAULT_LEVEL,
  MAX_LEVEL,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_TOP_K,
  DEFAULT_TIME_STEP,
  DEFAULT_FIELD_STRENGTH,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
  INTEGRITY_LABEL,
  DEFAULT_ENDPOINT,
  DEFAULT_MODEL,
  configFromEnv,
} from "./config.js";
export type { EnvironmentConfig } from "./config.js";

// Re-export errors
export {
  OrbitragError,
  InvalidConfigurationError,
  InvalidOptionError,
  NotInitializedError,
  CompletionTransportError,
  ResponseShapeError,
  describeError,
} from "./errors.js";

// Observability
export type { LogLevel, LogThreshold, LogEntry, LogSink } from "./observability/logs.js";
export { Logger, logger, parseLogThreshold } from "./observability/logs.js";
export type { RetrievalMetrics } from "./observability/metrics.js";
export { MetricsCollector, metrics } from "./observability/metrics.js";
