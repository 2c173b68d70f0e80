export {
  MemoryStream,
  FALLBACK_IMPORTANCE,
  DEFAULT_RECENCY_DECAY,
  DEFAULT_COLLABORATOR_TIMEOUT_MS,
  estimateTokens,
  clampImportance,
  cosineSimilarity,
  minMaxNormalize,
} from "./memory-stream.js";
export type { MemoryStreamOptions, RetrieveOptions, MemoryListener } from "./memory-stream.js";
export {
  ReflectionTracker,
  MIN_INSIGHTS_PER_REFLECTION,
  MAX_INSIGHTS_PER_REFLECTION,
  DEFAULT_REFLECTION_THRESHOLD,
} from "./reflection.js";
export type { ReflectionTrackerOptions } from "./reflection.js";
