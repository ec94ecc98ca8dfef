export { buildApp, buildAllowedFrontendOrigins, type BuildAppOptions } from "./app.js";
export { getConfig, parseEnv, type Config } from "./config/index.js";
export { createPipelineController, type CreatePipelineOptions } from "./modules/pipeline/create-pipeline.js";
export { PipelineController, type PipelineDependencies } from "./modules/pipeline/pipeline-controller.js";
export type { PipelineFailure, PipelineResult, PipelineSuccess, ProcessOptions } from "./modules/pipeline/types.js";
export type { FailureReason } from "./modules/pipeline/messages.js";
export {
  DeadlineExceededError,
  GenerationError,
  InvalidHybridWeightError,
  NoEvidenceError,
  TranslationError,
  UnsupportedLanguageError
} from "./modules/pipeline/errors.js";
export {
  createConversationTurn,
  toConversationTurns,
  type ConversationTurn,
  type ConversationTurnInput
} from "./modules/conversation/history.js";
export { ResponseCache, RedisCacheBackend, type CacheBackend, type CacheEntry } from "./modules/cache/response-cache.js";
export type { Citation, Document } from "./modules/rag/types.js";
export type {
  CallOptions,
  Embedder,
  RerankService,
  TextGenerator,
  TopicClassifier,
  Translator,
  VectorSearch,
  WebSearch
} from "./providers/types.js";
