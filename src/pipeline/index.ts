export {
  ChatPipeline,
  FALLBACK_REPLY,
  DEFAULT_MAX_TOKENS,
  type ChatPipelineOptions,
  type TranscriptTurn,
} from "./chat-pipeline.js";

export {
  HttpGenerationBackend,
  DEFAULT_GENERATION_TIMEOUT_MS,
  type GenerationBackend,
  type GenerationRequest,
  type GenerationResult,
  type GenerationTurn,
  type HttpGenerationBackendConfig,
} from "./generation.js";

export {
  deriveTitle,
  assertTitleMaxLength,
  DEFAULT_TITLE_MAX_LENGTH,
  MAX_DERIVED_TITLE_LENGTH,
} from "./title.js";
