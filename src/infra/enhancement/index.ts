// Provider types and errors
export type {
  EnhancementOptions,
  ProgressCallback,
  ProviderCategory,
  ProviderClient,
  ProviderDescriptor,
  ProviderKind,
  ProviderRequestOptions,
  RemoteAIModel,
} from './provider-types.js';
export { PROVIDERS, PROVIDER_KINDS, getProviderCategory, isProviderKind } from './provider-types.js';
export type { ProviderErrorCode } from './provider-error.js';
export { ProviderError, ProviderErrorCodes, formatProviderError, isProviderError } from './provider-error.js';

// Response handling
export type { StrictCompletionDecoder } from './response-normalizer.js';
export {
  cleanThinkingTags,
  extractCompletionText,
  fallbackExtractText,
  normalizeOutput,
} from './response-normalizer.js';
export { detectImageMimeType, encodeImageBase64, toImageDataUrl } from './image-encoding.js';

// Provider clients
export * from './providers/index.js';

// Orchestration
export {
  FLAGSHIP_MODELS,
  VISION_KEYWORDS,
  filterVisionModels,
  isVisionModel,
  reconcileSelection,
} from './model-selection.js';
export type { FlagshipModels } from './model-selection.js';
export {
  DEFAULT_ENHANCEMENT_PROMPT,
  DEFAULT_IMAGE_ANALYSIS_PROMPT,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  MIN_ENHANCEABLE_LENGTH,
} from './prompts.js';
export type {
  EnhancementAction,
  EnhancementState,
  InferenceTask,
  ModelCatalog,
  ProviderRuntimeState,
} from './orchestrator-state.js';
export {
  CONNECTION_FAILED,
  CONNECTION_SUCCESSFUL,
  createInitialEnhancementState,
  enhancementReducer,
} from './orchestrator-state.js';
export { EnhancementOrchestrator } from './enhancement-orchestrator.js';
export type {
  AnalyzeImageRequest,
  EnhanceRequest,
  EnhancementOrchestratorOptions,
} from './enhancement-orchestrator.js';
