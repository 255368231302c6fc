export type {
  ModelOperationOptions,
  ModelProgressCallback,
  ModelRepository,
  RecommendedModels,
} from './model-repository.js';
export type { CuratedModelDefinition, CuratedModelInfo, ModelInfo } from './curated-models.js';
export { FALLBACK_CURATED_MODELS, buildCuratedModels, loadCuratedModelDefinitions } from './curated-models.js';
export type { LifecycleAction, LifecycleState } from './lifecycle-state.js';
export { initialLifecycleState, lifecycleReducer } from './lifecycle-state.js';
export { ModelLifecycleError, ModelLifecycleManager } from './model-lifecycle-manager.js';
export type { ModelLifecycleManagerOptions } from './model-lifecycle-manager.js';
