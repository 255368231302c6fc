/**
 * Enhancement orchestrator state and reducer
 */

import type { ProviderKind, RemoteAIModel } from './provider-types.js';

export const CONNECTION_SUCCESSFUL = 'Connection successful';
export const CONNECTION_FAILED = 'Connection failed';

/**
 * Runtime (never persisted) view of one provider
 */
export interface ProviderRuntimeState {
  /** undefined until the first availability check completes */
  available?: boolean;
  textModels: RemoteAIModel[];
  imageModels: RemoteAIModel[];
  isLoadingModels: boolean;
  isLoadingImageModels: boolean;
  errorMessage?: string;
  imageErrorMessage?: string;
  isTestingConnection: boolean;
  connectionStatus?: string;
}

export interface EnhancementState {
  providers: Record<ProviderKind, ProviderRuntimeState>;
  isEnhancing: boolean;
  enhancementProgress: number;
  isAnalyzingImage: boolean;
  imageAnalysisProgress: number;
}

export type ModelCatalog = 'text' | 'image';

export type InferenceTask = 'enhance' | 'analyzeImage';

export type EnhancementAction =
  | { type: 'AVAILABILITY_RESOLVED'; payload: { provider: ProviderKind; available: boolean; errorMessage?: string } }
  | { type: 'CATALOG_LOADING'; payload: { provider: ProviderKind; catalog: ModelCatalog } }
  | { type: 'CATALOG_LOADED'; payload: { provider: ProviderKind; catalog: ModelCatalog; models: RemoteAIModel[] } }
  | { type: 'CATALOG_FAILED'; payload: { provider: ProviderKind; catalog: ModelCatalog; errorMessage: string } }
  | { type: 'PROVIDER_WORK_CANCELLED'; payload: { provider: ProviderKind } }
  | { type: 'CONNECTION_TEST_STARTED'; payload: { provider: ProviderKind } }
  | { type: 'CONNECTION_TEST_FINISHED'; payload: { provider: ProviderKind; success: boolean } }
  | { type: 'CLEAR_PROVIDER_STATUS'; payload: { provider: ProviderKind } }
  | { type: 'INFERENCE_STARTED'; payload: { task: InferenceTask } }
  | { type: 'INFERENCE_PROGRESS'; payload: { task: InferenceTask; fraction: number } }
  | { type: 'INFERENCE_FINISHED'; payload: { task: InferenceTask } };

export function createProviderRuntimeState(): ProviderRuntimeState {
  return {
    textModels: [],
    imageModels: [],
    isLoadingModels: false,
    isLoadingImageModels: false,
    isTestingConnection: false,
  };
}

export function createInitialEnhancementState(): EnhancementState {
  const providers: Record<ProviderKind, ProviderRuntimeState> = {
    ollama: createProviderRuntimeState(),
    lmstudio: createProviderRuntimeState(),
    groq: createProviderRuntimeState(),
    gemini: createProviderRuntimeState(),
  };

  return {
    providers,
    isEnhancing: false,
    enhancementProgress: 0,
    isAnalyzingImage: false,
    imageAnalysisProgress: 0,
  };
}

function updateProvider(
  state: EnhancementState,
  provider: ProviderKind,
  updates: Partial<ProviderRuntimeState>
): EnhancementState {
  return {
    ...state,
    providers: {
      ...state.providers,
      [provider]: { ...state.providers[provider], ...updates },
    },
  };
}

export function enhancementReducer(state: EnhancementState, action: EnhancementAction): EnhancementState {
  switch (action.type) {
    case 'AVAILABILITY_RESOLVED': {
      const { provider, available, errorMessage } = action.payload;
      // A successful probe does not hide an error a catalog load has reported
      return available
        ? updateProvider(state, provider, { available })
        : updateProvider(state, provider, { available, errorMessage });
    }

    case 'CATALOG_LOADING': {
      const { provider, catalog } = action.payload;
      return catalog === 'text'
        ? updateProvider(state, provider, { isLoadingModels: true, errorMessage: undefined })
        : updateProvider(state, provider, { isLoadingImageModels: true, imageErrorMessage: undefined });
    }

    case 'CATALOG_LOADED': {
      const { provider, catalog, models } = action.payload;
      return catalog === 'text'
        ? updateProvider(state, provider, { isLoadingModels: false, textModels: models })
        : updateProvider(state, provider, { isLoadingImageModels: false, imageModels: models });
    }

    // The previous catalog stays visible; only the error is added
    case 'CATALOG_FAILED': {
      const { provider, catalog, errorMessage } = action.payload;
      return catalog === 'text'
        ? updateProvider(state, provider, { isLoadingModels: false, errorMessage })
        : updateProvider(state, provider, { isLoadingImageModels: false, imageErrorMessage: errorMessage });
    }

    // Aborted work never reports back, so its busy flags are cleared here
    case 'PROVIDER_WORK_CANCELLED':
      return updateProvider(state, action.payload.provider, {
        isLoadingModels: false,
        isLoadingImageModels: false,
        isTestingConnection: false,
      });

    case 'CONNECTION_TEST_STARTED':
      return updateProvider(state, action.payload.provider, {
        isTestingConnection: true,
        connectionStatus: undefined,
      });

    case 'CONNECTION_TEST_FINISHED':
      return updateProvider(state, action.payload.provider, {
        isTestingConnection: false,
        connectionStatus: action.payload.success ? CONNECTION_SUCCESSFUL : CONNECTION_FAILED,
      });

    case 'CLEAR_PROVIDER_STATUS':
      return updateProvider(state, action.payload.provider, {
        errorMessage: undefined,
        imageErrorMessage: undefined,
        connectionStatus: undefined,
        isTestingConnection: false,
      });

    case 'INFERENCE_STARTED':
      return action.payload.task === 'enhance'
        ? { ...state, isEnhancing: true, enhancementProgress: 0 }
        : { ...state, isAnalyzingImage: true, imageAnalysisProgress: 0 };

    case 'INFERENCE_PROGRESS':
      return action.payload.task === 'enhance'
        ? { ...state, enhancementProgress: action.payload.fraction }
        : { ...state, imageAnalysisProgress: action.payload.fraction };

    case 'INFERENCE_FINISHED':
      return action.payload.task === 'enhance'
        ? { ...state, isEnhancing: false }
        : { ...state, isAnalyzingImage: false };

    default:
      return state;
  }
}
