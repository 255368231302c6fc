/**
 * Model lifecycle state and reducer
 */

import type { CuratedModelInfo, ModelInfo } from './curated-models.js';

export interface LifecycleState {
  availableModels: ModelInfo[];
  recommendedModel: string;
  curatedModels: CuratedModelInfo[];
  showAllModels: boolean;
  isDownloading: boolean;
  downloadProgress: number;
  downloadError?: string;
  downloadingModelName?: string;
  isPrewarming: boolean;
  prewarmProgress: number;
  /** Non-fatal: the model stays usable, only the first transcription is slower */
  prewarmError?: string;
}

export type LifecycleAction =
  | {
      type: 'MODELS_FETCHED';
      payload: { recommendedModel: string; availableModels: ModelInfo[]; curatedModels: CuratedModelInfo[] };
    }
  | { type: 'TOGGLE_MODEL_DISPLAY' }
  | { type: 'DOWNLOAD_STARTED'; payload: { name: string } }
  | { type: 'DOWNLOAD_PROGRESS'; payload: number }
  | { type: 'DOWNLOAD_SUCCEEDED'; payload: { name: string } }
  | { type: 'DOWNLOAD_FAILED'; payload: { error: string } }
  | { type: 'DOWNLOAD_CANCELLED' }
  | { type: 'PREWARM_STARTED' }
  | { type: 'PREWARM_PROGRESS'; payload: number }
  | { type: 'PREWARM_SUCCEEDED' }
  | { type: 'PREWARM_FAILED'; payload: { error: string } }
  | { type: 'PREWARM_CANCELLED' };

export const initialLifecycleState: LifecycleState = {
  availableModels: [],
  recommendedModel: '',
  curatedModels: [],
  showAllModels: false,
  isDownloading: false,
  downloadProgress: 0,
  isPrewarming: false,
  prewarmProgress: 0,
};

export function lifecycleReducer(state: LifecycleState, action: LifecycleAction): LifecycleState {
  switch (action.type) {
    case 'MODELS_FETCHED':
      return { ...state, ...action.payload };

    case 'TOGGLE_MODEL_DISPLAY':
      return { ...state, showAllModels: !state.showAllModels };

    case 'DOWNLOAD_STARTED':
      return {
        ...state,
        isDownloading: true,
        downloadProgress: 0,
        downloadError: undefined,
        downloadingModelName: action.payload.name,
      };

    case 'DOWNLOAD_PROGRESS':
      return { ...state, downloadProgress: action.payload };

    case 'DOWNLOAD_SUCCEEDED': {
      const { name } = action.payload;
      return {
        ...state,
        isDownloading: false,
        downloadProgress: 1,
        downloadError: undefined,
        downloadingModelName: undefined,
        availableModels: state.availableModels.map((m) => (m.name === name ? { ...m, isDownloaded: true } : m)),
        curatedModels: state.curatedModels.map((m) =>
          m.internalName === name ? { ...m, isDownloaded: true } : m
        ),
      };
    }

    case 'DOWNLOAD_FAILED':
      return {
        ...state,
        isDownloading: false,
        downloadProgress: 0,
        downloadError: action.payload.error,
        downloadingModelName: undefined,
      };

    case 'DOWNLOAD_CANCELLED':
      return { ...state, isDownloading: false, downloadProgress: 0, downloadingModelName: undefined };

    case 'PREWARM_STARTED':
      return { ...state, isPrewarming: true, prewarmProgress: 0, prewarmError: undefined };

    case 'PREWARM_PROGRESS':
      return { ...state, prewarmProgress: action.payload };

    case 'PREWARM_SUCCEEDED':
      return { ...state, isPrewarming: false, prewarmProgress: 1 };

    case 'PREWARM_FAILED':
      return { ...state, isPrewarming: false, prewarmProgress: 0, prewarmError: action.payload.error };

    case 'PREWARM_CANCELLED':
      return { ...state, isPrewarming: false, prewarmProgress: 0 };

    default:
      return state;
  }
}
