/**
 * Speech-model storage and runtime, provided by the transcription engine.
 */

export interface RecommendedModels {
  default: string;
  supported: string[];
}

export type ModelProgressCallback = (fraction: number) => void;

export interface ModelOperationOptions {
  /** Aborting makes the operation reject; its result is never applied */
  signal?: AbortSignal;
}

export interface ModelRepository {
  getAvailableModels(): Promise<string[]>;
  getRecommendedModels(): Promise<RecommendedModels>;
  isModelDownloaded(name: string): Promise<boolean>;
  downloadModel(name: string, onProgress: ModelProgressCallback, options?: ModelOperationOptions): Promise<void>;
  deleteModel(name: string): Promise<void>;
  /** Load the model into memory so the first transcription starts fast */
  prewarmModel(name: string, onProgress: ModelProgressCallback, options?: ModelOperationOptions): Promise<void>;
  /** Directory holding downloaded models */
  getStorageLocation(): string;
}
