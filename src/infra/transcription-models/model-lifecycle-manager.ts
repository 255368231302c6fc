/**
 * Model Lifecycle Manager
 *
 * Download / prewarm / delete state machine for on-device speech models.
 * Catalog refreshes, downloads and prewarms each run in their own cancellation
 * slot: starting a new one aborts the previous, and an aborted operation never
 * touches state.
 */

import * as fs from 'fs';
import open from 'open';
import type { ModelRepository } from './model-repository.js';
import type { CuratedModelDefinition, ModelInfo } from './curated-models.js';
import { buildCuratedModels, loadCuratedModelDefinitions } from './curated-models.js';
import type { LifecycleAction, LifecycleState } from './lifecycle-state.js';
import { initialLifecycleState, lifecycleReducer } from './lifecycle-state.js';
import type { ModelWarmStatus, TranscriptionModelSettings } from '../config/settings-types.js';
import type { SettingsStore } from '../config/settings-store.js';
import { resolveRuntimeConfigFromEnvironment } from '../config/runtime-config.js';
import { CancellationSlots } from '../cancellation/cancellation-slots.js';
import type { VoxeditEventBus } from '../events/index.js';
import { voxeditEventBus } from '../events/index.js';

type LifecycleTask = 'catalog' | 'download' | 'prewarm';

/**
 * Lifecycle operation error
 */
export class ModelLifecycleError extends Error {
  constructor(
    message: string,
    public readonly modelName: string
  ) {
    super(message);
    this.name = 'ModelLifecycleError';
  }
}

export interface ModelLifecycleManagerOptions {
  repository: ModelRepository;
  settings: SettingsStore;
  /** Defaults to the runtime config's curated models file */
  curatedModelsPath?: string;
  events?: VoxeditEventBus;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ModelLifecycleManager {
  private state: LifecycleState = initialLifecycleState;
  private transcription: TranscriptionModelSettings;
  private readonly repository: ModelRepository;
  private readonly settingsStore: SettingsStore;
  private readonly events: VoxeditEventBus;
  private readonly curatedDefinitions: CuratedModelDefinition[];
  private readonly slots = new CancellationSlots<LifecycleTask>();

  constructor(options: ModelLifecycleManagerOptions) {
    this.repository = options.repository;
    this.settingsStore = options.settings;
    this.events = options.events ?? voxeditEventBus;
    this.curatedDefinitions = loadCuratedModelDefinitions(
      options.curatedModelsPath ?? resolveRuntimeConfigFromEnvironment().paths.curatedModels
    );

    // Nothing is loaded in a fresh process
    this.transcription = this.settingsStore.update((s) => {
      s.transcription.warmStatus = 'cold';
    }).transcription;
  }

  getState(): LifecycleState {
    return this.state;
  }

  get selectedModel(): string {
    return this.transcription.selectedModel;
  }

  get warmStatus(): ModelWarmStatus {
    return this.transcription.warmStatus;
  }

  /**
   * Reload the recommended model and the per-model download flags.
   * A repository failure leaves an empty list. Only the latest refresh applies.
   */
  async fetchModels(): Promise<void> {
    const signal = this.slots.begin('catalog');
    let recommendedModel = '';
    let availableModels: ModelInfo[] = [];

    try {
      recommendedModel = (await this.repository.getRecommendedModels()).default;
      const names = await this.repository.getAvailableModels();
      for (const name of names) {
        availableModels.push({ name, isDownloaded: await this.repository.isModelDownloaded(name) });
      }
    } catch (error) {
      console.warn(`[ModelLifecycleManager] Failed to fetch models: ${describeError(error)}`);
      recommendedModel = '';
      availableModels = [];
    }

    if (!this.slots.isCurrent('catalog', signal)) {
      return;
    }
    this.slots.finish('catalog', signal);
    this.dispatch({
      type: 'MODELS_FETCHED',
      payload: {
        recommendedModel,
        availableModels,
        curatedModels: buildCuratedModels(this.curatedDefinitions, availableModels),
      },
    });
  }

  /**
   * Persist a new selection. The new model starts cold; when it is already
   * downloaded it is prewarmed right away.
   */
  async selectModel(name: string): Promise<void> {
    this.cancelPrewarm();

    this.updateSettings((s) => {
      s.selectedModel = name;
      s.warmStatus = 'cold';
    });

    if (await this.isDownloaded(name)) {
      await this.prewarm(name);
    }
  }

  toggleModelDisplay(): void {
    this.dispatch({ type: 'TOGGLE_MODEL_DISPLAY' });
  }

  /**
   * Download a model (the selected one by default). Starting a download
   * aborts the one in flight. On success the model is prewarmed if it is
   * still the selected one.
   */
  async download(name: string = this.selectedModel): Promise<void> {
    if (!name) {
      return;
    }

    const signal = this.slots.begin('download');
    this.dispatch({ type: 'DOWNLOAD_STARTED', payload: { name } });
    console.log(`[ModelLifecycleManager] Downloading ${name}`);

    try {
      await this.repository.downloadModel(
        name,
        (fraction) => {
          if (this.slots.isCurrent('download', signal)) {
            this.dispatch({ type: 'DOWNLOAD_PROGRESS', payload: fraction });
          }
        },
        { signal }
      );
      if (!this.slots.isCurrent('download', signal)) {
        return;
      }
      this.dispatch({ type: 'DOWNLOAD_SUCCEEDED', payload: { name } });
    } catch (error) {
      if (!this.slots.isCurrent('download', signal)) {
        return;
      }
      console.warn(`[ModelLifecycleManager] Download of ${name} failed: ${describeError(error)}`);
      this.dispatch({ type: 'DOWNLOAD_FAILED', payload: { error: describeError(error) } });
      return;
    } finally {
      this.slots.finish('download', signal);
    }

    if (name === this.selectedModel) {
      await this.prewarm(name);
    }
  }

  cancelDownload(): void {
    if (this.slots.isActive('download')) {
      this.slots.cancel('download');
      this.dispatch({ type: 'DOWNLOAD_CANCELLED' });
    }
  }

  /**
   * Load a downloaded model into memory. Skipped when the selected model is
   * already warm. Failure is non-fatal: status returns to cold and
   * prewarmError is set.
   */
  async prewarm(name: string = this.selectedModel): Promise<void> {
    if (!name) {
      return;
    }
    const tracksWarmStatus = name === this.selectedModel;
    if (tracksWarmStatus && this.warmStatus === 'warm') {
      return;
    }

    this.cancelPrewarm();
    const signal = this.slots.begin('prewarm');
    this.dispatch({ type: 'PREWARM_STARTED' });

    if (!(await this.isDownloaded(name))) {
      if (this.slots.isCurrent('prewarm', signal)) {
        this.failPrewarm(new ModelLifecycleError(`Model ${name} is not downloaded`, name), tracksWarmStatus);
      }
      this.slots.finish('prewarm', signal);
      return;
    }

    if (tracksWarmStatus) {
      this.setWarmStatus('warming');
    }

    try {
      await this.repository.prewarmModel(
        name,
        (fraction) => {
          if (this.slots.isCurrent('prewarm', signal)) {
            this.dispatch({ type: 'PREWARM_PROGRESS', payload: fraction });
          }
        },
        { signal }
      );
      if (!this.slots.isCurrent('prewarm', signal)) {
        return;
      }
      this.dispatch({ type: 'PREWARM_SUCCEEDED' });
      if (tracksWarmStatus) {
        this.setWarmStatus('warm');
      }
      console.log(`[ModelLifecycleManager] ${name} is warm`);
    } catch (error) {
      if (this.slots.isCurrent('prewarm', signal)) {
        this.failPrewarm(error, tracksWarmStatus);
      }
    } finally {
      this.slots.finish('prewarm', signal);
    }
  }

  /**
   * Delete a model (the selected one by default), then refresh the list.
   */
  async delete(name: string = this.selectedModel): Promise<void> {
    if (!name) {
      return;
    }

    if (name === this.selectedModel) {
      this.cancelPrewarm();
    }

    try {
      await this.repository.deleteModel(name);
    } catch (error) {
      console.warn(`[ModelLifecycleManager] Delete of ${name} failed: ${describeError(error)}`);
      this.dispatch({ type: 'DOWNLOAD_FAILED', payload: { error: describeError(error) } });
      return;
    }

    if (name === this.selectedModel) {
      this.setWarmStatus('cold');
    }
    await this.fetchModels();
  }

  /**
   * Reveal the model storage directory, creating it first if needed.
   */
  async openStorageLocation(): Promise<string> {
    const location = this.repository.getStorageLocation();
    await fs.promises.mkdir(location, { recursive: true });
    await open(location);
    return location;
  }

  dispose(): void {
    this.slots.cancelAll();
  }

  /**
   * Abort the running prewarm. A selected model it was warming goes back to
   * cold, since the aborted run never reports.
   */
  private cancelPrewarm(): void {
    if (!this.slots.isActive('prewarm')) {
      return;
    }
    this.slots.cancel('prewarm');
    this.dispatch({ type: 'PREWARM_CANCELLED' });
    if (this.warmStatus === 'warming') {
      this.setWarmStatus('cold');
    }
  }

  private failPrewarm(error: unknown, tracksWarmStatus: boolean): void {
    console.warn(`[ModelLifecycleManager] Prewarm failed: ${describeError(error)}`);
    this.dispatch({ type: 'PREWARM_FAILED', payload: { error: describeError(error) } });
    if (tracksWarmStatus) {
      this.setWarmStatus('cold');
    }
  }

  private async isDownloaded(name: string): Promise<boolean> {
    try {
      return await this.repository.isModelDownloaded(name);
    } catch (error) {
      console.warn(`[ModelLifecycleManager] Could not check ${name}: ${describeError(error)}`);
      return false;
    }
  }

  private setWarmStatus(warmStatus: ModelWarmStatus): void {
    this.updateSettings((s) => {
      s.warmStatus = warmStatus;
    });
  }

  private dispatch(action: LifecycleAction): void {
    this.state = lifecycleReducer(this.state, action);
    this.publish();
  }

  private updateSettings(mutator: (settings: TranscriptionModelSettings) => void): void {
    this.transcription = this.settingsStore.update((s) => mutator(s.transcription)).transcription;
    this.publish();
  }

  private publish(): void {
    this.events.emit('models.state_changed', {
      state: this.state,
      selectedModel: this.transcription.selectedModel,
      warmStatus: this.transcription.warmStatus,
    });
  }
}
