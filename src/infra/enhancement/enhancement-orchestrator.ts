/**
 * Enhancement Orchestrator
 *
 * Drives the active provider: availability checks, catalog loads for text and
 * vision models, selection reconciliation, connection tests, and the
 * enhance / analyzeImage calls themselves. Runtime state changes only through
 * dispatch(); persisted settings change only through updateSettings().
 */

import type { ProgressCallback, ProviderKind, RemoteAIModel } from './provider-types.js';
import { PROVIDERS, getProviderCategory } from './provider-types.js';
import { formatProviderError } from './provider-error.js';
import type {
  EnhancementAction,
  EnhancementState,
  InferenceTask,
  ModelCatalog,
  ProviderRuntimeState,
} from './orchestrator-state.js';
import { createInitialEnhancementState, enhancementReducer } from './orchestrator-state.js';
import { FLAGSHIP_MODELS, filterVisionModels, reconcileSelection } from './model-selection.js';
import {
  DEFAULT_ENHANCEMENT_PROMPT,
  DEFAULT_IMAGE_ANALYSIS_PROMPT,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  MIN_ENHANCEABLE_LENGTH,
} from './prompts.js';
import type { ProviderClientMap } from './providers/index.js';
import { createProviderClients } from './providers/index.js';
import type { EnhancementSettings } from '../config/settings-types.js';
import type { SettingsStore } from '../config/settings-store.js';
import { resolveRuntimeConfigFromEnvironment } from '../config/runtime-config.js';
import { CancellationSlots } from '../cancellation/cancellation-slots.js';
import type { VoxeditEventBus } from '../events/index.js';
import { voxeditEventBus } from '../events/index.js';

type ProviderTask = 'availability' | 'textModels' | 'imageModels' | 'connection';

export interface EnhancementOrchestratorOptions {
  settings: SettingsStore;
  clients?: ProviderClientMap;
  events?: VoxeditEventBus;
}

export interface EnhanceRequest {
  context?: string;
  onProgress?: ProgressCallback;
}

export interface AnalyzeImageRequest {
  onProgress?: ProgressCallback;
}

export class EnhancementOrchestrator {
  private state: EnhancementState = createInitialEnhancementState();
  private settingsSnapshot: EnhancementSettings;
  private readonly settingsStore: SettingsStore;
  private readonly clients: ProviderClientMap;
  private readonly events: VoxeditEventBus;
  private readonly providerSlots: Record<ProviderKind, CancellationSlots<ProviderTask>> = {
    ollama: new CancellationSlots(),
    lmstudio: new CancellationSlots(),
    groq: new CancellationSlots(),
    gemini: new CancellationSlots(),
  };
  private readonly inferenceSlots = new CancellationSlots<InferenceTask>();

  constructor(options: EnhancementOrchestratorOptions) {
    this.settingsStore = options.settings;
    this.clients = options.clients ?? createProviderClients(resolveRuntimeConfigFromEnvironment());
    this.events = options.events ?? voxeditEventBus;
    this.settingsSnapshot = this.settingsStore.read().enhancement;
  }

  getState(): EnhancementState {
    return this.state;
  }

  getSettings(): EnhancementSettings {
    return this.settingsSnapshot;
  }

  get activeProvider(): ProviderKind {
    return this.settingsSnapshot.activeProvider;
  }

  getProviderState(provider: ProviderKind = this.activeProvider): ProviderRuntimeState {
    return this.state.providers[provider];
  }

  getSelectedTextModel(provider: ProviderKind = this.activeProvider): string | undefined {
    return this.settingsSnapshot.selectedTextModels[provider];
  }

  getSelectedImageModel(provider: ProviderKind = this.activeProvider): string | undefined {
    return this.settingsSnapshot.selectedImageModels[provider];
  }

  // ============================================================================
  // Provider lifecycle
  // ============================================================================

  /**
   * Check the active provider and load its catalogs when it can serve them.
   * A remote provider with a credential loads catalogs alongside the check.
   */
  async activate(): Promise<void> {
    const provider = this.activeProvider;
    const hasCredential = Boolean(this.credentialFor(provider));

    if (getProviderCategory(provider) === 'remote' && hasCredential) {
      await Promise.all([
        this.checkAvailability(provider),
        this.loadCatalog(provider, 'text'),
        this.loadCatalog(provider, 'image'),
      ]);
      return;
    }

    const available = await this.checkAvailability(provider);
    if (available && getProviderCategory(provider) === 'local' && provider === this.activeProvider) {
      await Promise.all([this.loadCatalog(provider, 'text'), this.loadCatalog(provider, 'image')]);
    }
  }

  async setEnabled(enabled: boolean): Promise<void> {
    this.updateSettings((s) => {
      s.enabled = enabled;
    });
    if (enabled) {
      await this.activate();
    }
  }

  /**
   * Switch providers. In-flight work for the previous provider is aborted and
   * its results will never be applied.
   */
  async setActiveProvider(provider: ProviderKind): Promise<void> {
    const previous = this.activeProvider;
    if (previous !== provider) {
      this.providerSlots[previous].cancelAll();
      this.inferenceSlots.cancelAll();
      this.dispatch({ type: 'PROVIDER_WORK_CANCELLED', payload: { provider: previous } });
      console.log(`[EnhancementOrchestrator] Switching provider: ${previous} -> ${provider}`);
    }

    this.updateSettings((s) => {
      s.activeProvider = provider;
    });
    this.dispatch({ type: 'CLEAR_PROVIDER_STATUS', payload: { provider } });
    await this.activate();
  }

  /**
   * Store (or clear, when blank) a provider credential. Never triggers I/O.
   */
  setCredential(provider: ProviderKind, value: string): void {
    const trimmed = value.trim();
    this.updateSettings((s) => {
      if (trimmed) {
        s.credentials[provider] = trimmed;
      } else {
        delete s.credentials[provider];
      }
    });
  }

  loadModels(): Promise<void> {
    return this.loadCatalog(this.activeProvider, 'text');
  }

  loadImageModels(): Promise<void> {
    return this.loadCatalog(this.activeProvider, 'image');
  }

  /**
   * Probe the active provider. Success on a remote provider chains into both
   * catalog loads.
   */
  async testConnection(): Promise<boolean> {
    const provider = this.activeProvider;
    const slots = this.providerSlots[provider];
    const signal = slots.begin('connection');
    this.dispatch({ type: 'CONNECTION_TEST_STARTED', payload: { provider } });

    let success = false;
    try {
      success = await this.clients[provider].testConnection(this.credentialFor(provider), { signal });
      if (!slots.isCurrent('connection', signal)) {
        return false;
      }
    } finally {
      slots.finish('connection', signal);
    }

    this.dispatch({ type: 'CONNECTION_TEST_FINISHED', payload: { provider, success } });
    if (success && getProviderCategory(provider) === 'remote') {
      await Promise.all([this.loadCatalog(provider, 'text'), this.loadCatalog(provider, 'image')]);
    }
    return success;
  }

  // ============================================================================
  // Selections and tuning
  // ============================================================================

  setSelectedTextModel(modelId: string): void {
    const provider = this.activeProvider;
    this.updateSettings((s) => {
      s.selectedTextModels[provider] = modelId;
    });
  }

  setSelectedImageModel(modelId: string): void {
    const provider = this.activeProvider;
    this.updateSettings((s) => {
      s.selectedImageModels[provider] = modelId;
    });
  }

  setTemperature(temperature: number): void {
    const clamped = Number.isFinite(temperature) ? Math.max(0, Math.min(1, temperature)) : DEFAULT_TEMPERATURE;
    this.updateSettings((s) => {
      s.temperature = clamped;
    });
  }

  setPrompt(prompt: string): void {
    this.updateSettings((s) => {
      s.prompt = prompt;
    });
  }

  setImageAnalysisPrompt(prompt: string): void {
    this.updateSettings((s) => {
      s.imageAnalysisPrompt = prompt;
    });
  }

  resetPrompt(): void {
    this.setPrompt(DEFAULT_ENHANCEMENT_PROMPT);
  }

  resetImageAnalysisPrompt(): void {
    this.setImageAnalysisPrompt(DEFAULT_IMAGE_ANALYSIS_PROMPT);
  }

  // ============================================================================
  // Inference
  // ============================================================================

  /**
   * Clean up a transcript with the active provider and its selected text model.
   * Returns the input unchanged when enhancement is off or the text is too short.
   */
  async enhance(text: string, request: EnhanceRequest = {}): Promise<string> {
    const settings = this.settingsSnapshot;
    if (!settings.enabled || text.length <= MIN_ENHANCEABLE_LENGTH) {
      return text;
    }

    const provider = settings.activeProvider;
    const modelId = settings.selectedTextModels[provider] ?? '';
    console.log(`[EnhancementOrchestrator] Enhancing ${text.length} chars with ${provider}/${modelId || '<none>'}`);

    return this.runInference(
      'enhance',
      provider,
      request.onProgress,
      (onProgress, signal) =>
        this.clients[provider].enhance(
          text,
          modelId,
          {
            systemPrompt: settings.prompt.trim() ? settings.prompt : DEFAULT_ENHANCEMENT_PROMPT,
            context: request.context,
            temperature: settings.temperature,
            maxTokens: DEFAULT_MAX_TOKENS,
          },
          this.credentialFor(provider),
          onProgress,
          { signal }
        )
    );
  }

  /**
   * Describe a screenshot with the selected image model, for use as enhancement context.
   */
  async analyzeImage(image: Uint8Array, request: AnalyzeImageRequest = {}): Promise<string> {
    const settings = this.settingsSnapshot;
    const provider = settings.activeProvider;
    const modelId = settings.selectedImageModels[provider] ?? '';
    const prompt = settings.imageAnalysisPrompt.trim() ? settings.imageAnalysisPrompt : DEFAULT_IMAGE_ANALYSIS_PROMPT;

    return this.runInference(
      'analyzeImage',
      provider,
      request.onProgress,
      (onProgress, signal) =>
        this.clients[provider].analyzeImage(
          image,
          modelId,
          prompt,
          DEFAULT_IMAGE_ANALYSIS_PROMPT,
          this.credentialFor(provider),
          onProgress,
          { signal }
        )
    );
  }

  /**
   * Abort everything in flight. Results of aborted work are discarded.
   */
  dispose(): void {
    for (const slots of Object.values(this.providerSlots)) {
      slots.cancelAll();
    }
    this.inferenceSlots.cancelAll();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private dispatch(action: EnhancementAction): void {
    this.state = enhancementReducer(this.state, action);
    this.publish();
  }

  private updateSettings(mutator: (settings: EnhancementSettings) => void): void {
    this.settingsSnapshot = this.settingsStore.update((s) => mutator(s.enhancement)).enhancement;
    this.publish();
  }

  private publish(): void {
    this.events.emit('enhancement.state_changed', { state: this.state, settings: this.settingsSnapshot });
  }

  private credentialFor(provider: ProviderKind): string | undefined {
    return this.settingsSnapshot.credentials[provider];
  }

  private unavailableMessage(provider: ProviderKind): string {
    if (getProviderCategory(provider) === 'local') {
      return `${PROVIDERS[provider].displayName}: Service is not running or not reachable`;
    }
    return this.credentialFor(provider)
      ? `${PROVIDERS[provider].displayName}: API key was rejected or the service is unreachable`
      : `${PROVIDERS[provider].displayName}: API key is required`;
  }

  private async checkAvailability(provider: ProviderKind): Promise<boolean> {
    const slots = this.providerSlots[provider];
    const signal = slots.begin('availability');
    try {
      const available = await this.clients[provider].isAvailable(this.credentialFor(provider), { signal });
      if (!slots.isCurrent('availability', signal)) {
        return false;
      }

      const errorMessage = available ? undefined : this.unavailableMessage(provider);
      if (errorMessage) {
        console.warn(`[EnhancementOrchestrator] ${errorMessage}`);
      }
      this.dispatch({ type: 'AVAILABILITY_RESOLVED', payload: { provider, available, errorMessage } });
      return available;
    } finally {
      slots.finish('availability', signal);
    }
  }

  private async loadCatalog(provider: ProviderKind, catalog: ModelCatalog): Promise<void> {
    const task: ProviderTask = catalog === 'text' ? 'textModels' : 'imageModels';
    const slots = this.providerSlots[provider];
    const signal = slots.begin(task);
    this.dispatch({ type: 'CATALOG_LOADING', payload: { provider, catalog } });

    try {
      const fetched = await this.clients[provider].fetchModels(this.credentialFor(provider), { signal });
      if (!slots.isCurrent(task, signal)) {
        return;
      }

      const models = catalog === 'text' ? fetched : filterVisionModels(fetched);
      this.dispatch({ type: 'CATALOG_LOADED', payload: { provider, catalog, models } });
      this.reconcile(provider, catalog, models);
    } catch (error) {
      if (!slots.isCurrent(task, signal)) {
        return;
      }
      const errorMessage = formatProviderError(provider, error);
      console.warn(`[EnhancementOrchestrator] Failed to load ${catalog} models: ${errorMessage}`);
      this.dispatch({ type: 'CATALOG_FAILED', payload: { provider, catalog, errorMessage } });
    } finally {
      slots.finish(task, signal);
    }
  }

  private reconcile(provider: ProviderKind, catalog: ModelCatalog, models: RemoteAIModel[]): void {
    const selections =
      catalog === 'text' ? this.settingsSnapshot.selectedTextModels : this.settingsSnapshot.selectedImageModels;
    const next = reconcileSelection(models, selections[provider], FLAGSHIP_MODELS[provider][catalog]);
    if (next === undefined) {
      return;
    }

    console.log(`[EnhancementOrchestrator] Selecting ${catalog} model for ${provider}: ${next}`);
    this.updateSettings((s) => {
      if (catalog === 'text') {
        s.selectedTextModels[provider] = next;
      } else {
        s.selectedImageModels[provider] = next;
      }
    });
  }

  private async runInference(
    task: InferenceTask,
    provider: ProviderKind,
    onProgress: ProgressCallback | undefined,
    run: (onProgress: ProgressCallback, signal: AbortSignal) => Promise<string>
  ): Promise<string> {
    const signal = this.inferenceSlots.begin(task);
    this.dispatch({ type: 'INFERENCE_STARTED', payload: { task } });

    const reportProgress: ProgressCallback = (fraction) => {
      if (!this.inferenceSlots.isCurrent(task, signal)) {
        return;
      }
      this.dispatch({ type: 'INFERENCE_PROGRESS', payload: { task, fraction } });
      if (onProgress) {
        onProgress(fraction);
      }
    };

    try {
      return await run(reportProgress, signal);
    } catch (error) {
      console.warn(`[EnhancementOrchestrator] ${task} failed: ${formatProviderError(provider, error)}`);
      throw error;
    } finally {
      // A newer call of the same kind owns the flags now
      const superseded = this.inferenceSlots.isActive(task) && !this.inferenceSlots.isCurrent(task, signal);
      this.inferenceSlots.finish(task, signal);
      if (!superseded) {
        this.dispatch({ type: 'INFERENCE_FINISHED', payload: { task } });
      }
    }
  }
}
