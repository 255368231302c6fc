/**
 * Configuration module exports
 */
export { getConfigDir } from './config-paths.js';

export {
  type VoxeditRuntimeConfig,
  DEFAULT_RUNTIME_CONFIG,
  resolveRuntimeConfigFromEnvironment,
} from './runtime-config.js';

export {
  type AppSettings,
  type EnhancementSettings,
  type ModelWarmStatus,
  type ProviderValueMap,
  type StoredSettings,
  type TranscriptionModelSettings,
  DEFAULT_SETTINGS,
  DEFAULT_TRANSCRIPTION_MODEL,
  cloneSettings,
  mergeSettings,
} from './settings-types.js';

export {
  type SettingsMutator,
  type SettingsStore,
  FileSettingsStore,
  InMemorySettingsStore,
  SettingsValidationError,
  getSettingsPath,
  validateSettings,
} from './settings-store.js';
