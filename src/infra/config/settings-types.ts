import type { ProviderKind } from '../enhancement/provider-types.js';
import {
  DEFAULT_ENHANCEMENT_PROMPT,
  DEFAULT_IMAGE_ANALYSIS_PROMPT,
  DEFAULT_TEMPERATURE,
} from '../enhancement/prompts.js';

export type ModelWarmStatus = 'cold' | 'warming' | 'warm';

export type ProviderValueMap = Partial<Record<ProviderKind, string>>;

export interface EnhancementSettings {
  enabled: boolean;
  activeProvider: ProviderKind;
  /** API keys for remote providers */
  credentials: ProviderValueMap;
  /** Selections are kept per provider so switching never clobbers another provider's choice */
  selectedTextModels: ProviderValueMap;
  selectedImageModels: ProviderValueMap;
  temperature: number;
  prompt: string;
  imageAnalysisPrompt: string;
}

export interface TranscriptionModelSettings {
  selectedModel: string;
  warmStatus: ModelWarmStatus;
}

/**
 * Structure of ~/.config/voxedit/settings.json
 */
export interface AppSettings {
  enhancement: EnhancementSettings;
  transcription: TranscriptionModelSettings;
}

/**
 * What may appear on disk: every field optional, merged over DEFAULT_SETTINGS on read
 */
export interface StoredSettings {
  enhancement?: Partial<EnhancementSettings>;
  transcription?: Partial<TranscriptionModelSettings>;
}

export const DEFAULT_TRANSCRIPTION_MODEL = 'openai_whisper-large-v3-v20240930';

export const DEFAULT_SETTINGS: AppSettings = {
  enhancement: {
    enabled: false,
    activeProvider: 'ollama',
    credentials: {},
    selectedTextModels: {},
    selectedImageModels: {},
    temperature: DEFAULT_TEMPERATURE,
    prompt: DEFAULT_ENHANCEMENT_PROMPT,
    imageAnalysisPrompt: DEFAULT_IMAGE_ANALYSIS_PROMPT,
  },
  transcription: {
    selectedModel: DEFAULT_TRANSCRIPTION_MODEL,
    warmStatus: 'cold',
  },
};

export function cloneSettings(settings: AppSettings): AppSettings {
  return {
    enhancement: {
      ...settings.enhancement,
      credentials: { ...settings.enhancement.credentials },
      selectedTextModels: { ...settings.enhancement.selectedTextModels },
      selectedImageModels: { ...settings.enhancement.selectedImageModels },
    },
    transcription: { ...settings.transcription },
  };
}

export function mergeSettings(stored: StoredSettings): AppSettings {
  const base = cloneSettings(DEFAULT_SETTINGS);
  return cloneSettings({
    enhancement: { ...base.enhancement, ...stored.enhancement },
    transcription: { ...base.transcription, ...stored.transcription },
  });
}
