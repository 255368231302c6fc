export {
  BaseProviderClient,
  Progress,
  VISION_TEMPERATURE,
  clampMaxTokens,
  clampTemperature,
  sortByDisplayName,
} from './base-provider.js';
export type { TokenBounds } from './base-provider.js';
export { OllamaProvider } from './ollama-provider.js';
export { LmStudioProvider } from './lmstudio-provider.js';
export { GroqProvider } from './groq-provider.js';
export { GeminiProvider, toGeminiModelPath } from './gemini-provider.js';

import type { ProviderClient, ProviderKind } from '../provider-types.js';
import type { VoxeditRuntimeConfig } from '../../config/runtime-config.js';
import { OllamaProvider } from './ollama-provider.js';
import { LmStudioProvider } from './lmstudio-provider.js';
import { GroqProvider } from './groq-provider.js';
import { GeminiProvider } from './gemini-provider.js';

export type ProviderClientMap = Record<ProviderKind, ProviderClient>;

/**
 * One client per provider kind, pointed at the configured endpoints.
 */
export function createProviderClients(config: VoxeditRuntimeConfig): ProviderClientMap {
  return {
    ollama: new OllamaProvider(config.endpoints.ollamaBaseUrl),
    lmstudio: new LmStudioProvider(config.endpoints.lmStudioBaseUrl),
    groq: new GroqProvider(config.endpoints.groqBaseUrl),
    gemini: new GeminiProvider(config.endpoints.geminiBaseUrl),
  };
}
