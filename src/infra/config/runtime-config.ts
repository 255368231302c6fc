import * as path from 'path';

export interface VoxeditRuntimeConfig {
  endpoints: {
    ollamaBaseUrl: string;
    lmStudioBaseUrl: string;
    groqBaseUrl: string;
    geminiBaseUrl: string;
  };
  paths: {
    curatedModels: string;
  };
}

export const DEFAULT_RUNTIME_CONFIG: VoxeditRuntimeConfig = {
  endpoints: {
    ollamaBaseUrl: 'http://localhost:11434',
    lmStudioBaseUrl: 'http://localhost:1234',
    groqBaseUrl: 'https://api.groq.com/openai/v1',
    geminiBaseUrl: 'https://generativelanguage.googleapis.com/v1beta',
  },
  paths: {
    // data/ sits at the package root both for src/ and for the built dist/
    curatedModels: path.resolve(__dirname, '..', '..', '..', 'data', 'curated-models.json'),
  },
};

function toStringValue(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

function toBaseUrl(value: unknown, fallback: string): string {
  return toStringValue(value, fallback).replace(/\/+$/, '');
}

export function resolveRuntimeConfigFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): VoxeditRuntimeConfig {
  return {
    endpoints: {
      ollamaBaseUrl: toBaseUrl(env.VOXEDIT_OLLAMA_URL, DEFAULT_RUNTIME_CONFIG.endpoints.ollamaBaseUrl),
      lmStudioBaseUrl: toBaseUrl(env.VOXEDIT_LMSTUDIO_URL, DEFAULT_RUNTIME_CONFIG.endpoints.lmStudioBaseUrl),
      groqBaseUrl: toBaseUrl(env.VOXEDIT_GROQ_URL, DEFAULT_RUNTIME_CONFIG.endpoints.groqBaseUrl),
      geminiBaseUrl: toBaseUrl(env.VOXEDIT_GEMINI_URL, DEFAULT_RUNTIME_CONFIG.endpoints.geminiBaseUrl),
    },
    paths: {
      curatedModels: path.resolve(
        toStringValue(env.VOXEDIT_CURATED_MODELS_PATH, DEFAULT_RUNTIME_CONFIG.paths.curatedModels)
      ),
    },
  };
}
