/**
 * Supported enhancement backends
 */
export type ProviderKind = 'ollama' | 'lmstudio' | 'groq' | 'gemini';

/**
 * Local providers run on loopback daemons and need no credential;
 * remote providers require an API key.
 */
export type ProviderCategory = 'local' | 'remote';

export interface ProviderDescriptor {
  kind: ProviderKind;
  category: ProviderCategory;
  displayName: string;
  description: string;
}

export const PROVIDERS: Record<ProviderKind, ProviderDescriptor> = {
  ollama: {
    kind: 'ollama',
    category: 'local',
    displayName: 'Ollama (Local)',
    description: 'Run AI models locally using Ollama',
  },
  lmstudio: {
    kind: 'lmstudio',
    category: 'local',
    displayName: 'LM Studio (Local)',
    description: 'Run AI models locally using LM Studio',
  },
  groq: {
    kind: 'groq',
    category: 'remote',
    displayName: 'Groq (Remote)',
    description: "Use Groq's fast inference API",
  },
  gemini: {
    kind: 'gemini',
    category: 'remote',
    displayName: 'Gemini (Remote)',
    description: 'Google Gemini Generative Language API',
  },
};

export const PROVIDER_KINDS: readonly ProviderKind[] = ['ollama', 'lmstudio', 'groq', 'gemini'];

export function isProviderKind(value: unknown): value is ProviderKind {
  return typeof value === 'string' && (PROVIDER_KINDS as readonly string[]).includes(value);
}

export function getProviderCategory(kind: ProviderKind): ProviderCategory {
  return PROVIDERS[kind].category;
}

/**
 * A model reported by a provider's catalog. Rebuilt on every fetch.
 */
export interface RemoteAIModel {
  id: string;
  displayName: string;
  ownedBy: string;
  contextWindowTokens: number;
  maxCompletionTokens: number;
  active: boolean;
}

export interface EnhancementOptions {
  readonly systemPrompt: string;
  readonly context?: string;
  /** 0..1; providers clamp to [0.1, 1.0] before sending */
  readonly temperature: number;
  readonly maxTokens: number;
}

export type ProgressCallback = (fraction: number) => void;

export interface ProviderRequestOptions {
  /** Aborting fails the call with a CANCELLED error */
  signal?: AbortSignal;
}

/**
 * Capability interface every backend implements.
 */
export interface ProviderClient {
  readonly kind: ProviderKind;

  isAvailable(credential?: string, request?: ProviderRequestOptions): Promise<boolean>;

  testConnection(credential?: string, request?: ProviderRequestOptions): Promise<boolean>;

  fetchModels(credential?: string, request?: ProviderRequestOptions): Promise<RemoteAIModel[]>;

  enhance(
    text: string,
    modelId: string,
    options: EnhancementOptions,
    credential?: string,
    onProgress?: ProgressCallback,
    request?: ProviderRequestOptions
  ): Promise<string>;

  analyzeImage(
    image: Uint8Array,
    modelId: string,
    prompt: string,
    systemPrompt: string,
    credential?: string,
    onProgress?: ProgressCallback,
    request?: ProviderRequestOptions
  ): Promise<string>;
}
