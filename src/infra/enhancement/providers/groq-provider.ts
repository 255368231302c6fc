import type {
  EnhancementOptions,
  ProgressCallback,
  ProviderRequestOptions,
  RemoteAIModel,
} from '../provider-types.js';
import { compileSchema } from '../../validation/schema-validator.js';
import { DEFAULT_RUNTIME_CONFIG } from '../../config/runtime-config.js';
import {
  BaseProviderClient,
  CATALOG_TIMEOUT_MS,
  COMPLETION_TIMEOUT_MS,
  Progress,
  VISION_TEMPERATURE,
  VISION_TIMEOUT_MS,
  clampMaxTokens,
  clampTemperature,
  sortByDisplayName,
} from './base-provider.js';
import { buildEnhancementMessages, buildVisionMessages, decodeChatCompletion } from './chat-completion.js';

const MAX_TOKEN_BOUNDS = { min: 100, max: 32768 };

/** Speech models share the catalog but cannot do text completion */
const NON_CHAT_MARKERS = ['whisper', 'tts'] as const;

interface GroqModelList {
  data: Array<{
    id: string;
    owned_by: string;
    active: boolean;
    context_window: number;
    max_completion_tokens: number;
  }>;
}

const validateModelList = compileSchema<GroqModelList>({
  type: 'object',
  required: ['data'],
  properties: {
    data: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'owned_by', 'active', 'context_window', 'max_completion_tokens'],
        properties: {
          id: { type: 'string' },
          owned_by: { type: 'string' },
          active: { type: 'boolean' },
          context_window: { type: 'number' },
          max_completion_tokens: { type: 'number' },
        },
      },
    },
  },
});

export class GroqProvider extends BaseProviderClient {
  readonly kind = 'groq' as const;

  constructor(private readonly baseUrl: string = DEFAULT_RUNTIME_CONFIG.endpoints.groqBaseUrl) {
    super();
  }

  isAvailable(credential?: string, request?: ProviderRequestOptions): Promise<boolean> {
    return this.probeCatalog(credential, request);
  }

  async fetchModels(credential?: string, request?: ProviderRequestOptions): Promise<RemoteAIModel[]> {
    const apiKey = this.requireCredential(credential);

    const bodyText = await this.send({
      url: `${this.baseUrl}/models`,
      headers: this.authHeaders(apiKey),
      timeoutMs: CATALOG_TIMEOUT_MS,
      signal: request?.signal,
    });
    const list = this.decodeCatalog(bodyText, validateModelList);

    const chatModels = list.data.filter((m) => {
      const id = m.id.toLowerCase();
      return m.active && !NON_CHAT_MARKERS.some((marker) => id.includes(marker));
    });

    return sortByDisplayName(
      chatModels.map((m) => ({
        id: m.id,
        displayName: m.id,
        ownedBy: m.owned_by,
        contextWindowTokens: m.context_window,
        maxCompletionTokens: m.max_completion_tokens,
        active: m.active,
      }))
    );
  }

  async enhance(
    text: string,
    modelId: string,
    options: EnhancementOptions,
    credential?: string,
    onProgress?: ProgressCallback,
    request?: ProviderRequestOptions
  ): Promise<string> {
    const apiKey = this.requireCredential(credential);
    const model = this.requireModel(modelId);

    const body = {
      model,
      messages: buildEnhancementMessages(text, options),
      temperature: clampTemperature(options.temperature),
      max_completion_tokens: clampMaxTokens(options.maxTokens, MAX_TOKEN_BOUNDS),
      stream: false,
    };
    this.report(onProgress, Progress.REQUEST_BUILT);

    this.report(onProgress, Progress.REQUEST_SENT);
    const bodyText = await this.send({
      url: `${this.baseUrl}/chat/completions`,
      method: 'POST',
      headers: this.authHeaders(apiKey),
      body,
      timeoutMs: COMPLETION_TIMEOUT_MS,
      signal: request?.signal,
    });

    return this.finishCompletion(bodyText, decodeChatCompletion, onProgress);
  }

  async analyzeImage(
    image: Uint8Array,
    modelId: string,
    prompt: string,
    systemPrompt: string,
    credential?: string,
    onProgress?: ProgressCallback,
    request?: ProviderRequestOptions
  ): Promise<string> {
    const apiKey = this.requireCredential(credential);
    this.requireImage(image);
    const model = this.requireModel(modelId);

    const body = {
      model,
      messages: buildVisionMessages(image, prompt, systemPrompt),
      temperature: VISION_TEMPERATURE,
      stream: false,
    };
    this.report(onProgress, Progress.REQUEST_BUILT);

    this.report(onProgress, Progress.REQUEST_SENT);
    const bodyText = await this.send({
      url: `${this.baseUrl}/chat/completions`,
      method: 'POST',
      headers: this.authHeaders(apiKey),
      body,
      timeoutMs: VISION_TIMEOUT_MS,
      signal: request?.signal,
    });

    return this.finishCompletion(bodyText, decodeChatCompletion, onProgress);
  }

  private authHeaders(apiKey: string): Record<string, string> {
    return { Authorization: `Bearer ${apiKey}` };
  }
}
