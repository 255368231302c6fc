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

const MAX_TOKEN_BOUNDS = { min: 100, max: 8192 };

interface LmStudioModelList {
  data: Array<{
    id: string;
    publisher?: string;
    max_context_length?: number;
    state?: string;
  }>;
}

const validateModelList = compileSchema<LmStudioModelList>({
  type: 'object',
  required: ['data'],
  properties: {
    data: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id'],
        properties: {
          id: { type: 'string' },
          publisher: { type: 'string' },
          max_context_length: { type: 'number' },
          state: { type: 'string' },
        },
      },
    },
  },
});

/**
 * LM Studio local server, REST API v0 (OpenAI-compatible chat completions).
 */
export class LmStudioProvider extends BaseProviderClient {
  readonly kind = 'lmstudio' as const;

  constructor(private readonly baseUrl: string = DEFAULT_RUNTIME_CONFIG.endpoints.lmStudioBaseUrl) {
    super();
  }

  isAvailable(_credential?: string, request?: ProviderRequestOptions): Promise<boolean> {
    return this.probe(`${this.baseUrl}/api/v0/models`, request);
  }

  async fetchModels(_credential?: string, request?: ProviderRequestOptions): Promise<RemoteAIModel[]> {
    const bodyText = await this.send({
      url: `${this.baseUrl}/api/v0/models`,
      timeoutMs: CATALOG_TIMEOUT_MS,
      signal: request?.signal,
    });
    const list = this.decodeCatalog(bodyText, validateModelList);

    return sortByDisplayName(
      list.data.map((m) => ({
        id: m.id,
        displayName: m.id,
        ownedBy: m.publisher ?? 'Local',
        contextWindowTokens: m.max_context_length ?? 8192,
        maxCompletionTokens: 4096,
        active: m.state !== 'not-loaded',
      }))
    );
  }

  async enhance(
    text: string,
    modelId: string,
    options: EnhancementOptions,
    _credential?: string,
    onProgress?: ProgressCallback,
    request?: ProviderRequestOptions
  ): Promise<string> {
    const model = this.requireModel(modelId);

    const body = {
      model,
      messages: buildEnhancementMessages(text, options),
      temperature: clampTemperature(options.temperature),
      max_tokens: clampMaxTokens(options.maxTokens, MAX_TOKEN_BOUNDS),
      stream: false,
    };
    this.report(onProgress, Progress.REQUEST_BUILT);

    this.report(onProgress, Progress.REQUEST_SENT);
    const bodyText = await this.send({
      url: `${this.baseUrl}/api/v0/chat/completions`,
      method: 'POST',
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
    _credential?: string,
    onProgress?: ProgressCallback,
    request?: ProviderRequestOptions
  ): Promise<string> {
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
      url: `${this.baseUrl}/api/v0/chat/completions`,
      method: 'POST',
      body,
      timeoutMs: VISION_TIMEOUT_MS,
      signal: request?.signal,
    });

    return this.finishCompletion(bodyText, decodeChatCompletion, onProgress);
  }
}
