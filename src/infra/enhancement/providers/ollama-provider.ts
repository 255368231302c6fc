import type {
  EnhancementOptions,
  ProgressCallback,
  ProviderRequestOptions,
  RemoteAIModel,
} from '../provider-types.js';
import type { StrictCompletionDecoder } from '../response-normalizer.js';
import { encodeImageBase64 } from '../image-encoding.js';
import { compileSchema } from '../../validation/schema-validator.js';
import { DEFAULT_RUNTIME_CONFIG } from '../../config/runtime-config.js';
import {
  BaseProviderClient,
  PROBE_TIMEOUT_MS,
  Progress,
  VISION_TEMPERATURE,
  VISION_TIMEOUT_MS,
  clampMaxTokens,
  clampTemperature,
  sortByDisplayName,
} from './base-provider.js';

const GENERATE_TIMEOUT_MS = 60_000;
const MAX_TOKEN_BOUNDS = { min: 100, max: 2000 };
const OLLAMA_SYSTEM_PROMPT = 'You are an AI that improves transcribed text while preserving meaning.';

interface TagListResponse {
  models: Array<{ name: string }>;
}

interface GenerateResponse {
  response: string;
}

const validateTagList = compileSchema<TagListResponse>({
  type: 'object',
  required: ['models'],
  properties: {
    models: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name'],
        properties: { name: { type: 'string' } },
      },
    },
  },
});

const validateGenerate = compileSchema<GenerateResponse>({
  type: 'object',
  required: ['response'],
  properties: { response: { type: 'string' } },
});

const decodeGenerate: StrictCompletionDecoder = (payload) =>
  validateGenerate(payload) ? payload.response : undefined;

/**
 * Ollama daemon on loopback, using /api/generate for completions.
 */
export class OllamaProvider extends BaseProviderClient {
  readonly kind = 'ollama' as const;

  constructor(private readonly baseUrl: string = DEFAULT_RUNTIME_CONFIG.endpoints.ollamaBaseUrl) {
    super();
  }

  isAvailable(_credential?: string, request?: ProviderRequestOptions): Promise<boolean> {
    return this.probe(`${this.baseUrl}/api/version`, request);
  }

  async fetchModels(_credential?: string, request?: ProviderRequestOptions): Promise<RemoteAIModel[]> {
    const bodyText = await this.send({
      url: `${this.baseUrl}/api/tags`,
      timeoutMs: PROBE_TIMEOUT_MS,
      signal: request?.signal,
    });
    const tags = this.decodeCatalog(bodyText, validateTagList);

    return sortByDisplayName(
      tags.models.map((m) => ({
        id: m.name,
        displayName: m.name,
        ownedBy: 'Local',
        contextWindowTokens: 8192,
        maxCompletionTokens: 4096,
        active: true,
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

    const sections = [options.systemPrompt];
    if (options.context) {
      sections.push(`CONTEXT:\n${options.context}`);
    }
    sections.push(`TEXT TO IMPROVE:\n${text}`, 'IMPROVED TEXT:');

    const body = {
      model,
      prompt: sections.join('\n\n'),
      temperature: clampTemperature(options.temperature),
      max_tokens: clampMaxTokens(options.maxTokens, MAX_TOKEN_BOUNDS),
      stream: false,
      system: OLLAMA_SYSTEM_PROMPT,
    };
    this.report(onProgress, Progress.REQUEST_BUILT);

    this.report(onProgress, Progress.REQUEST_SENT);
    const bodyText = await this.send({
      url: `${this.baseUrl}/api/generate`,
      method: 'POST',
      body,
      timeoutMs: GENERATE_TIMEOUT_MS,
      signal: request?.signal,
    });

    return this.finishCompletion(bodyText, decodeGenerate, onProgress);
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
      prompt,
      ...(systemPrompt ? { system: systemPrompt } : {}),
      images: [encodeImageBase64(image)],
      temperature: VISION_TEMPERATURE,
      stream: false,
    };
    this.report(onProgress, Progress.REQUEST_BUILT);

    this.report(onProgress, Progress.REQUEST_SENT);
    const bodyText = await this.send({
      url: `${this.baseUrl}/api/generate`,
      method: 'POST',
      body,
      timeoutMs: VISION_TIMEOUT_MS,
      signal: request?.signal,
    });

    return this.finishCompletion(bodyText, decodeGenerate, onProgress);
  }
}
