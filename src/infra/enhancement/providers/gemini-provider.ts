import type {
  EnhancementOptions,
  ProgressCallback,
  ProviderRequestOptions,
  RemoteAIModel,
} from '../provider-types.js';
import type { StrictCompletionDecoder } from '../response-normalizer.js';
import { detectImageMimeType, encodeImageBase64 } from '../image-encoding.js';
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

const MAX_TOKEN_BOUNDS = { min: 100, max: 8192 };
const DEFAULT_CONTEXT_WINDOW = 131072;
const DEFAULT_MAX_OUTPUT = 8192;

interface GeminiModelList {
  models: Array<{
    name: string;
    displayName?: string;
    inputTokenLimit?: number;
    outputTokenLimit?: number;
  }>;
}

interface GenerateContentResponse {
  candidates: Array<{
    content: {
      parts: Array<{ text?: string }>;
    };
  }>;
}

type GeminiPart =
  | { text: string }
  | { inline_data: { mime_type: string; data: string } };

const validateModelList = compileSchema<GeminiModelList>({
  type: 'object',
  required: ['models'],
  properties: {
    models: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string' },
          displayName: { type: 'string' },
          inputTokenLimit: { type: 'number' },
          outputTokenLimit: { type: 'number' },
        },
      },
    },
  },
});

const validateGenerateContent = compileSchema<GenerateContentResponse>({
  type: 'object',
  required: ['candidates'],
  properties: {
    candidates: {
      type: 'array',
      items: {
        type: 'object',
        required: ['content'],
        properties: {
          content: {
            type: 'object',
            required: ['parts'],
            properties: {
              parts: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: { text: { type: 'string' } },
                },
              },
            },
          },
        },
      },
    },
  },
});

/** Joins the text parts of the first candidate; function calls and other parts are skipped */
const decodeGenerateContent: StrictCompletionDecoder = (payload) => {
  if (!validateGenerateContent(payload) || payload.candidates.length === 0) {
    return undefined;
  }
  const texts = payload.candidates[0].content.parts.flatMap((part) => (part.text === undefined ? [] : [part.text]));
  return texts.length > 0 ? texts.join('') : undefined;
};

export function toGeminiModelPath(modelId: string): string {
  return modelId.startsWith('models/') ? modelId.slice('models/'.length) : modelId;
}

/**
 * Google Generative Language API (v1beta). The API key travels as a query parameter.
 */
export class GeminiProvider extends BaseProviderClient {
  readonly kind = 'gemini' as const;

  constructor(private readonly baseUrl: string = DEFAULT_RUNTIME_CONFIG.endpoints.geminiBaseUrl) {
    super();
  }

  isAvailable(credential?: string, request?: ProviderRequestOptions): Promise<boolean> {
    return this.probeCatalog(credential, request);
  }

  async fetchModels(credential?: string, request?: ProviderRequestOptions): Promise<RemoteAIModel[]> {
    const apiKey = this.requireCredential(credential);

    const bodyText = await this.send({
      url: `${this.baseUrl}/models?key=${encodeURIComponent(apiKey)}`,
      timeoutMs: CATALOG_TIMEOUT_MS,
      signal: request?.signal,
    });
    const list = this.decodeCatalog(bodyText, validateModelList);

    return sortByDisplayName(
      list.models.map((m) => ({
        id: m.name,
        displayName: m.displayName ?? m.name,
        ownedBy: 'Google',
        contextWindowTokens: m.inputTokenLimit ?? DEFAULT_CONTEXT_WINDOW,
        maxCompletionTokens: m.outputTokenLimit ?? DEFAULT_MAX_OUTPUT,
        active: true,
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

    const userText = options.context
      ? `CONTEXT:\n${options.context}\n\nTEXT TO IMPROVE:\n${text}`
      : `TEXT TO IMPROVE:\n${text}`;

    const body = {
      system_instruction: { parts: [{ text: options.systemPrompt }] },
      contents: [{ parts: [{ text: userText }] }],
      generationConfig: {
        temperature: clampTemperature(options.temperature),
        maxOutputTokens: clampMaxTokens(options.maxTokens, MAX_TOKEN_BOUNDS),
      },
    };
    this.report(onProgress, Progress.REQUEST_BUILT);

    this.report(onProgress, Progress.REQUEST_SENT);
    const bodyText = await this.send({
      url: this.generateUrl(model, apiKey),
      method: 'POST',
      body,
      timeoutMs: COMPLETION_TIMEOUT_MS,
      signal: request?.signal,
    });

    return this.finishCompletion(bodyText, decodeGenerateContent, onProgress);
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

    const parts: GeminiPart[] = [
      { inline_data: { mime_type: detectImageMimeType(image), data: encodeImageBase64(image) } },
      { text: prompt },
    ];
    const body = {
      ...(systemPrompt ? { system_instruction: { parts: [{ text: systemPrompt }] } } : {}),
      contents: [{ parts }],
      generationConfig: { temperature: VISION_TEMPERATURE },
    };
    this.report(onProgress, Progress.REQUEST_BUILT);

    this.report(onProgress, Progress.REQUEST_SENT);
    const bodyText = await this.send({
      url: this.generateUrl(model, apiKey),
      method: 'POST',
      body,
      timeoutMs: VISION_TIMEOUT_MS,
      signal: request?.signal,
    });

    return this.finishCompletion(bodyText, decodeGenerateContent, onProgress);
  }

  private generateUrl(model: string, apiKey: string): string {
    return `${this.baseUrl}/models/${toGeminiModelPath(model)}:generateContent?key=${encodeURIComponent(apiKey)}`;
  }
}
