import type {
  EnhancementOptions,
  ProgressCallback,
  ProviderClient,
  ProviderDescriptor,
  ProviderKind,
  ProviderRequestOptions,
  RemoteAIModel,
} from '../provider-types.js';
import { PROVIDERS } from '../provider-types.js';
import { ProviderError } from '../provider-error.js';
import type { HttpRequest } from '../http-transport.js';
import { describeError, sendExpectingOk, sendHttpRequest } from '../http-transport.js';
import type { StrictCompletionDecoder } from '../response-normalizer.js';
import { extractCompletionText, normalizeOutput } from '../response-normalizer.js';
import type { ValidateFunction } from '../../validation/schema-validator.js';
import { describeViolations, formatViolations } from '../../validation/schema-validator.js';

/** Timeouts shared by all variants, in milliseconds */
export const PROBE_TIMEOUT_MS = 5_000;
export const CATALOG_TIMEOUT_MS = 10_000;
export const COMPLETION_TIMEOUT_MS = 30_000;
export const VISION_TIMEOUT_MS = 60_000;

export const VISION_TEMPERATURE = 0.2;

export interface TokenBounds {
  min: number;
  max: number;
}

/** Progress checkpoints reported by enhance and analyzeImage */
export const Progress = {
  REQUEST_BUILT: 0.1,
  REQUEST_SENT: 0.2,
  RESPONSE_RECEIVED: 0.8,
  DONE: 1.0,
} as const;

export function clampTemperature(value: number): number {
  if (!Number.isFinite(value)) return 0.1;
  return Math.max(0.1, Math.min(1.0, value));
}

export function clampMaxTokens(value: number, bounds: TokenBounds): number {
  if (!Number.isFinite(value)) return bounds.min;
  return Math.max(bounds.min, Math.min(bounds.max, Math.round(value)));
}

/**
 * Ascending by display name, plain code-unit order (case-sensitive).
 */
export function sortByDisplayName(models: RemoteAIModel[]): RemoteAIModel[] {
  return [...models].sort((a, b) => {
    if (a.displayName < b.displayName) return -1;
    if (a.displayName > b.displayName) return 1;
    return 0;
  });
}

/**
 * Shared plumbing for provider clients. Concrete variants supply the wire
 * format; vision is unsupported unless a subclass overrides analyzeImage.
 */
export abstract class BaseProviderClient implements ProviderClient {
  abstract readonly kind: ProviderKind;

  abstract isAvailable(credential?: string, request?: ProviderRequestOptions): Promise<boolean>;

  abstract fetchModels(credential?: string, request?: ProviderRequestOptions): Promise<RemoteAIModel[]>;

  abstract enhance(
    text: string,
    modelId: string,
    options: EnhancementOptions,
    credential?: string,
    onProgress?: ProgressCallback,
    request?: ProviderRequestOptions
  ): Promise<string>;

  get descriptor(): ProviderDescriptor {
    return PROVIDERS[this.kind];
  }

  testConnection(credential?: string, request?: ProviderRequestOptions): Promise<boolean> {
    return this.isAvailable(credential, request);
  }

  async analyzeImage(
    _image: Uint8Array,
    _modelId: string,
    _prompt: string,
    _systemPrompt: string,
    _credential?: string,
    _onProgress?: ProgressCallback,
    _request?: ProviderRequestOptions
  ): Promise<string> {
    throw ProviderError.capabilityUnsupported(this.kind);
  }

  protected get logPrefix(): string {
    return `[${this.constructor.name}]`;
  }

  protected report(onProgress: ProgressCallback | undefined, fraction: number): void {
    if (onProgress) {
      onProgress(fraction);
    }
  }

  protected requireCredential(credential: string | undefined): string {
    if (!credential || !credential.trim()) {
      throw ProviderError.missingCredential(this.kind);
    }
    return credential.trim();
  }

  protected requireModel(modelId: string): string {
    if (!modelId.trim()) {
      throw ProviderError.emptyModel(this.kind);
    }
    return modelId.trim();
  }

  protected requireImage(image: Uint8Array): Uint8Array {
    if (image.length === 0) {
      throw ProviderError.emptyImage(this.kind);
    }
    return image;
  }

  /**
   * GET a loopback endpoint; true only on HTTP 200. Never throws.
   */
  protected async probe(url: string, request?: ProviderRequestOptions): Promise<boolean> {
    try {
      const result = await sendHttpRequest(this.kind, {
        url,
        timeoutMs: PROBE_TIMEOUT_MS,
        signal: request?.signal,
      });
      return result.status === 200;
    } catch (error) {
      console.warn(`${this.logPrefix} Availability check failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Remote providers have no cheaper probe than listing models.
   */
  protected async probeCatalog(credential: string | undefined, request?: ProviderRequestOptions): Promise<boolean> {
    if (!credential || !credential.trim()) {
      return false;
    }
    try {
      await this.fetchModels(credential, request);
      return true;
    } catch (error) {
      console.warn(`${this.logPrefix} Connection failed: ${describeError(error)}`);
      return false;
    }
  }

  protected send(request: HttpRequest): Promise<string> {
    return sendExpectingOk(this.kind, request);
  }

  /**
   * Parse and validate a catalog body; anything unusable is a DECODE_FAILURE.
   */
  protected decodeCatalog<T>(bodyText: string, validate: ValidateFunction<T>): T {
    let payload: unknown;
    try {
      payload = JSON.parse(bodyText);
    } catch (error) {
      throw ProviderError.decodeFailure(this.kind, describeError(error));
    }

    if (!validate(payload)) {
      throw ProviderError.decodeFailure(this.kind, formatViolations(describeViolations(validate.errors)));
    }
    return payload;
  }

  /**
   * Extract, clean and trim completion text, then report completion.
   * A reply that is nothing but thinking tags counts as empty.
   */
  protected finishCompletion(
    bodyText: string,
    strictDecode: StrictCompletionDecoder,
    onProgress: ProgressCallback | undefined
  ): string {
    this.report(onProgress, Progress.RESPONSE_RECEIVED);
    const text = normalizeOutput(extractCompletionText(this.kind, bodyText, strictDecode));
    if (!text) {
      throw ProviderError.emptyResponse(this.kind);
    }
    this.report(onProgress, Progress.DONE);
    return text;
  }
}
