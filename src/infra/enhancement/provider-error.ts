import type { ProviderKind } from './provider-types.js';
import { PROVIDERS } from './provider-types.js';

export const ProviderErrorCodes = {
  MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',
  UNREACHABLE: 'UNREACHABLE',
  BAD_STATUS: 'BAD_STATUS',
  DECODE_FAILURE: 'DECODE_FAILURE',
  EMPTY_RESPONSE: 'EMPTY_RESPONSE',
  CAPABILITY_UNSUPPORTED: 'CAPABILITY_UNSUPPORTED',
  EMPTY_MODEL: 'EMPTY_MODEL',
  EMPTY_IMAGE: 'EMPTY_IMAGE',
  CANCELLED: 'CANCELLED',
} as const;

export type ProviderErrorCode = (typeof ProviderErrorCodes)[keyof typeof ProviderErrorCodes];

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    public readonly provider: ProviderKind,
    public readonly status?: number,
    public readonly body?: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }

  /** Everything except a missing capability can succeed on a later user retry */
  get recoverable(): boolean {
    return this.code !== ProviderErrorCodes.CAPABILITY_UNSUPPORTED;
  }

  static missingCredential(provider: ProviderKind): ProviderError {
    return new ProviderError(
      'API key is required',
      ProviderErrorCodes.MISSING_CREDENTIAL,
      provider
    );
  }

  static unreachable(provider: ProviderKind, detail: string): ProviderError {
    return new ProviderError(
      `Service is unreachable: ${detail}`,
      ProviderErrorCodes.UNREACHABLE,
      provider
    );
  }

  static badStatus(provider: ProviderKind, status: number, body: string): ProviderError {
    const detail = body.trim() || 'Unknown';
    return new ProviderError(
      `HTTP ${status}: ${detail}`,
      ProviderErrorCodes.BAD_STATUS,
      provider,
      status,
      body
    );
  }

  static decodeFailure(provider: ProviderKind, detail: string): ProviderError {
    return new ProviderError(
      `Failed to parse response: ${detail}`,
      ProviderErrorCodes.DECODE_FAILURE,
      provider
    );
  }

  static emptyResponse(provider: ProviderKind): ProviderError {
    return new ProviderError(
      'Response contained no text',
      ProviderErrorCodes.EMPTY_RESPONSE,
      provider
    );
  }

  static capabilityUnsupported(provider: ProviderKind): ProviderError {
    return new ProviderError(
      'Image analysis is not supported',
      ProviderErrorCodes.CAPABILITY_UNSUPPORTED,
      provider
    );
  }

  static emptyModel(provider: ProviderKind): ProviderError {
    return new ProviderError('No model selected', ProviderErrorCodes.EMPTY_MODEL, provider);
  }

  static emptyImage(provider: ProviderKind): ProviderError {
    return new ProviderError('Empty image data', ProviderErrorCodes.EMPTY_IMAGE, provider);
  }

  static cancelled(provider: ProviderKind): ProviderError {
    return new ProviderError(
      'Request was cancelled',
      ProviderErrorCodes.CANCELLED,
      provider
    );
  }
}

/**
 * User-facing form: "<Provider display name>: <message>"
 */
export function formatProviderError(provider: ProviderKind, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `${PROVIDERS[provider].displayName}: ${message}`;
}

export function isProviderError(error: unknown, code?: ProviderErrorCode): error is ProviderError {
  return error instanceof ProviderError && (code === undefined || error.code === code);
}
