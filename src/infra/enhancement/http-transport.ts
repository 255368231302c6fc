import type { ProviderKind } from './provider-types.js';
import { ProviderError } from './provider-error.js';

export interface HttpRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Serialized as JSON when present */
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResult {
  status: number;
  bodyText: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Perform one HTTP exchange with a hard timeout.
 * Network failures and timeouts become UNREACHABLE; an abort of the caller's
 * signal becomes CANCELLED. HTTP status is not interpreted here.
 */
export async function sendHttpRequest(provider: ProviderKind, request: HttpRequest): Promise<HttpResult> {
  const { signal, timeoutMs } = request;
  if (signal?.aborted) {
    throw ProviderError.cancelled(provider);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = (): void => controller.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  const headers: Record<string, string> = { ...request.headers };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  try {
    const response = await fetch(request.url, {
      method: request.method || 'GET',
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: controller.signal,
    });
    const bodyText = await response.text();
    return { status: response.status, bodyText };
  } catch (error) {
    if (signal?.aborted) {
      throw ProviderError.cancelled(provider);
    }
    if (timedOut) {
      throw ProviderError.unreachable(provider, `request timed out after ${timeoutMs / 1000}s`);
    }
    throw ProviderError.unreachable(provider, describeError(error));
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Like sendHttpRequest, but anything other than HTTP 200 is a BAD_STATUS
 * error carrying the raw body. Returns the body text.
 */
export async function sendExpectingOk(provider: ProviderKind, request: HttpRequest): Promise<string> {
  const result = await sendHttpRequest(provider, request);
  if (result.status !== 200) {
    throw ProviderError.badStatus(provider, result.status, result.bodyText);
  }
  return result.bodyText;
}
