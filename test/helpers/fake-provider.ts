import type {
  EnhancementOptions,
  ProgressCallback,
  ProviderClient,
  ProviderKind,
  ProviderRequestOptions,
  RemoteAIModel,
} from '../../src/infra/enhancement/provider-types.js';

export function model(id: string, displayName = id): RemoteAIModel {
  return { id, displayName, ownedBy: 'Local', contextWindowTokens: 8192, maxCompletionTokens: 4096, active: true };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * In-process provider: every method is a jest.fn with a happy-path default.
 */
export class FakeProviderClient implements ProviderClient {
  constructor(readonly kind: ProviderKind) {}

  isAvailable = jest.fn(async (_credential?: string, _request?: ProviderRequestOptions): Promise<boolean> => true);

  testConnection = jest.fn(async (_credential?: string, _request?: ProviderRequestOptions): Promise<boolean> => true);

  fetchModels = jest.fn(
    async (_credential?: string, _request?: ProviderRequestOptions): Promise<RemoteAIModel[]> => []
  );

  enhance = jest.fn(
    async (
      text: string,
      _modelId: string,
      _options: EnhancementOptions,
      _credential?: string,
      onProgress?: ProgressCallback,
      _request?: ProviderRequestOptions
    ): Promise<string> => {
      onProgress?.(0.1);
      onProgress?.(1.0);
      return `Enhanced: ${text}`;
    }
  );

  analyzeImage = jest.fn(
    async (
      _image: Uint8Array,
      _modelId: string,
      _prompt: string,
      _systemPrompt: string,
      _credential?: string,
      onProgress?: ProgressCallback,
      _request?: ProviderRequestOptions
    ): Promise<string> => {
      onProgress?.(1.0);
      return 'I am editing a config file.';
    }
  );
}

export type FakeClientMap = Record<ProviderKind, FakeProviderClient>;

export function createFakeClients(): FakeClientMap {
  return {
    ollama: new FakeProviderClient('ollama'),
    lmstudio: new FakeProviderClient('lmstudio'),
    groq: new FakeProviderClient('groq'),
    gemini: new FakeProviderClient('gemini'),
  };
}
