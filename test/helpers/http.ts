/**
 * fetch stand-ins for provider tests. Replies expose only what the
 * transport reads: status and text().
 */
export interface MockReply {
  status: number;
  text: () => Promise<string>;
}

export function reply(body: unknown, status = 200): MockReply {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return { status, text: async () => text };
}

export function installFetchMock(): jest.Mock {
  const mockFetch = jest.fn();
  global.fetch = mockFetch;
  return mockFetch;
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

export function recordedRequest(mockFetch: jest.Mock, index = 0): RecordedRequest {
  const [url, init] = mockFetch.mock.calls[index];
  return {
    url,
    method: init.method,
    headers: init.headers,
    body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}
