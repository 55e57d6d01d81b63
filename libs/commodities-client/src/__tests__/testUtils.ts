import { vi } from 'vitest';
import type { RawHttpResponse, TransportRequest } from '@libs/resilient-http-core';

export const BASE_URL = 'https://api.example.com';

export const toArrayBuffer = (text: string): ArrayBuffer => {
  const bytes = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

export const jsonResponse = (
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): RawHttpResponse => ({
  status,
  headers: { 'content-type': 'application/json', ...headers },
  body: toArrayBuffer(JSON.stringify(body)),
});

export const tokenResponse = (token: string, expiresIn?: number): RawHttpResponse =>
  jsonResponse(expiresIn === undefined ? { access_token: token } : { access_token: token, expires_in: expiresIn });

export const resultsPage = (results: unknown[], totalPages: number): RawHttpResponse =>
  jsonResponse({ metadata: { totalPages }, results });

const isTokenRequest = (req: TransportRequest): boolean => req.url.endsWith('/auth/api');

/**
 * In-process transport: token requests and data requests are answered from
 * separate queues; the last entry of a queue keeps answering once the rest
 * are used up.
 */
export function createMockTransport(opts: { tokens?: RawHttpResponse[]; data?: RawHttpResponse[] } = {}) {
  const tokens = [...(opts.tokens ?? [tokenResponse('test-token-1')])];
  const data = [...(opts.data ?? [])];

  const transport = vi.fn(async (req: TransportRequest): Promise<RawHttpResponse> => {
    const queue = isTokenRequest(req) ? tokens : data;
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (!next) {
      throw new Error(`Unexpected request: ${req.method} ${req.url}`);
    }
    return next;
  });

  const requests = (): TransportRequest[] => transport.mock.calls.map(([req]) => req);

  return {
    transport,
    tokenRequests: () => requests().filter(isTokenRequest),
    dataRequests: () => requests().filter((req) => !isTokenRequest(req)),
  };
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
