import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpClient, HttpError, ResponseParseError, TimeoutError, encodeQuery } from '../HttpClient';
import type {
  ErrorClassifier,
  HttpClientConfig,
  HttpHeaders,
  HttpTransport,
  Logger,
  MetricsSink,
  RawHttpResponse,
  TransportRequest,
} from '../types';

const toArrayBuffer = (text: string): ArrayBuffer => {
  const bytes = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

const rawResponse = (body: unknown, status = 200, headers: HttpHeaders = {}): RawHttpResponse => ({
  status,
  headers: { 'content-type': 'application/json', ...headers },
  body: toArrayBuffer(typeof body === 'string' ? body : JSON.stringify(body)),
});

describe('HttpClient', () => {
  let logger: Logger;
  let metrics: MetricsSink;

  const baseConfig = {
    baseUrl: 'https://example.com/api',
    clientName: 'test-client',
  } as const;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    metrics = {
      recordRequest: vi.fn().mockResolvedValue(undefined),
    };
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  const createClient = (overrides: Partial<HttpClientConfig> = {}) =>
    new HttpClient({
      ...baseConfig,
      logger,
      metrics,
      defaultResilience: { baseBackoffMs: 1, maxBackoffMs: 5 },
      ...overrides,
    });

  const requestAt = (transport: ReturnType<typeof vi.fn>, index: number): TransportRequest =>
    transport.mock.calls[index][0];

  it('performs a basic GET request and parses JSON', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ ok: true }));
    const client = createClient({ transport });

    const result = await client.requestJson<{ ok: boolean }>({
      method: 'GET',
      urlParts: { path: '/resource' },
      operation: 'resource.get',
    });

    expect(result).toEqual({ ok: true });
    expect(requestAt(transport, 0).url).toBe('https://example.com/api/resource');
    expect(requestAt(transport, 0).headers.Accept).toBe('application/json');
  });

  it('encodes query parameters with %20 and drops undefined values', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ ok: true }));
    const client = createClient({ transport });

    await client.requestJson({
      method: 'GET',
      urlParts: { path: 'items', query: { pageSize: 10 } },
      query: { filter: 'symbol: "A B"', page: 2, missing: undefined },
    });

    expect(requestAt(transport, 0).url).toBe(
      'https://example.com/api/items?pageSize=10&filter=symbol%3A%20%22A%20B%22&page=2',
    );
  });

  it('appends query parameters to a URL that already has a query string', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ ok: true }));
    const client = createClient({ transport, baseUrl: undefined });

    await client.requestJson({
      method: 'GET',
      url: 'https://api.example.com/odata/items?$count=true',
      query: { $skip: 20 },
    });

    expect(requestAt(transport, 0).url).toBe('https://api.example.com/odata/items?$count=true&%24skip=20');
  });

  it('allows absolute paths without a configured baseUrl', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ ok: true }));
    const client = createClient({ transport, baseUrl: undefined });

    await client.requestJson({
      method: 'GET',
      urlParts: { path: 'https://api.example.com/absolute' },
    });

    expect(requestAt(transport, 0).url).toBe('https://api.example.com/absolute');
  });

  it('throws when no baseUrl is configured for relative paths', async () => {
    const transport = vi.fn();
    const client = createClient({ transport, baseUrl: undefined });

    await expect(
      client.requestJson({ method: 'GET', urlParts: { path: '/relative' }, resilience: { maxAttempts: 1 } }),
    ).rejects.toThrow('No baseUrl provided');
    expect(transport).not.toHaveBeenCalled();
  });

  it('serializes URLSearchParams bodies as form data', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ access_token: 'abc' }));
    const client = createClient({ transport });

    await client.requestJson({
      method: 'POST',
      urlParts: { path: 'auth/api' },
      body: new URLSearchParams({ username: 'user', password: 'test-secret' }),
    });

    const sent = requestAt(transport, 0);
    expect(sent.method).toBe('POST');
    expect(sent.body).toBe('username=user&password=test-secret');
    expect(sent.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
  });

  it('serializes object bodies as JSON', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ ok: true }));
    const client = createClient({ transport });

    await client.requestJson({ method: 'POST', urlParts: { path: 'items' }, body: { a: 1 } });

    expect(requestAt(transport, 0).body).toBe('{"a":1}');
    expect(requestAt(transport, 0).headers['Content-Type']).toBe('application/json');
  });

  it('merges default headers with per-request headers', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ ok: true }));
    const client = createClient({ transport, defaultHeaders: { 'X-Default': 'one', 'X-Override': 'default' } });

    await client.requestJson({ method: 'GET', urlParts: { path: 'h' }, headers: { 'X-Override': 'request' } });

    expect(requestAt(transport, 0).headers).toEqual({
      Accept: 'application/json',
      'X-Default': 'one',
      'X-Override': 'request',
    });
  });

  it('retries transient HTTP errors and reports the attempt count', async () => {
    const transport = vi
      .fn()
      .mockResolvedValueOnce(rawResponse({ error: true }, 500))
      .mockResolvedValueOnce(rawResponse({ ok: true }));
    const client = createClient({ transport });

    const response = await client.requestJsonResponse<{ ok: boolean }>({
      method: 'GET',
      urlParts: { path: '/retry' },
      operation: 'retry.test',
    });

    expect(response.body).toEqual({ ok: true });
    expect(response.outcome).toMatchObject({ ok: true, status: 200, attempts: 2, category: 'none' });
    expect(transport).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      'http.request.failed',
      expect.objectContaining({ status: 500, errorCategory: 'transient', attempt: 1 }),
    );
  });

  it('throws HttpError with the parsed body after exhausting attempts', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ message: 'down' }, 503));
    const client = createClient({ transport });

    const error = await client
      .requestJson({ method: 'GET', urlParts: { path: '/down' }, resilience: { maxAttempts: 2 } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 503, category: 'transient', body: { message: 'down' } });
    expect(transport).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('does not retry auth failures', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse('Unauthorized', 401));
    const client = createClient({ transport });

    await expect(client.requestJson({ method: 'GET', urlParts: { path: '/secure' } })).rejects.toMatchObject({
      status: 401,
      category: 'auth',
      body: 'Unauthorized',
    });
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('does not retry when retries are disabled', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({}, 500));
    const client = createClient({ transport });

    await expect(
      client.requestJson({ method: 'GET', urlParts: { path: '/once' }, resilience: { retryEnabled: false } }),
    ).rejects.toBeInstanceOf(HttpError);
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('lets a custom classifier override retryability and delay', async () => {
    const transport = vi
      .fn()
      .mockResolvedValueOnce(rawResponse({}, 429, { 'x-quota-left': '0' }))
      .mockResolvedValueOnce(rawResponse({}, 429, { 'x-quota-left': '5' }))
      .mockResolvedValueOnce(rawResponse({ ok: true }));
    const errorClassifier: ErrorClassifier = {
      classify: (ctx) => {
        if (ctx.response?.status !== 429) return undefined;
        if (ctx.response.headers['x-quota-left'] === '0' && ctx.attempt > 1) {
          return { category: 'quota', fallback: { retryable: false } };
        }
        return { category: 'rate_limit', fallback: { retryable: true, retryAfterMs: 1 } };
      },
    };
    const client = createClient({ transport, errorClassifier });

    const result = await client.requestJson({ method: 'GET', urlParts: { path: '/limited' } });

    expect(result).toEqual({ ok: true });
    expect(transport).toHaveBeenCalledTimes(3);
  });

  it('updates the HttpError category from the classifier verdict', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({}, 429));
    const errorClassifier: ErrorClassifier = {
      classify: () => ({ category: 'quota', fallback: { retryable: false } }),
    };
    const client = createClient({ transport, errorClassifier });

    await expect(client.requestJson({ method: 'GET', urlParts: { path: '/quota' } })).rejects.toMatchObject({
      status: 429,
      category: 'quota',
    });
  });

  it('raises TimeoutError when an attempt exceeds its timeout', async () => {
    const transport: HttpTransport = (_req, signal) =>
      new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const client = createClient({ transport });

    await expect(
      client.requestJson({
        method: 'GET',
        urlParts: { path: '/slow' },
        resilience: { perAttemptTimeoutMs: 5, maxAttempts: 1 },
      }),
    ).rejects.toThrow(new TimeoutError('Request timed out after 5ms'));
  });

  it('does not retry a 200 response whose body is not JSON', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse('<html></html>'));
    const client = createClient({ transport });

    await expect(client.requestJson({ method: 'GET', urlParts: { path: '/html' } })).rejects.toBeInstanceOf(
      ResponseParseError,
    );
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('returns text bodies untouched', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse('plain text'));
    const client = createClient({ transport });

    await expect(client.requestText({ method: 'GET', urlParts: { path: '/text' } })).resolves.toBe('plain text');
  });

  it('records metrics for successful and failed requests', async () => {
    const transport = vi
      .fn()
      .mockResolvedValueOnce(rawResponse({ ok: true }))
      .mockResolvedValueOnce(rawResponse({}, 404));
    const client = createClient({ transport });

    await client.requestJson({ method: 'GET', urlParts: { path: '/a' }, operation: 'a.get' });
    await client.requestJson({ method: 'GET', urlParts: { path: '/b' }, operation: 'b.get' }).catch(() => undefined);

    expect(metrics.recordRequest).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({
        clientName: 'test-client',
        operation: 'a.get',
        url: 'https://example.com/api/a',
        outcome: expect.objectContaining({ ok: true, status: 200, attempts: 1 }),
      }),
    );
    expect(metrics.recordRequest).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({
        operation: 'b.get',
        outcome: expect.objectContaining({ ok: false, status: 404, category: 'not_found' }),
      }),
    );
  });

  it('stops retrying once the overall budget is spent', async () => {
    let clock = 0;
    vi.spyOn(Date, 'now').mockImplementation(() => clock);
    const transport = vi.fn(async (): Promise<RawHttpResponse> => {
      clock += 60;
      return rawResponse({ message: 'unavailable' }, 503);
    });
    const client = createClient({ transport });

    await expect(
      client.requestJson({
        method: 'GET',
        urlParts: { path: '/busy' },
        resilience: { overallTimeoutMs: 100, maxAttempts: 5 },
      }),
    ).rejects.toThrow(new TimeoutError('Budget exceeded before retry'));
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it('caps the attempt timeout at the remaining overall budget', async () => {
    vi.spyOn(Date, 'now').mockReturnValue(0);
    const transport: HttpTransport = (_req, signal) =>
      new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const client = createClient({ transport });

    await expect(
      client.requestJson({
        method: 'GET',
        urlParts: { path: '/slow' },
        resilience: { overallTimeoutMs: 10, perAttemptTimeoutMs: 30_000, maxAttempts: 1 },
      }),
    ).rejects.toThrow(new TimeoutError('Request timed out after 10ms'));
  });

  it('logs and continues when the metrics sink fails', async () => {
    const transport = vi.fn().mockResolvedValue(rawResponse({ ok: true }));
    const failingMetrics: MetricsSink = { recordRequest: vi.fn().mockRejectedValue(new Error('sink down')) };
    const client = createClient({ transport, metrics: failingMetrics });

    await expect(client.requestJson({ method: 'GET', urlParts: { path: '/m' } })).resolves.toEqual({ ok: true });
    expect(logger.warn).toHaveBeenCalledWith('http.metrics.failed', { client: 'test-client', error: 'sink down' });
  });
});

describe('encodeQuery', () => {
  it('joins encoded pairs in insertion order', () => {
    expect(encodeQuery({ b: 'x y', a: 1, c: true, d: undefined })).toBe('b=x%20y&a=1&c=true');
  });
});
