import { describe, expect, it, vi } from 'vitest';
import type { RawHttpResponse, TransportRequest } from '@libs/resilient-http-core';
import { CommoditiesClient } from '../commoditiesClient';
import { BASE_URL, createMockLogger, jsonResponse, tokenResponse } from './testUtils';

const events = vi.hoisted((): string[] => []);

vi.mock('timers/promises', () => ({
  setTimeout: vi.fn(async (ms: number) => {
    events.push(`sleep ${ms}`);
  }),
}));

describe('requestDelayMs', () => {
  it('waits before every data request, throttle retries included', async () => {
    const data: RawHttpResponse[] = [
      jsonResponse({ message: 'slow down' }, 429, { 'x-ratelimit-remaining-day': '500' }),
      jsonResponse({ results: [] }),
    ];
    const transport = vi.fn(async (req: TransportRequest): Promise<RawHttpResponse> => {
      events.push(`${req.method} ${req.url}`);
      if (req.url.endsWith('/auth/api')) {
        return tokenResponse('test-token');
      }
      const next = data.shift();
      if (!next) {
        throw new Error(`Unexpected request: ${req.url}`);
      }
      return next;
    });
    const client = new CommoditiesClient({
      baseUrl: BASE_URL,
      username: 'test-user',
      password: 'test-secret',
      requestDelayMs: 250,
      throttleDelayMs: 1000,
      logger: createMockLogger(),
      transport,
    });

    await client.get('data/v1/items');

    expect(events).toEqual([
      'sleep 250',
      'POST https://api.example.com/auth/api',
      'GET https://api.example.com/data/v1/items',
      'sleep 1000',
      'sleep 250',
      'GET https://api.example.com/data/v1/items',
    ]);
  });
});
