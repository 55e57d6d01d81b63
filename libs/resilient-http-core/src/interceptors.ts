// ============================================================================
// Standard Interceptors
// ============================================================================

import { setTimeout as sleep } from 'timers/promises';
import type { HttpRequestInterceptor, BeforeSendContext } from './types';

// ============================================================================
// Auth Interceptor
// ============================================================================

export interface AuthInterceptorOptions {
  getToken: () => Promise<string | null> | string | null;
  headerName?: string; // default: "Authorization"
  formatToken?: (token: string) => string; // default: (t) => `Bearer ${t}`
}

/**
 * Creates an interceptor that adds an authorization header to each attempt.
 *
 * `getToken` runs before every attempt, so a token refreshed between retries
 * is picked up without rebuilding the client.
 *
 * @example
 * ```typescript
 * const authInterceptor = createAuthInterceptor({
 *   getToken: () => tokenProvider.getToken(),
 * });
 *
 * const client = new HttpClient({
 *   interceptors: [authInterceptor],
 * });
 * ```
 */
export function createAuthInterceptor(
  opts: AuthInterceptorOptions
): HttpRequestInterceptor {
  const headerName = opts.headerName ?? 'Authorization';
  const formatToken = opts.formatToken ?? ((t: string) => `Bearer ${t}`);

  return {
    beforeSend: async (ctx: BeforeSendContext) => {
      const token = await opts.getToken();
      if (token) {
        ctx.request.headers = { ...ctx.request.headers, [headerName]: formatToken(token) };
      }
    },
  };
}

// ============================================================================
// User-Agent Interceptor
// ============================================================================

/**
 * Creates an interceptor that stamps a `User-Agent` header unless the request
 * already carries one.
 */
export function createUserAgentInterceptor(userAgent: string): HttpRequestInterceptor {
  return {
    beforeSend: (ctx: BeforeSendContext) => {
      const headers = ctx.request.headers ?? {};
      const hasUserAgent = Object.keys(headers).some((key) => key.toLowerCase() === 'user-agent');
      if (!hasUserAgent) {
        ctx.request.headers = { ...headers, 'User-Agent': userAgent };
      }
    },
  };
}

// ============================================================================
// Delay Interceptor
// ============================================================================

/**
 * Waits `delayMs` before every attempt, retries included. Register it first so
 * the wait also precedes token lookups made by later interceptors.
 */
export function createDelayInterceptor(delayMs: number): HttpRequestInterceptor {
  return {
    beforeSend: async () => {
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    },
  };
}
