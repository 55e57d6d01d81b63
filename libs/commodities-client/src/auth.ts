import { z } from 'zod';
import { HttpError } from '@libs/resilient-http-core';
import type { HttpClient, Logger } from '@libs/resilient-http-core';
import { toLimitError } from './errorPolicy';
import type { Credentials } from './types';
import { AuthError, CommoditiesError, ResponseShapeError } from './types';

const TOKEN_PATH = 'auth/api';
const EXPIRY_MARGIN_SECONDS = 300;
const AUTH_REJECTED_STATUSES = new Set([400, 401, 403]);

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.preprocess((value) => (value === null ? undefined : value), z.coerce.number().optional()),
  })
  .passthrough();

export interface TokenProviderOptions {
  http: HttpClient;
  userAgent: string;
  maxAttempts: number;
  credentials?: Partial<Credentials>;
  token?: string;
  logger?: Logger;
}

interface CachedToken {
  key: string;
  token: string;
  expiresAt?: number;
}

/**
 * Holds credentials and the bearer token issued for them.
 *
 * Tokens are cached per username/password/appkey triple. A token pinned with
 * {@link TokenProvider.setToken} is returned as-is and never refreshed.
 */
export class TokenProvider {
  private readonly http: HttpClient;
  private readonly userAgent: string;
  private readonly maxAttempts: number;
  private readonly logger?: Logger;
  private credentials: Partial<Credentials>;
  private pinnedToken?: string;
  private cached?: CachedToken;
  private inflight?: { key: string; promise: Promise<string> };

  constructor(opts: TokenProviderOptions) {
    this.http = opts.http;
    this.userAgent = opts.userAgent;
    this.maxAttempts = opts.maxAttempts;
    this.logger = opts.logger;
    this.credentials = { ...opts.credentials };
    this.pinnedToken = opts.token || undefined;
  }

  setCredentials(credentials: Credentials): void {
    this.credentials = { ...credentials };
    this.pinnedToken = undefined;
    this.invalidate();
  }

  setToken(token: string): void {
    this.pinnedToken = token || undefined;
    this.invalidate();
  }

  hasPinnedToken(): boolean {
    return this.pinnedToken !== undefined;
  }

  invalidate(): void {
    this.cached = undefined;
  }

  async getToken(): Promise<string> {
    if (this.pinnedToken) {
      return this.pinnedToken;
    }

    const { username, password, appkey = '' } = this.credentials;
    if (!username || !password) {
      throw new AuthError(
        'Missing credentials. Call setCredentials(username, password, appkey) or set COMMODITY_API_USERNAME and COMMODITY_API_PASSWORD',
      );
    }

    const key = [username, password, appkey].join('\u0000');
    const cached = this.cached;
    if (cached && cached.key === key && (cached.expiresAt === undefined || Date.now() < cached.expiresAt)) {
      return cached.token;
    }

    if (this.inflight?.key === key) {
      return this.inflight.promise;
    }

    const promise = this.requestToken({ username, password, appkey }, key).finally(() => {
      if (this.inflight?.promise === promise) {
        this.inflight = undefined;
      }
    });
    this.inflight = { key, promise };
    return promise;
  }

  private async requestToken(credentials: Credentials, key: string): Promise<string> {
    this.logger?.debug('[CommoditiesClient] requesting access token', { username: credentials.username });

    let body: unknown;
    try {
      body = await this.http.requestJson<unknown>({
        method: 'POST',
        urlParts: { path: TOKEN_PATH },
        headers: { 'User-Agent': this.userAgent },
        body: new URLSearchParams({ username: credentials.username, password: credentials.password }),
        operation: 'auth.token',
        resilience: { maxAttempts: this.maxAttempts },
      });
    } catch (error) {
      if (error instanceof HttpError && AUTH_REJECTED_STATUSES.has(error.status)) {
        throw new AuthError(
          `Invalid Username, Password or Appkey. Try calling setCredentials(username, password, appkey)\n${describeBody(error.body)}`,
          error.status,
          error.body,
        );
      }
      const mapped = toLimitError(error);
      if (mapped instanceof CommoditiesError) {
        throw mapped;
      }
      // Already retried by the auth client; the data client must not retry it again.
      throw new CommoditiesError(
        `Token request failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof HttpError ? error.status : undefined,
        error instanceof HttpError ? error.body : undefined,
      );
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResponseShapeError('Token response has no access_token', body);
    }

    const { access_token: token, expires_in: expiresIn } = parsed.data;
    this.cached = {
      key,
      token,
      expiresAt:
        expiresIn !== undefined ? Date.now() + Math.max(expiresIn - EXPIRY_MARGIN_SECONDS, 0) * 1000 : undefined,
    };
    return token;
  }
}

function describeBody(body: unknown): string {
  if (body === undefined) return '';
  return typeof body === 'string' ? body : JSON.stringify(body);
}
