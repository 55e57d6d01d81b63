import { setTimeout as sleep } from 'timers/promises';
import { fetchTransport } from './transport/fetchTransport';
import type {
  AfterResponseContext,
  BeforeSendContext,
  ClassifiedError,
  ErrorCategory,
  ErrorClassifier,
  ErrorClassifierContext,
  FallbackHint,
  HttpClientConfig,
  HttpHeaders,
  HttpRequestInterceptor,
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
  Logger,
  LoggerMeta,
  OnErrorContext,
  QueryParams,
  RawHttpResponse,
  RequestBody,
  RequestOutcome,
  ResilienceProfile,
} from './types';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const MAX_RETRY_DELAY_MS = 60_000;
const BASE_BACKOFF_MS = 250;
const JITTER_RANGE: [number, number] = [0.8, 1.2];
const RETRYABLE_ERROR_CATEGORIES = new Set<ErrorCategory>([
  'rate_limit',
  'network',
  'timeout',
  'transient',
]);

export const statusToCategory = (status: number): ErrorCategory => {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 400 || status === 422) return 'validation';
  if (status === 402) return 'quota';
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'transient';
  if (status === 0) return 'network';
  return 'unknown';
};

export const parseRetryAfter = (value?: string | null): number | undefined => {
  if (!value) return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return seconds * 1000;
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const diff = date - Date.now();
    return diff > 0 ? diff : undefined;
  }
  return undefined;
};

/**
 * Case-insensitive header lookup on a plain header record.
 */
export function getHeader(headers: HttpHeaders | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Encodes query parameters with `%20` for spaces. Some OData gateways reject `+`.
 */
export function encodeQuery(query: QueryParams): string {
  return Object.entries(query)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join('&');
}

export function decodeText(raw: RawHttpResponse): string {
  return new TextDecoder().decode(raw.body);
}

function parseBodyFromText(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

class DefaultErrorClassifier implements ErrorClassifier {
  classify(ctx: ErrorClassifierContext): ClassifiedError {
    const { error } = ctx;
    if (error instanceof TimeoutError) {
      return {
        category: 'timeout',
        statusCode: 408,
        reason: 'timeout',
        fallback: { retryable: true },
      };
    }

    if (error instanceof ResponseParseError) {
      return {
        category: 'unknown',
        statusCode: error.status,
        reason: 'unparseable_body',
        fallback: { retryable: false },
      };
    }

    if (error instanceof Error && error.name === 'AbortError') {
      return {
        category: 'canceled',
        reason: 'aborted',
        fallback: { retryable: false },
      };
    }

    const status = ctx.response?.status ?? (error instanceof HttpError ? error.status : undefined);
    if (status !== undefined) {
      const category = statusToCategory(status);
      return {
        category,
        statusCode: status,
        reason: 'http_response',
        fallback: {
          retryable: RETRYABLE_ERROR_CATEGORIES.has(category),
          retryAfterMs: parseRetryAfter(getHeader(ctx.response?.headers, 'retry-after')),
        },
      };
    }

    return {
      category: 'network',
      reason: 'network_error',
      fallback: { retryable: true },
    };
  }
}

export class HttpClient {
  private readonly baseUrl?: string;
  private readonly clientName: string;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly interceptors: HttpRequestInterceptor[];
  private readonly defaultErrorClassifier: ErrorClassifier = new DefaultErrorClassifier();

  constructor(private readonly config: HttpClientConfig = {}) {
    this.baseUrl = this.normalizeBaseUrl(config.baseUrl);
    this.clientName = config.clientName ?? 'http-client';
    this.transport = config.transport ?? fetchTransport;
    this.logger = config.logger;
    this.interceptors = [...(config.interceptors ?? [])];
  }

  async requestJsonResponse<T = unknown>(opts: HttpRequestOptions): Promise<HttpResponse<T>> {
    return this.execute<T>(opts, (raw) => {
      const text = decodeText(raw);
      if (!text.trim()) {
        throw new ResponseParseError('Empty response body where JSON was expected', raw.status);
      }
      try {
        return JSON.parse(text);
      } catch (error) {
        throw new ResponseParseError(
          `Invalid JSON response: ${error instanceof Error ? error.message : String(error)}`,
          raw.status,
        );
      }
    });
  }

  async requestJson<T = unknown>(opts: HttpRequestOptions): Promise<T> {
    const response = await this.requestJsonResponse<T>(opts);
    return response.body;
  }

  async requestText(opts: HttpRequestOptions): Promise<string> {
    const response = await this.execute<string>(opts, decodeText);
    return response.body;
  }

  private async execute<T>(
    opts: HttpRequestOptions,
    decode: (raw: RawHttpResponse) => T,
  ): Promise<HttpResponse<T>> {
    const startedAt = Date.now();
    const resilience: ResilienceProfile = { ...this.config.defaultResilience, ...opts.resilience };
    const maxAttempts =
      resilience.retryEnabled === false ? 1 : Math.max(1, resilience.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    const deadline =
      resilience.overallTimeoutMs !== undefined ? startedAt + resilience.overallTimeoutMs : undefined;

    for (let attempt = 1; ; attempt += 1) {
      const controller = new AbortController();
      const request = this.prepareAttemptRequest(opts);
      let url = this.safeBuildUrl(request);

      try {
        await this.applyBeforeSendInterceptors(request, controller.signal, attempt);
        url = this.buildUrl(request);
        this.logger?.debug('http.request.attempt', { ...this.baseLogMeta(request, url), attempt, maxAttempts });

        const timeoutMs = this.computeAttemptTimeout(resilience, deadline);
        const raw = await this.runAttempt(request, url, controller, timeoutMs);
        const body = decode(raw);
        const outcome = this.buildOutcome(startedAt, attempt, { ok: true, status: raw.status, category: 'none' });
        const response: HttpResponse<T> = {
          status: raw.status,
          headers: raw.headers,
          body,
          url,
          outcome,
        };

        await this.applyAfterResponseInterceptors(request, response, attempt);
        await this.recordMetrics(request, url, outcome);
        this.logger?.info('http.request.success', {
          ...this.baseLogMeta(request, url),
          attempt,
          status: raw.status,
          durationMs: outcome.durationMs,
        });
        return response;
      } catch (error) {
        const classified = this.classifyError(error, request, url, attempt);
        await this.runErrorInterceptors(request, error, attempt);

        const status = error instanceof HttpError ? error.status : classified.statusCode;
        const failureMeta = {
          ...this.baseLogMeta(request, url),
          attempt,
          maxAttempts,
          status,
          errorCategory: classified.category,
          error: error instanceof Error ? error.message : String(error),
        };
        const retryable = attempt < maxAttempts && (classified.fallback?.retryable ?? false);

        if (!retryable) {
          const outcome = this.buildOutcome(startedAt, attempt, {
            ok: false,
            status,
            category: classified.category,
            errorMessage: failureMeta.error,
          });
          await this.recordMetrics(request, url, outcome);
          this.logger?.error('http.request.failed', failureMeta);
          throw error;
        }

        let delayMs = this.getRetryDelay(attempt, classified.fallback, resilience);
        if (deadline !== undefined) {
          const remaining = deadline - Date.now();
          if (remaining <= 0) {
            throw new TimeoutError('Budget exceeded before retry');
          }
          delayMs = Math.min(delayMs, remaining);
        }
        this.logger?.warn('http.request.failed', { ...failureMeta, retryInMs: delayMs });
        await sleep(delayMs);
      }
    }
  }

  private async runAttempt(
    request: HttpRequestOptions,
    url: string,
    controller: AbortController,
    timeoutMs: number,
  ): Promise<RawHttpResponse> {
    let didTimeout = false;
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, timeoutMs);

    try {
      const headers: HttpHeaders = { ...request.headers };
      const body = this.serializeBody(request.body, headers);
      const raw = await this.transport({ method: request.method, url, headers, body }, controller.signal);

      if (raw.status < 200 || raw.status >= 300) {
        const fallback: FallbackHint = {
          retryAfterMs: parseRetryAfter(getHeader(raw.headers, 'retry-after')),
        };
        throw new HttpError(`HTTP ${raw.status}`, {
          status: raw.status,
          body: parseBodyFromText(decodeText(raw)),
          headers: raw.headers,
          category: statusToCategory(raw.status),
          fallback,
          url,
          response: raw,
        });
      }

      return raw;
    } catch (error) {
      if (didTimeout && !(error instanceof TimeoutError)) {
        throw new TimeoutError(`Request timed out after ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private prepareAttemptRequest(opts: HttpRequestOptions): HttpRequestOptions {
    const headers: HttpHeaders = { Accept: 'application/json', ...this.config.defaultHeaders, ...opts.headers };
    return {
      ...opts,
      headers,
      query: opts.query ? { ...opts.query } : undefined,
    };
  }

  private buildUrl(opts: HttpRequestOptions): string {
    let base: string;
    if (opts.url) {
      base = opts.url;
    } else {
      const path = opts.urlParts?.path ?? '';
      if (this.isAbsoluteUrl(path)) {
        base = path;
      } else {
        const root = this.normalizeBaseUrl(opts.urlParts?.baseUrl) ?? this.baseUrl;
        if (!root) {
          throw new Error('No baseUrl provided and request path is not an absolute URL');
        }
        const normalizedPath = path.startsWith('/') ? path.slice(1) : path;
        base = normalizedPath ? `${root}/${normalizedPath}` : root;
      }
    }

    const queryString = encodeQuery({ ...opts.urlParts?.query, ...opts.query });
    if (!queryString) {
      return base;
    }
    return `${base}${base.includes('?') ? '&' : '?'}${queryString}`;
  }

  private safeBuildUrl(opts: HttpRequestOptions): string {
    try {
      return this.buildUrl(opts);
    } catch {
      return opts.url ?? opts.urlParts?.path ?? '';
    }
  }

  private isAbsoluteUrl(path: string): boolean {
    return /^https?:\/\//i.test(path);
  }

  private normalizeBaseUrl(value?: string): string | undefined {
    if (!value) {
      return undefined;
    }
    const trimmed = value.trim();
    return trimmed.endsWith('/') ? trimmed.slice(0, -1) : trimmed;
  }

  private serializeBody(body: RequestBody | undefined, headers: HttpHeaders): string | undefined {
    if (body === undefined) {
      return undefined;
    }
    if (typeof body === 'string') {
      return body;
    }
    if (body instanceof URLSearchParams) {
      if (!getHeader(headers, 'content-type')) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
      }
      return body.toString();
    }
    if (!getHeader(headers, 'content-type')) {
      headers['Content-Type'] = 'application/json';
    }
    return JSON.stringify(body);
  }

  private async applyBeforeSendInterceptors(
    request: HttpRequestOptions,
    signal: AbortSignal,
    attempt: number,
  ): Promise<void> {
    for (const interceptor of this.interceptors) {
      if (!interceptor.beforeSend) continue;
      const ctx: BeforeSendContext = { request, signal, attempt };
      try {
        await interceptor.beforeSend(ctx);
      } catch (error) {
        this.logger?.warn('http.interceptor.beforeSend.failed', {
          client: this.clientName,
          operation: request.operation ?? '',
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    }
  }

  private async applyAfterResponseInterceptors(
    request: HttpRequestOptions,
    response: HttpResponse<unknown>,
    attempt: number,
  ): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.afterResponse) continue;
      const ctx: AfterResponseContext = { request, attempt, response };
      try {
        await interceptor.afterResponse(ctx);
      } catch (error) {
        // Observers only; a failing hook never fails the request
        this.logger?.warn('http.interceptor.afterResponse.failed', {
          client: this.clientName,
          operation: request.operation ?? '',
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private async runErrorInterceptors(request: HttpRequestOptions, error: unknown, attempt: number): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.onError) continue;
      const ctx: OnErrorContext = { request, error, attempt };
      try {
        await interceptor.onError(ctx);
      } catch (hookError) {
        this.logger?.warn('http.interceptor.onError.failed', {
          client: this.clientName,
          operation: request.operation ?? '',
          error: hookError instanceof Error ? hookError.message : String(hookError),
        });
      }
    }
  }

  private classifyError(
    error: unknown,
    request: HttpRequestOptions,
    url: string,
    attempt: number,
  ): ClassifiedError {
    const ctx: ErrorClassifierContext = {
      method: request.method,
      url,
      attempt,
      request,
      error,
      response: error instanceof HttpError ? error.response : undefined,
    };
    const classified = this.config.errorClassifier?.classify(ctx) ?? this.defaultErrorClassifier.classify(ctx);
    if (!classified) {
      return { category: 'unknown', fallback: { retryable: false } };
    }
    if (error instanceof HttpError) {
      error.category = classified.category;
      error.fallback = { ...error.fallback, ...classified.fallback };
    }
    return classified;
  }

  private getRetryDelay(attempt: number, fallback: FallbackHint | undefined, resilience: ResilienceProfile): number {
    if (fallback?.retryAfterMs !== undefined && fallback.retryAfterMs > 0) {
      return Math.min(fallback.retryAfterMs, MAX_RETRY_DELAY_MS);
    }
    const baseBackoffMs = resilience.baseBackoffMs ?? BASE_BACKOFF_MS;
    const maxBackoffMs = resilience.maxBackoffMs ?? MAX_RETRY_DELAY_MS;
    const [minJitter, maxJitter] = JITTER_RANGE;
    const baseDelay = baseBackoffMs * 2 ** (attempt - 1);
    const jitterFactor = minJitter + Math.random() * (maxJitter - minJitter);
    return Math.min(baseDelay * jitterFactor, maxBackoffMs);
  }

  private computeAttemptTimeout(resilience: ResilienceProfile, deadline?: number): number {
    const timeoutMs = resilience.perAttemptTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (deadline === undefined) {
      return timeoutMs;
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TimeoutError('Budget exceeded before request could start');
    }
    return Math.min(timeoutMs, remaining);
  }

  private buildOutcome(
    startedAt: number,
    attempts: number,
    result: Pick<RequestOutcome, 'ok' | 'status' | 'category' | 'errorMessage'>,
  ): RequestOutcome {
    const finishedAt = Date.now();
    return {
      ...result,
      attempts,
      startedAt: new Date(startedAt),
      finishedAt: new Date(finishedAt),
      durationMs: finishedAt - startedAt,
    };
  }

  private async recordMetrics(request: HttpRequestOptions, url: string, outcome: RequestOutcome): Promise<void> {
    if (!this.config.metrics) return;
    try {
      await this.config.metrics.recordRequest({
        clientName: this.clientName,
        operation: request.operation,
        method: request.method,
        url,
        outcome,
      });
    } catch (error) {
      this.logger?.warn('http.metrics.failed', {
        client: this.clientName,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private baseLogMeta(request: HttpRequestOptions, url: string): LoggerMeta {
    return {
      client: this.clientName,
      operation: request.operation ?? '',
      method: request.method,
      url,
    };
  }
}

export class HttpError extends Error {
  status: number;
  body: unknown;
  headers: HttpHeaders;
  category: ErrorCategory;
  fallback?: FallbackHint;
  url?: string;
  response?: RawHttpResponse;

  constructor(
    message: string,
    options: {
      status: number;
      body?: unknown;
      headers?: HttpHeaders;
      category: ErrorCategory;
      fallback?: FallbackHint;
      url?: string;
      response?: RawHttpResponse;
    },
  ) {
    super(message);
    this.name = 'HttpError';
    this.status = options.status;
    this.body = options.body;
    this.headers = options.headers ?? {};
    this.category = options.category;
    this.fallback = options.fallback;
    this.url = options.url;
    this.response = options.response;
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class ResponseParseError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'ResponseParseError';
  }
}
