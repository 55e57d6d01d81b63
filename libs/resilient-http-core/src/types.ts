export type HttpMethod = 'GET' | 'POST';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface UrlParts {
  baseUrl?: string;   // e.g. "https://api.example.com"
  path?: string;      // e.g. "market-data/v3/value/current/symbol"
  query?: QueryParams;
}

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Error category classification for HTTP errors.
 *
 * - 'auth': Authentication/authorization failure (401, 403)
 * - 'validation': Client input validation error (400, 422)
 * - 'not_found': Resource missing (404)
 * - 'quota': Quota exhausted (402, or a classifier's verdict on a 429)
 * - 'rate_limit': Rate limit exceeded (429)
 * - 'timeout': Request timeout (408 or per-attempt timeout)
 * - 'transient': Temporary server error, retryable (5xx)
 * - 'network': Network-level error (connection failed, DNS, etc.)
 * - 'canceled': Request was canceled by client
 * - 'unknown': Unclassified error
 */
export type ErrorCategory =
  | 'none'
  | 'auth'
  | 'validation'
  | 'not_found'
  | 'quota'
  | 'rate_limit'
  | 'timeout'
  | 'transient'
  | 'network'
  | 'canceled'
  | 'unknown';

export interface FallbackHint {
  retryAfterMs?: number;
  retryable?: boolean;
}

export interface ClassifiedError {
  category: ErrorCategory;
  statusCode?: number;
  reason?: string;
  fallback?: FallbackHint;
}

export interface ResilienceProfile {
  maxAttempts?: number;          // Default: 3
  retryEnabled?: boolean;        // Default: true

  perAttemptTimeoutMs?: number;  // Default: 30_000
  overallTimeoutMs?: number;     // Default: undefined (no end-to-end limit)

  baseBackoffMs?: number;        // Default: 250
  maxBackoffMs?: number;         // Default: 60_000
}

/**
 * Transport layer raw HTTP response.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export interface ErrorClassifierContext {
  method: HttpMethod;
  url: string;
  attempt: number;
  request: HttpRequestOptions;
  response?: RawHttpResponse;
  error?: unknown;
}

/**
 * Custom classifiers return undefined to defer to the default status mapping.
 */
export interface ErrorClassifier {
  classify(ctx: ErrorClassifierContext): ClassifiedError | undefined;
}

export interface RequestOutcome {
  ok: boolean;
  status?: number;
  category: ErrorCategory;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  errorMessage?: string;
}

export interface MetricsRequestInfo {
  clientName: string;
  operation?: string;
  method: HttpMethod;
  url: string;
  outcome: RequestOutcome;
}

export interface MetricsSink {
  recordRequest(info: MetricsRequestInfo): void | Promise<void>;
}

export interface HttpClientConfig {
  clientName?: string;
  baseUrl?: string;
  transport?: HttpTransport;
  defaultHeaders?: HttpHeaders;
  defaultResilience?: ResilienceProfile;
  interceptors?: HttpRequestInterceptor[];
  errorClassifier?: ErrorClassifier;
  logger?: Logger;
  metrics?: MetricsSink;
}

export type RequestBody = string | URLSearchParams | Record<string, unknown> | unknown[];

export interface HttpRequestOptions {
  method: HttpMethod;

  url?: string;
  urlParts?: UrlParts;  // exactly one of url or urlParts should be provided

  headers?: HttpHeaders;
  query?: QueryParams;

  body?: RequestBody;

  operation?: string;

  resilience?: ResilienceProfile;
}

/**
 * Decoded body together with status, headers, final URL and request outcome.
 */
export interface HttpResponse<TBody = unknown> {
  status: number;
  headers: HttpHeaders;
  body: TBody;
  url: string;
  outcome: RequestOutcome;
}

export interface BeforeSendContext {
  request: HttpRequestOptions;
  attempt: number;
  signal: AbortSignal;
}

export interface AfterResponseContext {
  request: HttpRequestOptions;
  attempt: number;
  response: HttpResponse<unknown>;
}

export interface OnErrorContext {
  request: HttpRequestOptions;
  attempt: number;
  error: unknown;
}

/**
 * HTTP request interceptor for cross-cutting concerns.
 *
 * **Execution Order:**
 * 1. `beforeSend`: Runs in **registration order** before each attempt (including retries).
 *    Can mutate the request; throwing prevents the request.
 * 2. `afterResponse`: Runs in **reverse registration order** after each successful response.
 * 3. `onError`: Runs in **reverse registration order** after each failed attempt.
 *    Cannot suppress the error.
 *
 * Interceptors run inside the retry loop and must not implement their own retries.
 */
export interface HttpRequestInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;
  afterResponse?(ctx: AfterResponseContext): Promise<void> | void;
  onError?(ctx: OnErrorContext): Promise<void> | void;
}
