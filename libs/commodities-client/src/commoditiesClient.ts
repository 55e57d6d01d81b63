import {
  ConsoleLogger,
  HttpClient,
  HttpError,
  createAuthInterceptor,
  createDelayInterceptor,
  createUserAgentInterceptor,
} from '@libs/resilient-http-core';
import type { Logger, QueryParams } from '@libs/resilient-http-core';
import { TokenProvider } from './auth';
import { loadConfigFromEnv, resolveConfig } from './config';
import type { ResolvedConfig } from './config';
import { buildDatasetRequest } from './dataset';
import type { Dataset, DatasetArgs, DatasetFields } from './dataset';
import { createCommoditiesErrorClassifier, toLimitError } from './errorPolicy';
import { metadataPaginator } from './pagination';
import { resultsToTable } from './table';
import type { Table } from './table';
import type { CommoditiesClientConfig, DataRequest, Paginator, RawDataResponse } from './types';
import { AuthError, CommoditiesError } from './types';

const AUTH_ATTEMPTS = 2;

/**
 * Commodities Data API Client
 *
 * Wraps the REST API with:
 * - bearer token acquisition and caching, with one refresh-and-retry on 401/403
 * - per-second throttle retries and daily quota detection on 429
 * - sequential pagination into a single {@link Table}
 * - declarative dataset queries built from {@link defineDataset}
 */
export class CommoditiesClient {
  private readonly settings: ResolvedConfig;
  private readonly logger: Logger;
  private readonly http: HttpClient;
  private readonly tokens: TokenProvider;

  constructor(config: CommoditiesClientConfig = {}) {
    this.settings = resolveConfig(config);
    this.logger = config.logger ?? new ConsoleLogger();

    const errorClassifier = createCommoditiesErrorClassifier({ throttleDelayMs: this.settings.throttleDelayMs });
    const defaultResilience = {
      maxAttempts: this.settings.maxAttempts,
      perAttemptTimeoutMs: this.settings.timeoutMs,
    };

    const authHttp = new HttpClient({
      clientName: 'commodities-auth',
      baseUrl: this.settings.baseUrl,
      transport: config.transport,
      logger: this.logger,
      metrics: config.metrics,
      errorClassifier,
      defaultResilience,
    });

    this.tokens = new TokenProvider({
      http: authHttp,
      userAgent: this.settings.userAgent,
      maxAttempts: this.settings.maxAttempts,
      credentials: { username: config.username, password: config.password, appkey: config.appkey },
      token: config.token,
      logger: this.logger,
    });

    this.http = new HttpClient({
      clientName: 'commodities',
      baseUrl: this.settings.baseUrl,
      transport: config.transport,
      logger: this.logger,
      metrics: config.metrics,
      errorClassifier,
      defaultResilience,
      interceptors: [
        createDelayInterceptor(this.settings.requestDelayMs),
        createUserAgentInterceptor(this.settings.userAgent),
        createAuthInterceptor({ getToken: () => this.tokens.getToken() }),
      ],
    });
  }

  // ==========================================================================
  // Credentials
  // ==========================================================================

  setCredentials(username: string, password: string, appkey: string): void {
    this.tokens.setCredentials({ username, password, appkey });
  }

  /** Uses a pre-issued bearer token instead of the token endpoint. */
  setToken(token: string): void {
    this.tokens.setToken(token);
  }

  // ==========================================================================
  // Core HTTP
  // ==========================================================================

  /**
   * GET `{baseUrl}/{path}` with the bearer token attached. Every attempt,
   * throttle retries included, waits `requestDelayMs` first.
   *
   * A 401/403 drops the cached token and retries once with a fresh one; a
   * second rejection raises {@link AuthError}.
   */
  async get(path: string, params: QueryParams = {}, operation = 'get'): Promise<RawDataResponse> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        const response = await this.http.requestJsonResponse<unknown>({
          method: 'GET',
          urlParts: { path, query: params },
          operation,
        });
        return { status: response.status, url: response.url, headers: response.headers, body: response.body };
      } catch (error) {
        if (error instanceof HttpError && error.category === 'auth') {
          this.tokens.invalidate();
          if (attempt < AUTH_ATTEMPTS && !this.tokens.hasPinnedToken()) {
            this.logger.warn('[CommoditiesClient] token rejected, refreshing and retrying', {
              path,
              status: error.status,
            });
            continue;
          }
          throw new AuthError('Invalid Username, Password or Appkey', error.status, error.body);
        }

        const mapped = toLimitError(error);
        if (mapped === error && error instanceof HttpError) {
          this.logger.error('[CommoditiesClient] request failed', {
            path,
            status: error.status,
            body: error.body,
          });
        }
        throw mapped;
      }
    }
  }

  // ==========================================================================
  // Paginated data
  // ==========================================================================

  /**
   * Fetches `request.path` and converts it into a {@link Table}.
   *
   * When the paginator reports more pages, they are only followed with
   * `paginate: true`; otherwise the first page is returned with a warning.
   */
  getData(request: DataRequest & { raw: true }): Promise<RawDataResponse>;
  getData(request: DataRequest & { raw?: false }): Promise<Table>;
  getData(request: DataRequest): Promise<Table | RawDataResponse>;
  async getData(request: DataRequest): Promise<Table | RawDataResponse> {
    const params: QueryParams = { ...request.params };
    const operation = request.operation ?? request.path;
    const first = await this.get(request.path, params, operation);

    if (request.raw) {
      if (request.paginate) {
        this.logger.warn(
          '[CommoditiesClient] Cannot set paginate: true along with raw: true. Returning only the page requested.',
          { path: request.path },
        );
      }
      return first;
    }

    const toTable = request.toTable ?? resultsToTable();
    const paginator = request.paginator ?? metadataPaginator();

    let table: Table = toTable(first.body);
    const pagination = paginator({ body: first.body, url: first.url, params });
    const startPage = this.currentPage(pagination, params);
    request.onPage?.({ page: startPage, totalPages: pagination.totalPages, rows: table.length });

    if (!pagination.hasMorePages || startPage >= pagination.totalPages) {
      return table;
    }

    if (!request.paginate) {
      this.logger.warn(
        `[CommoditiesClient] Fetched page [${startPage}] of [${pagination.totalPages}]. Set paginate: true to fetch all pages.`,
        { path: request.path },
      );
      return table;
    }

    const totalPages = pagination.totalPages;
    if (totalPages > this.settings.pageWarningThreshold) {
      this.logger.warn(
        `[CommoditiesClient] With paginate: true this will fetch ${totalPages} pages. Set paginate: false to disable.`,
        { path: request.path },
      );
    }

    const maxPages = this.settings.maxPages;
    const lastPage = maxPages !== undefined ? Math.min(totalPages, startPage + maxPages - 1) : totalPages;
    if (lastPage < totalPages) {
      this.logger.warn(`[CommoditiesClient] Stopping after page ${lastPage} of ${totalPages} (maxPages ${maxPages})`, {
        path: request.path,
      });
    }

    for (let page = startPage + 1; page <= lastPage; page += 1) {
      const pageParams: QueryParams = { ...params, [pagination.key]: this.pageValue(pagination, params, page) };
      const response = await this.get(request.path, pageParams, operation);
      table = table.concat(toTable(response.body));

      this.logger.debug('[CommoditiesClient] fetched page', { path: request.path, page, totalPages });
      request.onPage?.({ page, totalPages, rows: table.length });
    }

    return table;
  }

  // ==========================================================================
  // Datasets
  // ==========================================================================

  query<F extends DatasetFields>(dataset: Dataset<F>, args: DatasetArgs<F> & { raw: true }): Promise<RawDataResponse>;
  query<F extends DatasetFields>(dataset: Dataset<F>, args?: DatasetArgs<F> & { raw?: false }): Promise<Table>;
  query<F extends DatasetFields>(dataset: Dataset<F>, args?: DatasetArgs<F>): Promise<Table | RawDataResponse>;
  async query<F extends DatasetFields>(
    dataset: Dataset<F>,
    args: DatasetArgs<F> = {},
  ): Promise<Table | RawDataResponse> {
    return this.getData(buildDatasetRequest(dataset, args));
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private pageSizeOf(params: QueryParams): number {
    const size = Number(params.pageSize);
    if (!Number.isInteger(size) || size <= 0) {
      throw new CommoditiesError('OData pagination requires a positive integer pageSize parameter');
    }
    return size;
  }

  private currentPage(pagination: Paginator, params: QueryParams): number {
    const value = Number(params[pagination.key] ?? (pagination.kind === 'odata' ? 0 : 1));
    if (!Number.isInteger(value) || value < 0) {
      return 1;
    }
    if (pagination.kind === 'odata') {
      return pagination.hasMorePages ? Math.floor(value / this.pageSizeOf(params)) + 1 : 1;
    }
    return Math.max(value, 1);
  }

  private pageValue(pagination: Paginator, params: QueryParams, page: number): number {
    return pagination.kind === 'odata' ? (page - 1) * this.pageSizeOf(params) : page;
  }
}

/**
 * Create a client from `COMMODITY_API_*` environment variables, with explicit
 * overrides taking precedence.
 *
 * @example
 * ```typescript
 * const client = createCommoditiesClient({ requestDelayMs: 250 });
 * const table = await client.getData({ path: 'market-data/v3/value/current/symbol', params: { filter } });
 * ```
 */
export function createCommoditiesClient(configOverrides: CommoditiesClientConfig = {}): CommoditiesClient {
  const fromEnv = loadConfigFromEnv();
  const merged: CommoditiesClientConfig = { ...fromEnv };
  for (const [key, value] of Object.entries(configOverrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return new CommoditiesClient(merged);
}
