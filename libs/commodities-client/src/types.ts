import type { HttpTransport, Logger, MetricsSink, QueryParams } from '@libs/resilient-http-core';
import type { Table } from './table';

/**
 * Commodities Client Types
 *
 * Configuration, filter inputs, pagination contracts and the error hierarchy.
 */

// ============================================================================
// Errors
// ============================================================================

export class CommoditiesError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly responseBody?: unknown,
  ) {
    super(message);
    this.name = 'CommoditiesError';
  }
}

/** [400, 401, 403] - Invalid Username, Password or Appkey */
export class AuthError extends CommoditiesError {
  constructor(message: string, status?: number, responseBody?: unknown) {
    super(message, status, responseBody);
    this.name = 'AuthError';
  }
}

/** [429] - Too Many Requests Per Second */
export class PerSecondLimitError extends CommoditiesError {
  constructor(message = 'Per Second Rate Limit Reached', responseBody?: unknown) {
    super(message, 429, responseBody);
    this.name = 'PerSecondLimitError';
  }
}

/** [429] - Too Many Requests Per Day */
export class DailyLimitError extends CommoditiesError {
  constructor(message = 'Daily Rate Limit Reached', responseBody?: unknown) {
    super(message, 429, responseBody);
    this.name = 'DailyLimitError';
  }
}

export class ResponseShapeError extends CommoditiesError {
  constructor(message: string, responseBody?: unknown) {
    super(message, undefined, responseBody);
    this.name = 'ResponseShapeError';
  }
}

export class FilterTypeError extends CommoditiesError {
  constructor(message: string) {
    super(message);
    this.name = 'FilterTypeError';
  }
}

export class ConfigError extends CommoditiesError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Core Client Configuration
// ============================================================================

export interface CommoditiesClientConfig {
  username?: string;
  password?: string;
  appkey?: string;
  /** Pre-issued bearer token; skips the token endpoint entirely. */
  token?: string;
  baseUrl?: string;
  userAgent?: string;
  /** Pause before every request, in milliseconds. */
  requestDelayMs?: number;
  timeoutMs?: number;
  /** Attempts for throttled (per-second 429) and transient failures. */
  maxAttempts?: number;
  /** Wait after a per-second 429 before trying again. */
  throttleDelayMs?: number;
  /** Auto-pagination above this many pages logs a warning first. */
  pageWarningThreshold?: number;
  /** Hard stop for auto-pagination. */
  maxPages?: number;
  logger?: Logger;
  metrics?: MetricsSink;
  transport?: HttpTransport;
}

export interface Credentials {
  username: string;
  password: string;
  appkey: string;
}

// ============================================================================
// Filters
// ============================================================================

export type FilterStrategy = 'platts' | 'odata';

export type FilterScalar = string | number | boolean | Date;

export type FilterInput = FilterScalar | readonly FilterScalar[] | null | undefined;

export type RangeValue = string | number | Date;

export interface RangeInput<T extends RangeValue = RangeValue> {
  eq?: T;
  gt?: T;
  gte?: T;
  lt?: T;
  lte?: T;
}

// ============================================================================
// Pagination
// ============================================================================

export type PageKind = 'page' | 'odata';

export interface Paginator {
  hasMorePages: boolean;
  /** Query parameter advanced between pages (`page` or `$skip`). */
  key: string;
  totalPages: number;
  kind: PageKind;
}

export interface PageContext {
  body: unknown;
  url: string;
  params: QueryParams;
}

export type PaginateFn = (ctx: PageContext) => Paginator;

export interface PageProgress {
  page: number;
  totalPages: number;
  rows: number;
}

// ============================================================================
// Data requests
// ============================================================================

export type TableConverter = (body: unknown) => Table;

export interface DataRequest {
  /** Path below the base URL, e.g. `market-data/v3/value/current/symbol`. */
  path: string;
  params?: QueryParams;
  toTable?: TableConverter;
  paginator?: PaginateFn;
  /** Follow every page reported by the paginator. */
  paginate?: boolean;
  /** Return the first page's decoded JSON instead of a table. */
  raw?: boolean;
  operation?: string;
  onPage?: (progress: PageProgress) => void;
}

export interface RawDataResponse {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: unknown;
}
