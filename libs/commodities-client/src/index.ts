/**
 * @libs/commodities-client
 *
 * Commodities Data API Client Library
 *
 * Typed access to a commodities-data REST API:
 * - bearer token acquisition from username/password (or a pinned token)
 * - GET with one refresh-and-retry on 401/403 and throttle handling on 429
 * - sequential pagination concatenated into one table
 * - OData-style filter builders
 * - JSON envelope to table conversion with date coercion
 *
 * ## Usage
 *
 * ```typescript
 * import { createCommoditiesClient, defineDataset, listField, rangeField } from '@libs/commodities-client';
 *
 * // Create client (reads from env vars)
 * const client = createCommoditiesClient();
 *
 * const currentPrices = defineDataset({
 *   name: 'market-data.current',
 *   path: 'market-data/v3/value/current/symbol',
 *   fields: {
 *     symbol: listField('symbol'),
 *     modifiedDate: rangeField('modDate'),
 *   },
 * });
 *
 * const table = await client.query(currentPrices, {
 *   symbol: ['PCAAS00', 'PCAAT00'],
 *   modifiedDate: { gte: '2024-01-01' },
 *   paginate: true,
 * });
 * ```
 *
 * ## Environment Variables
 *
 * - `COMMODITY_API_USERNAME`, `COMMODITY_API_PASSWORD`, `COMMODITY_API_APPKEY` - credentials
 * - `COMMODITY_API_TOKEN` - pre-issued bearer token
 * - `COMMODITY_API_BASE` - Base URL (default: https://api.platts.com)
 * - `COMMODITY_API_DELAY_MS` - Pause before each request (default: 0)
 * - `COMMODITY_API_TIMEOUT_MS` - Per-attempt timeout (default: 30000)
 * - `COMMODITY_API_MAX_ATTEMPTS` - Attempts for throttled/transient failures (default: 5)
 */

// ============================================================================
// Primary API - Client and Factory
// ============================================================================

export { CommoditiesClient, createCommoditiesClient } from './commoditiesClient';
export { TokenProvider } from './auth';
export type { TokenProviderOptions } from './auth';
export {
  DEFAULT_BASE_URL,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_PAGE_WARNING_THRESHOLD,
  DEFAULT_THROTTLE_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  loadConfigFromEnv,
  resolveConfig,
} from './config';
export type { ResolvedConfig } from './config';
export { createCommoditiesErrorClassifier, remainingDailyQuota, toLimitError } from './errorPolicy';

// ============================================================================
// Filters, Pagination, Datasets
// ============================================================================

export { combineFilters, formatFilterDate, listToFilter, odataListToFilter, rangeToFilters } from './filters';
export { metadataPaginator, noPagination, odataPaginator } from './pagination';
export { buildDatasetFilter, buildDatasetRequest, defineDataset, listField, rangeField } from './dataset';
export type {
  CommonQueryArgs,
  Dataset,
  DatasetArgs,
  DatasetDefinition,
  DatasetField,
  DatasetFields,
  ListField,
  RangeField,
} from './dataset';

// ============================================================================
// Tables
// ============================================================================

export {
  DEFAULT_DATE_COLUMNS,
  Table,
  coerceDateColumns,
  dropColumns,
  moveColumnsFirst,
  normalizeRecords,
  odataValueToTable,
  parseDateCell,
  renameColumns,
  resultsToTable,
  stripHtml,
  stripHtmlColumns,
} from './table';
export type { ColumnRenamer, ColumnSelector, ConverterOptions, NormalizeOptions, TableRow } from './table';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  CommoditiesClientConfig,
  Credentials,
  DataRequest,
  FilterInput,
  FilterScalar,
  FilterStrategy,
  PageContext,
  PageKind,
  PageProgress,
  PaginateFn,
  Paginator,
  RangeInput,
  RangeValue,
  RawDataResponse,
  TableConverter,
} from './types';

// ============================================================================
// Error Exports
// ============================================================================

export {
  AuthError,
  CommoditiesError,
  ConfigError,
  DailyLimitError,
  FilterTypeError,
  PerSecondLimitError,
  ResponseShapeError,
} from './types';
