import type { QueryParams } from '@libs/resilient-http-core';
import { combineFilters, listToFilter, rangeToFilters } from './filters';
import { metadataPaginator, odataPaginator } from './pagination';
import { odataValueToTable, resultsToTable } from './table';
import type {
  DataRequest,
  FilterInput,
  FilterScalar,
  FilterStrategy,
  PageProgress,
  PaginateFn,
  RangeInput,
  RangeValue,
  TableConverter,
} from './types';
import { FilterTypeError } from './types';

const DEFAULT_PAGE_SIZE = 1000;

export interface ListField {
  kind: 'list';
  /** Field name as the API spells it, e.g. `Refinery/Country/Name`. */
  field: string;
}

export interface RangeField {
  kind: 'range';
  field: string;
}

export type DatasetField = ListField | RangeField;

export type DatasetFields = Record<string, DatasetField>;

export const listField = (field: string): ListField => ({ kind: 'list', field });

export const rangeField = (field: string): RangeField => ({ kind: 'range', field });

type FieldArgument<F extends DatasetField> = F extends RangeField ? RangeInput : FilterInput;

export type CommonQueryArgs = {
  /** Handcrafted filter, ANDed with the generated one. */
  filterExp?: string;
  page?: number;
  pageSize?: number;
  paginate?: boolean;
  raw?: boolean;
  /** Extra query parameters passed through unchanged. */
  params?: QueryParams;
  onPage?: (progress: PageProgress) => void;
};

export type DatasetArgs<F extends DatasetFields> = CommonQueryArgs & {
  [K in keyof F]?: FieldArgument<F[K]>;
};

export interface DatasetDefinition<F extends DatasetFields> {
  name: string;
  path: string;
  strategy?: FilterStrategy;
  fields: F;
  pageSize?: number;
  paginator?: PaginateFn;
  table?: TableConverter;
}

export interface Dataset<F extends DatasetFields> {
  readonly name: string;
  readonly path: string;
  readonly strategy: FilterStrategy;
  readonly fields: F;
  readonly pageSize: number;
  readonly paginator: PaginateFn;
  readonly table: TableConverter;
}

/**
 * Declares an endpoint and the arguments it filters on.
 *
 * @example
 * ```typescript
 * const refineryCapacity = defineDataset({
 *   name: 'refinery-capacity',
 *   path: 'odata/refinery-data/v2.2/Capacity',
 *   strategy: 'odata',
 *   fields: {
 *     year: listField('Year'),
 *     country: listField('Refinery/Country/Name'),
 *     modifiedDate: rangeField('ModifiedDate'),
 *   },
 * });
 *
 * const table = await client.query(refineryCapacity, { year: [2023, 2024], paginate: true });
 * ```
 */
export function defineDataset<F extends DatasetFields>(definition: DatasetDefinition<F>): Dataset<F> {
  const strategy = definition.strategy ?? 'platts';
  return {
    name: definition.name,
    path: definition.path.replace(/^\/+/, ''),
    strategy,
    fields: definition.fields,
    pageSize: definition.pageSize ?? DEFAULT_PAGE_SIZE,
    paginator: definition.paginator ?? (strategy === 'odata' ? odataPaginator() : metadataPaginator()),
    table: definition.table ?? (strategy === 'odata' ? odataValueToTable() : resultsToTable()),
  };
}

function isFilterScalar(value: unknown): value is FilterScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date;
}

function asFilterInput(name: string, value: unknown): FilterInput {
  if (value === undefined || value === null || isFilterScalar(value)) return value;
  if (Array.isArray(value) && value.every(isFilterScalar)) return value;
  throw new FilterTypeError(`Unsupported value for "${name}"`);
}

function isRangeValue(value: unknown): value is RangeValue {
  return typeof value === 'string' || typeof value === 'number' || value instanceof Date;
}

function asRangeInput(name: string, value: unknown): RangeInput | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'object' || Array.isArray(value) || value instanceof Date) {
    throw new FilterTypeError(`"${name}" expects a range such as { gte, lt }`);
  }
  const range: RangeInput = {};
  for (const [bound, boundValue] of Object.entries(value)) {
    if (boundValue === undefined) continue;
    if (!isRangeValue(boundValue)) {
      throw new FilterTypeError(`Unsupported ${bound} bound for "${name}"`);
    }
    if (bound === 'eq' || bound === 'gt' || bound === 'gte' || bound === 'lt' || bound === 'lte') {
      range[bound] = boundValue;
    } else {
      throw new FilterTypeError(`Unknown range bound "${bound}" for "${name}"`);
    }
  }
  return range;
}

/**
 * Renders the filter expression for the dataset's declared fields.
 */
export function buildDatasetFilter<F extends DatasetFields>(dataset: Dataset<F>, args: DatasetArgs<F>): string {
  const values = new Map<string, unknown>(Object.entries(args));
  const parts: string[] = [];
  for (const [name, declared] of Object.entries(dataset.fields)) {
    const value = values.get(name);
    if (declared.kind === 'range') {
      parts.push(...rangeToFilters(declared.field, asRangeInput(name, value), dataset.strategy));
    } else {
      parts.push(listToFilter(declared.field, asFilterInput(name, value), dataset.strategy));
    }
  }
  return combineFilters(parts, args.filterExp);
}

/**
 * Translates dataset arguments into a `getData` request: `filter`, `page` and
 * `pageSize` for the platts grammar, `$filter`, `$skip`, `pageSize` and
 * `$count` for OData.
 */
export function buildDatasetRequest<F extends DatasetFields>(dataset: Dataset<F>, args: DatasetArgs<F>): DataRequest {
  const filter = buildDatasetFilter(dataset, args);
  const page = args.page ?? 1;
  const pageSize = args.pageSize ?? dataset.pageSize;

  const params: QueryParams =
    dataset.strategy === 'odata'
      ? {
          $filter: filter || undefined,
          $skip: (page - 1) * pageSize,
          pageSize,
          $count: 'true',
        }
      : {
          filter: filter || undefined,
          page,
          pageSize,
        };

  return {
    path: dataset.path,
    params: { ...params, ...args.params },
    toTable: dataset.table,
    paginator: dataset.paginator,
    paginate: args.paginate ?? false,
    raw: args.raw ?? false,
    operation: dataset.name,
    onPage: args.onPage,
  };
}
