import type { FilterInput, FilterScalar, FilterStrategy, RangeInput, RangeValue } from './types';
import { FilterTypeError } from './types';

// ============================================================================
// Filter expression builders
// ============================================================================

const RANGE_OPERATORS: Record<FilterStrategy, Record<keyof RangeInput, string>> = {
  platts: { eq: ':', gt: ' >', gte: ' >=', lt: ' <', lte: ' <=' },
  odata: { eq: ' eq', gt: ' gt', gte: ' ge', lt: ' lt', lte: ' le' },
};

const RANGE_ORDER: Array<keyof RangeInput> = ['eq', 'gt', 'gte', 'lt', 'lte'];

/**
 * Renders a date filter value from its UTC fields. Midnight values are plain
 * dates (`2024-03-01`); anything else keeps its time, as
 * `2024-03-01 10:30:00` for the platts grammar and `2024-03-01T10:30:00Z`
 * for OData. Milliseconds are kept only when non-zero.
 */
export function formatFilterDate(value: Date, strategy: FilterStrategy = 'platts'): string {
  if (Number.isNaN(value.getTime())) {
    throw new FilterTypeError('Invalid Date passed as a filter value');
  }
  const iso = value.toISOString();
  const day = iso.slice(0, 10);
  const millis = value.getUTCMilliseconds();
  if (value.getUTCHours() === 0 && value.getUTCMinutes() === 0 && value.getUTCSeconds() === 0 && millis === 0) {
    return day;
  }
  const time = iso.slice(11, millis === 0 ? 19 : 23);
  return strategy === 'odata' ? `${day}T${time}Z` : `${day} ${time}`;
}

function quote(value: string, strategy: FilterStrategy): string {
  return strategy === 'platts'
    ? `"${value.replace(/"/g, '\\"')}"`
    : `'${value.replace(/'/g, "''")}'`;
}

function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new FilterTypeError(`Unsupported numeric filter value: ${value}`);
  }
  return String(value);
}

function formatScalar(value: FilterScalar, strategy: FilterStrategy, quoteDates: boolean): string {
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'string') return quote(value, strategy);
  const date = formatFilterDate(value, strategy);
  return quoteDates ? quote(date, strategy) : date;
}

function scalarKind(value: FilterScalar): 'boolean' | 'number' | 'string' | 'date' {
  if (value instanceof Date) return 'date';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return 'number';
  return 'string';
}

function isFilterList(value: FilterInput): value is readonly FilterScalar[] {
  return Array.isArray(value);
}

/**
 * Builds a filter expression for one field.
 *
 * Scalars render as `field: "value"` (`field eq 'value'` for OData), lists as
 * `field in ("a","b")`. Empty input yields an empty string so callers can
 * collect parts unconditionally and pass them to {@link combineFilters}.
 *
 * @example
 * ```typescript
 * listToFilter('symbol', ['PCAAS00', 'PCAAT00']); // symbol in ("PCAAS00","PCAAT00")
 * listToFilter('assessDate', new Date('2024-01-02')); // assessDate: "2024-01-02"
 * listToFilter('year', 2024, 'odata'); // year eq 2024
 * ```
 */
export function listToFilter(field: string, value: FilterInput, strategy: FilterStrategy = 'platts'): string {
  if (value === undefined || value === null || value === '') {
    return '';
  }

  const delimiter = strategy === 'platts' ? ':' : ' eq';

  if (!isFilterList(value)) {
    // OData compares dates unquoted; the platts filter grammar wants them quoted.
    return `${field}${delimiter} ${formatScalar(value, strategy, strategy === 'platts')}`;
  }

  if (value.length === 0) {
    return '';
  }

  const kinds = new Set(value.map(scalarKind));
  if (kinds.size > 1) {
    throw new FilterTypeError(`Mixed value types in filter list for "${field}": ${[...kinds].join(', ')}`);
  }

  const items = value.map((item) => formatScalar(item, strategy, true));
  return `${field} in (${items.join(',')})`;
}

export function odataListToFilter(field: string, value: FilterInput): string {
  return listToFilter(field, value, 'odata');
}

function formatRangeValue(value: RangeValue, strategy: FilterStrategy): string {
  if (typeof value === 'number') return formatNumber(value);
  if (strategy === 'odata') {
    return value instanceof Date ? formatFilterDate(value, strategy) : value;
  }
  return quote(value instanceof Date ? formatFilterDate(value, strategy) : value, strategy);
}

/**
 * Builds comparison expressions for the bounds present in `range`, in the
 * order eq, gt, gte, lt, lte.
 *
 * @example
 * ```typescript
 * rangeToFilters('assessDate', { gte: '2024-01-01', lt: '2024-02-01' });
 * // ['assessDate >= "2024-01-01"', 'assessDate < "2024-02-01"']
 * rangeToFilters('year', { gt: 2020 }, 'odata'); // ['year gt 2020']
 * ```
 */
export function rangeToFilters<T extends RangeValue>(
  field: string,
  range: RangeInput<T> | undefined,
  strategy: FilterStrategy = 'platts',
): string[] {
  if (!range) return [];
  const operators = RANGE_OPERATORS[strategy];
  const parts: string[] = [];
  for (const key of RANGE_ORDER) {
    const bound = range[key];
    if (bound === undefined || bound === '') continue;
    parts.push(`${field}${operators[key]} ${formatRangeValue(bound, strategy)}`);
  }
  return parts;
}

/**
 * Joins generated filter parts with `AND` and appends a handcrafted
 * expression in parentheses.
 */
export function combineFilters(parts: readonly string[], filterExp?: string): string {
  const generated = parts.filter((part) => part.length > 0).join(' AND ');
  const handcrafted = filterExp?.trim() ?? '';

  if (generated && handcrafted) {
    return `${generated} AND (${handcrafted})`;
  }
  return generated || handcrafted;
}
