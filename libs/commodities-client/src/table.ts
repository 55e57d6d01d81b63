import { z } from 'zod';
import dateColumns from '../data/date-columns.json';
import { ResponseShapeError } from './types';

export type TableRow = Record<string, unknown>;

/**
 * Column-ordered rows decoded from one or more API pages.
 *
 * Rows are plain records; `columns` keeps the order in which fields were
 * first seen so concatenated pages line up predictably.
 */
export class Table<Row extends TableRow = TableRow> {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];

  constructor(columns: readonly string[], rows: readonly Row[]) {
    this.columns = [...columns];
    this.rows = [...rows];
  }

  static fromRecords<Row extends TableRow>(records: readonly Row[]): Table<Row> {
    return new Table(collectColumns(records), records);
  }

  static empty<Row extends TableRow = TableRow>(): Table<Row> {
    return new Table<Row>([], []);
  }

  get length(): number {
    return this.rows.length;
  }

  /** Values of one column; rows without the field yield `null`. */
  column(name: string): unknown[] {
    return this.rows.map((row) => (Object.prototype.hasOwnProperty.call(row, name) ? row[name] : null));
  }

  concat(other: Table<Row>): Table<Row> {
    const columns = [...this.columns];
    for (const column of other.columns) {
      if (!columns.includes(column)) columns.push(column);
    }
    return new Table(columns, [...this.rows, ...other.rows]);
  }

  mapRows(fn: (row: Row, index: number) => TableRow, columns?: readonly string[]): Table {
    const rows = this.rows.map(fn);
    return new Table(columns ?? collectColumns(rows), rows);
  }
}

function collectColumns(rows: readonly TableRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

// ============================================================================
// Record normalisation
// ============================================================================

export interface NormalizeOptions {
  /** Child array (or nested path to one) exploded into one row per element. */
  recordPath?: string | readonly string[];
  /** Parent fields copied onto every exploded row. */
  meta?: ReadonlyArray<string | readonly string[]>;
  recordPrefix?: string;
  separator?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function flatten(value: Record<string, unknown>, separator: string, prefix = '', into: TableRow = {}): TableRow {
  for (const [key, child] of Object.entries(value)) {
    const name = prefix ? `${prefix}${separator}${key}` : key;
    if (isPlainObject(child)) {
      flatten(child, separator, name, into);
    } else {
      into[name] = child;
    }
  }
  return into;
}

function readPath(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const segment of path) {
    if (!isPlainObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

const toPath = (path: string | readonly string[]): readonly string[] => (typeof path === 'string' ? [path] : path);

/**
 * Flattens nested JSON records into table rows (`{a: {b: 1}}` becomes
 * `{'a.b': 1}`). With `recordPath`, each element of the child array becomes
 * its own row carrying the requested `meta` fields of its parent.
 */
export function normalizeRecords(records: readonly unknown[], options: NormalizeOptions = {}): TableRow[] {
  const separator = options.separator ?? '.';
  const rows: TableRow[] = [];

  records.forEach((record, index) => {
    if (!isPlainObject(record)) {
      throw new ResponseShapeError(`Record ${index} is not an object`, record);
    }

    if (options.recordPath === undefined) {
      rows.push(flatten(record, separator));
      return;
    }

    const children = readPath(record, toPath(options.recordPath));
    if (!Array.isArray(children)) return;

    for (const child of children) {
      const flat = isPlainObject(child) ? flatten(child, separator) : { 0: child };
      const row: TableRow = {};
      for (const [key, value] of Object.entries(flat)) {
        row[`${options.recordPrefix ?? ''}${key}`] = value;
      }
      for (const metaPath of options.meta ?? []) {
        const path = toPath(metaPath);
        row[path.join(separator)] = readPath(record, path) ?? null;
      }
      rows.push(row);
    }
  });

  return rows;
}

// ============================================================================
// Column transforms
// ============================================================================

export const DEFAULT_DATE_COLUMNS: readonly string[] = dateColumns;

const NAIVE_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(:\d{2}(\.\d+)?)?)$/;

/**
 * Parses one cell into a `Date`. Timestamps without an offset, `T`- or
 * space-separated, are read as UTC.
 */
export function parseDateCell(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  if (typeof value !== 'string' || value.trim() === '') return null;
  const text = value.trim();
  const naive = NAIVE_TIMESTAMP.exec(text);
  const parsed = new Date(naive ? `${naive[1]}T${naive[2]}Z` : text);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function coerceDateColumns<Row extends TableRow>(
  table: Table<Row>,
  columns: readonly string[] = DEFAULT_DATE_COLUMNS,
): Table {
  const targets = table.columns.filter((column) => columns.includes(column));
  if (targets.length === 0) return table;

  return table.mapRows((row) => {
    const next: TableRow = { ...row };
    for (const column of targets) {
      if (Object.prototype.hasOwnProperty.call(next, column)) {
        next[column] = parseDateCell(next[column]);
      }
    }
    return next;
  }, table.columns);
}

export type ColumnSelector = readonly string[] | ((column: string) => boolean);

const matches = (selector: ColumnSelector, column: string): boolean =>
  typeof selector === 'function' ? selector(column) : selector.includes(column);

export function dropColumns<Row extends TableRow>(table: Table<Row>, selector: ColumnSelector): Table {
  const keep = table.columns.filter((column) => !matches(selector, column));
  return table.mapRows((row) => {
    const next: TableRow = {};
    for (const column of keep) {
      if (Object.prototype.hasOwnProperty.call(row, column)) next[column] = row[column];
    }
    return next;
  }, keep);
}

export type ColumnRenamer = Readonly<Record<string, string>> | ((column: string) => string);

export function renameColumns<Row extends TableRow>(table: Table<Row>, renamer: ColumnRenamer): Table {
  const rename = (column: string): string =>
    typeof renamer === 'function' ? renamer(column) : renamer[column] ?? column;

  const columns: string[] = [];
  for (const column of table.columns) {
    const renamed = rename(column);
    if (!columns.includes(renamed)) columns.push(renamed);
  }

  return table.mapRows((row) => {
    const next: TableRow = {};
    for (const [key, value] of Object.entries(row)) next[rename(key)] = value;
    return next;
  }, columns);
}

/** Reorders so that the listed columns (those present) come first. */
export function moveColumnsFirst<Row extends TableRow>(table: Table<Row>, first: readonly string[]): Table<Row> {
  const leading = first.filter((column) => table.columns.includes(column));
  const rest = table.columns.filter((column) => !leading.includes(column));
  return new Table([...leading, ...rest], table.rows);
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '-',
  mdash: '-',
  hellip: '...',
  rsquo: "'",
  lsquo: "'",
  rdquo: '"',
  ldquo: '"',
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, code: string) => {
    if (code.startsWith('#')) {
      const hex = code[1] === 'x' || code[1] === 'X';
      const point = parseInt(code.slice(hex ? 2 : 1), hex ? 16 : 10);
      return point <= 0x10ffff ? String.fromCodePoint(point) : entity;
    }
    return NAMED_ENTITIES[code.toLowerCase()] ?? entity;
  });
}

export function stripHtml(value: string): string {
  return decodeEntities(value.replace(/<[^>]*>/g, ' '))
    .replace(/\r?\n/g, ' ')
    .replace(/ {2,}/g, ' ')
    .trim();
}

/** Removes markup from text columns: tags become spaces, entities are decoded. */
export function stripHtmlColumns<Row extends TableRow>(table: Table<Row>, columns: readonly string[]): Table {
  const targets = table.columns.filter((column) => columns.includes(column));
  if (targets.length === 0) return table;
  return table.mapRows((row) => {
    const next: TableRow = { ...row };
    for (const column of targets) {
      const value = next[column];
      if (typeof value === 'string') next[column] = stripHtml(value);
    }
    return next;
  }, table.columns);
}

// ============================================================================
// Envelope converters
// ============================================================================

export interface ConverterOptions extends NormalizeOptions {
  /** Date-like columns to coerce; `false` disables coercion. */
  dateColumns?: readonly string[] | false;
  /** Transform applied after normalisation and date coercion. */
  transform?: (table: Table) => Table;
}

const resultsEnvelopeSchema = z.object({ results: z.array(z.unknown()) }).passthrough();
const valueEnvelopeSchema = z.object({ value: z.array(z.unknown()) }).passthrough();

function buildTable(records: readonly unknown[], options: ConverterOptions): Table {
  let table: Table = Table.fromRecords(normalizeRecords(records, options));
  if (options.dateColumns !== false) {
    table = coerceDateColumns(table, options.dateColumns ?? DEFAULT_DATE_COLUMNS);
  }
  return options.transform ? options.transform(table) : table;
}

/**
 * Converter for `{ results: [...] }` envelopes.
 *
 * @example
 * ```typescript
 * const toTable = resultsToTable({
 *   recordPath: 'data',
 *   meta: ['symbol'],
 *   transform: (t) => renameColumns(t, (c) => c.replace(/^change\./, '')),
 * });
 * ```
 */
export function resultsToTable(options: ConverterOptions = {}): (body: unknown) => Table {
  return (body) => {
    const parsed = resultsEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResponseShapeError('Expected a JSON object with a "results" array', body);
    }
    return buildTable(parsed.data.results, options);
  };
}

/** Converter for OData `{ value: [...] }` envelopes; `@odata` annotations are dropped. */
export function odataValueToTable(options: ConverterOptions = {}): (body: unknown) => Table {
  return (body) => {
    const parsed = valueEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResponseShapeError('Expected a JSON object with a "value" array', body);
    }
    const table = dropColumns(buildTable(parsed.data.value, { ...options, transform: undefined }), (column) =>
      column.includes('@odata'),
    );
    return options.transform ? options.transform(table) : table;
  };
}
