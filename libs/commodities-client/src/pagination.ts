import { z } from 'zod';
import type { PageContext, PaginateFn, Paginator } from './types';
import { ResponseShapeError } from './types';

const pageCount = z.coerce.number().int().nonnegative();

const metadataSchema = z.object({
  metadata: z
    .object({
      totalPages: pageCount.optional(),
      total_pages: pageCount.optional(),
      count: pageCount.optional(),
      pageSize: pageCount.optional(),
      pagesize: pageCount.optional(),
    })
    .passthrough(),
});

const odataSchema = z.object({ '@odata.count': pageCount }).passthrough();

const ceilPages = (count: number, size: number): number => (size > 0 ? Math.ceil(count / size) : 0);

const single = (key: string, kind: Paginator['kind'], totalPages: number): Paginator => ({
  hasMorePages: false,
  key,
  totalPages,
  kind,
});

/** Never follows further pages. */
export const noPagination: PaginateFn = () => single('page', 'page', 1);

/**
 * Reads the page count from a `metadata` block: `totalPages` (or
 * `total_pages`) when present, otherwise `ceil(count / pageSize)`.
 */
export function metadataPaginator(key = 'page'): PaginateFn {
  return ({ body }: PageContext): Paginator => {
    const parsed = metadataSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResponseShapeError('Response has no usable "metadata" block for pagination', body);
    }

    const meta = parsed.data.metadata;
    let totalPages = meta.totalPages ?? meta.total_pages;
    if (totalPages === undefined) {
      const size = meta.pageSize ?? meta.pagesize;
      if (meta.count === undefined || size === undefined) {
        throw new ResponseShapeError('Pagination metadata lacks totalPages or count/pageSize', body);
      }
      totalPages = ceilPages(meta.count, size);
    }

    if (totalPages <= 1) {
      return single(key, 'page', Math.max(totalPages, 1));
    }
    return { hasMorePages: true, key, totalPages, kind: 'page' };
  };
}

function requestPageSize(ctx: PageContext): number | undefined {
  const fromParams = ctx.params.pageSize;
  const raw = fromParams !== undefined ? String(fromParams) : readQueryParam(ctx.url, 'pageSize');
  if (raw === undefined) return undefined;
  const size = Number(raw);
  return Number.isInteger(size) && size > 0 ? size : undefined;
}

function readQueryParam(url: string, name: string): string | undefined {
  try {
    return new URL(url).searchParams.get(name) ?? undefined;
  } catch {
    return undefined;
  }
}

/**
 * OData endpoints report `@odata.count`; pages are addressed by `$skip`
 * multiples of the requested `pageSize`. Without a page size there is
 * nothing to page through.
 */
export function odataPaginator(key = '$skip'): PaginateFn {
  return (ctx: PageContext): Paginator => {
    const parsed = odataSchema.safeParse(ctx.body);
    if (!parsed.success) {
      throw new ResponseShapeError('Response has no "@odata.count"; request it with $count=true', ctx.body);
    }

    const size = requestPageSize(ctx);
    if (size === undefined) {
      return single(key, 'odata', 0);
    }

    const totalPages = ceilPages(parsed.data['@odata.count'], size);
    if (totalPages <= 1) {
      return single(key, 'odata', totalPages);
    }
    return { hasMorePages: true, key, totalPages, kind: 'odata' };
  };
}
