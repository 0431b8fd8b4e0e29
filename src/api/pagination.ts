import type { Result } from '../core/result';
import { ok } from '../core/result';
import type { PageOptions } from '../domain/models/pageOptions';
import type { ScmError } from '../domain/models/scmError';
import type { QueryParams } from './restClient';

/**
 * Query parameter names a backend uses for page-number pagination.
 */
export interface PageParamNames {
  readonly page: string;
  readonly size: string;
}

/**
 * Encodes page options as backend query parameters.
 *
 * Zero, negative or absent values are omitted so the backend default
 * applies; `size` is clamped to the backend's maximum.
 */
export function encodePage(opts: PageOptions | undefined, names: PageParamNames, cap: number): QueryParams {
  const query: QueryParams = {};
  if (opts?.page !== undefined && opts.page > 0) {
    query[names.page] = Math.floor(opts.page);
  }
  if (opts?.size !== undefined && opts.size > 0) {
    query[names.size] = Math.min(Math.floor(opts.size), cap);
  }
  return query;
}

export interface CollectPagesOptions {
  /** Items requested per page (default: 50) */
  size?: number;

  /** Upper bound on requests (default: 100) */
  maxPages?: number;
}

/**
 * Walks a page-number listing from page 1 and concatenates the results.
 *
 * Stops at a page shorter than `size`, at a page that adds no new name (a
 * backend ignoring the page parameter), after `maxPages`, or at the first
 * error. Names already seen on earlier pages are dropped. `size` must not
 * exceed the backend's page cap, or every page looks short.
 *
 * @example
 * ```typescript
 * const all = await collectPages(opts => driver.git.listBranches('octo/hello', opts));
 * ```
 */
export async function collectPages<T extends { readonly name: string }>(
  fetchPage: (opts: PageOptions) => Promise<Result<T[], ScmError>>,
  options: CollectPagesOptions = {},
): Promise<Result<T[], ScmError>> {
  const size = options.size ?? 50;
  const maxPages = options.maxPages ?? 100;
  const seen = new Set<string>();
  const items: T[] = [];

  for (let page = 1; page <= maxPages; page++) {
    const result = await fetchPage({ page, size });
    if (!result.success) {
      return result;
    }

    let added = 0;
    for (const item of result.value) {
      if (seen.has(item.name)) continue;
      seen.add(item.name);
      items.push(item);
      added++;
    }

    if (added === 0 || result.value.length < size) {
      break;
    }
  }

  return ok(items);
}
