import { describe, test, expect } from 'vitest';
import { ok, fail } from '../../core/result';
import type { Result } from '../../core/result';
import type { PageOptions } from '../../domain/models/pageOptions';
import type { Reference } from '../../domain/models/reference';
import { collectPages, encodePage } from '../pagination';

const names = { page: 'page', size: 'limit' };

const ref = (name: string): Reference => ({ name, path: `refs/heads/${name}`, sha: `${name}-sha` });

describe('encodePage', () => {
  test('omits absent, zero and negative values', () => {
    expect(encodePage(undefined, names, 50)).toEqual({});
    expect(encodePage({ page: 0, size: -5 }, names, 50)).toEqual({});
  });

  test('floors values and clamps size to the cap', () => {
    expect(encodePage({ page: 2.7, size: 80 }, names, 50)).toEqual({ page: 2, limit: 50 });
    expect(encodePage({ page: 1, size: 10 }, { page: 'page', size: 'per_page' }, 100)).toEqual({
      page: 1,
      per_page: 10,
    });
  });
});

describe('collectPages', () => {
  const pagesOf = (pages: string[][]) => {
    const requested: PageOptions[] = [];
    const fetchPage = async (opts: PageOptions): Promise<Result<Reference[]>> => {
      requested.push(opts);
      return ok((pages[(opts.page ?? 1) - 1] ?? []).map(ref));
    };
    return { requested, fetchPage };
  };

  test('walks pages until a short page', async () => {
    const { requested, fetchPage } = pagesOf([['a', 'b'], ['c', 'd'], ['e']]);

    const result = await collectPages(fetchPage, { size: 2 });

    expect(result.success && result.value.map(r => r.name)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(requested).toEqual([
      { page: 1, size: 2 },
      { page: 2, size: 2 },
      { page: 3, size: 2 },
    ]);
  });

  test('stops when a backend ignores the page parameter', async () => {
    let calls = 0;
    const fetchPage = async (): Promise<Result<Reference[]>> => {
      calls++;
      return ok([ref('a'), ref('b')]);
    };

    const result = await collectPages(fetchPage, { size: 2 });

    expect(calls).toBe(2);
    expect(result.success && result.value.map(r => r.name)).toEqual(['a', 'b']);
  });

  test('never returns a name twice', async () => {
    const { fetchPage } = pagesOf([['a', 'a', 'b'], ['b', 'c', 'd'], []]);

    const result = await collectPages(fetchPage, { size: 3 });

    expect(result.success && result.value.map(r => r.name)).toEqual(['a', 'b', 'c', 'd']);
  });

  test('stops after maxPages', async () => {
    let calls = 0;
    const fetchPage = async (opts: PageOptions): Promise<Result<Reference[]>> => {
      calls++;
      return ok([ref(`branch-${opts.page}`)]);
    };

    const result = await collectPages(fetchPage, { size: 1, maxPages: 3 });

    expect(calls).toBe(3);
    expect(result.success && result.value).toHaveLength(3);
  });

  test('returns the first error', async () => {
    const fetchPage = async (opts: PageOptions): Promise<Result<Reference[]>> =>
      opts.page === 1
        ? ok([ref('a')])
        : fail({ code: 'RateLimited', message: 'Too many requests', retryAfter: 5 });

    const result = await collectPages(fetchPage, { size: 1 });

    expect(result).toEqual({
      success: false,
      error: { code: 'RateLimited', message: 'Too many requests', retryAfter: 5 },
    });
  });
});
