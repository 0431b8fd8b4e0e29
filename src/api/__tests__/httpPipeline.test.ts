import { describe, test, expect, vi, afterEach } from 'vitest';
import { ok } from '../../core/result';
import type { Result } from '../../core/result';
import type { ScmError } from '../../domain/models/scmError';
import { ConcurrencyLimitMiddleware, FetchHttpClient, HttpPipeline, parseRetryAfter } from '../httpPipeline';
import type { HttpResponse, IHttpClient, IHttpMiddleware } from '../httpPipeline';
import { createMockLogger } from '../drivers/__tests__/test-helpers';

const URL_UNDER_TEST = 'https://git.example.com/api/v1/repos/octo/hello/branches';

function stubFetch(response: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

/** Fetch that never answers and rejects once its signal aborts. */
function stubHangingFetch() {
  return stubFetch(
    (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      }),
  );
}

describe('FetchHttpClient', () => {
  const logger = createMockLogger();

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test('decodes a JSON body and forwards headers', async () => {
    const fetchMock = stubFetch(async () => new Response(JSON.stringify([{ name: 'main' }]), { status: 200 }));

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST, {
      headers: { Authorization: 'token test-secret' },
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.status).toBe(200);
      expect(result.value.body).toEqual([{ name: 'main' }]);
    }
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(URL_UNDER_TEST);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ Authorization: 'token test-secret' });
  });

  test('returns a null body for an empty response', async () => {
    stubFetch(async () => new Response(null, { status: 204 }));

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST);

    expect(result.success && result.value.body).toBeNull();
  });

  test.each([401, 403])('maps HTTP %i to Auth', async status => {
    stubFetch(async () => new Response('denied', { status }));

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST);

    expect(result).toEqual({
      success: false,
      error: { code: 'Auth', message: `Authentication failed: HTTP ${status}`, statusCode: status },
    });
  });

  test('maps HTTP 429 to RateLimited with the Retry-After seconds', async () => {
    stubFetch(async () => new Response('slow down', { status: 429, headers: { 'Retry-After': '30' } }));

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST);

    expect(result).toEqual({
      success: false,
      error: { code: 'RateLimited', message: 'Too many requests', retryAfter: 30 },
    });
  });

  test('maps other statuses to Transport with a body excerpt', async () => {
    stubFetch(async () => new Response('x'.repeat(300), { status: 500, statusText: 'Internal Server Error' }));

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'Transport',
        reason: 'status',
        message: 'HTTP 500: Internal Server Error',
        statusCode: 500,
        excerpt: 'x'.repeat(200),
      },
    });
  });

  test('maps HTTP 404 to a not-found Transport error', async () => {
    stubFetch(async () => new Response('{"message":"Not Found"}', { status: 404, statusText: 'Not Found' }));

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({ code: 'Transport', reason: 'status', statusCode: 404 });
    }
  });

  test('reports invalid JSON as Decode', async () => {
    stubFetch(async () => new Response('{"name":', { status: 200 }));

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('Decode');
      expect(result.error.message).toBe('Invalid JSON response');
    }
  });

  test('reports connection failures as network errors', async () => {
    const cause = new TypeError('fetch failed');
    stubFetch(() => Promise.reject(cause));

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST);

    expect(result).toEqual({
      success: false,
      error: { code: 'Transport', reason: 'network', message: 'Failed to connect to server', cause },
    });
  });

  test('times out a request that does not answer', async () => {
    stubHangingFetch();

    const result = await new FetchHttpClient(logger, 10).get(URL_UNDER_TEST);

    expect(result).toEqual({
      success: false,
      error: { code: 'Transport', reason: 'timeout', message: 'Request timed out after 10ms' },
    });
  });

  test('reports cancellation by the caller', async () => {
    stubHangingFetch();
    const controller = new AbortController();

    const pending = new FetchHttpClient(logger).get(URL_UNDER_TEST, { signal: controller.signal });
    controller.abort();
    const result = await pending;

    expect(result).toEqual({
      success: false,
      error: { code: 'Transport', reason: 'cancelled', message: 'Request was cancelled' },
    });
  });

  test('does not send a request that was already cancelled', async () => {
    const fetchMock = stubFetch(async () => new Response('[]'));
    const controller = new AbortController();
    controller.abort();

    const result = await new FetchHttpClient(logger).get(URL_UNDER_TEST, { signal: controller.signal });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({ code: 'Transport', reason: 'cancelled' });
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('parseRetryAfter', () => {
  const now = Date.parse('2024-01-01T00:00:00Z');

  test('reads delta seconds', () => {
    expect(parseRetryAfter('30', now)).toBe(30);
  });

  test('reads an HTTP date relative to now', () => {
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:45 GMT', now)).toBe(45);
    expect(parseRetryAfter('Sun, 31 Dec 2023 23:59:00 GMT', now)).toBe(0);
  });

  test('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null, now)).toBeUndefined();
    expect(parseRetryAfter('soon', now)).toBeUndefined();
  });
});

describe('HttpPipeline', () => {
  const response: Result<HttpResponse, ScmError> = ok({ status: 200, headers: new Headers(), body: null });

  test('runs middleware in declaration order around the client', async () => {
    const calls: string[] = [];
    const client: IHttpClient = {
      get: async url => {
        calls.push(`client ${url}`);
        return response;
      },
    };
    const tracing = (name: string): IHttpMiddleware => ({
      execute: async next => {
        calls.push(`${name} before`);
        const result = await next();
        calls.push(`${name} after`);
        return result;
      },
    });

    const result = await new HttpPipeline(client, [tracing('outer'), tracing('inner')]).get('https://x.test/a');

    expect(result).toBe(response);
    expect(calls).toEqual(['outer before', 'inner before', 'client https://x.test/a', 'inner after', 'outer after']);
  });

  test('hands the request options to each middleware', async () => {
    const client: IHttpClient = { get: async () => ok({ status: 200, headers: new Headers(), body: null }) };
    const seen: Array<AbortSignal | undefined> = [];
    const recording: IHttpMiddleware = {
      execute: async (next, options) => {
        seen.push(options?.signal);
        return next();
      },
    };
    const controller = new AbortController();

    await new HttpPipeline(client, [recording]).get('https://x.test/a', { signal: controller.signal });

    expect(seen).toEqual([controller.signal]);
  });
});

describe('ConcurrencyLimitMiddleware', () => {
  const logger = createMockLogger();
  const response: Result<HttpResponse, ScmError> = ok({ status: 200, headers: new Headers(), body: null });

  const gate = () => {
    let open: () => void = () => {};
    const opened = new Promise<void>(resolve => {
      open = resolve;
    });
    return { opened, open: () => open() };
  };

  test('holds requests over the limit until a slot frees up', async () => {
    const limiter = new ConcurrencyLimitMiddleware(logger, 2);
    const gates = [gate(), gate(), gate()];
    const started: number[] = [];

    const pending = gates.map((g, index) =>
      limiter.execute(async () => {
        started.push(index);
        await g.opened;
        return response;
      }),
    );

    expect(started).toEqual([0, 1]);
    expect(limiter.inFlight).toBe(2);

    gates[0]?.open();
    await vi.waitFor(() => expect(started).toEqual([0, 1, 2]));
    expect(limiter.inFlight).toBe(2);

    gates[1]?.open();
    gates[2]?.open();
    await Promise.all(pending);
    expect(limiter.inFlight).toBe(0);
  });

  test('frees the slot when the request throws', async () => {
    const limiter = new ConcurrencyLimitMiddleware(logger, 1);

    await expect(limiter.execute(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    expect(limiter.inFlight).toBe(0);
    await expect(limiter.execute(async () => response)).resolves.toBe(response);
  });

  test('drops a queued request whose signal aborts', async () => {
    const limiter = new ConcurrencyLimitMiddleware(logger, 1);
    const first = gate();
    const running = limiter.execute(async () => {
      await first.opened;
      return response;
    });
    const controller = new AbortController();
    const queuedNext = vi.fn(async () => response);

    const queued = limiter.execute(queuedNext, { signal: controller.signal });
    controller.abort();

    expect(await queued).toEqual({
      success: false,
      error: { code: 'Transport', reason: 'cancelled', message: 'Request was cancelled while waiting for a connection' },
    });
    expect(queuedNext).not.toHaveBeenCalled();
    expect(limiter.inFlight).toBe(1);

    first.open();
    await running;
    expect(limiter.inFlight).toBe(0);
  });

  test('does not queue a request that was already cancelled', async () => {
    const limiter = new ConcurrencyLimitMiddleware(logger, 1);
    const first = gate();
    const running = limiter.execute(async () => {
      await first.opened;
      return response;
    });
    const controller = new AbortController();
    controller.abort();
    const queuedNext = vi.fn(async () => response);

    const result = await limiter.execute(queuedNext, { signal: controller.signal });

    expect(result.success).toBe(false);
    expect(queuedNext).not.toHaveBeenCalled();

    first.open();
    await running;
    expect(limiter.inFlight).toBe(0);
  });
});
