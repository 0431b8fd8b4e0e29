import type { Result } from '../core/result';
import { ok, fail } from '../core/result';
import type { ScmError } from '../domain/models/scmError';
import { excerpt } from '../domain/models/scmError';
import type { ILogger } from '../services/loggerService';

/**
 * Options for a single GET request.
 */
export interface HttpRequestOptions {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * Successful (2xx) response with its JSON body decoded.
 * `body` is `null` for an empty response.
 */
export interface HttpResponse {
  readonly status: number;
  readonly headers: Headers;
  readonly body: unknown;
}

/**
 * Basic HTTP client interface.
 */
export interface IHttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<Result<HttpResponse, ScmError>>;
}

/**
 * HTTP middleware interface for request/response processing.
 */
export interface IHttpMiddleware {
  /**
   * Process a request and optionally modify it or the response.
   *
   * @param next - Function to call the next middleware in the chain
   * @param options - Options of the request being processed
   * @returns Result of the HTTP operation
   */
  execute(
    next: () => Promise<Result<HttpResponse, ScmError>>,
    options?: HttpRequestOptions,
  ): Promise<Result<HttpResponse, ScmError>>;
}

/**
 * HTTP pipeline that applies middleware to requests.
 * Uses Decorator pattern to compose middleware layers.
 *
 * @example
 * ```typescript
 * const pipeline = new HttpPipeline(new FetchHttpClient(logger), [new ConcurrencyLimitMiddleware(logger, 8)]);
 * const result = await pipeline.get('https://git.example.com/api/v1/version');
 * ```
 */
export class HttpPipeline implements IHttpClient {
  constructor(private readonly baseClient: IHttpClient, private readonly middleware: IHttpMiddleware[] = []) {}

  async get(url: string, options?: HttpRequestOptions): Promise<Result<HttpResponse, ScmError>> {
    // Build middleware chain (reverse order so first middleware runs first)
    let execute = async () => this.baseClient.get(url, options);

    for (let i = this.middleware.length - 1; i >= 0; i--) {
      const mw = this.middleware[i];
      if (!mw) continue;
      const current = execute;
      execute = () => mw.execute(current, options);
    }

    return execute();
  }
}

/**
 * Caps the number of in-flight requests, acting as the connection pool
 * limit. Requests over the limit wait for a slot in arrival order.
 */
export class ConcurrencyLimitMiddleware implements IHttpMiddleware {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly logger: ILogger, private readonly maxConcurrent: number = 16) {}

  async execute(
    next: () => Promise<Result<HttpResponse, ScmError>>,
    options?: HttpRequestOptions,
  ): Promise<Result<HttpResponse, ScmError>> {
    if (this.active >= this.maxConcurrent) {
      this.logger.debug('ConcurrencyLimitMiddleware: Waiting for a free connection', {
        active: this.active,
        queued: this.waiting.length + 1,
      });
      // The releasing request hands its slot over, so `active` is not bumped here
      const acquired = await this.waitForSlot(options?.signal);
      if (!acquired) {
        return fail({
          code: 'Transport',
          reason: 'cancelled',
          message: 'Request was cancelled while waiting for a connection',
        });
      }
    } else {
      this.active++;
    }

    try {
      return await next();
    } finally {
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter();
      } else {
        this.active--;
      }
    }
  }

  /**
   * Queues for a slot. Resolves `false` when the signal aborts first; the
   * aborted request leaves the queue and never takes a slot.
   */
  private waitForSlot(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    return new Promise<boolean>(resolve => {
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      };
      const onAbort = () => {
        const index = this.waiting.indexOf(grant);
        if (index >= 0) {
          this.waiting.splice(index, 1);
        }
        resolve(false);
      };
      this.waiting.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Number of requests currently holding a slot. */
  get inFlight(): number {
    return this.active;
  }
}

/**
 * Converts a Retry-After header (delta-seconds or HTTP date) to seconds.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Fetch-based HTTP client implementation.
 * Uses native Node.js fetch for HTTP requests.
 */
export class FetchHttpClient implements IHttpClient {
  constructor(private readonly logger: ILogger, private readonly timeout: number = 30000) {}

  async get(url: string, options?: HttpRequestOptions): Promise<Result<HttpResponse, ScmError>> {
    this.logger.debug('FetchHttpClient: GET request', { url });

    if (options?.signal?.aborted) {
      return fail({ code: 'Transport', reason: 'cancelled', message: 'Request was cancelled before it started' });
    }

    // Combined abort controller for internal timeout + caller signal
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = () => controller.abort();
    options?.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: options?.headers ?? {},
      });
      const text = await response.text();

      // Handle authentication errors
      if (response.status === 401 || response.status === 403) {
        this.logger.error(`FetchHttpClient: Authentication failed (${response.status}) for URL: ${url}`);
        return fail({
          code: 'Auth',
          message: `Authentication failed: HTTP ${response.status}`,
          statusCode: response.status,
        });
      }

      // Handle rate limiting
      if (response.status === 429) {
        const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
        this.logger.warn('FetchHttpClient: Rate limited', { url, retryAfter });
        return fail({
          code: 'RateLimited',
          message: 'Too many requests',
          retryAfter,
        });
      }

      // Handle HTTP errors
      if (!response.ok) {
        // 404s are expected lookups for absent refs and trees
        if (response.status === 404) {
          this.logger.debug(`FetchHttpClient: Resource not found (404): ${url}`);
        } else {
          this.logger.error(`FetchHttpClient: HTTP error ${response.status} ${response.statusText} for URL: ${url}`);
        }
        return fail({
          code: 'Transport',
          reason: 'status',
          message: `HTTP ${response.status}: ${response.statusText}`,
          statusCode: response.status,
          excerpt: excerpt(text),
        });
      }

      // Parse JSON response
      let body: unknown = null;
      if (text.trim() !== '') {
        try {
          body = JSON.parse(text);
        } catch (parseError) {
          this.logger.error(
            `FetchHttpClient: Failed to parse JSON from ${url}`,
            parseError instanceof Error ? parseError : undefined,
          );
          return fail({
            code: 'Decode',
            message: 'Invalid JSON response',
            details: parseError instanceof Error ? parseError.message : String(parseError),
          });
        }
      }

      return ok({ status: response.status, headers: response.headers, body });
    } catch (error) {
      // Handle abort/timeout
      if (controller.signal.aborted) {
        const cancelledByCaller = options?.signal?.aborted === true;
        this.logger.warn('FetchHttpClient: Request aborted', { url, cancelledByCaller });
        return cancelledByCaller
          ? fail({ code: 'Transport', reason: 'cancelled', message: 'Request was cancelled' })
          : fail({ code: 'Transport', reason: 'timeout', message: `Request timed out after ${this.timeout}ms` });
      }

      // Handle network errors
      this.logger.error(`FetchHttpClient: Network error: ${error instanceof Error ? error.message : String(error)}`);
      return fail({
        code: 'Transport',
        reason: 'network',
        message: 'Failed to connect to server',
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      options?.signal?.removeEventListener('abort', onAbort);
    }
  }
}
