import type { Result } from '../core/result';
import type { ScmError } from '../domain/models/scmError';
import type { HttpResponse, IHttpClient } from './httpPipeline';

export type QueryParams = Record<string, string | number | boolean | undefined>;

const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'application/json',
  'User-Agent': 'scm-drivers/0.1.0',
};

/**
 * HTTP client bound to one backend: base URL plus the credential headers
 * sent with every request.
 *
 * **Security Note**: the bound headers carry credentials. They are never
 * logged and never exposed through {@link url}.
 */
export class RestClient {
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(baseUrl: string, private readonly http: IHttpClient, authHeaders: Record<string, string> = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.headers = { ...DEFAULT_HEADERS, ...authHeaders };
  }

  /**
   * Builds an absolute URL. `undefined` query values are skipped.
   *
   * @param path - Already-encoded path starting with "/"
   */
  url(path: string, query: QueryParams = {}): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) search.set(key, String(value));
    }
    const qs = search.toString();
    return `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;
  }

  get(path: string, query?: QueryParams, signal?: AbortSignal): Promise<Result<HttpResponse, ScmError>> {
    return this.http.get(this.url(path, query), { signal, headers: { ...this.headers } });
  }
}
