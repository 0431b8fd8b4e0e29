/**
 * API module exports.
 *
 * Provides the driver factory and supporting HTTP infrastructure.
 */

import type { Result } from '../core/result';
import type { ScmDriver } from '../domain/scmDriver';
import type { HttpClientOptions, ScmDriverConfig } from '../domain/models/scmOptions';
import { defaultHttpClientOptions } from '../domain/models/scmOptions';
import type { ScmError } from '../domain/models/scmError';
import type { ILogger } from '../services/loggerService';
import { ConcurrencyLimitMiddleware, FetchHttpClient, HttpPipeline } from './httpPipeline';
import type { IHttpClient } from './httpPipeline';
import { ScmDriverFactory } from './drivers/ScmDriverFactory';
import type { RestClient } from './restClient';

export { HttpPipeline, FetchHttpClient, ConcurrencyLimitMiddleware, parseRetryAfter } from './httpPipeline';
export type { IHttpClient, IHttpMiddleware, HttpResponse, HttpRequestOptions } from './httpPipeline';
export { RestClient } from './restClient';
export type { QueryParams } from './restClient';
export { ScmDriverFactory } from './drivers/ScmDriverFactory';
export type { IScmDriverDefinition } from './drivers/IScmDriverDefinition';
export { GiteaGitService, GiteaDriverDefinition } from './drivers/GiteaDriver';
export { GitHubGitService, GitHubDriverDefinition } from './drivers/GitHubDriver';
export { GitLabGitService, GitLabDriverDefinition } from './drivers/GitLabDriver';
export { collectPages, encodePage } from './pagination';
export type { CollectPagesOptions, PageParamNames } from './pagination';

/**
 * Builds the shared HTTP pipeline: fetch with a per-request timeout behind
 * a connection concurrency limit. Nothing in it retries.
 */
export function createHttpClient(logger: ILogger, options: Partial<HttpClientOptions> = {}): IHttpClient {
  const { timeoutMs, maxConnections } = { ...defaultHttpClientOptions, ...options };
  return new HttpPipeline(new FetchHttpClient(logger, timeoutMs), [
    new ConcurrencyLimitMiddleware(logger, maxConnections),
  ]);
}

/**
 * Creates a driver for the configured backend.
 *
 * @example
 * ```typescript
 * const driver = createScmDriver({ provider: 'gitea', endpoint: 'https://git.example.com' }, logger);
 * if (!driver.success) throw new Error(driver.error.message);
 * const tags = await driver.value.git.listTags('platform/api');
 * ```
 */
export function createScmDriver(
  config: ScmDriverConfig,
  logger: ILogger,
  httpOptions?: Partial<HttpClientOptions>,
): Result<ScmDriver, ScmError> {
  return new ScmDriverFactory(logger).create(config, createHttpClient(logger, httpOptions));
}

/**
 * Creates a driver around an existing API client (base URL including the API prefix).
 */
export function createScmDriverFromClient(
  provider: string,
  client: RestClient,
  logger: ILogger,
): Result<ScmDriver, ScmError> {
  return new ScmDriverFactory(logger).fromClient(provider, client);
}
