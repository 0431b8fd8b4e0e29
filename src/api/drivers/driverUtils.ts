/**
 * Shared request helpers for git service drivers.
 * Status folding and error context live here so every driver applies the
 * same policy.
 */

import type { Result } from '../../core/result';
import { ok, fail } from '../../core/result';
import type { PageOptions } from '../../domain/models/pageOptions';
import type { ScmError } from '../../domain/models/scmError';
import { isNotFound } from '../../domain/models/scmError';
import type { ILogger } from '../../services/loggerService';
import type { QueryParams, RestClient } from '../restClient';

/**
 * Data needed to perform one contract operation.
 */
export interface RequestContext {
  readonly client: RestClient;
  readonly logger: ILogger;

  /** Component name used as log prefix (e.g., "GiteaGitService") */
  readonly component: string;

  /** Contract operation name, reported on Decode errors */
  readonly operation: string;

  /** Repository identifier, reported on Decode errors */
  readonly repo: string;

  readonly signal?: AbortSignal;
}

export function createRequestContext(
  client: RestClient,
  logger: ILogger,
  component: string,
  operation: string,
  repo: string,
  signal?: AbortSignal,
): RequestContext {
  return { client, logger, component, operation, repo, signal };
}

export interface OwnerRepo {
  readonly owner: string;
  readonly name: string;
}

/**
 * Splits an "owner/name" identifier.
 */
export function splitRepo(repo: string): Result<OwnerRepo, ScmError> {
  const parts = repo.split('/');
  const [owner, name] = parts;
  if (parts.length !== 2 || !owner || !name) {
    return fail({
      code: 'Validation',
      message: `Invalid repository identifier '${repo}', expected "owner/name"`,
      field: 'repo',
    });
  }
  return ok({ owner, name });
}

/**
 * Rejects empty ref or sha arguments before any request is made.
 */
export function requireArgument(value: string, field: string): ScmError | undefined {
  return value.trim() === '' ? { code: 'Validation', message: `'${field}' must not be empty`, field } : undefined;
}

/**
 * Page-number backends cannot resume from an opaque cursor.
 */
export function rejectCursor(provider: string, operation: string, opts?: PageOptions): ScmError | undefined {
  if (opts?.cursor === undefined) return undefined;
  return {
    code: 'Unsupported',
    message: `${provider} does not support cursor pagination for ${operation}`,
    provider,
    operation,
  };
}

/**
 * Adds the operation and repository to Decode errors.
 */
export function withContext(error: ScmError, ctx: RequestContext): ScmError {
  if (error.code !== 'Decode') return error;
  return { ...error, operation: ctx.operation, repo: ctx.repo };
}

export function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

/**
 * Fetches a listing. A 404 means the repository has nothing to list.
 */
export async function fetchListing<T>(
  ctx: RequestContext,
  path: string,
  query: QueryParams,
  parse: (body: unknown) => Result<T[], ScmError>,
): Promise<Result<T[], ScmError>> {
  const response = await ctx.client.get(path, query, ctx.signal);
  if (!response.success) {
    if (isNotFound(response.error)) {
      ctx.logger.debug(`${ctx.component}: ${ctx.operation} found nothing`, { repo: ctx.repo });
      return ok([]);
    }
    return fail(withContext(response.error, ctx));
  }

  const parsed = parse(response.value.body);
  if (!parsed.success) {
    ctx.logger.error(`${ctx.component}: Malformed ${ctx.operation} response for ${ctx.repo}: ${parsed.error.message}`);
    return fail(withContext(parsed.error, ctx));
  }

  ctx.logger.debug(`${ctx.component}: ${ctx.operation} completed`, { repo: ctx.repo, count: parsed.value.length });
  return parsed;
}

/**
 * Fetches a single entity. A 404 resolves to `undefined`.
 */
export async function fetchEntity<T>(
  ctx: RequestContext,
  path: string,
  query: QueryParams,
  parse: (body: unknown) => Result<T, ScmError>,
  isAbsent: (error: ScmError) => boolean = isNotFound,
): Promise<Result<T | undefined, ScmError>> {
  const response = await ctx.client.get(path, query, ctx.signal);
  if (!response.success) {
    if (isAbsent(response.error)) {
      ctx.logger.debug(`${ctx.component}: ${ctx.operation} target not found`, { repo: ctx.repo });
      return ok(undefined);
    }
    return fail(withContext(response.error, ctx));
  }

  const parsed = parse(response.value.body);
  if (!parsed.success) {
    ctx.logger.error(`${ctx.component}: Malformed ${ctx.operation} response for ${ctx.repo}: ${parsed.error.message}`);
    return fail(withContext(parsed.error, ctx));
  }
  return parsed;
}
