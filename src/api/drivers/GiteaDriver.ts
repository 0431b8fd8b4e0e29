import { ok, fail } from '../../core/result';
import type { Result } from '../../core/result';
import type { IGitService } from '../../domain/gitService';
import type { Commit } from '../../domain/models/commit';
import type { PageOptions } from '../../domain/models/pageOptions';
import type { Reference } from '../../domain/models/reference';
import type { ScmAuth } from '../../domain/models/scmOptions';
import { defaultEndpoints } from '../../domain/models/scmOptions';
import type { ScmError } from '../../domain/models/scmError';
import type { Tree } from '../../domain/models/tree';
import {
  GITEA_TREE_PAGE_CAP,
  parseGiteaBranches,
  parseGiteaCommit,
  parseGiteaTags,
  parseGiteaTree,
} from '../../domain/parsers/giteaParser';
import type { ObjectUrlBuilder } from '../../domain/parsers/wire';
import type { ILogger } from '../../services/loggerService';
import { encodePage } from '../pagination';
import type { RestClient } from '../restClient';
import type { IScmDriverDefinition } from './IScmDriverDefinition';
import type { OwnerRepo } from './driverUtils';
import {
  basicAuthorization,
  createRequestContext,
  fetchEntity,
  fetchListing,
  rejectCursor,
  requireArgument,
  splitRepo,
} from './driverUtils';

/** Gitea's default `MAX_RESPONSE_ITEMS` for `limit`. */
export const GITEA_PAGE_CAP = 50;

const GITEA_PAGE_PARAMS = { page: 'page', size: 'limit' } as const;

/**
 * Git service for Gitea (and API-compatible forks) via REST API v1.
 *
 * Gitea specifics:
 * - Token auth uses the `token` scheme (`Authorization: token <t>`)
 * - Page size is passed as `limit` and capped at 50
 * - Trees are paged with `per_page`; the payload carries its own `truncated` flag
 *
 * @see https://try.gitea.io/api/swagger
 *
 * @example
 * ```typescript
 * const git = new GiteaGitService(new RestClient('https://git.example.com/api/v1', http), logger);
 * const result = await git.listTags('platform/api', { page: 2, size: 20 });
 * ```
 */
export class GiteaGitService implements IGitService {
  constructor(private readonly client: RestClient, private readonly logger: ILogger) {}

  async listBranches(repo: string, opts?: PageOptions, signal?: AbortSignal): Promise<Result<Reference[], ScmError>> {
    return this.listRefs('listBranches', 'branches', parseGiteaBranches, repo, opts, signal);
  }

  async listTags(repo: string, opts?: PageOptions, signal?: AbortSignal): Promise<Result<Reference[], ScmError>> {
    return this.listRefs('listTags', 'tags', parseGiteaTags, repo, opts, signal);
  }

  async findCommit(repo: string, ref: string, signal?: AbortSignal): Promise<Result<Commit | undefined, ScmError>> {
    const invalid = requireArgument(ref, 'ref');
    if (invalid) return fail(invalid);
    const path = splitRepo(repo);
    if (!path.success) return path;

    const ctx = createRequestContext(this.client, this.logger, 'GiteaGitService', 'findCommit', repo, signal);
    return fetchEntity(ctx, `${this.repoPath(path.value)}/git/commits/${encodeURIComponent(ref)}`, {}, parseGiteaCommit);
  }

  async getTree(
    repo: string,
    treeSha: string,
    recursive?: boolean,
    signal?: AbortSignal,
  ): Promise<Result<Tree | undefined, ScmError>> {
    const invalid = requireArgument(treeSha, 'treeSha');
    if (invalid) return fail(invalid);
    const path = splitRepo(repo);
    if (!path.success) return path;

    const repoPath = this.repoPath(path.value);
    const objectUrl = this.objectUrlBuilder(repoPath);
    const ctx = createRequestContext(this.client, this.logger, 'GiteaGitService', 'getTree', repo, signal);
    const tree = await fetchEntity(
      ctx,
      `${repoPath}/git/trees/${encodeURIComponent(treeSha)}`,
      { recursive, per_page: GITEA_TREE_PAGE_CAP },
      body => parseGiteaTree(body, objectUrl, GITEA_TREE_PAGE_CAP),
    );

    if (tree.success && tree.value?.truncated) {
      this.logger.warn('GiteaGitService: Tree listing truncated by server', {
        repo,
        treeSha,
        entries: tree.value.entries.length,
      });
    }
    return tree;
  }

  private async listRefs(
    operation: string,
    segment: string,
    parse: (body: unknown) => Result<Reference[], ScmError>,
    repo: string,
    opts?: PageOptions,
    signal?: AbortSignal,
  ): Promise<Result<Reference[], ScmError>> {
    const unsupported = rejectCursor('gitea', operation, opts);
    if (unsupported) return fail(unsupported);
    const path = splitRepo(repo);
    if (!path.success) return path;

    const ctx = createRequestContext(this.client, this.logger, 'GiteaGitService', operation, repo, signal);
    return fetchListing(
      ctx,
      `${this.repoPath(path.value)}/${segment}`,
      encodePage(opts, GITEA_PAGE_PARAMS, GITEA_PAGE_CAP),
      parse,
    );
  }

  private repoPath(repo: OwnerRepo): string {
    return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`;
  }

  private objectUrlBuilder(repoPath: string): ObjectUrlBuilder {
    return (type, sha) => {
      const kind = type === 'tree' ? 'trees' : type === 'blob' ? 'blobs' : 'commits';
      return this.client.url(`${repoPath}/git/${kind}/${sha}`);
    };
  }
}

/**
 * Driver definition for Gitea.
 */
export class GiteaDriverDefinition implements IScmDriverDefinition {
  readonly provider = 'gitea' as const;
  readonly defaultEndpoint = defaultEndpoints.gitea;
  readonly apiPrefix = '/api/v1';

  buildHeaders(auth: ScmAuth): Result<Record<string, string>, ScmError> {
    switch (auth.type) {
      case 'bearer':
        return ok({ Authorization: `token ${auth.token}` });
      case 'basic':
        return ok({ Authorization: basicAuthorization(auth.username, auth.password) });
      case 'none':
        return ok({});
    }
  }

  createGitService(client: RestClient, logger: ILogger): IGitService {
    return new GiteaGitService(client, logger);
  }
}
