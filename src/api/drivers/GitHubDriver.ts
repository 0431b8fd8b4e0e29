import { ok, fail } from '../../core/result';
import type { Result } from '../../core/result';
import type { IGitService } from '../../domain/gitService';
import type { Commit } from '../../domain/models/commit';
import type { PageOptions } from '../../domain/models/pageOptions';
import type { Reference } from '../../domain/models/reference';
import type { ScmAuth } from '../../domain/models/scmOptions';
import { defaultEndpoints } from '../../domain/models/scmOptions';
import type { ScmError } from '../../domain/models/scmError';
import { isNotFound } from '../../domain/models/scmError';
import type { Tree } from '../../domain/models/tree';
import { parseGitHubBranches, parseGitHubCommit, parseGitHubTags, parseGitHubTree } from '../../domain/parsers/githubParser';
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

/** Largest `per_page` GitHub accepts. */
export const GITHUB_PAGE_CAP = 100;

const GITHUB_PAGE_PARAMS = { page: 'page', size: 'per_page' } as const;

/** GitHub answers 422 rather than 404 for a commit ref that names no object. */
function isUnknownCommit(error: ScmError): boolean {
  return isNotFound(error) || (error.code === 'Transport' && error.reason === 'status' && error.statusCode === 422);
}

/**
 * Git service for GitHub and GitHub Enterprise Server.
 *
 * GitHub specifics:
 * - The endpoint is the API root (`https://api.github.com`, or `https://host/api/v3` on GHES)
 * - `recursive` is honored for any value, so it is only sent when recursion is wanted
 * - Commits are looked up through `/commits/{ref}`, which accepts shas, branches and tags
 *
 * @see https://docs.github.com/rest/git/trees
 */
export class GitHubGitService implements IGitService {
  constructor(private readonly client: RestClient, private readonly logger: ILogger) {}

  async listBranches(repo: string, opts?: PageOptions, signal?: AbortSignal): Promise<Result<Reference[], ScmError>> {
    return this.listRefs('listBranches', 'branches', parseGitHubBranches, repo, opts, signal);
  }

  async listTags(repo: string, opts?: PageOptions, signal?: AbortSignal): Promise<Result<Reference[], ScmError>> {
    return this.listRefs('listTags', 'tags', parseGitHubTags, repo, opts, signal);
  }

  async findCommit(repo: string, ref: string, signal?: AbortSignal): Promise<Result<Commit | undefined, ScmError>> {
    const invalid = requireArgument(ref, 'ref');
    if (invalid) return fail(invalid);
    const path = splitRepo(repo);
    if (!path.success) return path;

    const ctx = createRequestContext(this.client, this.logger, 'GitHubGitService', 'findCommit', repo, signal);
    return fetchEntity(
      ctx,
      `${this.repoPath(path.value)}/commits/${encodeURIComponent(ref)}`,
      {},
      parseGitHubCommit,
      isUnknownCommit,
    );
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
    const ctx = createRequestContext(this.client, this.logger, 'GitHubGitService', 'getTree', repo, signal);
    const tree = await fetchEntity(
      ctx,
      `${repoPath}/git/trees/${encodeURIComponent(treeSha)}`,
      { recursive: recursive ? 1 : undefined },
      body =>
        parseGitHubTree(body, (type, sha) => {
          const kind = type === 'tree' ? 'trees' : type === 'blob' ? 'blobs' : 'commits';
          return this.client.url(`${repoPath}/git/${kind}/${sha}`);
        }),
    );

    if (tree.success && tree.value?.truncated) {
      this.logger.warn('GitHubGitService: Tree listing truncated by server', {
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
    const unsupported = rejectCursor('github', operation, opts);
    if (unsupported) return fail(unsupported);
    const path = splitRepo(repo);
    if (!path.success) return path;

    const ctx = createRequestContext(this.client, this.logger, 'GitHubGitService', operation, repo, signal);
    return fetchListing(
      ctx,
      `${this.repoPath(path.value)}/${segment}`,
      encodePage(opts, GITHUB_PAGE_PARAMS, GITHUB_PAGE_CAP),
      parse,
    );
  }

  private repoPath(repo: OwnerRepo): string {
    return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`;
  }
}

/**
 * Driver definition for GitHub.
 */
export class GitHubDriverDefinition implements IScmDriverDefinition {
  readonly provider = 'github' as const;
  readonly defaultEndpoint = defaultEndpoints.github;
  readonly apiPrefix = '';

  buildHeaders(auth: ScmAuth): Result<Record<string, string>, ScmError> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };

    if (auth.type === 'bearer') {
      headers['Authorization'] = `Bearer ${auth.token}`;
    } else if (auth.type === 'basic') {
      headers['Authorization'] = basicAuthorization(auth.username, auth.password);
    }

    return ok(headers);
  }

  createGitService(client: RestClient, logger: ILogger): IGitService {
    return new GitHubGitService(client, logger);
  }
}
