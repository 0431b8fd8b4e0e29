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
import type { Tree, TreeEntry } from '../../domain/models/tree';
import {
  parseGitLabBranches,
  parseGitLabCommit,
  parseGitLabTags,
  parseGitLabTreePage,
} from '../../domain/parsers/gitlabParser';
import type { ILogger } from '../../services/loggerService';
import { encodePage } from '../pagination';
import type { RestClient } from '../restClient';
import type { IScmDriverDefinition } from './IScmDriverDefinition';
import {
  createRequestContext,
  fetchEntity,
  fetchListing,
  rejectCursor,
  requireArgument,
  withContext,
} from './driverUtils';

/** Largest `per_page` GitLab accepts. */
export const GITLAB_PAGE_CAP = 100;

/** Tree pages fetched before a listing is reported as truncated. */
export const GITLAB_TREE_MAX_PAGES = 10;

const GITLAB_PAGE_PARAMS = { page: 'page', size: 'per_page' } as const;

/**
 * Git service for GitLab via REST API v4.
 *
 * GitLab specifics:
 * - Projects are addressed by their URL-encoded full path, so nested groups work
 * - Tokens go in the `PRIVATE-TOKEN` header; basic credentials are not accepted
 * - The tree endpoint takes a tree-ish `ref` (commit sha, branch or tag) and has no
 *   truncation flag: pages are followed through `x-next-page` up to
 *   {@link GITLAB_TREE_MAX_PAGES}, and anything left is reported as truncated
 *
 * @see https://docs.gitlab.com/ee/api/repositories.html#list-repository-tree
 */
export class GitLabGitService implements IGitService {
  constructor(private readonly client: RestClient, private readonly logger: ILogger) {}

  async listBranches(repo: string, opts?: PageOptions, signal?: AbortSignal): Promise<Result<Reference[], ScmError>> {
    return this.listRefs('listBranches', 'branches', parseGitLabBranches, repo, opts, signal);
  }

  async listTags(repo: string, opts?: PageOptions, signal?: AbortSignal): Promise<Result<Reference[], ScmError>> {
    return this.listRefs('listTags', 'tags', parseGitLabTags, repo, opts, signal);
  }

  async findCommit(repo: string, ref: string, signal?: AbortSignal): Promise<Result<Commit | undefined, ScmError>> {
    const invalid = requireArgument(ref, 'ref');
    if (invalid) return fail(invalid);
    const project = this.projectPath(repo);
    if (!project.success) return project;

    const ctx = createRequestContext(this.client, this.logger, 'GitLabGitService', 'findCommit', repo, signal);
    return fetchEntity(
      ctx,
      `${project.value}/repository/commits/${encodeURIComponent(ref)}`,
      {},
      parseGitLabCommit,
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
    const project = this.projectPath(repo);
    if (!project.success) return project;

    const ctx = createRequestContext(this.client, this.logger, 'GitLabGitService', 'getTree', repo, signal);
    const treePath = `${project.value}/repository/tree`;
    const objectUrl = (type: string, sha: string) =>
      type === 'blob'
        ? this.client.url(`${project.value}/repository/blobs/${sha}`)
        : this.client.url(treePath, { ref: sha });

    const entries: TreeEntry[] = [];
    let page = 1;
    let hasMore = true;

    for (let fetched = 0; hasMore && fetched < GITLAB_TREE_MAX_PAGES; fetched++) {
      const query = { ref: treeSha, recursive, page, per_page: GITLAB_PAGE_CAP };
      const response = await this.client.get(treePath, query, signal);
      if (!response.success) {
        if (page === 1 && isNotFound(response.error)) {
          this.logger.debug('GitLabGitService: getTree target not found', { repo, treeSha });
          return ok(undefined);
        }
        return fail(withContext(response.error, ctx));
      }

      const parsed = parseGitLabTreePage(response.value.body, objectUrl);
      if (!parsed.success) {
        this.logger.error(`GitLabGitService: Malformed getTree response for ${repo}: ${parsed.error.message}`);
        return fail(withContext(parsed.error, ctx));
      }
      entries.push(...parsed.value);

      const next = response.value.headers.get('x-next-page');
      if (next === null) {
        hasMore = parsed.value.length >= GITLAB_PAGE_CAP;
        page++;
      } else {
        const nextPage = parseInt(next, 10);
        hasMore = Number.isInteger(nextPage) && nextPage > page;
        page = hasMore ? nextPage : page + 1;
      }
    }

    if (hasMore) {
      this.logger.warn('GitLabGitService: Tree listing truncated after page budget', {
        repo,
        treeSha,
        entries: entries.length,
      });
    }

    return ok({
      sha: treeSha,
      url: this.client.url(treePath, { ref: treeSha, recursive }),
      entries,
      truncated: hasMore,
    });
  }

  private async listRefs(
    operation: string,
    segment: string,
    parse: (body: unknown) => Result<Reference[], ScmError>,
    repo: string,
    opts?: PageOptions,
    signal?: AbortSignal,
  ): Promise<Result<Reference[], ScmError>> {
    const unsupported = rejectCursor('gitlab', operation, opts);
    if (unsupported) return fail(unsupported);
    const project = this.projectPath(repo);
    if (!project.success) return project;

    const ctx = createRequestContext(this.client, this.logger, 'GitLabGitService', operation, repo, signal);
    return fetchListing(
      ctx,
      `${project.value}/repository/${segment}`,
      encodePage(opts, GITLAB_PAGE_PARAMS, GITLAB_PAGE_CAP),
      parse,
    );
  }

  /**
   * Encodes a "group[/subgroup...]/name" path as a project id.
   */
  private projectPath(repo: string): Result<string, ScmError> {
    const segments = repo.split('/');
    if (segments.length < 2 || segments.some(s => s === '')) {
      return fail({
        code: 'Validation',
        message: `Invalid repository identifier '${repo}', expected "group/name"`,
        field: 'repo',
      });
    }
    return ok(`/projects/${encodeURIComponent(repo)}`);
  }
}

/**
 * Driver definition for GitLab.
 */
export class GitLabDriverDefinition implements IScmDriverDefinition {
  readonly provider = 'gitlab' as const;
  readonly defaultEndpoint = defaultEndpoints.gitlab;
  readonly apiPrefix = '/api/v4';

  buildHeaders(auth: ScmAuth): Result<Record<string, string>, ScmError> {
    switch (auth.type) {
      case 'bearer':
        return ok({ 'PRIVATE-TOKEN': auth.token });
      case 'basic':
        return fail({
          code: 'Configuration',
          message: 'GitLab does not accept basic credentials; configure an access token',
          field: 'auth',
        });
      case 'none':
        return ok({});
    }
  }

  createGitService(client: RestClient, logger: ILogger): IGitService {
    return new GitLabGitService(client, logger);
  }
}
