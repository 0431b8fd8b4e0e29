import type { Result } from '../core/result';
import type { Commit } from './models/commit';
import type { PageOptions } from './models/pageOptions';
import type { Reference } from './models/reference';
import type { ScmError } from './models/scmError';
import type { Tree } from './models/tree';

/**
 * Read-only git hosting contract.
 *
 * Every driver implements this interface so callers never branch on the
 * hosting backend. Each call performs one logical fetch; absent entities
 * resolve to `undefined` (lookups) or `[]` (listings), every other failure
 * is an {@link ScmError}.
 *
 * @example
 * ```typescript
 * const branches = await git.listBranches('octo/hello', { page: 1, size: 50 });
 * if (branches.success) {
 *   const main = branches.value.find(b => b.name === 'main');
 * }
 * ```
 */
export interface IGitService {
  /**
   * Lists the repository's branches.
   *
   * @param repo - "owner/name" identifier
   * @param signal - Aborts the in-flight request
   */
  listBranches(repo: string, opts?: PageOptions, signal?: AbortSignal): Promise<Result<Reference[], ScmError>>;

  /**
   * Lists the repository's tags. Tag references point at the tagged commit.
   */
  listTags(repo: string, opts?: PageOptions, signal?: AbortSignal): Promise<Result<Reference[], ScmError>>;

  /**
   * Finds a commit by sha, branch or tag name.
   *
   * @returns `undefined` when the backend has no such commit
   */
  findCommit(repo: string, ref: string, signal?: AbortSignal): Promise<Result<Commit | undefined, ScmError>>;

  /**
   * Returns a single tree by its sha or a tree-ish ref.
   *
   * @param recursive - List nested entries too; backend default when omitted
   * @returns `undefined` when the backend has no such tree
   */
  getTree(
    repo: string,
    treeSha: string,
    recursive?: boolean,
    signal?: AbortSignal,
  ): Promise<Result<Tree | undefined, ScmError>>;
}
