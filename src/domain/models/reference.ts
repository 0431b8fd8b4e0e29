/**
 * A named pointer (branch or tag) to a commit.
 */
export interface Reference {
  /** Short ref name (e.g., "main", "v1.2.0") */
  readonly name: string;

  /** Fully qualified ref path (e.g., "refs/heads/main") */
  readonly path: string;

  /** Hex id of the commit the ref points at */
  readonly sha: string;
}

export const BRANCH_PREFIX = 'refs/heads/';
export const TAG_PREFIX = 'refs/tags/';
