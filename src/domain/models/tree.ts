/**
 * Single file or directory entry of a tree listing.
 */
export interface TreeEntry {
  readonly path: string;
  readonly mode: string;

  /** Git object type: "blob", "tree" or "commit" (submodule) */
  readonly type: string;

  /** Blob size in bytes; absent for non-blob entries */
  readonly size?: number;

  readonly sha: string;
  readonly url: string;
}

/**
 * File listing of a tree object.
 */
export interface Tree {
  readonly sha: string;
  readonly url: string;
  readonly entries: readonly TreeEntry[];

  /**
   * True when the backend capped the listing. Callers must re-request
   * (without recursion, or per subtree) to see everything.
   */
  readonly truncated: boolean;
}
