/**
 * Author or committer identity.
 *
 * `login` and `avatar` are only set when the backend resolved the
 * identity to a registered account.
 */
export interface Signature {
  readonly name: string;
  readonly email: string;

  /** RFC 3339 timestamp in UTC */
  readonly date: string;

  readonly login?: string;
  readonly avatar?: string;
}

/**
 * A repository commit.
 */
export interface Commit {
  readonly sha: string;
  readonly message: string;
  readonly author: Signature;
  readonly committer: Signature;

  /** Web page of the commit (for humans, not an API endpoint) */
  readonly link: string;
}
