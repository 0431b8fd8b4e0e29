import type { Result } from '../../core/result';
import type { Commit, Signature } from '../models/commit';
import type { Reference } from '../models/reference';
import { BRANCH_PREFIX, TAG_PREFIX } from '../models/reference';
import type { ScmError } from '../models/scmError';
import type { Tree, TreeEntry } from '../models/tree';
import type { ObjectUrlBuilder, WireRecord } from './wire';
import {
  blobSize,
  decode,
  expectArray,
  expectRecord,
  isRecord,
  optionalString,
  requireString,
  requireText,
  requireTimestamp,
  resolveTruncated,
  uniqueByName,
} from './wire';

/** Largest `per_page` Gitea accepts on the trees endpoint. */
export const GITEA_TREE_PAGE_CAP = 1000;

/**
 * Gitea API v1 response schemas (fields used by the driver only).
 */
interface GiteaBranch {
  name: string;
  commit: { id: string };
}

interface GiteaTag {
  name: string;
  commit: { sha: string };
}

interface GiteaCommitUser {
  name: string;
  email: string;
  date: string;
}

interface GiteaUser {
  login?: string;
  avatar_url?: string;
}

interface GiteaCommit {
  sha: string;
  html_url: string;
  commit: { message: string; author: GiteaCommitUser; committer: GiteaCommitUser };
  author: GiteaUser | null;
  committer: GiteaUser | null;
}

interface GiteaTreeEntry {
  path: string;
  mode: string;
  type: string;
  size?: number;
  sha: string;
  url?: string;
}

interface GiteaTree {
  sha: string;
  url: string;
  tree: GiteaTreeEntry[];
  truncated?: boolean;
}

function readBranch(value: unknown, index: number): GiteaBranch {
  const path = `branches[${index}]`;
  const obj = expectRecord(value, path);
  const commit = expectRecord(obj.commit, `${path}.commit`);
  return { name: requireString(obj, 'name', path), commit: { id: requireString(commit, 'id', `${path}.commit`) } };
}

function readTag(value: unknown, index: number): GiteaTag {
  const path = `tags[${index}]`;
  const obj = expectRecord(value, path);
  const commit = expectRecord(obj.commit, `${path}.commit`);
  return { name: requireString(obj, 'name', path), commit: { sha: requireString(commit, 'sha', `${path}.commit`) } };
}

function readCommitUser(obj: WireRecord, path: string): GiteaCommitUser {
  return {
    name: requireText(obj, 'name', path),
    email: requireText(obj, 'email', path),
    date: requireTimestamp(obj, 'date', path),
  };
}

function readUser(value: unknown): GiteaUser | null {
  if (!isRecord(value)) return null;
  return { login: optionalString(value.login), avatar_url: optionalString(value.avatar_url) };
}

function readCommit(value: unknown): GiteaCommit {
  const obj = expectRecord(value, 'commit');
  const inner = expectRecord(obj.commit, 'commit.commit');
  return {
    sha: requireString(obj, 'sha', 'commit'),
    html_url: requireText(obj, 'html_url', 'commit'),
    commit: {
      message: requireText(inner, 'message', 'commit.commit'),
      author: readCommitUser(expectRecord(inner.author, 'commit.commit.author'), 'commit.commit.author'),
      committer: readCommitUser(expectRecord(inner.committer, 'commit.commit.committer'), 'commit.commit.committer'),
    },
    author: readUser(obj.author),
    committer: readUser(obj.committer),
  };
}

function readTreeEntry(value: unknown, index: number): GiteaTreeEntry {
  const path = `tree[${index}]`;
  const obj = expectRecord(value, path);
  return {
    path: requireString(obj, 'path', path),
    mode: requireString(obj, 'mode', path),
    type: requireString(obj, 'type', path),
    size: typeof obj.size === 'number' ? obj.size : undefined,
    sha: requireString(obj, 'sha', path),
    url: optionalString(obj.url),
  };
}

function readTree(value: unknown): GiteaTree {
  const obj = expectRecord(value, 'tree');
  return {
    sha: requireString(obj, 'sha', 'tree'),
    url: requireText(obj, 'url', 'tree'),
    tree: obj.tree === null ? [] : expectArray(obj.tree, 'tree.tree').map(readTreeEntry),
    truncated: typeof obj.truncated === 'boolean' ? obj.truncated : undefined,
  };
}

function toSignature(user: GiteaCommitUser, account: GiteaUser | null): Signature {
  return {
    name: user.name,
    email: user.email,
    date: user.date,
    login: account?.login,
    avatar: account?.avatar_url,
  };
}

/**
 * Parses `GET /repos/{owner}/{repo}/branches`.
 */
export function parseGiteaBranches(body: unknown): Result<Reference[], ScmError> {
  return decode('branch list', () =>
    uniqueByName(
      expectArray(body, 'branches')
        .map(readBranch)
        .map(b => ({ name: b.name, path: `${BRANCH_PREFIX}${b.name}`, sha: b.commit.id })),
    ),
  );
}

/**
 * Parses `GET /repos/{owner}/{repo}/tags`.
 */
export function parseGiteaTags(body: unknown): Result<Reference[], ScmError> {
  return decode('tag list', () =>
    uniqueByName(
      expectArray(body, 'tags')
        .map(readTag)
        .map(t => ({ name: t.name, path: `${TAG_PREFIX}${t.name}`, sha: t.commit.sha })),
    ),
  );
}

/**
 * Parses `GET /repos/{owner}/{repo}/git/commits/{sha}`.
 */
export function parseGiteaCommit(body: unknown): Result<Commit, ScmError> {
  return decode('commit', () => {
    const c = readCommit(body);
    return {
      sha: c.sha,
      message: c.commit.message,
      author: toSignature(c.commit.author, c.author),
      committer: toSignature(c.commit.committer, c.committer),
      link: c.html_url,
    };
  });
}

/**
 * Parses `GET /repos/{owner}/{repo}/git/trees/{sha}`.
 *
 * @param pageSize - The `per_page` sent with the request, used when the
 * payload carries no truncation flag
 */
export function parseGiteaTree(
  body: unknown,
  objectUrl: ObjectUrlBuilder,
  pageSize: number = GITEA_TREE_PAGE_CAP,
): Result<Tree, ScmError> {
  return decode('tree', () => {
    const t = readTree(body);
    const entries: TreeEntry[] = t.tree.map(e => ({
      path: e.path,
      mode: e.mode,
      type: e.type,
      size: blobSize(e.type, e.size),
      sha: e.sha,
      url: e.url ?? objectUrl(e.type, e.sha),
    }));
    return {
      sha: t.sha,
      url: t.url || objectUrl('tree', t.sha),
      entries,
      truncated: resolveTruncated(t.truncated, entries.length, pageSize),
    };
  });
}
