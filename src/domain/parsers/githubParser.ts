import type { Result } from '../../core/result';
import type { Commit, Signature } from '../models/commit';
import type { Reference } from '../models/reference';
import { BRANCH_PREFIX, TAG_PREFIX } from '../models/reference';
import type { ScmError } from '../models/scmError';
import type { Tree } from '../models/tree';
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

/** GitHub stops listing a recursive tree after this many entries. */
export const GITHUB_TREE_ENTRY_CAP = 100000;

/**
 * GitHub REST API response schemas.
 *
 * Branches and tags share the same `{name, commit: {sha}}` shape.
 */
interface GitHubRef {
  name: string;
  commit: { sha: string };
}

interface GitHubGitActor {
  name: string;
  email: string;
  date: string;
}

interface GitHubAccount {
  login?: string;
  avatar_url?: string;
}

interface GitHubCommit {
  sha: string;
  html_url: string;
  commit: { message: string; author: GitHubGitActor; committer: GitHubGitActor };
  author: GitHubAccount | null;
  committer: GitHubAccount | null;
}

interface GitHubTreeEntry {
  path: string;
  mode: string;
  type: string;
  sha: string;
  size?: number;
  url?: string;
}

interface GitHubTree {
  sha: string;
  url: string;
  tree: GitHubTreeEntry[];
  truncated?: boolean;
}

function readRef(kind: string) {
  return (value: unknown, index: number): GitHubRef => {
    const path = `${kind}[${index}]`;
    const obj = expectRecord(value, path);
    const commit = expectRecord(obj.commit, `${path}.commit`);
    return { name: requireString(obj, 'name', path), commit: { sha: requireString(commit, 'sha', `${path}.commit`) } };
  };
}

function readActor(value: unknown, path: string): GitHubGitActor {
  const obj: WireRecord = expectRecord(value, path);
  return {
    name: requireText(obj, 'name', path),
    email: requireText(obj, 'email', path),
    date: requireTimestamp(obj, 'date', path),
  };
}

function readAccount(value: unknown): GitHubAccount | null {
  if (!isRecord(value)) return null;
  return { login: optionalString(value.login), avatar_url: optionalString(value.avatar_url) };
}

function readCommit(value: unknown): GitHubCommit {
  const obj = expectRecord(value, 'commit');
  const inner = expectRecord(obj.commit, 'commit.commit');
  return {
    sha: requireString(obj, 'sha', 'commit'),
    html_url: requireText(obj, 'html_url', 'commit'),
    commit: {
      message: requireText(inner, 'message', 'commit.commit'),
      author: readActor(inner.author, 'commit.commit.author'),
      committer: readActor(inner.committer, 'commit.commit.committer'),
    },
    author: readAccount(obj.author),
    committer: readAccount(obj.committer),
  };
}

function readTree(value: unknown): GitHubTree {
  const obj = expectRecord(value, 'tree');
  return {
    sha: requireString(obj, 'sha', 'tree'),
    url: requireText(obj, 'url', 'tree'),
    tree: expectArray(obj.tree, 'tree.tree').map((entry, index) => {
      const path = `tree[${index}]`;
      const e = expectRecord(entry, path);
      return {
        path: requireString(e, 'path', path),
        mode: requireString(e, 'mode', path),
        type: requireString(e, 'type', path),
        sha: requireString(e, 'sha', path),
        size: typeof e.size === 'number' ? e.size : undefined,
        url: optionalString(e.url),
      };
    }),
    truncated: typeof obj.truncated === 'boolean' ? obj.truncated : undefined,
  };
}

function toSignature(actor: GitHubGitActor, account: GitHubAccount | null): Signature {
  return {
    name: actor.name,
    email: actor.email,
    date: actor.date,
    login: account?.login,
    avatar: account?.avatar_url,
  };
}

/**
 * Parses `GET /repos/{owner}/{repo}/branches`.
 */
export function parseGitHubBranches(body: unknown): Result<Reference[], ScmError> {
  return decode('branch list', () =>
    uniqueByName(
      expectArray(body, 'branches')
        .map(readRef('branches'))
        .map(r => ({ name: r.name, path: `${BRANCH_PREFIX}${r.name}`, sha: r.commit.sha })),
    ),
  );
}

/**
 * Parses `GET /repos/{owner}/{repo}/tags`.
 */
export function parseGitHubTags(body: unknown): Result<Reference[], ScmError> {
  return decode('tag list', () =>
    uniqueByName(
      expectArray(body, 'tags')
        .map(readRef('tags'))
        .map(r => ({ name: r.name, path: `${TAG_PREFIX}${r.name}`, sha: r.commit.sha })),
    ),
  );
}

/**
 * Parses `GET /repos/{owner}/{repo}/commits/{ref}`.
 */
export function parseGitHubCommit(body: unknown): Result<Commit, ScmError> {
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
 * Submodule entries carry no `url`; the builder supplies one.
 */
export function parseGitHubTree(body: unknown, objectUrl: ObjectUrlBuilder): Result<Tree, ScmError> {
  return decode('tree', () => {
    const t = readTree(body);
    const entries = t.tree.map(e => ({
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
      truncated: resolveTruncated(t.truncated, entries.length, GITHUB_TREE_ENTRY_CAP),
    };
  });
}
