import type { Result } from '../../core/result';
import type { Commit } from '../models/commit';
import type { Reference } from '../models/reference';
import { BRANCH_PREFIX, TAG_PREFIX } from '../models/reference';
import type { ScmError } from '../models/scmError';
import type { TreeEntry } from '../models/tree';
import type { ObjectUrlBuilder } from './wire';
import {
  decode,
  expectArray,
  expectRecord,
  requireString,
  requireText,
  requireTimestamp,
  uniqueByName,
} from './wire';

/**
 * GitLab API v4 response schemas.
 *
 * GitLab flattens commit identities into `author_*` / `committer_*` fields
 * and never resolves them to accounts. Tree pages are bare arrays without
 * sizes, URLs or a truncation flag.
 */
interface GitLabRef {
  name: string;
  commit: { id: string };
}

interface GitLabCommit {
  id: string;
  message: string;
  author_name: string;
  author_email: string;
  authored_date: string;
  committer_name: string;
  committer_email: string;
  committed_date: string;
  web_url: string;
}

interface GitLabTreeEntry {
  id: string;
  type: string;
  path: string;
  mode: string;
}

function readRef(kind: string) {
  return (value: unknown, index: number): GitLabRef => {
    const path = `${kind}[${index}]`;
    const obj = expectRecord(value, path);
    const commit = expectRecord(obj.commit, `${path}.commit`);
    return { name: requireString(obj, 'name', path), commit: { id: requireString(commit, 'id', `${path}.commit`) } };
  };
}

function readCommit(value: unknown): GitLabCommit {
  const obj = expectRecord(value, 'commit');
  return {
    id: requireString(obj, 'id', 'commit'),
    message: requireText(obj, 'message', 'commit'),
    author_name: requireText(obj, 'author_name', 'commit'),
    author_email: requireText(obj, 'author_email', 'commit'),
    authored_date: requireTimestamp(obj, 'authored_date', 'commit'),
    committer_name: requireText(obj, 'committer_name', 'commit'),
    committer_email: requireText(obj, 'committer_email', 'commit'),
    committed_date: requireTimestamp(obj, 'committed_date', 'commit'),
    web_url: requireText(obj, 'web_url', 'commit'),
  };
}

function readTreeEntry(value: unknown, index: number): GitLabTreeEntry {
  const path = `tree[${index}]`;
  const obj = expectRecord(value, path);
  return {
    id: requireString(obj, 'id', path),
    type: requireString(obj, 'type', path),
    path: requireString(obj, 'path', path),
    mode: requireString(obj, 'mode', path),
  };
}

/**
 * Parses `GET /projects/{id}/repository/branches`.
 */
export function parseGitLabBranches(body: unknown): Result<Reference[], ScmError> {
  return decode('branch list', () =>
    uniqueByName(
      expectArray(body, 'branches')
        .map(readRef('branches'))
        .map(r => ({ name: r.name, path: `${BRANCH_PREFIX}${r.name}`, sha: r.commit.id })),
    ),
  );
}

/**
 * Parses `GET /projects/{id}/repository/tags`. References point at the
 * tagged commit, not the annotated tag object (`target`).
 */
export function parseGitLabTags(body: unknown): Result<Reference[], ScmError> {
  return decode('tag list', () =>
    uniqueByName(
      expectArray(body, 'tags')
        .map(readRef('tags'))
        .map(r => ({ name: r.name, path: `${TAG_PREFIX}${r.name}`, sha: r.commit.id })),
    ),
  );
}

/**
 * Parses `GET /projects/{id}/repository/commits/{sha}`.
 */
export function parseGitLabCommit(body: unknown): Result<Commit, ScmError> {
  return decode('commit', () => {
    const c = readCommit(body);
    return {
      sha: c.id,
      message: c.message,
      author: { name: c.author_name, email: c.author_email, date: c.authored_date },
      committer: { name: c.committer_name, email: c.committer_email, date: c.committed_date },
      link: c.web_url,
    };
  });
}

/**
 * Parses one page of `GET /projects/{id}/repository/tree`.
 */
export function parseGitLabTreePage(body: unknown, objectUrl: ObjectUrlBuilder): Result<TreeEntry[], ScmError> {
  return decode('tree', () =>
    expectArray(body, 'tree')
      .map(readTreeEntry)
      .map(e => ({ path: e.path, mode: e.mode, type: e.type, sha: e.id, url: objectUrl(e.type, e.id) })),
  );
}
