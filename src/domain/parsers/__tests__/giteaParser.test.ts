import { describe, test, expect } from 'vitest';
import { GITEA_TREE_PAGE_CAP, parseGiteaBranches, parseGiteaCommit, parseGiteaTree } from '../giteaParser';

const objectUrl = (type: string, sha: string) => `https://git.example.com/api/v1/repos/o/r/git/${type}/${sha}`;

describe('parseGiteaBranches', () => {
  test('ignores extra fields', () => {
    const result = parseGiteaBranches([
      { name: 'main', protected: true, commit: { id: 'aaa111', message: 'x', timestamp: '2024-01-01T00:00:00Z' } },
    ]);

    expect(result).toEqual({ success: true, value: [{ name: 'main', path: 'refs/heads/main', sha: 'aaa111' }] });
  });

  test('rejects a branch without a commit id', () => {
    const result = parseGiteaBranches([{ name: 'main', commit: {} }]);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'Decode',
        message: 'Unexpected branch list payload',
        details: 'branches[0].commit.id: expected non-empty string',
      },
    });
  });
});

describe('parseGiteaCommit', () => {
  test('leaves account fields unset for unmatched identities', () => {
    const result = parseGiteaCommit({
      sha: 'abc',
      html_url: 'https://git.example.com/o/r/commit/abc',
      commit: {
        message: 'msg',
        author: { name: 'A', email: 'a@example.com', date: '2024-01-01T00:00:00Z' },
        committer: { name: 'A', email: 'a@example.com', date: '2024-01-01T00:00:00Z' },
      },
      author: null,
      committer: { login: '', avatar_url: '' },
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.author.login).toBeUndefined();
      expect(result.value.committer.login).toBeUndefined();
      expect(result.value.committer.avatar).toBeUndefined();
    }
  });
});

describe('parseGiteaTree', () => {
  const entry = (index: number) => ({
    path: `f${index}`,
    mode: '100644',
    type: 'blob',
    size: index,
    sha: `s${index}`,
    url: `u${index}`,
  });

  test('treats a null tree as empty', () => {
    const result = parseGiteaTree({ sha: 't', url: 'https://x/t', tree: null, truncated: false }, objectUrl);

    expect(result).toEqual({ success: true, value: { sha: 't', url: 'https://x/t', entries: [], truncated: false } });
  });

  test('infers truncation from a full page when the flag is missing', () => {
    const full = Array.from({ length: GITEA_TREE_PAGE_CAP }, (_, i) => entry(i));

    const result = parseGiteaTree({ sha: 't', url: 'https://x/t', tree: full }, objectUrl);

    expect(result.success && result.value.truncated).toBe(true);
  });

  test('fills the tree URL when the server leaves it empty', () => {
    const result = parseGiteaTree({ sha: 't', url: '', tree: [entry(1)], truncated: false }, objectUrl);

    expect(result.success && result.value.url).toBe('https://git.example.com/api/v1/repos/o/r/git/tree/t');
  });
});
