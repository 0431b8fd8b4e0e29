import { describe, test, expect } from 'vitest';
import { ok } from '../../../core/result';
import type { IGitService } from '../../../domain/gitService';
import { RestClient } from '../../restClient';
import { ScmDriverFactory } from '../ScmDriverFactory';
import type { IScmDriverDefinition } from '../IScmDriverDefinition';
import { GiteaGitService } from '../GiteaDriver';
import { createMockHttpClient, createMockLogger, jsonResponse } from './test-helpers';

describe('ScmDriverFactory', () => {
  const logger = createMockLogger();
  const createHttp = () => createMockHttpClient(() => jsonResponse([]));

  test('registers the built-in providers', () => {
    const factory = new ScmDriverFactory(logger);

    expect(factory.getRegisteredProviders()).toEqual(['gitea', 'github', 'gitlab']);
    expect(factory.hasDriver('gitea')).toBe(true);
    expect(factory.hasDriver('bitbucket')).toBe(false);
  });

  test('fails construction for an unknown provider', () => {
    const result = new ScmDriverFactory(logger).create({ provider: 'bitbucket' }, createHttp());

    expect(result).toEqual({
      success: false,
      error: {
        code: 'Configuration',
        message: "Unknown SCM provider 'bitbucket' (expected one of: gitea, github, gitlab)",
        field: 'provider',
      },
    });
  });

  test.each([
    ['gitea', 'https://try.gitea.io', 'https://try.gitea.io/api/v1/repos/octo/hello/branches'],
    ['github', 'https://api.github.com', 'https://api.github.com/repos/octo/hello/branches'],
    ['gitlab', 'https://gitlab.com', 'https://gitlab.com/api/v4/projects/octo%2Fhello/repository/branches'],
  ])('uses the hosted default endpoint for %s', async (provider, endpoint, branchesUrl) => {
    const http = createHttp();
    const result = new ScmDriverFactory(logger).create({ provider }, http);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.provider).toBe(provider);
    expect(result.value.endpoint).toBe(endpoint);

    await result.value.git.listBranches('octo/hello');
    expect(http.requests[0]?.url).toBe(branchesUrl);
  });

  test('strips trailing slashes from the endpoint', () => {
    const result = new ScmDriverFactory(logger).create(
      { provider: 'gitea', endpoint: 'https://git.example.com/' },
      createHttp(),
    );

    expect(result.success && result.value.endpoint).toBe('https://git.example.com');
  });

  test.each(['not a url', 'ftp://git.example.com'])('rejects endpoint %s', endpoint => {
    const result = new ScmDriverFactory(logger).create({ provider: 'gitea', endpoint }, createHttp());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({ code: 'Configuration', field: 'endpoint' });
    }
  });

  test('rejects basic credentials for gitlab', () => {
    const result = new ScmDriverFactory(logger).create(
      { provider: 'gitlab', auth: { type: 'basic', username: 'u', password: 'p' } },
      createHttp(),
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({ code: 'Configuration', field: 'auth' });
    }
  });

  test('rejects basic credentials without a password', () => {
    const result = new ScmDriverFactory(logger).create(
      { provider: 'gitea', auth: { type: 'basic', username: 'u', password: '' } },
      createHttp(),
    );

    expect(result).toEqual({
      success: false,
      error: {
        code: 'Configuration',
        message: 'Basic credentials need both a username and a password',
        field: 'auth',
      },
    });
  });

  test('treats a blank token as anonymous access', async () => {
    const http = createHttp();
    const result = new ScmDriverFactory(logger).create(
      { provider: 'gitea', endpoint: 'https://git.example.com', auth: { type: 'bearer', token: '  ' } },
      http,
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    await result.value.git.listTags('octo/hello');
    expect(http.requests[0]?.options?.headers).toEqual({
      Accept: 'application/json',
      'User-Agent': 'scm-drivers/0.1.0',
    });
  });

  test('returns a frozen driver', () => {
    const result = new ScmDriverFactory(logger).create({ provider: 'github' }, createHttp());

    expect(result.success && Object.isFrozen(result.value)).toBe(true);
  });

  test('builds a driver around an existing client', async () => {
    const http = createHttp();
    const client = new RestClient('https://gitlab.example.com/api/v4', http);

    const result = new ScmDriverFactory(logger).fromClient('gitlab', client);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.endpoint).toBe('https://gitlab.example.com');
    await result.value.git.listTags('group/app');
    expect(http.requests[0]?.url).toBe('https://gitlab.example.com/api/v4/projects/group%2Fapp/repository/tags');
  });

  test('accepts additional definitions', () => {
    const forgejo: IScmDriverDefinition = {
      provider: 'forgejo',
      defaultEndpoint: 'https://codeberg.org',
      apiPrefix: '/api/v1',
      buildHeaders: auth => ok<Record<string, string>>(auth.type === 'bearer' ? { Authorization: `token ${auth.token}` } : {}),
      createGitService: (client, log): IGitService => new GiteaGitService(client, log),
    };
    const factory = new ScmDriverFactory(logger);
    factory.register(forgejo);

    const result = factory.create({ provider: 'forgejo' }, createHttp());

    expect(result.success && result.value.endpoint).toBe('https://codeberg.org');
  });
});
