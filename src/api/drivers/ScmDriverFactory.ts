import type { Result } from '../../core/result';
import { ok, fail } from '../../core/result';
import type { ScmDriver } from '../../domain/scmDriver';
import type { ScmAuth, ScmDriverConfig } from '../../domain/models/scmOptions';
import type { ScmError } from '../../domain/models/scmError';
import type { ILogger } from '../../services/loggerService';
import type { IHttpClient } from '../httpPipeline';
import { RestClient } from '../restClient';
import type { IScmDriverDefinition } from './IScmDriverDefinition';
import { GiteaDriverDefinition } from './GiteaDriver';
import { GitHubDriverDefinition } from './GitHubDriver';
import { GitLabDriverDefinition } from './GitLabDriver';

/**
 * Factory for building contract-typed drivers from configuration.
 *
 * Definitions are registered at initialization and selected by provider
 * kind. The kind is checked once, here: an unknown kind, a malformed
 * endpoint or unusable credentials fail construction with a Configuration
 * error instead of producing a driver that fails on first use.
 *
 * @example
 * ```typescript
 * const factory = new ScmDriverFactory(logger);
 * const driver = factory.create({ provider: 'gitea', endpoint: 'https://git.example.com' }, http);
 * if (driver.success) {
 *   const commit = await driver.value.git.findCommit('platform/api', 'main');
 * }
 * ```
 *
 * @example
 * ```typescript
 * // Additional backend
 * factory.register(new ForgejoDriverDefinition());
 * ```
 */
export class ScmDriverFactory {
  private readonly definitions = new Map<string, IScmDriverDefinition>();

  constructor(private readonly logger: ILogger) {
    // Register built-in drivers
    this.register(new GiteaDriverDefinition());
    this.register(new GitHubDriverDefinition());
    this.register(new GitLabDriverDefinition());
  }

  /**
   * Register a driver definition, replacing any definition for the same provider.
   */
  register(definition: IScmDriverDefinition): void {
    this.definitions.set(definition.provider, definition);
  }

  /**
   * Check if a definition is registered for a provider.
   */
  hasDriver(provider: string): boolean {
    return this.definitions.has(provider);
  }

  /**
   * Get all registered provider kinds.
   */
  getRegisteredProviders(): string[] {
    return Array.from(this.definitions.keys());
  }

  /**
   * Build a driver from connection parameters.
   *
   * @param http - Shared HTTP client the driver sends its requests through
   */
  create(config: ScmDriverConfig, http: IHttpClient): Result<ScmDriver, ScmError> {
    const definition = this.definitions.get(config.provider);
    if (!definition) {
      return fail({
        code: 'Configuration',
        message: `Unknown SCM provider '${config.provider}' (expected one of: ${this.getRegisteredProviders().join(', ')})`,
        field: 'provider',
      });
    }

    const endpoint = normalizeEndpoint(config.endpoint ?? definition.defaultEndpoint);
    if (!endpoint.success) {
      return endpoint;
    }

    const auth = validateAuth(config.auth ?? { type: 'none' });
    if (!auth.success) {
      return auth;
    }

    const headers = definition.buildHeaders(auth.value);
    if (!headers.success) {
      return headers;
    }

    const client = new RestClient(`${endpoint.value}${definition.apiPrefix}`, http, headers.value);

    this.logger.info('ScmDriverFactory: Driver created', {
      provider: definition.provider,
      endpoint: endpoint.value,
      authType: auth.value.type,
    });

    return ok(this.assemble(definition, endpoint.value, client));
  }

  /**
   * Build a driver around an already configured API client.
   *
   * @param client - Client whose base URL already includes the API prefix
   */
  fromClient(provider: string, client: RestClient): Result<ScmDriver, ScmError> {
    const definition = this.definitions.get(provider);
    if (!definition) {
      return fail({ code: 'Configuration', message: `Unknown SCM provider '${provider}'`, field: 'provider' });
    }
    const prefix = definition.apiPrefix;
    const endpoint =
      prefix !== '' && client.baseUrl.endsWith(prefix) ? client.baseUrl.slice(0, -prefix.length) : client.baseUrl;
    return ok(this.assemble(definition, endpoint, client));
  }

  private assemble(definition: IScmDriverDefinition, endpoint: string, client: RestClient): ScmDriver {
    return Object.freeze({
      provider: definition.provider,
      endpoint,
      git: definition.createGitService(client, this.logger),
    });
  }
}

/**
 * Accepts absolute http(s) URLs only and drops trailing slashes.
 */
function normalizeEndpoint(endpoint: string): Result<string, ScmError> {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    return fail({ code: 'Configuration', message: `Invalid endpoint URL '${endpoint}'`, field: 'endpoint' });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return fail({
      code: 'Configuration',
      message: `Unsupported endpoint protocol '${url.protocol}'`,
      field: 'endpoint',
    });
  }
  return ok(endpoint.replace(/\/+$/, ''));
}

/**
 * Treats a blank token as no credentials and rejects half-filled basic auth.
 */
function validateAuth(auth: ScmAuth): Result<ScmAuth, ScmError> {
  switch (auth.type) {
    case 'bearer':
      return ok(auth.token.trim() === '' ? { type: 'none' } : auth);
    case 'basic':
      if (auth.username === '' || auth.password === '') {
        return fail({
          code: 'Configuration',
          message: 'Basic credentials need both a username and a password',
          field: 'auth',
        });
      }
      return ok(auth);
    case 'none':
      return ok(auth);
  }
}
