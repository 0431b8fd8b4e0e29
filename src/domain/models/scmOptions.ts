/**
 * Hosting backends with a built-in driver.
 */
export type ScmProviderKind = 'gitea' | 'github' | 'gitlab';

/**
 * Credentials injected into every request.
 */
export type ScmAuth =
  | { type: 'none' }
  | { type: 'bearer'; token: string }
  | { type: 'basic'; username: string; password: string };

/**
 * Connection parameters for a single hosting backend.
 */
export interface ScmDriverConfig {
  /** Provider kind tag (validated by the factory) */
  provider: string;

  /** Server base URL; the provider's hosted default when omitted */
  endpoint?: string;

  /** Request credentials (default: none) */
  auth?: ScmAuth;
}

/**
 * HTTP client tuning shared by all drivers.
 */
export interface HttpClientOptions {
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs: number;

  /** Maximum in-flight requests (default: 16) */
  maxConnections: number;
}

/**
 * Complete runtime options for the driver layer.
 */
export interface ScmOptions extends ScmDriverConfig, HttpClientOptions {
  /** Emit debug log lines */
  debug: boolean;
}

/**
 * Well-known hosted endpoints used when no endpoint is configured.
 */
export const defaultEndpoints: Readonly<Record<ScmProviderKind, string>> = {
  gitea: 'https://try.gitea.io',
  github: 'https://api.github.com',
  gitlab: 'https://gitlab.com',
};

export const defaultHttpClientOptions: HttpClientOptions = {
  timeoutMs: 30000,
  maxConnections: 16,
};

export const defaultScmOptions: ScmOptions = {
  provider: 'github',
  auth: { type: 'none' },
  debug: false,
  ...defaultHttpClientOptions,
};
