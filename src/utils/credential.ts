/**
 * Username and password for one container registry.
 */
export interface RegistryCredential {
  username: string;
  password: string;
}

export interface DockerAuthEntry extends RegistryCredential {
  /** base64 of "username:password" */
  auth: string;
}

/**
 * Shape of a docker `config.json` holding registry logins.
 */
export interface DockerConfig {
  auths: Record<string, DockerAuthEntry>;
}

/**
 * Builds a docker config from registry credentials keyed by registry endpoint.
 *
 * @example
 * ```typescript
 * buildDockerConfig({ 'registry.example.com': { username: 'ci', password: 'test-secret' } });
 * // { auths: { 'registry.example.com': { username: 'ci', password: 'test-secret', auth: 'Y2k6dGVzdC1zZWNyZXQ=' } } }
 * ```
 */
export function buildDockerConfig(entries: Record<string, RegistryCredential>): DockerConfig {
  const auths: Record<string, DockerAuthEntry> = {};
  for (const [endpoint, { username, password }] of Object.entries(entries)) {
    auths[endpoint] = {
      username,
      password,
      auth: Buffer.from(`${username}:${password}`, 'utf-8').toString('base64'),
    };
  }
  return { auths };
}
