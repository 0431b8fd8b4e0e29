/**
 * Read-only git hosting drivers for Gitea, GitHub and GitLab behind one contract.
 *
 * @example
 * ```typescript
 * import { createLogger, createScmDriver, getScmOptions } from 'scm-drivers';
 *
 * const options = getScmOptions();
 * if (!options.success) throw new Error(options.error.message);
 * const logger = createLogger({ debug: options.value.debug });
 * const driver = createScmDriver(options.value, logger, options.value);
 * ```
 */

export type { Result } from './core/result';
export { ok, fail, mapResult, flatMapResult, unwrapOr } from './core/result';

export type { ScmError, ScmErrorCode, TransportReason } from './domain/models/scmError';
export { EXCERPT_LIMIT, excerpt, isNotFound } from './domain/models/scmError';
export type { Reference } from './domain/models/reference';
export { BRANCH_PREFIX, TAG_PREFIX } from './domain/models/reference';
export type { Commit, Signature } from './domain/models/commit';
export type { Tree, TreeEntry } from './domain/models/tree';
export type { PageOptions } from './domain/models/pageOptions';
export type {
  ScmAuth,
  ScmDriverConfig,
  ScmOptions,
  ScmProviderKind,
  HttpClientOptions,
} from './domain/models/scmOptions';
export { defaultEndpoints, defaultHttpClientOptions, defaultScmOptions } from './domain/models/scmOptions';
export type { IGitService } from './domain/gitService';
export type { ScmDriver } from './domain/scmDriver';

export * from './api';

export type { ILogger, ILogSink } from './services/loggerService';
export { LoggerService, createLogger, formatLog, stderrSink } from './services/loggerService';
export type { ScmEnv, ScmSettings } from './services/configurationService';
export {
  CONFIG_FILE_ENV,
  getScmOptions,
  mergeScmSettings,
  parseScmSettingsJson,
  readScmSettingsFile,
  readScmSettingsFromEnv,
  toScmOptions,
} from './services/configurationService';

export type { DockerAuthEntry, DockerConfig, RegistryCredential } from './utils/credential';
export { buildDockerConfig } from './utils/credential';
