import type { Result } from '../../core/result';
import type { IGitService } from '../../domain/gitService';
import type { ScmAuth } from '../../domain/models/scmOptions';
import type { ScmError } from '../../domain/models/scmError';
import type { ILogger } from '../../services/loggerService';
import type { RestClient } from '../restClient';

/**
 * Everything the factory needs to build a driver for one hosting backend.
 *
 * Backend quirks (API prefix, auth header scheme) stay behind this
 * interface; callers only ever receive the {@link IGitService} it creates.
 *
 * @example
 * ```typescript
 * const factory = new ScmDriverFactory(logger);
 * factory.register(new ForgejoDriverDefinition());
 * ```
 */
export interface IScmDriverDefinition {
  /**
   * Provider kind tag this definition handles.
   */
  readonly provider: string;

  /**
   * Hosted endpoint used when the configuration names none.
   */
  readonly defaultEndpoint: string;

  /**
   * Path of the REST API below the endpoint ("" when the endpoint is the API root).
   */
  readonly apiPrefix: string;

  /**
   * Translates credentials into request headers, or a Configuration error
   * when the backend does not accept that kind of credential.
   */
  buildHeaders(auth: ScmAuth): Result<Record<string, string>, ScmError>;

  /**
   * Creates the git service bound to an API client.
   */
  createGitService(client: RestClient, logger: ILogger): IGitService;
}
