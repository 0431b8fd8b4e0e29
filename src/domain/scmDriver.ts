import type { IGitService } from './gitService';

/**
 * Contract-typed handle returned by the driver factory.
 *
 * Callers only see the provider tag for diagnostics; the concrete
 * adapter type stays hidden behind {@link IGitService}.
 */
export interface ScmDriver {
  /** Provider kind the driver was built for */
  readonly provider: string;

  /** Resolved base URL of the backend */
  readonly endpoint: string;

  /** Git metadata access */
  readonly git: IGitService;
}
