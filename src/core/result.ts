import type { ScmError } from '../domain/models/scmError';

/**
 * Result type for every operation that can fail.
 *
 * @example
 * ```typescript
 * const result = await driver.git.findCommit('octo/hello', 'main');
 * if (!result.success) {
 *   logger.warn(`lookup failed: ${result.error.message}`);
 * } else if (result.value) {
 *   console.log(result.value.sha);
 * }
 * ```
 */
export type Result<T, E = ScmError> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a successful result.
 */
export const ok = <T>(value: T): Result<T, never> => ({ success: true, value });

/**
 * Create a failed result.
 */
export const fail = <E = ScmError>(error: E): Result<never, E> => ({ success: false, error });

// ============================================================================
// Combinators
// ============================================================================

/**
 * Map the success value of a result.
 * Errors pass through unchanged.
 */
export const mapResult = <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  result.success ? ok(fn(result.value)) : result;

/**
 * Flat-map (chain) results.
 * Errors pass through unchanged.
 */
export const flatMapResult = <T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> =>
  result.success ? fn(result.value) : result;

/**
 * Provide a default value if result is error.
 */
export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T =>
  result.success ? result.value : defaultValue;
