/**
 * Why a transport-level failure happened.
 */
export type TransportReason = 'status' | 'network' | 'timeout' | 'cancelled';

/**
 * Error taxonomy shared by every driver.
 *
 * A missing entity is not an error: single-entity lookups resolve to
 * `undefined` and listings to an empty array.
 */
export type ScmError =
  | { readonly code: 'Auth'; readonly message: string; readonly statusCode: number }
  | { readonly code: 'RateLimited'; readonly message: string; readonly retryAfter?: number }
  | {
      readonly code: 'Transport';
      readonly message: string;
      readonly reason: TransportReason;
      readonly statusCode?: number;
      readonly excerpt?: string;
      readonly cause?: unknown;
    }
  | {
      readonly code: 'Decode';
      readonly message: string;
      readonly operation?: string;
      readonly repo?: string;
      readonly details?: string;
    }
  | { readonly code: 'Unsupported'; readonly message: string; readonly provider: string; readonly operation: string }
  | { readonly code: 'Configuration'; readonly message: string; readonly field?: string }
  | { readonly code: 'Validation'; readonly message: string; readonly field: string };

export type ScmErrorCode = ScmError['code'];

/** Maximum number of response body characters kept on a Transport error. */
export const EXCERPT_LIMIT = 200;

/**
 * Shortens a response body for diagnostics. The cut never splits a surrogate pair.
 */
export function excerpt(body: string, limit: number = EXCERPT_LIMIT): string {
  if (body.length <= limit) return body;
  const last = body.charCodeAt(limit - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? limit - 1 : limit;
  return body.slice(0, end);
}

/**
 * True for the HTTP 404 Transport error that drivers fold into an absent value.
 */
export function isNotFound(error: ScmError): boolean {
  return error.code === 'Transport' && error.reason === 'status' && error.statusCode === 404;
}
