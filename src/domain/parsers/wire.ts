import type { Result } from '../../core/result';
import { ok, fail } from '../../core/result';
import type { ScmError } from '../models/scmError';

/**
 * Decoded JSON object.
 */
export type WireRecord = Record<string, unknown>;

/**
 * Builds the API URL of a git object for backends that omit it.
 */
export type ObjectUrlBuilder = (type: string, sha: string) => string;

/**
 * Raised by the readers below when a payload does not match the expected
 * wire shape. Never escapes {@link decode}.
 */
class WireShapeError extends Error {
  constructor(readonly path: string, expected: string) {
    super(`${path}: expected ${expected}`);
    this.name = 'WireShapeError';
  }
}

/**
 * Runs a payload reader and converts shape mismatches into a Decode error.
 *
 * @example
 * ```typescript
 * const result = decode('branches', () => expectArray(body, 'branches').map(readBranch));
 * ```
 */
export function decode<T>(what: string, reader: () => T): Result<T, ScmError> {
  try {
    return ok(reader());
  } catch (error) {
    if (error instanceof WireShapeError) {
      return fail({ code: 'Decode', message: `Unexpected ${what} payload`, details: error.message });
    }
    throw error;
  }
}

export function isRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, path: string): WireRecord {
  if (!isRecord(value)) {
    throw new WireShapeError(path, 'object');
  }
  return value;
}

export function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new WireShapeError(path, 'array');
  }
  return value;
}

/**
 * Reads a required, non-empty string field (ids, names, paths).
 */
export function requireString(obj: WireRecord, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value === '') {
    throw new WireShapeError(`${path}.${key}`, 'non-empty string');
  }
  return value;
}

/**
 * Reads a required string field that may legitimately be empty (messages, emails).
 */
export function requireText(obj: WireRecord, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new WireShapeError(`${path}.${key}`, 'string');
  }
  return value;
}

/**
 * Maps a missing, null or empty field to `undefined`.
 */
export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Reads a timestamp in any format `Date` understands and returns it as
 * RFC 3339 in UTC.
 */
export function requireTimestamp(obj: WireRecord, key: string, path: string): string {
  const raw = obj[key];
  const time = typeof raw === 'string' ? Date.parse(raw) : NaN;
  if (Number.isNaN(time)) {
    throw new WireShapeError(`${path}.${key}`, 'timestamp');
  }
  return new Date(time).toISOString();
}

/**
 * Reads a blob size. Only blobs carry one; other entry types report none
 * even when the backend sends 0.
 */
export function blobSize(type: string, value: unknown): number | undefined {
  if (type !== 'blob') return undefined;
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

/**
 * Reads a backend truncation flag. Without a flag the listing only counts
 * as complete when it stayed below the backend's per-response cap.
 */
export function resolveTruncated(flag: unknown, count: number, cap: number): boolean {
  if (typeof flag === 'boolean') return flag;
  return count >= cap;
}

/**
 * Keeps the first reference of each name.
 */
export function uniqueByName<T extends { readonly name: string }>(items: T[]): T[] {
  const seen = new Set<string>();
  return items.filter(item => {
    if (seen.has(item.name)) return false;
    seen.add(item.name);
    return true;
  });
}
