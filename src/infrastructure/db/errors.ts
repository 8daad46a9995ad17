import { DocumentStoreError } from '../../domain/index.js';
import type { StoreErrorKind } from '../../domain/index.js';

/** SQLSTATE codes with a fixed meaning for the document store. */
const SQLSTATE_KINDS: Record<string, StoreErrorKind> = {
  '23505': 'DuplicateKey',
  '23503': 'ReferentialViolation',
  '23514': 'InvalidDocument',
  '23502': 'InvalidDocument',
  '57014': 'StoreUnavailable',
};

/** Class 22 (data exception): the server refused a value the caller sent. */
const DATA_EXCEPTION_CLASS = '22';

/** Kind given to a data exception; a query's values make it InvalidQuery. */
export type InvalidInputKind = Extract<StoreErrorKind, 'InvalidDocument' | 'InvalidQuery'>;

/** SQLSTATE classes that mean the server or the link to it is unusable. */
const UNAVAILABLE_CLASSES = ['08', '53', '57P'];

/** Socket and postgres.js connection error codes. */
const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

/**
 * Finds the driver error code on `err` or on the error it wraps.
 * Newer Drizzle releases wrap driver errors and keep the original as `cause`.
 */
export function errorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') return current.code;
    current = current.cause;
  }
  return undefined;
}

/**
 * Maps any failure raised while talking to the store onto the error
 * taxonomy. Errors that are already classified pass through unchanged.
 */
export function toStoreError(err: unknown, invalidInputKind: InvalidInputKind = 'InvalidDocument'): DocumentStoreError {
  if (err instanceof DocumentStoreError) return err;

  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);

  if (code !== undefined) {
    const kind = SQLSTATE_KINDS[code];
    if (kind !== undefined) {
      return new DocumentStoreError(kind, message, { cause: err, details: { code } });
    }
    if (code.startsWith(DATA_EXCEPTION_CLASS)) {
      return new DocumentStoreError(invalidInputKind, message, { cause: err, details: { code } });
    }
    if (UNAVAILABLE_CODES.has(code) || UNAVAILABLE_CLASSES.some((prefix) => code.startsWith(prefix))) {
      return new DocumentStoreError('StoreUnavailable', message, { cause: err, details: { code } });
    }
  }

  return new DocumentStoreError('StoreUnavailable', `Unexpected store failure: ${message}`, {
    cause: err,
    details: code === undefined ? undefined : { code },
  });
}
