/**
 * Failure kinds surfaced by the document store.
 *
 * Callers branch on `kind`; each driver or validation failure maps to
 * exactly one of these.
 */
export type StoreErrorKind =
  | 'DuplicateKey'
  | 'NotFound'
  | 'InvalidDocument'
  | 'VersionConflict'
  | 'ReferentialViolation'
  | 'StoreUnavailable'
  | 'InvalidQuery';

export class DocumentStoreError extends Error {
  public readonly kind: StoreErrorKind;
  public readonly details: unknown;

  constructor(kind: StoreErrorKind, message: string, options: { details?: unknown; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DocumentStoreError';
    this.kind = kind;
    this.details = options.details;
  }
}

export function isStoreError(err: unknown, kind?: StoreErrorKind): err is DocumentStoreError {
  return err instanceof DocumentStoreError && (kind === undefined || err.kind === kind);
}

/**
 * Kinds the calling layer should treat as its own mistake (4xx),
 * as opposed to conflicts it may retry or transient store failures.
 */
export function isCallerError(err: DocumentStoreError): boolean {
  return err.kind === 'DuplicateKey'
    || err.kind === 'NotFound'
    || err.kind === 'InvalidDocument'
    || err.kind === 'ReferentialViolation'
    || err.kind === 'InvalidQuery';
}
