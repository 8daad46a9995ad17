import type { z } from 'zod';
import { DocumentStoreError } from '../domain/index.js';
import type { StoreErrorKind } from '../domain/index.js';
import type { RunOptions } from '../infrastructure/db/index.js';

/** Per-call knobs accepted by every use case. */
export interface CallOptions {
  /** Per-call timeout; capped at the pool's `queryTimeoutMs`. */
  timeoutMs?: number;
}

export interface PageParams {
  limit?: number;
  offset?: number;
}

/**
 * Parses `input` or throws a caller-error of `kind` carrying the
 * flattened zod issues in `details`.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  kind: Extract<StoreErrorKind, 'InvalidDocument' | 'InvalidQuery'>,
  subject: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first === undefined || first.path.length === 0 ? '' : ` at ${first.path.join('.')}`;
    throw new DocumentStoreError(kind, `Invalid ${subject}${where}: ${first?.message ?? 'validation failed'}`, {
      details: result.error.flatten(),
    });
  }
  return result.data;
}

/** Pool options for one use-case call, labelled for the pool's logs. */
export function runOptions(options: CallOptions, operation: string): RunOptions {
  return options.timeoutMs === undefined ? { operation } : { operation, timeoutMs: options.timeoutMs };
}
