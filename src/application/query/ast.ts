import type { DocumentKind, JsonValue } from '../../domain/index.js';
import type { PathSegment } from './json-path.js';

/**
 * Compiled form of a document query.
 *
 * Everything the renderer needs is resolved here: paths are parsed, the
 * comparison type of every operand is fixed, and limits are clamped. The
 * renderer only turns this tree into SQL text with bound parameters.
 */

export type ComparisonOperator = 'eq' | 'ne' | 'lt' | 'gt' | 'lte' | 'gte';

export type FilterOperator = ComparisonOperator | 'in' | 'contains' | 'like';

export type SortDirection = 'asc' | 'desc';

/** Structural columns addressable by name in filters and sorts. */
export type ColumnName = 'id' | 'type' | 'entityId' | 'createdAt' | 'updatedAt' | 'version';

export type ValueRef =
  | { readonly kind: 'document'; readonly segments: readonly PathSegment[] }
  | { readonly kind: 'element'; readonly alias: string; readonly segments: readonly PathSegment[] }
  | { readonly kind: 'column'; readonly column: ColumnName };

/**
 * How an operand is compared. `text` extracts with `->>`, `numeric` only
 * matches JSON numbers, `jsonb` compares the raw JSON value.
 */
export type Operand =
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'numeric'; readonly value: number }
  | { readonly type: 'jsonb'; readonly value: JsonValue }
  | { readonly type: 'timestamp'; readonly value: string };

export type Predicate =
  | { readonly kind: 'compare'; readonly target: ValueRef; readonly operator: ComparisonOperator; readonly operand: Operand }
  | { readonly kind: 'in'; readonly target: ValueRef; readonly operands: readonly Operand[] }
  | { readonly kind: 'contains'; readonly target: ValueRef; readonly value: JsonValue }
  | { readonly kind: 'like'; readonly target: ValueRef; readonly pattern: string };

export interface Explode {
  readonly alias: string;
  readonly source: ValueRef;
}

export interface OrderBy {
  readonly target: ValueRef;
  readonly direction: SortDirection;
}

export interface CompiledQuery<K extends DocumentKind = DocumentKind> {
  readonly from: K;
  readonly explode: Explode | null;
  readonly where: readonly Predicate[];
  readonly orderBy: OrderBy | null;
  readonly limit: number;
  readonly offset: number;
}
