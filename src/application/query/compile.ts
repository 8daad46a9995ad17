import { DocumentStoreError } from '../../domain/index.js';
import type { DocumentKind, JsonValue } from '../../domain/index.js';
import { parseJsonPath } from './json-path.js';
import type {
  ColumnName,
  CompiledQuery,
  ComparisonOperator,
  Explode,
  FilterOperator,
  Operand,
  OrderBy,
  Predicate,
  ValueRef,
} from './ast.js';
import type { ParsedQueryBody } from './request.js';

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 500;

export interface CompileLimits {
  defaultLimit: number;
  maxLimit: number;
}

type ColumnType = 'text' | 'numeric' | 'timestamp';

const COLUMN_TYPES: Record<DocumentKind, Partial<Record<ColumnName, ColumnType>>> = {
  entities: { id: 'text', type: 'text', createdAt: 'timestamp', updatedAt: 'timestamp', version: 'numeric' },
  curations: { id: 'text', entityId: 'text', createdAt: 'timestamp', updatedAt: 'timestamp', version: 'numeric' },
};

const COLUMN_NAMES: readonly ColumnName[] = ['id', 'type', 'entityId', 'createdAt', 'updatedAt', 'version'];

const ALIAS_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Names an explode alias may not take: they already mean something in a path or the FROM list. */
const RESERVED_ALIASES = new Set<string>(['entities', 'curations', ...COLUMN_NAMES]);

/**
 * Compiles a validated query body into the query AST.
 *
 * Fails with `InvalidQuery` for anything the renderer could not express
 * safely; nothing here touches the database.
 */
export function compileQuery<K extends DocumentKind>(
  from: K,
  body: ParsedQueryBody,
  limits: CompileLimits = { defaultLimit: DEFAULT_LIMIT, maxLimit: MAX_LIMIT },
): CompiledQuery<K> {
  const explode = body.explode === undefined ? null : compileExplode(from, body.explode.path, body.explode.as);
  const scope: Scope = { from, alias: explode?.alias ?? null };

  const where = body.filters.map((filter) => compileFilter(scope, filter.path, filter.operator, filter.value));

  const orderBy: OrderBy | null = body.sort === undefined
    ? null
    : { target: resolvePath(scope, body.sort.path), direction: body.sort.direction };

  const limit = Math.min(Math.max(body.limit ?? limits.defaultLimit, 1), limits.maxLimit);
  const offset = Math.max(body.offset ?? 0, 0);

  return { from, explode, where, orderBy, limit, offset };
}

interface Scope {
  from: DocumentKind;
  alias: string | null;
}

function compileExplode(from: DocumentKind, path: string, alias: string): Explode {
  if (!ALIAS_RE.test(alias) || RESERVED_ALIASES.has(alias)) {
    throw invalid(`Explode alias "${alias}" must be a plain identifier that is not a column or table name`);
  }
  const source = resolvePath({ from, alias: null }, path);
  if (source.kind !== 'document') {
    throw invalid(`Explode path "${path}" must address the document ("$...")`);
  }
  return { alias, source };
}

function resolvePath(scope: Scope, path: string): ValueRef {
  const parsed = parseJsonPath(path);

  if (parsed.head === '$') {
    return { kind: 'document', segments: parsed.segments };
  }
  if (scope.alias !== null && parsed.head === scope.alias) {
    return { kind: 'element', alias: scope.alias, segments: parsed.segments };
  }

  const column = columnNamed(scope.from, parsed.head);
  if (column !== null && parsed.segments.length === 0) {
    return { kind: 'column', column };
  }

  throw invalid(`Path "${path}" does not refer to the document, the explode alias or a ${scope.from} column`);
}

function columnNamed(from: DocumentKind, name: string): ColumnName | null {
  const column = COLUMN_NAMES.find((candidate) => candidate === name);
  return column !== undefined && COLUMN_TYPES[from][column] !== undefined ? column : null;
}

function compileFilter(scope: Scope, path: string, operator: FilterOperator, value: JsonValue): Predicate {
  const target = resolvePath(scope, path);

  switch (operator) {
    case 'eq':
    case 'ne':
    case 'lt':
    case 'gt':
    case 'lte':
    case 'gte':
      return { kind: 'compare', target, operator, operand: operandFor(scope.from, target, operator, value) };

    case 'in': {
      if (!Array.isArray(value) || value.length === 0) {
        throw invalid(`"in" on "${path}" needs a non-empty list`);
      }
      const operands = value.map((item) => operandFor(scope.from, target, 'eq', item));
      const first = operands[0];
      if (first === undefined || operands.some((o) => o.type !== first.type) || first.type === 'jsonb') {
        throw invalid(`"in" on "${path}" needs a list of only strings or only numbers`);
      }
      return { kind: 'in', target, operands };
    }

    case 'contains':
      if (target.kind === 'column') throw invalid(`"contains" needs a JSON array path, got column "${path}"`);
      if (value === null) throw invalid(`"contains" on "${path}" needs a non-null value`);
      return { kind: 'contains', target, value };

    case 'like':
      if (typeof value !== 'string') throw invalid(`"like" on "${path}" needs a string`);
      if (target.kind === 'column' && COLUMN_TYPES[scope.from][target.column] !== 'text') {
        throw invalid(`"like" is only supported on text columns, got "${path}"`);
      }
      return { kind: 'like', target, pattern: `%${escapeLike(value.toLowerCase())}%` };

  }
}

function operandFor(from: DocumentKind, target: ValueRef, operator: ComparisonOperator, value: JsonValue): Operand {
  if (value === null) {
    throw invalid('null is not a comparable value');
  }

  if (target.kind === 'column') {
    const columnType = COLUMN_TYPES[from][target.column];
    if (columnType === 'text' && typeof value === 'string') return { type: 'text', value };
    if (columnType === 'numeric' && typeof value === 'number') return { type: 'numeric', value };
    if (columnType === 'timestamp' && typeof value === 'string' && Number.isFinite(Date.parse(value))) {
      return { type: 'timestamp', value };
    }
    throw invalid(`Column "${target.column}" cannot be compared with ${JSON.stringify(value)}`);
  }

  if (typeof value === 'string') return { type: 'text', value };
  if (typeof value === 'number') return { type: 'numeric', value };

  if (operator !== 'eq' && operator !== 'ne') {
    throw invalid(`"${operator}" needs a string or number, got ${JSON.stringify(value)}`);
  }
  return { type: 'jsonb', value };
}

/** Escapes LIKE wildcards so the pattern matches the value literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function invalid(message: string): DocumentStoreError {
  return new DocumentStoreError('InvalidQuery', message);
}
