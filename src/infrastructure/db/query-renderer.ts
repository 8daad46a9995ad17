import { sql, type SQL } from 'drizzle-orm';
import type { DocumentKind } from '../../domain/index.js';
import type { PathSegment } from '../../application/query/json-path.js';
import type {
  ColumnName,
  CompiledQuery,
  Explode,
  Operand,
  OrderBy,
  Predicate,
  ValueRef,
} from '../../application/query/ast.js';

const COLUMN_SQL_NAMES: Record<ColumnName, string> = {
  id: 'id',
  type: 'type',
  entityId: 'entity_id',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  version: 'version',
};

const SELECTED_COLUMNS: Record<DocumentKind, readonly string[]> = {
  entities: ['id', 'type', 'doc', 'created_at', 'updated_at', 'version'],
  curations: ['id', 'entity_id', 'doc', 'created_at', 'updated_at', 'version'],
};

/** Result column carrying the exploded element, when there is one. */
export const EXPLODED_VALUE_COLUMN = 'exploded_value';

const COMPARISON_SQL = {
  eq: '=',
  ne: '<>',
  lt: '<',
  gt: '>',
  lte: '<=',
  gte: '>=',
} as const;

/**
 * Renders a compiled query into one parameterized SELECT.
 *
 * Path keys are emitted as quoted literals (quotes doubled) so the
 * expressions line up with the functional indexes. Every filter value,
 * the limit and the offset are bound parameters.
 */
export function renderQuery(query: CompiledQuery): SQL {
  const table = query.from;
  const columns = SELECTED_COLUMNS[table].map((name) => qualified(table, name));
  if (query.explode !== null) {
    columns.push(sql`${qualified(query.explode.alias, 'value')} as ${sql.identifier(EXPLODED_VALUE_COLUMN)}`);
  }

  const clauses: SQL[] = [
    sql`select ${sql.join(columns, sql.raw(', '))}`,
    sql`from ${sql.identifier(table)}`,
  ];
  if (query.explode !== null) {
    clauses.push(renderExplode(table, query.explode));
  }
  if (query.where.length > 0) {
    clauses.push(sql`where ${sql.join(query.where.map((p) => renderPredicate(table, p)), sql.raw(' and '))}`);
  }
  clauses.push(sql`order by ${sql.join(renderOrder(query), sql.raw(', '))}`);
  clauses.push(sql`limit ${query.limit} offset ${query.offset}`);

  return sql.join(clauses, sql.raw(' '));
}

function qualified(relation: string, column: string): SQL {
  return sql`${sql.identifier(relation)}.${sql.identifier(column)}`;
}

function renderExplode(table: DocumentKind, explode: Explode): SQL {
  const source = jsonExpr(table, explode.source);
  return sql`cross join lateral jsonb_array_elements(case when jsonb_typeof(${source}) = 'array' then ${source} else '[]'::jsonb end) with ordinality as ${sql.identifier(explode.alias)}(${sql.identifier('value')}, ${sql.identifier('ordinality')})`;
}

function renderPredicate(table: DocumentKind, predicate: Predicate): SQL {
  switch (predicate.kind) {
    case 'compare': {
      const target = valueExpr(table, predicate.target, predicate.operand);
      return sql`${target} ${sql.raw(COMPARISON_SQL[predicate.operator])} ${operandParam(predicate.operand)}`;
    }
    case 'in': {
      const first = predicate.operands[0];
      const target = first === undefined ? jsonExpr(table, predicate.target) : valueExpr(table, predicate.target, first);
      return sql`${target} in (${sql.join(predicate.operands.map(operandParam), sql.raw(', '))})`;
    }
    case 'contains':
      return sql`${jsonExpr(table, predicate.target)} @> ${JSON.stringify([predicate.value])}::jsonb`;
    case 'like':
      return sql`lower(${textExpr(table, predicate.target)}) like ${predicate.pattern}`;
  }
}

function renderOrder(query: CompiledQuery): SQL[] {
  const table = query.from;
  const terms: SQL[] = [];
  const sort: OrderBy | null = query.orderBy;
  const direction = sql.raw(sort?.direction ?? 'asc');

  if (sort !== null) {
    terms.push(sort.target.kind === 'column'
      ? sql`${columnExpr(table, sort.target.column)} ${direction}`
      : sql`${jsonExpr(table, sort.target)} ${direction} nulls last`);
  }
  if (sort === null || sort.target.kind !== 'column' || sort.target.column !== 'id') {
    terms.push(sql`${columnExpr(table, 'id')} asc`);
  }
  if (query.explode !== null) {
    terms.push(sql`${qualified(query.explode.alias, 'ordinality')} asc`);
  }
  return terms;
}

/** Left-hand side of a comparison, extracted to match the operand's type. */
function valueExpr(table: DocumentKind, target: ValueRef, operand: Operand): SQL {
  if (target.kind === 'column') return columnExpr(table, target.column);
  switch (operand.type) {
    case 'text':
    case 'timestamp':
      return textExpr(table, target);
    case 'numeric':
      return numericExpr(table, target);
    case 'jsonb':
      return jsonExpr(table, target);
  }
}

function operandParam(operand: Operand): SQL {
  switch (operand.type) {
    case 'text':
      return sql`${operand.value}`;
    case 'numeric':
      return sql`${operand.value}::numeric`;
    case 'jsonb':
      return sql`${JSON.stringify(operand.value)}::jsonb`;
    case 'timestamp':
      return sql`${operand.value}::timestamptz`;
  }
}

function columnExpr(table: DocumentKind, column: ColumnName): SQL {
  return qualified(table, COLUMN_SQL_NAMES[column]);
}

function jsonBase(table: DocumentKind, target: ValueRef): SQL {
  if (target.kind === 'element') return qualified(target.alias, 'value');
  return qualified(table, 'doc');
}

function segmentsOf(target: ValueRef): readonly PathSegment[] {
  return target.kind === 'column' ? [] : target.segments;
}

function literal(segment: PathSegment): string {
  return segment.kind === 'key' ? `'${segment.key.replaceAll("'", "''")}'` : String(segment.index);
}

/** The addressed value as `jsonb`; absent paths yield NULL. */
function jsonExpr(table: DocumentKind, target: ValueRef): SQL {
  if (target.kind === 'column') return columnExpr(table, target.column);
  const arrows = segmentsOf(target).map((segment) => ` -> ${literal(segment)}`).join('');
  return sql`(${jsonBase(table, target)}${sql.raw(arrows)})`;
}

/** The addressed value as text: strings unquoted, other JSON as its text form. */
function textExpr(table: DocumentKind, target: ValueRef): SQL {
  if (target.kind === 'column') return columnExpr(table, target.column);
  const segments = segmentsOf(target);
  if (segments.length === 0) {
    return sql`(${jsonBase(table, target)} #>> '{}')`;
  }
  const arrows = segments
    .map((segment, i) => ` ${i === segments.length - 1 ? '->>' : '->'} ${literal(segment)}`)
    .join('');
  return sql`(${jsonBase(table, target)}${sql.raw(arrows)})`;
}

/** The addressed value as numeric, or NULL when it is not a JSON number. */
function numericExpr(table: DocumentKind, target: ValueRef): SQL {
  const json = jsonExpr(table, target);
  return sql`(case when jsonb_typeof(${json}) = 'number' then ${json}::numeric end)`;
}
