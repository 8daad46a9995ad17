export { parseJsonPath, documentPath } from './json-path.js';
export type { PathSegment, ParsedPath } from './json-path.js';
export { compileQuery, escapeLike, DEFAULT_LIMIT, MAX_LIMIT } from './compile.js';
export type { CompileLimits } from './compile.js';
export { queryRequestSchema, queryBodySchema, queryFilterSchema, filterOperatorSchema } from './request.js';
export type { QueryFilter, QueryBody, ParsedQueryBody, QueryRequest } from './request.js';
export type {
  ColumnName,
  CompiledQuery,
  ComparisonOperator,
  Explode,
  FilterOperator,
  Operand,
  OrderBy,
  Predicate,
  SortDirection,
  ValueRef,
} from './ast.js';
