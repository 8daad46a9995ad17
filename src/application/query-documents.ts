import type { Curation, Entity } from '../domain/index.js';
import type { QueryMatch, QueryRunner } from '../infrastructure/db/index.js';
import { selectCurations, selectEntities } from '../infrastructure/db/index.js';
import { compileQuery, DEFAULT_LIMIT, MAX_LIMIT } from './query/compile.js';
import type { CompileLimits } from './query/compile.js';
import { queryBodySchema, queryRequestSchema } from './query/request.js';
import type { QueryBody, QueryRequest } from './query/request.js';
import { parseOrThrow, runOptions } from './validation.js';
import type { CallOptions } from './validation.js';

export interface QueryOptions extends CallOptions {
  limits?: CompileLimits;
}

export interface QueryResult<R> {
  data: QueryMatch<R>[];
  pagination: { limit: number; offset: number; count: number };
}

export type DocumentQueryResult =
  | ({ from: 'entities' } & QueryResult<Entity>)
  | ({ from: 'curations' } & QueryResult<Curation>);

const DEFAULT_LIMITS: CompileLimits = { defaultLimit: DEFAULT_LIMIT, maxLimit: MAX_LIMIT };

/**
 * Use case: run a query over entities.
 * Compilation errors surface as InvalidQuery before the pool is touched.
 */
export async function queryEntities(
  runner: QueryRunner,
  body: QueryBody,
  options: QueryOptions = {},
): Promise<QueryResult<Entity>> {
  const parsed = parseOrThrow(queryBodySchema, body, 'InvalidQuery', 'query');
  const compiled = compileQuery('entities', parsed, options.limits ?? DEFAULT_LIMITS);

  const data = await runner.run(
    (db) => selectEntities(db, compiled),
    { ...runOptions(options, 'query.entities'), invalidInputKind: 'InvalidQuery' },
  );

  return {
    data,
    pagination: { limit: compiled.limit, offset: compiled.offset, count: data.length },
  };
}

/** Use case: run a query over curations. */
export async function queryCurations(
  runner: QueryRunner,
  body: QueryBody,
  options: QueryOptions = {},
): Promise<QueryResult<Curation>> {
  const parsed = parseOrThrow(queryBodySchema, body, 'InvalidQuery', 'query');
  const compiled = compileQuery('curations', parsed, options.limits ?? DEFAULT_LIMITS);

  const data = await runner.run(
    (db) => selectCurations(db, compiled),
    { ...runOptions(options, 'query.curations'), invalidInputKind: 'InvalidQuery' },
  );

  return {
    data,
    pagination: { limit: compiled.limit, offset: compiled.offset, count: data.length },
  };
}

/** Use case: run a query whose target table is named in the request. */
export async function executeQuery(
  runner: QueryRunner,
  request: QueryRequest,
  options: QueryOptions = {},
): Promise<DocumentQueryResult> {
  const { from, ...body } = parseOrThrow(queryRequestSchema, request, 'InvalidQuery', 'query');

  if (from === 'entities') {
    return { from, ...(await queryEntities(runner, body, options)) };
  }
  return { from, ...(await queryCurations(runner, body, options)) };
}
