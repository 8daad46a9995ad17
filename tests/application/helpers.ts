import pino from 'pino';
import type { Curation, Entity } from '../../src/domain/index.js';
import type { Database, QueryRunner, RunOptions } from '../../src/infrastructure/db/index.js';

/** Placeholder: use cases only pass `db` through to the repositories. */
export const db = {} as Database;

/**
 * In-process stand-in for the connection pool: runs the work immediately
 * against the placeholder `db`. Spy on `run` to assert the options.
 */
export function fakeRunner(): QueryRunner {
  return {
    log: pino({ level: 'silent' }),
    run: <T>(work: (db: Database) => Promise<T>, _options?: RunOptions): Promise<T> => work(db),
  };
}

export const CREATED_AT = new Date('2026-03-01T09:00:00.000Z');

export function makeEntity(overrides: Partial<Entity> = {}): Entity {
  return {
    id: 'rest_1',
    type: 'restaurant',
    document: { name: 'Pasta Place', metadata: [], status: 'draft' },
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    version: 1,
    ...overrides,
  };
}

export function makeCuration(overrides: Partial<Curation> = {}): Curation {
  return {
    id: 'cur_1',
    entityId: 'rest_1',
    document: {
      curator: { id: 'curator_7', name: 'Sam' },
      categories: { cuisine: ['italian', 'pasta'] },
    },
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    version: 1,
    ...overrides,
  };
}
