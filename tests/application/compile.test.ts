import { describe, it, expect } from 'vitest';
import { compileQuery, escapeLike } from '../../src/application/query/compile.js';
import { queryBodySchema } from '../../src/application/query/request.js';
import type { QueryBody } from '../../src/application/query/request.js';
import { isStoreError } from '../../src/domain/index.js';

function compileEntities(body: QueryBody) {
  return compileQuery('entities', queryBodySchema.parse(body));
}

function compileCurations(body: QueryBody) {
  return compileQuery('curations', queryBodySchema.parse(body));
}

function invalidQueryMessage(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (isStoreError(err, 'InvalidQuery')) return err.message;
    throw err;
  }
  throw new Error('expected InvalidQuery');
}

const NAME = { kind: 'document', segments: [{ kind: 'key', key: 'name' }] };

// ─── pagination ──────────────────────────────────────────────

describe('compileQuery pagination', () => {
  it('defaults to limit=50, offset=0, no filters and no sort', () => {
    expect(compileEntities({})).toEqual({
      from: 'entities',
      explode: null,
      where: [],
      orderBy: null,
      limit: 50,
      offset: 0,
    });
  });

  it('clamps limit=0 up to 1', () => {
    expect(compileEntities({ limit: 0 }).limit).toBe(1);
  });

  it('clamps limit=9999 down to 500', () => {
    expect(compileEntities({ limit: 9999 }).limit).toBe(500);
  });

  it('clamps a negative offset to 0', () => {
    expect(compileEntities({ offset: -3 }).offset).toBe(0);
  });

  it('honours configured limits', () => {
    const limits = { defaultLimit: 10, maxLimit: 20 };
    expect(compileQuery('entities', queryBodySchema.parse({}), limits).limit).toBe(10);
    expect(compileQuery('entities', queryBodySchema.parse({ limit: 100 }), limits).limit).toBe(20);
  });
});

// ─── filters ─────────────────────────────────────────────────

describe('compileQuery filters', () => {
  it('compares strings as text', () => {
    const { where } = compileEntities({ filters: [{ path: '$.status', operator: 'eq', value: 'active' }] });
    expect(where).toEqual([{
      kind: 'compare',
      target: { kind: 'document', segments: [{ kind: 'key', key: 'status' }] },
      operator: 'eq',
      operand: { type: 'text', value: 'active' },
    }]);
  });

  it('compares numbers as numeric', () => {
    const { where } = compileEntities({ filters: [{ path: '$.rating', operator: 'gte', value: 4 }] });
    expect(where[0]).toMatchObject({ kind: 'compare', operator: 'gte', operand: { type: 'numeric', value: 4 } });
  });

  it('compares booleans as jsonb for eq and ne only', () => {
    const { where } = compileEntities({ filters: [{ path: '$.featured', operator: 'ne', value: true }] });
    expect(where[0]).toMatchObject({ operand: { type: 'jsonb', value: true } });

    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: '$.featured', operator: 'lt', value: true }],
    }))).toBe('"lt" needs a string or number, got true');
  });

  it('rejects null values', () => {
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: '$.closedAt', operator: 'eq', value: null }],
    }))).toBe('null is not a comparable value');
  });

  it('compiles "in" over a homogeneous list', () => {
    const { where } = compileEntities({ filters: [{ path: 'type', operator: 'in', value: ['hotel', 'restaurant'] }] });
    expect(where).toEqual([{
      kind: 'in',
      target: { kind: 'column', column: 'type' },
      operands: [{ type: 'text', value: 'hotel' }, { type: 'text', value: 'restaurant' }],
    }]);
  });

  it('rejects an empty "in" list', () => {
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: '$.status', operator: 'in', value: [] }],
    }))).toBe('"in" on "$.status" needs a non-empty list');
  });

  it('rejects mixed and boolean "in" lists', () => {
    const expected = '"in" on "$.status" needs a list of only strings or only numbers';
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: '$.status', operator: 'in', value: ['a', 1] }],
    }))).toBe(expected);
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: '$.status', operator: 'in', value: [true, false] }],
    }))).toBe(expected);
  });

  it('compiles "contains" against a document path', () => {
    const { where } = compileCurations({
      filters: [{ path: '$.categories.cuisine', operator: 'contains', value: 'italian' }],
    });
    expect(where).toEqual([{
      kind: 'contains',
      target: { kind: 'document', segments: [{ kind: 'key', key: 'categories' }, { kind: 'key', key: 'cuisine' }] },
      value: 'italian',
    }]);
  });

  it('rejects "contains" on a column', () => {
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: 'id', operator: 'contains', value: 'x' }],
    }))).toBe('"contains" needs a JSON array path, got column "id"');
  });

  it('lowercases and escapes "like" patterns', () => {
    const { where } = compileEntities({ filters: [{ path: '$.name', operator: 'like', value: 'Pizza_%' }] });
    expect(where).toEqual([{ kind: 'like', target: NAME, pattern: '%pizza\\_\\%%' }]);
  });

  it('rejects "like" on non-text columns and non-string values', () => {
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: 'version', operator: 'like', value: '1' }],
    }))).toBe('"like" is only supported on text columns, got "version"');
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: '$.name', operator: 'like', value: 3 }],
    }))).toBe('"like" on "$.name" needs a string');
  });

  it('types column operands by column', () => {
    const { where } = compileEntities({
      filters: [
        { path: 'createdAt', operator: 'gte', value: '2026-01-01T00:00:00Z' },
        { path: 'version', operator: 'gt', value: 2 },
      ],
    });
    expect(where).toEqual([
      {
        kind: 'compare',
        target: { kind: 'column', column: 'createdAt' },
        operator: 'gte',
        operand: { type: 'timestamp', value: '2026-01-01T00:00:00Z' },
      },
      {
        kind: 'compare',
        target: { kind: 'column', column: 'version' },
        operator: 'gt',
        operand: { type: 'numeric', value: 2 },
      },
    ]);
  });

  it('rejects column operands of the wrong type', () => {
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: 'version', operator: 'eq', value: '1' }],
    }))).toBe('Column "version" cannot be compared with "1"');
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: 'updatedAt', operator: 'lt', value: 'yesterday' }],
    }))).toBe('Column "updatedAt" cannot be compared with "yesterday"');
  });

  it('only resolves the columns of the queried table', () => {
    expect(invalidQueryMessage(() => compileEntities({
      filters: [{ path: 'entityId', operator: 'eq', value: 'rest_1' }],
    }))).toBe('Path "entityId" does not refer to the document, the explode alias or a entities column');
    expect(compileCurations({ filters: [{ path: 'entityId', operator: 'eq', value: 'rest_1' }] }).where[0])
      .toMatchObject({ target: { kind: 'column', column: 'entityId' } });
    expect(() => compileCurations({ filters: [{ path: 'type', operator: 'eq', value: 'hotel' }] })).toThrow();
  });

  it('rejects segments after a column name', () => {
    expect(() => compileEntities({ filters: [{ path: 'id.x', operator: 'eq', value: 'a' }] })).toThrow(
      'Path "id.x" does not refer to the document, the explode alias or a entities column',
    );
  });
});

// ─── explode & sort ──────────────────────────────────────────

describe('compileQuery explode and sort', () => {
  it('resolves filters on the explode alias to the element', () => {
    const compiled = compileEntities({
      explode: { path: '$.metadata', as: 'm' },
      filters: [{ path: 'm.type', operator: 'eq', value: 'collector' }],
    });
    expect(compiled.explode).toEqual({
      alias: 'm',
      source: { kind: 'document', segments: [{ kind: 'key', key: 'metadata' }] },
    });
    expect(compiled.where[0]).toMatchObject({
      target: { kind: 'element', alias: 'm', segments: [{ kind: 'key', key: 'type' }] },
    });
  });

  it('rejects an alias that is not a plain identifier or shadows a column', () => {
    const message = (as: string) => `Explode alias "${as}" must be a plain identifier that is not a column or table name`;
    expect(invalidQueryMessage(() => compileEntities({ explode: { path: '$.metadata', as: 'bad-alias' } })))
      .toBe(message('bad-alias'));
    expect(invalidQueryMessage(() => compileEntities({ explode: { path: '$.metadata', as: 'id' } })))
      .toBe(message('id'));
  });

  it('requires the explode source to be a document path', () => {
    expect(invalidQueryMessage(() => compileEntities({ explode: { path: 'id', as: 'm' } })))
      .toBe('Explode path "id" must address the document ("$...")');
  });

  it('does not resolve an alias without an explode', () => {
    expect(() => compileEntities({ filters: [{ path: 'm.type', operator: 'eq', value: 'x' }] })).toThrow(
      'Path "m.type" does not refer to the document, the explode alias or a entities column',
    );
  });

  it('defaults the sort direction to asc', () => {
    expect(compileEntities({ sort: { path: '$.name' } }).orderBy).toEqual({ target: NAME, direction: 'asc' });
  });
});

describe('escapeLike', () => {
  it('escapes wildcards and the escape character', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });
});
