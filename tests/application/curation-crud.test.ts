import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/infrastructure/db/index.js', () => ({
  insertCuration: vi.fn(),
  findCurationById: vi.fn(),
  mergeCurationDocument: vi.fn(),
  deleteCuration: vi.fn(),
  selectEntities: vi.fn(),
  selectCurations: vi.fn(),
}));

import {
  createCuration,
  getCuration,
  updateCurationMerge,
  removeCuration,
  listCurationsForEntity,
  findCurationsByCategoryConcept,
  findCurationsByCurator,
} from '../../src/application/curation-crud.js';
import type { CreateCurationInput } from '../../src/application/curation-crud.js';
import {
  insertCuration,
  findCurationById,
  mergeCurationDocument,
  deleteCuration,
  selectCurations,
} from '../../src/infrastructure/db/index.js';
import { DocumentStoreError, isStoreError } from '../../src/domain/index.js';
import { db, fakeRunner, makeCuration } from './helpers.js';

const mockInsertCuration = vi.mocked(insertCuration);
const mockFindCurationById = vi.mocked(findCurationById);
const mockMergeCurationDocument = vi.mocked(mergeCurationDocument);
const mockDeleteCuration = vi.mocked(deleteCuration);
const mockSelectCurations = vi.mocked(selectCurations);

async function rejection(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (err) {
    if (isStoreError(err)) return err;
    throw err;
  }
  throw new Error('expected a DocumentStoreError');
}

const INPUT = {
  id: 'cur_1',
  entityId: 'rest_1',
  document: {
    curator: { id: 'curator_7', name: 'Sam' },
    categories: { cuisine: ['italian', 'pasta'] },
  },
};

beforeEach(() => {
  vi.clearAllMocks();
  mockSelectCurations.mockResolvedValue([]);
});

// ─── createCuration ──────────────────────────────────────────

describe('createCuration', () => {
  it('inserts a curation for an existing entity', async () => {
    const curation = makeCuration();
    mockInsertCuration.mockResolvedValue(curation);

    expect(await createCuration(fakeRunner(), INPUT)).toBe(curation);
    expect(mockInsertCuration).toHaveBeenCalledWith(db, INPUT);
  });

  it('reports a missing parent as ReferentialViolation', async () => {
    mockInsertCuration.mockRejectedValue(new DocumentStoreError('ReferentialViolation', 'violates foreign key constraint'));

    const err = await rejection(createCuration(fakeRunner(), { ...INPUT, entityId: 'rest_9' }));

    expect(err.kind).toBe('ReferentialViolation');
    expect(err.message).toBe('Curation "cur_1" references missing entity "rest_9"');
    expect(err.details).toEqual({ entityId: 'rest_9' });
  });

  it('names the id on a duplicate key', async () => {
    mockInsertCuration.mockRejectedValue(new DocumentStoreError('DuplicateKey', 'duplicate key'));

    const err = await rejection(createCuration(fakeRunner(), INPUT));

    expect(err.message).toBe('Curation "cur_1" already exists');
  });

  it('passes other store failures through', async () => {
    const outage = new DocumentStoreError('StoreUnavailable', 'connection refused');
    mockInsertCuration.mockRejectedValue(outage);

    expect(await rejection(createCuration(fakeRunner(), INPUT))).toBe(outage);
  });

  it('rejects a curator that is not an object', async () => {
    const curatorAsText = { ...INPUT, document: { curator: 'curator_7', categories: {} } } as unknown as CreateCurationInput;
    const err = await rejection(createCuration(fakeRunner(), curatorAsText));

    expect(err.kind).toBe('InvalidDocument');
    expect(mockInsertCuration).not.toHaveBeenCalled();
  });
});

// ─── getCuration / removeCuration ────────────────────────────

describe('getCuration', () => {
  it('fails with NotFound for an unknown id', async () => {
    mockFindCurationById.mockResolvedValue(null);

    const err = await rejection(getCuration(fakeRunner(), 'cur_404'));

    expect(err.kind).toBe('NotFound');
    expect(err.message).toBe('Curation "cur_404" not found');
  });

  it('returns the stored record', async () => {
    const curation = makeCuration();
    mockFindCurationById.mockResolvedValue(curation);

    expect(await getCuration(fakeRunner(), 'cur_1')).toBe(curation);
  });
});

describe('removeCuration', () => {
  it('is idempotent', async () => {
    mockDeleteCuration.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

    expect(await removeCuration(fakeRunner(), 'cur_1')).toBe(true);
    expect(await removeCuration(fakeRunner(), 'cur_1')).toBe(false);
    expect(mockDeleteCuration).toHaveBeenCalledTimes(2);
  });
});

// ─── updateCurationMerge ─────────────────────────────────────

describe('updateCurationMerge', () => {
  it('returns the merged curation', async () => {
    const merged = makeCuration({ version: 2 });
    mockMergeCurationDocument.mockResolvedValue({ status: 'updated', curation: merged });

    const patch = { notes: { public: 'Great pasta' } };
    expect(await updateCurationMerge(fakeRunner(), 'cur_1', patch, 1)).toBe(merged);
    expect(mockMergeCurationDocument).toHaveBeenCalledWith(db, 'cur_1', patch, 1);
  });

  it('fails with VersionConflict on a stale version', async () => {
    mockMergeCurationDocument.mockResolvedValue({ status: 'conflict' });

    const err = await rejection(updateCurationMerge(fakeRunner(), 'cur_1', { sources: [] }, 3));

    expect(err.kind).toBe('VersionConflict');
    expect(err.message).toBe('Curation "cur_1" is no longer at version 3');
  });

  it('refuses to replace categories with a non-object', async () => {
    const err = await rejection(updateCurationMerge(fakeRunner(), 'cur_1', { categories: ['italian'] }, 1));

    expect(err.kind).toBe('InvalidDocument');
    expect(mockMergeCurationDocument).not.toHaveBeenCalled();
  });
});

// ─── convenience reads ───────────────────────────────────────

describe('listCurationsForEntity', () => {
  it('filters on entityId, newest first', async () => {
    const curation = makeCuration();
    mockSelectCurations.mockResolvedValue([{ record: curation, element: null }]);

    expect(await listCurationsForEntity(fakeRunner(), 'rest_1')).toEqual([curation]);
    expect(mockSelectCurations).toHaveBeenCalledWith(db, {
      from: 'curations',
      explode: null,
      where: [{
        kind: 'compare',
        target: { kind: 'column', column: 'entityId' },
        operator: 'eq',
        operand: { type: 'text', value: 'rest_1' },
      }],
      orderBy: { target: { kind: 'column', column: 'createdAt' }, direction: 'desc' },
      limit: 50,
      offset: 0,
    });
  });
});

describe('findCurationsByCategoryConcept', () => {
  it('uses array containment on the category path', async () => {
    await findCurationsByCategoryConcept(fakeRunner(), 'cuisine', 'italian', { limit: 5 });

    expect(mockSelectCurations).toHaveBeenCalledWith(db, {
      from: 'curations',
      explode: null,
      where: [{
        kind: 'contains',
        target: { kind: 'document', segments: [{ kind: 'key', key: 'categories' }, { kind: 'key', key: 'cuisine' }] },
        value: 'italian',
      }],
      orderBy: null,
      limit: 5,
      offset: 0,
    });
  });

  it('quotes category names with spaces', async () => {
    await findCurationsByCategoryConcept(fakeRunner(), 'price range', '$$');

    expect(mockSelectCurations).toHaveBeenCalledWith(db, expect.objectContaining({
      where: [expect.objectContaining({
        target: { kind: 'document', segments: [{ kind: 'key', key: 'categories' }, { kind: 'key', key: 'price range' }] },
      })],
    }));
  });

  it('addresses category names holding quotes and slashes', async () => {
    await findCurationsByCategoryConcept(fakeRunner(), "chef's picks", 'tasting menu');
    await findCurationsByCategoryConcept(fakeRunner(), 'food/drink', 'wine bar');

    expect(mockSelectCurations.mock.calls.map(([, query]) => query.where[0])).toEqual([
      {
        kind: 'contains',
        target: { kind: 'document', segments: [{ kind: 'key', key: 'categories' }, { kind: 'key', key: "chef's picks" }] },
        value: 'tasting menu',
      },
      {
        kind: 'contains',
        target: { kind: 'document', segments: [{ kind: 'key', key: 'categories' }, { kind: 'key', key: 'food/drink' }] },
        value: 'wine bar',
      },
    ]);
  });

  it('rejects a category name that cannot be addressed', async () => {
    const err = await rejection(findCurationsByCategoryConcept(fakeRunner(), 'back\\slash', 'x'));
    expect(err.kind).toBe('InvalidQuery');
    expect(mockSelectCurations).not.toHaveBeenCalled();
  });
});

describe('findCurationsByCurator', () => {
  it('compares the curator id as text', async () => {
    await findCurationsByCurator(fakeRunner(), 'curator_7');

    expect(mockSelectCurations).toHaveBeenCalledWith(db, expect.objectContaining({
      where: [{
        kind: 'compare',
        target: { kind: 'document', segments: [{ kind: 'key', key: 'curator' }, { kind: 'key', key: 'id' }] },
        operator: 'eq',
        operand: { type: 'text', value: 'curator_7' },
      }],
      orderBy: null,
    }));
  });
});
