import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ClientSession } from 'mongoose';

const extractionModel = vi.hoisted(() => ({
  findOneAndUpdate: vi.fn(),
  findById: vi.fn(),
  find: vi.fn(),
  countDocuments: vi.fn(),
  deleteOne: vi.fn(),
}));

const clauseModel = vi.hoisted(() => ({
  insertMany: vi.fn(),
  find: vi.fn(),
  deleteMany: vi.fn(),
}));

vi.mock('@src/models/Extraction', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@src/models/Extraction')>()),
  default: extractionModel,
}));

vi.mock('@src/models/Clause', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@src/models/Clause')>()),
  default: clauseModel,
}));

import type { NewClause } from '@src/models/Clause';
import { MongoExtractionRepo, type TransactionHost } from '@src/repos/ExtractionRepo';

/** Runs the work in-process and counts how many transactions were opened. */
class InlineTransactions implements TransactionHost {
  public runs = 0;

  public async transaction<T>(work: (session?: ClientSession) => Promise<T>): Promise<T> {
    this.runs += 1;
    return work();
  }
}

const CREATED = new Date('2024-01-01T00:00:00.000Z');

function extractionDoc(overrides: Record<string, unknown> = {}) {
  return {
    _id: 'ext-1',
    filename: 'contract.txt',
    fileType: 'txt',
    fileSize: 23,
    status: 'processing',
    errorMessage: null,
    extraData: {},
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

function clauseDoc(extractionId: string, order: number) {
  return {
    _id: `${extractionId}-clause-${order}`,
    extractionId,
    clauseType: 'payment_terms',
    title: `Clause ${order + 1}`,
    content: 'Payment due in 30 days.',
    order,
    extraData: { summary: 'Net 30.' },
    createdAt: CREATED,
  };
}

const NEW_CLAUSES: NewClause[] = [
  {
    clause_type: 'termination',
    title: 'Termination',
    content: 'Either party may terminate.',
    order: 1,
    extra_data: { summary: 'Ends on notice.' },
  },
  { clause_type: '', title: null, content: '', order: 0, extra_data: { summary: '' } },
];

let tx: InlineTransactions;
let repo: MongoExtractionRepo;

beforeEach(() => {
  vi.resetAllMocks();
  tx = new InlineTransactions();
  repo = new MongoExtractionRepo(tx);
});

describe('MongoExtractionRepo.complete', () => {
  it('writes clauses and the status change in one transaction and returns what it wrote', async () => {
    clauseModel.insertMany.mockImplementation(async (docs: Array<Record<string, unknown>>) =>
      docs.map((doc, i) => ({ _id: `written-${i}`, createdAt: CREATED, ...doc })));
    extractionModel.findOneAndUpdate.mockResolvedValue(
      extractionDoc({ status: 'completed', extraData: { total_clauses: 2, text_length: 23 } }),
    );

    const result = await repo.complete('ext-1', NEW_CLAUSES, { total_clauses: 2, text_length: 23 });

    expect(tx.runs).toBe(1);
    expect(clauseModel.insertMany).toHaveBeenCalledWith(
      [
        {
          extractionId: 'ext-1',
          clauseType: 'termination',
          title: 'Termination',
          content: 'Either party may terminate.',
          order: 1,
          extraData: { summary: 'Ends on notice.' },
        },
        { extractionId: 'ext-1', clauseType: '', title: null, content: '', order: 0, extraData: { summary: '' } },
      ],
      { session: undefined },
    );
    expect(extractionModel.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'ext-1', status: 'processing' },
      { $set: { status: 'completed', extraData: { total_clauses: 2, text_length: 23 } } },
      { new: true, session: undefined },
    );
    expect(result).toMatchObject({
      id: 'ext-1',
      status: 'completed',
      extra_data: { total_clauses: 2, text_length: 23 },
    });
    expect(result.clauses.map((c) => [c.id, c.order, c.clause_type])).toEqual([
      ['written-1', 0, ''],
      ['written-0', 1, 'termination'],
    ]);
    expect(extractionModel.findById).not.toHaveBeenCalled();
    expect(clauseModel.find).not.toHaveBeenCalled();
  });

  it('skips the clause insert for an empty batch', async () => {
    extractionModel.findOneAndUpdate.mockResolvedValue(extractionDoc({ status: 'completed' }));

    const result = await repo.complete('ext-1', [], { total_clauses: 0, text_length: 23 });

    expect(clauseModel.insertMany).not.toHaveBeenCalled();
    expect(result.clauses).toEqual([]);
  });

  it('aborts when the extraction is no longer processing', async () => {
    clauseModel.insertMany.mockResolvedValue([]);
    extractionModel.findOneAndUpdate.mockResolvedValue(null);

    await expect(repo.complete('ext-1', NEW_CLAUSES, {})).rejects.toThrow(
      'Extraction ext-1 is not in processing state',
    );
  });
});

describe('MongoExtractionRepo.markFailed', () => {
  it('moves a processing extraction to failed without reading clauses', async () => {
    extractionModel.findOneAndUpdate.mockResolvedValue(
      extractionDoc({ status: 'failed', errorMessage: 'No text could be extracted from the document' }),
    );

    const result = await repo.markFailed('ext-1', 'No text could be extracted from the document');

    expect(extractionModel.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'ext-1', status: 'processing' },
      { $set: { status: 'failed', errorMessage: 'No text could be extracted from the document' } },
      { new: true },
    );
    expect(result).toMatchObject({
      status: 'failed',
      error_message: 'No text could be extracted from the document',
      clauses: [],
    });
    expect(clauseModel.find).not.toHaveBeenCalled();
    expect(tx.runs).toBe(0);
  });

  it('refuses to touch a terminal extraction', async () => {
    extractionModel.findOneAndUpdate.mockResolvedValue(null);

    await expect(repo.markFailed('ext-1', 'late failure')).rejects.toThrow(
      'Extraction ext-1 is not in processing state',
    );
  });
});

describe('MongoExtractionRepo reads', () => {
  it('returns null for an unknown id without querying clauses', async () => {
    extractionModel.findById.mockResolvedValue(null);

    expect(await repo.findById('missing')).toBeNull();
    expect(clauseModel.find).not.toHaveBeenCalled();
  });

  it('attaches clauses in order to a found extraction', async () => {
    const clauseSort = vi.fn().mockResolvedValue([clauseDoc('ext-1', 0), clauseDoc('ext-1', 1)]);
    extractionModel.findById.mockResolvedValue(extractionDoc({ status: 'completed' }));
    clauseModel.find.mockReturnValue({ sort: clauseSort });

    const found = await repo.findById('ext-1');

    expect(clauseModel.find).toHaveBeenCalledWith({ extractionId: 'ext-1' });
    expect(clauseSort).toHaveBeenCalledWith({ order: 1 });
    expect(found?.clauses.map((c) => c.id)).toEqual(['ext-1-clause-0', 'ext-1-clause-1']);
  });

  it('pages newest first with an id tie-break and groups clauses per extraction', async () => {
    const page = { sort: vi.fn(), skip: vi.fn(), limit: vi.fn() };
    page.sort.mockReturnValue(page);
    page.skip.mockReturnValue(page);
    page.limit.mockResolvedValue([extractionDoc({ _id: 'ext-2' }), extractionDoc({ _id: 'ext-1' })]);
    extractionModel.find.mockReturnValue(page);
    extractionModel.countDocuments.mockResolvedValue(5);
    const clauseSort = vi.fn().mockResolvedValue([
      clauseDoc('ext-1', 0),
      clauseDoc('ext-2', 0),
      clauseDoc('ext-1', 1),
    ]);
    clauseModel.find.mockReturnValue({ sort: clauseSort });

    const result = await repo.list(2, 2);

    expect(page.sort).toHaveBeenCalledWith({ createdAt: -1, _id: -1 });
    expect(page.skip).toHaveBeenCalledWith(2);
    expect(page.limit).toHaveBeenCalledWith(2);
    expect(clauseModel.find).toHaveBeenCalledWith({ extractionId: { $in: ['ext-2', 'ext-1'] } });
    expect(result.total).toBe(5);
    expect(result.extractions.map((e) => [e.id, e.clauses.map((c) => c.order)])).toEqual([
      ['ext-2', [0]],
      ['ext-1', [0, 1]],
    ]);
  });

  it('does not query clauses for an empty page', async () => {
    const page = { sort: vi.fn(), skip: vi.fn(), limit: vi.fn() };
    page.sort.mockReturnValue(page);
    page.skip.mockReturnValue(page);
    page.limit.mockResolvedValue([]);
    extractionModel.find.mockReturnValue(page);
    extractionModel.countDocuments.mockResolvedValue(3);

    expect(await repo.list(10, 5)).toEqual({ total: 3, extractions: [] });
    expect(clauseModel.find).not.toHaveBeenCalled();
  });
});

describe('MongoExtractionRepo.delete', () => {
  it('deletes clauses before the extraction inside one transaction', async () => {
    clauseModel.deleteMany.mockResolvedValue({ deletedCount: 2 });
    extractionModel.deleteOne.mockResolvedValue({ deletedCount: 1 });

    expect(await repo.delete('ext-1')).toBe(true);

    expect(tx.runs).toBe(1);
    expect(clauseModel.deleteMany).toHaveBeenCalledWith({ extractionId: 'ext-1' }, { session: undefined });
    expect(extractionModel.deleteOne).toHaveBeenCalledWith({ _id: 'ext-1' }, { session: undefined });
    expect(clauseModel.deleteMany.mock.invocationCallOrder[0]).toBeLessThan(
      extractionModel.deleteOne.mock.invocationCallOrder[0],
    );
  });

  it('reports false when nothing matched', async () => {
    clauseModel.deleteMany.mockResolvedValue({ deletedCount: 0 });
    extractionModel.deleteOne.mockResolvedValue({ deletedCount: 0 });

    expect(await repo.delete('missing')).toBe(false);
  });
});
