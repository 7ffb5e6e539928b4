import mongoose, { ClientSession } from 'mongoose';

import Extraction, {
  ExtractionRecord,
  ExtractionWithClauses,
  IExtraction,
  toExtractionRecord,
} from '@src/models/Extraction';
import Clause, { ClauseRecord, NewClause, toClauseDoc, toClauseRecord } from '@src/models/Clause';


/******************************************************************************
                                 Types
******************************************************************************/

export interface NewExtraction {
  filename: string;
  file_type: string;
  file_size: number;
}

export interface ExtractionPage {
  total: number;
  extractions: ExtractionWithClauses[];
}

/**
 * Store for extractions and their clauses. Implementations throw on store
 * errors; callers decide how to surface them.
 */
export interface ExtractionRepo {
  create(input: NewExtraction): Promise<ExtractionRecord>;
  /** Writes the clause batch and the `completed` transition in one commit. */
  complete(
    id: string,
    clauses: NewClause[],
    extraData: Record<string, unknown>,
  ): Promise<ExtractionWithClauses>;
  markFailed(id: string, message: string): Promise<ExtractionWithClauses>;
  findById(id: string): Promise<ExtractionWithClauses | null>;
  list(skip: number, limit: number): Promise<ExtractionPage>;
  /** Deletes the extraction and its clauses; false when nothing matched. */
  delete(id: string): Promise<boolean>;
}


/**
 * Where multi-document writes run atomically. A mongoose `Connection`
 * satisfies it; the session is threaded into every write.
 */
export interface TransactionHost {
  transaction<T>(work: (session?: ClientSession) => Promise<T>): Promise<T>;
}


/******************************************************************************
                              Mongo implementation
******************************************************************************/

export class MongoExtractionRepo implements ExtractionRepo {
  public constructor(private readonly connection: TransactionHost = mongoose.connection) {}

  public async create(input: NewExtraction): Promise<ExtractionRecord> {
    const doc = await Extraction.create({
      filename: input.filename,
      fileType: input.file_type,
      fileSize: input.file_size,
      status: 'processing',
    });
    return toExtractionRecord(doc);
  }

  // The result is built from what the transaction wrote; nothing is read back
  // after commit.
  public async complete(
    id: string,
    clauses: NewClause[],
    extraData: Record<string, unknown>,
  ): Promise<ExtractionWithClauses> {
    return this.connection.transaction(async (session) => {
      let written: ClauseRecord[] = [];
      if (clauses.length > 0) {
        const docs = await Clause.insertMany(
          clauses.map((c) => toClauseDoc(id, c)),
          { session },
        );
        written = docs.map((doc) => toClauseRecord(doc)).sort((a, b) => a.order - b.order);
      }
      const doc = await Extraction.findOneAndUpdate(
        { _id: id, status: 'processing' },
        { $set: { status: 'completed', extraData } },
        { new: true, session },
      );
      if (!doc) {
        throw new Error(`Extraction ${id} is not in processing state`);
      }
      return { ...toExtractionRecord(doc), clauses: written };
    });
  }

  // A failed run never committed clauses
  public async markFailed(id: string, message: string): Promise<ExtractionWithClauses> {
    const doc = await Extraction.findOneAndUpdate(
      { _id: id, status: 'processing' },
      { $set: { status: 'failed', errorMessage: message } },
      { new: true },
    );
    if (!doc) {
      throw new Error(`Extraction ${id} is not in processing state`);
    }
    return { ...toExtractionRecord(doc), clauses: [] };
  }

  public async findById(id: string): Promise<ExtractionWithClauses | null> {
    const doc = await Extraction.findById(id);
    if (!doc) return null;
    const clauses = await Clause.find({ extractionId: id }).sort({ order: 1 });
    return { ...toExtractionRecord(doc), clauses: clauses.map(toClauseRecord) };
  }

  public async list(skip: number, limit: number): Promise<ExtractionPage> {
    const [total, docs] = await Promise.all([
      Extraction.countDocuments(),
      Extraction.find().sort({ createdAt: -1, _id: -1 }).skip(skip).limit(limit),
    ]);
    return { total, extractions: await this.withClauses(docs) };
  }

  public async delete(id: string): Promise<boolean> {
    return this.connection.transaction(async (session) => {
      await Clause.deleteMany({ extractionId: id }, { session });
      const res = await Extraction.deleteOne({ _id: id }, { session });
      return res.deletedCount > 0;
    });
  }

  private async withClauses(docs: IExtraction[]): Promise<ExtractionWithClauses[]> {
    if (docs.length === 0) return [];
    const ids = docs.map((d) => String(d._id));
    const clauses = await Clause.find({ extractionId: { $in: ids } }).sort({ order: 1 });

    const byExtraction = new Map<string, ClauseRecord[]>();
    for (const clause of clauses.map(toClauseRecord)) {
      const bucket = byExtraction.get(clause.extraction_id) ?? [];
      bucket.push(clause);
      byExtraction.set(clause.extraction_id, bucket);
    }
    return docs.map((doc) => {
      const record = toExtractionRecord(doc);
      return { ...record, clauses: byExtraction.get(record.id) ?? [] };
    });
  }
}
