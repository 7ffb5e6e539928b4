import { v4 as uuidv4 } from 'uuid';

import type { ClauseRecord, NewClause } from '@src/models/Clause';
import type { ExtractionRecord, ExtractionWithClauses } from '@src/models/Extraction';
import type { ExtractionPage, ExtractionRepo, NewExtraction } from '@src/repos/ExtractionRepo';

/**
 * Process-local stand-in for the mongo repository. Timestamps come from a
 * ticking clock so creation order is always strict.
 */
export class InMemoryExtractionRepo implements ExtractionRepo {
  public readonly extractions = new Map<string, ExtractionRecord>();
  public readonly clauses: ClauseRecord[] = [];
  private tick = 0;

  private now(): Date {
    this.tick += 1;
    return new Date(Date.UTC(2024, 0, 1) + this.tick * 1000);
  }

  public async create(input: NewExtraction): Promise<ExtractionRecord> {
    const at = this.now();
    const record: ExtractionRecord = {
      id: uuidv4(),
      ...input,
      status: 'processing',
      error_message: null,
      created_at: at,
      updated_at: at,
      extra_data: {},
    };
    this.extractions.set(record.id, record);
    return { ...record };
  }

  public async complete(
    id: string,
    clauses: NewClause[],
    extraData: Record<string, unknown>,
  ): Promise<ExtractionWithClauses> {
    const record = this.mustBeProcessing(id);
    const at = this.now();
    for (const clause of clauses) {
      this.clauses.push({ ...clause, id: uuidv4(), extraction_id: id, created_at: at });
    }
    this.extractions.set(id, { ...record, status: 'completed', extra_data: extraData, updated_at: at });
    return this.withClauses(id);
  }

  public async markFailed(id: string, message: string): Promise<ExtractionWithClauses> {
    const record = this.mustBeProcessing(id);
    this.extractions.set(id, { ...record, status: 'failed', error_message: message, updated_at: this.now() });
    return this.withClauses(id);
  }

  public async findById(id: string): Promise<ExtractionWithClauses | null> {
    return this.extractions.has(id) ? this.withClauses(id) : null;
  }

  public async list(skip: number, limit: number): Promise<ExtractionPage> {
    const sorted = [...this.extractions.values()]
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime());
    return {
      total: sorted.length,
      extractions: sorted.slice(skip, skip + limit).map((r) => this.withClauses(r.id)),
    };
  }

  public async delete(id: string): Promise<boolean> {
    if (!this.extractions.delete(id)) return false;
    for (let i = this.clauses.length - 1; i >= 0; i--) {
      if (this.clauses[i].extraction_id === id) this.clauses.splice(i, 1);
    }
    return true;
  }

  private mustBeProcessing(id: string): ExtractionRecord {
    const record = this.extractions.get(id);
    if (!record || record.status !== 'processing') {
      throw new Error(`Extraction ${id} is not in processing state`);
    }
    return record;
  }

  private withClauses(id: string): ExtractionWithClauses {
    const record = this.extractions.get(id);
    if (!record) throw new Error(`Unknown extraction ${id}`);
    const clauses = this.clauses
      .filter((c) => c.extraction_id === id)
      .sort((a, b) => a.order - b.order)
      .map((c) => ({ ...c, extra_data: { ...c.extra_data } }));
    return { ...record, extra_data: { ...record.extra_data }, clauses };
  }
}
