import logger from 'jet-logger';

import { SUPPORTED_FILE_TYPES, SupportedFileType } from '@src/common/constants';
import { describeError, fail, Failure, ok, Result } from '@src/common/util/failures';
import type { NewClause } from '@src/models/Clause';
import type { ExtractionRecord, ExtractionWithClauses } from '@src/models/Extraction';
import type { ExtractionPage, ExtractionRepo } from '@src/repos/ExtractionRepo';
import type { ClauseInterpreter, InterpretedClause } from '@src/services/clauseInterpreter';
import type { ExtractTextFn } from '@src/services/textExtractor';


/******************************************************************************
                                 Types
******************************************************************************/

export interface UploadedDocument {
  filename: string | undefined;
  content: Buffer;
}

/**
 * A submission that got past validation but did not complete. The record
 * has already been stored in `failed` state.
 */
export interface SubmissionFailure extends Failure {
  extraction?: ExtractionWithClauses;
}

export type SubmitResult =
  | { ok: true; value: ExtractionWithClauses }
  | { ok: false; error: SubmissionFailure };

export interface ExtractionListing extends ExtractionPage {
  skip: number;
  limit: number;
}


/******************************************************************************
                                Helpers
******************************************************************************/

function isSupported(ext: string): ext is SupportedFileType {
  return (SUPPORTED_FILE_TYPES as readonly string[]).includes(ext);
}

function asText(value: unknown, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  return typeof value === 'string' ? value : String(value);
}

/**
 * Map interpreter output onto stored clauses. Position here is the index in
 * the already-filtered list, so titles may be numbered differently from the
 * interpreter's own defaults when entries were dropped.
 */
export function toNewClauses(clauses: InterpretedClause[]): NewClause[] {
  return clauses.map((clause, order) => ({
    clause_type: asText(clause['clause_type'], 'unknown'),
    title: clause.title === null ? null : asText(clause.title, `Clause ${order + 1}`),
    content: asText(clause['content'], ''),
    order,
    extra_data: { summary: asText(clause.summary, '') },
  }));
}


/******************************************************************************
                                Service
******************************************************************************/

export class ExtractionService {
  public constructor(
    private readonly repo: ExtractionRepo,
    private readonly extractText: ExtractTextFn,
    private readonly interpreter: ClauseInterpreter,
  ) {}

  /**
   * Validate, record, extract, interpret, persist. Once the `processing`
   * record exists the run always ends in `completed` or `failed`.
   */
  public async submit(upload: UploadedDocument): Promise<SubmitResult> {
    const validated = this.validateFilename(upload.filename);
    if (!validated.ok) return validated;
    const { filename, fileType } = validated.value;

    logger.info(`Processing file: ${filename} (${fileType}), size: ${upload.content.length} bytes`);

    let created: ExtractionRecord;
    try {
      created = await this.repo.create({
        filename,
        file_type: fileType,
        file_size: upload.content.length,
      });
    } catch (err) {
      logger.err(`Could not create extraction record: ${describeError(err)}`);
      return fail('PersistenceFailure', `Failed to store extraction: ${describeError(err)}`, { cause: err });
    }
    logger.info(`Created extraction record: ${created.id}`);

    const outcome = await this.process(created.id, upload.content, fileType);
    if (outcome.ok) {
      logger.info(`Successfully completed extraction ${created.id}`);
      return outcome;
    }

    logger.err(`Extraction ${created.id} failed: ${outcome.error.message}`);
    try {
      const extraction = await this.repo.markFailed(created.id, outcome.error.message);
      return { ok: false, error: { ...outcome.error, extraction } };
    } catch (err) {
      logger.err(`Could not record failure of extraction ${created.id}: ${describeError(err)}`);
      return fail('PersistenceFailure', `Failed to record extraction failure: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  public async get(id: string): Promise<Result<ExtractionWithClauses>> {
    try {
      const extraction = await this.repo.findById(id);
      if (!extraction) return fail('NotFound', `Extraction not found: ${id}`);
      return ok(extraction);
    } catch (err) {
      logger.err(`Error retrieving extraction ${id}: ${describeError(err)}`);
      return fail('PersistenceFailure', `Failed to retrieve extraction: ${describeError(err)}`, { cause: err });
    }
  }

  public async list(skip: number, limit: number): Promise<Result<ExtractionListing>> {
    try {
      const page = await this.repo.list(skip, limit);
      return ok({ total: page.total, skip, limit, extractions: page.extractions });
    } catch (err) {
      logger.err(`Error listing extractions: ${describeError(err)}`);
      return fail('PersistenceFailure', `Failed to list extractions: ${describeError(err)}`, { cause: err });
    }
  }

  public async remove(id: string): Promise<Result<{ id: string }>> {
    try {
      const deleted = await this.repo.delete(id);
      if (!deleted) return fail('NotFound', `Extraction not found: ${id}`);
      logger.info(`Deleted extraction ${id}`);
      return ok({ id });
    } catch (err) {
      logger.err(`Error deleting extraction ${id}: ${describeError(err)}`);
      return fail('PersistenceFailure', `Failed to delete extraction: ${describeError(err)}`, { cause: err });
    }
  }

  private validateFilename(
    filename: string | undefined,
  ): Result<{ filename: string; fileType: SupportedFileType }> {
    if (!filename) {
      return fail('InvalidInput', 'No filename provided');
    }
    const ext = filename.split('.').pop()?.toLowerCase() ?? '';
    if (!filename.includes('.') || !isSupported(ext)) {
      return fail(
        'InvalidInput',
        `Unsupported file type: ${ext}. Only PDF, DOCX, and TXT files are supported.`,
      );
    }
    return ok({ filename, fileType: ext });
  }

  private async process(
    id: string,
    content: Buffer,
    fileType: SupportedFileType,
  ): Promise<Result<ExtractionWithClauses>> {
    const text = await this.extractText(content, fileType);
    if (!text.ok) return text;
    if (text.value.trim() === '') {
      return fail('ExtractionEmpty', 'No text could be extracted from the document');
    }
    logger.info(`Extracted ${text.value.length} characters from document`);

    const interpreted = await this.interpreter.extractClauses(text.value);
    if (!interpreted.ok) return interpreted;
    logger.info(`LLM extracted ${interpreted.value.length} clauses`);

    try {
      const extraction = await this.repo.complete(id, toNewClauses(interpreted.value), {
        total_clauses: interpreted.value.length,
        text_length: text.value.length,
      });
      return ok(extraction);
    } catch (err) {
      return fail('PersistenceFailure', `Failed to store clauses: ${describeError(err)}`, { cause: err });
    }
  }
}
