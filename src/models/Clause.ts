import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';

export interface IClause extends Document<string> {
  extractionId: string;
  clauseType: string;
  title?: string | null;
  content: string;
  order: number; // zero-based position in the interpreter output
  extraData: Record<string, unknown>;
  createdAt: Date;
}

export interface ClauseRecord {
  id: string;
  extraction_id: string;
  clause_type: string;
  title: string | null;
  content: string;
  order: number;
  extra_data: Record<string, unknown>;
  created_at: Date;
}

/** A clause as handed to the store, before it has an id. */
export type NewClause = Omit<ClauseRecord, 'id' | 'extraction_id' | 'created_at'>;

const ClauseSchema = new Schema<IClause>(
  {
    _id: {
      type: String,
      default: () => uuidv4(),
    },
    extractionId: {
      type: String,
      ref: 'Extraction',
      required: true,
    },
    clauseType: {
      type: String,
      default: 'unknown', // '' from the model is stored as given
    },
    title: {
      type: String,
      default: null,
    },
    content: {
      type: String,
      default: '',
    },
    order: {
      type: Number,
      required: true,
    },
    extraData: {
      type: Schema.Types.Mixed,
      default: {},
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
    minimize: false,
  },
);

ClauseSchema.index({ extractionId: 1, order: 1 });

export type ClauseDoc = Pick<IClause, 'extractionId' | 'clauseType' | 'title' | 'content' | 'order' | 'extraData'>;

/** Document fields for a clause about to be inserted. */
export function toClauseDoc(extractionId: string, clause: NewClause): ClauseDoc {
  return {
    extractionId,
    clauseType: clause.clause_type,
    title: clause.title,
    content: clause.content,
    order: clause.order,
    extraData: clause.extra_data,
  };
}

export function toClauseRecord(doc: IClause): ClauseRecord {
  return {
    id: String(doc._id),
    extraction_id: doc.extractionId,
    clause_type: doc.clauseType,
    title: doc.title ?? null,
    content: doc.content,
    order: doc.order,
    extra_data: doc.extraData ?? {},
    created_at: doc.createdAt,
  };
}

export default mongoose.model<IClause>('Clause', ClauseSchema);
