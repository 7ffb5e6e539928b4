import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';

import type { ClauseRecord } from '@src/models/Clause';

export type ExtractionStatus = 'processing' | 'completed' | 'failed';

export interface IExtraction extends Document<string> {
  filename: string;
  fileType: string;
  fileSize: number; // bytes
  status: ExtractionStatus;
  errorMessage?: string | null;
  extraData: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

/** Wire shape of an extraction; field names are part of the API contract. */
export interface ExtractionRecord {
  id: string;
  filename: string;
  file_type: string;
  file_size: number;
  status: ExtractionStatus;
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
  extra_data: Record<string, unknown>;
}

export interface ExtractionWithClauses extends ExtractionRecord {
  clauses: ClauseRecord[];
}

const ExtractionSchema = new Schema<IExtraction>(
  {
    _id: {
      type: String,
      default: () => uuidv4(),
    },
    filename: {
      type: String,
      required: true,
    },
    fileType: {
      type: String,
      required: true,
    },
    fileSize: {
      type: Number,
      required: true,
    },
    status: {
      type: String,
      enum: ['processing', 'completed', 'failed'],
      default: 'processing',
    },
    errorMessage: {
      type: String,
      default: null,
    },
    extraData: {
      type: Schema.Types.Mixed,
      default: {},
    },
  },
  {
    timestamps: true,
    minimize: false, // keep `extraData: {}` on freshly created records
  },
);

// Listing is newest first
ExtractionSchema.index({ createdAt: -1, _id: -1 });

export function toExtractionRecord(doc: IExtraction): ExtractionRecord {
  return {
    id: String(doc._id),
    filename: doc.filename,
    file_type: doc.fileType,
    file_size: doc.fileSize,
    status: doc.status,
    error_message: doc.errorMessage ?? null,
    created_at: doc.createdAt,
    updated_at: doc.updatedAt,
    extra_data: doc.extraData ?? {},
  };
}

export default mongoose.model<IExtraction>('Extraction', ExtractionSchema);
