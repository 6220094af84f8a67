import mongoose, { Document, Schema } from 'mongoose';

export enum PipelineKind {
  SHORT_FORM = 'short-form',
  LONG_FORM = 'long-form',
  SHORT_FORM_V2 = 'short-form-v2',
  LONG_FORM_V2 = 'long-form-v2',
  EBOOK = 'ebook',
  UGC = 'ugc',
}

export enum RunStatus {
  PENDING = 'PENDING',
  RUNNING = 'RUNNING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

export interface IGenerationRun extends Document {
  kind: PipelineKind;
  input: Record<string, unknown>;
  status: RunStatus;
  /** 0 to 1 */
  progress: number;
  progressMessage?: string;
  failedStep?: string;
  errorMessage?: string;
  outputPaths: string[];
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
}

const GenerationRunSchema = new Schema<IGenerationRun>(
  {
    kind: {
      type: String,
      enum: Object.values(PipelineKind),
      required: true,
    },
    input: {
      type: Schema.Types.Mixed,
      required: true,
    },
    status: {
      type: String,
      enum: Object.values(RunStatus),
      default: RunStatus.PENDING,
    },
    progress: {
      type: Number,
      default: 0,
    },
    progressMessage: {
      type: String,
    },
    failedStep: {
      type: String,
    },
    errorMessage: {
      type: String,
    },
    outputPaths: {
      type: [String],
      default: [],
    },
    completedAt: {
      type: Date,
    },
  },
  {
    timestamps: true,
  }
);

GenerationRunSchema.index({ status: 1, createdAt: -1 });

export const GenerationRun = mongoose.model<IGenerationRun>('GenerationRun', GenerationRunSchema);
