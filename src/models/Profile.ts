import mongoose, { Document, Schema } from 'mongoose';
import { PipelineKind } from './GenerationRun';

/** A named set of form values that can be reapplied to a pipeline. */
export interface IProfile extends Document {
  name: string;
  pipeline: PipelineKind;
  settings: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

const ProfileSchema = new Schema<IProfile>(
  {
    name: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    pipeline: {
      type: String,
      enum: Object.values(PipelineKind),
      required: true,
    },
    settings: {
      type: Schema.Types.Mixed,
      default: {},
    },
  },
  {
    timestamps: true,
  }
);

export const Profile = mongoose.model<IProfile>('Profile', ProfileSchema);
