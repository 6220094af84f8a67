import mongoose, { Document, Schema } from 'mongoose';

export const VIDEO_TYPES = ['short_form', 'long_form', 'short_form_v2', 'long_form_v2', 'ugc'] as const;
export type VideoType = (typeof VIDEO_TYPES)[number];

export interface VideoHistoryFields {
  topic: string;
  videoType: VideoType;
  durationSeconds: number;
  orientation: string;
  modelProvider: string;
  imageProvider: string;
  voiceActor: string;
  videoPath: string;
  script: string;
  goal?: string;
}

export interface IVideoHistory extends VideoHistoryFields, Document {
  createdAt: Date;
}

const VideoHistorySchema = new Schema<IVideoHistory>(
  {
    topic: { type: String, required: true },
    videoType: { type: String, enum: VIDEO_TYPES, required: true },
    durationSeconds: { type: Number, required: true },
    orientation: { type: String, required: true },
    modelProvider: { type: String, required: true },
    imageProvider: { type: String, required: true },
    voiceActor: { type: String, required: true },
    videoPath: { type: String, required: true },
    script: { type: String, default: '' },
    goal: { type: String },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

VideoHistorySchema.index({ createdAt: -1 });

export const VideoHistory = mongoose.model<IVideoHistory>('VideoHistory', VideoHistorySchema);
