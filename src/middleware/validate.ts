import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { AppError } from './errorHandler';
import {
  IMAGE_PROVIDERS,
  LLM_PROVIDERS,
  ORIENTATIONS,
  VIDEO_PROVIDERS,
  VISUAL_MODES,
  VOICE_ACTORS,
} from '../config/settings';
import { PipelineKind } from '../models/GenerationRun';
import { EBOOK_FORMATS, MAX_CHAPTERS, MIN_CHAPTERS, WRITING_STYLES, type EbookConfigInput } from '../types/ebook.types';
import type { VideoConfigInput } from '../types/pipeline.types';
import { MAX_REFERENCE_VIDEOS, type UGCConfigInput } from '../types/ugc.types';
import { SCRIPT_STRATEGIES, type VideoV2ConfigInput } from '../types/v2.types';

export const validate = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const errorMessage = error.details
        .map((detail) => detail.message)
        .join(', ');
      throw new AppError(errorMessage, 400);
    }

    // Replace request body with validated value
    req.body = value;
    next();
  };
};

/**
 * Validate outside a request (queued job payloads). Returns the converted
 * value with defaults applied, or throws with every problem joined.
 */
export function parseWith<T>(schema: Joi.ObjectSchema<T>, input: unknown): T {
  const { error, value } = schema.validate(input, { abortEarly: false, stripUnknown: true });
  if (error) {
    throw new AppError(error.details.map((detail) => detail.message).join(', '), 400);
  }
  return value;
}

// ----- Shared field sets -----

const text = () => Joi.string().trim().allow('');
const voiceActor = () => Joi.string().valid(...Object.keys(VOICE_ACTORS));

const videoFields = {
  topic: Joi.string().trim().min(1).max(500).required(),
  purpose: text(),
  targetAudience: text(),
  tone: text(),
  platform: text(),
  durationSeconds: Joi.number().integer().min(10).max(3600),
  orientation: Joi.string().valid(...ORIENTATIONS),
  modelProvider: Joi.string().valid(...LLM_PROVIDERS),
  imageProvider: Joi.string().valid(...IMAGE_PROVIDERS),
  imageStyle: text(),
  voiceActor: voiceActor(),
  voiceModelVersion: Joi.string(),
  visualMode: Joi.string().valid(...VISUAL_MODES),
  videoProvider: Joi.string().valid(...VIDEO_PROVIDERS),
  additionalInstructions: text().max(4000),
  additionalImageRequests: text().max(2000),
  styleReference: text().max(8000),
  allowFaces: Joi.boolean(),
  addSubtitles: Joi.boolean(),
  addEndBuffer: Joi.boolean(),
  enhanceForTts: Joi.boolean(),
  idealImageDuration: Joi.number().min(1).max(10),
  minImageDuration: Joi.number().min(0.5).max(10),
  singleImagePerSegment: Joi.boolean(),
};

const v2Fields = {
  ...videoFields,
  enableResearch: Joi.boolean(),
  referenceUrls: text().max(4000),
  brandGuidelines: text().max(4000),
  scriptStrategy: Joi.string().valid(...SCRIPT_STRATEGIES),
};

// Common validation schemas
export const schemas = {
  shortForm: Joi.object<VideoConfigInput>(videoFields),
  longForm: Joi.object<VideoConfigInput>(videoFields),
  shortFormV2: Joi.object<VideoV2ConfigInput>(v2Fields),
  longFormV2: Joi.object<VideoV2ConfigInput>(v2Fields),

  ebook: Joi.object<EbookConfigInput>({
    title: Joi.string().trim().min(1).max(255).required(),
    topic: Joi.string().trim().min(1).max(500).required(),
    targetAudience: Joi.string().trim().min(1).required(),
    subtitle: text(),
    authorName: text(),
    tone: text(),
    writingStyle: Joi.string().valid(...WRITING_STYLES),
    numChapters: Joi.number().integer().min(MIN_CHAPTERS).max(MAX_CHAPTERS),
    modelProvider: Joi.string().valid(...LLM_PROVIDERS),
    imageProvider: Joi.string().valid(...IMAGE_PROVIDERS),
    imageStyle: text(),
    includeImages: Joi.boolean(),
    allowFaces: Joi.boolean(),
    outputFormats: Joi.array().items(Joi.string().valid(...EBOOK_FORMATS)).min(1).unique(),
    additionalInstructions: text().max(4000),
  }),

  ugc: Joi.object<UGCConfigInput>({
    productName: Joi.string().trim().min(1).max(255).required(),
    productDescription: Joi.string().trim().min(1).max(4000).required(),
    productImagePaths: Joi.array().items(Joi.string()),
    referenceVideoPaths: Joi.array().items(Joi.string()).max(MAX_REFERENCE_VIDEOS),
    scriptGuidance: text().max(4000),
    voiceActor: voiceActor(),
    voiceModelVersion: Joi.string(),
    tone: text(),
    platform: text(),
    durationSeconds: Joi.number().integer().min(10).max(180),
    orientation: Joi.string().valid(...ORIENTATIONS),
    modelProvider: Joi.string().valid(...LLM_PROVIDERS),
    imageProvider: Joi.string().valid(...IMAGE_PROVIDERS),
    videoProvider: Joi.string().valid(...VIDEO_PROVIDERS),
    visualMode: Joi.string().valid(...VISUAL_MODES),
    allowFaces: Joi.boolean(),
    simpleScenes: Joi.boolean(),
    enhanceForTts: Joi.boolean(),
    addEndBuffer: Joi.boolean(),
  }),

  createProfile: Joi.object({
    name: Joi.string().trim().min(1).max(100).required(),
    pipeline: Joi.string().valid(...Object.values(PipelineKind)).required(),
    settings: Joi.object().unknown(true).default({}),
  }),

  updateProfile: Joi.object({
    pipeline: Joi.string().valid(...Object.values(PipelineKind)),
    settings: Joi.object().unknown(true),
  }).min(1),
};

/** Body schema for each pipeline kind. */
export const generationSchemas = {
  [PipelineKind.SHORT_FORM]: schemas.shortForm,
  [PipelineKind.LONG_FORM]: schemas.longForm,
  [PipelineKind.SHORT_FORM_V2]: schemas.shortFormV2,
  [PipelineKind.LONG_FORM_V2]: schemas.longFormV2,
  [PipelineKind.EBOOK]: schemas.ebook,
  [PipelineKind.UGC]: schemas.ugc,
} satisfies Record<PipelineKind, Joi.ObjectSchema>;
