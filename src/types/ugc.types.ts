import { z } from 'zod';
import type {
  ImageProviderName,
  LLMProviderName,
  Orientation,
  VideoProviderName,
  VisualMode,
} from '../config/settings';
import type { SegmentTiming, TimedWord } from './alignment.types';
import type { VisualPlan } from './pipeline.types';
import type { ScriptSegment } from './script.types';

// ---------------------------------------------------------------------------
// Product review (UGC) videos
// ---------------------------------------------------------------------------

export const UGC_SCENE_TYPES = [
  'product_closeup',
  'in_use',
  'environment',
  'unboxing',
  'comparison',
  'detail',
  'lifestyle',
] as const;

export const MAX_REFERENCE_VIDEOS = 3;

export const ReferenceVideoAnalysisSchema = z.object({
  hookStyle: z.string(),
  pacing: z.string(),
  tone: z.string(),
  ctaStyle: z.string(),
  shotTypes: z.array(z.string()),
  structureSummary: z.string(),
  keyPhrases: z.array(z.string()).default([]),
  estimatedDurationSeconds: z.number().int().positive().default(30),
});

export const ReferenceVideoAnalysisContainerSchema = z.object({
  analysis: ReferenceVideoAnalysisSchema,
});

export const UGCSceneDescriptionSchema = z.object({
  sceneIndex: z.number().int().nonnegative(),
  sceneType: z.string(),
  imagePrompt: z.string().min(1),
  videoPrompt: z.string().min(1),
  durationSeconds: z.number().positive().default(3),
});

export const UGCScenePlanSchema = z.object({
  scenes: z.array(UGCSceneDescriptionSchema).min(1),
});

export const ProductVisualDescriptionSchema = z.object({
  productVisualDescription: z.string().min(1),
});

export const UGCScriptSchema = z.object({
  script: z.string().min(1),
});

export type ReferenceVideoAnalysis = z.infer<typeof ReferenceVideoAnalysisSchema>;
export type UGCSceneDescription = z.infer<typeof UGCSceneDescriptionSchema>;

export interface UGCConfig {
  productName: string;
  productDescription: string;
  productImagePaths: string[];
  referenceVideoPaths: string[];
  scriptGuidance: string;

  voiceActor: string;
  voiceModelVersion: string;
  tone: string;
  platform: string;
  durationSeconds: number;
  orientation: Orientation;

  modelProvider: LLMProviderName;
  imageProvider: ImageProviderName;
  videoProvider: VideoProviderName;
  visualMode: VisualMode;

  allowFaces: boolean;
  /** Keep scene prompts to static or minimal-movement shots */
  simpleScenes: boolean;
  enhanceForTts: boolean;
  addEndBuffer: boolean;
}

export type UGCConfigInput = Pick<UGCConfig, 'productName' | 'productDescription'> & Partial<UGCConfig>;

export function resolveUGCConfig(input: UGCConfigInput): UGCConfig {
  return {
    productImagePaths: [],
    referenceVideoPaths: [],
    scriptGuidance: '',
    voiceActor: 'american_female_media_influencer',
    voiceModelVersion: 'eleven_v3',
    tone: 'Conversational',
    platform: 'TikTok',
    durationSeconds: 30,
    orientation: 'portrait',
    modelProvider: 'google',
    imageProvider: 'google',
    videoProvider: 'runway',
    visualMode: 'zoompan',
    allowFaces: false,
    simpleScenes: true,
    enhanceForTts: true,
    addEndBuffer: true,
    ...input,
  };
}

export interface UGCState {
  config: UGCConfig;
  referenceAnalyses: ReferenceVideoAnalysis[];
  productVisualDescription: string | null;
  script: string | null;
  enhancedScript: string | null;
  segments: ScriptSegment[];
  audioPath: string | null;
  wordAlignments: TimedWord[];
  segmentTimings: SegmentTiming[];
  sceneDescriptions: UGCSceneDescription[];
  /** One slot per scene; null until that scene's image exists */
  sceneImagePaths: (string | null)[];
  visualPlans: VisualPlan[];
  /** One slot per animated scene */
  clipPaths: (string | null)[];
  finalVideoPath: string | null;
}

export function createUGCState(input: UGCConfigInput): UGCState {
  return {
    config: resolveUGCConfig(input),
    referenceAnalyses: [],
    productVisualDescription: null,
    script: null,
    enhancedScript: null,
    segments: [],
    audioPath: null,
    wordAlignments: [],
    segmentTimings: [],
    sceneDescriptions: [],
    sceneImagePaths: [],
    visualPlans: [],
    clipPaths: [],
    finalVideoPath: null,
  };
}
