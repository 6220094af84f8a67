import {
  DEFAULT_VOICE_MODEL,
  IDEAL_IMAGE_DURATION,
  MIN_IMAGE_DURATION,
  type ImageProviderName,
  type LLMProviderName,
  type Orientation,
  type VideoProviderName,
  type VisualMode,
} from '../config/settings';
import type { SegmentTiming, TimedWord } from './alignment.types';
import type { ImageDescription, ScriptSegment, SectionStructure } from './script.types';

// ---------------------------------------------------------------------------
// Visual plan (one per narration segment)
//
// Shape first (counts from timing), then descriptions, then media paths.
// ---------------------------------------------------------------------------

export interface VisualPlan {
  segmentIndex: number;
  numImages: number;
  /** Seconds; every earlier image runs for the ideal image duration */
  lastImageDuration: number;
  imageDescriptions: ImageDescription[];
  imagePaths: string[];
  videoPath: string | null;
}

// ---------------------------------------------------------------------------
// Run configuration shared by every video pipeline
// ---------------------------------------------------------------------------

export interface VideoConfig {
  topic: string;
  purpose: string;
  targetAudience: string;
  tone: string;
  platform: string;
  durationSeconds: number;
  orientation: Orientation;

  modelProvider: LLMProviderName;
  imageProvider: ImageProviderName;
  imageStyle: string;
  voiceActor: string;
  voiceModelVersion: string;
  visualMode: VisualMode;
  videoProvider: VideoProviderName;

  additionalInstructions: string;
  additionalImageRequests: string;
  styleReference: string;

  allowFaces: boolean;
  addSubtitles: boolean;
  addEndBuffer: boolean;
  enhanceForTts: boolean;

  idealImageDuration: number;
  minImageDuration: number;
  singleImagePerSegment: boolean;
}

export type VideoConfigInput = Pick<VideoConfig, 'topic'> & Partial<VideoConfig>;

export const VIDEO_CONFIG_DEFAULTS: Omit<VideoConfig, 'topic'> = {
  purpose: 'Educational',
  targetAudience: 'General audience',
  tone: 'Informative',
  platform: 'TikTok',
  durationSeconds: 60,
  orientation: 'portrait',
  modelProvider: 'google',
  imageProvider: 'google',
  imageStyle: 'Cinematic',
  voiceActor: 'american_male_narrator',
  voiceModelVersion: DEFAULT_VOICE_MODEL,
  visualMode: 'zoompan',
  videoProvider: 'runway',
  additionalInstructions: '',
  additionalImageRequests: '',
  styleReference: '',
  allowFaces: false,
  addSubtitles: false,
  addEndBuffer: true,
  enhanceForTts: true,
  idealImageDuration: IDEAL_IMAGE_DURATION,
  minImageDuration: MIN_IMAGE_DURATION,
  singleImagePerSegment: false,
};

/** Long-form runs target landscape YouTube videos unless told otherwise. */
export const LONG_FORM_DEFAULTS: Partial<VideoConfig> = {
  platform: 'YouTube',
  durationSeconds: 600,
  orientation: 'landscape',
};

export function resolveVideoConfig(input: VideoConfigInput): VideoConfig {
  return { ...VIDEO_CONFIG_DEFAULTS, ...input };
}

// ---------------------------------------------------------------------------
// ShortForm state
//
// Fields start empty and are only ever filled in; a PipelineError carries
// this object as it stood when a step failed.
// ---------------------------------------------------------------------------

export interface ShortFormState {
  config: VideoConfig;
  goal: string | null;
  hook: string | null;
  script: string | null;
  enhancedScript: string | null;
  segments: ScriptSegment[];
  audioPath: string | null;
  wordAlignments: TimedWord[];
  segmentTimings: SegmentTiming[];
  visualPlans: VisualPlan[];
  clipPaths: string[];
  finalVideoPath: string | null;
}

export function createShortFormState(input: VideoConfigInput): ShortFormState {
  return {
    config: resolveVideoConfig(input),
    goal: null,
    hook: null,
    script: null,
    enhancedScript: null,
    segments: [],
    audioPath: null,
    wordAlignments: [],
    segmentTimings: [],
    visualPlans: [],
    clipPaths: [],
    finalVideoPath: null,
  };
}

// ---------------------------------------------------------------------------
// LongForm state
// ---------------------------------------------------------------------------

export interface SectionState {
  structure: SectionStructure;
  sectionScript: string | null;
  segments: string[];
  audioPath: string | null;
  wordAlignments: TimedWord[];
  segmentTimings: SegmentTiming[];
  visualPlans: VisualPlan[];
  clipPaths: string[];
  sectionVideoPath: string | null;
}

export function createSectionState(structure: SectionStructure): SectionState {
  return {
    structure,
    sectionScript: null,
    segments: [],
    audioPath: null,
    wordAlignments: [],
    segmentTimings: [],
    visualPlans: [],
    clipPaths: [],
    sectionVideoPath: null,
  };
}

export interface LongFormState {
  config: VideoConfig;
  goal: string | null;
  sections: SectionState[];
  fullScript: string | null;
  finalVideoPath: string | null;
}

export function createLongFormState(input: VideoConfigInput): LongFormState {
  return {
    config: resolveVideoConfig({ ...LONG_FORM_DEFAULTS, ...input }),
    goal: null,
    sections: [],
    fullScript: null,
    finalVideoPath: null,
  };
}
