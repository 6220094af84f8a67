import { z } from 'zod';
import type { SegmentTiming, TimedWord } from './alignment.types';
import { LONG_FORM_DEFAULTS, resolveVideoConfig, type VideoConfig, type VideoConfigInput, type VisualPlan } from './pipeline.types';

// ---------------------------------------------------------------------------
// Enumerations used in prompts and storyboards
// ---------------------------------------------------------------------------

export const BEAT_TYPES = [
  'hook',
  'setup',
  'tension',
  'evidence',
  'story',
  'payoff',
  'callback',
  'cta',
  'transition',
] as const;

export const SECTION_TYPES = [
  'hook',
  'context',
  'argument',
  'evidence',
  'counterargument',
  'story',
  'demonstration',
  'synthesis',
  'callback',
  'cta',
] as const;

export const ENERGY_TARGETS = ['calm', 'building', 'peak', 'resolving'] as const;

export const SCRIPT_STRATEGIES = ['parallel', 'sequential'] as const;
export type ScriptStrategy = (typeof SCRIPT_STRATEGIES)[number];

const score = z.number().int().min(1).max(10);

// ---------------------------------------------------------------------------
// Research
// ---------------------------------------------------------------------------

export const ResearchQueriesSchema = z.object({
  queries: z.array(z.string().min(1)).min(1),
});

export const ResearchBriefSchema = z.object({
  keyFacts: z.array(z.string()).default([]),
  statistics: z.array(z.string()).default([]),
  expertPerspectives: z.array(z.string()).default([]),
  counterarguments: z.array(z.string()).default([]),
  knowledgeGaps: z.array(z.string()).default([]),
  angleRecommendation: z.string().default(''),
});

export const TrendContextSchema = z.object({
  workingHooks: z.array(z.string()).default([]),
  saturatedAngles: z.array(z.string()).default([]),
  contentGaps: z.array(z.string()).default([]),
});

// ---------------------------------------------------------------------------
// Single-pass script and quality gates
// ---------------------------------------------------------------------------

export const ScriptBeatSchema = z.object({
  rawText: z.string().min(1),
  /** Same narration with audio tags for the TTS engine */
  ttsText: z.string().min(1),
  visualIntent: z.string(),
  beatType: z.string().default('setup'),
  energyLevel: score.default(5),
});

export const FullScriptSchema = z.object({
  goal: z.string(),
  hook: z.string(),
  beats: z.array(ScriptBeatSchema).min(1),
  cta: z.string(),
});

export const QualityReportSchema = z.object({
  hookScore: score,
  clarityScore: score,
  engagementScore: score,
  ctaScore: score,
  pacingScore: score,
  factualFlags: z.array(z.string()).default([]),
  revisionNotes: z.array(z.string()).default([]),
  passed: z.boolean(),
});

export const OutlineReviewSchema = z.object({
  structureScore: score,
  varietyScore: score,
  retentionScore: score,
  depthScore: score,
  pacingScore: score,
  revisionNotes: z.array(z.string()).default([]),
  passed: z.boolean(),
});

// ---------------------------------------------------------------------------
// Visual planning
// ---------------------------------------------------------------------------

export const StyleGuideSchema = z.object({
  colorPalette: z.array(z.string()),
  lightingDirection: z.string(),
  compositionRules: z.array(z.string()),
  textureNotes: z.string().default(''),
  bannedElements: z.array(z.string()).default([]),
  styleKeywords: z.array(z.string()),
});

export const ShotPlanSchema = z.object({
  imagePrompt: z.string().min(1),
  durationMs: z.number().int().positive().default(3000),
  motionType: z.string().default('zoom_in'),
  motionSpeed: z.string().default('medium'),
  transitionIn: z.string().default('cut'),
});

export const SegmentStoryboardSchema = z.object({
  shots: z.array(ShotPlanSchema),
  segmentEnergy: score.default(5),
});

export const StoryboardSchema = z.object({
  storyboard: z.array(SegmentStoryboardSchema).min(1),
});

export const VisualQualityAssessmentSchema = z.object({
  relevance: score,
  quality: score,
  styleMatch: score,
  reject: z.boolean(),
  rejectionReason: z.string().default(''),
});

export const VisualQualityBatchSchema = z.object({
  assessments: z.array(VisualQualityAssessmentSchema),
});

// ---------------------------------------------------------------------------
// Long-form outline and section scripts
// ---------------------------------------------------------------------------

export const SectionPlanV2Schema = z.object({
  sectionName: z.string(),
  sectionPurpose: z.string(),
  sectionDirectives: z.array(z.string()).default([]),
  sectionTalkingPoints: z.array(z.string()).default([]),
  sectionType: z.string().default('context'),
  energyTarget: z.string().default('building'),
  retentionDevice: z.string().default(''),
  transitionFromPrevious: z.string().default(''),
  targetDurationSeconds: z.number().int().positive().default(120),
  factsToUse: z.array(z.string()).default([]),
});

export const VideoOutlineV2Schema = z.object({
  thesis: z.string(),
  sections: z.array(SectionPlanV2Schema).min(1),
  retentionMap: z.array(z.string()).default([]),
  emotionalArc: z.string().default(''),
});

export const SectionScriptV2Schema = z.object({
  sectionScript: z.string().min(1),
  ttsScript: z.string().min(1),
});

export const ConnectorPassSchema = z.object({
  smoothedSections: z.array(z.string()),
});

export type ResearchBrief = z.infer<typeof ResearchBriefSchema>;
export type TrendContext = z.infer<typeof TrendContextSchema>;
export type ScriptBeat = z.infer<typeof ScriptBeatSchema>;
export type FullScript = z.infer<typeof FullScriptSchema>;
export type QualityReport = z.infer<typeof QualityReportSchema>;
export type OutlineReview = z.infer<typeof OutlineReviewSchema>;
export type StyleGuide = z.infer<typeof StyleGuideSchema>;
export type ShotPlan = z.infer<typeof ShotPlanSchema>;
export type SegmentStoryboard = z.infer<typeof SegmentStoryboardSchema>;
export type VisualQualityAssessment = z.infer<typeof VisualQualityAssessmentSchema>;
export type SectionPlanV2 = z.infer<typeof SectionPlanV2Schema>;
export type VideoOutlineV2 = z.infer<typeof VideoOutlineV2Schema>;

// ---------------------------------------------------------------------------
// V2 run configuration and state
// ---------------------------------------------------------------------------

export interface VideoV2Config extends VideoConfig {
  enableResearch: boolean;
  /** Free-text list of URLs the research step should consider */
  referenceUrls: string;
  brandGuidelines: string;
  scriptStrategy: ScriptStrategy;
}

export type VideoV2ConfigInput = VideoConfigInput & Partial<Omit<VideoV2Config, keyof VideoConfig>>;

export function resolveVideoV2Config(input: VideoV2ConfigInput): VideoV2Config {
  return {
    ...resolveVideoConfig(input),
    enableResearch: input.enableResearch ?? true,
    referenceUrls: input.referenceUrls ?? '',
    brandGuidelines: input.brandGuidelines ?? '',
    scriptStrategy: input.scriptStrategy ?? 'parallel',
  };
}

export interface ShortFormV2State {
  config: VideoV2Config;
  researchBrief: ResearchBrief | null;
  trendContext: TrendContext | null;
  fullScript: FullScript | null;
  qualityReport: QualityReport | null;
  scriptRevisionCount: number;
  audioPath: string | null;
  wordAlignments: TimedWord[];
  segmentTimings: SegmentTiming[];
  styleGuide: StyleGuide | null;
  storyboard: SegmentStoryboard[];
  visualPlans: VisualPlan[];
  visualQaResults: VisualQualityAssessment[];
  clipPaths: string[];
  finalVideoPath: string | null;
}

export function createShortFormV2State(input: VideoV2ConfigInput): ShortFormV2State {
  return {
    config: resolveVideoV2Config(input),
    researchBrief: null,
    trendContext: null,
    fullScript: null,
    qualityReport: null,
    scriptRevisionCount: 0,
    audioPath: null,
    wordAlignments: [],
    segmentTimings: [],
    styleGuide: null,
    storyboard: [],
    visualPlans: [],
    visualQaResults: [],
    clipPaths: [],
    finalVideoPath: null,
  };
}

export interface SectionV2State {
  sectionPlan: SectionPlanV2;
  sectionScript: string | null;
  ttsScript: string | null;
  audioPath: string | null;
  wordAlignments: TimedWord[];
  segments: string[];
  segmentTimings: SegmentTiming[];
  storyboard: SegmentStoryboard[];
  visualPlans: VisualPlan[];
  clipPaths: string[];
  sectionVideoPath: string | null;
}

export function createSectionV2State(sectionPlan: SectionPlanV2): SectionV2State {
  return {
    sectionPlan,
    sectionScript: null,
    ttsScript: null,
    audioPath: null,
    wordAlignments: [],
    segments: [],
    segmentTimings: [],
    storyboard: [],
    visualPlans: [],
    clipPaths: [],
    sectionVideoPath: null,
  };
}

export interface LongFormV2State {
  config: VideoV2Config;
  researchBrief: ResearchBrief | null;
  trendContext: TrendContext | null;
  outline: VideoOutlineV2 | null;
  outlineReview: OutlineReview | null;
  outlineRevisionCount: number;
  styleGuide: StyleGuide | null;
  sections: SectionV2State[];
  fullScript: string | null;
  finalVideoPath: string | null;
}

export function createLongFormV2State(input: VideoV2ConfigInput): LongFormV2State {
  return {
    config: resolveVideoV2Config({ ...LONG_FORM_DEFAULTS, ...input }),
    researchBrief: null,
    trendContext: null,
    outline: null,
    outlineReview: null,
    outlineRevisionCount: 0,
    styleGuide: null,
    sections: [],
    fullScript: null,
    finalVideoPath: null,
  };
}
