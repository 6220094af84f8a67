import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../config/logger';
import { IDEAL_IMAGE_DURATION, type LLMProviderName } from '../../config/settings';
import type { SegmentTiming } from '../../types/alignment.types';
import { SectionSegmentsSchema } from '../../types/script.types';
import {
  ConnectorPassSchema,
  FullScriptSchema,
  OutlineReviewSchema,
  QualityReportSchema,
  SectionScriptV2Schema,
  StoryboardSchema,
  StyleGuideSchema,
  VideoOutlineV2Schema,
  VisualQualityBatchSchema,
  type FullScript,
  type OutlineReview,
  type QualityReport,
  type ResearchBrief,
  type SectionPlanV2,
  type SegmentStoryboard,
  type StyleGuide,
  type TrendContext,
  type VideoOutlineV2,
  type VideoV2Config,
  type VisualQualityAssessment,
} from '../../types/v2.types';
import structuredGenerationClient, { type StructuredGenerator } from '../llm/structured-generation.client';
import type { InlineMedia } from '../llm/llm-provider.interface';
import { SECTION_SEGMENT_PROMPT } from './prompt-templates';
import {
  CONNECTOR_PROMPT,
  FULL_SCRIPT_PROMPT,
  OUTLINE_PROMPT,
  OUTLINE_REVIEW_PROMPT,
  SCRIPT_QUALITY_PROMPT,
  SCRIPT_REVISION_PROMPT,
  SECTION_SCRIPT_V2_PROMPT,
  STYLE_GUIDE_PROMPT,
  VISUAL_QA_PROMPT,
  storyboardPrompt,
} from './v2-prompt-templates';

/** Beat as the storyboard call sees it. */
export interface StoryboardBeat {
  rawText: string;
  visualIntent: string;
  beatType: string;
  energyLevel: number;
  durationMs: number;
}

export interface ResearchContext {
  researchBrief: ResearchBrief | null;
  trendContext: TrendContext | null;
}

const VISUAL_QA_BATCH_SIZE = 6;
const DEFAULT_BEAT_DURATION_MS = 3000;

/** Millisecond beat durations from alignment, 3 s where a beat has no timing. */
export function beatDurationsMs(beatCount: number, timings: readonly SegmentTiming[]): number[] {
  return Array.from({ length: beatCount }, (_, i) =>
    timings[i] ? Math.round(timings[i].duration * 1000) : DEFAULT_BEAT_DURATION_MS
  );
}

/**
 * LLM steps of the V2 pipelines: single-pass scripts with quality gates,
 * style guide and storyboard planning, long-form outlines and section
 * writing, and image review.
 */
export class ScriptWriterV2Service {
  constructor(private readonly llm: StructuredGenerator = structuredGenerationClient) {}

  // ----- Short form -----

  async generateFullScript(config: VideoV2Config, research: ResearchContext): Promise<FullScript> {
    const script = await this.llm.generate({
      system: FULL_SCRIPT_PROMPT,
      payload: {
        topic: config.topic,
        purpose: config.purpose,
        targetAudience: config.targetAudience,
        tone: config.tone,
        platform: config.platform,
        durationSeconds: config.durationSeconds,
        researchBrief: research.researchBrief,
        trendContext: research.trendContext,
        additionalInstructions: config.additionalInstructions || null,
        styleReference: config.styleReference,
        brandGuidelines: config.brandGuidelines || null,
      },
      schema: FullScriptSchema,
      schemaName: 'FullScript',
      provider: config.modelProvider,
    });
    logger.info(`Full script: ${script.beats.length} beats`);
    return script;
  }

  async evaluateScript(config: VideoV2Config, script: FullScript): Promise<QualityReport> {
    const report = await this.llm.generate({
      system: SCRIPT_QUALITY_PROMPT,
      payload: {
        scriptBeats: script.beats.map((b) => ({ rawText: b.rawText, beatType: b.beatType, energyLevel: b.energyLevel })),
        goal: script.goal,
        topic: config.topic,
        platform: config.platform,
        targetAudience: config.targetAudience,
        durationSeconds: config.durationSeconds,
      },
      schema: QualityReportSchema,
      schemaName: 'QualityReport',
      provider: config.modelProvider,
    });
    logger.info(`Script quality: ${report.passed ? 'passed' : 'failed'}`, {
      hook: report.hookScore,
      clarity: report.clarityScore,
      engagement: report.engagementScore,
      cta: report.ctaScore,
      pacing: report.pacingScore,
    });
    return report;
  }

  async reviseScript(
    config: VideoV2Config,
    script: FullScript,
    report: QualityReport,
    researchBrief: ResearchBrief | null
  ): Promise<FullScript> {
    return this.llm.generate({
      system: SCRIPT_REVISION_PROMPT,
      payload: {
        originalScript: script,
        revisionNotes: report.revisionNotes,
        factualFlags: report.factualFlags,
        researchBrief,
        topic: config.topic,
        durationSeconds: config.durationSeconds,
      },
      schema: FullScriptSchema,
      schemaName: 'FullScript',
      provider: config.modelProvider,
    });
  }

  // ----- Visual planning -----

  async generateStyleGuide(config: VideoV2Config): Promise<StyleGuide> {
    return this.llm.generate({
      system: STYLE_GUIDE_PROMPT,
      payload: {
        topic: config.topic,
        imageStyle: config.imageStyle,
        tone: config.tone,
        brandGuidelines: config.brandGuidelines || null,
      },
      schema: StyleGuideSchema,
      schemaName: 'StyleGuide',
      provider: config.modelProvider,
    });
  }

  /** One storyboard call for every beat; the reply is matched to beats by position. */
  async generateStoryboard(
    config: VideoV2Config,
    beats: StoryboardBeat[],
    styleGuide: StyleGuide
  ): Promise<SegmentStoryboard[]> {
    const { storyboard } = await this.llm.generate({
      system: storyboardPrompt(config.allowFaces),
      payload: {
        beats,
        styleGuide,
        imageStyle: config.imageStyle,
        topic: config.topic,
        allowFaces: config.allowFaces,
        idealShotDurationMs: Math.round((config.idealImageDuration || IDEAL_IMAGE_DURATION) * 1000),
        additionalImageRequests: config.additionalImageRequests || null,
      },
      schema: StoryboardSchema,
      schemaName: 'Storyboard',
      provider: config.modelProvider,
    });
    if (storyboard.length !== beats.length) {
      logger.warn(`Storyboard has ${storyboard.length} entries for ${beats.length} beats`);
    }
    logger.info(`Storyboard: ${storyboard.reduce((n, s) => n + s.shots.length, 0)} shots`);
    return storyboard;
  }

  /**
   * Score generated images against their prompts with a multimodal model,
   * in batches. Assessments come back in image order.
   */
  async assessImages(
    imagePaths: readonly string[],
    prompts: readonly string[],
    styleGuide: StyleGuide | null,
    provider: LLMProviderName = 'google'
  ): Promise<VisualQualityAssessment[]> {
    const assessments: VisualQualityAssessment[] = [];
    for (let start = 0; start < imagePaths.length; start += VISUAL_QA_BATCH_SIZE) {
      const batchPaths = imagePaths.slice(start, start + VISUAL_QA_BATCH_SIZE);
      const media: InlineMedia[] = await Promise.all(
        batchPaths.map(async (imagePath) => ({
          mimeType: mimeTypeFor(imagePath),
          data: (await fs.readFile(imagePath)).toString('base64'),
        }))
      );
      const batch = await this.llm.generate({
        system: VISUAL_QA_PROMPT,
        payload: { styleGuide, prompts: prompts.slice(start, start + VISUAL_QA_BATCH_SIZE) },
        schema: VisualQualityBatchSchema,
        schemaName: 'VisualQualityBatch',
        provider,
        media,
      });
      assessments.push(...batch.assessments.slice(0, batchPaths.length));
    }
    const rejected = assessments.filter((a) => a.reject).length;
    logger.info(`Visual QA: ${assessments.length} assessed, ${rejected} flagged`);
    return assessments;
  }

  // ----- Long form -----

  async generateOutline(
    config: VideoV2Config,
    research: ResearchContext,
    revisionNotes: readonly string[] = []
  ): Promise<VideoOutlineV2> {
    const instructions = revisionNotes.length
      ? `${config.additionalInstructions}\n\nREVISION NOTES FROM PREVIOUS ATTEMPT:\n${revisionNotes.map((n) => `- ${n}`).join('\n')}`
      : config.additionalInstructions;

    const outline = await this.llm.generate({
      system: OUTLINE_PROMPT,
      payload: {
        topic: config.topic,
        purpose: config.purpose,
        targetAudience: config.targetAudience,
        tone: config.tone,
        durationSeconds: config.durationSeconds,
        researchBrief: research.researchBrief,
        trendContext: research.trendContext,
        additionalInstructions: instructions.trim() || null,
      },
      schema: VideoOutlineV2Schema,
      schemaName: 'VideoOutlineV2',
      provider: config.modelProvider,
    });
    logger.info(`Outline: ${outline.sections.length} sections`, { thesis: outline.thesis });
    return outline;
  }

  async reviewOutline(config: VideoV2Config, outline: VideoOutlineV2): Promise<OutlineReview> {
    return this.llm.generate({
      system: OUTLINE_REVIEW_PROMPT,
      payload: {
        outline,
        topic: config.topic,
        targetAudience: config.targetAudience,
        durationSeconds: config.durationSeconds,
      },
      schema: OutlineReviewSchema,
      schemaName: 'OutlineReview',
      provider: config.modelProvider,
    });
  }

  async writeSectionScript(
    config: VideoV2Config,
    context: {
      outline: VideoOutlineV2;
      sectionPlan: SectionPlanV2;
      precedingSectionPlan: SectionPlanV2 | null;
      cumulativeScript: string;
      researchBrief: ResearchBrief | null;
    }
  ): Promise<{ sectionScript: string; ttsScript: string }> {
    const result = await this.llm.generate({
      system: SECTION_SCRIPT_V2_PROMPT,
      payload: {
        topic: config.topic,
        purpose: config.purpose,
        targetAudience: config.targetAudience,
        tone: config.tone,
        researchBrief: context.researchBrief,
        additionalInstructions: config.additionalInstructions || null,
        styleReference: config.styleReference,
        fullOutline: context.outline,
        sectionPlan: context.sectionPlan,
        precedingSectionPlan: context.precedingSectionPlan,
        cumulativeScript: context.cumulativeScript,
      },
      schema: SectionScriptV2Schema,
      schemaName: 'SectionScriptV2',
      provider: config.modelProvider,
    });
    logger.info(`Section script "${context.sectionPlan.sectionName}": ${result.sectionScript.length} chars`);
    return result;
  }

  /**
   * Smooth the seams between independently written sections. A reply with
   * the wrong number of sections is ignored and the originals are kept.
   */
  async connectSections(
    sections: { sectionName: string; sectionScript: string; transitionFromPrevious: string }[],
    provider: LLMProviderName
  ): Promise<string[]> {
    const { smoothedSections } = await this.llm.generate({
      system: CONNECTOR_PROMPT,
      payload: { sections },
      schema: ConnectorPassSchema,
      schemaName: 'ConnectorPass',
      provider,
    });
    if (smoothedSections.length !== sections.length) {
      logger.warn(`Connector pass returned ${smoothedSections.length} sections for ${sections.length}; keeping originals`);
      return sections.map((s) => s.sectionScript);
    }
    return smoothedSections;
  }

  async segmentSectionScript(sectionScript: string, provider: LLMProviderName): Promise<string[]> {
    const { segments } = await this.llm.generate({
      system: SECTION_SEGMENT_PROMPT,
      payload: { sectionScript },
      schema: SectionSegmentsSchema,
      schemaName: 'SectionSegments',
      provider,
    });
    return segments.filter((segment) => segment.trim() !== '');
  }
}

function mimeTypeFor(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.png') return 'image/png';
  if (ext === '.webp') return 'image/webp';
  return 'image/jpeg';
}

export default new ScriptWriterV2Service();
