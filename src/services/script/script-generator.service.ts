import { logger } from '../../config/logger';
import type { LLMProviderName } from '../../config/settings';
import type { VideoConfig } from '../../types/pipeline.types';
import {
  EnhancedScriptSchema,
  GoalSchema,
  HookSchema,
  ScriptListSchema,
  ScriptSchema,
  SectionScriptSchema,
  SectionSegmentsSchema,
  SectionsStructureSchema,
  SegmentImageDescriptionsSchema,
  type ImageDescription,
  type ScriptSegment,
  type SectionStructure,
} from '../../types/script.types';
import structuredGenerationClient, { type StructuredGenerator } from '../llm/structured-generation.client';
import {
  ENHANCE_PROMPT,
  GOAL_PROMPT,
  HOOK_PROMPT,
  SCRIPT_PROMPT,
  SECTION_SCRIPT_PROMPT,
  SECTION_SEGMENT_PROMPT,
  SEGMENT_PROMPT,
  STRUCTURE_PROMPT,
  imageDescriptionsPrompt,
} from './prompt-templates';

export interface ImageDescriptionRequest {
  scriptSegment: string;
  fullScript: string;
  numImages: number;
}

/**
 * LLM steps of the first-generation pipelines. Each method is one
 * structured call against the run's configured model provider.
 */
export class ScriptGeneratorService {
  constructor(private readonly llm: StructuredGenerator = structuredGenerationClient) {}

  // ----- Short form -----

  async generateGoal(config: VideoConfig): Promise<string> {
    const { goal } = await this.llm.generate({
      system: GOAL_PROMPT,
      payload: { topic: config.topic, purpose: config.purpose, targetAudience: config.targetAudience },
      schema: GoalSchema,
      schemaName: 'Goal',
      provider: config.modelProvider,
    });
    logger.info(`Goal: ${goal}`);
    return goal;
  }

  async generateHook(config: VideoConfig): Promise<string> {
    const { hook } = await this.llm.generate({
      system: HOOK_PROMPT,
      payload: {
        topic: config.topic,
        purpose: config.purpose,
        targetAudience: config.targetAudience,
        tone: config.tone,
        platform: config.platform,
      },
      schema: HookSchema,
      schemaName: 'Hook',
      provider: config.modelProvider,
    });
    logger.info(`Hook: ${hook}`);
    return hook;
  }

  async generateScript(config: VideoConfig, goal: string, hook: string): Promise<string> {
    const { script } = await this.llm.generate({
      system: SCRIPT_PROMPT,
      payload: {
        topic: config.topic,
        goal,
        hook,
        purpose: config.purpose,
        targetAudience: config.targetAudience,
        tone: config.tone,
        additionalRequests: config.additionalInstructions,
        platform: config.platform,
        durationSeconds: config.durationSeconds,
        styleReference: config.styleReference,
      },
      schema: ScriptSchema,
      schemaName: 'Script',
      provider: config.modelProvider,
    });
    logger.info(`Script generated: ${script.length} chars`);
    return script;
  }

  async enhanceScript(script: string, provider: LLMProviderName): Promise<string> {
    const { enhancedScript } = await this.llm.generate({
      system: ENHANCE_PROMPT,
      payload: { script },
      schema: EnhancedScriptSchema,
      schemaName: 'EnhancedScript',
      provider,
    });
    return enhancedScript;
  }

  /**
   * Dual-track segmentation. A segment without an enhanced track reuses its
   * raw text; blank segments are dropped so indices line up with alignment.
   */
  async segmentScript(script: string, enhancedScript: string, provider: LLMProviderName): Promise<ScriptSegment[]> {
    const { scriptList } = await this.llm.generate({
      system: SEGMENT_PROMPT,
      payload: { script, enhancedScript },
      schema: ScriptListSchema,
      schemaName: 'ScriptList',
      provider,
    });
    const segments = scriptList
      .filter((segment) => segment.scriptSegment.trim() !== '')
      .map((segment) => ({
        scriptSegment: segment.scriptSegment,
        enhancedScriptSegment: segment.enhancedScriptSegment.trim() ? segment.enhancedScriptSegment : segment.scriptSegment,
      }));
    logger.info(`Script segmented into ${segments.length} clips`);
    return segments;
  }

  /**
   * Exactly `numImages` descriptions: extra ones are dropped and a short
   * reply is padded by repeating its last description.
   */
  async generateImageDescriptions(config: VideoConfig, request: ImageDescriptionRequest): Promise<ImageDescription[]> {
    const { segmentImageDescriptions } = await this.llm.generate({
      system: imageDescriptionsPrompt(config.allowFaces),
      payload: {
        scriptSegment: request.scriptSegment,
        fullScript: request.fullScript,
        additionalImageRequests: config.additionalImageRequests,
        imageStyle: config.imageStyle,
        topic: config.topic,
        tone: config.tone,
        numOfImageDescriptions: request.numImages,
      },
      schema: SegmentImageDescriptionsSchema,
      schemaName: 'SegmentImageDescriptions',
      provider: config.modelProvider,
    });

    if (segmentImageDescriptions.length !== request.numImages) {
      logger.warn(`Asked for ${request.numImages} image descriptions, got ${segmentImageDescriptions.length}`);
    }
    const last = segmentImageDescriptions[segmentImageDescriptions.length - 1];
    return Array.from({ length: request.numImages }, (_, i) => segmentImageDescriptions[i] ?? last);
  }

  // ----- Long form -----

  async generateStructure(config: VideoConfig, goal: string): Promise<SectionStructure[]> {
    const { sectionsStructureList } = await this.llm.generate({
      system: STRUCTURE_PROMPT,
      payload: {
        topic: config.topic,
        purpose: config.purpose,
        targetAudience: config.targetAudience,
        tone: config.tone,
        goal,
        durationSeconds: config.durationSeconds,
      },
      schema: SectionsStructureSchema,
      schemaName: 'SectionsStructure',
      provider: config.modelProvider,
    });
    logger.info(`Structure generated: ${sectionsStructureList.length} sections`);
    return sectionsStructureList;
  }

  async generateSectionScript(config: VideoConfig, section: SectionStructure, cumulativeScript: string): Promise<string> {
    const { sectionScript } = await this.llm.generate({
      system: SECTION_SCRIPT_PROMPT,
      payload: {
        topic: config.topic,
        purpose: config.purpose,
        targetAudience: config.targetAudience,
        tone: config.tone,
        additionalRequests: config.additionalInstructions,
        styleReference: config.styleReference,
        cumulativeScript,
        sectionInformation: section,
      },
      schema: SectionScriptSchema,
      schemaName: 'SectionScript',
      provider: config.modelProvider,
    });
    logger.info(`Section script "${section.sectionName}": ${sectionScript.length} chars`);
    return sectionScript;
  }

  async segmentSectionScript(sectionScript: string, provider: LLMProviderName): Promise<string[]> {
    const { segments } = await this.llm.generate({
      system: SECTION_SEGMENT_PROMPT,
      payload: { sectionScript },
      schema: SectionSegmentsSchema,
      schemaName: 'SectionSegments',
      provider,
    });
    const spoken = segments.filter((segment) => segment.trim() !== '');
    logger.info(`Section segmented into ${spoken.length} parts`);
    return spoken;
  }
}

export default new ScriptGeneratorService();
