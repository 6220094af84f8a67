import { logger } from '../../config/logger';
import {
  UGCScenePlanSchema,
  UGCScriptSchema,
  type ReferenceVideoAnalysis,
  type UGCConfig,
  type UGCSceneDescription,
} from '../../types/ugc.types';
import structuredGenerationClient, { type StructuredGenerator } from '../llm/structured-generation.client';
import { UGC_SCRIPT_PROMPT, scenePlannerPrompt } from './prompt-templates';

export interface ScenePlanRequest {
  segmentTexts: string[];
  segmentDurations: number[];
  productVisualDescription: string;
}

/** Review script and scene planning for product videos. */
export class UGCWriterService {
  constructor(private readonly llm: StructuredGenerator = structuredGenerationClient) {}

  async generateScript(config: UGCConfig, referenceAnalyses: ReferenceVideoAnalysis[]): Promise<string> {
    const { script } = await this.llm.generate({
      system: UGC_SCRIPT_PROMPT,
      payload: {
        productName: config.productName,
        productDescription: config.productDescription,
        tone: config.tone,
        platform: config.platform,
        durationSeconds: config.durationSeconds,
        referenceAnalyses,
        scriptGuidance: config.scriptGuidance,
        allowFaces: config.allowFaces,
      },
      schema: UGCScriptSchema,
      schemaName: 'UGCScript',
      provider: config.modelProvider,
    });
    logger.info(`UGC script: ${script.split(/\s+/).length} words`);
    return script;
  }

  /**
   * One scene per segment. Scenes come back in segment order; a plan with a
   * different count is logged and used as returned.
   */
  async planScenes(config: UGCConfig, request: ScenePlanRequest): Promise<UGCSceneDescription[]> {
    const { scenes } = await this.llm.generate({
      system: scenePlannerPrompt(config.allowFaces, config.simpleScenes),
      payload: {
        scriptSegments: request.segmentTexts,
        productName: config.productName,
        productVisualDescription: request.productVisualDescription,
        productDescription: config.productDescription,
        segmentDurations: request.segmentDurations,
        platform: config.platform,
      },
      schema: UGCScenePlanSchema,
      schemaName: 'UGCScenePlan',
      provider: config.modelProvider,
    });
    if (scenes.length !== request.segmentTexts.length) {
      logger.warn(`Scene plan has ${scenes.length} scenes for ${request.segmentTexts.length} segments`);
    }
    return scenes;
  }
}

export default new UGCWriterService();
