import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../config/logger';
import type { LLMProviderName } from '../../config/settings';
import {
  MAX_REFERENCE_VIDEOS,
  ProductVisualDescriptionSchema,
  ReferenceVideoAnalysisContainerSchema,
  type ReferenceVideoAnalysis,
} from '../../types/ugc.types';
import type { InlineMedia } from '../llm/llm-provider.interface';
import structuredGenerationClient, { type StructuredGenerator } from '../llm/structured-generation.client';
import { ConfigurationError, errorMessage } from '../pipeline/pipeline-error';
import { PRODUCT_DESCRIPTION_PROMPT, REFERENCE_VIDEO_ANALYSIS_PROMPT } from './prompt-templates';

/** Inline request bodies above this size are rejected by the multimodal API. */
export const MAX_INLINE_MEDIA_BYTES = 20 * 1024 * 1024;

const MIME_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.mov': 'video/quicktime',
  '.webm': 'video/webm',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
};

export interface MediaAnalyzer {
  analyzeReferenceVideos(videoPaths: string[]): Promise<ReferenceVideoAnalysis[]>;
  describeProduct(imagePaths: string[]): Promise<string>;
}

/**
 * Multimodal analysis of uploaded media: reference videos and product
 * photos are sent inline (base64) to a model that accepts media.
 */
export class MediaAnalyzerService implements MediaAnalyzer {
  constructor(
    private readonly llm: StructuredGenerator = structuredGenerationClient,
    private readonly provider: LLMProviderName = 'google'
  ) {}

  async analyzeReferenceVideo(videoPath: string): Promise<ReferenceVideoAnalysis> {
    logger.info(`Analyzing reference video: ${path.basename(videoPath)}`);
    const { analysis } = await this.llm.generate({
      system: REFERENCE_VIDEO_ANALYSIS_PROMPT,
      payload: { fileName: path.basename(videoPath) },
      schema: ReferenceVideoAnalysisContainerSchema,
      schemaName: 'ReferenceVideoAnalysis',
      provider: this.provider,
      media: [await readInline(videoPath)],
    });
    return analysis;
  }

  /**
   * Analyze up to three videos concurrently. A video that cannot be analyzed
   * is logged and left out.
   */
  async analyzeReferenceVideos(videoPaths: string[]): Promise<ReferenceVideoAnalysis[]> {
    const selected = videoPaths.slice(0, MAX_REFERENCE_VIDEOS);
    const results = await Promise.all(
      selected.map(async (videoPath) => {
        try {
          return await this.analyzeReferenceVideo(videoPath);
        } catch (error) {
          logger.warn(`Failed to analyze reference video ${path.basename(videoPath)}: ${errorMessage(error)}`);
          return null;
        }
      })
    );
    const analyses = results.filter((r): r is ReferenceVideoAnalysis => r !== null);
    logger.info(`Analyzed ${analyses.length}/${selected.length} reference videos`);
    return analyses;
  }

  /** Visual description of the product for image prompts. Unreadable photos are skipped. */
  async describeProduct(imagePaths: string[]): Promise<string> {
    if (!imagePaths.length) return 'No product images provided.';

    const media: InlineMedia[] = [];
    for (const imagePath of imagePaths) {
      try {
        media.push(await readInline(imagePath));
      } catch (error) {
        logger.warn(`Skipping product image ${imagePath}: ${errorMessage(error)}`);
      }
    }
    if (!media.length) return 'No valid product images found.';

    logger.info(`Describing product from ${media.length} images`);
    const { productVisualDescription } = await this.llm.generate({
      system: PRODUCT_DESCRIPTION_PROMPT,
      payload: { imageCount: media.length },
      schema: ProductVisualDescriptionSchema,
      schemaName: 'ProductVisualDescription',
      provider: this.provider,
      media,
    });
    return productVisualDescription;
  }
}

async function readInline(filePath: string): Promise<InlineMedia> {
  const mimeType = MIME_TYPES[path.extname(filePath).toLowerCase()];
  if (!mimeType) {
    throw new ConfigurationError(`Unsupported media type: ${path.basename(filePath)}`);
  }
  const data = await fs.readFile(filePath);
  if (data.length > MAX_INLINE_MEDIA_BYTES) {
    throw new ConfigurationError(
      `${path.basename(filePath)} is ${(data.length / 1024 / 1024).toFixed(1)} MB; inline media is limited to 20 MB`
    );
  }
  return { mimeType, data: data.toString('base64') };
}

export default new MediaAnalyzerService();
