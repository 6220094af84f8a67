import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import { OUTPUT_DIRS, PROVIDER_RETRY, type ImageProviderName, type Orientation, type RetryPolicy } from '../../config/settings';
import { ConfigurationError } from '../pipeline/pipeline-error';
import { fanOut } from '../pipeline/stage-runner';
import type { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import { withRetry, type Sleep } from '../providers/retry';
import type { ImageProvider } from './image-provider.interface';
import fluxProvider from './flux.provider';
import googleImagenProvider from './google-imagen.provider';
import openAIImageProvider from './openai-image.provider';

/** What the pipelines need from image generation. */
export interface ImageGenerator {
  generateImage(
    prompt: string,
    orientation: Orientation,
    provider: ImageProviderName,
    pool: RateLimitedProviderPool
  ): Promise<string>;
  generateImages(
    prompts: readonly string[],
    orientation: Orientation,
    provider: ImageProviderName,
    pool: RateLimitedProviderPool
  ): Promise<string[]>;
}

export interface ImageServiceOptions {
  providers?: ImageProvider[];
  outputDir?: string;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export class ImageService implements ImageGenerator {
  private readonly providers = new Map<ImageProviderName, ImageProvider>();
  private readonly outputDir: string;
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;

  constructor(options: ImageServiceOptions = {}) {
    const providers = options.providers ?? [googleImagenProvider, openAIImageProvider, fluxProvider];
    for (const provider of providers) this.providers.set(provider.name, provider);
    this.outputDir = options.outputDir ?? OUTPUT_DIRS.images;
    this.retry = options.retry ?? PROVIDER_RETRY;
    this.sleep = options.sleep;
  }

  getProvider(name: ImageProviderName): ImageProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ConfigurationError(
        `Image provider "${name}" is not registered. Available: ${Array.from(this.providers.keys()).join(', ')}`
      );
    }
    if (!provider.isConfigured()) {
      throw new ConfigurationError(`Image provider "${name}" is not configured. Check API key.`);
    }
    return provider;
  }

  /** Generate one image and save it as a .jpg; returns the file path. */
  async generateImage(
    prompt: string,
    orientation: Orientation,
    provider: ImageProviderName,
    pool: RateLimitedProviderPool
  ): Promise<string> {
    const backend = this.getProvider(provider);

    const image = await withRetry(
      () => pool.run(provider, () => backend.generate(prompt, orientation)),
      this.retry,
      { label: `Image (${provider})`, sleep: this.sleep }
    );

    await fs.mkdir(this.outputDir, { recursive: true });
    const imagePath = path.join(this.outputDir, `${uuidv4().replace(/-/g, '')}.jpg`);
    await fs.writeFile(imagePath, image);
    logger.info(`Image saved: ${imagePath}`, { provider, orientation });
    return imagePath;
  }

  /** One image per prompt, concurrently; paths come back in prompt order. */
  async generateImages(
    prompts: readonly string[],
    orientation: Orientation,
    provider: ImageProviderName,
    pool: RateLimitedProviderPool
  ): Promise<string[]> {
    return fanOut(prompts, (prompt) => this.generateImage(prompt, orientation, provider, pool));
  }
}

export default new ImageService();
