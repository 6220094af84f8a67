import axios from 'axios';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import {
  OUTPUT_DIRS,
  PROVIDER_RETRY,
  VIDEO_CLIP_MAX_SECONDS,
  VIDEO_CLIP_MIN_SECONDS,
  VIDEO_POLL_INTERVAL_MS,
  VIDEO_POLL_TIMEOUT_MS,
  type Orientation,
  type RetryPolicy,
  type VideoProviderName,
} from '../../config/settings';
import { ConfigurationError, ProviderError, VideoJobTimeoutError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import type { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import { sleep, withRetry, type Sleep } from '../providers/retry';
import type { VideoJobRequest, VideoProvider } from './video-provider.interface';
import klingProvider from './kling.provider';
import lumaProvider from './luma.provider';
import runwayProvider from './runway.provider';

export interface ClipRequest {
  prompt: string;
  durationSeconds: number;
  orientation: Orientation;
  provider: VideoProviderName;
  /** Still image to animate from, when the provider supports it */
  imagePath?: string | null;
}

export interface VideoGenerator {
  generateClip(request: ClipRequest, pool: RateLimitedProviderPool): Promise<string>;
}

export interface VideoServiceOptions {
  providers?: VideoProvider[];
  outputDir?: string;
  retry?: RetryPolicy;
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
  sleep?: Sleep;
}

/** Whole seconds within what the video APIs accept. */
export function clampClipDuration(seconds: number): number {
  return Math.min(VIDEO_CLIP_MAX_SECONDS, Math.max(VIDEO_CLIP_MIN_SECONDS, Math.floor(seconds)));
}

/**
 * AI video clips: submit a job, poll until it finishes, download the mp4.
 * The whole job holds one pool slot, so the provider's concurrency cap
 * bounds jobs in flight. A failed or timed-out job is retried from submit.
 */
export class VideoService implements VideoGenerator {
  private readonly providers = new Map<VideoProviderName, VideoProvider>();
  private readonly outputDir: string;
  private readonly retry: RetryPolicy;
  private readonly pollIntervalMs: number;
  private readonly pollTimeoutMs: number;
  private readonly sleep: Sleep;

  constructor(options: VideoServiceOptions = {}) {
    const providers = options.providers ?? [runwayProvider, lumaProvider, klingProvider];
    for (const provider of providers) this.providers.set(provider.name, provider);
    this.outputDir = options.outputDir ?? OUTPUT_DIRS.clips;
    this.retry = options.retry ?? PROVIDER_RETRY;
    this.pollIntervalMs = options.pollIntervalMs ?? VIDEO_POLL_INTERVAL_MS;
    this.pollTimeoutMs = options.pollTimeoutMs ?? VIDEO_POLL_TIMEOUT_MS;
    this.sleep = options.sleep ?? sleep;
  }

  getProvider(name: VideoProviderName): VideoProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ConfigurationError(
        `Video provider "${name}" is not registered. Available: ${Array.from(this.providers.keys()).join(', ')}`
      );
    }
    if (!provider.isConfigured()) {
      throw new ConfigurationError(`Video provider "${name}" is not configured. Check API key.`);
    }
    return provider;
  }

  async generateClip(request: ClipRequest, pool: RateLimitedProviderPool): Promise<string> {
    const backend = this.getProvider(request.provider);
    const job: VideoJobRequest = {
      prompt: request.prompt,
      durationSeconds: clampClipDuration(request.durationSeconds),
      orientation: request.orientation,
      baseImage: request.imagePath ? await fs.readFile(request.imagePath) : undefined,
    };

    const video = await withRetry(
      () => pool.run(request.provider, () => this.runJob(backend, job)),
      this.retry,
      { label: `Video clip (${request.provider})`, sleep: this.sleep }
    );

    await fs.mkdir(this.outputDir, { recursive: true });
    const clipPath = path.join(this.outputDir, `${uuidv4().replace(/-/g, '')}.mp4`);
    await fs.writeFile(clipPath, video);
    logger.info(`Video clip saved: ${clipPath}`, {
      provider: request.provider,
      durationSeconds: job.durationSeconds,
    });
    return clipPath;
  }

  private async runJob(provider: VideoProvider, job: VideoJobRequest): Promise<Buffer> {
    const jobId = await provider.submit(job);
    logger.info(`Video job submitted: ${provider.name} ${jobId}`);

    for (let elapsed = 0; elapsed < this.pollTimeoutMs; elapsed += this.pollIntervalMs) {
      const status = await provider.poll(jobId);
      if (status.state === 'succeeded') {
        return this.download(provider.name, status.videoUrl);
      }
      if (status.state === 'failed') {
        throw new ProviderError(provider.name, `Video job ${jobId} failed: ${status.reason}`);
      }
      await this.sleep(this.pollIntervalMs);
    }
    throw new VideoJobTimeoutError(provider.name, jobId, this.pollTimeoutMs);
  }

  private async download(provider: VideoProviderName, url: string): Promise<Buffer> {
    try {
      const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', timeout: 60000 });
      const video = Buffer.from(response.data);
      if (video.length === 0) throw new ProviderError(provider, 'Downloaded video is empty');
      return video;
    } catch (error) {
      throw toProviderError(provider, error);
    }
  }
}

export default new VideoService();
