import axios from 'axios';
import { logger } from '../../config/logger';
import { envString } from '../../config/env';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import { aspectRatio, jpegDataUri, type VideoJobRequest, type VideoJobStatus, type VideoProvider } from './video-provider.interface';

interface LumaGeneration {
  id?: string;
  state?: 'queued' | 'dreaming' | 'completed' | 'failed';
  assets?: { video?: string };
  failure_reason?: string;
}

const BASE_URL = 'https://api.lumalabs.ai/dream-machine/v1';

/** Luma Dream Machine. Duration is chosen by the model. */
export class LumaProvider implements VideoProvider {
  readonly name = 'luma' as const;
  private readonly apiKey: string;

  constructor(apiKey?: string) {
    this.apiKey = apiKey ?? envString('LUMA_API_KEY');
    if (!this.apiKey) {
      logger.warn('Luma API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async submit(request: VideoJobRequest): Promise<string> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('luma provider is not configured. Check LUMA_API_KEY.');
    }

    try {
      const response = await axios.post<LumaGeneration>(
        `${BASE_URL}/generations`,
        {
          prompt: request.prompt,
          aspect_ratio: aspectRatio(request.orientation),
          ...(request.baseImage && {
            keyframes: { frame0: { type: 'image', url: jpegDataUri(request.baseImage) } },
          }),
        },
        { headers: this.headers(), timeout: 30000 }
      );
      if (!response.data.id) throw new ProviderError(this.name, 'Generation response had no id');
      return response.data.id;
    } catch (error) {
      throw toProviderError(this.name, error);
    }
  }

  async poll(jobId: string): Promise<VideoJobStatus> {
    let generation: LumaGeneration;
    try {
      const response = await axios.get<LumaGeneration>(`${BASE_URL}/generations/${jobId}`, {
        headers: this.headers(),
        timeout: 15000,
      });
      generation = response.data;
    } catch (error) {
      throw toProviderError(this.name, error);
    }

    if (generation.state === 'completed') {
      const videoUrl = generation.assets?.video;
      return videoUrl ? { state: 'succeeded', videoUrl } : { state: 'failed', reason: 'completed without a video asset' };
    }
    if (generation.state === 'failed') {
      return { state: 'failed', reason: generation.failure_reason ?? 'unknown' };
    }
    return { state: 'pending' };
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}`, 'Content-Type': 'application/json' };
  }
}

export default new LumaProvider();
