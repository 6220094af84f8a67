import axios from 'axios';
import { logger } from '../../config/logger';
import { envString } from '../../config/env';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import { aspectRatio, jpegDataUri, type VideoJobRequest, type VideoJobStatus, type VideoProvider } from './video-provider.interface';

interface RunwayTask {
  id?: string;
  status?: 'PENDING' | 'THROTTLED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELLED';
  output?: string[];
  failure?: string;
}

const BASE_URL = 'https://api.dev.runwayml.com/v1';

export class RunwayProvider implements VideoProvider {
  readonly name = 'runway' as const;
  private readonly apiKey: string;

  constructor(apiKey?: string) {
    this.apiKey = apiKey ?? envString('RUNWAY_API_KEY');
    if (!this.apiKey) {
      logger.warn('Runway API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async submit(request: VideoJobRequest): Promise<string> {
    this.assertConfigured();
    const body: Record<string, string | number> = {
      promptText: request.prompt,
      model: 'gen3a_turbo',
      duration: request.durationSeconds,
      ratio: aspectRatio(request.orientation),
    };
    if (request.baseImage) {
      body.promptImage = jpegDataUri(request.baseImage);
    }

    try {
      const response = await axios.post<RunwayTask>(`${BASE_URL}/image_to_video`, body, {
        headers: this.headers(),
        timeout: 30000,
      });
      if (!response.data.id) throw new ProviderError(this.name, 'Task response had no id');
      return response.data.id;
    } catch (error) {
      throw toProviderError(this.name, error);
    }
  }

  async poll(jobId: string): Promise<VideoJobStatus> {
    let task: RunwayTask;
    try {
      const response = await axios.get<RunwayTask>(`${BASE_URL}/tasks/${jobId}`, {
        headers: this.headers(),
        timeout: 15000,
      });
      task = response.data;
    } catch (error) {
      throw toProviderError(this.name, error);
    }

    switch (task.status) {
      case 'SUCCEEDED': {
        const videoUrl = task.output?.[0];
        if (!videoUrl) return { state: 'failed', reason: 'task succeeded without output' };
        return { state: 'succeeded', videoUrl };
      }
      case 'FAILED':
      case 'CANCELLED':
        return { state: 'failed', reason: task.failure ?? 'unknown error' };
      default:
        return { state: 'pending' };
    }
  }

  private assertConfigured(): void {
    if (!this.isConfigured()) {
      throw new ConfigurationError('runway provider is not configured. Check RUNWAY_API_KEY.');
    }
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
      'X-Runway-Version': '2024-11-06',
    };
  }
}

export default new RunwayProvider();
