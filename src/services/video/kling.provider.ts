import axios from 'axios';
import { logger } from '../../config/logger';
import { envString } from '../../config/env';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import { aspectRatio, type VideoJobRequest, type VideoJobStatus, type VideoProvider } from './video-provider.interface';

interface KlingEnvelope {
  data?: {
    task_id?: string;
    task_status?: 'submitted' | 'processing' | 'succeed' | 'failed';
    task_status_msg?: string;
    task_result?: { videos?: { url?: string }[] };
  };
}

const BASE_URL = 'https://api.klingai.com/v1';

/** Kling text-to-video; a base image is ignored. */
export class KlingProvider implements VideoProvider {
  readonly name = 'kling' as const;
  private readonly apiKey: string;

  constructor(apiKey?: string) {
    this.apiKey = apiKey ?? envString('KLING_API_KEY');
    if (!this.apiKey) {
      logger.warn('Kling API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async submit(request: VideoJobRequest): Promise<string> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('kling provider is not configured. Check KLING_API_KEY.');
    }

    try {
      const response = await axios.post<KlingEnvelope>(
        `${BASE_URL}/videos/text2video`,
        {
          prompt: request.prompt,
          duration: String(request.durationSeconds),
          aspect_ratio: aspectRatio(request.orientation),
          model_name: 'kling-v1',
        },
        { headers: this.headers(), timeout: 30000 }
      );
      const taskId = response.data.data?.task_id;
      if (!taskId) throw new ProviderError(this.name, 'Task response had no task_id');
      return taskId;
    } catch (error) {
      throw toProviderError(this.name, error);
    }
  }

  async poll(jobId: string): Promise<VideoJobStatus> {
    let envelope: KlingEnvelope;
    try {
      const response = await axios.get<KlingEnvelope>(`${BASE_URL}/videos/text2video/${jobId}`, {
        headers: this.headers(),
        timeout: 15000,
      });
      envelope = response.data;
    } catch (error) {
      throw toProviderError(this.name, error);
    }

    const task = envelope.data;
    if (task?.task_status === 'succeed') {
      const videoUrl = task.task_result?.videos?.[0]?.url;
      return videoUrl ? { state: 'succeeded', videoUrl } : { state: 'failed', reason: 'succeeded without a video' };
    }
    if (task?.task_status === 'failed') {
      return { state: 'failed', reason: task.task_status_msg ?? 'unknown' };
    }
    return { state: 'pending' };
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}`, 'Content-Type': 'application/json' };
  }
}

export default new KlingProvider();
