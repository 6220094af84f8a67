import axios from 'axios';
import { logger } from '../../config/logger';
import { envString } from '../../config/env';
import type { Orientation } from '../../config/settings';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import type { ImageProvider } from './image-provider.interface';

interface ImagesResponse {
  data?: { b64_json?: string }[];
}

export class OpenAIImageProvider implements ImageProvider {
  readonly name = 'openai' as const;
  private readonly apiKey: string;
  private readonly model = envString('OPENAI_IMAGE_MODEL', 'gpt-image-1');

  constructor(apiKey?: string) {
    this.apiKey = apiKey ?? envString('OPENAI_API_KEY');
    if (!this.apiKey) {
      logger.warn('OpenAI image API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async generate(prompt: string, orientation: Orientation): Promise<Buffer> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('openai image provider is not configured. Check OPENAI_API_KEY.');
    }

    let data: ImagesResponse;
    try {
      const response = await axios.post<ImagesResponse>(
        'https://api.openai.com/v1/images/generations',
        {
          model: this.model,
          prompt,
          quality: 'high',
          size: orientation === 'landscape' ? '1536x1024' : '1024x1536',
        },
        {
          headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${this.apiKey}` },
          timeout: 240000,
        }
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(this.name, error);
    }

    const encoded = data.data?.[0]?.b64_json;
    if (!encoded) {
      throw new ProviderError(this.name, 'Images API returned no b64_json');
    }
    return Buffer.from(encoded, 'base64');
  }
}

export default new OpenAIImageProvider();
