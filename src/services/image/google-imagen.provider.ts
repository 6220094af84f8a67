import axios from 'axios';
import { logger } from '../../config/logger';
import { envString } from '../../config/env';
import type { Orientation } from '../../config/settings';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import type { ImageProvider } from './image-provider.interface';

interface PredictResponse {
  predictions?: { bytesBase64Encoded?: string; mimeType?: string }[];
}

/** Imagen through the Gemini API `predict` endpoint. */
export class GoogleImagenProvider implements ImageProvider {
  readonly name = 'google' as const;
  private readonly apiKey: string;
  private readonly model = envString('IMAGEN_MODEL', 'imagen-4.0-ultra-generate-001');

  constructor(apiKey?: string) {
    this.apiKey = apiKey ?? envString('GEMINI_API_KEY');
    if (!this.apiKey) {
      logger.warn('Imagen API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async generate(prompt: string, orientation: Orientation): Promise<Buffer> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('google image provider is not configured. Check GEMINI_API_KEY.');
    }

    let data: PredictResponse;
    try {
      const response = await axios.post<PredictResponse>(
        `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:predict`,
        {
          instances: [{ prompt }],
          parameters: {
            sampleCount: 1,
            aspectRatio: orientation === 'landscape' ? '16:9' : '9:16',
          },
        },
        {
          headers: { 'Content-Type': 'application/json', 'x-goog-api-key': this.apiKey },
          timeout: 180000,
        }
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(this.name, error);
    }

    const encoded = data.predictions?.[0]?.bytesBase64Encoded;
    if (!encoded) {
      throw new ProviderError(this.name, 'Imagen returned no image');
    }
    return Buffer.from(encoded, 'base64');
  }
}

export default new GoogleImagenProvider();
