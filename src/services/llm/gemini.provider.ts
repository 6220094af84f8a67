import axios from 'axios';
import { logger } from '../../config/logger';
import { LLM_MODELS } from '../../config/settings';
import { envString } from '../../config/env';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import type { LLMCompletionRequest, LLMProvider } from './llm-provider.interface';

type GeminiPart = { text: string } | { inlineData: { mimeType: string; data: string } };

interface GenerateContentResponse {
  candidates?: { content?: { parts?: { text?: string }[] } }[];
}

/**
 * Gemini `generateContent` over REST. The only backend that takes inline
 * media, so reference-video and product-image analysis go through it.
 */
class GeminiProvider implements LLMProvider {
  readonly name = 'google' as const;
  readonly model = LLM_MODELS.google;
  private readonly apiKey = envString('GEMINI_API_KEY');
  private readonly apiBase = 'https://generativelanguage.googleapis.com/v1beta/models';

  constructor() {
    if (!this.apiKey) {
      logger.warn('Gemini API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  supportsMedia(): boolean {
    return true;
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('google provider is not configured. Check GEMINI_API_KEY.');
    }

    const parts: GeminiPart[] = [
      ...(request.media ?? []).map((m) => ({ inlineData: { mimeType: m.mimeType, data: m.data } })),
      { text: request.user },
    ];

    const generationConfig: Record<string, unknown> = {
      temperature: request.temperature ?? 0.7,
      maxOutputTokens: request.maxTokens ?? 8192,
    };
    if (request.json) {
      generationConfig.responseMimeType = 'application/json';
    }

    let data: GenerateContentResponse;
    try {
      const response = await axios.post<GenerateContentResponse>(
        `${this.apiBase}/${this.model}:generateContent`,
        {
          systemInstruction: { parts: [{ text: request.system }] },
          contents: [{ role: 'user', parts }],
          generationConfig,
        },
        {
          headers: { 'Content-Type': 'application/json', 'x-goog-api-key': this.apiKey },
          timeout: 300000,
          maxBodyLength: Infinity,
        }
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(this.name, error);
    }

    const text = (data.candidates?.[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('')
      .trim();
    if (!text) {
      throw new ProviderError(this.name, 'No content generated');
    }
    return text;
  }
}

export default new GeminiProvider();
