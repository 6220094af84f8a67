import axios from 'axios';
import { logger } from '../../config/logger';
import { LLM_MODELS } from '../../config/settings';
import { envString } from '../../config/env';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import type { LLMCompletionRequest, LLMProvider } from './llm-provider.interface';

interface MessagesResponse {
  content?: { type: string; text?: string }[];
}

class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model = LLM_MODELS.anthropic;
  private readonly apiKey = envString('ANTHROPIC_API_KEY');
  private readonly apiUrl = 'https://api.anthropic.com/v1/messages';

  constructor() {
    if (!this.apiKey) {
      logger.warn('Anthropic API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  supportsMedia(): boolean {
    return false;
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('anthropic provider is not configured. Check API key.');
    }
    if (request.media?.length) {
      throw new ConfigurationError('anthropic provider does not accept media attachments');
    }

    let data: MessagesResponse;
    try {
      const response = await axios.post<MessagesResponse>(
        this.apiUrl,
        {
          model: this.model,
          max_tokens: request.maxTokens ?? 8192,
          temperature: request.temperature ?? 0.7,
          system: request.system,
          messages: [{ role: 'user', content: request.user }],
        },
        {
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': this.apiKey,
            'anthropic-version': '2023-06-01',
          },
          timeout: 180000,
        }
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(this.name, error);
    }

    const text = (data.content ?? [])
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')
      .trim();
    if (!text) {
      throw new ProviderError(this.name, 'No content generated');
    }
    return text;
  }
}

export default new AnthropicProvider();
