import axios from 'axios';
import { logger } from '../../config/logger';
import { LLM_MODELS } from '../../config/settings';
import { envString } from '../../config/env';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import type { LLMCompletionRequest, LLMProvider } from './llm-provider.interface';

interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

interface ChatCompletionResponse {
  choices?: { message?: { content?: string | null } }[];
}

type OpenAICompatibleName = 'openai' | 'xai' | 'deepseek';

/**
 * Chat-completions client shared by every backend that speaks the OpenAI
 * wire format (OpenAI, xAI, DeepSeek).
 */
export class OpenAICompatibleProvider implements LLMProvider {
  readonly model: string;
  private readonly apiKey: string;

  constructor(
    readonly name: OpenAICompatibleName,
    private readonly apiUrl: string,
    apiKeyEnv: string
  ) {
    this.apiKey = envString(apiKeyEnv);
    this.model = LLM_MODELS[name];

    if (!this.apiKey) {
      logger.warn(`${name} API key not configured (${apiKeyEnv})`);
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
      throw new ConfigurationError(`${this.name} provider is not configured. Check API key.`);
    }
    if (request.media?.length) {
      throw new ConfigurationError(`${this.name} provider does not accept media attachments`);
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: request.system },
      { role: 'user', content: request.user },
    ];

    const requestBody: Record<string, unknown> = {
      model: this.model,
      messages,
      temperature: request.temperature ?? 0.7,
      max_tokens: request.maxTokens ?? 4096,
    };
    if (request.json) {
      requestBody.response_format = { type: 'json_object' };
    }

    let data: ChatCompletionResponse;
    try {
      const response = await axios.post<ChatCompletionResponse>(this.apiUrl, requestBody, {
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        timeout: 120000,
      });
      data = response.data;
    } catch (error) {
      throw toProviderError(this.name, error);
    }

    const content = data.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new ProviderError(this.name, 'No content generated');
    }
    return content;
  }
}

export const openAIProvider = new OpenAICompatibleProvider(
  'openai',
  'https://api.openai.com/v1/chat/completions',
  'OPENAI_API_KEY'
);

export const xaiProvider = new OpenAICompatibleProvider('xai', 'https://api.x.ai/v1/chat/completions', 'XAI_API_KEY');

export const deepseekProvider = new OpenAICompatibleProvider(
  'deepseek',
  'https://api.deepseek.com/chat/completions',
  'DEEPSEEK_API_KEY'
);
