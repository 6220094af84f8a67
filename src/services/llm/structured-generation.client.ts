import type { z } from 'zod';
import { logger, promptLogger } from '../../config/logger';
import { LLM_RETRY, type LLMProviderName, type RetryPolicy } from '../../config/settings';
import { parseAndValidate } from '../../utils/json-response';
import { ConfigurationError } from '../pipeline/pipeline-error';
import { withRetry, type Sleep } from '../providers/retry';
import type { InlineMedia, LLMProvider } from './llm-provider.interface';
import anthropicProvider from './anthropic.provider';
import geminiProvider from './gemini.provider';
import { deepseekProvider, openAIProvider, xaiProvider } from './openai-compatible.provider';

// ===========================================================================
// Structured generation
//
// (system instructions, JSON payload, zod schema) -> validated value.
// Invalid JSON and schema mismatches count as failed attempts and are
// retried with the same backoff as transport errors.
// ===========================================================================

export interface StructuredRequest<T extends z.ZodTypeAny> {
  system: string;
  payload: unknown;
  schema: T;
  /** Name used in logs and validation errors */
  schemaName: string;
  provider: LLMProviderName;
  temperature?: number;
  maxTokens?: number;
  media?: InlineMedia[];
}

/** The only LLM capability the pipelines depend on. */
export interface StructuredGenerator {
  generate<T extends z.ZodTypeAny>(request: StructuredRequest<T>): Promise<z.infer<T>>;
}

export interface StructuredGenerationClientOptions {
  providers?: LLMProvider[];
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export class StructuredGenerationClient implements StructuredGenerator {
  private readonly providers = new Map<LLMProviderName, LLMProvider>();
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;

  constructor(options: StructuredGenerationClientOptions = {}) {
    const providers = options.providers ?? [
      geminiProvider,
      openAIProvider,
      anthropicProvider,
      xaiProvider,
      deepseekProvider,
    ];
    for (const provider of providers) this.providers.set(provider.name, provider);
    this.retry = options.retry ?? LLM_RETRY;
    this.sleep = options.sleep;
  }

  getProvider(name: LLMProviderName): LLMProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ConfigurationError(
        `LLM provider "${name}" is not registered. Available: ${Array.from(this.providers.keys()).join(', ')}`
      );
    }
    if (!provider.isConfigured()) {
      throw new ConfigurationError(`LLM provider "${name}" is not configured. Check API key.`);
    }
    return provider;
  }

  async generate<T extends z.ZodTypeAny>(request: StructuredRequest<T>): Promise<z.infer<T>> {
    const provider = this.getProvider(request.provider);
    if (request.media?.length && !provider.supportsMedia()) {
      throw new ConfigurationError(`LLM provider "${request.provider}" cannot analyze media`);
    }

    const user = buildUserMessage(request.payload);
    logger.info(`Structured generation: ${request.schemaName} via ${provider.name} (${provider.model})`);

    return withRetry(
      async (attempt) => {
        promptLogger.debug(`SYSTEM:\n${request.system}\n\nUSER:\n${user}`, {
          provider: provider.name,
          schemaName: request.schemaName,
          attempt,
        });
        const raw = await provider.complete({
          system: request.system,
          user,
          temperature: request.temperature,
          maxTokens: request.maxTokens,
          json: true,
          media: request.media,
        });
        return parseAndValidate(raw, request.schema, request.schemaName);
      },
      this.retry,
      { label: `LLM ${request.schemaName} (${provider.name})`, sleep: this.sleep }
    );
  }
}

/** Payloads go to the model as pretty JSON; plain strings go as-is. */
export function buildUserMessage(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  return JSON.stringify(payload, null, 2);
}

export default new StructuredGenerationClient();
