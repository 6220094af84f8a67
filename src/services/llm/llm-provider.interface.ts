// ===========================================================================
// LLM provider abstraction
//
// One interface over every chat backend. Providers only move text: prompt
// assembly, JSON extraction and schema validation happen in the
// StructuredGenerationClient, never per provider.
// ===========================================================================

import type { LLMProviderName } from '../../config/settings';

/** Inline media for multimodal calls (base64, no data: prefix). */
export interface InlineMedia {
  mimeType: string;
  data: string;
}

export interface LLMCompletionRequest {
  system: string;
  user: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask the backend for a JSON-only response where it supports one */
  json?: boolean;
  media?: InlineMedia[];
}

export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /** Whether the provider has its API key */
  isConfigured(): boolean;

  /** Whether `media` attachments are accepted */
  supportsMedia(): boolean;

  complete(request: LLMCompletionRequest): Promise<string>;
}
