import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { StructuredGenerationClient, buildUserMessage } from './structured-generation.client';
import { ConfigurationError } from '../pipeline/pipeline-error';
import type { LLMCompletionRequest, LLMProvider } from './llm-provider.interface';

const GoalSchema = z.object({ goal: z.string() });

function fakeProvider(overrides: Partial<LLMProvider> = {}) {
  const complete = vi.fn<[LLMCompletionRequest], Promise<string>>();
  const provider: LLMProvider = {
    name: 'openai',
    model: 'test-model',
    isConfigured: () => true,
    supportsMedia: () => false,
    complete,
    ...overrides,
  };
  return { provider, complete };
}

const noSleep = vi.fn(async () => undefined);
const retry = { attempts: 3, baseDelayMs: 2000, maxDelayMs: 30000 };

describe('StructuredGenerationClient', () => {
  it('sends the payload as JSON and validates the reply', async () => {
    const { provider, complete } = fakeProvider();
    complete.mockResolvedValueOnce('```json\n{"goal":"Explain why the sky is blue"}\n```');
    const client = new StructuredGenerationClient({ providers: [provider], retry, sleep: noSleep });

    const result = await client.generate({
      system: 'You write video goals.',
      payload: { topic: 'sky colour' },
      schema: GoalSchema,
      schemaName: 'VideoGoal',
      provider: 'openai',
    });

    expect(result).toEqual({ goal: 'Explain why the sky is blue' });
    expect(complete).toHaveBeenCalledWith(
      expect.objectContaining({
        system: 'You write video goals.',
        user: '{\n  "topic": "sky colour"\n}',
        json: true,
      })
    );
  });

  it('retries when the reply fails validation', async () => {
    const { provider, complete } = fakeProvider();
    complete.mockResolvedValueOnce('{"target":"wrong key"}').mockResolvedValueOnce('{"goal":"Second try"}');
    const client = new StructuredGenerationClient({ providers: [provider], retry, sleep: noSleep });

    const result = await client.generate({
      system: 's',
      payload: 'topic',
      schema: GoalSchema,
      schemaName: 'VideoGoal',
      provider: 'openai',
    });

    expect(result.goal).toBe('Second try');
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured attempts', async () => {
    const { provider, complete } = fakeProvider();
    complete.mockResolvedValue('not json at all');
    const client = new StructuredGenerationClient({ providers: [provider], retry, sleep: noSleep });

    await expect(
      client.generate({ system: 's', payload: {}, schema: GoalSchema, schemaName: 'VideoGoal', provider: 'openai' })
    ).rejects.toThrow(/Invalid JSON from LLM for VideoGoal/);
    expect(complete).toHaveBeenCalledTimes(3);
  });

  it('rejects unregistered and unconfigured providers without calling them', async () => {
    const { provider, complete } = fakeProvider({ isConfigured: () => false });
    const client = new StructuredGenerationClient({ providers: [provider], retry, sleep: noSleep });
    const base = { system: 's', payload: {}, schema: GoalSchema, schemaName: 'VideoGoal' };

    await expect(client.generate({ ...base, provider: 'openai' })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(client.generate({ ...base, provider: 'deepseek' })).rejects.toThrow(
      'LLM provider "deepseek" is not registered. Available: openai'
    );
    expect(complete).not.toHaveBeenCalled();
  });

  it('refuses media for text-only providers', async () => {
    const { provider } = fakeProvider();
    const client = new StructuredGenerationClient({ providers: [provider], retry, sleep: noSleep });

    await expect(
      client.generate({
        system: 's',
        payload: {},
        schema: GoalSchema,
        schemaName: 'ProductDescription',
        provider: 'openai',
        media: [{ mimeType: 'image/png', data: 'aGVsbG8=' }],
      })
    ).rejects.toThrow('LLM provider "openai" cannot analyze media');
  });
});

describe('buildUserMessage', () => {
  it('passes strings through unchanged', () => {
    expect(buildUserMessage('plain text')).toBe('plain text');
  });
});
