import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { ResearchService } from './research.service';
import { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { FakeStructuredGenerator } from '../../test/fake-llm';
import { okResponse } from '../../test/http';

vi.mock('axios');

const noWait = async () => undefined;
const retry = { attempts: 1, baseDelayMs: 1, maxDelayMs: 1 };

beforeEach(() => {
  vi.mocked(axios.post).mockReset();
});

function pool() {
  return new RateLimitedProviderPool(undefined, noWait);
}

describe('ResearchService.runSearches', () => {
  it('formats each result and keeps query order', async () => {
    vi.mocked(axios.post)
      .mockResolvedValueOnce(okResponse({ results: [{ title: 'Tides', url: 'https://a.test', content: 'Moon pulls water.' }] }))
      .mockResolvedValueOnce(okResponse({ results: [] }));
    const service = new ResearchService({ apiKey: 'test-secret', llm: new FakeStructuredGenerator({}), retry });

    const digest = await service.runSearches(['why tides', 'tide tables'], pool());

    expect(digest).toBe('--- Query: why tides ---\n[Tides] (https://a.test)\nMoon pulls water.\n\n--- Query: tide tables ---\n');
  });

  it('marks a failed search instead of throwing', async () => {
    vi.mocked(axios.post).mockRejectedValueOnce(new ProviderError('tavily', 'Service error (HTTP 503)', 503));
    const service = new ResearchService({ apiKey: 'test-secret', llm: new FakeStructuredGenerator({}), retry });

    const digest = await service.runSearches(['tides'], pool());

    expect(digest).toBe('--- Query: tides ---\n[Search failed: [tavily] Service error (HTTP 503)]');
  });
});

describe('ResearchService.research', () => {
  it('plans queries, searches and synthesizes a brief and trend context', async () => {
    vi.mocked(axios.post).mockResolvedValue(okResponse({ results: [{ title: 'T', url: 'u', content: 'c' }] }));
    const llm = new FakeStructuredGenerator({
      ResearchQueries: [{ queries: ['q1', 'q2', 'q3', 'q4'] }],
      ResearchBrief: [{ keyFacts: ['Tides follow the moon'], statistics: ['Two high tides a day'] }],
      TrendContext: [{ workingHooks: ['Did you know'], contentGaps: ['tidal energy'] }],
    });
    const service = new ResearchService({ apiKey: 'test-secret', llm, retry });

    const result = await service.research(
      { topic: 'ocean tides', targetAudience: 'students', platform: 'TikTok', provider: 'google' },
      pool()
    );

    expect(result.researchBrief.keyFacts).toEqual(['Tides follow the moon']);
    expect(result.researchBrief.counterarguments).toEqual([]);
    expect(result.trendContext.contentGaps).toEqual(['tidal energy']);
    // three planned queries plus one trend query
    expect(axios.post).toHaveBeenCalledTimes(4);
    expect(llm.callsFor('ResearchBrief')[0].payload).toMatchObject({ topic: 'ocean tides', referenceUrls: null });
  });

  it('requires a Tavily key', async () => {
    const service = new ResearchService({ apiKey: '', llm: new FakeStructuredGenerator({}) });

    await expect(
      service.research({ topic: 't', targetAudience: 'a', platform: 'p', provider: 'google' }, pool())
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});
