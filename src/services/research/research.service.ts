import axios from 'axios';
import { logger } from '../../config/logger';
import { envString } from '../../config/env';
import { PROVIDER_RETRY, type LLMProviderName, type RetryPolicy } from '../../config/settings';
import {
  ResearchBriefSchema,
  ResearchQueriesSchema,
  TrendContextSchema,
  type ResearchBrief,
  type TrendContext,
} from '../../types/v2.types';
import structuredGenerationClient, { type StructuredGenerator } from '../llm/structured-generation.client';
import { ConfigurationError, ProviderError, errorMessage } from '../pipeline/pipeline-error';
import { fanOut } from '../pipeline/stage-runner';
import { toProviderError } from '../providers/http-error';
import type { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import { withRetry, type Sleep } from '../providers/retry';
import { RESEARCH_QUERIES_PROMPT, RESEARCH_SYNTHESIS_PROMPT, TREND_ANALYSIS_PROMPT } from './prompt-templates';

// ===========================================================================
// Web research
//
//   topic   -> LLM search queries -> Tavily (parallel) -> ResearchBrief
//   trends  -> one Tavily query   -> TrendContext
//
// Both branches run concurrently. A failed search contributes a
// "[Search failed]" marker instead of failing the research.
// ===========================================================================

export interface ResearchRequest {
  topic: string;
  targetAudience: string;
  platform: string;
  /** Free-text URLs the user wants considered */
  referenceUrls?: string;
  provider: LLMProviderName;
}

export interface ResearchResult {
  researchBrief: ResearchBrief;
  trendContext: TrendContext;
}

export interface Researcher {
  research(request: ResearchRequest, pool: RateLimitedProviderPool): Promise<ResearchResult>;
}

interface TavilySearchResponse {
  results?: { title?: string; url?: string; content?: string }[];
}

export interface ResearchServiceOptions {
  apiKey?: string;
  llm?: StructuredGenerator;
  maxQueries?: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export class ResearchService implements Researcher {
  private readonly apiKey: string;
  private readonly llm: StructuredGenerator;
  private readonly maxQueries: number;
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;

  constructor(options: ResearchServiceOptions = {}) {
    this.apiKey = options.apiKey ?? envString('TAVILY_API_KEY');
    this.llm = options.llm ?? structuredGenerationClient;
    this.maxQueries = options.maxQueries ?? 3;
    this.retry = options.retry ?? PROVIDER_RETRY;
    this.sleep = options.sleep;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async research(request: ResearchRequest, pool: RateLimitedProviderPool): Promise<ResearchResult> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('tavily provider is not configured. Check TAVILY_API_KEY.');
    }

    const [researchBrief, trendContext] = await Promise.all([
      this.researchTopic(request, pool),
      this.analyzeTrends(request, pool),
    ]);
    return { researchBrief, trendContext };
  }

  async researchTopic(request: ResearchRequest, pool: RateLimitedProviderPool): Promise<ResearchBrief> {
    const { queries } = await this.llm.generate({
      system: RESEARCH_QUERIES_PROMPT,
      payload: { topic: request.topic, targetAudience: request.targetAudience },
      schema: ResearchQueriesSchema,
      schemaName: 'ResearchQueries',
      provider: request.provider,
    });
    const selected = queries.slice(0, this.maxQueries);
    logger.info(`Research queries for "${request.topic}"`, { queries: selected });

    const rawSearchResults = await this.runSearches(selected, pool);

    const brief = await this.llm.generate({
      system: RESEARCH_SYNTHESIS_PROMPT,
      payload: {
        topic: request.topic,
        targetAudience: request.targetAudience,
        referenceUrls: request.referenceUrls || null,
        rawSearchResults,
      },
      schema: ResearchBriefSchema,
      schemaName: 'ResearchBrief',
      provider: request.provider,
    });
    logger.info(`Research brief: ${brief.keyFacts.length} facts, ${brief.statistics.length} stats`);
    return brief;
  }

  async analyzeTrends(request: ResearchRequest, pool: RateLimitedProviderPool): Promise<TrendContext> {
    const year = new Date().getFullYear();
    const rawSearchResults = await this.runSearches(
      [`${request.topic} ${request.platform} viral content trends ${year}`],
      pool
    );

    const trends = await this.llm.generate({
      system: TREND_ANALYSIS_PROMPT,
      payload: { topic: request.topic, platform: request.platform, rawSearchResults },
      schema: TrendContextSchema,
      schemaName: 'TrendContext',
      provider: request.provider,
    });
    logger.info(`Trend analysis: ${trends.workingHooks.length} hooks, ${trends.contentGaps.length} gaps`);
    return trends;
  }

  /** Concatenated search digests, one block per query, in query order. */
  async runSearches(queries: readonly string[], pool: RateLimitedProviderPool): Promise<string> {
    const blocks = await fanOut(queries, async (query) => {
      try {
        const snippets = await withRetry(() => pool.run('tavily', () => this.search(query)), this.retry, {
          label: 'Tavily search',
          sleep: this.sleep,
        });
        return `--- Query: ${query} ---\n${snippets.join('\n\n')}`;
      } catch (error) {
        if (error instanceof ConfigurationError) throw error;
        logger.warn(`Tavily search failed for "${query}": ${errorMessage(error)}`);
        return `--- Query: ${query} ---\n[Search failed: ${errorMessage(error)}]`;
      }
    });
    return blocks.join('\n\n');
  }

  private async search(query: string): Promise<string[]> {
    let data: TavilySearchResponse;
    try {
      const response = await axios.post<TavilySearchResponse>(
        'https://api.tavily.com/search',
        { query, search_depth: 'basic', max_results: 5 },
        {
          headers: { Authorization: `Bearer ${this.apiKey}`, 'Content-Type': 'application/json' },
          timeout: 30000,
        }
      );
      data = response.data;
    } catch (error) {
      throw toProviderError('tavily', error);
    }

    if (!data.results) {
      throw new ProviderError('tavily', 'Search response had no results array');
    }
    return data.results.map((r) => `[${r.title ?? ''}] (${r.url ?? ''})\n${r.content ?? ''}`);
  }
}

export default new ResearchService();
