import type { ResearchBrief, TrendContext, VideoV2Config } from '../../types/v2.types';
import type { StageRunner } from '../pipeline/stage-runner';
import type { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import type { Researcher } from '../research/research.service';

interface ResearchedState {
  config: VideoV2Config;
  researchBrief: ResearchBrief | null;
  trendContext: TrendContext | null;
}

/** Optional research phase of the V2 pipelines (progress 0.02 to 0.08). */
export async function runResearchStage<S extends ResearchedState>(
  runner: StageRunner<S>,
  researcher: Researcher,
  pool: RateLimitedProviderPool,
  checkpointLabel: string
): Promise<void> {
  const { config } = runner.state;
  if (!config.enableResearch) {
    runner.progress('Skipping research (disabled).', 0.08);
    return;
  }

  runner.progress('Researching topic...', 0.02);
  await runner.step('research', checkpointLabel, async (s) => {
    const result = await researcher.research(
      {
        topic: config.topic,
        targetAudience: config.targetAudience,
        platform: config.platform,
        referenceUrls: config.referenceUrls,
        provider: config.modelProvider,
      },
      pool
    );
    s.researchBrief = result.researchBrief;
    s.trendContext = result.trendContext;
  });
  runner.progress('Research complete.', 0.08);
}
