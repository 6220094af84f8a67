const JSON_ONLY = 'Respond with strict JSON only. No markdown fences, no commentary.';

export const RESEARCH_QUERIES_PROMPT = `You plan web research for a video script. Write three to five focused search queries
that will surface facts, statistics, expert views and counterarguments on the topic.

INPUT: {"topic", "targetAudience"}

OUTPUT: {"queries": ["<query>"]}
${JSON_ONLY}`;

export const RESEARCH_SYNTHESIS_PROMPT = `You turn raw web search results into a research brief a scriptwriter can rely on.
Keep only claims the results support, with their numbers.

INPUT: {"topic", "targetAudience", "rawSearchResults"}

OUTPUT: {"keyFacts": [], "statistics": [], "expertPerspectives": [], "counterarguments": [],
"knowledgeGaps": [], "angleRecommendation"}
${JSON_ONLY}`;

export const TREND_ANALYSIS_PROMPT = `You analyse what content on a topic performs on a platform right now.

INPUT: {"topic", "platform", "rawSearchResults"}

List hooks that work, angles that are saturated and gaps nobody covers well.

OUTPUT: {"workingHooks": [], "saturatedAngles": [], "contentGaps": []}
${JSON_ONLY}`;
