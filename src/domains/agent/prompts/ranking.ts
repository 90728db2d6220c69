import { PromptTemplate } from '@langchain/core/prompts'

export const RANKING_TEMPLATE = `You are a tech news editor. Based ONLY on the context below (excerpts of academic papers retrieved from a knowledge base),
create a Top 5 Ranking of the most relevant and impactful research in technology. Do not add greetings or commentary.

Focus on:
- Significant technological innovations
- Performance improvements
- Recent advances in AI, ML, computing
- Potential impact on industry

CONTEXT:
{context}

OUTPUT FORMAT:
1. [Research Title] (Score 0.0-5.0)
   - Innovation: [What is new or important about this research]
   - Impact: [Why this is important for tech]
   - Link: [Paper link]
   - Source: [Source of the paper]`

export const rankingPrompt = PromptTemplate.fromTemplate(RANKING_TEMPLATE)

export function buildRankingPrompt(context: string): Promise<string> {
  return rankingPrompt.format({ context })
}
