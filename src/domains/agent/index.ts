export { AgentRunner, extractToolText, type AgentRunResult, type ToolClient } from './runner.js'
export { TelegramSender, formatRankingMessage } from './delivery/telegram.js'
export { buildRankingPrompt, rankingPrompt } from './prompts/ranking.js'
export * from './llm/index.js'
