/**
 * Agent flow: ingest a topic through the RAG server, pull the most relevant
 * excerpts, have a chat model rank them, and optionally deliver the ranking.
 */

import { z } from 'zod'
import { EMPTY_KNOWLEDGE_BASE_MESSAGE } from '@/domains/rag/rag-service.js'
import type { AgentConfig } from '@/shared/config/config-factory.js'
import { ErrorCode, GenerationError, RetryExhaustedError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'
import { RetryWrapper, type Sleep } from '@/shared/utils/resilience.js'
import type { TelegramSender } from './delivery/telegram.js'
import type { ChatModel } from './llm/types.js'
import { buildRankingPrompt } from './prompts/ranking.js'

/**
 * The MCP client calls the runner needs. The SDK Client satisfies it.
 */
export interface ToolClient {
  listTools(): Promise<{ tools: Array<{ name: string }> }>
  callTool(params: { name: string; arguments?: Record<string, unknown> }): Promise<unknown>
}

export interface AgentRunResult {
  tools: string[]
  ingestion: string
  context: string
  ranking?: string
  delivered: boolean
  stoppedReason?: string
}

export interface AgentRunnerDependencies {
  client: ToolClient
  chatModel: ChatModel
  telegram?: TelegramSender
  sleep?: Sleep
}

const ToolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  isError: z.boolean().optional(),
})

/**
 * Text of the first text item of a tool result
 */
export function extractToolText(result: unknown): string {
  const parsed = ToolResultSchema.safeParse(result)
  if (!parsed.success) return ''
  return parsed.data.content.find((item) => item.type === 'text')?.text ?? ''
}

function isUnusableContext(context: string): string | undefined {
  if (!context.trim()) return 'No context was returned by query_rag'
  if (context === EMPTY_KNOWLEDGE_BASE_MESSAGE) return 'The knowledge base is empty'
  if (context.startsWith('Error')) return context
  return undefined
}

export class AgentRunner {
  constructor(
    private config: AgentConfig,
    private dependencies: AgentRunnerDependencies
  ) {}

  async run(): Promise<AgentRunResult> {
    const { client } = this.dependencies
    const { topic, sources, maxPapers, question } = this.config

    const { tools } = await client.listTools()
    const toolNames = tools.map((tool) => tool.name)
    logger.info(`🛠️ Found tools: ${toolNames.join(', ')}`)

    logger.info(`🤖 Searching papers about '${topic}'`, { sources, maxPapers })
    const ingestion = extractToolText(
      await client.callTool({
        name: 'update_knowledge_base',
        arguments: { topic, max_papers: maxPapers, sources },
      })
    )
    logger.info(`📡 Server response: ${ingestion}`)

    logger.info('🤖 Querying the knowledge base')
    const context = extractToolText(await client.callTool({ name: 'query_rag', arguments: { question } }))

    const stoppedReason = isUnusableContext(context)
    if (stoppedReason) {
      logger.warn('Stopping before ranking', { reason: stoppedReason })
      return { tools: toolNames, ingestion, context, delivered: false, stoppedReason }
    }

    const ranking = await this.rank(context)

    let delivered = false
    const { telegram } = this.dependencies
    if (telegram && this.config.telegramChatId) {
      logger.info('📱 Sending ranking to Telegram', { chatId: this.config.telegramChatId })
      delivered = await telegram.sendRanking(this.config.telegramChatId, ranking, topic)
    }

    return { tools: toolNames, ingestion, context, ranking, delivered }
  }

  private async rank(context: string): Promise<string> {
    const { chatModel, sleep } = this.dependencies
    const prompt = await buildRankingPrompt(context)
    logger.info('🤖 Generating ranking', { provider: chatModel.name, model: chatModel.model })

    try {
      return await RetryWrapper.withRetry(() => chatModel.invoke(prompt), {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        isRetryable: (error) => chatModel.isTransientError(error),
        operationName: `${chatModel.name} ranking`,
        sleep,
      })
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new GenerationError(
          `Rate limit or quota exceeded for ${chatModel.name}: ${error.message}`,
          chatModel.name,
          ErrorCode.RETRY_EXHAUSTED,
          error
        )
      }
      throw error
    }
  }
}
