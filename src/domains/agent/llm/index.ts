import type { ServerConfig } from '@/shared/config/config-factory.js'
import type { HttpFetch } from '@/shared/http/client.js'
import { logger } from '@/shared/logger/index.js'
import { GeminiChatModel } from './gemini.js'
import { OllamaChatModel } from './ollama.js'
import { OpenAIChatModel } from './openai.js'
import type { ChatModel } from './types.js'

export type { ChatModel } from './types.js'
export { BaseChatModel } from './base.js'
export { OpenAIChatModel, type OpenAIChatApi } from './openai.js'
export { GeminiChatModel } from './gemini.js'
export { OllamaChatModel } from './ollama.js'

const GENERATION_TIMEOUT_MS = 300000

export class ChatModelFactory {
  static create(config: ServerConfig, httpFetch?: HttpFetch): ChatModel {
    const { agent, embedding } = config
    logger.info(`🤖 Using LLM provider: ${agent.llmProvider}`)

    switch (agent.llmProvider) {
      case 'openai':
        return new OpenAIChatModel({
          apiKey: embedding.openaiApiKey,
          model: agent.openaiModel,
          temperature: agent.temperature,
          timeoutMs: GENERATION_TIMEOUT_MS,
        })
      case 'gemini':
        return new GeminiChatModel(
          {
            apiKey: embedding.googleApiKey,
            model: agent.geminiModel,
            temperature: agent.temperature,
            timeoutMs: GENERATION_TIMEOUT_MS,
          },
          httpFetch
        )
      case 'ollama':
        return new OllamaChatModel(
          {
            baseUrl: embedding.ollamaBaseUrl,
            model: agent.ollamaChatModel,
            temperature: agent.temperature,
            timeoutMs: GENERATION_TIMEOUT_MS,
          },
          httpFetch
        )
    }
  }
}
