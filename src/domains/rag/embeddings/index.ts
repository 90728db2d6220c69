/**
 * Embedding Factory
 * Picks the embedding backend once, from configuration
 */

import type { EmbeddingConfig } from '@/shared/config/config-factory.js'
import type { HttpFetch } from '@/shared/http/client.js'
import { logger } from '@/shared/logger/index.js'
import { GeminiEmbeddings } from './providers/gemini.js'
import { OllamaEmbeddings } from './providers/ollama.js'
import { OpenAIEmbeddings } from './providers/openai.js'
import type { BaseEmbeddingProvider } from './providers/base.js'

export { EmbeddingClient, type EmbeddingClientOptions } from './adapter.js'
export { BaseEmbeddingProvider } from './providers/base.js'
export { GeminiEmbeddings } from './providers/gemini.js'
export { OllamaEmbeddings } from './providers/ollama.js'
export { OpenAIEmbeddings, type OpenAIEmbeddingsApi } from './providers/openai.js'

export class EmbeddingFactory {
  static create(config: EmbeddingConfig, httpFetch?: HttpFetch): BaseEmbeddingProvider {
    logger.info(`🏭 Creating embedding provider: ${config.provider}`)

    switch (config.provider) {
      case 'openai':
        return new OpenAIEmbeddings(config)
      case 'gemini':
        return new GeminiEmbeddings(config, httpFetch)
      case 'ollama':
        return new OllamaEmbeddings(config, httpFetch)
    }
  }
}
