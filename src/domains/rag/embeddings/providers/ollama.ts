import { z } from 'zod'
import type { EmbeddingConfig } from '@/shared/config/config-factory.js'
import { EmbeddingError, ErrorCode } from '@/shared/errors/index.js'
import { defaultFetch, requestJson, type HttpFetch } from '@/shared/http/client.js'
import { logger } from '@/shared/logger/index.js'
import type { EmbeddingVector } from '../../core/types.js'
import { BaseEmbeddingProvider } from './base.js'

const EmbedResponseSchema = z.object({ embeddings: z.array(z.array(z.number())) })

/**
 * LangChain-compatible embeddings served by a local Ollama instance
 */
export class OllamaEmbeddings extends BaseEmbeddingProvider {
  readonly name = 'ollama'
  readonly model: string
  private baseUrl: string

  constructor(
    private config: EmbeddingConfig,
    private httpFetch: HttpFetch = defaultFetch
  ) {
    super()
    this.baseUrl = config.ollamaBaseUrl.replace(/\/+$/, '')
    this.model = config.ollamaModel
  }

  async embedQuery(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embedDocuments([text])
    if (!vector) {
      throw new EmbeddingError('No embedding data received from Ollama', this.name, ErrorCode.EMBEDDING_ERROR)
    }
    return vector
  }

  async embedDocuments(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return []

    let payload: unknown
    try {
      payload = await requestJson(this.httpFetch, `${this.baseUrl}/api/embed`, {
        body: { model: this.model, input: texts, keep_alive: '1m' },
        timeout: this.config.requestTimeoutMs,
      })
    } catch (error) {
      throw this.toEmbeddingError(error, 'embed request')
    }

    const parsed = EmbedResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new EmbeddingError('Invalid embedding data received from Ollama', this.name, ErrorCode.EMBEDDING_ERROR, parsed.error)
    }

    const first = parsed.data.embeddings[0]
    if (first) this.rememberDimensions(first)
    logger.debug(`Generated ${parsed.data.embeddings.length} Ollama embeddings`, { model: this.model })
    return parsed.data.embeddings
  }
}
