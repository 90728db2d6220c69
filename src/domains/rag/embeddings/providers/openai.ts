import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  RateLimitError,
} from 'openai'
import type { EmbeddingConfig } from '@/shared/config/config-factory.js'
import { EmbeddingError, ErrorCode } from '@/shared/errors/index.js'
import { statusToErrorCode } from '@/shared/http/client.js'
import type { EmbeddingVector } from '../../core/types.js'
import { BaseEmbeddingProvider } from './base.js'

/**
 * The part of the OpenAI SDK this provider calls
 */
export interface OpenAIEmbeddingsApi {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>
    }>
  }
}

export class OpenAIEmbeddings extends BaseEmbeddingProvider {
  readonly name = 'openai'
  readonly model: string
  private client: OpenAIEmbeddingsApi

  constructor(config: EmbeddingConfig, client?: OpenAIEmbeddingsApi) {
    super()
    this.model = config.openaiModel
    if (client) {
      this.client = client
    } else {
      if (!config.openaiApiKey) {
        throw new EmbeddingError('OPENAI_API_KEY is required for OpenAI embeddings', this.name, ErrorCode.CONFIG_ERROR)
      }
      this.client = new OpenAI({
        apiKey: config.openaiApiKey,
        timeout: config.requestTimeoutMs,
        maxRetries: 0,
      })
    }
  }

  async embedQuery(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embedDocuments([text])
    if (!vector) {
      throw new EmbeddingError('No embedding data received from OpenAI', this.name, ErrorCode.EMBEDDING_ERROR)
    }
    return vector
  }

  async embedDocuments(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return []

    let response: Awaited<ReturnType<OpenAIEmbeddingsApi['embeddings']['create']>>
    try {
      response = await this.client.embeddings.create({ model: this.model, input: texts })
    } catch (error) {
      throw this.toEmbeddingError(error, 'embedding request')
    }

    const vectors = [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding)
    const first = vectors[0]
    if (first) this.rememberDimensions(first)
    return vectors
  }

  protected override classify(error: unknown): ErrorCode {
    if (error instanceof RateLimitError) {
      return error.code === 'insufficient_quota' ? ErrorCode.QUOTA_EXCEEDED : ErrorCode.RATE_LIMIT_ERROR
    }
    if (error instanceof APIConnectionTimeoutError) return ErrorCode.TIMEOUT_ERROR
    if (error instanceof APIConnectionError) return ErrorCode.CONNECTION_ERROR
    if (error instanceof APIError && error.status !== undefined) {
      return statusToErrorCode(error.status)
    }
    return super.classify(error)
  }
}
