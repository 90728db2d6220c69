import { Embeddings } from '@langchain/core/embeddings'
import { EmbeddingError, ErrorCode, ErrorUtils, StructuredError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'
import type { EmbeddingProvider } from '../../core/interfaces.js'
import type { EmbeddingVector, ModelInfo } from '../../core/types.js'

const TRANSIENT_EMBEDDING_CODES: readonly ErrorCode[] = [
  ErrorCode.RATE_LIMIT_ERROR,
  ErrorCode.QUOTA_EXCEEDED,
  ErrorCode.CONNECTION_ERROR,
  ErrorCode.TIMEOUT_ERROR,
  ErrorCode.SERVICE_UNAVAILABLE,
]

/**
 * LangChain-compatible embeddings with the failure classification the
 * embedding client needs. Retries live in the client, so the LangChain
 * caller is configured not to retry on its own.
 */
export abstract class BaseEmbeddingProvider extends Embeddings implements EmbeddingProvider {
  abstract readonly name: string
  abstract readonly model: string
  protected cachedDimensions: number | null = null

  constructor() {
    super({ maxRetries: 0 })
  }

  isTransientError(error: unknown): boolean {
    if (error instanceof StructuredError) {
      return TRANSIENT_EMBEDDING_CODES.includes(error.code)
    }
    return ErrorUtils.isRetryable(error)
  }

  getModelInfo(): ModelInfo {
    return {
      name: this.model,
      service: this.name,
      model: this.model,
      dimensions: this.cachedDimensions,
    }
  }

  protected rememberDimensions(vector: EmbeddingVector): void {
    if (this.cachedDimensions === null && vector.length > 0) {
      this.cachedDimensions = vector.length
      logger.info(`📊 ${this.name} embedding dimensions detected: ${this.cachedDimensions}`, {
        provider: this.name,
        model: this.model,
      })
    }
  }

  /**
   * Wrap any failure into an EmbeddingError that keeps the transient/fatal code
   */
  protected toEmbeddingError(error: unknown, action: string): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error
    }
    const code = error instanceof StructuredError ? error.code : this.classify(error)
    return new EmbeddingError(
      `${this.name} ${action} failed: ${ErrorUtils.describe(error)}`,
      this.name,
      code,
      error,
      { model: this.model }
    )
  }

  protected classify(error: unknown): ErrorCode {
    if (ErrorUtils.isRateLimit(error)) return ErrorCode.RATE_LIMIT_ERROR
    if (ErrorUtils.isRetryable(error)) return ErrorCode.CONNECTION_ERROR
    return ErrorCode.EMBEDDING_ERROR
  }
}
