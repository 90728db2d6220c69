/**
 * Embedding client
 * Runs an EmbeddingProvider in batches through the retry wrapper and checks
 * the shape of what comes back.
 */

import type { EmbeddingConfig } from '@/shared/config/config-factory.js'
import { EmbeddingError, ErrorCode, ErrorUtils, RetryExhaustedError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'
import { RetryWrapper, type Sleep } from '@/shared/utils/resilience.js'
import type { EmbeddingProvider } from '../core/interfaces.js'
import type { EmbeddingVector, ModelInfo } from '../core/types.js'

export interface EmbeddingClientOptions {
  maxAttempts: number
  retryBaseDelayMs: number
  batchSize: number
  sleep?: Sleep
}

export class EmbeddingClient {
  private readonly options: EmbeddingClientOptions

  constructor(
    private provider: EmbeddingProvider,
    options: EmbeddingClientOptions | Pick<EmbeddingConfig, 'maxAttempts' | 'retryBaseDelayMs' | 'batchSize'>
  ) {
    this.options = { ...options, batchSize: Math.max(1, options.batchSize) }
  }

  get providerName(): string {
    return this.provider.name
  }

  getModelInfo(): ModelInfo {
    return this.provider.getModelInfo()
  }

  /**
   * One vector per text, in input order
   */
  async embed(texts: readonly string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return []

    const { batchSize } = this.options
    const vectors: EmbeddingVector[] = []
    const batchCount = Math.ceil(texts.length / batchSize)

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize)
      const batchNumber = i / batchSize + 1
      const result = await this.withRetry(() => this.provider.embedDocuments(batch), `embed batch ${batchNumber}/${batchCount}`)
      this.validate(result, batch.length)
      vectors.push(...result)
    }

    this.assertSingleDimension(vectors)
    return vectors
  }

  async embedOne(text: string): Promise<EmbeddingVector> {
    const vector = await this.withRetry(() => this.provider.embedQuery(text), 'embed query')
    this.validate([vector], 1)
    return vector
  }

  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    try {
      return await RetryWrapper.withRetry(operation, {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.retryBaseDelayMs,
        isRetryable: (error) => this.provider.isTransientError(error),
        operationName: `${this.provider.name} ${operationName}`,
        sleep: this.options.sleep,
      })
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        logger.error('Embedding retries exhausted', error, { provider: this.provider.name, attempts: error.attempts })
        throw new EmbeddingError(
          `${this.provider.name} embeddings failed after ${error.attempts} attempts: ${ErrorUtils.describe(error.lastError)}`,
          this.provider.name,
          ErrorCode.RETRY_EXHAUSTED,
          error,
          { attempts: error.attempts }
        )
      }
      throw error
    }
  }

  private validate(vectors: EmbeddingVector[], expected: number): void {
    if (vectors.length !== expected) {
      throw new EmbeddingError(
        `${this.provider.name} returned ${vectors.length} embeddings for ${expected} texts`,
        this.provider.name,
        ErrorCode.EMBEDDING_ERROR
      )
    }
    if (vectors.some((vector) => vector.length === 0)) {
      throw new EmbeddingError(`${this.provider.name} returned an empty embedding`, this.provider.name, ErrorCode.EMBEDDING_ERROR)
    }
  }

  private assertSingleDimension(vectors: EmbeddingVector[]): void {
    const dimension = vectors[0]?.length
    const mismatch = vectors.find((vector) => vector.length !== dimension)
    if (mismatch) {
      throw new EmbeddingError(
        `${this.provider.name} returned embeddings of different dimensions (${dimension} and ${mismatch.length})`,
        this.provider.name,
        ErrorCode.DIMENSION_MISMATCH
      )
    }
  }
}
