import { z } from 'zod'
import type { EmbeddingConfig } from '@/shared/config/config-factory.js'
import { EmbeddingError, ErrorCode } from '@/shared/errors/index.js'
import { defaultFetch, requestJson, type HttpFetch } from '@/shared/http/client.js'
import type { EmbeddingVector } from '../../core/types.js'
import { BaseEmbeddingProvider } from './base.js'

const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta'

const ValuesSchema = z.object({ values: z.array(z.number()) })
const EmbedContentResponseSchema = z.object({ embedding: ValuesSchema })
const BatchEmbedContentsResponseSchema = z.object({ embeddings: z.array(ValuesSchema) })

/**
 * Google Generative Language embeddings over REST
 */
export class GeminiEmbeddings extends BaseEmbeddingProvider {
  readonly name = 'gemini'
  readonly model: string
  private apiKey: string

  constructor(
    private config: EmbeddingConfig,
    private httpFetch: HttpFetch = defaultFetch
  ) {
    super()
    if (!config.googleApiKey) {
      throw new EmbeddingError('GOOGLE_API_KEY is required for Gemini embeddings', 'gemini', ErrorCode.CONFIG_ERROR)
    }
    this.apiKey = config.googleApiKey
    this.model = config.geminiModel.startsWith('models/') ? config.geminiModel : `models/${config.geminiModel}`
  }

  async embedQuery(text: string): Promise<EmbeddingVector> {
    const payload = await this.call('embedContent', {
      model: this.model,
      content: { parts: [{ text }] },
      taskType: 'RETRIEVAL_QUERY',
    })
    const parsed = EmbedContentResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new EmbeddingError('Invalid embedding data received from Gemini', this.name, ErrorCode.EMBEDDING_ERROR, parsed.error)
    }
    this.rememberDimensions(parsed.data.embedding.values)
    return parsed.data.embedding.values
  }

  async embedDocuments(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return []

    const payload = await this.call('batchEmbedContents', {
      requests: texts.map((text) => ({
        model: this.model,
        content: { parts: [{ text }] },
        taskType: 'RETRIEVAL_DOCUMENT',
      })),
    })
    const parsed = BatchEmbedContentsResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new EmbeddingError('Invalid embedding data received from Gemini', this.name, ErrorCode.EMBEDDING_ERROR, parsed.error)
    }

    const vectors = parsed.data.embeddings.map((embedding) => embedding.values)
    const first = vectors[0]
    if (first) this.rememberDimensions(first)
    return vectors
  }

  private async call(method: 'embedContent' | 'batchEmbedContents', body: unknown): Promise<unknown> {
    try {
      return await requestJson(this.httpFetch, `${GEMINI_API_BASE}/${this.model}:${method}`, {
        body,
        headers: { 'x-goog-api-key': this.apiKey },
        timeout: this.config.requestTimeoutMs,
      })
    } catch (error) {
      throw this.toEmbeddingError(error, method)
    }
  }
}
