/**
 * RAG Service - Retrieval facade
 * Ingests papers into the vector index and answers questions from it. Neither
 * operation throws: every outcome is reported as text for the calling agent.
 */

import type { SourceAggregator } from '@/domains/sources/aggregator.js'
import { parseSourceList } from '@/domains/sources/aggregator.js'
import { EmbeddingError, ErrorCode, ErrorUtils, RetryExhaustedError } from '@/shared/errors/index.js'
import { logger, type ErrorMetric } from '@/shared/logger/index.js'
import type { VectorIndex } from './core/interfaces.js'
import type { IndexEntry, IndexStats, IngestionReport, ModelInfo } from './core/types.js'
import type { EmbeddingClient } from './embeddings/adapter.js'
import { enrichDocuments } from './services/enricher.js'
import type { ChunkingService } from './services/chunking.js'

export const EMPTY_KNOWLEDGE_BASE_MESSAGE = "The knowledge base is empty. Use 'update_knowledge_base' first."
export const DEFAULT_SOURCES = 'arxiv,semantic_scholar'
export const DEFAULT_MAX_PAPERS = 10

export interface RAGServiceDependencies {
  aggregator: SourceAggregator
  chunker: ChunkingService
  embeddings: EmbeddingClient
  index: VectorIndex
}

export interface RAGServiceOptions {
  similarityTopK: number
  defaultMaxPapers?: number
  defaultSources?: string
}

/**
 * RAG information for external consumers
 */
export interface RagInfo {
  index: IndexStats
  embedding: ModelInfo
  ingestions: {
    total: number
    succeeded: number
    lastReport: IngestionReport | null
  }
  queries: number
  errors: ErrorMetric[]
}

/**
 * Per-source result bound for one ingestion request
 */
export function perSourceLimit(maxPapers: number, sourceCount: number): number {
  return Math.max(1, Math.floor(maxPapers / Math.max(1, sourceCount)))
}

function lastCause(error: unknown): unknown {
  if (error instanceof EmbeddingError && error.cause instanceof RetryExhaustedError) {
    return error.cause.lastError
  }
  if (error instanceof RetryExhaustedError) {
    return error.lastError
  }
  return error
}

export class RAGService {
  private readonly aggregator: SourceAggregator
  private readonly chunker: ChunkingService
  private readonly embeddings: EmbeddingClient
  private readonly index: VectorIndex
  private readonly options: Required<RAGServiceOptions>

  private ingestionCount = 0
  private successfulIngestions = 0
  private queryCount = 0
  private lastReport: IngestionReport | null = null

  constructor(dependencies: RAGServiceDependencies, options: RAGServiceOptions) {
    this.aggregator = dependencies.aggregator
    this.chunker = dependencies.chunker
    this.embeddings = dependencies.embeddings
    this.index = dependencies.index
    this.options = {
      similarityTopK: options.similarityTopK,
      defaultMaxPapers: options.defaultMaxPapers ?? DEFAULT_MAX_PAPERS,
      defaultSources: options.defaultSources ?? DEFAULT_SOURCES,
    }
  }

  /**
   * Fetch papers about a topic, fragment and embed them, and append them to the
   * index. The index only changes when every step succeeded.
   */
  async updateKnowledgeBase(topic: string, maxPapers?: number, sources?: string): Promise<IngestionReport> {
    const limit = maxPapers ?? this.options.defaultMaxPapers
    const sourceSpec = sources ?? this.options.defaultSources
    const endTiming = logger.startTiming('update_knowledge_base', { component: 'RAGService', topic })
    this.ingestionCount++

    const report = await this.ingest(topic, limit, sourceSpec)
    this.lastReport = report
    if (report.status === 'success') this.successfulIngestions++

    endTiming()
    logger.event('knowledge_base_updated', { ...report, topic, sources: sourceSpec })
    return report
  }

  private async ingest(topic: string, maxPapers: number, sources: string): Promise<IngestionReport> {
    const counts = { documentCount: 0, fragmentCount: 0, addedCount: 0 }

    try {
      if (!topic.trim()) {
        return { status: 'failed', message: 'Error processing papers: topic is required', ...counts }
      }

      const sourceIds = parseSourceList(sources)
      const limit = perSourceLimit(maxPapers, sourceIds.length)
      logger.info(`📥 Updating knowledge base for '${topic}'`, { sources: sourceIds, maxPapers, perSourceLimit: limit })

      const documents = await this.aggregator.aggregate(topic, sourceIds, limit)
      counts.documentCount = documents.length
      if (documents.length === 0) {
        return {
          status: 'nothing_found',
          message: `No papers found in the sources ${sources} for this topic.`,
          ...counts,
        }
      }

      const fragments = await this.chunker.split(enrichDocuments(documents))
      counts.fragmentCount = fragments.length

      const vectors = await this.embeddings.embed(fragments.map((fragment) => fragment.text))
      const entries: IndexEntry[] = []
      fragments.forEach((fragment, i) => {
        const vector = vectors[i]
        if (vector) entries.push({ vector, fragment })
      })

      counts.addedCount = this.index.add(entries)
      logger.info(`✅ Indexed ${documents.length} papers`, { ...counts, indexSize: this.index.size() })

      return {
        status: 'success',
        message: `Success! ${documents.length} papers were indexed in the RAG.`,
        ...counts,
      }
    } catch (error) {
      return { status: 'failed', message: this.describeIngestionFailure(error), ...counts }
    }
  }

  private describeIngestionFailure(error: unknown): string {
    const provider = this.embeddings.providerName

    if (error instanceof EmbeddingError) {
      if (error.code === ErrorCode.RETRY_EXHAUSTED) {
        logger.error('Embedding provider kept failing', error, { provider })
        return `Error: Rate limit or quota exceeded for ${provider}. Details: ${ErrorUtils.describe(lastCause(error))}`
      }
      logger.error('Embedding creation failed', error, { provider })
      return `Error creating embeddings: ${error.message}`
    }

    logger.error('Knowledge base update failed', error, { component: 'RAGService' })
    return `Error processing papers: ${ErrorUtils.describe(error)}`
  }

  /**
   * Top-k fragments for a question, concatenated best first
   */
  async queryRag(question: string): Promise<string> {
    this.queryCount++

    if (this.index.isEmpty()) {
      return EMPTY_KNOWLEDGE_BASE_MESSAGE
    }

    try {
      if (!question.trim()) {
        return 'Error querying RAG: question is required'
      }

      const endTiming = logger.startTiming('query_rag', { component: 'RAGService', query: question })
      const vector = await this.embeddings.embedOne(question)
      const hits = this.index.query(vector, this.options.similarityTopK)
      endTiming()

      logger.debug(`🔍 Retrieved ${hits.length} fragments`, {
        scores: hits.map((hit) => Number(hit.score.toFixed(4))),
      })
      return hits.map((hit) => `\n---\n${hit.fragment.text}\n`).join('')
    } catch (error) {
      logger.error('RAG query failed', error, { component: 'RAGService', query: question })
      return `Error querying RAG: ${ErrorUtils.describe(error)}`
    }
  }

  getKnowledgeBaseInfo(): RagInfo {
    return {
      index: this.index.getStats(),
      embedding: this.embeddings.getModelInfo(),
      ingestions: {
        total: this.ingestionCount,
        succeeded: this.successfulIngestions,
        lastReport: this.lastReport,
      },
      queries: this.queryCount,
      errors: logger.getErrorMetrics(),
    }
  }
}
