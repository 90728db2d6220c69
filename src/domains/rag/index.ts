/**
 * RAG Domain - Main Export
 */

import { SourceAggregator, createSourceRegistry } from '@/domains/sources/index.js'
import type { ServerConfig } from '@/shared/config/config-factory.js'
import type { HttpFetch } from '@/shared/http/client.js'
import type { EmbeddingProvider, VectorIndex } from './core/interfaces.js'
import { EmbeddingClient } from './embeddings/adapter.js'
import { EmbeddingFactory } from './embeddings/index.js'
import { RAGService } from './rag-service.js'
import { ChunkingService } from './services/chunking.js'
import { InMemoryVectorIndex } from './vectorstore/memory-index.js'

export {
  RAGService,
  EMPTY_KNOWLEDGE_BASE_MESSAGE,
  perSourceLimit,
  type RagInfo,
  type RAGServiceDependencies,
  type RAGServiceOptions,
} from './rag-service.js'
export { ChunkingService, splitDocuments, splitFixed } from './services/chunking.js'
export { enrichDocument, enrichDocuments } from './services/enricher.js'
export { InMemoryVectorIndex } from './vectorstore/memory-index.js'
export { EmbeddingClient } from './embeddings/adapter.js'
export { EmbeddingFactory } from './embeddings/index.js'

export type * from './core/types.js'
export type * from './core/interfaces.js'

export interface RAGServiceOverrides {
  httpFetch?: HttpFetch
  embeddingProvider?: EmbeddingProvider
  index?: VectorIndex
}

/**
 * Wire the pipeline from configuration. The index is created here, once per
 * process, unless the caller brings its own.
 */
export function createRAGService(config: ServerConfig, overrides: RAGServiceOverrides = {}): RAGService {
  const registry = createSourceRegistry(config.sources, overrides.httpFetch)
  const provider = overrides.embeddingProvider ?? EmbeddingFactory.create(config.embedding, overrides.httpFetch)

  return new RAGService(
    {
      aggregator: new SourceAggregator(registry, config.sources),
      chunker: new ChunkingService({
        chunkSize: config.chunkSize,
        chunkOverlap: config.chunkOverlap,
        strategy: config.chunkingStrategy,
      }),
      embeddings: new EmbeddingClient(provider, config.embedding),
      index: overrides.index ?? new InMemoryVectorIndex({ deduplicate: config.deduplicateFragments }),
    },
    {
      similarityTopK: config.similarityTopK,
      defaultMaxPapers: config.defaultMaxPapers,
      defaultSources: config.defaultSources,
    }
  )
}
