/**
 * RAG Core Interfaces
 */

import type { EmbeddingVector, IndexEntry, IndexStats, ModelInfo, SearchHit } from './types.js'

/**
 * Embedding capability. Providers tell transient failures (worth a retry)
 * from fatal ones.
 */
export interface EmbeddingProvider {
  readonly name: string
  readonly model: string
  embedDocuments(texts: string[]): Promise<EmbeddingVector[]>
  embedQuery(text: string): Promise<EmbeddingVector>
  isTransientError(error: unknown): boolean
  getModelInfo(): ModelInfo
}

/**
 * Append-only similarity index
 */
export interface VectorIndex {
  add(entries: IndexEntry[]): number
  query(vector: EmbeddingVector, k: number): SearchHit[]
  isEmpty(): boolean
  size(): number
  dimension(): number | null
  getStats(): IndexStats
}
