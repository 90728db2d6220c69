import type { PaperMetadata } from '@/domains/sources/core/types.js'

export type { PaperMetadata, RawDocument } from '@/domains/sources/core/types.js'

export type EmbeddingVector = number[]

export interface FragmentMetadata extends PaperMetadata {
  fragmentIndex: number
}

export interface Fragment {
  text: string
  metadata: FragmentMetadata
}

export interface IndexEntry {
  vector: EmbeddingVector
  fragment: Fragment
}

export interface SearchHit {
  fragment: Fragment
  score: number
}

export type IngestionStatus = 'success' | 'nothing_found' | 'failed'

export interface IngestionReport {
  status: IngestionStatus
  message: string
  documentCount: number
  fragmentCount: number
  addedCount: number
}

export interface ModelInfo {
  name: string
  service: string
  model: string
  dimensions: number | null
}

export interface IndexStats {
  size: number
  dimension: number | null
  skippedDuplicates: number
  deduplicate: boolean
  sources: Record<string, number>
  lastUpdated: string | null
}
