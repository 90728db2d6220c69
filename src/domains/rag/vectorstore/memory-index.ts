/**
 * In-memory vector index
 * Append-only, exact cosine similarity over every stored entry.
 */

import { ErrorCode, VectorStoreError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'
import { calculateStringHash } from '@/shared/utils/crypto.js'
import type { VectorIndex } from '../core/interfaces.js'
import type { EmbeddingVector, IndexEntry, IndexStats, SearchHit } from '../core/types.js'

export interface MemoryIndexOptions {
  deduplicate?: boolean
}

interface StoredEntry extends IndexEntry {
  norm: number
}

function vectorNorm(vector: EmbeddingVector): number {
  let sum = 0
  for (const value of vector) sum += value * value
  return Math.sqrt(sum)
}

export function cosineSimilarity(a: EmbeddingVector, aNorm: number, b: EmbeddingVector, bNorm: number): number {
  if (aNorm === 0 || bNorm === 0) return 0
  let dot = 0
  for (let i = 0; i < a.length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0)
  }
  return dot / (aNorm * bNorm)
}

export class InMemoryVectorIndex implements VectorIndex {
  private entries: StoredEntry[] = []
  private hashes = new Set<string>()
  private dim: number | null = null
  private skippedDuplicates = 0
  private lastUpdated: Date | null = null
  private readonly deduplicate: boolean

  constructor(options: MemoryIndexOptions = {}) {
    this.deduplicate = options.deduplicate ?? true
  }

  /**
   * Append entries in one synchronous step. Either the whole batch passes the
   * dimension check or nothing is stored. Returns the number stored.
   */
  add(entries: readonly IndexEntry[]): number {
    if (entries.length === 0) return 0

    const expected = this.dim ?? entries[0]?.vector.length ?? 0
    for (const entry of entries) {
      if (entry.vector.length === 0 || entry.vector.length !== expected) {
        throw new VectorStoreError(
          `Vector dimension mismatch: expected ${expected}, got ${entry.vector.length}`,
          'add',
          ErrorCode.DIMENSION_MISMATCH,
          { expected, actual: entry.vector.length }
        )
      }
    }

    const accepted: StoredEntry[] = []
    const batchHashes = new Set<string>()
    let skipped = 0
    for (const entry of entries) {
      if (this.deduplicate) {
        const hash = calculateStringHash(entry.fragment.text)
        if (this.hashes.has(hash) || batchHashes.has(hash)) {
          skipped++
          continue
        }
        batchHashes.add(hash)
      }
      accepted.push({ ...entry, norm: vectorNorm(entry.vector) })
    }

    this.dim = expected
    this.entries.push(...accepted)
    for (const hash of batchHashes) this.hashes.add(hash)
    this.skippedDuplicates += skipped
    this.lastUpdated = new Date()

    logger.debug(`📥 Stored ${accepted.length} vectors`, {
      component: 'InMemoryVectorIndex',
      stored: accepted.length,
      skippedDuplicates: skipped,
      size: this.entries.length,
    })
    return accepted.length
  }

  /**
   * Best first, at most min(k, size) hits. Ties keep insertion order.
   */
  query(vector: EmbeddingVector, k: number): SearchHit[] {
    if (k <= 0 || this.entries.length === 0) return []
    if (vector.length !== this.dim) {
      throw new VectorStoreError(
        `Query dimension mismatch: expected ${this.dim}, got ${vector.length}`,
        'query',
        ErrorCode.DIMENSION_MISMATCH,
        { expected: this.dim, actual: vector.length }
      )
    }

    const queryNorm = vectorNorm(vector)
    const hits: SearchHit[] = this.entries.map((entry) => ({
      fragment: entry.fragment,
      score: cosineSimilarity(vector, queryNorm, entry.vector, entry.norm),
    }))

    // Array.prototype.sort is stable: equal scores stay in insertion order
    hits.sort((a, b) => b.score - a.score)
    return hits.slice(0, Math.floor(k))
  }

  isEmpty(): boolean {
    return this.entries.length === 0
  }

  size(): number {
    return this.entries.length
  }

  dimension(): number | null {
    return this.dim
  }

  getStats(): IndexStats {
    const sources: Record<string, number> = {}
    for (const entry of this.entries) {
      const sourceId = entry.fragment.metadata.sourceId || 'unknown'
      sources[sourceId] = (sources[sourceId] ?? 0) + 1
    }

    return {
      size: this.entries.length,
      dimension: this.dim,
      skippedDuplicates: this.skippedDuplicates,
      deduplicate: this.deduplicate,
      sources,
      lastUpdated: this.lastUpdated ? this.lastUpdated.toISOString() : null,
    }
  }
}
