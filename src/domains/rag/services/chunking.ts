/**
 * Fragment splitter
 * Fixed character windows by default; LangChain's RecursiveCharacterTextSplitter
 * when boundary-aware splitting is configured.
 */

import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters'
import type { ChunkingStrategy } from '@/shared/config/config-factory.js'
import { ErrorCode, StructuredError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'
import type { Fragment, RawDocument } from '../core/types.js'

export interface ChunkingOptions {
  chunkSize: number
  chunkOverlap: number
  strategy?: ChunkingStrategy
}

export function validateChunkingOptions(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new StructuredError(`Chunk size must be a positive integer, got ${chunkSize}`, ErrorCode.VALIDATION_ERROR, 'MEDIUM', {
      chunkSize,
    })
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new StructuredError(
      `Chunk overlap must satisfy 0 <= overlap < chunk size, got ${chunkOverlap} for size ${chunkSize}`,
      ErrorCode.VALIDATION_ERROR,
      'MEDIUM',
      { chunkSize, chunkOverlap }
    )
  }
}

/**
 * Windows [start, start + size) advancing by size - overlap, stopping at the
 * first window that reaches the end of the text.
 */
export function splitFixed(text: string, chunkSize: number, chunkOverlap: number): string[] {
  validateChunkingOptions(chunkSize, chunkOverlap)
  if (text.length === 0) return []

  const step = chunkSize - chunkOverlap
  const windows: string[] = []
  for (let start = 0; ; start += step) {
    const end = Math.min(start + chunkSize, text.length)
    windows.push(text.slice(start, end))
    if (end >= text.length) break
  }
  return windows
}

export class ChunkingService {
  private readonly chunkSize: number
  private readonly chunkOverlap: number
  private readonly strategy: ChunkingStrategy
  private recursiveSplitter?: RecursiveCharacterTextSplitter

  constructor(options: ChunkingOptions) {
    validateChunkingOptions(options.chunkSize, options.chunkOverlap)
    this.chunkSize = options.chunkSize
    this.chunkOverlap = options.chunkOverlap
    this.strategy = options.strategy ?? 'fixed'

    if (this.strategy === 'recursive') {
      this.recursiveSplitter = new RecursiveCharacterTextSplitter({
        chunkSize: this.chunkSize,
        chunkOverlap: this.chunkOverlap,
        separators: ['\n\n', '\n', '. ', '? ', '! ', '; ', ', ', ' ', ''],
      })
    }
  }

  async splitText(text: string): Promise<string[]> {
    if (text.length === 0) return []
    if (this.recursiveSplitter) {
      return this.recursiveSplitter.splitText(text)
    }
    return splitFixed(text, this.chunkSize, this.chunkOverlap)
  }

  /**
   * Split documents in order; each fragment inherits its parent's metadata
   */
  async split(docs: readonly RawDocument[]): Promise<Fragment[]> {
    const fragments: Fragment[] = []

    for (const doc of docs) {
      const pieces = await this.splitText(doc.content)
      pieces.forEach((text, fragmentIndex) => {
        fragments.push({
          text,
          metadata: { ...doc.metadata, extra: { ...doc.metadata.extra }, fragmentIndex },
        })
      })
    }

    logger.debug(`✂️ Split ${docs.length} documents into ${fragments.length} fragments`, {
      strategy: this.strategy,
      chunkSize: this.chunkSize,
      chunkOverlap: this.chunkOverlap,
    })
    return fragments
  }
}

/**
 * One-shot form: split(docs, chunkSize, overlap)
 */
export function splitDocuments(
  docs: readonly RawDocument[],
  chunkSize: number,
  chunkOverlap: number,
  strategy: ChunkingStrategy = 'fixed'
): Promise<Fragment[]> {
  return new ChunkingService({ chunkSize, chunkOverlap, strategy }).split(docs)
}
