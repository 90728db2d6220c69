/**
 * Paper source types
 */

export interface PaperMetadata {
  sourceId: string
  sourceName: string
  title: string
  publishedDate: string
  url: string
  // Source-specific fields (authors, paperId, arXiv id, categories...)
  extra: Record<string, unknown>
}

export interface RawDocument {
  content: string
  metadata: PaperMetadata
}

/**
 * One adapter per paper source. fetch never rejects: failures are logged and
 * reported as an empty list.
 */
export interface SourceAdapter {
  readonly id: string
  readonly name: string
  readonly maxResults: number
  fetch(query: string, limit: number): Promise<RawDocument[]>
}

export type SourceRegistry = ReadonlyMap<string, SourceAdapter>
