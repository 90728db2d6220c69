import type { PaperMetadata, RawDocument } from '../core/types.js'

function displaySourceName(metadata: PaperMetadata): string {
  if (metadata.sourceName) return metadata.sourceName
  if (metadata.sourceId) return metadata.sourceId.toUpperCase()
  return 'UNKNOWN'
}

/**
 * Prefix each document with its provenance so that every fragment cut from
 * it still names source, title, date and link.
 */
export function enrichDocument(doc: RawDocument): RawDocument {
  const { metadata } = doc
  const content = [
    `SOURCE: ${displaySourceName(metadata)}`,
    `TITLE: ${metadata.title}`,
    `DATE: ${metadata.publishedDate}`,
    `LINK: ${metadata.url}`,
    `SUMMARY: ${doc.content}`,
  ].join('\n')

  return {
    content,
    metadata: { ...metadata, extra: { ...metadata.extra } },
  }
}

export function enrichDocuments(docs: readonly RawDocument[]): RawDocument[] {
  return docs.map(enrichDocument)
}
