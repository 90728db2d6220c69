import { XMLParser } from 'fast-xml-parser'
import { z } from 'zod'
import type { SourcesConfig } from '@/shared/config/config-factory.js'
import { ErrorCode, ErrorUtils, SourceError } from '@/shared/errors/index.js'
import {
  buildUrl,
  defaultFetch,
  fetchFailureCode,
  statusToErrorCode,
  type HttpFetch,
} from '@/shared/http/client.js'
import { logger } from '@/shared/logger/index.js'
import type { RawDocument, SourceAdapter } from '../core/types.js'
import { extractPdfText, type PdfTextExtractor } from '../services/pdf-reader.js'

const ARXIV_MAX_RESULTS = 100

const ArxivLinkSchema = z.object({
  '@_href': z.string(),
  '@_type': z.string().optional(),
  '@_title': z.string().optional(),
})

const ArxivEntrySchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  summary: z.string().default(''),
  published: z.string().default(''),
  author: z.array(z.object({ name: z.string() })).default([]),
  link: z.array(ArxivLinkSchema).default([]),
  'arxiv:primary_category': z.object({ '@_term': z.string() }).optional(),
})

const ArxivFeedSchema = z.object({
  feed: z.object({
    entry: z.array(z.unknown()).default([]),
  }),
})

type ArxivEntry = z.infer<typeof ArxivEntrySchema>

const ARRAY_TAGS = new Set(['entry', 'author', 'link', 'category'])

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

function toIsoDate(published: string): string {
  const match = /^\d{4}-\d{2}-\d{2}/.exec(published.trim())
  return match ? match[0] : ''
}

/**
 * arXiv Atom API adapter, newest submissions first. With full text enabled,
 * each paper's PDF replaces the abstract; the abstract stays whenever the PDF
 * cannot be downloaded or read.
 */
export class ArxivAdapter implements SourceAdapter {
  readonly id = 'arxiv'
  readonly name = 'ArXiv'
  readonly maxResults = ARXIV_MAX_RESULTS

  private parser = new XMLParser({
    ignoreAttributes: false,
    parseTagValue: false,
    isArray: (tagName) => ARRAY_TAGS.has(tagName),
  })

  constructor(
    private config: SourcesConfig,
    private httpFetch: HttpFetch = defaultFetch,
    private readPdf: PdfTextExtractor = extractPdfText
  ) {}

  async fetch(query: string, limit: number): Promise<RawDocument[]> {
    const maxResults = Math.min(Math.floor(limit), this.maxResults)
    if (maxResults < 1 || !query.trim()) {
      return []
    }

    try {
      const documents = await this.search(query.trim(), maxResults)
      logger.info(`📚 arXiv returned ${documents.length} papers`, {
        sourceId: this.id,
        query,
        limit: maxResults,
      })
      return documents
    } catch (error) {
      logger.warn('arXiv source unavailable, continuing without it', {
        sourceId: this.id,
        query,
        error: ErrorUtils.describe(error),
      })
      return []
    }
  }

  private async search(query: string, maxResults: number): Promise<RawDocument[]> {
    const url = buildUrl(this.config.arxivBaseUrl, 'api/query', {
      search_query: `all:${query}`,
      start: 0,
      max_results: maxResults,
      sortBy: 'submittedDate',
      sortOrder: 'descending',
    })

    let xml: string
    try {
      const response = await this.httpFetch(url, { timeout: this.config.requestTimeoutMs })
      if (!response.ok) {
        throw new SourceError(
          `arXiv API error: ${response.status} ${response.statusText}`,
          this.id,
          statusToErrorCode(response.status)
        )
      }
      xml = await response.text()
    } catch (error) {
      if (error instanceof SourceError) throw error
      throw new SourceError('arXiv request failed', this.id, fetchFailureCode(error), error)
    }

    const documents = this.parseFeed(xml).slice(0, maxResults)
    if (!this.config.arxivFullText) {
      return documents
    }

    const withText: RawDocument[] = []
    for (const document of documents) {
      withText.push(await this.withFullText(document))
    }
    return withText
  }

  private async withFullText(document: RawDocument): Promise<RawDocument> {
    const pdfUrl = document.metadata.extra['pdfUrl']
    if (typeof pdfUrl !== 'string') {
      return document
    }

    try {
      const response = await this.httpFetch(pdfUrl, { timeout: this.config.pdfTimeoutMs })
      if (!response.ok) {
        throw new SourceError(
          `arXiv PDF download failed: ${response.status} ${response.statusText}`,
          this.id,
          statusToErrorCode(response.status)
        )
      }

      const text = normalizeWhitespace(await this.readPdf(new Uint8Array(await response.arrayBuffer())))
      if (!text) {
        throw new SourceError('arXiv PDF has no extractable text', this.id, ErrorCode.SOURCE_PARSE_ERROR)
      }

      const maxChars = this.config.arxivFullTextMaxChars
      return {
        content: maxChars > 0 ? text.slice(0, maxChars) : text,
        metadata: { ...document.metadata, extra: { ...document.metadata.extra, fullText: true } },
      }
    } catch (error) {
      logger.warn('Keeping the arXiv abstract, full text unavailable', {
        sourceId: this.id,
        pdfUrl,
        error: ErrorUtils.describe(error),
      })
      return document
    }
  }

  /**
   * Atom feed → documents. Entries that do not fit the expected shape are skipped.
   */
  parseFeed(xml: string): RawDocument[] {
    const feed = ArxivFeedSchema.safeParse(this.parser.parse(xml))
    if (!feed.success) {
      throw new SourceError('Unexpected arXiv response format', this.id, ErrorCode.SOURCE_PARSE_ERROR, feed.error)
    }

    const documents: RawDocument[] = []
    for (const raw of feed.data.feed.entry) {
      const entry = ArxivEntrySchema.safeParse(raw)
      if (!entry.success) {
        logger.debug('Skipping malformed arXiv entry', { sourceId: this.id, issues: entry.error.issues.length })
        continue
      }
      documents.push(this.toDocument(entry.data))
    }
    return documents
  }

  private toDocument(entry: ArxivEntry): RawDocument {
    const url = entry.id.trim()
    const pdfLink = entry.link.find((link) => link['@_type'] === 'application/pdf' || link['@_title'] === 'pdf')

    return {
      content: normalizeWhitespace(entry.summary),
      metadata: {
        sourceId: this.id,
        sourceName: this.name,
        title: normalizeWhitespace(entry.title),
        publishedDate: toIsoDate(entry.published),
        url,
        extra: {
          arxivId: url.split('/abs/').pop() ?? url,
          authors: entry.author.map((author) => normalizeWhitespace(author.name)),
          pdfUrl: pdfLink?.['@_href'],
          primaryCategory: entry['arxiv:primary_category']?.['@_term'],
        },
      },
    }
  }
}
