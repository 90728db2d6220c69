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

const SEMANTIC_SCHOLAR_MAX_RESULTS = 100
const SEARCH_FIELDS = 'title,authors,year,abstract,url,paperId'
const PAPER_PAGE_BASE = 'https://www.semanticscholar.org/paper/'

const SemanticScholarPaperSchema = z.object({
  paperId: z.string().nullish(),
  title: z.string().nullish(),
  abstract: z.string().nullish(),
  year: z.number().int().nullish(),
  url: z.string().nullish(),
  authors: z.array(z.object({ name: z.string().nullish() })).nullish(),
})

const SemanticScholarResponseSchema = z.object({
  total: z.number().optional(),
  data: z.array(SemanticScholarPaperSchema).nullish(),
})

type SemanticScholarPaper = z.infer<typeof SemanticScholarPaperSchema>

/**
 * Semantic Scholar Graph API adapter
 */
export class SemanticScholarAdapter implements SourceAdapter {
  readonly id = 'semantic_scholar'
  readonly name = 'Semantic Scholar'
  readonly maxResults = SEMANTIC_SCHOLAR_MAX_RESULTS

  constructor(
    private config: SourcesConfig,
    private httpFetch: HttpFetch = defaultFetch
  ) {}

  async fetch(query: string, limit: number): Promise<RawDocument[]> {
    const maxResults = Math.min(Math.floor(limit), this.maxResults)
    if (maxResults < 1 || !query.trim()) {
      return []
    }

    try {
      const documents = await this.search(query.trim(), maxResults)
      logger.info(`📚 Semantic Scholar returned ${documents.length} papers`, {
        sourceId: this.id,
        query,
        limit: maxResults,
      })
      return documents
    } catch (error) {
      logger.warn('Semantic Scholar source unavailable, continuing without it', {
        sourceId: this.id,
        query,
        error: ErrorUtils.describe(error),
      })
      return []
    }
  }

  private async search(query: string, maxResults: number): Promise<RawDocument[]> {
    const url = buildUrl(this.config.semanticScholarBaseUrl, 'graph/v1/paper/search', {
      query,
      limit: maxResults,
      fields: SEARCH_FIELDS,
    })

    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.config.semanticScholarApiKey) {
      headers['x-api-key'] = this.config.semanticScholarApiKey
    }

    let payload: unknown
    try {
      const response = await this.httpFetch(url, { headers, timeout: this.config.requestTimeoutMs })
      if (!response.ok) {
        throw new SourceError(
          `Semantic Scholar API error: ${response.status} ${response.statusText}`,
          this.id,
          statusToErrorCode(response.status)
        )
      }
      payload = await response.json()
    } catch (error) {
      if (error instanceof SourceError) throw error
      throw new SourceError('Semantic Scholar request failed', this.id, fetchFailureCode(error), error)
    }

    const parsed = SemanticScholarResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new SourceError(
        'Unexpected Semantic Scholar response format',
        this.id,
        ErrorCode.SOURCE_PARSE_ERROR,
        parsed.error
      )
    }

    return (parsed.data.data ?? []).slice(0, maxResults).map((paper) => this.toDocument(paper))
  }

  private toDocument(paper: SemanticScholarPaper): RawDocument {
    const title = paper.title ?? ''
    const authors = (paper.authors ?? []).map((author) => author.name ?? '').filter(Boolean)
    const year = paper.year != null ? String(paper.year) : ''

    let url = paper.url ?? ''
    if (!url && paper.paperId) {
      url = `${PAPER_PAGE_BASE}${paper.paperId}`
    }

    return {
      content: `TITLE: ${title}\nAUTHORS: ${authors.join(', ')}\nYEAR: ${year}\n\nABSTRACT: ${paper.abstract ?? ''}`,
      metadata: {
        sourceId: this.id,
        sourceName: this.name,
        title,
        publishedDate: year,
        url,
        extra: {
          paperId: paper.paperId ?? undefined,
          authors,
        },
      },
    }
  }
}
