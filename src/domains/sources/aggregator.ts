import type { SourcesConfig } from '@/shared/config/config-factory.js'
import { ErrorUtils } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'
import { TimeoutWrapper } from '@/shared/utils/resilience.js'
import type { RawDocument, SourceRegistry } from './core/types.js'

/**
 * "arxiv, Semantic_Scholar," → ['arxiv', 'semantic_scholar']
 */
export function parseSourceList(sources: string): string[] {
  const ids = sources
    .split(',')
    .map((id) => id.trim().toLowerCase())
    .filter((id) => id.length > 0)
  return [...new Set(ids)]
}

/**
 * Fans a query out to the requested adapters and concatenates their results
 * in request order, whatever order they complete in.
 */
export class SourceAggregator {
  constructor(
    private registry: SourceRegistry,
    private config: Pick<SourcesConfig, 'requestTimeoutMs'>
  ) {}

  get availableSources(): string[] {
    return [...this.registry.keys()]
  }

  async aggregate(query: string, sourceIds: readonly string[], perSourceLimit: number): Promise<RawDocument[]> {
    const requested = [...new Set(sourceIds)]
    const known = requested.filter((id) => {
      if (this.registry.has(id)) return true
      logger.warn(`Unknown source '${id}' skipped`, {
        sourceId: id,
        availableSources: this.availableSources,
      })
      return false
    })

    if (known.length === 0) {
      return []
    }

    // Adapters bound their own requests; the outer guard covers an adapter
    // that hangs regardless.
    const guardMs = this.config.requestTimeoutMs * 2

    const results = await Promise.all(
      known.map(async (id) => {
        const adapter = this.registry.get(id)
        if (!adapter) return []
        try {
          return await TimeoutWrapper.withTimeout(adapter.fetch(query, perSourceLimit), {
            timeoutMs: guardMs,
            operation: `source:${id}`,
          })
        } catch (error) {
          logger.warn(`Source '${id}' did not answer, continuing without it`, {
            sourceId: id,
            error: ErrorUtils.describe(error),
          })
          return []
        }
      })
    )

    const documents = results.flat()
    logger.info(`🔎 Collected ${documents.length} papers from ${known.length} source(s)`, {
      query,
      sources: known,
      perSourceLimit,
    })
    return documents
  }
}
