/**
 * Paper sources domain
 */

import type { SourcesConfig } from '@/shared/config/config-factory.js'
import type { HttpFetch } from '@/shared/http/client.js'
import { ArxivAdapter } from './adapters/arxiv.js'
import { SemanticScholarAdapter } from './adapters/semantic-scholar.js'
import type { SourceAdapter, SourceRegistry } from './core/types.js'

export { ArxivAdapter } from './adapters/arxiv.js'
export { SemanticScholarAdapter } from './adapters/semantic-scholar.js'
export { SourceAggregator, parseSourceList } from './aggregator.js'
export type { PaperMetadata, RawDocument, SourceAdapter, SourceRegistry } from './core/types.js'

/**
 * Registry of every built-in adapter, keyed by source id
 */
export function createSourceRegistry(config: SourcesConfig, httpFetch?: HttpFetch): SourceRegistry {
  const adapters: SourceAdapter[] = [
    new ArxivAdapter(config, httpFetch),
    new SemanticScholarAdapter(config, httpFetch),
  ]
  return new Map(adapters.map((adapter) => [adapter.id, adapter]))
}
