import type { Logger, QueryResponse, QueryResult } from '@qsearch/shared'
import { performance } from 'perf_hooks'
import type { EmbeddingProvider } from '../embeddings/EmbeddingProvider'
import type { RecordStore } from '../storage/RecordStore'
import { consoleLogger } from '../logger'

export const DEFAULT_TOP_K = 10

export interface QueryServiceConfig {
  indexName: string
}

export interface QueryOptions {
  /**
   * Cancels the query. Honoured up to the moment embedding returns; once
   * scoring has started the query runs to completion.
   */
  signal?: AbortSignal
}

/**
 * Answers free-text queries against a question index.
 *
 * Flow:
 * 1. Embed the query text into a single vector
 * 2. Ask the record store for the top k records by cosine similarity + 1.0
 * 3. Return { id, score, title, body } per hit, best first
 *
 * Stateless per call: concurrent queries share only the read-only embedding
 * provider and the store's committed data. Nothing is cached and nothing is
 * retried; failures reach the caller as EmbeddingFailure / StoreQueryFailure.
 */
export class QueryService {
  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly store: RecordStore,
    private readonly config: QueryServiceConfig,
    private readonly logger: Logger = consoleLogger('Query'),
  ) {}

  get indexName(): string {
    return this.config.indexName
  }

  async query(text: string, k: number = DEFAULT_TOP_K, options: QueryOptions = {}): Promise<QueryResult[]> {
    const { results } = await this.search(text, k, options)
    return results
  }

  /** Same as `query()`, with the embedding and search times alongside the hits. */
  async search(text: string, k: number = DEFAULT_TOP_K, options: QueryOptions = {}): Promise<QueryResponse> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new RangeError(`k must be a positive integer, got ${k}`)
    }
    options.signal?.throwIfAborted()

    const embedStart = performance.now()
    const [queryVector] = await this.embeddings.embed([text], { signal: options.signal })
    const embedMs = performance.now() - embedStart
    options.signal?.throwIfAborted()

    const searchStart = performance.now()
    const results = await this.store.scoreQuery(this.config.indexName, queryVector, k)
    const searchMs = performance.now() - searchStart

    this.logger.info(
      `"${truncate(text, 60)}" → ${results.length} hit(s) ` +
      `(embed ${embedMs.toFixed(1)}ms, search ${searchMs.toFixed(1)}ms)`,
    )
    return { results, embedMs, searchMs }
  }
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text
}
