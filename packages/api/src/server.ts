import Fastify from 'fastify'
import type { FastifyInstance } from 'fastify'
import sensible from '@fastify/sensible'
import { Ingester, QueryService } from '@qsearch/core'
import type { EmbeddingProvider, QsearchConfig, RecordStore } from '@qsearch/core'
import { searchRoutes } from './routes/search'
import { ingestRoutes } from './routes/ingest'

// Extend FastifyInstance with the services the routes share
declare module 'fastify' {
  interface FastifyInstance {
    settings: QsearchConfig
    queries: QueryService
    ingester: Ingester
  }
}

export interface ServerDeps {
  config: QsearchConfig
  provider: EmbeddingProvider
  store: RecordStore
  /** Passed to Fastify; tests turn it off. */
  logger?: boolean
}

/**
 * Builds the HTTP surface over an already-open provider and store.
 * Both are closed when the server closes.
 */
export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { config, provider, store } = deps
  const app = Fastify({ logger: deps.logger ?? true })

  await app.register(sensible)

  app.decorate('settings', config)
  app.decorate('queries', new QueryService(provider, store, { indexName: config.indexName }, app.log))
  app.decorate('ingester', new Ingester(provider, store, app.log))

  app.addHook('onClose', async () => {
    provider.close()
    await store.close()
  })

  // Health check
  app.get('/api/health', async () => ({
    status: 'ok',
    indexName: config.indexName,
    dim: provider.dim,
    timestamp: new Date().toISOString(),
  }))

  await app.register(searchRoutes)
  await app.register(ingestRoutes)

  return app
}
