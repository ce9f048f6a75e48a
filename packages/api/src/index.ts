import {
  EmbeddingProvider,
  PostgresRecordStore,
  createEmbeddingAdapter,
  loadConfig,
} from '@qsearch/core'
import { buildServer } from './server'

async function main() {
  const config = loadConfig()

  // Startup checks are fatal: no server without a reachable store and a working provider
  const store = new PostgresRecordStore(config.databaseUrl)
  await store.ping()
  const provider = await EmbeddingProvider.open(createEmbeddingAdapter(config.embedding))

  const app = await buildServer({ config, provider, store })
  app.log.info(`Embedding provider ready: ${config.embedding.provider} (dim ${provider.dim})`)

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info(`${signal} received, shutting down`)
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed')
          process.exit(1)
        },
      )
    })
  }

  await app.listen({ port: config.server.port, host: config.server.host })
}

// Only start the server when run directly (not when imported by tests)
if (require.main === module) {
  main().catch(err => {
    console.error('Fatal:', err)
    process.exit(1)
  })
}

export { buildServer }
export type { ServerDeps } from './server'
