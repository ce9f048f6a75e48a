import fs from 'fs'
import type { FastifyInstance } from 'fastify'
import { readSourceRecords } from '@qsearch/core'

interface IngestBody {
  path?: unknown
}

export async function ingestRoutes(app: FastifyInstance): Promise<void> {
  // One writer at a time: a second run would drop the index under the first
  let running = false

  // POST /api/ingest — rebuild the index from a JSON Lines file on the server
  app.post<{ Body: IngestBody | null }>('/api/ingest', async (req, reply) => {
    const body: IngestBody = req.body ?? {}
    const { path } = body
    if (typeof path !== 'string' || path === '') {
      return reply.badRequest('path is required')
    }
    if (!fs.existsSync(path)) {
      return reply.badRequest(`File not found: ${path}`)
    }
    if (running) {
      return reply.conflict('An ingestion run is already in progress')
    }

    running = true
    try {
      const { indexName, batchSize, strict } = app.settings
      return await app.ingester.ingest(readSourceRecords(path), { indexName, batchSize, strict })
    } finally {
      running = false
    }
  })
}
