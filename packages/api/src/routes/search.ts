import type { FastifyInstance } from 'fastify'
import { DEFAULT_TOP_K, DimensionMismatch, EmbeddingFailure, StoreQueryFailure } from '@qsearch/core'

interface SearchBody {
  query?: unknown
  k?: unknown
}

export async function searchRoutes(app: FastifyInstance): Promise<void> {
  // POST /api/search — embed the query and return the top k questions
  app.post<{ Body: SearchBody | null }>('/api/search', async (req, reply) => {
    const body: SearchBody = req.body ?? {}
    const { query, k = DEFAULT_TOP_K } = body
    if (typeof query !== 'string' || query.trim() === '') {
      return reply.badRequest('query must be a non-empty string')
    }
    if (typeof k !== 'number' || !Number.isInteger(k) || k <= 0) {
      return reply.badRequest('k must be a positive integer')
    }

    try {
      return await app.queries.search(query, k)
    } catch (err) {
      if (err instanceof EmbeddingFailure || err instanceof DimensionMismatch) {
        return reply.badGateway(err.message)
      }
      if (err instanceof StoreQueryFailure) {
        return reply.serviceUnavailable(err.message)
      }
      throw err
    }
  })
}
