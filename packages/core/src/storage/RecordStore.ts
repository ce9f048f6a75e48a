import type { IndexSchema, ItemDraft, QueryResult } from '@qsearch/shared'

export interface UpsertOutcome {
  /** Store-assigned id; present when `ok`. */
  id?: string
  ok: boolean
  error?: string
}

export interface BulkUpsertResult {
  /** One outcome per input record, in input order. */
  items: UpsertOutcome[]
}

/**
 * A collection of items with a dense vector field that can rank every record
 * against a query vector.
 *
 * Scores are `cosineSimilarity(query, record.vector) + SCORE_SHIFT`, whether
 * the store computes them itself or in process.
 */
export interface RecordStore {
  /** Startup connectivity check; rejects when the backend can't serve requests. */
  ping(): Promise<void>
  /** Idempotent: no error when the index doesn't exist. */
  dropIndex(name: string): Promise<void>
  createIndex(name: string, schema: IndexSchema): Promise<void>
  /** Writes records as new items; the store assigns ids. Never rejects for a single bad record. */
  bulkUpsert(name: string, records: ItemDraft[]): Promise<BulkUpsertResult>
  /** Makes everything written so far visible to `scoreQuery` and `count`. */
  refresh(name: string): Promise<void>
  /** Top `k` records by descending shifted cosine score. */
  scoreQuery(name: string, queryVector: number[], k: number): Promise<QueryResult[]>
  count(name: string): Promise<number>
  close(): Promise<void>
}

/** The schema every question index is created with. */
export function questionIndexSchema(dim: number): IndexSchema {
  return {
    dim,
    fields: [
      { name: 'kind', type: 'keyword' },
      { name: 'title', type: 'text' },
      { name: 'body', type: 'text' },
      { name: 'metadata', type: 'json' },
      { name: 'vector', type: 'dense_vector' },
    ],
  }
}
