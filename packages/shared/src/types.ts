/** A line of the ingestion input, validated but not yet embedded. */
export interface SourceRecord {
  type: string
  title: string
  body: string
  metadata: Record<string, unknown>   // every other field, passed through untouched
}

/** A question ready to be written: the source record with its vector attached. */
export interface ItemDraft {
  kind: 'question'
  title: string
  body: string
  vector: number[]
  metadata: Record<string, unknown>
}

/** A persisted item. `id` is assigned by the record store. */
export interface Item extends ItemDraft {
  id: string
}

export interface QueryResult {
  id: string
  score: number           // cosine similarity + 1.0, in [0, 2]
  title: string
  body: string
}

export interface QueryResponse {
  results: QueryResult[]
  embedMs: number
  searchMs: number
}

export type FieldType = 'keyword' | 'text' | 'json' | 'dense_vector'

export interface FieldSpec {
  name: string
  type: FieldType
}

export interface IndexSchema {
  dim: number
  fields: FieldSpec[]
}

export type IngestFailureKind = 'embedding' | 'dimension' | 'store'

export interface IngestFailure {
  batch: number           // 1-based batch number
  kind: IngestFailureKind
  message: string
  count: number           // records of that batch that were not written
}

export interface IngestReport {
  indexName: string
  dim: number
  batchSize: number
  read: number
  skipped: number
  invalid: number
  batches: number
  indexed: number
  failed: number
  failures: IngestFailure[]
  durationMs: number
}

export interface IngestProgress {
  step: 'recreating' | 'embedding' | 'writing' | 'refreshing' | 'done' | 'error'
  batch?: number
  batchSize?: number
  indexed?: number
  failed?: number
  durationMs?: number
  message?: string
}

/**
 * Minimal logging surface accepted by the pipelines.
 * Fastify's pino logger satisfies it, as does `console`.
 */
export interface Logger {
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}
