export * from './errors'
export * from './config'
export { consoleLogger, silentLogger } from './logger'

export { SCORE_SHIFT, cosineSimilarity, shiftedScore } from './similarity/cosine'

export type { EmbeddingAdapter, EmbedOptions } from './embeddings/EmbeddingAdapter'
export { EmbeddingProvider } from './embeddings/EmbeddingProvider'
export { OllamaEmbeddingAdapter } from './embeddings/OllamaEmbeddingAdapter'
export type { OllamaEmbeddingConfig } from './embeddings/OllamaEmbeddingAdapter'
export { OpenAIEmbeddingAdapter } from './embeddings/OpenAIEmbeddingAdapter'
export type { OpenAIEmbeddingConfig } from './embeddings/OpenAIEmbeddingAdapter'
export { HttpEmbeddingAdapter } from './embeddings/HttpEmbeddingAdapter'
export type { HttpEmbeddingConfig } from './embeddings/HttpEmbeddingAdapter'
export { createEmbeddingAdapter } from './embeddings/factory'

export type { RecordStore, BulkUpsertResult, UpsertOutcome } from './storage/RecordStore'
export { questionIndexSchema } from './storage/RecordStore'
export { PostgresRecordStore } from './storage/PostgresRecordStore'
export type { PgPool } from './storage/PostgresRecordStore'
export { InMemoryRecordStore } from './storage/InMemoryRecordStore'

export { readSourceRecords, parseSourceRecord, isQuestion } from './source/records'

export { Ingester, DEFAULT_BATCH_SIZE } from './ingest/Ingester'
export type { IngestConfig } from './ingest/Ingester'
export { QueryService, DEFAULT_TOP_K } from './query/QueryService'
export type { QueryServiceConfig, QueryOptions } from './query/QueryService'
