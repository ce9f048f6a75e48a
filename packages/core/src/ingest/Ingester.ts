import type {
  IngestFailure,
  IngestFailureKind,
  IngestProgress,
  IngestReport,
  ItemDraft,
  Logger,
  SourceRecord,
} from '@qsearch/shared'
import type { EmbeddingProvider } from '../embeddings/EmbeddingProvider'
import type { RecordStore } from '../storage/RecordStore'
import { questionIndexSchema } from '../storage/RecordStore'
import { isQuestion, parseSourceRecord } from '../source/records'
import {
  DimensionMismatch,
  EmbeddingFailure,
  InputFormatError,
  StoreWriteFailure,
  errorMessage,
} from '../errors'
import { consoleLogger } from '../logger'

/** Number of questions to embed per batch (keeps provider requests a manageable size) */
export const DEFAULT_BATCH_SIZE = 32

export interface IngestConfig {
  indexName: string
  batchSize?: number
  /** Rethrow the first failed batch instead of reporting it and carrying on. */
  strict?: boolean
  onProgress?: (p: IngestProgress) => void
  /** Checked between batches; an aborted run rejects with the signal's reason. */
  signal?: AbortSignal
}

type Source = AsyncIterable<unknown> | Iterable<unknown>

/**
 * Builds a question index from a stream of source records.
 *
 * Each run drops and recreates the index, so rerunning from scratch is the
 * restart model: a run that fails midway leaves a partial index behind, and the
 * next run starts clean. Records are embedded by title in batches and written
 * with the vector attached; a record is never written without its vector.
 */
export class Ingester {
  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly store: RecordStore,
    private readonly logger: Logger = consoleLogger('Ingester'),
  ) {}

  async ingest(source: Source, config: IngestConfig): Promise<IngestReport> {
    const start = Date.now()
    const batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`)
    }
    const { indexName, onProgress } = config

    const report: IngestReport = {
      indexName,
      dim: this.embeddings.dim,
      batchSize,
      read: 0,
      skipped: 0,
      invalid: 0,
      batches: 0,
      indexed: 0,
      failed: 0,
      failures: [],
      durationMs: 0,
    }

    try {
      onProgress?.({ step: 'recreating', message: indexName })
      await this.store.dropIndex(indexName)
      await this.store.createIndex(indexName, questionIndexSchema(this.embeddings.dim))

      let batch: SourceRecord[] = []
      for await (const raw of source) {
        report.read++
        const record = this.accept(raw, report)
        if (!record) continue

        batch.push(record)
        if (batch.length >= batchSize) {
          await this.flush(batch, config, report)
          batch = []
        }
      }
      if (batch.length > 0) await this.flush(batch, config, report)

      onProgress?.({ step: 'refreshing', indexed: report.indexed })
      await this.store.refresh(indexName)
    } catch (err) {
      onProgress?.({ step: 'error', message: errorMessage(err) })
      throw err
    }

    report.durationMs = Date.now() - start
    this.logger.info(
      `Indexed ${report.indexed} question(s) into "${indexName}" in ${report.durationMs}ms ` +
      `(read=${report.read} skipped=${report.skipped} invalid=${report.invalid} failed=${report.failed})`,
    )
    onProgress?.({ step: 'done', indexed: report.indexed, failed: report.failed, durationMs: report.durationMs })
    return report
  }

  /** Validates a raw record; returns it only when it is a question to index. */
  private accept(raw: unknown, report: IngestReport): SourceRecord | null {
    try {
      if (raw instanceof InputFormatError) throw raw
      const record = parseSourceRecord(raw)
      if (!isQuestion(record)) {
        report.skipped++
        return null
      }
      return record
    } catch (err) {
      if (!(err instanceof InputFormatError)) throw err
      report.invalid++
      this.logger.warn(`Skipping malformed record #${report.read}: ${err.message}`)
      return null
    }
  }

  /**
   * Embed one batch by title and write it. A failed embedding call or a vector of
   * the wrong size rejects the whole batch: nothing from it is written.
   */
  private async flush(batch: SourceRecord[], config: IngestConfig, report: IngestReport): Promise<void> {
    config.signal?.throwIfAborted()
    const batchNo = ++report.batches
    config.onProgress?.({ step: 'embedding', batch: batchNo, batchSize: batch.length })

    let drafts: ItemDraft[]
    try {
      const vectors = await this.embeddings.embed(batch.map(r => r.title), { signal: config.signal })
      drafts = batch.map((r, i) => ({
        kind: 'question' as const,
        title: r.title,
        body: r.body,
        vector: vectors[i],
        metadata: r.metadata,
      }))
    } catch (err) {
      if (err instanceof DimensionMismatch) return this.fail(batchNo, 'dimension', batch.length, err, config, report)
      if (err instanceof EmbeddingFailure) return this.fail(batchNo, 'embedding', batch.length, err, config, report)
      throw err
    }

    config.onProgress?.({ step: 'writing', batch: batchNo, batchSize: drafts.length })
    let rejected: string[]
    try {
      const result = await this.store.bulkUpsert(config.indexName, drafts)
      rejected = result.items.filter(item => !item.ok).map(item => item.error ?? 'unknown error')
      report.indexed += result.items.length - rejected.length
    } catch (err) {
      const failure = err instanceof StoreWriteFailure
        ? err
        : new StoreWriteFailure(`Bulk write failed: ${errorMessage(err)}`, { cause: err })
      return this.fail(batchNo, 'store', drafts.length, failure, config, report)
    }

    if (rejected.length > 0) {
      const err = new StoreWriteFailure(
        `${rejected.length} of ${drafts.length} record(s) rejected by the store: ${rejected[0]}`,
      )
      return this.fail(batchNo, 'store', rejected.length, err, config, report)
    }
    config.onProgress?.({ step: 'writing', batch: batchNo, indexed: report.indexed })
  }

  private fail(
    batch: number,
    kind: IngestFailureKind,
    count: number,
    err: Error,
    config: IngestConfig,
    report: IngestReport,
  ): void {
    const failure: IngestFailure = { batch, kind, message: err.message, count }
    report.failures.push(failure)
    report.failed += count
    this.logger.error(`Batch ${batch} failed (${kind}, ${count} record(s) not written): ${err.message}`)
    if (config.strict) throw err
  }
}
