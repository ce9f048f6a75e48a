import { Pool } from 'pg'
import type { FieldType, IndexSchema, ItemDraft, QueryResult } from '@qsearch/shared'
import type { BulkUpsertResult, RecordStore, UpsertOutcome } from './RecordStore'
import { isValidIndexName } from '../config'
import { StoreQueryFailure, StoreWriteFailure, errorMessage } from '../errors'
import { SCORE_SHIFT } from '../similarity/cosine'

/** The parts of a pg Pool this store uses. */
export type PgPool = Pick<Pool, 'query' | 'connect' | 'end'>

const UNDEFINED_TABLE = '42P01'

const COLUMN_TYPES: Record<Exclude<FieldType, 'dense_vector'>, string> = {
  keyword: 'TEXT NOT NULL',
  text: 'TEXT NOT NULL',
  json: `JSONB NOT NULL DEFAULT '{}'::jsonb`,
}

/**
 * Record store backed by one Postgres table per index, with the vector held in a
 * pgvector `vector(D)` column.
 *
 * Scoring runs in SQL. pgvector's `<=>` is cosine distance (`1 - cos`) and yields
 * NaN for zero-norm vectors, so the score expression guards that case to 0 before
 * adding the shift, matching `shiftedScore()` in process.
 */
export class PostgresRecordStore implements RecordStore {
  private readonly pool: PgPool

  constructor(config: PgPool | string) {
    this.pool = typeof config === 'string' ? new Pool({ connectionString: config }) : config
  }

  /** Fails fast when the database is unreachable or pgvector can't be enabled. */
  async ping(): Promise<void> {
    await this.pool.query('SELECT 1')
    await this.pool.query('CREATE EXTENSION IF NOT EXISTS vector')
  }

  async dropIndex(name: string): Promise<void> {
    const table = tableName(name, StoreWriteFailure)
    try {
      await this.pool.query(`DROP TABLE IF EXISTS ${table}`)
    } catch (err) {
      throw new StoreWriteFailure(`Failed to drop index "${name}": ${errorMessage(err)}`, { cause: err })
    }
  }

  async createIndex(name: string, schema: IndexSchema): Promise<void> {
    const table = tableName(name, StoreWriteFailure)
    if (!schema.fields.some(f => f.type === 'dense_vector')) {
      throw new StoreWriteFailure(`Schema for index "${name}" declares no dense_vector field`)
    }
    const columns = schema.fields.map(f => {
      const column = quoteIdent(f.name)
      return f.type === 'dense_vector'
        ? `${column} vector(${schema.dim}) NOT NULL`
        : `${column} ${COLUMN_TYPES[f.type]}`
    })

    try {
      await this.pool.query('CREATE EXTENSION IF NOT EXISTS vector')
      await this.pool.query(`
        CREATE TABLE ${table} (
          id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::text,
          seq BIGSERIAL,
          ${columns.join(',\n          ')}
        )`)
    } catch (err) {
      throw new StoreWriteFailure(`Failed to create index "${name}": ${errorMessage(err)}`, { cause: err })
    }
  }

  /**
   * Inserts the batch in one transaction, with a savepoint per row so a bad row
   * is reported on its own instead of failing its neighbours.
   */
  async bulkUpsert(name: string, records: ItemDraft[]): Promise<BulkUpsertResult> {
    const table = tableName(name, StoreWriteFailure)
    if (records.length === 0) return { items: [] }

    const client = await this.pool.connect().catch((err: unknown) => {
      throw new StoreWriteFailure(`Failed to connect for bulk write: ${errorMessage(err)}`, { cause: err })
    })
    const items: UpsertOutcome[] = []
    try {
      await client.query('BEGIN')
      for (const r of records) {
        await client.query('SAVEPOINT item')
        try {
          const res = await client.query<{ id: string }>(
            `INSERT INTO ${table} ("kind", "title", "body", "metadata", "vector")
             VALUES ($1, $2, $3, $4::jsonb, $5::vector)
             RETURNING id`,
            [r.kind, r.title, r.body, JSON.stringify(r.metadata), toVectorLiteral(r.vector)],
          )
          await client.query('RELEASE SAVEPOINT item')
          items.push({ id: res.rows[0]?.id, ok: true })
        } catch (err) {
          await client.query('ROLLBACK TO SAVEPOINT item')
          items.push({ ok: false, error: errorMessage(err) })
        }
      }
      await client.query('COMMIT')
      return { items }
    } catch (err) {
      await client.query('ROLLBACK')
      throw new StoreWriteFailure(`Bulk write to "${name}" failed: ${errorMessage(err)}`, { cause: err })
    } finally {
      client.release()
    }
  }

  /**
   * Committed rows are already visible to new queries in Postgres; this refreshes
   * planner statistics for the freshly loaded table.
   */
  async refresh(name: string): Promise<void> {
    const table = tableName(name, StoreWriteFailure)
    try {
      await this.pool.query(`ANALYZE ${table}`)
    } catch (err) {
      throw new StoreWriteFailure(`Failed to refresh index "${name}": ${errorMessage(err)}`, { cause: err })
    }
  }

  async scoreQuery(name: string, queryVector: number[], k: number): Promise<QueryResult[]> {
    const table = tableName(name, StoreQueryFailure)
    try {
      const res = await this.pool.query<{ id: string; title: string; body: string; score: number | string }>(
        `SELECT id, title, body,
                CASE
                  WHEN vector_norm("vector") = 0 OR vector_norm($1::vector) = 0 THEN 0
                  ELSE 1 - ("vector" <=> $1::vector)
                END + ${SCORE_SHIFT.toFixed(1)} AS score
         FROM ${table}
         ORDER BY score DESC, seq ASC
         LIMIT $2`,
        [toVectorLiteral(queryVector), k],
      )
      return res.rows.map(row => ({
        id: row.id,
        score: Number(row.score),
        title: row.title,
        body: row.body,
      }))
    } catch (err) {
      throw queryFailure(name, err)
    }
  }

  async count(name: string): Promise<number> {
    const table = tableName(name, StoreQueryFailure)
    try {
      const res = await this.pool.query<{ count: number }>(`SELECT count(*)::int AS count FROM ${table}`)
      return res.rows[0]?.count ?? 0
    } catch (err) {
      throw queryFailure(name, err)
    }
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}

export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(',')}]`
}

function tableName(name: string, Failure: typeof StoreWriteFailure | typeof StoreQueryFailure): string {
  if (!isValidIndexName(name)) throw new Failure(`Invalid index name "${name}"`)
  return quoteIdent(name)
}

function quoteIdent(ident: string): string {
  return `"${ident.replace(/"/g, '""')}"`
}

function queryFailure(name: string, err: unknown): StoreQueryFailure {
  if (isPgError(err) && err.code === UNDEFINED_TABLE) {
    return new StoreQueryFailure(`Index "${name}" does not exist`, { cause: err })
  }
  return new StoreQueryFailure(`Query on index "${name}" failed: ${errorMessage(err)}`, { cause: err })
}

function isPgError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}
