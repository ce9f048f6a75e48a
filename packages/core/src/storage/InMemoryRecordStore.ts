import type { IndexSchema, Item, ItemDraft, QueryResult } from '@qsearch/shared'
import type { BulkUpsertResult, RecordStore, UpsertOutcome } from './RecordStore'
import { StoreQueryFailure, StoreWriteFailure } from '../errors'
import { shiftedScore } from '../similarity/cosine'

interface MemoryIndex {
  schema: IndexSchema
  committed: Item[]
  pending: Item[]     // written but not yet refreshed
  nextId: number
}

/**
 * Record store kept in process memory, scoring client-side by brute force.
 *
 * Like a search engine with a refresh interval, writes land in a pending buffer
 * and only become visible to `scoreQuery` and `count` after `refresh()`.
 * Ids are `<index>-<n>`, numbered from 1 each time the index is created.
 */
export class InMemoryRecordStore implements RecordStore {
  private indexes = new Map<string, MemoryIndex>()

  async ping(): Promise<void> {}

  async dropIndex(name: string): Promise<void> {
    this.indexes.delete(name)
  }

  async createIndex(name: string, schema: IndexSchema): Promise<void> {
    if (this.indexes.has(name)) throw new StoreWriteFailure(`Index "${name}" already exists`)
    this.indexes.set(name, { schema, committed: [], pending: [], nextId: 1 })
  }

  async bulkUpsert(name: string, records: ItemDraft[]): Promise<BulkUpsertResult> {
    const index = this.indexes.get(name)
    if (!index) throw new StoreWriteFailure(`Index "${name}" does not exist`)

    const items: UpsertOutcome[] = records.map(record => {
      if (record.vector.length !== index.schema.dim) {
        return {
          ok: false,
          error: `vector has ${record.vector.length} dimensions, index expects ${index.schema.dim}`,
        }
      }
      const id = `${name}-${index.nextId++}`
      // Copy the vector so later mutation by the caller can't change what was written
      index.pending.push({ ...record, id, vector: [...record.vector] })
      return { id, ok: true }
    })
    return { items }
  }

  async refresh(name: string): Promise<void> {
    const index = this.indexes.get(name)
    if (!index) throw new StoreWriteFailure(`Index "${name}" does not exist`)
    index.committed.push(...index.pending)
    index.pending = []
  }

  async scoreQuery(name: string, queryVector: number[], k: number): Promise<QueryResult[]> {
    const index = this.indexes.get(name)
    if (!index) throw new StoreQueryFailure(`Index "${name}" does not exist`)
    if (queryVector.length !== index.schema.dim) {
      throw new StoreQueryFailure(
        `Query vector has ${queryVector.length} dimensions, index "${name}" expects ${index.schema.dim}`,
      )
    }

    // Array#sort is stable, so equal scores keep insertion order
    return index.committed
      .map(item => ({
        id: item.id,
        score: shiftedScore(queryVector, item.vector),
        title: item.title,
        body: item.body,
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
  }

  async count(name: string): Promise<number> {
    const index = this.indexes.get(name)
    if (!index) throw new StoreQueryFailure(`Index "${name}" does not exist`)
    return index.committed.length
  }

  /** Committed items of an index, in insertion order. */
  async getAll(name: string): Promise<Item[]> {
    return [...(this.indexes.get(name)?.committed ?? [])]
  }

  async close(): Promise<void> {
    this.indexes.clear()
  }
}
