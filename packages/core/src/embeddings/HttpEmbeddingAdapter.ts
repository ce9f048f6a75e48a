import type { EmbeddingAdapter, EmbedOptions } from './EmbeddingAdapter'
import { isVector } from './EmbeddingAdapter'
import { isRecord } from '../guards'

/**
 * Generic OpenAI-compatible embedding adapter.
 * Works with any provider that exposes POST /embeddings with a { model, input } body
 * and answers { data: [{ embedding, index }] }.
 *
 *   OpenAI:   https://api.openai.com/v1
 *   Together: https://api.together.xyz/v1
 *   Voyage:   https://api.voyageai.com/v1
 *   Azure:    https://<resource>.openai.azure.com/openai/deployments/<deployment>
 */
export interface HttpEmbeddingConfig {
  baseUrl: string
  apiKey?: string       // Bearer token (omit for unauthenticated local endpoints)
  model: string
  dim?: number          // default: 1536
  headers?: Record<string, string>      // extra headers (e.g. api-key for Azure)
  queryParams?: Record<string, string>  // extra query params (e.g. api-version for Azure)
}

export class HttpEmbeddingAdapter implements EmbeddingAdapter {
  readonly dim: number
  protected readonly config: HttpEmbeddingConfig

  constructor(config: HttpEmbeddingConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/$/, '') }
    this.dim = config.dim ?? 1536
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.config.headers,
    }
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`
    }

    const url = new URL(`${this.config.baseUrl}/embeddings`)
    for (const [k, v] of Object.entries(this.config.queryParams ?? {})) {
      url.searchParams.set(k, v)
    }
    const res = await fetch(url.toString(), {
      method: 'POST',
      headers,
      body: JSON.stringify({ model: this.config.model, input: texts }),
      signal: options.signal,
    })
    if (!res.ok) {
      throw new Error(`HTTP embedding failed [${this.config.baseUrl}]: ${res.status} ${await res.text()}`)
    }
    return parseEmbeddingResponse(await res.json())
  }
}

/** Reads `{ data: [{ embedding, index }] }` back into input order. */
export function parseEmbeddingResponse(data: unknown): number[][] {
  if (!isRecord(data) || !Array.isArray(data.data)) {
    throw new Error('Embedding response has no data array')
  }
  const rows: Array<{ index: number; embedding: number[] }> = []
  data.data.forEach((row: unknown, position: number) => {
    if (!isRecord(row) || !isVector(row.embedding)) {
      throw new Error(`Embedding response row ${position} has no embedding array`)
    }
    rows.push({
      index: typeof row.index === 'number' ? row.index : position,
      embedding: row.embedding,
    })
  })
  return rows.sort((a, b) => a.index - b.index).map(r => r.embedding)
}
