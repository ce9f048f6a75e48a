import type { EmbeddingAdapter, EmbedOptions } from './EmbeddingAdapter'
import { isVector } from './EmbeddingAdapter'
import { isRecord } from '../guards'

export interface OllamaEmbeddingConfig {
  baseUrl?: string        // default: http://localhost:11434
  model?: string          // default: nomic-embed-text
  dim?: number            // default: 768
}

export class OllamaEmbeddingAdapter implements EmbeddingAdapter {
  readonly dim: number
  private baseUrl: string
  private model: string

  constructor(config: OllamaEmbeddingConfig = {}) {
    this.baseUrl = (config.baseUrl ?? 'http://localhost:11434').replace(/\/$/, '')
    this.model = config.model ?? 'nomic-embed-text'
    // nomic-embed-text=768, mxbai-embed-large=1024, all-minilm=384
    this.dim = config.dim ?? 768
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const results: number[][] = []
    // /api/embeddings takes one prompt per request
    for (const text of texts) {
      const res = await fetch(`${this.baseUrl}/api/embeddings`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, prompt: text }),
        signal: options.signal,
      })
      if (!res.ok) {
        throw new Error(`Ollama embeddings failed: ${res.status} ${await res.text()}`)
      }
      const data: unknown = await res.json()
      if (!isRecord(data) || !isVector(data.embedding)) {
        throw new Error('Ollama embeddings returned no embedding array')
      }
      results.push(data.embedding)
    }
    return results
  }
}
