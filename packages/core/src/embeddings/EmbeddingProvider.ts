import type { EmbeddingAdapter, EmbedOptions } from './EmbeddingAdapter'
import { DimensionMismatch, EmbeddingFailure, QsearchError, errorMessage } from '../errors'

const WARMUP_TEXT = 'warmup'

/**
 * Process-wide embedding session.
 *
 * Opened once at startup: `open()` resolves only after a warm-up call has
 * returned a vector of the configured dimension, so the first real query never
 * pays model load time and a misconfigured model fails startup instead of the
 * first request. The opened provider is shared read-only by the ingester and
 * every concurrent query, and closed once at shutdown.
 *
 * Every call is checked: one vector per input, each `dim` long.
 */
export class EmbeddingProvider {
  private closed = false

  private constructor(private readonly adapter: EmbeddingAdapter) {}

  static async open(adapter: EmbeddingAdapter): Promise<EmbeddingProvider> {
    if (!Number.isInteger(adapter.dim) || adapter.dim <= 0) {
      throw new EmbeddingFailure(`Embedding dimension must be a positive integer, got ${adapter.dim}`)
    }
    const provider = new EmbeddingProvider(adapter)
    await provider.embed([WARMUP_TEXT])
    return provider
  }

  get dim(): number {
    return this.adapter.dim
  }

  get isOpen(): boolean {
    return !this.closed
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (this.closed) throw new EmbeddingFailure('Embedding provider is closed')
    if (texts.length === 0) return []

    let vectors: number[][]
    try {
      vectors = await this.adapter.embed(texts, options)
    } catch (err) {
      // Caller-initiated cancellation is not a provider failure
      if (options.signal?.aborted || err instanceof QsearchError) throw err
      throw new EmbeddingFailure(`Embedding request failed: ${errorMessage(err)}`, { cause: err })
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingFailure(
        `Embedding provider returned ${vectors.length} vector(s) for ${texts.length} input(s)`,
      )
    }
    vectors.forEach((v, i) => {
      if (v.length !== this.dim) throw new DimensionMismatch(this.dim, v.length, `input ${i}`)
    })
    return vectors
  }

  close(): void {
    this.closed = true
  }
}
