export interface EmbedOptions {
  /** Aborts the in-flight provider request. */
  signal?: AbortSignal
}

/**
 * A text embedding model. Implementations must return one vector per input,
 * in input order, each of length `dim`. `EmbeddingProvider` enforces that.
 */
export interface EmbeddingAdapter {
  /** Vector dimension produced by this adapter's model. */
  readonly dim: number
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>
}

export function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number' && Number.isFinite(v))
}
