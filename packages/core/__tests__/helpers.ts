import type { EmbeddingAdapter } from '../src/embeddings/EmbeddingAdapter'

/**
 * Deterministic adapter for tests: looks each text up in `table`, falling back
 * to a vector derived from the text's character codes.
 */
export class FakeEmbeddingAdapter implements EmbeddingAdapter {
  readonly calls: string[][] = []

  constructor(
    readonly dim: number,
    private readonly table: Record<string, number[]> = {},
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts])
    return texts.map(t => this.table[t] ?? this.derive(t))
  }

  private derive(text: string): number[] {
    const v = new Array<number>(this.dim).fill(0)
    for (let i = 0; i < text.length; i++) {
      v[i % this.dim] += text.charCodeAt(i) % 17 + 1
    }
    return v
  }
}

export function questions(count: number, prefix = 'Question'): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    type: 'question',
    title: `${prefix} ${i + 1}`,
    body: `Body of ${prefix.toLowerCase()} ${i + 1}`,
  }))
}

export function answers(count: number): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => ({
    id: 1000 + i,
    type: 'answer',
    body: `Answer ${i + 1}`,
    parentId: 1,
  }))
}
