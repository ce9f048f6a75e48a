export type ErrorCode =
  | 'EMBEDDING_FAILURE'
  | 'DIMENSION_MISMATCH'
  | 'STORE_WRITE_FAILURE'
  | 'STORE_QUERY_FAILURE'
  | 'INPUT_FORMAT_ERROR'

export abstract class QsearchError extends Error {
  abstract readonly code: ErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Provider unreachable, provider error, or output that doesn't line up with the input. */
export class EmbeddingFailure extends QsearchError {
  readonly code = 'EMBEDDING_FAILURE'
}

export class DimensionMismatch extends QsearchError {
  readonly code = 'DIMENSION_MISMATCH'

  constructor(
    readonly expected: number,
    readonly actual: number,
    context?: string,
  ) {
    super(`Vector dimension mismatch${context ? ` (${context})` : ''}: expected ${expected}, got ${actual}`)
  }
}

export class StoreWriteFailure extends QsearchError {
  readonly code = 'STORE_WRITE_FAILURE'
}

export class StoreQueryFailure extends QsearchError {
  readonly code = 'STORE_QUERY_FAILURE'
}

/** A source record that can't be read as a question/answer. Skipped, never fatal. */
export class InputFormatError extends QsearchError {
  readonly code = 'INPUT_FORMAT_ERROR'

  constructor(message: string, readonly line?: number) {
    super(line !== undefined ? `line ${line}: ${message}` : message)
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
