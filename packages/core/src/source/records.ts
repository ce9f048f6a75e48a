import fs from 'fs'
import readline from 'readline'
import type { SourceRecord } from '@qsearch/shared'
import { InputFormatError, errorMessage } from '../errors'
import { isRecord } from '../guards'

const CORE_FIELDS = new Set(['type', 'title', 'body'])

export function isQuestion(record: SourceRecord): boolean {
  return record.type.toLowerCase() === 'question'
}

/**
 * Validates one raw input value as a source record.
 *
 * `type` must be a string. Questions additionally need a non-empty `title`;
 * a missing `body` reads as ''. Answers are accepted as long as their
 * fields have the right types, since they are dropped right after.
 * Everything else lands in `metadata`, with a source `id` renamed to `sourceId`.
 */
export function parseSourceRecord(value: unknown, line?: number): SourceRecord {
  if (!isRecord(value)) throw new InputFormatError('record is not a JSON object', line)

  const { type, title, body } = value
  if (typeof type !== 'string' || type === '') {
    throw new InputFormatError('missing string field "type"', line)
  }
  if (title !== undefined && title !== null && typeof title !== 'string') {
    throw new InputFormatError('field "title" must be a string', line)
  }
  if (body !== undefined && body !== null && typeof body !== 'string') {
    throw new InputFormatError('field "body" must be a string', line)
  }

  const record: SourceRecord = {
    type,
    title: title ?? '',
    body: body ?? '',
    metadata: {},
  }
  if (isQuestion(record) && record.title.trim() === '') {
    throw new InputFormatError('question has no title', line)
  }

  for (const [key, v] of Object.entries(value)) {
    if (CORE_FIELDS.has(key)) continue
    record.metadata[key === 'id' ? 'sourceId' : key] = v
  }
  return record
}

/**
 * Streams a JSON Lines file. Yields the parsed value of each non-blank line, or an
 * `InputFormatError` for a line that isn't valid JSON, so one bad line never ends
 * the stream.
 */
export async function* readSourceRecords(filePath: string): AsyncGenerator<unknown> {
  const lines = readline.createInterface({
    input: fs.createReadStream(filePath, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  })

  let lineNo = 0
  for await (const line of lines) {
    lineNo++
    if (line.trim() === '') continue
    let value: unknown
    try {
      value = JSON.parse(line)
    } catch (err) {
      value = new InputFormatError(`invalid JSON (${errorMessage(err)})`, lineNo)
    }
    yield value
  }
}
