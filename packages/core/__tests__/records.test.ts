import fs from 'fs'
import os from 'os'
import path from 'path'
import { parseSourceRecord, readSourceRecords, isQuestion } from '../src/source/records'
import { InputFormatError } from '../src/errors'

describe('parseSourceRecord', () => {
  it('separates core fields from passthrough metadata', () => {
    const record = parseSourceRecord({
      id: 12,
      type: 'question',
      title: 'Why is my CUDA kernel slow?',
      body: '<p>Details</p>',
      tags: ['cuda'],
      creationDate: '2020-01-01',
    })
    expect(record).toEqual({
      type: 'question',
      title: 'Why is my CUDA kernel slow?',
      body: '<p>Details</p>',
      metadata: { sourceId: 12, tags: ['cuda'], creationDate: '2020-01-01' },
    })
  })

  it('defaults a missing body to an empty string', () => {
    expect(parseSourceRecord({ type: 'question', title: 't' }).body).toBe('')
  })

  it('accepts answers without a title', () => {
    const record = parseSourceRecord({ type: 'answer', body: 'Use shared memory.' })
    expect(record.title).toBe('')
    expect(isQuestion(record)).toBe(false)
  })

  it('matches the question type case-insensitively', () => {
    expect(isQuestion(parseSourceRecord({ type: 'Question', title: 't' }))).toBe(true)
  })

  it.each<[unknown, string]>([
    [null, 'record is not a JSON object'],
    [[1, 2], 'record is not a JSON object'],
    [{ title: 't' }, 'missing string field "type"'],
    [{ type: 'question', title: 42 }, 'field "title" must be a string'],
    [{ type: 'question', title: 't', body: { html: '' } }, 'field "body" must be a string'],
    [{ type: 'question', title: '   ' }, 'question has no title'],
  ])('rejects %j', (value, message) => {
    expect(() => parseSourceRecord(value)).toThrow(new InputFormatError(message))
  })

  it('includes the line number when given', () => {
    expect(() => parseSourceRecord('x', 7)).toThrow('line 7: record is not a JSON object')
  })
})

describe('readSourceRecords', () => {
  let dir: string

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qsearch-records-'))
  })

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('yields parsed lines, skips blank ones and flags bad JSON with its line number', async () => {
    const file = path.join(dir, 'posts.jsonl')
    fs.writeFileSync(file, [
      '{"type":"question","title":"CUDA performance","body":"b1"}',
      '',
      '{"type":"answer","body":"b2"}',
      '{"type":"question","title":',
      '{"type":"question","title":"HTML layout","body":"b3"}',
    ].join('\n'))

    const values: unknown[] = []
    for await (const value of readSourceRecords(file)) values.push(value)

    expect(values).toHaveLength(4)
    expect(values[0]).toEqual({ type: 'question', title: 'CUDA performance', body: 'b1' })
    expect(values[1]).toEqual({ type: 'answer', body: 'b2' })
    expect(values[2]).toBeInstanceOf(InputFormatError)
    expect(values[2]).toMatchObject({ line: 4, code: 'INPUT_FORMAT_ERROR' })
    expect(values[3]).toEqual({ type: 'question', title: 'HTML layout', body: 'b3' })
  })
})
