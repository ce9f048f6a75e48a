import { QueryService } from '../src/query/QueryService'
import { Ingester } from '../src/ingest/Ingester'
import { EmbeddingProvider } from '../src/embeddings/EmbeddingProvider'
import { InMemoryRecordStore } from '../src/storage/InMemoryRecordStore'
import { EmbeddingFailure, StoreQueryFailure } from '../src/errors'
import { silentLogger } from '../src/logger'
import { FakeEmbeddingAdapter } from './helpers'

const INDEX = 'questions'

const VECTORS: Record<string, number[]> = {
  'CUDA performance': [1, 0, 0],
  'C# closures': [0, 1, 0],
  'HTML layout': [0, 0, 1],
  'cuda programming': [0.9, 0.3, 0.1],
  'anything': [0, 0, 0],
}

async function indexedService() {
  const adapter = new FakeEmbeddingAdapter(3, VECTORS)
  const provider = await EmbeddingProvider.open(adapter)
  const store = new InMemoryRecordStore()
  await new Ingester(provider, store, silentLogger).ingest([
    { type: 'question', title: 'CUDA performance', body: 'Why is my kernel slow?' },
    { type: 'question', title: 'C# closures', body: 'Loop variable capture' },
    { type: 'answer', body: 'Use shared memory.' },
    { type: 'question', title: 'HTML layout', body: 'Centering a div' },
  ], { indexName: INDEX })
  const service = new QueryService(provider, store, { indexName: INDEX }, silentLogger)
  return { adapter, provider, store, service }
}

describe('QueryService', () => {
  it('ranks the closest question first with the shifted score', async () => {
    const { service } = await indexedService()
    const results = await service.query('cuda programming', 2)

    expect(results.map(r => r.title)).toEqual(['CUDA performance', 'C# closures'])
    expect(results[0]).toEqual({
      id: 'questions-1',
      score: expect.any(Number),
      title: 'CUDA performance',
      body: 'Why is my kernel slow?',
    })
    expect(results[0].score).toBeCloseTo(1 + 0.9 / Math.sqrt(0.91), 10)
    expect(results[1].score).toBeCloseTo(1 + 0.3 / Math.sqrt(0.91), 10)
    expect(results[0].score).toBeGreaterThan(results[1].score)
  })

  it('returns the same ids and scores for the same query', async () => {
    const { service } = await indexedService()
    const first = await service.query('cuda programming', 3)
    const second = await service.query('cuda programming', 3)
    expect(second).toEqual(first)
  })

  it('returns fewer than k results when the index is smaller', async () => {
    const { service } = await indexedService()
    expect(await service.query('cuda programming', 10)).toHaveLength(3)
  })

  it('scores a zero query vector as 1.0 for every record, in store order', async () => {
    const { service } = await indexedService()
    const results = await service.query('anything', 3)
    expect(results.map(r => [r.id, r.score])).toEqual([
      ['questions-1', 1],
      ['questions-2', 1],
      ['questions-3', 1],
    ])
  })

  it('embeds every query afresh', async () => {
    const { adapter, service } = await indexedService()
    const before = adapter.calls.length
    await service.query('cuda programming', 1)
    await service.query('cuda programming', 1)
    expect(adapter.calls.slice(before)).toEqual([['cuda programming'], ['cuda programming']])
  })

  it('reports embedding and search timings from search()', async () => {
    const { service } = await indexedService()
    const response = await service.search('cuda programming', 1)

    expect(response.results).toHaveLength(1)
    expect(response.embedMs).toBeGreaterThanOrEqual(0)
    expect(response.searchMs).toBeGreaterThanOrEqual(0)
  })

  it('rejects a k that is not a positive integer', async () => {
    const { service } = await indexedService()
    await expect(service.query('cuda programming', 0)).rejects.toThrow(RangeError)
    await expect(service.query('cuda programming', 1.5)).rejects.toThrow(RangeError)
  })

  it('surfaces a missing index as StoreQueryFailure', async () => {
    const { provider, store } = await indexedService()
    const service = new QueryService(provider, store, { indexName: 'missing' }, silentLogger)
    await expect(service.query('cuda programming', 1)).rejects.toThrow(
      new StoreQueryFailure('Index "missing" does not exist'),
    )
  })

  it('surfaces embedding failures without retrying', async () => {
    const { provider, store } = await indexedService()
    const embed = jest.spyOn(provider, 'embed').mockRejectedValue(new EmbeddingFailure('provider down'))
    const scoreQuery = jest.spyOn(store, 'scoreQuery')
    const service = new QueryService(provider, store, { indexName: INDEX }, silentLogger)

    await expect(service.query('cuda programming', 1)).rejects.toThrow(EmbeddingFailure)
    expect(embed).toHaveBeenCalledTimes(1)
    expect(scoreQuery).not.toHaveBeenCalled()
  })

  it('does not score when cancelled while embedding', async () => {
    const { provider, store, service } = await indexedService()
    const controller = new AbortController()
    jest.spyOn(provider, 'embed').mockImplementation(async () => {
      controller.abort(new Error('client went away'))
      return [[1, 0, 0]]
    })
    const scoreQuery = jest.spyOn(store, 'scoreQuery')

    await expect(
      service.query('cuda programming', 1, { signal: controller.signal }),
    ).rejects.toThrow('client went away')
    expect(scoreQuery).not.toHaveBeenCalled()
  })

  it('logs the timings of each query', async () => {
    const { provider, store } = await indexedService()
    const logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() }
    await new QueryService(provider, store, { indexName: INDEX }, logger).query('cuda programming', 2)

    expect(logger.info).toHaveBeenCalledTimes(1)
    expect(logger.info.mock.calls[0][0]).toMatch(/^"cuda programming" → 2 hit\(s\) \(embed [\d.]+ms, search [\d.]+ms\)$/)
  })
})
