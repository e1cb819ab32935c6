import { describe, expect, test } from 'vitest'
import { AuthError } from './api-utils.js'
import { resolveMessages } from './batch-fetcher.js'
import type { PipelineEvent } from './events.js'
import { FakeMailbox, makeMessage } from './fake-mailbox.js'

function mailbox(count: number): FakeMailbox {
  return new FakeMailbox(
    Array.from({ length: count }, (_, i) =>
      makeMessage({ id: String(i + 1), from: 'a@x.com', date: '2024-01-01T00:00:00Z' }),
    ),
  )
}

const refs = (count: number) => Array.from({ length: count }, (_, i) => ({ id: String(i + 1) }))

describe('resolveMessages', () => {
  test('a failed sub-request is left out and recorded', async () => {
    const api = mailbox(3)
    api.failingIds.add('2')

    const result = await resolveMessages(api, refs(3), { format: 'metadata' })
    if (result instanceof Error) throw result

    expect(result.records.map((r) => r.id)).toEqual(['1', '3'])
    expect(result.failures).toEqual([{ id: '2', reason: 'API call failed: message 2 unavailable' }])
  })

  test('issues one batched call per chunk, strictly in order', async () => {
    const api = mailbox(250)
    const result = await resolveMessages(api, refs(250), { format: 'metadata', chunkSize: 100 })
    if (result instanceof Error) throw result

    expect(api.batchCalls.map((c) => c.ids.length)).toEqual([100, 100, 50])
    expect(api.batchCalls[1]?.ids[0]).toBe('101')
    expect(result.records).toHaveLength(250)
  })

  test('reports cumulative progress after each chunk', async () => {
    const events: PipelineEvent[] = []
    await resolveMessages(mailbox(5), refs(5), { format: 'full', chunkSize: 2, onEvent: (e) => events.push(e) })

    expect(events.filter((e) => e.type === 'progress')).toEqual([
      { type: 'progress', processed: 2, total: 5 },
      { type: 'progress', processed: 4, total: 5 },
      { type: 'progress', processed: 5, total: 5 },
    ])
    expect(events.at(-2)).toEqual({ type: 'status', message: 'Fetching details... (5/5)' })
  })

  test('no refs means no calls', async () => {
    const api = mailbox(0)
    expect(await resolveMessages(api, [], { format: 'metadata' })).toEqual({ records: [], failures: [] })
    expect(api.batchCalls).toHaveLength(0)
  })

  test('an auth failure aborts the fetch', async () => {
    const api = mailbox(3)
    api.authFailure = true
    expect(await resolveMessages(api, refs(3), { format: 'metadata' })).toBeInstanceOf(AuthError)
  })
})
