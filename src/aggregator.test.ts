import { describe, expect, test } from 'vitest'
import { aggregateBySender, countAttachmentParts, SenderAggregator } from './aggregator.js'
import type { PipelineEvent } from './events.js'
import { makeMessage } from './fake-mailbox.js'

describe('SenderAggregator', () => {
  test('groups by address and tracks dates, subject and counts', () => {
    const { groups, skipped } = aggregateBySender([
      makeMessage({ id: '1', from: 'Shop <news@shop.test>', date: 'Mon, 1 Jan 2024 10:00:00 +0000', subject: 'Sale' }),
      makeMessage({ id: '2', from: 'Friend <pal@mail.test>', date: 'Tue, 2 Jan 2024 10:00:00 +0000', subject: 'Hi' }),
      makeMessage({ id: '3', from: 'Shop <news@shop.test>', date: 'Fri, 5 Jan 2024 10:00:00 +0000', subject: 'Last call' }),
      makeMessage({ id: '4', from: 'Shop <news@shop.test>', date: 'Wed, 3 Jan 2024 10:00:00 +0000', subject: 'Reminder' }),
    ])

    expect(skipped).toBe(0)
    expect(groups.size).toBe(2)

    const shop = groups.get('news@shop.test')
    expect(shop?.senderName).toBe('Shop')
    expect(shop?.count).toBe(3)
    expect(shop?.emails.map((e) => e.id)).toEqual(['1', '3', '4'])
    expect(shop?.oldestDate.toISOString()).toBe('2024-01-01T10:00:00.000Z')
    expect(shop?.newestDate.toISOString()).toBe('2024-01-05T10:00:00.000Z')
    expect(shop?.newestSubject).toBe('Last call')
    expect(groups.get('pal@mail.test')?.count).toBe(1)
  })

  test('sender key ignores case and keeps the first spelling', () => {
    const { groups } = aggregateBySender([
      makeMessage({ id: '1', from: 'Alice@Example.com', date: '2024-01-01T00:00:00Z' }),
      makeMessage({ id: '2', from: 'alice@example.com', date: '2024-01-02T00:00:00Z' }),
    ])

    expect(groups.size).toBe(1)
    const group = groups.get('alice@example.com')
    expect(group?.senderEmail).toBe('Alice@Example.com')
    expect(group?.senderName).toBe('Alice@Example.com')
    expect(group?.count).toBe(2)
  })

  test('an address used as its own display name is grouped, not skipped', () => {
    const { groups, skipped } = aggregateBySender([
      makeMessage({ id: '1', from: 'billing@shop.test <billing@shop.test>', date: '2024-01-01T00:00:00Z' }),
    ])
    expect(skipped).toBe(0)
    expect(groups.size).toBe(1)
    expect(groups.get('billing@shop.test')?.senderEmail).toBe('billing@shop.test')
  })

  test('hasUnsubscribe is set once any message carries the header', () => {
    const { groups } = aggregateBySender([
      makeMessage({ id: '1', from: 'a@x.com', date: '2024-01-01T00:00:00Z', unsubscribe: '<mailto:u@x.com>' }),
      makeMessage({ id: '2', from: 'a@x.com', date: '2024-01-02T00:00:00Z' }),
      makeMessage({ id: '3', from: 'b@y.com', date: '2024-01-02T00:00:00Z', unsubscribe: '  ' }),
    ])

    expect(groups.get('a@x.com')?.hasUnsubscribe).toBe(true)
    expect(groups.get('b@y.com')?.hasUnsubscribe).toBe(false)
  })

  test('equal newest dates keep the later message subject', () => {
    const { groups } = aggregateBySender([
      makeMessage({ id: '1', from: 'a@x.com', date: '2024-01-01T00:00:00Z', subject: 'first' }),
      makeMessage({ id: '2', from: 'a@x.com', date: '2024-01-01T00:00:00Z', subject: 'second' }),
    ])
    expect(groups.get('a@x.com')?.newestSubject).toBe('second')
  })

  test('dates in different zones compare as instants', () => {
    const { groups } = aggregateBySender([
      makeMessage({ id: '1', from: 'a@x.com', date: 'Mon, 1 Jan 2024 12:00:00 +0200', subject: 'earlier' }),
      makeMessage({ id: '2', from: 'a@x.com', date: 'Mon, 1 Jan 2024 11:00:00 +0000', subject: 'later' }),
    ])
    const group = groups.get('a@x.com')
    expect(group?.newestSubject).toBe('later')
    expect(group?.oldestDate.toISOString()).toBe('2024-01-01T10:00:00.000Z')
  })

  test('records without a sender or a parsable date are skipped and counted', () => {
    const aggregator = new SenderAggregator()
    expect(aggregator.add(makeMessage({ id: '1', from: '', date: '2024-01-01T00:00:00Z' }))).toBeNull()
    expect(aggregator.add(makeMessage({ id: '2', from: 'a@x.com', date: '' }))).toBeNull()
    expect(aggregator.add(makeMessage({ id: '3', from: 'a@x.com', date: '2024-01-01T00:00:00Z' }))?.count).toBe(1)

    expect(aggregator.processed).toBe(3)
    expect(aggregator.skipped).toBe(2)
    expect(aggregator.result().size).toBe(1)
  })

  test('missing subject becomes an empty string', () => {
    const { groups } = aggregateBySender([makeMessage({ id: '1', from: 'a@x.com', date: '2024-01-01T00:00:00Z' })])
    expect(groups.get('a@x.com')?.newestSubject).toBe('')
  })

  test('totalAttachments sums filename-bearing top-level parts', () => {
    const withFiles = makeMessage({
      id: '1',
      from: 'a@x.com',
      date: '2024-01-01T00:00:00Z',
      parts: [
        { filename: '' },
        { filename: 'a.pdf' },
        { filename: 'b.png', parts: [{ filename: 'nested.txt' }] },
      ],
    })
    expect(countAttachmentParts(withFiles)).toBe(2)

    const { groups } = aggregateBySender([
      withFiles,
      makeMessage({ id: '2', from: 'a@x.com', date: '2024-01-02T00:00:00Z', parts: [{ filename: 'c.doc' }] }),
    ])
    expect(groups.get('a@x.com')?.totalAttachments).toBe(3)
  })

  test('every group satisfies the summary invariants', () => {
    const records = Array.from({ length: 30 }, (_, i) =>
      makeMessage({
        id: String(i),
        from: `s${i % 4}@x.com`,
        // Only five distinct days, so most groups have ties on their newest date.
        date: new Date(Date.UTC(2024, 0, 1 + ((i * 7) % 5))).toISOString(),
        subject: `subject ${i}`,
      }),
    )
    const { groups } = aggregateBySender(records)

    let total = 0
    for (const group of groups.values()) {
      total += group.count
      expect(group.emails).toHaveLength(group.count)
      expect(group.oldestDate.getTime()).toBeLessThanOrEqual(group.newestDate.getTime())
      const times = group.emails.map((e) => e.date.getTime())
      expect(Math.min(...times)).toBe(group.oldestDate.getTime())
      expect(Math.max(...times)).toBe(group.newestDate.getTime())
      const lastNewest = group.emails.filter((e) => e.date.getTime() === group.newestDate.getTime()).at(-1)
      expect(group.newestSubject).toBe(lastNewest?.subject)
    }
    expect(total).toBe(30)
  })

  test('reports progress every 100 records and on the last one', () => {
    const records = Array.from({ length: 250 }, (_, i) =>
      makeMessage({ id: String(i), from: 'a@x.com', date: '2024-01-01T00:00:00Z' }),
    )
    const events: PipelineEvent[] = []
    aggregateBySender(records, { onEvent: (e) => events.push(e) })

    expect(events[0]).toEqual({ type: 'status', message: 'Analyzing 250 emails...' })
    expect(events.filter((e) => e.type === 'progress').map((e) => (e.type === 'progress' ? e.processed : -1))).toEqual([100, 200, 250])
  })
})
