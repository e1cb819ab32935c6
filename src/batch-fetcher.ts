// BatchFetcher: resolves message ids into full records, one batched call per chunk.
// Chunks run strictly one after another. A failed sub-request is recorded in
// `failures` and its message is left out of `records`; the chunk still completes.
// Progress counts ids attempted, not ids resolved, so it stays monotonic.

import { chunk, type AuthError } from './api-utils.js'
import { type EventSink, noopSink, progress, status } from './events.js'
import * as log from './log.js'
import type { MailboxApi, MessageFormat, MessageRecord, MessageRef } from './mailbox.js'

export const DEFAULT_CHUNK_SIZE = 100

/** Headers the sender summary needs. */
export const SUMMARY_HEADERS = ['From', 'Subject', 'Date', 'List-Unsubscribe']

export interface FetchFailure {
  id: string
  reason: string
}

export interface ResolveResult {
  records: MessageRecord[]
  failures: FetchFailure[]
}

export async function resolveMessages(
  api: MailboxApi,
  refs: MessageRef[],
  {
    format,
    metadataHeaders,
    chunkSize = DEFAULT_CHUNK_SIZE,
    onEvent = noopSink,
  }: {
    format: MessageFormat
    metadataHeaders?: string[]
    chunkSize?: number
    onEvent?: EventSink
  },
): Promise<ResolveResult | AuthError> {
  const total = refs.length
  const records: MessageRecord[] = []
  const failures: FetchFailure[] = []
  let processed = 0

  for (const ids of chunk(refs.map((r) => r.id), chunkSize)) {
    const items = await api.batchGetMessages({ ids, format, metadataHeaders })
    if (items instanceof Error) return items

    for (const item of items) {
      if ('error' in item) {
        log.warn(`Fetching message ${item.id} failed: ${item.error.message}`)
        failures.push({ id: item.id, reason: item.error.message })
        continue
      }
      records.push(item.message)
    }

    processed += ids.length
    status(onEvent, `Fetching details... (${processed}/${total})`)
    progress(onEvent, processed, total)
  }

  log.debug(`Fetched details for ${records.length} out of ${total} messages (${failures.length} failed)`)
  return { records, failures }
}
