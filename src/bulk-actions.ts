// BulkActionExecutor: applies a label change to many messages, one batchModify per chunk.
// Unlike batched reads there is no per-item tolerance: the API accepts a whole chunk
// or fails it, and the first failing chunk aborts the action. Chunks that already
// went through stay applied.

import { chunk, type AuthError, type ApiError } from './api-utils.js'
import { DEFAULT_CHUNK_SIZE } from './batch-fetcher.js'
import { type EventSink, noopSink, progress, status } from './events.js'
import * as log from './log.js'
import type { LabelChange, MailboxApi } from './mailbox.js'

export type BulkAction = 'archive' | 'trash'

export const LABEL_CHANGES: Record<BulkAction, LabelChange> = {
  archive: { removeLabelIds: ['INBOX'] },
  trash: { addLabelIds: ['TRASH'] },
}

const ACTION_VERBS: Record<BulkAction, string> = {
  archive: 'Archiving',
  trash: 'Trashing',
}

export async function applyBulkAction(
  api: MailboxApi,
  ids: string[],
  action: BulkAction,
  { chunkSize = DEFAULT_CHUNK_SIZE, onEvent = noopSink }: { chunkSize?: number; onEvent?: EventSink } = {},
): Promise<void | AuthError | ApiError> {
  const total = ids.length
  const change = LABEL_CHANGES[action]
  log.debug(`Performing bulk ${action} on ${total} emails`)

  let processed = 0
  for (const part of chunk(ids, chunkSize)) {
    const res = await api.batchModify({ ids: part, ...change })
    if (res instanceof Error) {
      log.debug(`Bulk ${action} stopped after ${processed}/${total}: ${res.message}`)
      return res
    }
    processed += part.length
    status(onEvent, `${ACTION_VERBS[action]} emails... (${processed}/${total})`)
    progress(onEvent, processed, total)
  }

  log.debug(`Bulk ${action} completed for ${total} emails`)
}
