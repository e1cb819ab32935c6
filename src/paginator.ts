// Paginator: walks messages.list page by page and collects every matching id.
// Stops on the last page or once `cap` ids are collected (then truncates to exactly cap).
// A failed page aborts the listing: the error is returned and no partial list escapes.

import type { AuthError, ApiError } from './api-utils.js'
import { type EventSink, noopSink, status } from './events.js'
import * as log from './log.js'
import type { MailboxApi, MessageRef } from './mailbox.js'

export interface ListFilter {
  /** Defaults to ['INBOX']. */
  labelIds?: string[]
  /** Gmail search syntax, e.g. "has:attachment newer_than:7d". */
  query?: string
  /** Maximum number of ids to return. */
  cap?: number
  /** Page size hint passed to the API. */
  pageSize?: number
}

export async function listMessageRefs(
  api: MailboxApi,
  filter: ListFilter = {},
  { onEvent = noopSink }: { onEvent?: EventSink } = {},
): Promise<MessageRef[] | AuthError | ApiError> {
  const labelIds = filter.labelIds ?? ['INBOX']
  const { query, cap, pageSize } = filter
  const where = labelIds.join(', ') || 'all mail'

  if (cap !== undefined && cap <= 0) return []

  const refs: MessageRef[] = []
  let pageToken: string | undefined
  let page = 0

  while (true) {
    page++
    status(onEvent, `Fetching email list from ${where} (page ${page})...`)

    const res = await api.listMessages({ labelIds, query, pageToken, maxResults: pageSize })
    if (res instanceof Error) return res

    refs.push(...res.messages)
    pageToken = res.nextPageToken ?? undefined

    if (!pageToken) break
    if (cap !== undefined && refs.length >= cap) break
  }

  const result = cap !== undefined ? refs.slice(0, cap) : refs
  log.debug(`Listed ${result.length} message ids from ${where} in ${page} page(s)`)
  return result
}
