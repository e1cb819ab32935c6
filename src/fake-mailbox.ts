// In-memory MailboxApi for tests: paged listing, batched reads with injectable
// per-id failures, label changes and attachment bodies. Records every call.

import { ApiError, AuthError } from './api-utils.js'
import type { BatchItem, LabelChange, ListPage, MailboxApi, MessagePart, MessageRecord } from './mailbox.js'

export interface MessageSpec {
  id: string
  from: string
  date: string
  subject?: string
  unsubscribe?: string
  labelIds?: string[]
  parts?: MessagePart[]
}

export function makeMessage({ id, from, date, subject, unsubscribe, labelIds = ['INBOX'], parts }: MessageSpec): MessageRecord {
  const headers = [
    { name: 'From', value: from },
    { name: 'Date', value: date },
  ]
  if (subject !== undefined) headers.push({ name: 'Subject', value: subject })
  if (unsubscribe !== undefined) headers.push({ name: 'List-Unsubscribe', value: unsubscribe })
  return { id, labelIds: [...labelIds], payload: { headers, parts } }
}

export class FakeMailbox implements MailboxApi {
  messages: MessageRecord[]
  pageSize = 100
  /** Ids whose batched read comes back as a per-item failure. */
  failingIds = new Set<string>()
  /** 1-based list call that fails, if any. */
  failListCall: number | null = null
  /** 1-based batchModify call that fails, if any. */
  failModifyCall: number | null = null
  authFailure = false
  attachments = new Map<string, Buffer>()

  listCalls: { labelIds?: string[]; query?: string; pageToken?: string }[] = []
  batchCalls: { ids: string[]; format: string }[] = []
  modifyCalls: ({ ids: string[] } & LabelChange)[] = []
  attachmentCalls: string[] = []

  constructor(messages: MessageRecord[] = []) {
    this.messages = messages
  }

  async listMessages({ labelIds, query, pageToken, maxResults }: {
    labelIds?: string[]
    query?: string
    pageToken?: string
    maxResults?: number
  }): Promise<ListPage | AuthError | ApiError> {
    this.listCalls.push({ labelIds, query, pageToken })
    if (this.authFailure) return new AuthError({ email: 'me', reason: 'token revoked' })
    if (this.failListCall === this.listCalls.length) return new ApiError({ reason: 'listing unavailable' })

    const matching = this.messages.filter((m) => (labelIds ?? []).every((l) => m.labelIds?.includes(l)))
    const start = pageToken ? Number(pageToken) : 0
    const size = maxResults ?? this.pageSize
    const page = matching.slice(start, start + size)
    const next = start + size < matching.length ? String(start + size) : null
    return { messages: page.map((m) => ({ id: m.id ?? '' })), nextPageToken: next }
  }

  async batchGetMessages({ ids, format }: { ids: string[]; format: 'metadata' | 'full' }): Promise<BatchItem[] | AuthError> {
    this.batchCalls.push({ ids, format })
    if (this.authFailure) return new AuthError({ email: 'me', reason: 'token revoked' })

    return ids.map((id): BatchItem => {
      const message = this.messages.find((m) => m.id === id)
      if (this.failingIds.has(id) || !message) {
        return { id, error: new ApiError({ reason: `message ${id} unavailable` }) }
      }
      return { id, message }
    })
  }

  async batchModify({ ids, addLabelIds = [], removeLabelIds = [] }: { ids: string[] } & LabelChange): Promise<void | AuthError | ApiError> {
    this.modifyCalls.push({ ids, addLabelIds, removeLabelIds })
    if (this.authFailure) return new AuthError({ email: 'me', reason: 'token revoked' })
    if (this.failModifyCall === this.modifyCalls.length) return new ApiError({ reason: 'modify rejected' })

    for (const message of this.messages) {
      if (!message.id || !ids.includes(message.id)) continue
      let labels = (message.labelIds ?? []).filter((l) => !removeLabelIds.includes(l))
      labels = [...labels, ...addLabelIds.filter((l) => !labels.includes(l))]
      // Trashed messages leave the inbox.
      if (labels.includes('TRASH')) labels = labels.filter((l) => l !== 'INBOX')
      message.labelIds = labels
    }
  }

  async getAttachment({ messageId, attachmentId }: { messageId: string; attachmentId: string }): Promise<Buffer | AuthError | ApiError> {
    const key = `${messageId}/${attachmentId}`
    this.attachmentCalls.push(key)
    if (this.authFailure) return new AuthError({ email: 'me', reason: 'token revoked' })
    const content = this.attachments.get(key)
    if (!content) return new ApiError({ reason: `attachment ${key} not found` })
    return content
  }
}
