// The mailbox API as seen by the pipeline stages.
// GmailClient is the production implementation; tests use an in-process fake.
// Records are the raw Gmail resources (gmail_v1.Schema$Message), parsed at read time
// by the aggregator and the attachment locator.

import type { gmail_v1 } from '@googleapis/gmail'
import type { AuthError, ApiError, MissingDataError } from './api-utils.js'

export type MessageRecord = gmail_v1.Schema$Message
export type MessagePart = gmail_v1.Schema$MessagePart

export interface MessageRef {
  id: string
}

export type MessageFormat = 'metadata' | 'full'

export interface ListPage {
  messages: MessageRef[]
  nextPageToken: string | null
}

/** Outcome of one sub-request inside a batched read. */
export type BatchItem =
  | { id: string; message: MessageRecord }
  | { id: string; error: ApiError }

export interface LabelChange {
  addLabelIds?: string[]
  removeLabelIds?: string[]
}

export interface MailboxApi {
  listMessages(params: {
    labelIds?: string[]
    query?: string
    pageToken?: string
    maxResults?: number
  }): Promise<ListPage | AuthError | ApiError>

  /** One round trip per call. Per-id failures come back inside the items;
   *  only a failure of the session itself is returned as an error. */
  batchGetMessages(params: {
    ids: string[]
    format: MessageFormat
    metadataHeaders?: string[]
  }): Promise<BatchItem[] | AuthError>

  batchModify(params: { ids: string[] } & LabelChange): Promise<void | AuthError | ApiError>

  getAttachment(params: { messageId: string; attachmentId: string }): Promise<Buffer | AuthError | ApiError | MissingDataError>
}
