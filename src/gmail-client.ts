// Gmail API client for the triage pipeline.
// Wraps the @googleapis/gmail SDK with structured methods, object params and error values.
// Implements MailboxApi, so the pipeline stages never touch the SDK directly.
// Every SDK call goes through gmailBoundary: auth failures become AuthError,
// everything else ApiError, and nothing is retried here.

import { gmail as gmailApi, type gmail_v1 } from '@googleapis/gmail'
import type { OAuth2Client } from 'google-auth-library'
import * as errore from 'errore'
import { mapConcurrent, AuthError, isAuthLikeError, ApiError, MissingDataError } from './api-utils.js'
import type { BatchItem, LabelChange, ListPage, MailboxApi, MessageFormat, MessageRef } from './mailbox.js'

// Sub-requests of one batch in flight at once.
const BATCH_CONCURRENCY = 10

export interface Profile {
  emailAddress: string
  messagesTotal: number
  threadsTotal: number
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function decodeBase64Url(encoded: string): Buffer {
  const base64 = encoded.replace(/-/g, '+').replace(/_/g, '/')
  return Buffer.from(base64, 'base64')
}

/** Boundary helper: wrap a googleapis SDK call, converting auth-like errors to AuthError values.
 *  Non-auth errors are wrapped in ApiError so they remain error values (no throwing).
 *  Original error is preserved as `cause` for debugging. */
function gmailBoundary<T>(email: string, fn: () => Promise<T>) {
  return errore.tryAsync({
    try: fn,
    catch: (err) => isAuthLikeError(err)
      ? new AuthError({ email, reason: String(err) })
      : new ApiError({ reason: String(err), cause: err }),
  })
}

// ---------------------------------------------------------------------------
// GmailClient
// ---------------------------------------------------------------------------

export class GmailClient implements MailboxApi {
  private gmail: gmail_v1.Gmail
  private account: string

  constructor({ auth, account }: { auth: OAuth2Client; account?: string }) {
    this.gmail = gmailApi({ version: 'v1', auth })
    this.account = account ?? 'me'
  }

  // =========================================================================
  // Listing
  // =========================================================================

  async listMessages({
    labelIds,
    query,
    pageToken,
    maxResults,
  }: {
    labelIds?: string[]
    query?: string
    pageToken?: string
    maxResults?: number
  }): Promise<ListPage | AuthError | ApiError> {
    const res = await gmailBoundary(this.account, () =>
      this.gmail.users.messages.list({
        userId: 'me',
        labelIds: labelIds && labelIds.length > 0 ? labelIds : undefined,
        q: query || undefined,
        pageToken: pageToken || undefined,
        maxResults,
      }),
    )
    if (res instanceof Error) return res

    const messages: MessageRef[] = (res.data.messages ?? []).flatMap((m) => (m.id ? [{ id: m.id }] : []))
    return { messages, nextPageToken: res.data.nextPageToken || null }
  }

  // =========================================================================
  // Batched reads
  // =========================================================================

  async batchGetMessages({
    ids,
    format,
    metadataHeaders,
  }: {
    ids: string[]
    format: MessageFormat
    metadataHeaders?: string[]
  }): Promise<BatchItem[] | AuthError> {
    // Boundary: messages.get. Auth errors abort the whole batch via mapConcurrent,
    // any other failure stays attached to its id.
    return mapConcurrent(
      ids,
      async (id): Promise<BatchItem | AuthError> => {
        const res = await gmailBoundary(this.account, () =>
          this.gmail.users.messages.get({
            userId: 'me',
            id,
            format,
            metadataHeaders: format === 'metadata' ? metadataHeaders : undefined,
          }),
        )
        if (res instanceof AuthError) return res
        if (res instanceof Error) return { id, error: res }
        return { id, message: res.data }
      },
      BATCH_CONCURRENCY,
    )
  }

  // =========================================================================
  // Mutations
  // =========================================================================

  async batchModify({ ids, addLabelIds, removeLabelIds }: { ids: string[] } & LabelChange): Promise<void | AuthError | ApiError> {
    if (ids.length === 0) return

    const res = await gmailBoundary(this.account, () =>
      this.gmail.users.messages.batchModify({
        userId: 'me',
        requestBody: { ids, addLabelIds, removeLabelIds },
      }),
    )
    if (res instanceof Error) return res
  }

  // =========================================================================
  // Attachments
  // =========================================================================

  async getAttachment({
    messageId,
    attachmentId,
  }: {
    messageId: string
    attachmentId: string
  }): Promise<Buffer | AuthError | ApiError | MissingDataError> {
    const res = await gmailBoundary(this.account, () =>
      this.gmail.users.messages.attachments.get({
        userId: 'me',
        messageId,
        id: attachmentId,
      }),
    )
    if (res instanceof Error) return res

    const data = res.data.data
    if (!data) return new MissingDataError({ what: 'attachment data', resource: `message ${messageId}` })
    return decodeBase64Url(data)
  }

  // =========================================================================
  // Account / profile
  // =========================================================================

  async getProfile(): Promise<Profile | AuthError | ApiError> {
    const res = await gmailBoundary(this.account, () => this.gmail.users.getProfile({ userId: 'me' }))
    if (res instanceof Error) return res

    return {
      emailAddress: res.data.emailAddress ?? '',
      messagesTotal: res.data.messagesTotal ?? 0,
      threadsTotal: res.data.threadsTotal ?? 0,
    }
  }
}
