// Pipeline runner: the three user-facing flows built from the stages.
//   scan:      list inbox ids → fetch metadata in chunks → group by sender
//   export:    list ids with attachments → fetch full messages → locate parts → download → save
//   bulk:      archive/trash ids in chunks → re-run scan so the caller sees fresh state
// At most one flow runs at a time; asking for another returns BusyError and starts nothing.

import { AuthError, BusyError, ValidationError, type ApiError } from './api-utils.js'
import { aggregateBySender, type EmailGroup } from './aggregator.js'
import { saveAttachment } from './attachment-store.js'
import { collectAttachments, type AttachmentMetadata } from './attachments.js'
import { DEFAULT_CHUNK_SIZE, resolveMessages, SUMMARY_HEADERS, type FetchFailure } from './batch-fetcher.js'
import { applyBulkAction, type BulkAction } from './bulk-actions.js'
import { type EventSink, noopSink, progress, status } from './events.js'
import * as log from './log.js'
import type { MailboxApi } from './mailbox.js'
import { listMessageRefs } from './paginator.js'

export interface ScanOptions {
  /** Stop after this many inbox messages. */
  limit?: number
  /** Extra Gmail search terms applied on top of the inbox label. */
  query?: string
}

export interface ScanResult {
  groups: EmailGroup[]
  /** Ids returned by the listing. */
  listed: number
  /** Ids whose details could not be fetched. */
  fetchFailures: FetchFailure[]
  /** Fetched messages without a usable sender or date. */
  skipped: number
}

export interface SavedEntry {
  attachment: AttachmentMetadata
  path: string
  timestampApplied: boolean
}

export interface AttachmentFailure {
  attachment: AttachmentMetadata
  reason: string
}

export interface SenderTotals {
  count: number
  size: number
}

export interface DownloadResult {
  saved: SavedEntry[]
  failures: AttachmentFailure[]
  fetchFailures: FetchFailure[]
  bySender: Record<string, SenderTotals>
}

export function attachmentQuery(days: number): string {
  return `has:attachment newer_than:${days}d`
}

export class PipelineRunner {
  private api: MailboxApi
  private chunkSize: number
  private downloadsDir: string
  private onEvent: EventSink
  private running: string | null = null

  constructor({
    api,
    downloadsDir,
    chunkSize = DEFAULT_CHUNK_SIZE,
    onEvent = noopSink,
  }: {
    api: MailboxApi
    downloadsDir: string
    chunkSize?: number
    onEvent?: EventSink
  }) {
    this.api = api
    this.downloadsDir = downloadsDir
    this.chunkSize = chunkSize
    this.onEvent = onEvent
  }

  /** Name of the flow in progress, or null when idle. */
  get busyWith(): string | null {
    return this.running
  }

  scan(options: ScanOptions = {}): Promise<ScanResult | BusyError | AuthError | ApiError> {
    return this.exclusive('scan', () => this.runScan(options))
  }

  downloadAttachments({ days }: { days: number }): Promise<DownloadResult | BusyError | ValidationError | AuthError | ApiError> {
    return this.exclusive('attachment download', () => this.runDownload(days))
  }

  /** Apply the action, then re-scan with `rescan` and return the fresh summary. */
  bulkAction(
    ids: string[],
    action: BulkAction,
    rescan: ScanOptions = {},
  ): Promise<ScanResult | BusyError | AuthError | ApiError> {
    return this.exclusive(action, async () => {
      status(this.onEvent, `${action === 'archive' ? 'Archiving' : 'Trashing'} ${ids.length} emails...`)
      const res = await applyBulkAction(this.api, ids, action, { chunkSize: this.chunkSize, onEvent: this.onEvent })
      if (res instanceof Error) return res
      return this.runScan(rescan)
    })
  }

  // =========================================================================
  // Private
  // =========================================================================

  private async exclusive<T>(name: string, fn: () => Promise<T>): Promise<T | BusyError> {
    if (this.running) return new BusyError({ requested: name, running: this.running })
    this.running = name
    try {
      return await fn()
    } finally {
      this.running = null
    }
  }

  private async runScan({ limit, query }: ScanOptions): Promise<ScanResult | AuthError | ApiError> {
    const refs = await listMessageRefs(this.api, { labelIds: ['INBOX'], query, cap: limit }, { onEvent: this.onEvent })
    if (refs instanceof Error) return refs

    if (refs.length === 0) {
      status(this.onEvent, 'No messages found.')
      return { groups: [], listed: 0, fetchFailures: [], skipped: 0 }
    }

    status(this.onEvent, `Found ${refs.length} emails. Fetching details...`)
    const resolved = await resolveMessages(this.api, refs, {
      format: 'metadata',
      metadataHeaders: SUMMARY_HEADERS,
      chunkSize: this.chunkSize,
      onEvent: this.onEvent,
    })
    if (resolved instanceof Error) return resolved

    const { groups, skipped } = aggregateBySender(resolved.records, { onEvent: this.onEvent })
    status(this.onEvent, `Grouped ${resolved.records.length} emails into ${groups.size} senders.`)
    return {
      groups: [...groups.values()],
      listed: refs.length,
      fetchFailures: resolved.failures,
      skipped,
    }
  }

  private async runDownload(days: number): Promise<DownloadResult | ValidationError | AuthError | ApiError> {
    if (!Number.isInteger(days) || days < 1) {
      return new ValidationError({ field: 'days', reason: `expected a positive whole number, got ${days}` })
    }

    status(this.onEvent, `Searching for emails with attachments from last ${days} days...`)
    const refs = await listMessageRefs(
      this.api,
      { labelIds: ['INBOX'], query: attachmentQuery(days) },
      { onEvent: this.onEvent },
    )
    if (refs instanceof Error) return refs

    const result: DownloadResult = { saved: [], failures: [], fetchFailures: [], bySender: {} }
    if (refs.length === 0) {
      status(this.onEvent, 'No attachments found.')
      return result
    }

    status(this.onEvent, `Found ${refs.length} emails. Fetching details...`)
    const resolved = await resolveMessages(this.api, refs, {
      format: 'full',
      chunkSize: this.chunkSize,
      onEvent: this.onEvent,
    })
    if (resolved instanceof Error) return resolved
    result.fetchFailures = resolved.failures

    const attachments = collectAttachments(resolved.records, { onEvent: this.onEvent })
    const total = attachments.length

    for (const [i, attachment] of attachments.entries()) {
      status(this.onEvent, `Downloading '${attachment.filename}' (${i + 1}/${total})`)
      progress(this.onEvent, i + 1, total)

      const content = await this.api.getAttachment({
        messageId: attachment.messageId,
        attachmentId: attachment.attachmentId,
      })
      if (content instanceof AuthError) return content
      if (content instanceof Error) {
        log.warn(`Download of '${attachment.filename}' from ${attachment.sender} failed: ${content.message}`)
        result.failures.push({ attachment, reason: content.message })
        continue
      }

      const saved = saveAttachment(
        { content, sender: attachment.sender, filename: attachment.filename, emailDate: attachment.emailDate },
        { rootDir: this.downloadsDir },
      )
      if (saved instanceof Error) {
        log.warn(saved.message)
        result.failures.push({ attachment, reason: saved.message })
        continue
      }

      result.saved.push({ attachment, path: saved.path, timestampApplied: saved.timestampApplied })
      const totals = result.bySender[attachment.sender] ?? { count: 0, size: 0 }
      totals.count += 1
      totals.size += attachment.size
      result.bySender[attachment.sender] = totals
    }

    status(
      this.onEvent,
      result.failures.length === 0
        ? 'Download process completed successfully.'
        : `Download finished with ${result.failures.length} failure(s).`,
    )
    return result
  }
}
