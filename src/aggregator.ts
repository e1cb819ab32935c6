// Aggregator: folds message records into one summary group per sender in a single pass.
// Each scan owns a fresh SenderAggregator; nothing is carried over between scans.
// Records without a parsable sender or date are skipped and counted, never reported
// as errors.

import { formatSender, getHeader, parseEmailDate, parseFrom } from './email-utils.js'
import { type EventSink, noopSink, progress, status } from './events.js'
import * as log from './log.js'
import type { MessageRecord } from './mailbox.js'

const REPORT_EVERY = 100

export interface IndividualEmail {
  readonly id: string
  readonly subject: string
  readonly date: Date
}

export interface EmailGroup {
  senderName: string
  senderEmail: string
  count: number
  oldestDate: Date
  newestDate: Date
  newestSubject: string
  totalAttachments: number
  hasUnsubscribe: boolean
  /** Arrival order from the source stream, not chronological. */
  emails: IndividualEmail[]
}

/** Groups are keyed by the lowercased address; the group keeps the first-seen spelling. */
export function senderKey(email: string): string {
  return email.trim().toLowerCase()
}

/** Parts directly under the payload that carry a filename. Nested parts are the
 *  attachment locator's job and are not counted here. */
export function countAttachmentParts(record: MessageRecord): number {
  return (record.payload?.parts ?? []).filter((part) => Boolean(part.filename)).length
}

export class SenderAggregator {
  private groups = new Map<string, EmailGroup>()
  private skippedCount = 0
  private processedCount = 0

  get processed(): number {
    return this.processedCount
  }

  get skipped(): number {
    return this.skippedCount
  }

  /** Fold one record in. Returns the updated group, or null when the record was skipped. */
  add(record: MessageRecord): EmailGroup | null {
    this.processedCount++
    const headers = record.payload?.headers ?? []

    const fromHeader = getHeader(headers, 'From') ?? ''
    const sender = parseFrom(fromHeader)
    if (!sender) {
      log.debug(`Could not parse sender from header: '${fromHeader}'`)
      this.skippedCount++
      return null
    }

    const date = parseEmailDate(getHeader(headers, 'Date') ?? '')
    if (date instanceof Error) {
      log.warn(`Skipping message ${record.id ?? '(no id)'} from ${formatSender(sender)}: ${date.message}`)
      this.skippedCount++
      return null
    }

    const subject = getHeader(headers, 'Subject') ?? ''
    const hasUnsubscribe = Boolean(getHeader(headers, 'List-Unsubscribe')?.trim())
    const attachments = countAttachmentParts(record)
    const email: IndividualEmail = Object.freeze({ id: record.id ?? '', subject, date })

    const key = senderKey(sender.email)
    const group = this.groups.get(key)
    if (!group) {
      const created: EmailGroup = {
        senderName: sender.name || sender.email,
        senderEmail: sender.email,
        count: 1,
        oldestDate: date,
        newestDate: date,
        newestSubject: subject,
        totalAttachments: attachments,
        hasUnsubscribe,
        emails: [email],
      }
      this.groups.set(key, created)
      return created
    }

    group.count++
    group.totalAttachments += attachments
    if (date < group.oldestDate) {
      group.oldestDate = date
    }
    // Ties go to the later message in stream order.
    if (date >= group.newestDate) {
      group.newestDate = date
      group.newestSubject = subject
    }
    if (hasUnsubscribe) {
      group.hasUnsubscribe = true
    }
    group.emails.push(email)
    return group
  }

  result(): Map<string, EmailGroup> {
    return this.groups
  }
}

/** Fold a stream of records into sender groups. `total` is only used for progress
 *  reporting and defaults to the array length when one is passed. */
export function aggregateBySender(
  records: Iterable<MessageRecord>,
  { total, onEvent = noopSink }: { total?: number; onEvent?: EventSink } = {},
): { groups: Map<string, EmailGroup>; skipped: number } {
  const expected = total ?? (Array.isArray(records) ? records.length : undefined)
  const aggregator = new SenderAggregator()
  status(onEvent, expected !== undefined ? `Analyzing ${expected} emails...` : 'Analyzing emails...')

  for (const record of records) {
    aggregator.add(record)
    const done = aggregator.processed
    const shouldReport = done % REPORT_EVERY === 0 || done === expected
    if (shouldReport && expected !== undefined) {
      status(onEvent, `Analyzing emails... (${done}/${expected})`)
      progress(onEvent, done, expected)
    }
  }

  const groups = aggregator.result()
  log.debug(`Grouped ${aggregator.processed} emails into ${groups.size} senders (${aggregator.skipped} skipped)`)
  return { groups, skipped: aggregator.skipped }
}
