// Attachment discovery inside Gmail's nested MIME part tree.
// A part is a downloadable attachment when it has a filename and its bytes are
// stored out of line (body.attachmentId). Small inline bodies do not count.

import { getHeader, parseEmailDate, parseFrom } from './email-utils.js'
import { type EventSink, noopSink, progress, status } from './events.js'
import * as log from './log.js'
import type { MessagePart, MessageRecord } from './mailbox.js'

export interface AttachmentMetadata {
  messageId: string
  attachmentId: string
  /** Sender address, used as the download directory name. */
  sender: string
  emailDate: Date
  filename: string
  size: number
}

/** Depth-first, pre-order walk over an arbitrarily nested part list. */
export function findAttachmentParts(parts: MessagePart[]): MessagePart[] {
  const found: MessagePart[] = []
  for (const part of parts) {
    if (part.filename && part.body?.attachmentId) {
      found.push(part)
    }
    if (part.parts) {
      found.push(...findAttachmentParts(part.parts))
    }
  }
  return found
}

/** Project full-format records into one metadata entry per attachment part.
 *  Records without a parsable sender or date are skipped. */
export function collectAttachments(
  records: MessageRecord[],
  { onEvent = noopSink }: { onEvent?: EventSink } = {},
): AttachmentMetadata[] {
  const total = records.length
  status(onEvent, `Analyzing ${total} emails for attachments...`)

  const result: AttachmentMetadata[] = []
  records.forEach((record, i) => {
    progress(onEvent, i + 1, total)

    const headers = record.payload?.headers ?? []
    const sender = parseFrom(getHeader(headers, 'From') ?? '')
    if (!sender || !record.id) return

    const emailDate = parseEmailDate(getHeader(headers, 'Date') ?? '')
    if (emailDate instanceof Error) {
      log.warn(`Skipping attachments of message ${record.id}: ${emailDate.message}`)
      return
    }

    for (const part of findAttachmentParts(record.payload?.parts ?? [])) {
      const attachmentId = part.body?.attachmentId
      if (!part.filename || !attachmentId) continue
      result.push({
        messageId: record.id,
        attachmentId,
        sender: sender.email,
        emailDate,
        filename: part.filename,
        size: Number(part.body?.size ?? 0),
      })
    }
  })

  log.debug(`Found ${result.length} attachments in ${total} emails`)
  status(onEvent, `Found ${result.length} attachments to download.`)
  return result
}
