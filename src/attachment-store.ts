// Attachment persistence: <rootDir>/<sender>/<YYYY-MM-DD> - <filename>[-N].<ext>
// Bytes land in a temp file inside the target directory and are renamed into place,
// so a reader never sees a half-written file under the final name. The file's
// atime/mtime are then set to the email date.
//
// The collision probe is not atomic across processes: one writer per downloads
// tree is assumed (the pipeline runner never runs two exports at once).

import fs from 'node:fs'
import path from 'node:path'
import crypto from 'node:crypto'
import * as errore from 'errore'
import { AttachmentSaveError } from './api-utils.js'
import { formatDay } from './email-utils.js'
import * as log from './log.js'

export const UNNAMED_ATTACHMENT = 'unnamed_attachment'
export const UNKNOWN_SENDER = 'unknown_sender'

// Bytes, not characters: NAME_MAX is 255 bytes, and the saved name also carries
// the 13-byte "YYYY-MM-DD - " prefix and a "-N" collision suffix.
const MAX_SEGMENT_BYTES = 200
// Longer "extensions" are treated as part of the name when truncating.
const MAX_EXTENSION_BYTES = 16

export interface SaveAttachmentInput {
  content: Uint8Array
  sender: string
  filename: string
  emailDate: Date
}

export interface SavedAttachment {
  path: string
  size: number
  /** False when the file was written but its timestamps could not be set. */
  timestampApplied: boolean
}

/**
 * Make a string safe as a single path segment.
 * - Replaces < > : " / \ | ? * and control characters with "_"
 * - Prefixes Windows reserved names (CON, PRN, AUX, NUL, COM1-9, LPT1-9)
 * - Limits the UTF-8 length, keeping the extension and whole code points
 * - Returns "" for "." and ".." so callers fall back to a placeholder
 */
export function sanitizePathSegment(name: string): string {
  let sanitized = name.replace(/[\x00-\x1f<>:"/\\|?*]/g, '_')

  if (sanitized === '.' || sanitized === '..') return ''

  if (/^(CON|PRN|AUX|NUL|COM[1-9]|LPT[1-9])$/i.test(sanitized)) {
    sanitized = `_${sanitized}`
  }

  if (Buffer.byteLength(sanitized) > MAX_SEGMENT_BYTES) {
    let ext = path.extname(sanitized)
    if (Buffer.byteLength(ext) > MAX_EXTENSION_BYTES) ext = ''
    const stem = sanitized.slice(0, sanitized.length - ext.length)
    sanitized = truncateBytes(stem, MAX_SEGMENT_BYTES - Buffer.byteLength(ext)) + ext
  }

  return sanitized
}

function truncateBytes(text: string, maxBytes: number): string {
  let result = ''
  let used = 0
  for (const char of text) {
    const size = Buffer.byteLength(char)
    if (used + size > maxBytes) break
    result += char
    used += size
  }
  return result
}

/** First free path among name, name-1, name-2, ... (suffix goes before the extension). */
export function findUniquePath(dir: string, filename: string): string {
  const candidate = path.join(dir, filename)
  if (!fs.existsSync(candidate)) return candidate

  const ext = path.extname(filename)
  const stem = filename.slice(0, filename.length - ext.length)
  for (let n = 1; ; n++) {
    const next = path.join(dir, `${stem}-${n}${ext}`)
    if (!fs.existsSync(next)) return next
  }
}

export function saveAttachment(
  { content, sender, filename, emailDate }: SaveAttachmentInput,
  { rootDir }: { rootDir: string },
): SavedAttachment | AttachmentSaveError {
  const fail = (reason: string, cause?: unknown) =>
    new AttachmentSaveError({ filename, sender, reason, cause })

  const targetDir = path.join(rootDir, sanitizePathSegment(sender) || UNKNOWN_SENDER)
  const made = errore.tryFn(() => fs.mkdirSync(targetDir, { recursive: true }))
  if (made instanceof Error) return fail(`cannot create ${targetDir}: ${made.message}`, made)
  log.debug(`Ensured download directory exists: ${targetDir}`)

  const safeName = sanitizePathSegment(filename) || UNNAMED_ATTACHMENT
  const finalPath = findUniquePath(targetDir, `${formatDay(emailDate)} - ${safeName}`)
  const tmpPath = path.join(targetDir, `.${crypto.randomUUID()}.tmp`)

  try {
    fs.writeFileSync(tmpPath, content, { flag: 'wx' })
    fs.renameSync(tmpPath, finalPath)
  } catch (err) {
    const cleaned = errore.tryFn(() => fs.rmSync(tmpPath, { force: true }))
    if (cleaned instanceof Error) log.warn(`Could not remove temp file ${tmpPath}: ${cleaned.message}`)
    log.debug(`Failed to save attachment to ${finalPath}: ${String(err)}`)
    return fail(String(err), err)
  }
  log.debug(`Saved ${finalPath}`)

  // A timestamp failure leaves a complete file behind, so the save still counts.
  const stamped = errore.tryFn(() => fs.utimesSync(finalPath, emailDate, emailDate))
  if (stamped instanceof Error) {
    log.warn(`Could not set timestamp of ${finalPath}: ${stamped.message}`)
  }

  return { path: finalPath, size: content.byteLength, timestampApplied: !(stamped instanceof Error) }
}
