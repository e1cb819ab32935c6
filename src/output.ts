// Output formatting utilities for the mailsift CLI.
// Data goes to stdout as YAML (js-yaml); hints, progress and errors go to stderr.
// In TTY mode YAML keys are dimmed and list dashes cyan; piped output stays plain.
// Line wrapping is disabled (lineWidth Infinity) everywhere.

import yaml from 'js-yaml'
import pc from 'picocolors'
import type { EmailGroup } from './aggregator.js'
import { AuthError, ValidationError } from './api-utils.js'
import { formatDay } from './email-utils.js'
import type { EventSink } from './events.js'

const isTTY = process.stdout.isTTY ?? false

// ---------------------------------------------------------------------------
// YAML output
// ---------------------------------------------------------------------------

/**
 * Colorize a YAML string for TTY output.
 * List dashes are cyan, keys are dimmed, values stay at terminal default.
 */
function colorizeYaml(yamlStr: string): string {
  return yamlStr.replace(
    /^(\s*)(- )?([\w_][\w_ ]*?)(:)/gm,
    (_match, indent: string, dash: string | undefined, key: string, colon: string) => {
      const prefix = dash ? `${indent}${pc.cyan(dash)}` : indent
      return `${prefix}${pc.dim(key)}${pc.dim(colon)}`
    },
  )
}

export function dumpYaml(data: unknown): string {
  return yaml.dump(data, {
    lineWidth: Infinity,
    noRefs: true,
    quotingType: "'",
    sortKeys: false,
  })
}

/** Print any value as YAML to stdout. */
export function printYaml(data: unknown): void {
  const str = dumpYaml(data)
  process.stdout.write(isTTY ? colorizeYaml(str) : str)
}

/**
 * Print a list of items as YAML.
 * Output shape:
 *   items:
 *     - key: value
 */
export function printList(items: Record<string, unknown>[]): void {
  printYaml({ items })
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

/** Largest senders first; equal counts fall back to the most recent sender. */
export function sortGroupsByCount(groups: EmailGroup[]): EmailGroup[] {
  return [...groups].sort(
    (a, b) => b.count - a.count || b.newestDate.getTime() - a.newestDate.getTime(),
  )
}

/** One row of the sender table. */
export function groupRow(group: EmailGroup): Record<string, unknown> {
  return {
    sender: group.senderName,
    email: group.senderEmail,
    emails: group.count,
    latest_subject: group.newestSubject || '(no subject)',
    newest: formatDay(group.newestDate),
    attachments: group.totalAttachments,
    unsubscribe: group.hasUnsubscribe,
  }
}

/** Full view of one sender: summary plus its messages, newest first. */
export function groupDetail(group: EmailGroup): Record<string, unknown> {
  const emails = [...group.emails].sort((a, b) => b.date.getTime() - a.date.getTime())
  return {
    sender: group.senderName,
    email: group.senderEmail,
    count: group.count,
    date_range: `${formatDay(group.oldestDate)} to ${formatDay(group.newestDate)}`,
    attachments: group.totalAttachments,
    unsubscribe: group.hasUnsubscribe,
    messages: emails.map((e) => ({
      id: e.id,
      date: e.date.toISOString().slice(0, 16).replace('T', ' '),
      subject: e.subject || '(no subject)',
    })),
  }
}

// ---------------------------------------------------------------------------
// Progress rendering
// ---------------------------------------------------------------------------

export interface TextStream {
  write(chunk: string): unknown
}

/**
 * Turn pipeline events into stderr output.
 * On a TTY the current status and counter share one line that is rewritten in place;
 * otherwise every status becomes its own hint line and counters are dropped
 * (status messages already carry them).
 */
export function createProgressPrinter({
  stream = process.stderr,
  tty = process.stderr.isTTY ?? false,
}: { stream?: TextStream; tty?: boolean } = {}): { sink: EventSink; done: () => void } {
  let current = ''
  let counter = ''
  let dirty = false

  const render = () => {
    stream.write(`\r\x1b[2K${pc.dim(current)}${counter ? ' ' + pc.cyan(counter) : ''}`)
    dirty = true
  }

  const sink: EventSink = (event) => {
    if (event.type === 'status') {
      current = event.message
      counter = ''
      if (tty) render()
      else stream.write(pc.dim(`# ${event.message}`) + '\n')
      return
    }
    if (!tty) return
    const pct = event.total > 0 ? Math.floor((event.processed / event.total) * 100) : 100
    counter = `[${event.processed}/${event.total}] ${pct}%`
    render()
  }

  const done = () => {
    if (dirty) stream.write('\n')
    dirty = false
  }

  return { sink, done }
}

// ---------------------------------------------------------------------------
// Stderr hints (data to stdout, hints to stderr)
// ---------------------------------------------------------------------------

export function hint(msg: string): void {
  process.stderr.write(pc.dim(`# ${msg}`) + '\n')
}

export function success(msg: string): void {
  process.stderr.write(pc.green(msg) + '\n')
}

export function error(msg: string): void {
  process.stderr.write(pc.red(msg) + '\n')
}

// ---------------------------------------------------------------------------
// Centralized command error handler (errore pattern)
// ---------------------------------------------------------------------------

/** Handle any error from a pipeline or client call in a command context.
 *  Prints a user-friendly message to stderr and exits.
 *  AuthError gets a "Try: mailsift login" hint; all others print their message. */
export function handleCommandError(err: Error): never {
  if (err instanceof AuthError) {
    error(`${err.message}. Try: mailsift login`)
  } else if (err instanceof ValidationError) {
    error(`${err.message}. See: mailsift --help`)
  } else {
    error(err.message)
  }
  process.exit(1)
}
