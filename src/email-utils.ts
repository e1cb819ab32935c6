// Header parsing utilities.
// Wraps the `email-addresses` package (RFC 5322 parser) with simpler return types
// and normalizes RFC 2822 Date headers to UTC instants.

import { parseFrom as _parseFrom } from 'email-addresses'
import type { gmail_v1 } from '@googleapis/gmail'
import { ParseError } from './api-utils.js'

export interface Sender {
  name?: string
  email: string
}

/** Case-insensitive header lookup. Returns the first match, or null when absent. */
export function getHeader(
  headers: gmail_v1.Schema$MessagePartHeader[] | undefined,
  name: string,
): string | null {
  const wanted = name.toLowerCase()
  return headers?.find((h) => h.name?.toLowerCase() === wanted)?.value ?? null
}

/**
 * Parse an RFC 5322 "From" header into a { name, email } object.
 * Group syntax yields the first member. Returns null when no address can be
 * extracted, so callers can drop the message instead of inventing a sender.
 */
export function parseFrom(fromHeader: string): Sender | null {
  if (!fromHeader.trim()) return null

  // atInDisplayName keeps the common `addr@x.com <addr@x.com>` form parseable.
  const parsed = _parseFrom({ input: fromHeader, atInDisplayName: true })
  const first = parsed?.[0]
  if (!first) return null

  if (first.type === 'group') {
    const member = first.addresses?.[0]
    if (!member?.address) return null
    return { name: member.name || first.name || undefined, email: member.address }
  }

  if (!first.address) return null
  return { name: first.name || undefined, email: first.address }
}

export function formatSender(sender: Sender): string {
  if (sender.name && sender.name !== sender.email) {
    return `${sender.name} <${sender.email}>`
  }
  return sender.email
}

// A trailing zone: numeric offset, Z, or one of the RFC 2822 zone names.
const ZONE_SUFFIX = /(?:[+-]\d{2}:?\d{2}|Z|\b(?:GMT|UTC|UT|[ECMP][SD]T))$/i
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T/
// Zone abbreviations we do not know (CEST, IST, ...) carry no usable offset.
const UNKNOWN_ZONE = /\s+[A-Z]{2,5}$/
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']
const RFC_DAY = /\b(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\.?\s+(\d{4})\b/
const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})/

/** Day, month (0-based) and year as written, when the header has a recognizable calendar date. */
function writtenDay(text: string): { day: number; month: number; year: number } | null {
  const iso = ISO_DAY.exec(text)
  if (iso) return { year: Number(iso[1]), month: Number(iso[2]) - 1, day: Number(iso[3]) }
  const rfc = RFC_DAY.exec(text)
  if (!rfc) return null
  const month = MONTHS.indexOf(String(rfc[2]).toLowerCase())
  if (month === -1) return null
  return { day: Number(rfc[1]), month, year: Number(rfc[3]) }
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate()
}

/**
 * Parse a Date header into an absolute instant.
 * Trailing comments like "(PST)" are dropped. A date without a zone, or with a
 * zone abbreviation not in ZONE_SUFFIX, is read as UTC so every comparison
 * happens on the same clock. Days past the end of their month are rejected.
 */
export function parseEmailDate(dateHeader: string): Date | ParseError {
  const cleaned = dateHeader.replace(/\s*\([^)]*\)\s*$/, '').trim()
  if (!cleaned) return new ParseError({ what: 'date', reason: 'empty Date header' })

  // Date would roll 30 Feb over into March.
  const written = writtenDay(cleaned)
  if (written && (written.month < 0 || written.month > 11 || written.day < 1 || written.day > daysInMonth(written.year, written.month))) {
    return new ParseError({ what: 'date', reason: `day out of range in "${dateHeader}"` })
  }

  let normalized = cleaned
  if (!ZONE_SUFFIX.test(cleaned)) {
    const naive = cleaned.replace(UNKNOWN_ZONE, '')
    normalized = ISO_DATE_TIME.test(naive) ? `${naive}Z` : `${naive} +0000`
  }

  const date = new Date(normalized)
  if (Number.isNaN(date.getTime())) {
    return new ParseError({ what: 'date', reason: `unrecognized value "${dateHeader}"` })
  }
  return date
}

/** YYYY-MM-DD of the instant in UTC. */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10)
}
