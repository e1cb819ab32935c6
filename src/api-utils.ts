// Shared API utilities for the Gmail client and the pipeline stages.
// Tagged error values, auth-error detection, chunking and a bounded concurrency helper.
//
// Error handling follows the errore pattern (errors as values):
// - Stages return AuthError / ApiError instead of throwing for remote failures
// - Callers narrow with instanceof, no try/catch or string matching needed
// - See https://errore.org/ for the philosophy
//
// Nothing here retries. A failed listing page or mutate chunk is returned to the
// caller as-is and aborts the running pipeline.

import * as errore from 'errore'

const MAX_CONCURRENCY = 10

/** Exclude Error subtypes from a union. Used by mapConcurrent to strip
 *  error return types from the success array; errors are returned separately. */
type ExcludeError<T> = T extends Error ? never : T

/** Extract Error subtypes from a union. Used by mapConcurrent for the error branch. */
type ExtractError<T> = T extends Error ? T : never

/** Run promises with bounded concurrency, preserving input order in the result.
 *  Error-aware: if any callback returns an Error instance, remaining work is
 *  aborted and that error is returned as a value (no throwing needed).
 *  Callbacks return Error only for fatal failures (auth); per-item failures
 *  should be encoded in the success type instead. */
export async function mapConcurrent<T, R>(
  items: T[],
  fn: (item: T) => Promise<R>,
  concurrency = MAX_CONCURRENCY,
): Promise<ExcludeError<R>[] | ExtractError<R>> {
  const results: ExcludeError<R>[] = []
  let index = 0
  let fatalError: ExtractError<R> | null = null

  async function worker() {
    while (index < items.length && !fatalError) {
      const i = index++
      const result = await fn(items[i]!)
      if (result instanceof Error) {
        fatalError = result as ExtractError<R>
        return
      }
      results[i] = result as ExcludeError<R>
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker())
  await Promise.all(workers)
  if (fatalError) return fatalError
  return results
}

/** Split a list into consecutive chunks of at most `size` items. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`)
  }
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

// ---------------------------------------------------------------------------
// Errors (errore pattern: errors as values, not exceptions)
// ---------------------------------------------------------------------------

/** Returned when authentication fails (expired token, revoked access, etc.).
 *  Callers check with `instanceof AuthError` and TypeScript narrows the type. */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed for $email: $reason',
}) {}

/** Returned when a non-auth API call fails. */
export class ApiError extends errore.createTaggedError({
  name: 'ApiError',
  message: 'API call failed: $reason',
}) {}

/** Returned when a header value cannot be parsed (sender address, date). */
export class ParseError extends errore.createTaggedError({
  name: 'ParseError',
  message: 'Failed to parse $what: $reason',
}) {}

/** Returned when required data is missing from an API response. */
export class MissingDataError extends errore.createTaggedError({
  name: 'MissingDataError',
  message: 'Missing $what for $resource',
}) {}

/** Returned when configuration or user input fails validation. */
export class ValidationError extends errore.createTaggedError({
  name: 'ValidationError',
  message: 'Invalid $field: $reason',
}) {}

/** Returned when a pipeline is requested while another one is still running. */
export class BusyError extends errore.createTaggedError({
  name: 'BusyError',
  message: 'Cannot start $requested while $running is in progress',
}) {}

/** Returned when an attachment cannot be written to disk. */
export class AttachmentSaveError extends errore.createTaggedError({
  name: 'AttachmentSaveError',
  message: 'Failed to save $filename from $sender: $reason',
}) {}

/** Detect auth-like errors from googleapis / google-auth-library structured errors.
 *  This is the boundary layer that converts untyped library exceptions into
 *  typed AuthError values, so string matching is acceptable here. */
export function isAuthLikeError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 401) return true
  if (status === 403 && !isRateLimitError(err)) return true
  const msg = String(err)
  return msg.includes('Invalid credentials') || msg.includes('Unauthorized') || msg.includes('invalid_grant')
}

// ---------------------------------------------------------------------------
// Rate limit detection
// ---------------------------------------------------------------------------

const RATE_LIMIT_REASONS = new Set([
  'userRateLimitExceeded',
  'rateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'limitExceeded',
  'backendError',
])

/** Quota errors come back as 403 but are not auth failures. */
export function isRateLimitError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 429) return true
  if (status === 403) {
    return errorReasons(err).some((reason) => RATE_LIMIT_REASONS.has(reason))
  }
  return false
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function errorStatus(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined
  const response = isRecord(err.response) ? err.response : undefined
  for (const candidate of [err.code, err.status, response?.status]) {
    if (typeof candidate === 'number') return candidate
    if (typeof candidate === 'string' && /^\d+$/.test(candidate)) return Number(candidate)
  }
  return undefined
}

function errorReasons(err: unknown): string[] {
  if (!isRecord(err)) return []
  let errors: unknown = err.errors
  if (!Array.isArray(errors) && isRecord(err.response) && isRecord(err.response.data) && isRecord(err.response.data.error)) {
    errors = err.response.data.error.errors
  }
  if (!Array.isArray(errors)) return []
  return errors.flatMap((e) => (isRecord(e) && typeof e.reason === 'string' ? [e.reason] : []))
}
