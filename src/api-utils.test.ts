import { describe, expect, test } from 'vitest'
import { ApiError, AuthError, chunk, isAuthLikeError, isRateLimitError, mapConcurrent } from './api-utils.js'

describe('chunk', () => {
  test('splits into consecutive slices', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]])
    expect(chunk([], 100)).toEqual([])
  })

  test('rejects sizes below one', () => {
    expect(() => chunk([1], 0)).toThrow(RangeError)
  })
})

describe('mapConcurrent', () => {
  test('keeps input order', async () => {
    const result = await mapConcurrent([30, 10, 20], async (ms) => {
      await new Promise((resolve) => setTimeout(resolve, ms))
      return ms * 2
    }, 3)
    expect(result).toEqual([60, 20, 40])
  })

  test('an error value aborts and is returned', async () => {
    const seen: number[] = []
    const result = await mapConcurrent([1, 2, 3, 4], async (n) => {
      seen.push(n)
      return n === 2 ? new AuthError({ email: 'me', reason: 'revoked' }) : n
    }, 1)

    expect(result).toBeInstanceOf(AuthError)
    expect(seen).toEqual([1, 2])
  })
})

describe('error classification', () => {
  test('401 is an auth failure', () => {
    expect(isAuthLikeError({ code: 401 })).toBe(true)
    expect(isAuthLikeError({ response: { status: 401 } })).toBe(true)
  })

  test('quota 403 is a rate limit, not an auth failure', () => {
    const quota = { code: 403, errors: [{ reason: 'userRateLimitExceeded' }] }
    expect(isRateLimitError(quota)).toBe(true)
    expect(isAuthLikeError(quota)).toBe(false)
    expect(isAuthLikeError({ code: 403, errors: [{ reason: 'insufficientPermissions' }] })).toBe(true)
  })

  test('invalid_grant from the token endpoint is an auth failure', () => {
    expect(isAuthLikeError(new Error('invalid_grant'))).toBe(true)
    expect(isAuthLikeError(new Error('socket hang up'))).toBe(false)
  })

  test('tagged errors interpolate their fields', () => {
    expect(new ApiError({ reason: 'boom' }).message).toBe('API call failed: boom')
    expect(new AuthError({ email: 'me', reason: 'expired' }).message).toBe('Authentication failed for me: expired')
  })
})
