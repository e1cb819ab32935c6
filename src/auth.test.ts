import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { AuthError, MissingDataError, ParseError } from './api-utils.js'
import { extractCodeFromInput, FileSessionProvider, readClientSecrets, saveTokens } from './auth.js'
import { loadConfig, type Config } from './config.js'

let home: string

beforeEach(() => {
  home = fs.mkdtempSync(path.join(os.tmpdir(), 'mailsift-auth-'))
})

afterEach(() => {
  fs.rmSync(home, { recursive: true, force: true })
})

function config(env: Record<string, string> = {}): Config {
  const loaded = loadConfig({
    MAILSIFT_HOME: home,
    MAILSIFT_CREDENTIALS_FILE: path.join(home, 'credentials.json'),
    ...env,
  })
  if (loaded instanceof Error) throw loaded
  return loaded
}

describe('extractCodeFromInput', () => {
  test('pulls the code out of a redirect URL', () => {
    expect(extractCodeFromInput('http://localhost:8089/?code=4/abc-123&scope=x')).toBe('4/abc-123')
  })

  test('accepts a bare code', () => {
    expect(extractCodeFromInput('  4/0AbCdEfGhIjK  ')).toBe('4/0AbCdEfGhIjK')
  })

  test('rejects short or spaced input', () => {
    expect(extractCodeFromInput('')).toBeNull()
    expect(extractCodeFromInput('abc')).toBeNull()
    expect(extractCodeFromInput('not a code at all')).toBeNull()
  })
})

describe('readClientSecrets', () => {
  test('environment values win', () => {
    expect(readClientSecrets(config({ MAILSIFT_CLIENT_ID: 'test-client', MAILSIFT_CLIENT_SECRET: 'test-secret' }))).toEqual({
      clientId: 'test-client',
      clientSecret: 'test-secret',
    })
  })

  test('reads an installed-app credentials file', () => {
    fs.writeFileSync(
      path.join(home, 'credentials.json'),
      JSON.stringify({ installed: { client_id: 'test-client', client_secret: 'test-secret', redirect_uris: ['http://localhost'] } }),
    )
    expect(readClientSecrets(config())).toEqual({ clientId: 'test-client', clientSecret: 'test-secret' })
  })

  test('missing or malformed files are errors', () => {
    expect(readClientSecrets(config())).toBeInstanceOf(MissingDataError)
    fs.writeFileSync(path.join(home, 'credentials.json'), '{ not json')
    expect(readClientSecrets(config())).toBeInstanceOf(ParseError)
    fs.writeFileSync(path.join(home, 'credentials.json'), JSON.stringify({ other: {} }))
    expect(readClientSecrets(config())).toBeInstanceOf(ParseError)
  })
})

describe('FileSessionProvider', () => {
  test('uses stored tokens without a browser round trip', async () => {
    fs.writeFileSync(
      path.join(home, 'tokens.json'),
      JSON.stringify({ access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: Date.now() + 3_600_000 }),
    )
    const provider = new FileSessionProvider(config({ MAILSIFT_CLIENT_ID: 'test-client', MAILSIFT_CLIENT_SECRET: 'test-secret' }))

    const session = await provider.acquire()
    if (session instanceof Error) throw session
    expect(session.credentials.access_token).toBe('test-access')
    expect(provider.hasTokens()).toBe(true)
  })

  test('logout removes the token file once', () => {
    fs.writeFileSync(path.join(home, 'tokens.json'), '{}')
    const provider = new FileSessionProvider(config())

    expect(provider.logout()).toBe(true)
    expect(provider.hasTokens()).toBe(false)
    expect(provider.logout()).toBe(false)
  })
})

describe('saveTokens', () => {
  test('writes an owner-only token file', () => {
    const tokensFile = path.join(home, 'state', 'tokens.json')
    expect(saveTokens(tokensFile, { access_token: 'test-access' })).toBeUndefined()

    expect(JSON.parse(fs.readFileSync(tokensFile, 'utf-8'))).toEqual({ access_token: 'test-access' })
    expect(fs.statSync(tokensFile).mode & 0o777).toBe(0o600)
  })

  test('an unwritable location comes back as an AuthError', () => {
    const blocker = path.join(home, 'not-a-dir')
    fs.writeFileSync(blocker, '')

    const result = saveTokens(path.join(blocker, 'tokens.json'), { access_token: 'test-access' })
    expect(result).toBeInstanceOf(AuthError)
    expect(result instanceof Error && result.message.includes('cannot store tokens')).toBe(true)
  })
})
