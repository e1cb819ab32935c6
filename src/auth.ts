// OAuth2 session provider for mailsift.
// The pipeline only sees a MailboxApi; this module is where the authorized session comes from.
// FileSessionProvider keeps tokens in <MAILSIFT_HOME>/tokens.json (owner-only permissions),
// refreshes them when they expire, and falls back to the browser consent flow
// (local redirect server, or paste the redirect URL on stdin).
// OAuth client id/secret come from MAILSIFT_CLIENT_ID / MAILSIFT_CLIENT_SECRET or from the
// "installed app" credentials JSON downloaded from the Google Cloud Console.

import http from 'node:http'
import readline from 'node:readline'
import fs from 'node:fs'
import path from 'node:path'
import { OAuth2Client, type Credentials } from 'google-auth-library'
import fkill from 'fkill'
import pc from 'picocolors'
import { z } from 'zod'
import * as errore from 'errore'
import { AuthError, MissingDataError, ParseError } from './api-utils.js'
import type { Config } from './config.js'
import { GmailClient } from './gmail-client.js'
import * as log from './log.js'

const SCOPES = ['https://www.googleapis.com/auth/gmail.modify']

// ---------------------------------------------------------------------------
// Session provider
// ---------------------------------------------------------------------------

export interface SessionProvider {
  /** Return a usable session, running the consent flow when nothing is stored. */
  acquire(): Promise<OAuth2Client | AuthError | MissingDataError | ParseError>
  /** Force a token refresh and persist the result. */
  refresh(session: OAuth2Client): Promise<OAuth2Client | AuthError>
}

// ---------------------------------------------------------------------------
// Client credentials
// ---------------------------------------------------------------------------

const clientSecretsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
})

const credentialsFileSchema = z.union([
  z.object({ installed: clientSecretsSchema }).transform((v) => v.installed),
  z.object({ web: clientSecretsSchema }).transform((v) => v.web),
])

const tokensSchema = z
  .object({
    access_token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    expiry_date: z.number().nullish(),
    token_type: z.string().nullish(),
    scope: z.string().optional(),
    id_token: z.string().nullish(),
  })
  .passthrough()

export function readClientSecrets(config: Config): { clientId: string; clientSecret: string } | MissingDataError | ParseError {
  if (config.clientId && config.clientSecret) {
    return { clientId: config.clientId, clientSecret: config.clientSecret }
  }

  if (!fs.existsSync(config.credentialsFile)) {
    return new MissingDataError({
      what: 'OAuth client credentials',
      resource: `${config.credentialsFile} (download an OAuth "Desktop app" client JSON, or set MAILSIFT_CLIENT_ID and MAILSIFT_CLIENT_SECRET)`,
    })
  }

  const raw = errore.tryFn(() => JSON.parse(fs.readFileSync(config.credentialsFile, 'utf-8')) as unknown)
  if (raw instanceof Error) return new ParseError({ what: config.credentialsFile, reason: raw.message })

  const parsed = credentialsFileSchema.safeParse(raw)
  if (!parsed.success) {
    return new ParseError({ what: config.credentialsFile, reason: 'expected an "installed" or "web" client with client_id and client_secret' })
  }
  return { clientId: parsed.data.client_id, clientSecret: parsed.data.client_secret }
}

// ---------------------------------------------------------------------------
// Token storage
// ---------------------------------------------------------------------------

function loadTokens(tokensFile: string): Credentials | null {
  if (!fs.existsSync(tokensFile)) return null
  const raw = errore.tryFn(() => JSON.parse(fs.readFileSync(tokensFile, 'utf-8')) as unknown)
  if (raw instanceof Error) {
    log.warn(`Ignoring unreadable token file ${tokensFile}: ${raw.message}`)
    return null
  }
  const parsed = tokensSchema.safeParse(raw)
  if (!parsed.success) {
    log.warn(`Ignoring malformed token file ${tokensFile}`)
    return null
  }
  return parsed.data
}

export function saveTokens(tokensFile: string, tokens: Credentials): void | AuthError {
  // Owner-only permissions on the state directory and the token file
  const written = errore.tryFn(() => {
    fs.mkdirSync(path.dirname(tokensFile), { recursive: true, mode: 0o700 })
    fs.writeFileSync(tokensFile, JSON.stringify(tokens, null, 2), { mode: 0o600 })
    fs.chmodSync(tokensFile, 0o600)
  })
  if (written instanceof Error) {
    return new AuthError({ email: 'me', reason: `cannot store tokens in ${tokensFile}: ${written.message}`, cause: written })
  }
  log.debug(`Tokens saved to ${tokensFile}`)
}

// ---------------------------------------------------------------------------
// Browser OAuth flow
// ---------------------------------------------------------------------------

export function extractCodeFromInput(input: string): string | null {
  const trimmed = input.trim()
  if (!trimmed) return null

  const url = errore.tryFn(() => new URL(trimmed))
  if (!(url instanceof Error)) {
    const code = url.searchParams.get('code')
    if (code) return code
  }

  if (trimmed.length > 10 && !trimmed.includes(' ')) {
    return trimmed
  }

  return null
}

async function getAuthCodeFromBrowser(oauth2Client: OAuth2Client, port: number): Promise<string> {
  const authUrl = oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
    prompt: 'consent',
  })

  // A previous login that died mid-flow can leave the redirect port taken.
  const freed = await errore.tryAsync({
    try: () => fkill(`:${port}`, { force: true, silent: true }),
    catch: (err) => new Error(String(err)),
  })
  if (freed instanceof Error) log.debug(`Could not free port ${port}: ${freed.message}`)

  process.stderr.write('\n' + pc.bold('1.') + ' Open this URL to authorize:\n\n')
  process.stderr.write('   ' + pc.cyan(pc.underline(authUrl)) + '\n\n')
  process.stderr.write(pc.bold('2.') + ' If running locally, the browser will redirect automatically.\n')
  process.stderr.write(pc.dim('   If running remotely, copy the URL from your browser\'s address bar and paste it below.') + '\n\n')

  return new Promise((resolve, reject) => {
    let resolved = false
    let rl: readline.Interface | null = null

    function finish(code: string) {
      if (resolved) return
      resolved = true
      server.close()
      if (rl) {
        rl.close()
        process.stdin.unref()
      }
      resolve(code)
    }

    function fail(err: Error) {
      if (resolved) return
      resolved = true
      server.close()
      rl?.close()
      reject(err)
    }

    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? '/', `http://localhost:${port}`)
      const code = url.searchParams.get('code')
      const error = url.searchParams.get('error')

      if (error) {
        res.writeHead(400, { 'Content-Type': 'text/html' })
        res.end(`<h1>Error: ${error}</h1>`)
        fail(new Error(error))
        return
      }

      if (code) {
        res.writeHead(200, { 'Content-Type': 'text/html' })
        res.end('<h1>Authentication successful. You can close this tab.</h1>')
        finish(code)
        return
      }

      res.writeHead(400, { 'Content-Type': 'text/html' })
      res.end('<h1>No authorization code received</h1>')
    })

    server.on('error', fail)
    server.listen(port)

    if (process.stdin.isTTY) {
      rl = readline.createInterface({ input: process.stdin, output: process.stderr })
      rl.question(pc.dim('Paste redirect URL here (or wait for auto-redirect): '), (answer) => {
        const code = extractCodeFromInput(answer)
        if (code) {
          finish(code)
        } else {
          process.stderr.write(pc.yellow('Could not extract authorization code from input.') + '\n')
          process.stderr.write(pc.dim('Waiting for browser redirect...') + '\n')
        }
      })
    }
  })
}

// ---------------------------------------------------------------------------
// FileSessionProvider
// ---------------------------------------------------------------------------

export class FileSessionProvider implements SessionProvider {
  private config: Config

  constructor(config: Config) {
    this.config = config
  }

  async acquire(): Promise<OAuth2Client | AuthError | MissingDataError | ParseError> {
    const client = this.createClient()
    if (client instanceof Error) return client

    const tokens = loadTokens(this.config.tokensFile)
    if (tokens) {
      client.setCredentials(tokens)
      if (tokens.expiry_date && tokens.expiry_date < Date.now()) {
        log.debug('Credentials expired, refreshing')
        return this.refresh(client)
      }
      return client
    }

    return this.login(client)
  }

  async refresh(session: OAuth2Client): Promise<OAuth2Client | AuthError> {
    const previous = session.credentials
    const refreshed = await errore.tryAsync({
      try: () => session.refreshAccessToken(),
      catch: (err) => new AuthError({ email: 'me', reason: `token refresh failed (${String(err)}). Run: mailsift login` }),
    })
    if (refreshed instanceof Error) return refreshed

    // Google often omits refresh_token from refresh responses; keep the old one.
    const merged: Credentials = { ...previous, ...refreshed.credentials }
    session.setCredentials(merged)
    const stored = saveTokens(this.config.tokensFile, merged)
    if (stored instanceof Error) return stored
    return session
  }

  /** Run the consent flow even if tokens are stored. */
  async login(existing?: OAuth2Client): Promise<OAuth2Client | AuthError | MissingDataError | ParseError> {
    const client = existing ?? this.createClient()
    if (client instanceof Error) return client

    const exchanged = await errore.tryAsync({
      try: async () => {
        const code = await getAuthCodeFromBrowser(client, this.config.redirectPort)
        process.stderr.write(pc.dim('Got authorization code, exchanging for tokens...') + '\n')
        return client.getToken(code)
      },
      catch: (err) => new AuthError({ email: 'me', reason: String(err) }),
    })
    if (exchanged instanceof Error) return exchanged

    client.setCredentials(exchanged.tokens)
    const stored = saveTokens(this.config.tokensFile, exchanged.tokens)
    if (stored instanceof Error) return stored
    return client
  }

  /** Remove stored tokens. Returns false when there was nothing to remove. */
  logout(): boolean {
    if (!fs.existsSync(this.config.tokensFile)) return false
    fs.rmSync(this.config.tokensFile)
    return true
  }

  hasTokens(): boolean {
    return fs.existsSync(this.config.tokensFile)
  }

  private createClient(): OAuth2Client | MissingDataError | ParseError {
    const secrets = readClientSecrets(this.config)
    if (secrets instanceof Error) return secrets
    return new OAuth2Client({
      clientId: secrets.clientId,
      clientSecret: secrets.clientSecret,
      redirectUri: `http://localhost:${this.config.redirectPort}`,
    })
  }
}

/** Acquire a session and wrap it in a GmailClient. */
export async function getClient(provider: SessionProvider): Promise<GmailClient | AuthError | MissingDataError | ParseError> {
  const session = await provider.acquire()
  if (session instanceof Error) return session
  return new GmailClient({ auth: session })
}
