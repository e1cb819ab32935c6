// Auth commands: login, logout, whoami.
// Tokens live in <MAILSIFT_HOME>/tokens.json; see auth.ts.

import type { Goke } from 'goke'
import { FileSessionProvider } from '../auth.js'
import { GmailClient } from '../gmail-client.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { confirm, requireConfig } from './context.js'

export function registerAuthCommands(cli: Goke) {
  cli
    .command('login', 'Authenticate with Google (opens browser). Prints an authorization URL; on a remote machine paste back the localhost redirect URL containing the auth code.')
    .action(async () => {
      const provider = new FileSessionProvider(requireConfig())
      const session = await provider.login()
      if (session instanceof Error) handleCommandError(session)

      const profile = await new GmailClient({ auth: session }).getProfile()
      if (profile instanceof Error) handleCommandError(profile)
      out.success(`Authenticated as ${profile.emailAddress}`)
      process.exit(0)
    })

  cli
    .command('logout', 'Remove stored credentials')
    .option('--force', 'Skip confirmation')
    .action(async (options) => {
      const provider = new FileSessionProvider(requireConfig())
      if (!provider.hasTokens()) {
        out.hint('Not authenticated')
        return
      }

      if (!options.force && !(await confirm('Remove stored credentials?'))) {
        out.hint('Cancelled')
        return
      }

      provider.logout()
      out.success('Credentials removed')
    })

  cli
    .command('whoami', 'Show the authenticated account')
    .action(async () => {
      const provider = new FileSessionProvider(requireConfig())
      if (!provider.hasTokens()) {
        out.hint('Not authenticated. Run: mailsift login')
        return
      }

      const session = await provider.acquire()
      if (session instanceof Error) handleCommandError(session)
      const profile = await new GmailClient({ auth: session }).getProfile()
      if (profile instanceof Error) handleCommandError(profile)

      out.printYaml({
        email: profile.emailAddress,
        messages_total: profile.messagesTotal,
        threads_total: profile.threadsTotal,
        expires: session.credentials.expiry_date ? new Date(session.credentials.expiry_date).toISOString() : 'unknown',
      })
    })
}
