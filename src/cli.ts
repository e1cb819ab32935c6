#!/usr/bin/env node

// mailsift: Gmail inbox triage CLI built on goke.
// Entry point: registers all commands, help, and version.
// Uses goke for command parsing with zod schemas for typed options.

import { goke } from 'goke'
import * as log from './log.js'
import { registerAuthCommands } from './commands/auth-cmd.js'
import { registerSenderCommands } from './commands/senders.js'
import { registerMailActionCommands } from './commands/mail-actions.js'
import { registerAttachmentCommands } from './commands/attachment.js'

const cli = goke('mailsift')

// Global options
cli.option('--verbose', 'Print debug logs to stderr (same as MAILSIFT_DEBUG=1)')
if (process.argv.includes('--verbose')) log.setVerbose(true)

// Auth first so login/logout/whoami appear at the top of --help
registerAuthCommands(cli)
registerSenderCommands(cli)
registerMailActionCommands(cli)
registerAttachmentCommands(cli)

cli.help()
cli.version('0.1.0')
cli.parse()
