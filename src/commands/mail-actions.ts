// Bulk commands: archive / trash everything in the inbox from the given senders.
// Scan → select the senders' message ids → apply the label change → re-scan and print.

import type { Goke } from 'goke'
import { z } from 'zod'
import { senderKey } from '../aggregator.js'
import { ValidationError } from '../api-utils.js'
import type { BulkAction } from '../bulk-actions.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { confirm, openPipeline, optionalPositiveInt } from './context.js'
import { reportFetchFailures } from './senders.js'

const PAST_TENSE: Record<BulkAction, string> = {
  archive: 'Archived',
  trash: 'Trashed',
}

async function runBulk(
  action: BulkAction,
  senders: string[],
  options: { limit?: string; query?: string; dryRun?: boolean; force?: boolean },
): Promise<void> {
  if (senders.length === 0) {
    handleCommandError(new ValidationError({ field: 'senders', reason: 'at least one sender email is required' }))
  }
  const limit = optionalPositiveInt('limit', options.limit)
  const scanOptions = { limit, query: options.query }

  const { runner, done } = await openPipeline()
  const scanned = await runner.scan(scanOptions)
  done()
  if (scanned instanceof Error) handleCommandError(scanned)

  const wanted = new Set(senders.map(senderKey))
  const selected = scanned.groups.filter((g) => wanted.has(senderKey(g.senderEmail)))
  const ids = selected.flatMap((g) => g.emails.map((e) => e.id))

  if (ids.length === 0) {
    out.hint('No inbox messages from the given senders')
    return
  }

  out.printList(out.sortGroupsByCount(selected).map((g) => ({ email: g.senderEmail, emails: g.count })))

  if (options.dryRun) {
    out.hint(`Dry run: would ${action} ${ids.length} message(s)`)
    return
  }

  if (!options.force && !(await confirm(`${action === 'archive' ? 'Archive' : 'Trash'} ${ids.length} message(s)?`))) {
    out.hint('Cancelled')
    return
  }

  const result = await runner.bulkAction(ids, action, scanOptions)
  done()
  if (result instanceof Error) handleCommandError(result)

  out.success(`${PAST_TENSE[action]} ${ids.length} message(s)`)
  out.printList(out.sortGroupsByCount(result.groups).map(out.groupRow))
  reportFetchFailures(result)
}

export function registerMailActionCommands(cli: Goke) {
  cli
    .command('archive [...senders]', 'Archive every inbox message from the given senders')
    .option('--limit <limit>', z.string().describe('Only scan the newest N inbox messages'))
    .option('--query <query>', z.string().describe('Extra Gmail search terms'))
    .option('--dry-run', 'Show what would be archived without changing anything')
    .option('--force', 'Skip confirmation')
    .action(async (senders, options) => {
      await runBulk('archive', senders, options)
    })

  cli
    .command('trash [...senders]', 'Move every inbox message from the given senders to trash')
    .option('--limit <limit>', z.string().describe('Only scan the newest N inbox messages'))
    .option('--query <query>', z.string().describe('Extra Gmail search terms'))
    .option('--dry-run', 'Show what would be trashed without changing anything')
    .option('--force', 'Skip confirmation')
    .action(async (senders, options) => {
      await runBulk('trash', senders, options)
    })
}
