// Sender commands: senders (grouped inbox summary), sender <email> (one sender's messages).
// Both run a scan: list inbox → fetch metadata → group by sender.

import type { Goke } from 'goke'
import { z } from 'zod'
import { senderKey } from '../aggregator.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import type { ScanResult } from '../pipeline.js'
import { openPipeline, optionalPositiveInt } from './context.js'

export function reportFetchFailures(result: ScanResult): void {
  if (result.fetchFailures.length > 0) {
    out.hint(`${result.fetchFailures.length} message(s) could not be fetched and were left out`)
  }
  if (result.skipped > 0) {
    out.hint(`${result.skipped} message(s) had no usable sender or date and were left out`)
  }
}

export function registerSenderCommands(cli: Goke) {
  cli
    .command('senders', 'Group inbox messages by sender, largest senders first')
    .option('--limit <limit>', z.string().describe('Only scan the newest N inbox messages'))
    .option('--query <query>', z.string().describe('Extra Gmail search terms (e.g. "older_than:1y")'))
    .option('--min <min>', z.string().describe('Hide senders with fewer than N messages'))
    .action(async (options) => {
      const limit = optionalPositiveInt('limit', options.limit)
      const min = optionalPositiveInt('min', options.min) ?? 1

      const { runner, done } = await openPipeline()
      const result = await runner.scan({ limit, query: options.query })
      done()
      if (result instanceof Error) handleCommandError(result)

      const groups = out.sortGroupsByCount(result.groups).filter((g) => g.count >= min)
      out.printList(groups.map(out.groupRow))
      reportFetchFailures(result)
      out.hint(`${groups.length} sender(s), ${result.listed} message(s) scanned`)
    })

  cli
    .command('sender <email>', 'Show the inbox messages from one sender')
    .option('--limit <limit>', z.string().describe('Only scan the newest N inbox messages'))
    .action(async (email, options) => {
      const limit = optionalPositiveInt('limit', options.limit)

      const { runner, done } = await openPipeline()
      const result = await runner.scan({ limit, query: `from:${email}` })
      done()
      if (result instanceof Error) handleCommandError(result)

      const key = senderKey(email)
      const group = result.groups.find((g) => senderKey(g.senderEmail) === key)
      if (!group) {
        out.hint(`No inbox messages from ${email}`)
        return
      }
      out.printYaml(out.groupDetail(group))
      reportFetchFailures(result)
    })
}
