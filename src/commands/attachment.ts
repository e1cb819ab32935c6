// Attachment commands: download every inbox attachment from the last N days.
// Files land in <out-dir>/<sender>/<YYYY-MM-DD> - <filename>, mtime set to the email date.

import path from 'node:path'
import type { Goke } from 'goke'
import { z } from 'zod'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { openPipeline, requirePositiveInt } from './context.js'

export function registerAttachmentCommands(cli: Goke) {
  cli
    .command('attachments download', 'Download inbox attachments from the last N days, grouped by sender')
    .option('--days <days>', z.string().describe('How many days back to search'))
    .option('--out-dir <outDir>', z.string().describe('Output directory (default: MAILSIFT_DOWNLOADS_DIR)'))
    .action(async (options) => {
      const days = requirePositiveInt('days', options.days)

      const { runner, done } = await openPipeline({
        downloadsDir: options.outDir ? path.resolve(options.outDir) : undefined,
      })
      const result = await runner.downloadAttachments({ days })
      done()
      if (result instanceof Error) handleCommandError(result)

      out.printYaml({
        senders: Object.entries(result.bySender)
          .sort(([, a], [, b]) => b.count - a.count)
          .map(([sender, totals]) => ({ sender, files: totals.count, size: out.formatSize(totals.size) })),
        failures: result.failures.map((f) => ({
          sender: f.attachment.sender,
          filename: f.attachment.filename,
          reason: f.reason,
        })),
      })

      if (result.fetchFailures.length > 0) {
        out.hint(`${result.fetchFailures.length} message(s) could not be fetched`)
      }
      const untimed = result.saved.filter((s) => !s.timestampApplied).length
      if (untimed > 0) out.hint(`${untimed} file(s) kept their download time instead of the email date`)
      out.success(`Saved ${result.saved.length} attachment(s)`)
      if (result.failures.length > 0) process.exitCode = 1
    })
}
