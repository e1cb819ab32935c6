// Shared command plumbing: config → session → GmailClient → PipelineRunner.
// Any failure here ends the command through handleCommandError.

import readline from 'node:readline'
import { z } from 'zod'
import { ValidationError } from '../api-utils.js'
import { FileSessionProvider, getClient } from '../auth.js'
import { loadConfig, type Config } from '../config.js'
import { PipelineRunner } from '../pipeline.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

export function requireConfig(): Config {
  const config = loadConfig()
  if (config instanceof Error) handleCommandError(config)
  return config
}

export async function openPipeline({ downloadsDir }: { downloadsDir?: string } = {}): Promise<{
  runner: PipelineRunner
  done: () => void
}> {
  const config = requireConfig()
  const client = await getClient(new FileSessionProvider(config))
  if (client instanceof Error) handleCommandError(client)

  const printer = out.createProgressPrinter()
  const runner = new PipelineRunner({
    api: client,
    downloadsDir: downloadsDir ?? config.downloadsDir,
    chunkSize: config.batchSize,
    onEvent: printer.sink,
  })
  return { runner, done: printer.done }
}

const positiveInt = z.coerce.number().int().positive()

/** Parse an optional numeric CLI option; exits with a usage error when invalid. */
export function optionalPositiveInt(field: string, value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined
  const parsed = positiveInt.safeParse(value)
  if (!parsed.success) {
    handleCommandError(new ValidationError({ field: `--${field}`, reason: `expected a positive whole number, got "${String(value)}"` }))
  }
  return parsed.data
}

export function requirePositiveInt(field: string, value: unknown): number {
  const parsed = optionalPositiveInt(field, value)
  if (parsed === undefined) {
    handleCommandError(new ValidationError({ field: `--${field}`, reason: 'is required' }))
  }
  return parsed
}

/** Ask a yes/no question on stderr. Non-interactive sessions must pass --force instead. */
export async function confirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    out.error('Use --force to run non-interactively')
    process.exit(1)
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stderr })
  const answer = await new Promise<string>((resolve) => {
    rl.question(`${question} [y/N] `, resolve)
  })
  rl.close()
  return answer.trim().toLowerCase() === 'y'
}
