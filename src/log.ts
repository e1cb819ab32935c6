// Diagnostic logging for mailsift.
// Everything goes to stderr so stdout stays machine-parseable YAML (see output.ts).
// Debug lines are only written when MAILSIFT_DEBUG is set or --verbose was passed.

import pc from 'picocolors'

let verbose = Boolean(process.env.MAILSIFT_DEBUG) && process.env.MAILSIFT_DEBUG !== '0'

export function setVerbose(value: boolean): void {
  verbose = value
}

export function debug(msg: string): void {
  if (!verbose) return
  process.stderr.write(pc.dim(`[debug] ${msg}`) + '\n')
}

export function warn(msg: string): void {
  process.stderr.write(pc.yellow(`warning: ${msg}`) + '\n')
}
