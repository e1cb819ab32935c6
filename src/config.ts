// Runtime configuration for mailsift, read from MAILSIFT_* environment variables.
// Validated with zod; an invalid value comes back as a ValidationError naming the variable.

import path from 'node:path'
import os from 'node:os'
import { z } from 'zod'
import { ValidationError } from './api-utils.js'

const envSchema = z.object({
  MAILSIFT_HOME: z.string().min(1).optional(),
  MAILSIFT_DOWNLOADS_DIR: z.string().min(1).default('downloads'),
  MAILSIFT_BATCH_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  MAILSIFT_CREDENTIALS_FILE: z.string().min(1).default('credentials.json'),
  MAILSIFT_CLIENT_ID: z.string().min(1).optional(),
  MAILSIFT_CLIENT_SECRET: z.string().min(1).optional(),
  MAILSIFT_REDIRECT_PORT: z.coerce.number().int().min(1).max(65535).default(8089),
})

export interface Config {
  /** State directory; holds tokens.json. */
  homeDir: string
  tokensFile: string
  downloadsDir: string
  batchSize: number
  credentialsFile: string
  clientId?: string
  clientSecret?: string
  redirectPort: number
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config | ValidationError {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return new ValidationError({
      field: issue ? String(issue.path.join('.')) : 'environment',
      reason: issue?.message ?? parsed.error.message,
    })
  }

  const values = parsed.data
  const homeDir = path.resolve(values.MAILSIFT_HOME ?? path.join(os.homedir(), '.mailsift'))
  return {
    homeDir,
    tokensFile: path.join(homeDir, 'tokens.json'),
    downloadsDir: path.resolve(values.MAILSIFT_DOWNLOADS_DIR),
    batchSize: values.MAILSIFT_BATCH_SIZE,
    credentialsFile: path.resolve(values.MAILSIFT_CREDENTIALS_FILE),
    clientId: values.MAILSIFT_CLIENT_ID,
    clientSecret: values.MAILSIFT_CLIENT_SECRET,
    redirectPort: values.MAILSIFT_REDIRECT_PORT,
  }
}
