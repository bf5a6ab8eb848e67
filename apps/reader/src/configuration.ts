/**
 * Global configuration for the reading engine
 * Centralizes all configuration including environment variables and paths
 */

import { existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'

const EnvSchema = z.object({
  READLOCK_SERVER_URL: z.string().url().default('https://api.readlock.app/v1'),
  READLOCK_HOME_DIR: z.string().min(1).optional(),
  READLOCK_API_TOKEN: z.string().min(1).optional(),
  READLOCK_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  READLOCK_HISTORY_LIMIT: z.coerce.number().int().positive().default(100),
  READLOCK_TICK_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
})

class Configuration {
  public readonly serverUrl: string
  public readonly apiToken: string | null
  public readonly homeDir: string
  public readonly logsDir: string
  public readonly stateFile: string
  public readonly requestTimeoutMs: number
  public readonly historyLimit: number
  public readonly tickIntervalMs: number

  // Offline reward estimate rates. The authority's calculation always supersedes these.
  public readonly coinsPerMinute: number = 1
  public readonly expPerPage: number = 5

  // Native heartbeats further than this from the derived elapsed time are logged as drift
  public readonly heartbeatDriftToleranceSeconds: number = 5

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const parsed = EnvSchema.safeParse(env)
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')
      throw new Error(`Invalid reading engine environment: ${fields}`)
    }
    const vars = parsed.data

    this.serverUrl = vars.READLOCK_SERVER_URL.replace(/\/+$/, '')
    this.apiToken = vars.READLOCK_API_TOKEN ?? null
    this.requestTimeoutMs = vars.READLOCK_REQUEST_TIMEOUT_MS
    this.historyLimit = vars.READLOCK_HISTORY_LIMIT
    this.tickIntervalMs = vars.READLOCK_TICK_INTERVAL_MS

    if (vars.READLOCK_HOME_DIR) {
      // Expand ~ to home directory if present
      this.homeDir = vars.READLOCK_HOME_DIR.replace(/^~/, homedir())
    } else {
      this.homeDir = join(homedir(), '.readlock')
    }

    this.logsDir = join(this.homeDir, 'logs')
    this.stateFile = join(this.homeDir, 'reading-state.json')

    if (!existsSync(this.logsDir)) {
      mkdirSync(this.logsDir, { recursive: true })
    }
  }
}

export type { Configuration }

export const configuration: Configuration = new Configuration()
