/**
 * Process-wide logger.
 *
 * Every line lands in a per-process log file under the configured logs dir.
 * info/warn/error are echoed to the console; debug only when DEBUG is set.
 */

import chalk from 'chalk'
import { appendFileSync } from 'node:fs'
import { join } from 'node:path'
import { configuration } from '@/configuration'

type Level = 'debug' | 'info' | 'warn' | 'error'

const LARGE_JSON_LIMIT = 2_000

function stamp(): string {
  return new Date().toISOString()
}

function render(args: unknown[]): string {
  return args
    .map((arg) => {
      if (typeof arg === 'string') return arg
      if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`
      try {
        return JSON.stringify(arg)
      } catch {
        return String(arg)
      }
    })
    .join(' ')
}

class Logger {
  readonly logFilePath: string
  private writeFailureReported = false

  constructor(logsDir: string = configuration.logsDir) {
    const sessionStamp = stamp().replace(/[:.]/g, '-')
    this.logFilePath = join(logsDir, `${sessionStamp}-pid-${process.pid}.log`)
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args)
    if (process.env.DEBUG) {
      console.log(chalk.gray(`${message} ${render(args)}`.trimEnd()))
    }
  }

  /**
   * Logs a payload that may be large; the console copy is truncated, the file copy is not.
   */
  debugLargeJson(message: string, payload: unknown): void {
    const json = render([payload])
    this.write('debug', message, [json])
    if (process.env.DEBUG) {
      const shown = json.length > LARGE_JSON_LIMIT ? `${json.slice(0, LARGE_JSON_LIMIT)}... (${json.length} chars)` : json
      console.log(chalk.gray(`${message} ${shown}`))
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args)
    console.log(`${message} ${render(args)}`.trimEnd())
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args)
    console.warn(chalk.yellow(`${message} ${render(args)}`.trimEnd()))
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args)
    console.error(chalk.red(`${message} ${render(args)}`.trimEnd()))
  }

  private write(level: Level, message: string, args: unknown[]): void {
    const line = `[${stamp()}] ${level.toUpperCase()} ${message} ${render(args)}`.trimEnd()
    try {
      appendFileSync(this.logFilePath, `${line}\n`, 'utf8')
    } catch (error) {
      // Reported once per logger on stderr; later failed writes are dropped.
      if (this.writeFailureReported) return
      this.writeFailureReported = true
      console.error(chalk.red(`[LOGGER] Failed to write ${this.logFilePath}: ${render([error])}`))
    }
  }
}

export { Logger }

export const logger = new Logger()
