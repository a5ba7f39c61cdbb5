import type { LevelWithSilent, Logger } from 'pino'
import { pino } from 'pino'

export type { Logger }

export interface LoggerOptions {
  readonly level?: LevelWithSilent | undefined
  readonly name?: string | undefined
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'mtg-price-tracker',
    level: options.level ?? 'info',
    // Credentials never reach the log
    redact: ['password', 'token', '*.password', '*.token'],
  })
}

/** Default for components constructed without a logger. */
export const silentLogger: Logger = pino({ level: 'silent' })
