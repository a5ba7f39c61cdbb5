import type { ConfigErrorEntry, ConfigSource, LoggerOptions } from '@mtg-price-tracker/core'
import { ConfigError, FULL_SEARCH_LIMIT, MAX_SEARCH_LIMIT, MIN_SEARCH_LIMIT } from '@mtg-price-tracker/core'

type LogLevel = NonNullable<LoggerOptions['level']>

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export interface ServerSettings {
  readonly port: number
  readonly host: string
  readonly logLevel: LogLevel
  readonly searchLimit: number
  /** Warehouse statement timeout; unset leaves the account default. */
  readonly statementTimeoutMs: number | undefined
}

const MAX_STATEMENT_TIMEOUT_MS = 7 * 24 * 60 * 60 * 1000

export const DEFAULT_SETTINGS: ServerSettings = {
  port: 3000,
  host: '0.0.0.0',
  logLevel: 'info',
  searchLimit: FULL_SEARCH_LIMIT,
  statementTimeoutMs: undefined,
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

function readInteger(
  source: ConfigSource,
  key: string,
  fallback: number,
  min: number,
  max: number,
  errors: ConfigErrorEntry[],
): number {
  const raw = source[key]?.trim()
  if (raw === undefined || raw === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min || value > max) {
    errors.push({
      code: 'INVALID_VALUE',
      message: `Configuration key '${key}' must be an integer in ${min}..${max}, got '${raw}'`,
      details: { key, expected: `integer ${min}..${max}`, actual: raw },
    })
    return fallback
  }
  return value
}

/** Read the server settings. Absent keys take their default; malformed ones throw `ConfigError`. */
export function loadServerSettings(source: ConfigSource): ServerSettings {
  const errors: ConfigErrorEntry[] = []

  const port = readInteger(source, 'PORT', DEFAULT_SETTINGS.port, 0, 65_535, errors)
  const searchLimit = readInteger(
    source,
    'SEARCH_LIMIT',
    DEFAULT_SETTINGS.searchLimit,
    MIN_SEARCH_LIMIT,
    MAX_SEARCH_LIMIT,
    errors,
  )

  // 0 marks an absent key; valid values start at 1
  const timeout = readInteger(source, 'STATEMENT_TIMEOUT_MS', 0, 1, MAX_STATEMENT_TIMEOUT_MS, errors)
  const statementTimeoutMs = timeout > 0 ? timeout : undefined

  let logLevel = DEFAULT_SETTINGS.logLevel
  const rawLevel = source['LOG_LEVEL']?.trim().toLowerCase()
  if (rawLevel !== undefined && rawLevel !== '') {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel
    } else {
      errors.push({
        code: 'INVALID_VALUE',
        message: `Configuration key 'LOG_LEVEL' must be one of ${LOG_LEVELS.join(', ')}, got '${rawLevel}'`,
        details: { key: 'LOG_LEVEL', expected: LOG_LEVELS.join('|'), actual: rawLevel },
      })
    }
  }

  const host = source['HOST']?.trim() || DEFAULT_SETTINGS.host

  if (errors.length > 0) throw new ConfigError(errors)
  return { port, host, logLevel, searchLimit, statementTimeoutMs }
}
