import { readFile } from 'node:fs/promises'
import type { ConfigSource, SessionStrategy } from '@mtg-price-tracker/core'
import { loadWarehouseCredentials } from '@mtg-price-tracker/core'
import { connectSnowflake } from './executor.js'

export const DEFAULT_TOKEN_PATH = '/snowflake/session/token'

export const AMBIENT_LABEL = 'Connected using active Snowflake session'
export const CREDENTIALS_LABEL = 'Connected to Snowflake using credentials'

export interface StrategyOptions {
  readonly env: ConfigSource
  readonly timeoutMs?: number | undefined
}

/**
 * Session the hosting environment already holds: a container running inside
 * the warehouse gets its host, account and an OAuth token file.
 */
export function ambientSessionStrategy(options: StrategyOptions): SessionStrategy {
  const { env } = options
  return {
    name: 'ambient',
    label: AMBIENT_LABEL,
    async open() {
      const host = env['SNOWFLAKE_HOST']?.trim()
      const account = env['SNOWFLAKE_ACCOUNT']?.trim()
      if (!host || !account) {
        throw new Error('No active session: SNOWFLAKE_HOST and SNOWFLAKE_ACCOUNT are not set')
      }
      const tokenPath = env['SNOWFLAKE_TOKEN_PATH']?.trim() || DEFAULT_TOKEN_PATH
      const token = (await readFile(tokenPath, 'utf8')).trim()
      if (token === '') throw new Error(`No active session: token file is empty (${tokenPath})`)

      return connectSnowflake({
        account,
        authenticator: 'OAUTH',
        token,
        accessUrl: `https://${host}`,
        warehouse: env['SNOWFLAKE_WAREHOUSE']?.trim() || undefined,
        database: env['SNOWFLAKE_DATABASE']?.trim() || undefined,
        schema: env['SNOWFLAKE_SCHEMA']?.trim() || undefined,
        timeoutMs: options.timeoutMs,
      })
    },
  }
}

/** Explicit session built from the `SNOWFLAKE_*` credential set. */
export function credentialSessionStrategy(options: StrategyOptions): SessionStrategy {
  return {
    name: 'credentials',
    label: CREDENTIALS_LABEL,
    async open() {
      const creds = loadWarehouseCredentials(options.env)
      return connectSnowflake({
        account: creds.account,
        username: creds.user,
        password: creds.password,
        warehouse: creds.warehouse,
        database: creds.database,
        schema: creds.schema,
        timeoutMs: options.timeoutMs,
      })
    },
  }
}

/** Ambient first, credentials as the fallback. */
export function defaultSessionStrategies(options: StrategyOptions): SessionStrategy[] {
  return [ambientSessionStrategy(options), credentialSessionStrategy(options)]
}
