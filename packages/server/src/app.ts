import type { ConfigError, ConfigSource, Logger, SessionStrategy, TabularResult } from '@mtg-price-tracker/core'
import {
  createDashboard,
  createPriceQueries,
  createSessionProvider,
  ResultCache,
  SelectionState,
  silentLogger,
  validateWarehouseConfig,
} from '@mtg-price-tracker/core'
import type { ServerSettings } from './config.js'
import type { PriceTrackerServer } from './server.js'
import { createServer } from './server.js'

export interface AppOptions {
  readonly settings: ServerSettings
  readonly strategies: readonly SessionStrategy[]
  readonly logger?: Logger | undefined
}

/** Wire session provider, cache, operations and dashboard behind the HTTP server. */
export function createApp(options: AppOptions): PriceTrackerServer {
  const logger = options.logger ?? silentLogger
  const sessions = createSessionProvider({ strategies: options.strategies, logger })
  const cache = new ResultCache<TabularResult>({ logger })
  const queries = createPriceQueries({
    sessions,
    cache,
    defaultSearchLimit: options.settings.searchLimit,
    logger,
  })
  const dashboard = createDashboard({ queries, sessions, logger })

  return createServer({
    port: options.settings.port,
    host: options.settings.host,
    dashboard,
    queries,
    selection: new SelectionState(),
    logger,
  })
}

/**
 * Startup check: outside a hosted environment the credential set is the only
 * way in, so it must be complete.
 */
export function checkStartupConfig(env: ConfigSource): ConfigError | null {
  const hosted = (env['SNOWFLAKE_HOST']?.trim() ?? '') !== ''
  if (hosted) return null
  return validateWarehouseConfig(env)
}
