import type {
  Notice,
  OperationName,
  OperationOutcome,
  TabularResult,
} from '@mtg-price-tracker/validation'
import type { ValidationError } from '@mtg-price-tracker/validation'
import { ConnectionError, errorMessage, validateCardId, validateSearchParams } from '@mtg-price-tracker/validation'

import { cacheKey } from '../cache/keys.js'
import type { CacheLookup, CacheStats, ResultCache } from '../cache/resultCache.js'
import type { Logger } from '../debug/logger.js'
import { silentLogger } from '../debug/logger.js'
import type { SessionProvider } from '../session/provider.js'
import { toTabularResult } from './rows.js'
import type { BoundQuery } from './sql.js'
import { cardSearchQuery, launchWindowQuery, priceHistoryQuery } from './sql.js'

// ── Public Types ───────────────────────────────────────────────

/** Row cap of the full dashboard. */
export const FULL_SEARCH_LIMIT = 1000
/** Row cap of the minimal dashboard. */
export const MINIMAL_SEARCH_LIMIT = 100

export interface SearchOptions {
  readonly limit?: number | undefined
}

export interface CreatePriceQueriesOptions {
  readonly sessions: SessionProvider
  readonly cache: ResultCache<TabularResult>
  readonly defaultSearchLimit?: number | undefined
  readonly logger?: Logger | undefined
}

export interface PriceQueries {
  searchCards(nameFragment: string, setFragment: string, options?: SearchOptions): Promise<OperationOutcome>
  priceHistory(cardId: string): Promise<OperationOutcome>
  launchWindow(): Promise<OperationOutcome>
  /** Empty the result cache. Returns the number of entries removed. */
  clearCache(): number
  cacheStats(): CacheStats
}

interface OperationMessages {
  readonly failure: string
  readonly empty: string
  readonly found?: ((count: number) => string) | undefined
}

const MESSAGES: Record<OperationName, OperationMessages> = {
  cardSearch: {
    failure: 'Error searching cards',
    empty: 'No cards found matching your search terms.',
    found: (count) => `Found ${count} card${count === 1 ? '' : 's'}:`,
  },
  priceHistory: {
    failure: 'Error querying data',
    empty: 'No data found for this card ID.',
  },
  launchWindow: {
    failure: 'Error querying price after launch data',
    empty: 'No price after launch data available.',
  },
}

// ── createPriceQueries ─────────────────────────────────────────

export function createPriceQueries(options: CreatePriceQueriesOptions): PriceQueries {
  const { sessions, cache } = options
  const logger = options.logger ?? silentLogger
  const defaultLimit = options.defaultSearchLimit ?? FULL_SEARCH_LIMIT

  async function fetchRows(operation: OperationName, query: BoundQuery): Promise<TabularResult> {
    return sessions.withSession(async ({ session, provenance }) => {
      logger.debug({ operation, strategy: provenance.strategy }, 'executing query')
      const raw = await session.execute(query.sql, query.params)
      return toTabularResult(raw)
    })
  }

  async function run(operation: OperationName, key: string, query: BoundQuery): Promise<OperationOutcome> {
    const messages = MESSAGES[operation]
    const started = Date.now()

    let lookup: CacheLookup<TabularResult>
    try {
      lookup = await cache.lookup(key, () => fetchRows(operation, query))
    } catch (err) {
      // Connection failures end the render pass; everything else stays local to this operation
      if (err instanceof ConnectionError) throw err
      logger.error({ operation, sql: query.sql, err }, 'query failed')
      return {
        status: 'failed',
        rows: [],
        notice: { level: 'error', message: `${messages.failure}: ${errorMessage(err)}` },
        meta: { operation, cacheKey: key, cached: false, durationMs: Date.now() - started },
      }
    }

    const rows = lookup.value
    const meta = { operation, cacheKey: key, cached: lookup.cached, durationMs: Date.now() - started }

    if (rows.length === 0) {
      return { status: 'empty', rows, notice: { level: 'warning', message: messages.empty }, meta }
    }

    const notice: Notice | undefined =
      messages.found !== undefined ? { level: 'info', message: messages.found(rows.length) } : undefined
    return notice !== undefined ? { status: 'ok', rows, notice, meta } : { status: 'ok', rows, meta }
  }

  return {
    async searchCards(nameFragment, setFragment, searchOptions) {
      const name = normalizeFragment(nameFragment)
      const set = normalizeFragment(setFragment)
      const limit = searchOptions?.limit ?? defaultLimit

      const vErr = validateSearchParams({ nameFragment: name, setFragment: set, limit })
      if (vErr !== null) throw vErr

      return run('cardSearch', cacheKey('cardSearch', [name, set, limit]), cardSearchQuery(name, set, limit))
    },

    async priceHistory(cardId) {
      const vErr = validateCardId(cardId)
      if (vErr !== null) throw vErr

      const id = cardId.trim()
      return run('priceHistory', cacheKey('priceHistory', [id]), priceHistoryQuery(id))
    },

    async launchWindow() {
      return run('launchWindow', cacheKey('launchWindow'), launchWindowQuery())
    },

    clearCache() {
      return cache.clearAll()
    },

    cacheStats() {
      return cache.stats()
    },
  }
}

// ── Helpers ────────────────────────────────────────────────────

/**
 * Failed outcome for parameters rejected before any lookup. The cache key is
 * empty since nothing was keyed.
 */
export function rejectedOutcome(operation: OperationName, err: ValidationError): OperationOutcome {
  const reasons = err.errors.map((e) => e.message).join('; ')
  return {
    status: 'failed',
    rows: [],
    notice: { level: 'error', message: `${MESSAGES[operation].failure}: ${reasons}` },
    meta: { operation, cacheKey: '', cached: false, durationMs: 0 },
  }
}

/** Search fragments are matched case-insensitively by the warehouse; key them the same way. */
export function normalizeFragment(fragment: string): string {
  return fragment.trim().toLowerCase()
}
