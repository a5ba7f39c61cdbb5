import type { TabularResult } from '@mtg-price-tracker/validation'
import { ConnectionError, ValidationError } from '@mtg-price-tracker/validation'
import { describe, expect, it } from 'vitest'
import { cacheKey } from '../../src/cache/keys.js'
import { ResultCache } from '../../src/cache/resultCache.js'
import { createPriceQueries, MINIMAL_SEARCH_LIMIT, normalizeFragment } from '../../src/queries/operations.js'
import { createSessionProvider } from '../../src/session/provider.js'
import type { FakeExecutor } from '../helpers.js'
import { failingStrategy, fakeExecutor, manualClock, okStrategy } from '../helpers.js'

// ── Fixtures ───────────────────────────────────────────────────

const SEARCH_ROWS = [
  { NAME: 'Vivi Ornitier', SET_NAME: 'Final Fantasy', ID: 'card-1', AVG_PRICE: 12.5 },
  { NAME: 'Vivi, Black Mage', SET_NAME: 'Final Fantasy', ID: 'card-2', AVG_PRICE: 0.75 },
]

const PRICE_ROWS = [
  { PULL_DATE: '2025-06-02', USD: 10, USD_FOIL: 20 },
  { PULL_DATE: '2025-06-01', USD: 9.5, USD_FOIL: null },
]

const LAUNCH_ROWS = [{ SET_NAME: 'Final Fantasy', DATE_DIFF: 1, AVG_USD: 4.2 }]

function warehouse(overrides: Partial<Record<'search' | 'prices' | 'launch', () => Record<string, unknown>[]>> = {}) {
  return fakeExecutor((sql) => {
    if (sql.includes('GET_CARD_ID')) return overrides.search?.() ?? SEARCH_ROWS
    if (sql.includes('GET_CARD_PRICES')) return overrides.prices?.() ?? PRICE_ROWS
    if (sql.includes('price_after_launch')) return overrides.launch?.() ?? LAUNCH_ROWS
    throw new Error(`unexpected sql: ${sql}`)
  })
}

function setup(executor: FakeExecutor = warehouse()) {
  const clock = manualClock()
  const strategy = okStrategy('credentials', executor)
  const sessions = createSessionProvider({ strategies: [strategy] })
  const cache = new ResultCache<TabularResult>({ now: clock.now })
  const queries = createPriceQueries({ sessions, cache })
  return { queries, cache, clock, strategy, executor }
}

// ── Card Search ────────────────────────────────────────────────

describe('searchCards', () => {
  it('returns rows with a found notice', async () => {
    const { queries } = setup()
    const outcome = await queries.searchCards('vivi', 'final fantasy')

    expect(outcome.status).toBe('ok')
    expect(outcome.rows).toHaveLength(2)
    expect(outcome.notice).toEqual({ level: 'info', message: 'Found 2 cards:' })
    expect(outcome.meta).toMatchObject({ operation: 'cardSearch', cached: false })
  })

  it('binds search fragments instead of inlining them', async () => {
    const { queries, executor } = setup()
    await queries.searchCards("O'Brien", 'set')

    expect(executor.executed[0]).toEqual({
      sql: 'SELECT * FROM TABLE(MTG_COST.PUBLIC.GET_CARD_ID(?, ?)) LIMIT 1000',
      params: ["o'brien", 'set'],
    })
  })

  it('shares one cache entry regardless of input casing', async () => {
    const { queries, executor, cache } = setup()
    const upper = await queries.searchCards('VIVI', 'FINAL')
    const lower = await queries.searchCards('vivi', 'final')

    expect(upper.meta.cacheKey).toBe(lower.meta.cacheKey)
    expect(lower.meta.cached).toBe(true)
    expect(executor.executed).toHaveLength(1)
    expect(cache.size).toBe(1)
  })

  it('honors a caller-chosen limit as part of the key', async () => {
    const { queries, executor } = setup()
    const full = await queries.searchCards('vivi', 'final')
    const minimal = await queries.searchCards('vivi', 'final', { limit: MINIMAL_SEARCH_LIMIT })

    expect(full.meta.cacheKey).not.toBe(minimal.meta.cacheKey)
    expect(executor.executed[1]?.sql).toBe('SELECT * FROM TABLE(MTG_COST.PUBLIC.GET_CARD_ID(?, ?)) LIMIT 100')
  })

  it('rejects an invalid limit before touching the warehouse', async () => {
    const { queries, strategy } = setup()
    await expect(queries.searchCards('vivi', 'final', { limit: 0 })).rejects.toThrow(ValidationError)
    expect(strategy.opened).toBe(0)
  })

  it('reports an empty search as a warning, not an error', async () => {
    const { queries } = setup(warehouse({ search: () => [] }))
    const outcome = await queries.searchCards('zzz', 'nothing')

    expect(outcome.status).toBe('empty')
    expect(outcome.rows).toEqual([])
    expect(outcome.notice).toEqual({ level: 'warning', message: 'No cards found matching your search terms.' })
  })

  it('singular found notice for one card', async () => {
    const { queries } = setup(warehouse({ search: () => [{ ID: 'only' }] }))
    expect((await queries.searchCards('a', 'b')).notice?.message).toBe('Found 1 card:')
  })
})

// ── Price History ──────────────────────────────────────────────

describe('priceHistory', () => {
  it('binds the card id', async () => {
    const { queries, executor } = setup()
    const outcome = await queries.priceHistory(' card-1 ')

    expect(outcome.status).toBe('ok')
    expect(outcome.notice).toBeUndefined()
    expect(executor.executed[0]).toEqual({
      sql: 'SELECT * FROM TABLE(MTG_COST.PUBLIC.GET_CARD_PRICES(?))',
      params: ['card-1'],
    })
    expect(outcome.meta.cacheKey).toBe(cacheKey('priceHistory', ['card-1']))
  })

  it('returns frozen rows', async () => {
    const { queries } = setup()
    const outcome = await queries.priceHistory('card-1')
    expect(Object.isFrozen(outcome.rows)).toBe(true)
    expect(Object.isFrozen(outcome.rows[0])).toBe(true)
  })

  it('reports no data for an unknown card', async () => {
    const { queries } = setup(warehouse({ prices: () => [] }))
    const outcome = await queries.priceHistory('missing')
    expect(outcome.status).toBe('empty')
    expect(outcome.notice).toEqual({ level: 'warning', message: 'No data found for this card ID.' })
  })

  it('requires a card id', async () => {
    const { queries } = setup()
    await expect(queries.priceHistory('')).rejects.toThrow(ValidationError)
  })
})

// ── Launch-Window Aggregate ────────────────────────────────────

describe('launchWindow', () => {
  it('keeps a single cache entry across repeated calls', async () => {
    const { queries, cache, clock, executor } = setup()

    for (let i = 0; i < 5; i++) {
      await queries.launchWindow()
      clock.advance(60_000)
    }

    expect(cache.size).toBe(1)
    expect(executor.executed).toHaveLength(1)
    expect(executor.executed[0]?.sql).toBe('SELECT * FROM price_after_launch')
  })

  it('expires entries by the ttl the cache was built with', async () => {
    const clock = manualClock()
    const executor = warehouse()
    const sessions = createSessionProvider({ strategies: [okStrategy('credentials', executor)] })
    const cache = new ResultCache<TabularResult>({ ttlMs: 1000, now: clock.now })
    const queries = createPriceQueries({ sessions, cache })

    await queries.launchWindow()
    clock.advance(2000)
    const second = await queries.launchWindow()

    expect(second.meta.cached).toBe(false)
    expect(executor.executed).toHaveLength(2)
    expect(queries.cacheStats()).toEqual({ entries: 1, hits: 0, misses: 2, ttlMs: 1000 })
  })

  it('refetches into the same single entry after expiry', async () => {
    const { queries, cache, clock, executor } = setup()
    await queries.launchWindow()
    clock.advance(24 * 60 * 60 * 1000)
    await queries.launchWindow()

    expect(executor.executed).toHaveLength(2)
    expect(cache.size).toBe(1)
  })
})

// ── Query failures ─────────────────────────────────────────────

describe('query failures', () => {
  it('convert to a failed outcome with empty rows and an error notice', async () => {
    const { queries } = setup(
      warehouse({
        launch: () => {
          throw new Error("Object 'PRICE_AFTER_LAUNCH' does not exist or not authorized.")
        },
      }),
    )
    const outcome = await queries.launchWindow()

    expect(outcome.status).toBe('failed')
    expect(outcome.rows).toEqual([])
    expect(outcome.notice).toEqual({
      level: 'error',
      message: "Error querying price after launch data: Object 'PRICE_AFTER_LAUNCH' does not exist or not authorized.",
    })
  })

  it('are distinguishable from empty results', async () => {
    const failing = setup(warehouse({ prices: () => { throw new Error('bad') } }))
    const empty = setup(warehouse({ prices: () => [] }))

    const failed = await failing.queries.priceHistory('x')
    const none = await empty.queries.priceHistory('x')

    expect(failed.rows).toEqual(none.rows)
    expect(failed.status).toBe('failed')
    expect(none.status).toBe('empty')
  })

  it('are not cached', async () => {
    let calls = 0
    const { queries, cache } = setup(
      warehouse({
        search: () => {
          calls++
          if (calls === 1) throw new Error('transient')
          return SEARCH_ROWS
        },
      }),
    )

    expect((await queries.searchCards('vivi', 'final')).status).toBe('failed')
    expect(cache.size).toBe(0)
    expect((await queries.searchCards('vivi', 'final')).status).toBe('ok')
    expect(calls).toBe(2)
  })

  it('leave the other operations unaffected', async () => {
    const { queries } = setup(warehouse({ search: () => { throw new Error('bad') } }))

    expect((await queries.searchCards('a', 'b')).status).toBe('failed')
    expect((await queries.priceHistory('card-1')).status).toBe('ok')
    expect((await queries.launchWindow()).status).toBe('ok')
  })

  it('close the session after a failed query', async () => {
    const { queries, executor } = setup(warehouse({ prices: () => { throw new Error('bad') } }))
    await queries.priceHistory('x')
    expect(executor.closed).toBe(1)
  })
})

// ── Connection failures ────────────────────────────────────────

describe('connection failures', () => {
  it('propagate as ConnectionError without fetching or caching', async () => {
    const cache = new ResultCache<TabularResult>()
    const sessions = createSessionProvider({
      strategies: [failingStrategy('ambient', 'no token'), failingStrategy('credentials', 'refused')],
    })
    const queries = createPriceQueries({ sessions, cache })

    await expect(queries.searchCards('vivi', 'final')).rejects.toThrow(ConnectionError)
    await expect(queries.priceHistory('card-1')).rejects.toThrow(ConnectionError)
    await expect(queries.launchWindow()).rejects.toThrow(ConnectionError)
    expect(cache.size).toBe(0)
  })

  it('never reach the warehouse on a cache hit', async () => {
    const { queries, strategy } = setup()
    await queries.launchWindow()
    await queries.launchWindow()
    expect(strategy.opened).toBe(1)
  })
})

// ── Cache management ───────────────────────────────────────────

describe('clearCache', () => {
  it('forces the next call of every operation to refetch', async () => {
    const { queries, executor } = setup()
    await queries.searchCards('vivi', 'final')
    await queries.priceHistory('card-1')
    await queries.launchWindow()

    expect(queries.clearCache()).toBe(3)

    await queries.searchCards('vivi', 'final')
    await queries.priceHistory('card-1')
    await queries.launchWindow()
    expect(executor.executed).toHaveLength(6)
  })

  it('exposes cache stats', async () => {
    const { queries } = setup()
    await queries.launchWindow()
    await queries.launchWindow()
    expect(queries.cacheStats()).toMatchObject({ entries: 1, hits: 1, misses: 1 })
  })
})

describe('normalizeFragment', () => {
  it('trims and lower-cases', () => {
    expect(normalizeFragment('  Final FANTASY ')).toBe('final fantasy')
  })
})
