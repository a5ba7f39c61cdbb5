import type { QueryParam } from '../types/interfaces.js'

// Warehouse objects; search ranking and aggregation live behind them.
export const CARD_SEARCH_FUNCTION = 'MTG_COST.PUBLIC.GET_CARD_ID'
export const PRICE_HISTORY_FUNCTION = 'MTG_COST.PUBLIC.GET_CARD_PRICES'
export const LAUNCH_WINDOW_VIEW = 'price_after_launch'

export interface BoundQuery {
  readonly sql: string
  readonly params: readonly QueryParam[]
}

/** `limit` must already be a validated integer; it is the only inlined value. */
export function cardSearchQuery(nameFragment: string, setFragment: string, limit: number): BoundQuery {
  return {
    sql: `SELECT * FROM TABLE(${CARD_SEARCH_FUNCTION}(?, ?)) LIMIT ${String(limit)}`,
    params: [nameFragment, setFragment],
  }
}

export function priceHistoryQuery(cardId: string): BoundQuery {
  return {
    sql: `SELECT * FROM TABLE(${PRICE_HISTORY_FUNCTION}(?))`,
    params: [cardId],
  }
}

export function launchWindowQuery(): BoundQuery {
  return { sql: `SELECT * FROM ${LAUNCH_WINDOW_VIEW}`, params: [] }
}
