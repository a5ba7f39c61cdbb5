import type { HealthCheckResult, Notice, OperationName, OperationOutcome, Provenance, Row } from '@mtg-price-tracker/validation'
import { ValidationError } from '@mtg-price-tracker/validation'

import type { CacheStats } from '../cache/resultCache.js'
import type { Logger } from '../debug/logger.js'
import { silentLogger } from '../debug/logger.js'
import type { LaunchSummary } from '../presentation/launchSummary.js'
import { summarizeLaunchWindow } from '../presentation/launchSummary.js'
import type { PriceSummary } from '../presentation/priceSummary.js'
import { summarizePrices } from '../presentation/priceSummary.js'
import { searchTable } from '../presentation/searchTable.js'
import type { PriceQueries } from '../queries/operations.js'
import { rejectedOutcome } from '../queries/operations.js'
import { measureHealth } from '../session/health.js'
import type { SessionProvider } from '../session/provider.js'

// ── Public Types ───────────────────────────────────────────────

export interface RenderInput {
  readonly nameFragment: string
  readonly setFragment: string
  readonly cardId: string
  readonly searchLimit?: number | undefined
}

export interface SearchSection {
  readonly outcome: OperationOutcome
  readonly table: readonly Row[]
}

export type PriceSection =
  | { readonly kind: 'skipped'; readonly notice: Notice }
  | { readonly kind: 'queried'; readonly outcome: OperationOutcome; readonly summary: PriceSummary | null }

export interface LaunchSection {
  readonly outcome: OperationOutcome
  readonly summary: LaunchSummary | null
}

export interface DashboardView {
  readonly connection: { readonly provenance: Provenance; readonly notice: Notice }
  /** Null when either search fragment is blank. */
  readonly search: SearchSection | null
  readonly prices: PriceSection
  readonly launch: LaunchSection
  /** Every notice of the pass, top to bottom. */
  readonly notices: readonly Notice[]
}

export interface CacheInfo extends CacheStats {
  readonly policy: readonly string[]
}

export interface Dashboard {
  /**
   * One top-to-bottom pass. Rejects with `ConnectionError` when no session can be
   * acquired, before or during the pass; query failures stay inside their section.
   */
  render(input: RenderInput): Promise<DashboardView>
  clearCache(): { readonly removed: number; readonly notice: Notice }
  cacheInfo(): CacheInfo
  healthCheck(): Promise<HealthCheckResult>
}

export interface CreateDashboardOptions {
  readonly queries: PriceQueries
  readonly sessions: SessionProvider
  readonly logger?: Logger | undefined
}

export const CACHE_POLICY_TEXT = [
  'Card searches: Cached for 24 hours',
  'Price data: Cached for 24 hours (updates once daily)',
  'Sessions: Fresh connections on-demand',
] as const

// ── createDashboard ────────────────────────────────────────────

/** Rejected parameters fail their own section only. */
async function withinSection(
  operation: OperationName,
  fn: () => Promise<OperationOutcome>,
): Promise<OperationOutcome> {
  try {
    return await fn()
  } catch (err) {
    if (err instanceof ValidationError) return rejectedOutcome(operation, err)
    throw err
  }
}

export function createDashboard(options: CreateDashboardOptions): Dashboard {
  const { queries, sessions } = options
  const logger = options.logger ?? silentLogger

  return {
    async render(input) {
      const started = Date.now()
      const notices: Notice[] = []

      // Connection check first: a failure here stops the pass before any query
      const provenance = await sessions.withSession(async (acquired) => acquired.provenance)
      const connectionNotice: Notice = { level: 'success', message: provenance.label }
      notices.push(connectionNotice)

      let search: SearchSection | null = null
      if (input.nameFragment.trim().length > 0 && input.setFragment.trim().length > 0) {
        const outcome = await withinSection('cardSearch', () =>
          queries.searchCards(input.nameFragment, input.setFragment, { limit: input.searchLimit }),
        )
        if (outcome.notice !== undefined) notices.push(outcome.notice)
        search = { outcome, table: searchTable(outcome.rows) }
      }

      let prices: PriceSection
      if (input.cardId.trim().length > 0) {
        const outcome = await withinSection('priceHistory', () => queries.priceHistory(input.cardId))
        if (outcome.notice !== undefined) notices.push(outcome.notice)
        prices = { kind: 'queried', outcome, summary: outcome.status === 'ok' ? summarizePrices(outcome.rows) : null }
      } else {
        const notice: Notice = { level: 'info', message: 'Please enter a card ID to view price data.' }
        notices.push(notice)
        prices = { kind: 'skipped', notice }
      }

      const launchOutcome = await queries.launchWindow()
      if (launchOutcome.notice !== undefined) notices.push(launchOutcome.notice)
      const launch: LaunchSection = {
        outcome: launchOutcome,
        summary: launchOutcome.status === 'ok' ? summarizeLaunchWindow(launchOutcome.rows) : null,
      }

      logger.debug({ durationMs: Date.now() - started, notices: notices.length }, 'render pass complete')
      return { connection: { provenance, notice: connectionNotice }, search, prices, launch, notices }
    },

    clearCache() {
      const removed = queries.clearCache()
      logger.info({ removed }, 'result cache cleared')
      return { removed, notice: { level: 'success', message: 'Cache cleared!' } }
    },

    cacheInfo() {
      return { ...queries.cacheStats(), policy: CACHE_POLICY_TEXT }
    },

    async healthCheck() {
      return measureHealth(sessions)
    },
  }
}
