import type { TabularResult } from '@mtg-price-tracker/validation'

import { formatDate, formatUsd, mean, toDate, toNumber } from './format.js'

export interface PricePoint {
  readonly pullDate: Date
  readonly usd: number | null
  readonly usdFoil: number | null
}

export interface PriceStats {
  readonly average: number
  readonly minimum: number
  readonly maximum: number
  readonly dataPoints: number
}

export interface LatestPrices {
  readonly regular: string
  readonly foil: string
  readonly lastUpdated: string
}

export interface ChartPoint {
  readonly date: string
  readonly regular: number | null
  readonly foil: number | null
}

export interface HistoryRow {
  readonly pullDate: string
  readonly regular: string
  readonly foil: string
}

export interface PriceSummary {
  readonly points: readonly PricePoint[]
  readonly latest: LatestPrices | null
  readonly chart: readonly ChartPoint[]
  readonly history: readonly HistoryRow[]
  readonly regular: PriceStats | null
  readonly foil: PriceStats | null
}

export const CHART_SERIES = { regular: 'Regular Price', foil: 'Foil Price' } as const

/**
 * Price history rows (`PULL_DATE`, `USD`, `USD_FOIL`) as dashboard figures.
 * Rows whose pull date cannot be parsed are left out.
 */
export function summarizePrices(rows: TabularResult): PriceSummary {
  const points: PricePoint[] = []
  for (const row of rows) {
    const pullDate = toDate(row.PULL_DATE)
    if (pullDate === null) continue
    points.push({ pullDate, usd: toNumber(row.USD), usdFoil: toNumber(row.USD_FOIL) })
  }
  points.sort((a, b) => a.pullDate.getTime() - b.pullDate.getTime())

  const last = points[points.length - 1]
  const latest: LatestPrices | null =
    last !== undefined
      ? { regular: formatUsd(last.usd), foil: formatUsd(last.usdFoil), lastUpdated: formatDate(last.pullDate) }
      : null

  const chart: ChartPoint[] = points
    .filter((p) => p.usd !== null || p.usdFoil !== null)
    .map((p) => ({ date: formatDate(p.pullDate), regular: p.usd, foil: p.usdFoil }))

  const history: HistoryRow[] = points.map((p) => ({
    pullDate: formatDate(p.pullDate),
    regular: formatUsd(p.usd),
    foil: formatUsd(p.usdFoil),
  }))

  return {
    points,
    latest,
    chart,
    history,
    regular: priceStats(points.map((p) => p.usd)),
    foil: priceStats(points.map((p) => p.usdFoil)),
  }
}

export function priceStats(values: readonly (number | null)[]): PriceStats | null {
  const present = values.filter((v): v is number => v !== null)
  const average = mean(present)
  if (average === null) return null
  return {
    average,
    minimum: Math.min(...present),
    maximum: Math.max(...present),
    dataPoints: present.length,
  }
}

/** Lines of the statistics panel, e.g. `- Average: $1.50`. */
export function statsLines(stats: PriceStats | null, kind: 'regular' | 'foil'): string[] {
  if (stats === null) return [`No ${kind} price data available`]
  return [
    `- Average: ${formatUsd(stats.average)}`,
    `- Minimum: ${formatUsd(stats.minimum)}`,
    `- Maximum: ${formatUsd(stats.maximum)}`,
    `- Data Points: ${stats.dataPoints}`,
  ]
}
