import type { TabularResult } from '@mtg-price-tracker/validation'

import { mean, toNumber, toText } from './format.js'

/** Days after release covered by the launch-window view. */
export const LAUNCH_WINDOW_DAYS = 300

export interface LaunchSeriesPoint {
  readonly dateDiff: number
  readonly values: Readonly<Record<string, number | null>>
}

export interface SetAverage {
  readonly setName: string
  readonly average: number | null
}

export interface LaunchSummary {
  readonly sets: readonly string[]
  readonly series: readonly LaunchSeriesPoint[]
  readonly setAverages: readonly SetAverage[]
  readonly totalDataPoints: number
  readonly windowDays: number
}

/**
 * Pivot `SET_NAME`, `DATE_DIFF`, `AVG_USD` rows into one series per set, ordered
 * by days after launch. Sets missing a day read as null on that day.
 */
export function summarizeLaunchWindow(rows: TabularResult): LaunchSummary {
  const byDay = new Map<number, Map<string, number | null>>()
  const bySet = new Map<string, number[]>()

  for (const row of rows) {
    const setName = toText(row.SET_NAME)
    const dateDiff = toNumber(row.DATE_DIFF)
    if (setName === null || dateDiff === null) continue
    const avgUsd = toNumber(row.AVG_USD)

    let day = byDay.get(dateDiff)
    if (day === undefined) {
      day = new Map()
      byDay.set(dateDiff, day)
    }
    day.set(setName, avgUsd)

    let prices = bySet.get(setName)
    if (prices === undefined) {
      prices = []
      bySet.set(setName, prices)
    }
    if (avgUsd !== null) prices.push(avgUsd)
  }

  const sets = [...bySet.keys()].sort()
  const series: LaunchSeriesPoint[] = [...byDay.entries()]
    .sort(([a], [b]) => a - b)
    .map(([dateDiff, day]) => {
      const values: Record<string, number | null> = {}
      for (const setName of sets) values[setName] = day.get(setName) ?? null
      return { dateDiff, values }
    })

  return {
    sets,
    series,
    setAverages: sets.map((setName) => ({ setName, average: mean(bySet.get(setName) ?? []) })),
    totalDataPoints: rows.length,
    windowDays: LAUNCH_WINDOW_DAYS,
  }
}
