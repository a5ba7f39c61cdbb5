import type { CellValue, TabularResult } from '@mtg-price-tracker/validation'

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value
  if (typeof value === 'bigint') return Number(value)
  if (value instanceof Date) return value
  // VARIANT / OBJECT / ARRAY columns
  return JSON.stringify(value)
}

/** Normalize raw executor rows into a frozen tabular result. */
export function toTabularResult(raw: readonly Record<string, unknown>[]): TabularResult {
  const rows = raw.map((record) => {
    const row: Record<string, CellValue> = {}
    for (const [column, value] of Object.entries(record)) {
      row[column] = toCellValue(value)
    }
    return Object.freeze(row)
  })
  return Object.freeze(rows)
}
