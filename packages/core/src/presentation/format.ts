import type { CellValue } from '@mtg-price-tracker/validation'

export function formatUsd(value: number | null): string {
  return value !== null && Number.isFinite(value) ? `$${value.toFixed(2)}` : 'N/A'
}

/** `YYYY-MM-DD` in UTC. */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10)
}

export function toNumber(value: CellValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

export function toDate(value: CellValue | undefined): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value)
    return Number.isNaN(parsed.getTime()) ? null : parsed
  }
  return null
}

export function toText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null
  if (value instanceof Date) return formatDate(value)
  return String(value)
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null
  let sum = 0
  for (const v of values) sum += v
  return sum / values.length
}
