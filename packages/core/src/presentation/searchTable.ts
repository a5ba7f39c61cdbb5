import type { CellValue, Row, TabularResult } from '@mtg-price-tracker/validation'

import { toText } from './format.js'

export const SEARCH_COLUMNS = [
  'NAME',
  'TCGPLAYER_URL',
  'SET_NAME',
  'ID',
  'AVG_PRICE',
  'MIN_PRICE',
  'MAX_PRICE',
  'AVG_FOIL_PRICE',
  'MIN_FOIL_PRICE',
  'MAX_FOIL_PRICE',
  'PRICE_RECORDS_COUNT',
] as const

export type SearchColumn = (typeof SEARCH_COLUMNS)[number]

export interface LinkColumn {
  readonly column: SearchColumn
  readonly label: string
  readonly help: string
  readonly displayText: string
}

export const SEARCH_LINK_COLUMN: LinkColumn = {
  column: 'TCGPLAYER_URL',
  label: 'TCGPlayer Link',
  help: 'Click to open card page on TCGPlayer',
  displayText: 'View on TCGPlayer',
}

/** Project search rows onto the display column order; absent columns become null. */
export function searchTable(rows: TabularResult): Row[] {
  return rows.map((row) => {
    const projected: Record<string, CellValue> = {}
    for (const column of SEARCH_COLUMNS) {
      projected[column] = row[column] ?? null
    }
    return projected
  })
}

/** Card id of the row at `index`, or null when there is no such row or it has no id. */
export function selectSearchRow(rows: TabularResult, index: number): string | null {
  if (!Number.isInteger(index)) return null
  const row = rows[index]
  if (row === undefined) return null
  return toText(row.ID)
}
