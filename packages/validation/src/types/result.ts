// --- Tabular Result ---

export type CellValue = string | number | boolean | Date | null

export type Row = Readonly<Record<string, CellValue>>

/** Rows as returned by the warehouse, in order. Frozen once produced. */
export type TabularResult = readonly Row[]

// --- Notices ---

export type NoticeLevel = 'success' | 'info' | 'warning' | 'error'

export interface Notice {
  readonly level: NoticeLevel
  readonly message: string
}

// --- Operation Outcome ---

export type OperationName = 'cardSearch' | 'priceHistory' | 'launchWindow'

export type OperationStatus = 'ok' | 'empty' | 'failed'

export interface OperationMeta {
  readonly operation: OperationName
  readonly cacheKey: string
  readonly cached: boolean
  readonly durationMs: number
}

export interface OperationOutcome {
  readonly status: OperationStatus
  readonly rows: TabularResult
  readonly notice?: Notice | undefined
  readonly meta: OperationMeta
}

// --- Sessions ---

export interface Provenance {
  readonly strategy: string
  readonly label: string
}

export interface HealthCheckResult {
  readonly healthy: boolean
  readonly latencyMs: number
  readonly provenance?: Provenance | undefined
  readonly error?: string | undefined
}
