// --- WarehouseExecutor (implemented by executor packages) ---

export type QueryParam = string | number

/**
 * A live session against the warehouse.
 *
 * Error contract:
 * - `execute()` must throw `ExecutionError` (code: `'QUERY_FAILED'`) on any failure.
 * - `ping()` must throw `ExecutionError` when the session cannot run a trivial query.
 * - `close()` should attempt cleanup; failures may propagate as raw errors.
 */
export interface WarehouseExecutor {
  execute(sql: string, params: readonly QueryParam[]): Promise<Record<string, unknown>[]>
  ping(): Promise<void>
  close(): Promise<void>
}

// --- SessionStrategy (implemented by executor packages) ---

/**
 * One way of obtaining a session. `open()` rejects when the path is unavailable;
 * the session provider then moves on to the next strategy.
 */
export interface SessionStrategy {
  readonly name: string
  readonly label: string
  open(): Promise<WarehouseExecutor>
}
