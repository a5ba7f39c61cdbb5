import { ExecutionError } from '@mtg-price-tracker/validation'

import type { QueryParam, SessionStrategy, WarehouseExecutor } from '../src/types/interfaces.js'

// ── Fake executor ──────────────────────────────────────────────

export interface ExecutedQuery {
  readonly sql: string
  readonly params: readonly QueryParam[]
}

export interface FakeExecutor extends WarehouseExecutor {
  readonly executed: ExecutedQuery[]
  closed: number
}

/**
 * In-process executor. `respond` maps each SQL text to rows, or throws to
 * simulate a warehouse error.
 */
export function fakeExecutor(
  respond: (sql: string, params: readonly QueryParam[]) => Record<string, unknown>[] = () => [],
): FakeExecutor {
  const executor: FakeExecutor = {
    executed: [],
    closed: 0,
    async execute(sql, params) {
      executor.executed.push({ sql, params })
      try {
        return respond(sql, params)
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new ExecutionError(
          { code: 'QUERY_FAILED', database: 'snowflake', sql, params: [...params], cause },
          cause,
        )
      }
    },
    async ping() {},
    async close() {
      executor.closed++
    },
  }
  return executor
}

// ── Strategies ─────────────────────────────────────────────────

export interface CountingStrategy extends SessionStrategy {
  opened: number
}

export function okStrategy(name: string, executor: WarehouseExecutor, label = `${name} label`): CountingStrategy {
  const strategy: CountingStrategy = {
    name,
    label,
    opened: 0,
    async open() {
      strategy.opened++
      return executor
    },
  }
  return strategy
}

export function failingStrategy(name: string, message: string): CountingStrategy {
  const strategy: CountingStrategy = {
    name,
    label: `${name} label`,
    opened: 0,
    async open() {
      strategy.opened++
      throw new Error(message)
    },
  }
  return strategy
}

// ── Clock ──────────────────────────────────────────────────────

export interface ManualClock {
  now(): number
  advance(ms: number): void
}

export function manualClock(start = 1_700_000_000_000): ManualClock {
  let current = start
  return {
    now: () => current,
    advance: (ms) => {
      current += ms
    },
  }
}

// ── Deferred ───────────────────────────────────────────────────

export interface Deferred<T> {
  readonly promise: Promise<T>
  resolve(value: T): void
  reject(err: Error): void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (err: Error) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}
