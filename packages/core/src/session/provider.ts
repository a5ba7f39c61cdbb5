import type { Provenance, SessionAttemptFailure } from '@mtg-price-tracker/validation'
import { ConnectionError } from '@mtg-price-tracker/validation'

import type { Logger } from '../debug/logger.js'
import { silentLogger } from '../debug/logger.js'
import type { SessionStrategy, WarehouseExecutor } from '../types/interfaces.js'

// ── Public Types ───────────────────────────────────────────────

export type SessionAcquisition =
  | { readonly ok: true; readonly session: WarehouseExecutor; readonly provenance: Provenance }
  | { readonly ok: false; readonly error: ConnectionError }

export interface AcquiredSession {
  readonly session: WarehouseExecutor
  readonly provenance: Provenance
}

export interface SessionProvider {
  /** Try each strategy once, in order. Never throws. */
  acquire(): Promise<SessionAcquisition>
  acquireOrThrow(): Promise<AcquiredSession>
  /** Acquire a fresh session, run `fn`, then close the session. */
  withSession<T>(fn: (acquired: AcquiredSession) => Promise<T>): Promise<T>
  readonly strategies: readonly string[]
}

export interface CreateSessionProviderOptions {
  readonly strategies: readonly SessionStrategy[]
  readonly logger?: Logger | undefined
}

// ── createSessionProvider ──────────────────────────────────────

export function createSessionProvider(options: CreateSessionProviderOptions): SessionProvider {
  const strategies = [...options.strategies]
  const logger = options.logger ?? silentLogger

  async function acquire(): Promise<SessionAcquisition> {
    const attempts: SessionAttemptFailure[] = []

    for (const strategy of strategies) {
      try {
        const session = await strategy.open()
        if (attempts.length > 0) {
          logger.info({ strategy: strategy.name, skipped: attempts.map((a) => a.strategy) }, 'session acquired by fallback')
        } else {
          logger.debug({ strategy: strategy.name }, 'session acquired')
        }
        return { ok: true, session, provenance: { strategy: strategy.name, label: strategy.label } }
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        logger.warn({ strategy: strategy.name, err: cause }, 'session strategy failed')
        attempts.push({ strategy: strategy.name, cause })
      }
    }

    return { ok: false, error: connectionFailure(attempts) }
  }

  async function acquireOrThrow(): Promise<AcquiredSession> {
    const result = await acquire()
    if (!result.ok) throw result.error
    return { session: result.session, provenance: result.provenance }
  }

  return {
    acquire,
    acquireOrThrow,

    async withSession<T>(fn: (acquired: AcquiredSession) => Promise<T>): Promise<T> {
      const acquired = await acquireOrThrow()
      try {
        return await fn(acquired)
      } finally {
        await acquired.session.close().catch((err: unknown) => {
          logger.warn({ strategy: acquired.provenance.strategy, err }, 'session close failed')
        })
      }
    },

    strategies: strategies.map((s) => s.name),
  }
}

// ── Error Helpers ──────────────────────────────────────────────

function connectionFailure(attempts: readonly SessionAttemptFailure[]): ConnectionError {
  const last = attempts[attempts.length - 1]
  if (last === undefined) {
    return new ConnectionError('Failed to connect to Snowflake: no session strategies configured', { attempts })
  }
  const reason = last.cause !== undefined ? last.cause.message : 'unknown error'
  return new ConnectionError(`Failed to connect to Snowflake: ${reason}`, { attempts })
}
