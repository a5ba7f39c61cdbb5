import type { HealthCheckResult } from '@mtg-price-tracker/validation'

import type { SessionProvider } from './provider.js'

/** Acquire a session and run a trivial query through it. Never throws. */
export async function measureHealth(sessions: SessionProvider): Promise<HealthCheckResult> {
  const s = Date.now()
  try {
    const provenance = await sessions.withSession(async ({ session, provenance }) => {
      await session.ping()
      return provenance
    })
    return { healthy: true, latencyMs: Date.now() - s, provenance }
  } catch (err) {
    return {
      healthy: false,
      latencyMs: Date.now() - s,
      error: err instanceof Error ? err.message : String(err),
    }
  }
}
