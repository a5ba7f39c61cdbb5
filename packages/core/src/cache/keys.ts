export type CacheKeyPart = string | number | boolean | null

/**
 * Deterministic key for an operation and its ordered parameters.
 * Parameters are JSON-encoded, so `('a_b', 'c')` and `('a', 'b_c')` never collide.
 */
export function cacheKey(operation: string, params: readonly CacheKeyPart[] = []): string {
  return `${operation}:${JSON.stringify(params)}`
}
