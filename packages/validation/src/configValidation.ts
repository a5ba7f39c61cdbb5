import type { ConfigErrorEntry } from './errors.js'
import { ConfigError } from './errors.js'
import type { ConfigSource, WarehouseCredentials } from './types/config.js'
import { WAREHOUSE_CONFIG_KEYS } from './types/config.js'

// --- Account Identifier ---

// orgname-accountname, or a legacy locator with optional region/cloud segments
const ACCOUNT_REGEX = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/

export function validateAccountIdentifier(account: string): string | null {
  if (account.length > 255) {
    return `account must be at most 255 characters, got ${account.length}`
  }
  if (!ACCOUNT_REGEX.test(account)) {
    return `account must match ${ACCOUNT_REGEX.source}, got '${account}'`
  }
  if (account.includes('.snowflakecomputing.com')) {
    return `account must be an identifier, not a host name: '${account}'`
  }
  return null
}

// --- Credentials Validation ---

export function validateWarehouseConfig(source: ConfigSource): ConfigError | null {
  const errors: ConfigErrorEntry[] = []

  for (const key of Object.values(WAREHOUSE_CONFIG_KEYS)) {
    const value = source[key]
    if (value === undefined) {
      errors.push({
        code: 'MISSING_KEY',
        message: `Missing required configuration key '${key}'`,
        details: { key },
      })
    } else if (value.trim().length === 0) {
      errors.push({
        code: 'EMPTY_VALUE',
        message: `Configuration key '${key}' is empty`,
        details: { key },
      })
    }
  }

  const account = source[WAREHOUSE_CONFIG_KEYS.account]
  if (account !== undefined && account.trim().length > 0) {
    const accountErr = validateAccountIdentifier(account.trim())
    if (accountErr !== null) {
      errors.push({
        code: 'INVALID_VALUE',
        message: `Configuration key '${WAREHOUSE_CONFIG_KEYS.account}': ${accountErr}`,
        details: { key: WAREHOUSE_CONFIG_KEYS.account, actual: account },
      })
    }
  }

  return errors.length > 0 ? new ConfigError(errors) : null
}

/**
 * Read the credential set for explicit session construction.
 * Throws `ConfigError` listing every missing, empty or malformed key.
 */
export function loadWarehouseCredentials(source: ConfigSource): WarehouseCredentials {
  const err = validateWarehouseConfig(source)
  if (err !== null) throw err

  const read = (key: string): string => (source[key] ?? '').trim()
  return {
    account: read(WAREHOUSE_CONFIG_KEYS.account),
    user: read(WAREHOUSE_CONFIG_KEYS.user),
    // Passwords keep surrounding whitespace
    password: source[WAREHOUSE_CONFIG_KEYS.password] ?? '',
    warehouse: read(WAREHOUSE_CONFIG_KEYS.warehouse),
    database: read(WAREHOUSE_CONFIG_KEYS.database),
    schema: read(WAREHOUSE_CONFIG_KEYS.schema),
  }
}
