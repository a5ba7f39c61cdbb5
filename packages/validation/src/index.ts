// Config validation
export { loadWarehouseCredentials, validateAccountIdentifier, validateWarehouseConfig } from './configValidation.js'

// Errors
export type {
  ConfigErrorEntry,
  ConnectionErrorDetails,
  ExecutionErrorDetails,
  SessionAttemptFailure,
  ValidationErrorEntry,
} from './errors.js'
export {
  ConfigError,
  ConnectionError,
  ExecutionError,
  errorMessage,
  PriceTrackerError,
  ValidationError,
} from './errors.js'

// Parameter validation
export type { SearchParams } from './paramValidation.js'
export {
  MAX_CARD_ID_LENGTH,
  MAX_FRAGMENT_LENGTH,
  MAX_SEARCH_LIMIT,
  MIN_SEARCH_LIMIT,
  validateCardId,
  validateSearchParams,
} from './paramValidation.js'

// Types: config
export type { ConfigSource, WarehouseCredentials } from './types/config.js'
export { WAREHOUSE_CONFIG_KEYS } from './types/config.js'
// Types: result
export type {
  CellValue,
  HealthCheckResult,
  Notice,
  NoticeLevel,
  OperationMeta,
  OperationName,
  OperationOutcome,
  OperationStatus,
  Provenance,
  Row,
  TabularResult,
} from './types/result.js'
