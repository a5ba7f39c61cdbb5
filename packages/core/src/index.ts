// Re-export types from validation package
export type {
  CellValue,
  ConfigErrorEntry,
  ConfigSource,
  ConnectionErrorDetails,
  ExecutionErrorDetails,
  HealthCheckResult,
  Notice,
  NoticeLevel,
  OperationMeta,
  OperationName,
  OperationOutcome,
  OperationStatus,
  Provenance,
  Row,
  SearchParams,
  SessionAttemptFailure,
  TabularResult,
  ValidationErrorEntry,
  WarehouseCredentials,
} from '@mtg-price-tracker/validation'
// Re-export validation functions and classes
export {
  ConfigError,
  ConnectionError,
  ExecutionError,
  errorMessage,
  loadWarehouseCredentials,
  MAX_SEARCH_LIMIT,
  MIN_SEARCH_LIMIT,
  PriceTrackerError,
  ValidationError,
  validateCardId,
  validateSearchParams,
  validateWarehouseConfig,
  WAREHOUSE_CONFIG_KEYS,
} from '@mtg-price-tracker/validation'
// Cache
export type { CacheKeyPart } from './cache/keys.js'
export { cacheKey } from './cache/keys.js'
export type { CacheEntry, CacheLookup, CacheStats, ResultCacheOptions } from './cache/resultCache.js'
export { CACHE_TTL_MS, ResultCache } from './cache/resultCache.js'
// Dashboard
export type {
  CacheInfo,
  CreateDashboardOptions,
  Dashboard,
  DashboardView,
  LaunchSection,
  PriceSection,
  RenderInput,
  SearchSection,
} from './dashboard/renderPass.js'
export { CACHE_POLICY_TEXT, createDashboard } from './dashboard/renderPass.js'
export { DEFAULT_CARD_ID, SelectionState } from './dashboard/selection.js'
// Logging
export type { Logger, LoggerOptions } from './debug/logger.js'
export { createLogger, silentLogger } from './debug/logger.js'
// Presentation
export { formatDate, formatUsd } from './presentation/format.js'
export type { LaunchSeriesPoint, LaunchSummary, SetAverage } from './presentation/launchSummary.js'
export { LAUNCH_WINDOW_DAYS, summarizeLaunchWindow } from './presentation/launchSummary.js'
export type {
  ChartPoint,
  HistoryRow,
  LatestPrices,
  PricePoint,
  PriceStats,
  PriceSummary,
} from './presentation/priceSummary.js'
export { CHART_SERIES, priceStats, statsLines, summarizePrices } from './presentation/priceSummary.js'
export type { LinkColumn, SearchColumn } from './presentation/searchTable.js'
export { SEARCH_COLUMNS, SEARCH_LINK_COLUMN, searchTable, selectSearchRow } from './presentation/searchTable.js'
// Query Operations
export type { CreatePriceQueriesOptions, PriceQueries, SearchOptions } from './queries/operations.js'
export {
  createPriceQueries,
  FULL_SEARCH_LIMIT,
  MINIMAL_SEARCH_LIMIT,
  normalizeFragment,
  rejectedOutcome,
} from './queries/operations.js'
export { toTabularResult } from './queries/rows.js'
export type { BoundQuery } from './queries/sql.js'
export {
  CARD_SEARCH_FUNCTION,
  cardSearchQuery,
  LAUNCH_WINDOW_VIEW,
  launchWindowQuery,
  PRICE_HISTORY_FUNCTION,
  priceHistoryQuery,
} from './queries/sql.js'
// Session Provider
export type {
  AcquiredSession,
  CreateSessionProviderOptions,
  SessionAcquisition,
  SessionProvider,
} from './session/provider.js'
export { measureHealth } from './session/health.js'
export { createSessionProvider } from './session/provider.js'
// Public interfaces
export type { QueryParam, SessionStrategy, WarehouseExecutor } from './types/interfaces.js'
