// --- Base Error ---

export class PriceTrackerError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PriceTrackerError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code: 'MISSING_KEY' | 'EMPTY_VALUE' | 'INVALID_VALUE'
  message: string
  details: {
    key: string
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ConfigError extends PriceTrackerError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', `Config invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Connection Error ---

export interface SessionAttemptFailure {
  strategy: string
  cause?: Error | undefined
}

export interface ConnectionErrorDetails {
  attempts: readonly SessionAttemptFailure[]
}

export class ConnectionError extends PriceTrackerError {
  declare readonly code: 'CONNECTION_FAILED'
  readonly details: ConnectionErrorDetails

  constructor(message: string, details: ConnectionErrorDetails) {
    super('CONNECTION_FAILED', message)
    this.name = 'ConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: {
        attempts: this.details.attempts.map((a) => ({
          strategy: a.strategy,
          ...(a.cause !== undefined ? { cause: serializeError(a.cause) } : {}),
        })),
      },
    }
  }
}

// --- Validation Error ---

export interface ValidationErrorEntry {
  code: 'INVALID_PARAMETER' | 'MISSING_PARAMETER'
  message: string
  details: {
    parameter: string
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ValidationError extends PriceTrackerError {
  declare readonly code: 'VALIDATION_FAILED'
  readonly operation: string
  readonly errors: readonly ValidationErrorEntry[]

  constructor(operation: string, errors: readonly ValidationErrorEntry[]) {
    super('VALIDATION_FAILED', `Validation failed: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ValidationError'
    this.operation = operation
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      errors: this.errors,
    }
  }
}

// --- Execution Error ---

export type ExecutionErrorDetails =
  | { code: 'EXECUTOR_CLOSED'; database: string }
  | {
      code: 'QUERY_FAILED'
      database: string
      sql: string
      params: unknown[]
      cause?: Error | undefined
    }

export class ExecutionError extends PriceTrackerError {
  declare readonly code: 'EXECUTOR_CLOSED' | 'QUERY_FAILED'
  readonly details: ExecutionErrorDetails

  constructor(details: ExecutionErrorDetails, cause?: Error | undefined) {
    super(details.code, defaultExecutionMessage(details), cause ? { cause } : undefined)
    this.name = 'ExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: serializeExecutionDetails(this.details),
    }
  }
}

// --- Helpers ---

function serializeError(err: unknown): unknown {
  if (err instanceof PriceTrackerError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function serializeExecutionDetails(details: ExecutionErrorDetails): unknown {
  if (details.code === 'QUERY_FAILED' && details.cause !== undefined) {
    const { cause, ...rest } = details
    return { ...rest, cause: serializeError(cause) }
  }
  return details
}

function defaultExecutionMessage(details: ExecutionErrorDetails): string {
  switch (details.code) {
    case 'EXECUTOR_CLOSED':
      return `Executor closed for database: ${details.database}`
    case 'QUERY_FAILED':
      return details.cause !== undefined
        ? `Query failed on ${details.database}: ${details.cause.message}`
        : `Query failed on ${details.database}`
  }
}

/** Message of an unknown thrown value, for user-facing notices. */
export function errorMessage(err: unknown): string {
  if (err instanceof ExecutionError && err.details.code === 'QUERY_FAILED' && err.details.cause !== undefined) {
    return err.details.cause.message
  }
  return err instanceof Error ? err.message : String(err)
}
