import type { QueryParam, WarehouseExecutor } from '@mtg-price-tracker/core'
import { ExecutionError } from '@mtg-price-tracker/core'
import snowflake from 'snowflake-sdk'

type SnowflakeOptions = Parameters<typeof snowflake.createConnection>[0]
type SnowflakeConnection = ReturnType<typeof snowflake.createConnection>

export interface SnowflakeExecutorConfig {
  readonly account: string
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly authenticator?: 'SNOWFLAKE' | 'OAUTH' | undefined
  readonly token?: string | undefined
  readonly accessUrl?: string | undefined
  readonly warehouse?: string | undefined
  readonly database?: string | undefined
  readonly schema?: string | undefined
  readonly timeoutMs?: number | undefined
}

function toOptions(config: SnowflakeExecutorConfig): SnowflakeOptions {
  return {
    account: config.account,
    ...(config.username !== undefined ? { username: config.username } : {}),
    ...(config.password !== undefined ? { password: config.password } : {}),
    ...(config.authenticator !== undefined ? { authenticator: config.authenticator } : {}),
    ...(config.token !== undefined ? { token: config.token } : {}),
    ...(config.accessUrl !== undefined ? { accessUrl: config.accessUrl } : {}),
    ...(config.warehouse !== undefined ? { warehouse: config.warehouse } : {}),
    ...(config.database !== undefined ? { database: config.database } : {}),
    ...(config.schema !== undefined ? { schema: config.schema } : {}),
  }
}

function toRecords(rows: unknown): Record<string, unknown>[] {
  if (!Array.isArray(rows)) return []
  const records: Record<string, unknown>[] = []
  for (const row of rows) {
    if (typeof row === 'object' && row !== null && !Array.isArray(row)) {
      records.push({ ...row })
    }
  }
  return records
}

function connect(connection: SnowflakeConnection): Promise<void> {
  return new Promise((resolve, reject) => {
    connection.connect((err) => {
      if (err) reject(err)
      else resolve()
    })
  })
}

function run(connection: SnowflakeConnection, sql: string, params: readonly QueryParam[]): Promise<unknown> {
  return new Promise((resolve, reject) => {
    connection.execute({
      sqlText: sql,
      binds: [...params],
      complete: (err, _stmt, rows) => {
        if (err) reject(err)
        else resolve(rows)
      },
    })
  })
}

function destroy(connection: SnowflakeConnection): Promise<void> {
  return new Promise((resolve, reject) => {
    connection.destroy((err) => {
      if (err) reject(err)
      else resolve()
    })
  })
}

/**
 * Open a Snowflake session. Rejects with the driver's error when the connection
 * cannot be established; the session provider records it as a failed attempt.
 */
export async function connectSnowflake(config: SnowflakeExecutorConfig): Promise<WarehouseExecutor> {
  const connection = snowflake.createConnection(toOptions(config))
  await connect(connection)

  if (config.timeoutMs !== undefined) {
    const seconds = Math.max(1, Math.ceil(config.timeoutMs / 1000))
    try {
      await run(connection, `ALTER SESSION SET STATEMENT_TIMEOUT_IN_SECONDS = ${String(seconds)}`, [])
    } catch (err) {
      // The setup error is the one to report
      await destroy(connection).catch(() => {})
      throw err
    }
  }

  let closed = false

  return {
    async execute(sql: string, params: readonly QueryParam[]): Promise<Record<string, unknown>[]> {
      if (closed) {
        throw new ExecutionError({ code: 'EXECUTOR_CLOSED', database: 'snowflake' })
      }
      try {
        return toRecords(await run(connection, sql, params))
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new ExecutionError(
          { code: 'QUERY_FAILED', database: 'snowflake', sql, params: [...params], cause },
          cause,
        )
      }
    },

    async ping(this: WarehouseExecutor): Promise<void> {
      await this.execute('SELECT 1', [])
    },

    async close(): Promise<void> {
      if (closed) return
      closed = true
      await destroy(connection)
    },
  }
}
