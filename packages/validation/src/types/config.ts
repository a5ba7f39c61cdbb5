export interface WarehouseCredentials {
  readonly account: string
  readonly user: string
  readonly password: string
  readonly warehouse: string
  readonly database: string
  readonly schema: string
}

export type ConfigSource = Readonly<Record<string, string | undefined>>

/** Environment key for every credential field, in the order they are reported. */
export const WAREHOUSE_CONFIG_KEYS = {
  account: 'SNOWFLAKE_ACCOUNT',
  user: 'SNOWFLAKE_USER',
  password: 'SNOWFLAKE_PASSWORD',
  warehouse: 'SNOWFLAKE_WAREHOUSE',
  database: 'SNOWFLAKE_DATABASE',
  schema: 'SNOWFLAKE_SCHEMA',
} as const satisfies Record<keyof WarehouseCredentials, string>
