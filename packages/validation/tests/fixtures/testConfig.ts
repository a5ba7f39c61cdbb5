import type { SearchParams } from '../../src/paramValidation.js'

// --- Environment ---

export function validEnv(): Record<string, string> {
  return {
    SNOWFLAKE_ACCOUNT: 'testorg-testaccount',
    SNOWFLAKE_USER: 'test-user',
    SNOWFLAKE_PASSWORD: 'test-secret',
    SNOWFLAKE_WAREHOUSE: 'COMPUTE_WH',
    SNOWFLAKE_DATABASE: 'MTG_COST',
    SNOWFLAKE_SCHEMA: 'PUBLIC',
  }
}

// --- Operation Params ---

export const defaultSearch: SearchParams = {
  nameFragment: 'vivi',
  setFragment: 'final fantasy',
  limit: 1000,
}
