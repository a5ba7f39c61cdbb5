export type { SnowflakeExecutorConfig } from './executor.js'
export { connectSnowflake } from './executor.js'
export type { StrategyOptions } from './strategies.js'
export {
  AMBIENT_LABEL,
  ambientSessionStrategy,
  CREDENTIALS_LABEL,
  credentialSessionStrategy,
  DEFAULT_TOKEN_PATH,
  defaultSessionStrategies,
} from './strategies.js'
