import { createLogger } from '@mtg-price-tracker/core'
import { defaultSessionStrategies } from '@mtg-price-tracker/executor-snowflake'
import dotenv from 'dotenv'
import { checkStartupConfig, createApp } from './app.js'
import { loadServerSettings } from './config.js'

dotenv.config()

const settings = loadServerSettings(process.env)
const logger = createLogger({ level: settings.logLevel })

const configError = checkStartupConfig(process.env)
if (configError !== null) {
  logger.fatal({ errors: configError.errors }, configError.message)
  process.exit(1)
}

const server = createApp({
  settings,
  strategies: defaultSessionStrategies({ env: process.env, timeoutMs: settings.statementTimeoutMs }),
  logger,
})

await server.start()
