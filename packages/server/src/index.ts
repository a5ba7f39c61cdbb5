export type { AppOptions } from './app.js'
export { checkStartupConfig, createApp } from './app.js'
export type { ServerSettings } from './config.js'
export { DEFAULT_SETTINGS, loadServerSettings } from './config.js'
export type { PriceTrackerServer, ServerConfig } from './server.js'
export { createServer, MAX_BODY_BYTES } from './server.js'
