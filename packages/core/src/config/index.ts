export { loadConfig, createOracleFromConfig, resolverOptionsFromConfig, openDatabaseFromConfig } from './config.js'
export type { AppConfig, Env } from './config.js'
