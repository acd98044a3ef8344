export * from './L2-clients/ffprobe/index.js'
export { initConfig, getConfig, resetConfig } from './L1-infra/config/environment.js'
export type { AppEnvironment, ConfigOptions } from './L1-infra/config/environment.js'
export { setVerbose, setSilent } from './L1-infra/logger/configLogger.js'
