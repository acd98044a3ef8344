import { readEnvFile } from '../env/env.js'
import type { EnvValues } from '../env/env.js'
import { setVerbose } from '../logger/configLogger.js'

export interface AppEnvironment {
  /** Explicit ffprobe location. Empty (or the bare `ffprobe`) means "locate it". */
  FFPROBE_PATH: string
  VERBOSE: boolean
}

export interface ConfigOptions {
  ffprobePath?: string
  verbose?: boolean
  /** A .env file consulted after real environment variables. Must exist when given. */
  envFile?: string
}

let config: AppEnvironment | null = null

function parseBooleanEnv(raw: string | undefined): boolean {
  if (!raw) return false
  const value = raw.trim().toLowerCase()
  return value === '1' || value === 'true'
}

/** Merge explicit options → env vars → .env file → defaults. Call before getConfig(). */
export function initConfig(options: ConfigOptions = {}): AppEnvironment {
  const fileEnv: EnvValues = options.envFile ? readEnvFile(options.envFile) : {}

  config = {
    FFPROBE_PATH: options.ffprobePath || process.env.FFPROBE_PATH || fileEnv.FFPROBE_PATH || '',
    VERBOSE: options.verbose ?? parseBooleanEnv(process.env.VERBOSE || fileEnv.VERBOSE),
  }

  if (config.VERBOSE) {
    setVerbose()
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no options (pure env-var mode)
  return initConfig()
}

/** Drop the current config so the next getConfig() re-reads the environment. */
export function resetConfig(): void {
  config = null
}
