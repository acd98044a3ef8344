import dotenv from 'dotenv'
import { readTextFileSync } from '../fileSystem/fileSystem.js'

export type EnvValues = Record<string, string>

/**
 * Parse a .env file into plain values. The host's `process.env` is left untouched;
 * callers decide how the values rank against real environment variables.
 */
export function readEnvFile(envPath: string): EnvValues {
  return dotenv.parse(readTextFileSync(envPath))
}
