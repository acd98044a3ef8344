import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { FfprobeCommand } from './ffprobeCommand.js'
import { ffprobePath } from './ffprobeLocator.js'
import type { LocatorOptions } from './ffprobeLocator.js'
import { FfprobeDecodeError } from './errors.js'

/**
 * Check whether a usable ffprobe is available, either next to the running
 * executable or on the system PATH. Any failure to run it counts as "not installed".
 */
export function ffprobeIsInstalled(options: LocatorOptions = {}): boolean {
  try {
    return new FfprobeCommand(ffprobePath(options)).arg('-version').status() === 0
  } catch (err) {
    logger.debug(`FFprobe: not installed: ${sanitizeForLog(err instanceof Error ? err.message : err)}`)
    return false
  }
}

/**
 * Run `ffprobe -version` and return the banner exactly as printed.
 * The version number is not parsed out.
 */
export function ffprobeVersion(options: LocatorOptions = {}): string {
  return ffprobeVersionWithPath(ffprobePath(options))
}

/** {@link ffprobeVersion} against an explicit binary. */
export function ffprobeVersionWithPath(path: string): string {
  const { stdout } = new FfprobeCommand(path).arg('-version').output()
  return decodeUtf8(stdout, path)
}

function decodeUtf8(bytes: Buffer, program: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes)
  } catch (err) {
    throw new FfprobeDecodeError(`${program} -version printed invalid UTF-8`, program, { cause: err })
  }
}
