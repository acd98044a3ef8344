import { currentExecutablePath } from '../../L1-infra/process/process.js'
import { fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import { pathForPlatform } from '../../L1-infra/paths/paths.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { ExecutablePathError } from './errors.js'

/** Bare executable name, left to the OS PATH search at launch time. */
export const FFPROBE_BINARY_NAME = 'ffprobe'

export interface LocatorOptions {
  /** Path of the running executable. Defaults to `process.execPath`. */
  execPath?: string
  /** Platform whose naming rules apply. Defaults to `process.platform`. */
  platform?: NodeJS.Platform
}

/** Where the effective ffprobe path came from. */
export type ResolvedFfprobe =
  | { kind: 'configured'; path: string }
  | { kind: 'sidecar'; path: string }
  | { kind: 'system'; name: typeof FFPROBE_BINARY_NAME }

/**
 * The expected path of an ffprobe binary next to the running executable.
 * Windows gets `ffprobe.exe`; macOS and Linux have no extension.
 * The file is not checked for existence.
 */
export function ffprobeSidecarPath(options: LocatorOptions = {}): string {
  const rawPath = options.execPath ?? currentExecutablePath()
  const platform = options.platform ?? process.platform
  const platformPath = pathForPlatform(platform)

  if (!rawPath) {
    throw new ExecutablePathError('Cannot determine the path of the current executable', rawPath)
  }
  // Relative paths resolve against the cwd
  const execPath = platformPath.isAbsolute(rawPath) ? rawPath : platformPath.resolve(rawPath)
  const parent = platformPath.dirname(execPath)
  if (parent === execPath) {
    throw new ExecutablePathError(`Current executable has no parent directory: ${execPath}`, execPath)
  }

  const fileName = platformPath.format({
    name: FFPROBE_BINARY_NAME,
    ext: platform === 'win32' ? '.exe' : '',
  })
  return platformPath.join(parent, fileName)
}

/**
 * Decide which ffprobe to run: an explicit FFPROBE_PATH, the sidecar binary when one
 * exists, or the bare name for the system PATH. Never throws.
 */
export function resolveFfprobe(options: LocatorOptions = {}): ResolvedFfprobe {
  const config = getConfig()
  if (config.FFPROBE_PATH && config.FFPROBE_PATH !== FFPROBE_BINARY_NAME) {
    logger.debug(`FFprobe: using FFPROBE_PATH config: ${sanitizeForLog(config.FFPROBE_PATH)}`)
    return { kind: 'configured', path: config.FFPROBE_PATH }
  }

  try {
    const sidecarPath = ffprobeSidecarPath(options)
    if (fileExistsSync(sidecarPath)) {
      logger.debug(`FFprobe: using sidecar: ${sanitizeForLog(sidecarPath)}`)
      return { kind: 'sidecar', path: sidecarPath }
    }
  } catch (err) {
    logger.debug(`FFprobe: sidecar lookup failed: ${sanitizeForLog(err instanceof Error ? err.message : err)}`)
  }

  logger.debug('FFprobe: falling back to system PATH')
  return { kind: 'system', name: FFPROBE_BINARY_NAME }
}

/** The path or bare name to launch for a resolution. */
export function executableFor(resolved: ResolvedFfprobe): string {
  return resolved.kind === 'system' ? resolved.name : resolved.path
}

/** Get the path to the ffprobe binary that should be launched. */
export function ffprobePath(options: LocatorOptions = {}): string {
  return executableFor(resolveFfprobe(options))
}
