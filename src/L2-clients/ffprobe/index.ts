export { ffprobeIsInstalled, ffprobeVersion, ffprobeVersionWithPath } from './ffprobe.js'
export { FfprobeCommand } from './ffprobeCommand.js'
export type { FfprobeOutput } from './ffprobeCommand.js'
export {
  FFPROBE_BINARY_NAME,
  executableFor,
  ffprobePath,
  ffprobeSidecarPath,
  resolveFfprobe,
} from './ffprobeLocator.js'
export type { LocatorOptions, ResolvedFfprobe } from './ffprobeLocator.js'
export { ExecutablePathError, FfprobeDecodeError, FfprobeError, FfprobeLaunchError } from './errors.js'
