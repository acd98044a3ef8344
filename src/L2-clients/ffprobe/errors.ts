/** Base class for every error raised while locating or running ffprobe. */
export class FfprobeError extends Error {
  name = 'FfprobeError'
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

/** The running executable's path could not be determined, or it has no parent directory. */
export class ExecutablePathError extends FfprobeError {
  name = 'ExecutablePathError'
  constructor(message: string, public readonly executablePath: string) {
    super(message)
  }
}

/** ffprobe could not be launched, or its output could not be captured. */
export class FfprobeLaunchError extends FfprobeError {
  name = 'FfprobeLaunchError'
  constructor(
    message: string,
    public readonly program: string,
    public readonly args: readonly string[],
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** ffprobe wrote bytes to stdout that are not valid UTF-8. */
export class FfprobeDecodeError extends FfprobeError {
  name = 'FfprobeDecodeError'
  constructor(message: string, public readonly program: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}
