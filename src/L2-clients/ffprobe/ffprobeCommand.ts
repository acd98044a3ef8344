import { spawnCommand } from '../../L1-infra/process/process.js'
import type { SpawnSyncReturns, StdioOptions } from '../../L1-infra/process/process.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { ffprobePath } from './ffprobeLocator.js'
import type { LocatorOptions } from './ffprobeLocator.js'
import { FfprobeLaunchError } from './errors.js'

/** Captured result of a finished ffprobe run. */
export interface FfprobeOutput {
  /** Exit code, or `null` when the process was terminated by a signal. */
  status: number | null
  signal: NodeJS.Signals | null
  stdout: Buffer
  stderr: Buffer
}

/**
 * Builder for an ffprobe invocation, with presets for the flags callers reach for most.
 *
 * Each method appends tokens in call order and returns the same instance, so calls
 * chain. Nothing is validated: every string goes to the process untouched.
 * See https://ffmpeg.org/ffprobe.html for the full option list.
 */
export class FfprobeCommand {
  private readonly argv: string[] = []

  constructor(private readonly program: string = ffprobePath()) {}

  /** Build a command for the ffprobe the locator resolves under `options`. */
  static create(options: LocatorOptions = {}): FfprobeCommand {
    return new FfprobeCommand(ffprobePath(options))
  }

  // ── Generic options ────────────────────────────────────────────

  /**
   * `-hide_banner`: suppress the copyright notice, build options and library
   * versions every FFmpeg tool prints by default.
   */
  hideBanner(): this {
    return this.arg('-hide_banner')
  }

  /** `-loglevel <level>`: set the logging level used by the library. */
  loglevel(level: string): this {
    return this.arg('-loglevel').arg(level)
  }

  // ── Main options ───────────────────────────────────────────────

  /**
   * `-print_format <writer>`: set the output printing format, e.g. `json`, `xml`,
   * `csv`, or a writer name with options such as `json=compact=1`.
   */
  printFormat(format: string): this {
    return this.arg('-print_format').arg(format)
  }

  /** `-show_format`: show information about the container format. */
  showFormat(): this {
    return this.arg('-show_format')
  }

  /** `-show_streams`: show information about each media stream. */
  showStreams(): this {
    return this.arg('-show_streams')
  }

  /** `-i <file>`: read the given input file. */
  input(file: string): this {
    return this.arg('-i').arg(file)
  }

  // ── Pass-through ───────────────────────────────────────────────

  /** Add one argument verbatim. */
  arg(value: string): this {
    this.argv.push(value)
    return this
  }

  /** Add several arguments verbatim, in iteration order. */
  args(values: Iterable<string>): this {
    for (const value of values) {
      this.arg(value)
    }
    return this
  }

  getProgram(): string {
    return this.program
  }

  getArgs(): string[] {
    return [...this.argv]
  }

  // ── Execution ──────────────────────────────────────────────────

  /**
   * Run to completion with stdout and stderr captured.
   * Blocks until ffprobe exits; a non-zero exit is reported through `status`, not thrown.
   */
  output(): FfprobeOutput {
    const result = this.spawn('pipe')
    return {
      status: result.status,
      signal: result.signal,
      stdout: result.stdout,
      stderr: result.stderr,
    }
  }

  /** Run to completion with output discarded and return the exit code. */
  status(): number | null {
    return this.spawn('ignore').status
  }

  toString(): string {
    return [this.program, ...this.argv].join(' ')
  }

  private spawn(stdio: StdioOptions): SpawnSyncReturns<Buffer> {
    logger.debug(`FFprobe: running ${sanitizeForLog(this.toString())}`)
    let result: SpawnSyncReturns<Buffer>
    try {
      result = spawnCommand(this.program, this.argv, { stdio, windowsHide: true })
    } catch (err) {
      throw this.launchError(err)
    }
    if (result.error) {
      throw this.launchError(result.error)
    }
    return result
  }

  private launchError(cause: unknown): FfprobeLaunchError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new FfprobeLaunchError(
      `Failed to run ${this.program}: ${reason}`,
      this.program,
      this.getArgs(),
      { cause },
    )
  }
}
