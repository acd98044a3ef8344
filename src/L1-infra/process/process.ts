import { spawnSync as nodeSpawnSync } from 'child_process'
import type { SpawnSyncOptionsWithBufferEncoding, SpawnSyncReturns, StdioOptions } from 'child_process'

export type { SpawnSyncReturns, StdioOptions }

export interface SpawnOptions {
  stdio?: StdioOptions
  /** Hide the console window Windows would otherwise open for the child. Defaults to true. */
  windowsHide?: boolean
  /** Largest stdout or stderr, in bytes, before the child is killed. Defaults to no limit. */
  maxBuffer?: number
}

/**
 * Spawn a command synchronously and capture its output as raw bytes.
 * Blocks until the child exits. Launch failures are reported on `result.error`; arguments
 * Node rejects before launching (an empty command, a NUL byte) throw.
 */
export function spawnCommand(
  cmd: string,
  args: readonly string[],
  opts: SpawnOptions = {},
): SpawnSyncReturns<Buffer> {
  const options: SpawnSyncOptionsWithBufferEncoding = {
    encoding: 'buffer',
    stdio: opts.stdio ?? 'pipe',
    windowsHide: opts.windowsHide ?? true,
    maxBuffer: opts.maxBuffer ?? Infinity,
  }
  return nodeSpawnSync(cmd, args, options)
}

/** Absolute path of the executable running this process. */
export function currentExecutablePath(): string {
  return process.execPath
}
