import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest'
import { chmodSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import {
  FfprobeCommand,
  FfprobeLaunchError,
  ffprobeIsInstalled,
  ffprobeVersionWithPath,
  resolveFfprobe,
} from '../../../L2-clients/ffprobe/index.js'
import { initConfig, resetConfig } from '../../../L1-infra/config/environment.js'

const FAKE_BANNER = 'ffprobe version 0.0-test Copyright (c) the test suite\nconfiguration: --disable-everything\n'

// Stand-in ffprobe: a node script with a shebang, so it only runs where shebangs do
const canRunScripts = process.platform !== 'win32' && !process.execPath.includes(' ')

function writeFakeProbe(dir: string, name: string, exitCode: number): string {
  const file = join(dir, name)
  writeFileSync(file, [
    `#!${process.execPath}`,
    `if (process.argv.includes('-version')) process.stdout.write(${JSON.stringify(FAKE_BANNER)})`,
    `else process.stdout.write(JSON.stringify(process.argv.slice(2)))`,
    `process.exitCode = ${exitCode}`,
    '',
  ].join('\n'))
  chmodSync(file, 0o755)
  return file
}

describe('L2 Integration: ffprobe against real processes', () => {
  let workDir: string

  beforeAll(() => {
    workDir = mkdtempSync(join(tmpdir(), 'ffprobe-sidecar-it-'))
  })

  afterAll(() => {
    rmSync(workDir, { recursive: true, force: true })
  })

  beforeEach(() => {
    vi.stubEnv('FFPROBE_PATH', '')
    resetConfig()
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    resetConfig()
  })

  it('reports not installed when FFPROBE_PATH points at a nonexistent file', () => {
    initConfig({ ffprobePath: join(workDir, 'missing', 'ffprobe') })
    expect(ffprobeIsInstalled()).toBe(false)
  })

  it('reports not installed when the sidecar is missing and PATH has no ffprobe', () => {
    vi.stubEnv('PATH', join(workDir, 'empty-path'))
    expect(ffprobeIsInstalled({ execPath: join(workDir, 'host-app') })).toBe(false)
  })

  it('raises FfprobeLaunchError from the version query for a missing binary', () => {
    expect(() => ffprobeVersionWithPath(join(workDir, 'missing', 'ffprobe'))).toThrow(FfprobeLaunchError)
  })

  it('captures stdout past 1 MiB in full', () => {
    const size = 3 * 1024 * 1024
    const out = new FfprobeCommand(process.execPath)
      .args(['-e', `process.stdout.write('x'.repeat(${size}))`])
      .output()

    expect(out.status).toBe(0)
    expect(out.stdout.length).toBe(size)
  })

  it('raises FfprobeLaunchError from the version query for an empty program', () => {
    expect(() => ffprobeVersionWithPath('')).toThrow(FfprobeLaunchError)
  })

  it('raises FfprobeLaunchError for an argument containing a NUL byte', () => {
    expect(() => new FfprobeCommand(process.execPath).arg('a\0b').output()).toThrow(FfprobeLaunchError)
  })

  it('raises FfprobeLaunchError from status() for an empty program', () => {
    expect(() => new FfprobeCommand('').status()).toThrow(FfprobeLaunchError)
  })

  describe.skipIf(!canRunScripts)('with a stand-in ffprobe', () => {
    let sidecarDir: string
    let sidecar: string

    beforeAll(() => {
      sidecarDir = mkdtempSync(join(workDir, 'bundle-'))
      sidecar = writeFakeProbe(sidecarDir, 'ffprobe', 0)
    })

    it('returns the version banner unmodified', () => {
      expect(ffprobeVersionWithPath(sidecar)).toBe(FAKE_BANNER)
    })

    it('finds the sidecar next to the host executable', () => {
      expect(resolveFfprobe({ execPath: join(sidecarDir, 'host-app') }))
        .toEqual({ kind: 'sidecar', path: sidecar })
    })

    it('reports the sidecar as installed', () => {
      expect(ffprobeIsInstalled({ execPath: join(sidecarDir, 'host-app') })).toBe(true)
    })

    it('reports not installed when ffprobe exits with an error', () => {
      initConfig({ ffprobePath: writeFakeProbe(workDir, 'broken-ffprobe', 1) })
      expect(ffprobeIsInstalled()).toBe(false)
    })

    it('finds ffprobe on the system PATH when there is no sidecar', () => {
      vi.stubEnv('PATH', sidecarDir)
      expect(ffprobeIsInstalled({ execPath: join(workDir, 'host-app') })).toBe(true)
    })

    it('passes built arguments through to the process in order', () => {
      const out = new FfprobeCommand(sidecar)
        .hideBanner()
        .printFormat('json')
        .args(['-show_entries', 'format=duration'])
        .output()

      expect(out.status).toBe(0)
      expect(JSON.parse(out.stdout.toString('utf-8')))
        .toEqual(['-hide_banner', '-print_format', 'json', '-show_entries', 'format=duration'])
    })
  })
})
