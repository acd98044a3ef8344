import pathMod from 'path'
export { pathMod }

export type PlatformPath = typeof pathMod.posix

/** Path flavour for a target platform; `win32` gets backslash semantics on any host. */
export function pathForPlatform(platform: NodeJS.Platform): PlatformPath {
  return platform === 'win32' ? pathMod.win32 : pathMod.posix
}
