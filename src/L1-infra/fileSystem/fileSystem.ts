import { existsSync, readFileSync } from 'fs'

/** Check whether a filesystem entry exists at `filePath`. */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** Read a UTF-8 text file. Throws if it cannot be read. */
export function readTextFileSync(filePath: string): string {
  return readFileSync(filePath, 'utf-8')
}
