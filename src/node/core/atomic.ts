/**
 * Atomic file helpers for the session and history files.
 * Writes go to a temp file that is renamed over the target.
 */

import { mkdir, readFile } from 'fs/promises'
import { dirname } from 'path'
import writeFileAtomic from 'write-file-atomic'
import { StorageError } from '../shared/errors'

export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const json = JSON.stringify(data, null, 2) + '\n'
  try {
    await mkdir(dirname(filePath), { recursive: true })
    await writeFileAtomic(filePath, json, { encoding: 'utf8' })
  } catch (error) {
    throw new StorageError(`Atomic write failed: ${filePath}`, filePath, error)
  }
}

export type JsonReadResult = { found: false } | { found: true; value: unknown }

/**
 * Reads and parses a JSON file. A missing file is `found: false`; unreadable
 * or unparsable content is a StorageError.
 */
export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let raw: string
  try {
    raw = await readFile(filePath, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      return { found: false }
    }
    throw new StorageError(`Failed to read: ${filePath}`, filePath, error)
  }

  try {
    const value: unknown = JSON.parse(raw)
    return { found: true, value }
  } catch (error) {
    throw new StorageError(`Corrupt JSON in ${filePath}`, filePath, error)
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
