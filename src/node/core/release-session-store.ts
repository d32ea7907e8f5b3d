/**
 * Release Session Store
 *
 * Persists the one in-progress release session of an installation so a run
 * can be resumed after a restart. The whole session is written after every
 * step; a write is atomic (temp file then rename).
 *
 * This module provides:
 * - An abstract interface for session persistence
 * - A file-backed implementation (`<dataDir>/session.json`)
 * - An in-memory implementation for tests and embedding
 */

import type { ReleaseSession } from '@shared/types'
import { rm } from 'fs/promises'
import path from 'path'
import { SESSION_FILE_NAME } from '../shared/constants'
import { StorageError } from '../shared/errors'
import { atomicWriteJson, readJsonFile } from './atomic'
import { releaseSessionSchema } from './schemas'

/**
 * Result of loading the stored session.
 *
 * `resumable` is true for Active and Suspended sessions. A Completed or Aborted
 * session should have been cleared by the completion hand-off; finding one
 * means the process stopped between the history write and the clear, and it
 * comes back with a warning so the caller can finish the hand-off.
 */
export type SessionLoadResult =
  | { found: false }
  | { found: true; session: ReleaseSession; resumable: boolean; warning?: string }

export interface IReleaseSessionStore {
  /**
   * Overwrite the stored session with a full snapshot.
   * @throws StorageError when the write fails
   */
  save(session: ReleaseSession): Promise<void>

  /**
   * @throws StorageError when the stored file is unreadable or invalid
   */
  load(): Promise<SessionLoadResult>

  /**
   * Remove the stored session. Clearing an empty store is a no-op.
   */
  clear(): Promise<void>
}

export class FileReleaseSessionStore implements IReleaseSessionStore {
  readonly filePath: string

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, SESSION_FILE_NAME)
  }

  async save(session: ReleaseSession): Promise<void> {
    await atomicWriteJson(this.filePath, session)
  }

  async load(): Promise<SessionLoadResult> {
    const read = await readJsonFile(this.filePath)
    if (!read.found) {
      return { found: false }
    }

    const parsed = releaseSessionSchema.safeParse(read.value)
    if (!parsed.success) {
      throw new StorageError(
        `Stored session is invalid: ${parsed.error.issues[0]?.message ?? 'unknown error'}`,
        this.filePath,
        parsed.error
      )
    }

    return describeLoadedSession(parsed.data)
  }

  async clear(): Promise<void> {
    try {
      await rm(this.filePath, { force: true })
    } catch (error) {
      throw new StorageError(`Failed to clear session: ${this.filePath}`, this.filePath, error)
    }
  }
}

/**
 * In-memory implementation of IReleaseSessionStore.
 * Snapshots are copied on the way in and out, like a serializing store.
 */
export class InMemoryReleaseSessionStore implements IReleaseSessionStore {
  private stored: ReleaseSession | null = null

  async save(session: ReleaseSession): Promise<void> {
    this.stored = structuredClone(session)
  }

  async load(): Promise<SessionLoadResult> {
    if (!this.stored) {
      return { found: false }
    }
    return describeLoadedSession(structuredClone(this.stored))
  }

  async clear(): Promise<void> {
    this.stored = null
  }
}

function describeLoadedSession(session: ReleaseSession): SessionLoadResult {
  switch (session.status) {
    case 'active':
    case 'suspended':
      return { found: true, session, resumable: true }
    case 'failed':
      return { found: true, session, resumable: false }
    case 'completed':
    case 'aborted':
      return {
        found: true,
        session,
        resumable: false,
        warning: `Session ${session.id} is ${session.status} but was not archived; resume to finish archiving it`
      }
  }
}
