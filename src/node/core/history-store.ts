/**
 * History Store
 *
 * Append-only archive of terminated releases: an index of one row per run
 * (`history/index.json`) and one detail record per run (`history/<id>.json`).
 * The detail is written before the index row, so every indexed id has a
 * detail. Appending an id that is already indexed does nothing, which keeps
 * a repeated completion hand-off from duplicating a record.
 */

import type { HistoryDetail, HistoryEntry } from '@shared/types'
import path from 'path'
import { HISTORY_DIR_NAME, HISTORY_INDEX_FILE_NAME } from '../shared/constants'
import { InvariantError, NotFoundError, StorageError } from '../shared/errors'
import { atomicWriteJson, readJsonFile } from './atomic'
import { historyDetailSchema, historyIndexSchema } from './schemas'

const RECORD_ID_PATTERN = /^[A-Za-z0-9._-]+$/

export interface IHistoryStore {
  /**
   * Archive a run.
   * @returns false when the id was already archived
   * @throws StorageError when a write fails
   */
  append(entry: HistoryEntry, detail: HistoryDetail): Promise<boolean>

  /**
   * All entries in append order.
   */
  loadIndex(): Promise<HistoryEntry[]>

  /**
   * @throws NotFoundError when the id is unknown
   */
  loadDetail(id: string): Promise<HistoryDetail>
}

export class FileHistoryStore implements IHistoryStore {
  readonly dir: string
  private readonly indexPath: string

  constructor(dataDir: string) {
    this.dir = path.join(dataDir, HISTORY_DIR_NAME)
    this.indexPath = path.join(this.dir, HISTORY_INDEX_FILE_NAME)
  }

  async append(entry: HistoryEntry, detail: HistoryDetail): Promise<boolean> {
    assertConsistentRecord(entry, detail)

    const index = await this.loadIndex()
    if (index.some((existing) => existing.id === entry.id)) {
      return false
    }

    await atomicWriteJson(this.detailPath(entry.id), detail)
    await atomicWriteJson(this.indexPath, [...index, entry])
    return true
  }

  async loadIndex(): Promise<HistoryEntry[]> {
    const read = await readJsonFile(this.indexPath)
    if (!read.found) {
      return []
    }

    const parsed = historyIndexSchema.safeParse(read.value)
    if (!parsed.success) {
      throw new StorageError('History index is invalid', this.indexPath, parsed.error)
    }
    return parsed.data
  }

  async loadDetail(id: string): Promise<HistoryDetail> {
    const detailPath = this.detailPath(id)
    const read = await readJsonFile(detailPath)
    if (!read.found) {
      throw new NotFoundError(`History record '${id}' not found`, 'history-record')
    }

    const parsed = historyDetailSchema.safeParse(read.value)
    if (!parsed.success) {
      throw new StorageError(`History record '${id}' is invalid`, detailPath, parsed.error)
    }
    return parsed.data
  }

  private detailPath(id: string): string {
    if (!RECORD_ID_PATTERN.test(id)) {
      throw new NotFoundError(`History record '${id}' not found`, 'history-record')
    }
    return path.join(this.dir, `${id}.json`)
  }
}

/**
 * In-memory implementation of IHistoryStore.
 */
export class InMemoryHistoryStore implements IHistoryStore {
  private entries: HistoryEntry[] = []
  private details: Map<string, HistoryDetail> = new Map()

  async append(entry: HistoryEntry, detail: HistoryDetail): Promise<boolean> {
    assertConsistentRecord(entry, detail)

    if (this.entries.some((existing) => existing.id === entry.id)) {
      return false
    }
    this.details.set(entry.id, structuredClone(detail))
    this.entries.push(structuredClone(entry))
    return true
  }

  async loadIndex(): Promise<HistoryEntry[]> {
    return structuredClone(this.entries)
  }

  async loadDetail(id: string): Promise<HistoryDetail> {
    const detail = this.details.get(id)
    if (!detail) {
      throw new NotFoundError(`History record '${id}' not found`, 'history-record')
    }
    return structuredClone(detail)
  }
}

function assertConsistentRecord(entry: HistoryEntry, detail: HistoryDetail): void {
  if (detail.entry.id !== entry.id) {
    throw new InvariantError(
      `History detail id '${detail.entry.id}' does not match entry id '${entry.id}'`
    )
  }
}
