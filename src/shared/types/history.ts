import type { Environment, MergeRequestRef, ReleaseLogEntry } from './release'

export type HistoryStatus = 'completed' | 'aborted'

export type HistoryEntry = {
  id: string
  /** Derived from version and environment, e.g. `v1.2.0-prod`. */
  tag: string
  environment: Environment
  dateTimeMs: number
  mrCount: number
  status: HistoryStatus
}

/**
 * ANSI escape prefixes of the theme that was active when a record was written.
 * Stored with the record so its log renders the same under any later theme.
 */
export type ThemeColorSnapshot = {
  accent: string
  success: string
  warning: string
  error: string
  foreground: string
}

export type HistoryDetail = {
  entry: HistoryEntry
  version: string
  rootBranch: string
  releaseBranch: string
  mergeRequests: MergeRequestRef[]
  mergeRequestUrl?: string
  log: ReleaseLogEntry[]
  theme: ThemeColorSnapshot
}
