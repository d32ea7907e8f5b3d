/**
 * Exclusion Applier
 *
 * Removes files matching the session's exclusion patterns from the release
 * branch before the release commit. Removal goes through `git rm`, so the
 * deletions are staged. Unmatched patterns are skipped; running the step again
 * on a tree where the files are already gone removes nothing.
 */

import { log } from '@shared/logger'
import type { GitOperations } from '../adapters/git/GitOperations'
import type { GitFailure } from '../adapters/git/types'

export type ExclusionResult = { kind: 'ok'; removedPaths: string[] } | GitFailure

/**
 * Splits a newline-delimited pattern source (or a list of such sources) into
 * individual patterns. Blank lines and `#` comments are dropped, a leading `/`
 * anchors the pattern at the repository root and is stripped. Order is kept
 * and duplicates removed.
 */
export function parseExclusionPatterns(source: string | string[]): string[] {
  const lines = (Array.isArray(source) ? source : [source]).flatMap((entry) => entry.split(/\r?\n/))
  const patterns: string[] = []

  for (const line of lines) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue

    const pattern = trimmed.replace(/^\/+/, '')
    if (pattern && !patterns.includes(pattern)) {
      patterns.push(pattern)
    }
  }

  return patterns
}

export async function applyExclusions(
  git: GitOperations,
  excludePatterns: string[]
): Promise<ExclusionResult> {
  const removedPaths: string[] = []

  for (const pattern of parseExclusionPatterns(excludePatterns)) {
    const listed = await git.listFiles(pattern)
    if (listed.kind !== 'ok') {
      return listed
    }

    const matches = listed.value.filter((path) => !removedPaths.includes(path))
    if (matches.length === 0) {
      log.debug(`[ExclusionApplier] No tracked files match '${pattern}'`)
      continue
    }

    const removed = await git.removePaths(matches)
    if (removed.kind !== 'ok') {
      return removed
    }
    removedPaths.push(...matches)
  }

  if (removedPaths.length > 0) {
    log.info(`[ExclusionApplier] Removed ${removedPaths.length} excluded file(s)`)
  }

  return { kind: 'ok', removedPaths }
}
