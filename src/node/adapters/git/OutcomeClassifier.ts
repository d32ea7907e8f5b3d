/**
 * Outcome Classifier
 *
 * Maps raw git results to outcome names with small ordered rule tables.
 * Git's exit codes are coarse (a conflict and a broken merge both exit 1), so
 * rules look at the output too. Rules are evaluated top to bottom and the
 * first match wins; the table's fallback applies when none matches.
 *
 * Output matching is a second line of defence: where git offers a
 * machine-readable signal (unmerged paths from `git diff --diff-filter=U`)
 * GitOperations checks that first.
 */

import type { CommandResult } from './types'

export type OutcomeRule<K extends string> = {
  outcome: K
  matches: (result: CommandResult) => boolean
}

export type OutcomeTable<K extends string> = {
  rules: OutcomeRule<K>[]
  fallback: K
}

export function classify<K extends string>(table: OutcomeTable<K>, result: CommandResult): K {
  for (const rule of table.rules) {
    if (rule.matches(result)) {
      return rule.outcome
    }
  }
  return table.fallback
}

export function combinedOutput(result: CommandResult): string {
  return [result.stdout, result.stderr].filter((part) => part.length > 0).join('\n')
}

const succeeded = (result: CommandResult): boolean => result.exitCode === 0

const outputMatches =
  (pattern: RegExp) =>
  (result: CommandResult): boolean =>
    result.exitCode !== 0 && pattern.test(combinedOutput(result))

// ============================================================================
// Rule Tables
// ============================================================================

const UNKNOWN_REF_PATTERN =
  /did not match any file\(s\) known to git|invalid reference|not a valid object name|unknown revision|is not a commit and a branch/i

export const CHECKOUT_RULES: OutcomeTable<'checked-out' | 'branch-not-found' | 'git-error'> = {
  rules: [
    { outcome: 'checked-out', matches: succeeded },
    { outcome: 'branch-not-found', matches: outputMatches(UNKNOWN_REF_PATTERN) }
  ],
  fallback: 'git-error'
}

const CONFLICT_PATTERN = /^CONFLICT \(|Automatic merge failed; fix conflicts/m

export const MERGE_RULES: OutcomeTable<'merge-ok' | 'merge-conflict' | 'git-error'> = {
  rules: [
    { outcome: 'merge-ok', matches: succeeded },
    { outcome: 'merge-conflict', matches: outputMatches(CONFLICT_PATTERN) }
  ],
  fallback: 'git-error'
}

const NOTHING_TO_COMMIT_PATTERN = /nothing to commit|nothing added to commit|no changes added to commit/i

export const COMMIT_RULES: OutcomeTable<'committed' | 'nothing-to-commit' | 'git-error'> = {
  rules: [
    { outcome: 'committed', matches: succeeded },
    { outcome: 'nothing-to-commit', matches: outputMatches(NOTHING_TO_COMMIT_PATTERN) }
  ],
  fallback: 'git-error'
}

const PUSH_REJECTED_PATTERN =
  /\[rejected\]|non-fast-forward|Updates were rejected|fetch first|\[remote rejected\]/i

export const PUSH_RULES: OutcomeTable<'pushed' | 'push-rejected' | 'git-error'> = {
  rules: [
    { outcome: 'pushed', matches: succeeded },
    { outcome: 'push-rejected', matches: outputMatches(PUSH_REJECTED_PATTERN) }
  ],
  fallback: 'git-error'
}

export const RECOVERY_RULES: OutcomeTable<'ok' | 'unrecoverable-state'> = {
  rules: [{ outcome: 'ok', matches: succeeded }],
  fallback: 'unrecoverable-state'
}

export const SIMPLE_RULES: OutcomeTable<'ok' | 'git-error'> = {
  rules: [{ outcome: 'ok', matches: succeeded }],
  fallback: 'git-error'
}

// ============================================================================
// Output Parsers
// ============================================================================

/**
 * Extracts conflicted paths from merge output lines such as
 * `CONFLICT (content): Merge conflict in src/app.ts` or
 * `CONFLICT (modify/delete): docs/a.md deleted in HEAD and modified in ...`.
 */
export function parseConflictPaths(output: string): string[] {
  const paths = new Set<string>()

  for (const line of output.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed.startsWith('CONFLICT (')) continue

    const mergeConflictIn = trimmed.match(/Merge conflict in (.+)$/)
    if (mergeConflictIn?.[1]) {
      paths.add(mergeConflictIn[1].trim())
      continue
    }

    const afterKind = trimmed.match(/^CONFLICT \([^)]*\):\s*(\S+)/)
    if (afterKind?.[1]) {
      paths.add(afterKind[1])
    }
  }

  return [...paths]
}

/**
 * Reads the short SHA from the first line of `git commit` output,
 * e.g. `[release/v1.2.0-prod 3f2a1bc] Release v1.2.0 (PROD)`.
 */
export function parseCommitSha(stdout: string): string | undefined {
  const match = stdout.match(/^\[[^\]]*?\s([0-9a-f]{7,40})\]/m)
  return match?.[1]
}

export function splitNullTerminated(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0)
}
