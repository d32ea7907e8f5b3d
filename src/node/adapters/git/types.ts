/**
 * Git Adapter Types
 *
 * Result and outcome types for git commands. Every git operation resolves with
 * one of these outcomes; none of them is thrown.
 */

/**
 * Raw result of running one external command.
 */
export type CommandResult = {
  exitCode: number
  stdout: string
  stderr: string
  durationMs: number
}

/**
 * A command as it was issued, reported to listeners once it has finished.
 */
export type IssuedCommand = {
  program: string
  args: string[]
  cwd: string
  /** Classified outcome name, e.g. `merge-ok` or `push-rejected`. */
  outcome: string
  /** Undefined when the process could not be spawned. */
  result?: CommandResult
  spawnError?: string
}

export type CommandListener = (command: IssuedCommand) => void

// ============================================================================
// Outcomes
// ============================================================================

export type GitErrorOutcome = { kind: 'git-error'; message: string; exitCode: number }
export type SpawnErrorOutcome = { kind: 'spawn-error'; message: string }

/**
 * Failures that are fatal for the step that issued the command.
 */
export type GitFailure = GitErrorOutcome | SpawnErrorOutcome

export type OkOutcome = { kind: 'ok' }

export type CheckoutOutcome = { kind: 'checked-out' } | { kind: 'branch-not-found'; ref: string } | GitFailure

export type MergeOutcome =
  | { kind: 'merge-ok'; alreadyUpToDate: boolean }
  | { kind: 'merge-conflict'; conflictedPaths: string[] }
  | GitFailure

export type CommitOutcome = { kind: 'committed'; sha?: string } | { kind: 'nothing-to-commit' } | GitFailure

export type PushOutcome = { kind: 'pushed' } | { kind: 'push-rejected'; detail: string } | GitFailure

/**
 * Outcome of the commands Abort relies on. A failure here may leave the
 * working copy dirty.
 */
export type RecoveryOutcome = { kind: 'ok' } | { kind: 'unrecoverable-state'; message: string }

export type GitQueryOutcome<T> = { kind: 'ok'; value: T } | GitFailure

export type CheckoutOptions = {
  /**
   * Create (or reset) this branch at `ref` and check it out.
   */
  createBranch?: string
}
