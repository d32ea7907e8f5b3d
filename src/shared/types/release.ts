/**
 * Release Types
 *
 * Pure type definitions for the release state machine.
 * These types describe a release session, its steps, its log and the
 * reasons it can pause or fail.
 */

// ============================================================================
// Environments
// ============================================================================

export const ENVIRONMENTS = ['DEVELOP', 'TEST', 'STAGE', 'PROD'] as const
export type Environment = (typeof ENVIRONMENTS)[number]

/**
 * Fixed root branch for every environment.
 */
export const ENVIRONMENT_BRANCHES: Record<Environment, string> = {
  DEVELOP: 'develop',
  TEST: 'testing',
  STAGE: 'stable',
  PROD: 'master'
}

export function isEnvironment(value: string): value is Environment {
  return (ENVIRONMENTS as readonly string[]).includes(value)
}

// ============================================================================
// Status and Step Types
// ============================================================================

export type ReleaseSessionStatus = 'active' | 'suspended' | 'completed' | 'aborted' | 'failed'

export type TerminalStatus = Extract<ReleaseSessionStatus, 'completed' | 'aborted'>

export type ReleaseStep =
  | { kind: 'init' }
  | { kind: 'checkout-root' }
  | { kind: 'merge-branches'; index: number }
  | { kind: 'apply-exclusions' }
  | { kind: 'commit' }
  | { kind: 'push' }
  | { kind: 'create-remote-mr' }
  | { kind: 'done' }

export type ReleaseStepKind = ReleaseStep['kind']

/**
 * Why a session is waiting for the operator.
 */
export type SuspensionReason =
  | { kind: 'merge-conflict'; branch: string; conflictedPaths: string[] }
  | { kind: 'push-rejected'; detail: string }
  | { kind: 'remote-mr-failed'; message: string }

/**
 * Why a session can only be aborted.
 */
export type FailureReason = {
  kind: 'git-error' | 'spawn-error' | 'branch-not-found'
  message: string
}

// ============================================================================
// Session
// ============================================================================

export type MergeRequestRef = {
  projectId: number
  sourceBranch: string
  targetBranch: string
  iid: number
  title: string
}

export type ReleaseLogEntry = {
  timestampMs: number
  /** Label of the step that issued the command, e.g. `merge-branches[1]` or `abort`. */
  step: string
  command: string
  outcome: string
  excerpt: string
}

export type ReleaseSession = {
  id: string
  repoPath: string
  projectId: number
  mergeRequests: MergeRequestRef[]
  environment: Environment
  rootBranch: string
  releaseBranch: string
  remote: string
  version: string
  /** Snapshot taken at start; later config edits do not apply. */
  excludePatterns: string[]
  currentStep: ReleaseStep
  status: ReleaseSessionStatus
  suspension?: SuspensionReason
  failure?: FailureReason
  /** HEAD before the release touched the working copy. Abort resets here. */
  preReleaseCommit?: string
  originalBranch?: string
  removedPaths?: string[]
  commitSha?: string
  mergeRequestUrl?: string
  log: ReleaseLogEntry[]
  createdAtMs: number
  updatedAtMs: number
  finishedAtMs?: number
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Named inputs a front end may dispatch to the engine.
 */
export type ReleaseCommand = 'start' | 'retry' | 'abort' | 'advance'

export type StartReleaseParams = {
  repoPath: string
  mergeRequests: MergeRequestRef[]
  environment: Environment
  version: string
  excludePatterns: string[]
  remote?: string
}
