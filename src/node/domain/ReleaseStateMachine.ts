/**
 * Release State Machine
 *
 * Pure state machine for release sessions.
 * Contains only pure functions that transform state - no I/O.
 *
 * Step sequence:
 *
 *   init -> checkout-root -> merge-branches(0..N-1) -> apply-exclusions
 *        -> commit -> push -> create-remote-mr -> done (completed)
 *
 * A merge conflict, a rejected push or a failed MR creation suspends the
 * session at its step; retry re-attempts that same step. Git errors, spawn
 * errors and a missing root branch fail the session, after which only abort
 * is accepted. Abort is accepted from every non-terminal state.
 */

import { ENVIRONMENT_BRANCHES } from '@shared/types'
import type {
  FailureReason,
  HistoryDetail,
  HistoryEntry,
  ReleaseCommand,
  ReleaseLogEntry,
  ReleaseSession,
  ReleaseSessionStatus,
  ReleaseStep,
  StartReleaseParams,
  SuspensionReason,
  TerminalStatus,
  ThemeColorSnapshot
} from '@shared/types'
import { DEFAULT_REMOTE } from '../shared/constants'
import { InvariantError } from '../shared/errors'
import { ReleaseNaming } from './ReleaseNaming'

export type CreateReleaseSessionParams = {
  id: string
  params: StartReleaseParams
  nowMs: number
}

export type TransitionParams = {
  session: ReleaseSession
  nowMs: number
}

export type AdvanceParams = TransitionParams & {
  /** Step results recorded on the session as it advances. */
  results?: Partial<
    Pick<
      ReleaseSession,
      'preReleaseCommit' | 'originalBranch' | 'removedPaths' | 'commitSha' | 'mergeRequestUrl'
    >
  >
}

export type CanAcceptOptions = {
  /** True while a step is running. */
  inFlight?: boolean
}

export type HistoryRecord = {
  entry: HistoryEntry
  detail: HistoryDetail
}

/**
 * Pure state machine for release operations.
 * All methods are static and produce new state without side effects.
 */
export class ReleaseStateMachine {
  private constructor() {
    // Static-only class
  }

  /**
   * Creates an Active session at `init`. Merge requests keep their order;
   * the project is taken from the first one.
   */
  static createSession({ id, params, nowMs }: CreateReleaseSessionParams): ReleaseSession {
    const [first] = params.mergeRequests
    if (!first) {
      throw new InvariantError('Cannot create a release session without merge requests')
    }

    return {
      id,
      repoPath: params.repoPath,
      projectId: first.projectId,
      mergeRequests: params.mergeRequests.map((mr) => ({ ...mr })),
      environment: params.environment,
      rootBranch: ENVIRONMENT_BRANCHES[params.environment],
      releaseBranch: ReleaseNaming.releaseBranch(params.version, params.environment),
      remote: params.remote ?? DEFAULT_REMOTE,
      version: params.version,
      excludePatterns: [...params.excludePatterns],
      currentStep: { kind: 'init' },
      status: 'active',
      log: [],
      createdAtMs: nowMs,
      updatedAtMs: nowMs
    }
  }

  /**
   * The step after `step` for a release of `mergeRequestCount` merge requests.
   */
  static nextStep(step: ReleaseStep, mergeRequestCount: number): ReleaseStep {
    switch (step.kind) {
      case 'init':
        return { kind: 'checkout-root' }
      case 'checkout-root':
        return mergeRequestCount > 0
          ? { kind: 'merge-branches', index: 0 }
          : { kind: 'apply-exclusions' }
      case 'merge-branches':
        return step.index + 1 < mergeRequestCount
          ? { kind: 'merge-branches', index: step.index + 1 }
          : { kind: 'apply-exclusions' }
      case 'apply-exclusions':
        return { kind: 'commit' }
      case 'commit':
        return { kind: 'push' }
      case 'push':
        return { kind: 'create-remote-mr' }
      case 'create-remote-mr':
        return { kind: 'done' }
      case 'done':
        throw new InvariantError('A completed release has no next step')
    }
  }

  /**
   * Moves an Active session to its next step. Reaching `done` completes it.
   */
  static advance({ session, nowMs, results }: AdvanceParams): ReleaseSession {
    ReleaseStateMachine.assertStatus(session, 'active', 'advance')

    const next = ReleaseStateMachine.nextStep(session.currentStep, session.mergeRequests.length)
    const advanced: ReleaseSession = {
      ...session,
      ...results,
      currentStep: next,
      updatedAtMs: nowMs
    }

    return next.kind === 'done'
      ? ReleaseStateMachine.complete({ session: advanced, nowMs })
      : advanced
  }

  static suspend({
    session,
    reason,
    nowMs
  }: TransitionParams & { reason: SuspensionReason }): ReleaseSession {
    ReleaseStateMachine.assertStatus(session, 'active', 'suspend')
    return {
      ...session,
      status: 'suspended',
      suspension: reason,
      updatedAtMs: nowMs
    }
  }

  static fail({
    session,
    failure,
    nowMs
  }: TransitionParams & { failure: FailureReason }): ReleaseSession {
    ReleaseStateMachine.assertStatus(session, 'active', 'fail')
    return {
      ...session,
      status: 'failed',
      failure,
      updatedAtMs: nowMs
    }
  }

  /**
   * Reactivates a Suspended session at the same step.
   * @throws InvariantError when the session is not suspended
   */
  static beginRetry({ session, nowMs }: TransitionParams): ReleaseSession {
    ReleaseStateMachine.assertStatus(session, 'suspended', 'retry')
    const { suspension: _suspension, ...rest } = session
    return {
      ...rest,
      status: 'active',
      updatedAtMs: nowMs
    }
  }

  static complete({ session, nowMs }: TransitionParams): ReleaseSession {
    ReleaseStateMachine.assertStatus(session, 'active', 'complete')
    return {
      ...session,
      currentStep: { kind: 'done' },
      status: 'completed',
      updatedAtMs: nowMs,
      finishedAtMs: nowMs
    }
  }

  /**
   * Ends a non-terminal session as Aborted. The step it stopped at is kept.
   */
  static markAborted({ session, nowMs }: TransitionParams): ReleaseSession {
    if (ReleaseStateMachine.isTerminal(session.status)) {
      throw new InvariantError(`Release ${session.id} is already ${session.status}`)
    }
    const { suspension: _suspension, ...rest } = session
    return {
      ...rest,
      status: 'aborted',
      updatedAtMs: nowMs,
      finishedAtMs: nowMs
    }
  }

  static appendLog(session: ReleaseSession, entries: ReleaseLogEntry[]): ReleaseSession {
    if (entries.length === 0) {
      return session
    }
    return {
      ...session,
      log: [...session.log, ...entries]
    }
  }

  /**
   * Whether `command` is accepted for `session` (null when there is none).
   * While a step is in flight only abort is accepted.
   */
  static canAccept(
    session: ReleaseSession | null,
    command: ReleaseCommand,
    options: CanAcceptOptions = {}
  ): boolean {
    if (options.inFlight && command !== 'abort') {
      return false
    }

    switch (command) {
      case 'start':
        return session === null || ReleaseStateMachine.isTerminal(session.status)
      case 'retry':
        return session?.status === 'suspended'
      case 'advance':
        return session?.status === 'active'
      case 'abort':
        return session !== null && !ReleaseStateMachine.isTerminal(session.status)
    }
  }

  static isTerminal(status: ReleaseSessionStatus): status is TerminalStatus {
    return status === 'completed' || status === 'aborted'
  }

  /**
   * Builds the immutable history record of a Completed or Aborted session.
   */
  static toHistoryRecord(session: ReleaseSession, theme: ThemeColorSnapshot): HistoryRecord {
    const { status } = session
    if (!ReleaseStateMachine.isTerminal(status)) {
      throw new InvariantError(`Cannot archive release ${session.id} while it is ${status}`)
    }

    const entry: HistoryEntry = {
      id: session.id,
      tag: ReleaseNaming.tag(session.version, session.environment),
      environment: session.environment,
      dateTimeMs: session.finishedAtMs ?? session.updatedAtMs,
      mrCount: session.mergeRequests.length,
      status
    }

    return {
      entry,
      detail: {
        entry,
        version: session.version,
        rootBranch: session.rootBranch,
        releaseBranch: session.releaseBranch,
        mergeRequests: session.mergeRequests,
        mergeRequestUrl: session.mergeRequestUrl,
        log: session.log,
        theme
      }
    }
  }

  private static assertStatus(
    session: ReleaseSession,
    expected: ReleaseSessionStatus,
    action: string
  ): void {
    if (session.status !== expected) {
      throw new InvariantError(
        `Cannot ${action} release ${session.id}: expected ${expected}, was ${session.status}`
      )
    }
  }
}
