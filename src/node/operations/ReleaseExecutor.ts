/**
 * ReleaseExecutor - Release execution orchestration
 *
 * Drives a release session through its steps. This module bridges the gap
 * between the pure state machine (ReleaseStateMachine) and actual git and
 * GitLab operations.
 *
 * Responsibilities:
 * - Run each step and feed its outcome to the state machine
 * - Persist the session after every step
 * - Suspend on conflicts and rejected pushes, resume after restarts
 * - Roll the working copy back on abort
 * - Hand terminated sessions over to the history archive
 *
 * One step runs at a time. While a step is in flight, start, retry and resume
 * are refused; an abort is queued and runs once the step returns.
 */

import { log } from '@shared/logger'
import type {
  FailureReason,
  HistoryEntry,
  ReleaseCommand,
  ReleaseForge,
  ReleaseLogEntry,
  ReleaseSession,
  ReleaseStep,
  StartReleaseParams,
  SuspensionReason,
  ThemeColorSnapshot
} from '@shared/types'
import { createGitOperations, type CommandRunner, type GitOperations } from '../adapters/git'
import type { GitFailure } from '../adapters/git/types'
import { applyExclusions } from '../core/exclusion-applier'
import type { IHistoryStore } from '../core/history-store'
import { excerptOutput, toLogEntry } from '../core/release-log'
import type { IReleaseSessionStore, SessionLoadResult } from '../core/release-session-store'
import { captureThemeSnapshot } from '../core/theme'
import { ReleaseNaming, ReleaseStateMachine, ReleaseValidator } from '../domain'
import type { ValidationResult } from '../domain/ReleaseValidator'
import {
  GitCommandError,
  InvariantError,
  SessionBusyError,
  SessionError,
  ValidationError
} from '../shared/errors'
import { createSessionId } from '../shared/session-id'

export type ReleaseRunResult =
  | { status: 'completed'; session: ReleaseSession; historyEntry: HistoryEntry }
  | {
      status: 'aborted'
      session: ReleaseSession
      historyEntry: HistoryEntry
      /** True when a rollback command failed and the working copy needs manual cleanup. */
      manualCleanupRequired: boolean
      cleanupFailures: string[]
    }
  | { status: 'suspended'; session: ReleaseSession; reason: SuspensionReason }
  | { status: 'failed'; session: ReleaseSession; failure: FailureReason }

export type ReleaseExecutorDeps = {
  runner: CommandRunner
  sessionStore: IReleaseSessionStore
  historyStore: IHistoryStore
  /** GitLab client. Without one, the MR step suspends until one is configured. */
  forge?: ReleaseForge
  /** Colours stored with each history record. */
  captureTheme?: () => ThemeColorSnapshot
  now?: () => number
  generateId?: () => string
}

type StepContext = {
  git: GitOperations
  collected: ReleaseLogEntry[]
  /** True for the first step run by retry or resume. */
  recovering: boolean
}

const ABORT_STEP_LABEL = 'abort'
const INIT_STEP_LABEL = 'init'

export class ReleaseExecutor {
  private session: ReleaseSession | null = null
  private running: Promise<ReleaseRunResult> | null = null
  private abortRequested = false

  private readonly now: () => number
  private readonly generateId: () => string
  private readonly captureTheme: () => ThemeColorSnapshot

  constructor(private readonly deps: ReleaseExecutorDeps) {
    this.now = deps.now ?? Date.now
    this.generateId = deps.generateId ?? (() => createSessionId(this.now()))
    this.captureTheme = deps.captureTheme ?? (() => captureThemeSnapshot())
  }

  get isBusy(): boolean {
    return this.running !== null
  }

  /**
   * Current session: the in-memory one, else whatever the store holds.
   */
  async status(): Promise<SessionLoadResult> {
    if (this.session) {
      return {
        found: true,
        session: structuredClone(this.session),
        resumable: this.session.status === 'active' || this.session.status === 'suspended'
      }
    }
    return this.deps.sessionStore.load()
  }

  // ============================================================================
  // Commands
  // ============================================================================

  /**
   * Starts a release. Nothing is persisted until Init has passed, so a dirty
   * working tree or invalid parameters leave no session behind.
   *
   * @throws ValidationError for invalid parameters or a dirty working tree
   * @throws SessionError when a non-terminal session already exists
   */
  async start(params: StartReleaseParams): Promise<ReleaseRunResult> {
    this.assertIdleFor('start')
    return this.exclusive(async () => {
      await this.finalizeLeftoverSession()

      const existing = await this.loadCurrent()
      const noActive = ReleaseValidator.validateNoActiveSession(existing)
      if (!noActive.valid && existing) {
        throw new SessionError(noActive.message, existing.id, 'none', existing.status)
      }

      this.assertValid(ReleaseValidator.validateStartParams(params))

      const created = ReleaseStateMachine.createSession({
        id: this.generateId(),
        params,
        nowMs: this.now()
      })
      log.info(`[ReleaseExecutor] Starting release ${created.id} (${created.releaseBranch})`)

      const initialized = await this.runInit(created)
      await this.commit(initialized)
      return this.drive(false)
    })
  }

  /**
   * Re-attempts the step a Suspended session paused on.
   *
   * @throws InvariantError when there is no Suspended session
   */
  async retry(): Promise<ReleaseRunResult> {
    this.assertIdleFor('retry')
    return this.exclusive(async () => {
      const session = await this.requireSession('retry')
      if (!ReleaseStateMachine.canAccept(session, 'retry')) {
        throw new InvariantError(
          `Cannot retry release ${session.id}: it is ${session.status}, not suspended`
        )
      }
      await this.commit(ReleaseStateMachine.beginRetry({ session, nowMs: this.now() }))
      log.info(`[ReleaseExecutor] Retrying ${ReleaseNaming.stepLabel(session.currentStep)}`)
      return this.drive(true)
    })
  }

  /**
   * Continues a session after a restart. An Active session runs on from its
   * current step; Suspended and Failed sessions are reported as they are; a
   * Completed or Aborted session left in the store is archived.
   */
  async resume(): Promise<ReleaseRunResult> {
    this.assertIdleFor('advance')
    return this.exclusive(async () => {
      const session = await this.requireSession('resume')

      switch (session.status) {
        case 'active':
          log.info(`[ReleaseExecutor] Resuming at ${ReleaseNaming.stepLabel(session.currentStep)}`)
          return this.drive(true)
        case 'suspended':
        case 'failed':
          return this.describe(session)
        case 'completed':
        case 'aborted':
          return this.finalize(session)
      }
    })
  }

  /**
   * Rolls the working copy back and ends the session as Aborted. Rollback
   * failures are logged and reported; they never keep the session alive.
   * While a step is in flight the abort waits for it to return.
   *
   * @throws InvariantError when there is no session to abort
   */
  async abort(): Promise<ReleaseRunResult> {
    const running = this.running
    if (running) {
      log.info('[ReleaseExecutor] Abort requested; waiting for the running step')
      this.abortRequested = true
      try {
        const result = await running
        if (result.status === 'aborted' || result.status === 'completed') {
          return result
        }
      } catch (error) {
        log.warn('[ReleaseExecutor] Running step ended with an error before abort:', error)
      }
    }

    if (this.running) {
      // Another caller's abort is already rolling back
      return this.running
    }

    return this.exclusive(async () => {
      const session = await this.requireSession('abort')
      if (!ReleaseStateMachine.canAccept(session, 'abort')) {
        throw new InvariantError(
          `Release ${session.id} is already ${session.status}; resume to finish archiving it`
        )
      }
      return this.performAbort(session)
    })
  }

  // ============================================================================
  // Step Loop
  // ============================================================================

  private async drive(recovering: boolean): Promise<ReleaseRunResult> {
    let firstStep = recovering

    for (;;) {
      const session = this.requireLoaded()

      if (ReleaseStateMachine.isTerminal(session.status)) {
        return this.finalize(session)
      }
      if (this.abortRequested) {
        return this.performAbort(session)
      }
      if (session.status !== 'active') {
        return this.describe(session)
      }

      const label = ReleaseNaming.stepLabel(session.currentStep)
      const context = this.createStepContext(session, label, firstStep)
      firstStep = false

      log.debug(`[ReleaseExecutor] Running ${label}`)
      const next = await this.runStep(session, session.currentStep, context)
      await this.commit(ReleaseStateMachine.appendLog(next, context.collected))
    }
  }

  private async runStep(
    session: ReleaseSession,
    step: ReleaseStep,
    context: StepContext
  ): Promise<ReleaseSession> {
    switch (step.kind) {
      case 'checkout-root':
        return this.checkoutRoot(session, context)
      case 'merge-branches':
        return this.mergeBranch(session, step.index, context)
      case 'apply-exclusions':
        return this.excludeFiles(session, context)
      case 'commit':
        return this.commitRelease(session, context)
      case 'push':
        return this.pushRelease(session, context)
      case 'create-remote-mr':
        return this.createRemoteMergeRequest(session, context)
      case 'init':
      case 'done':
        throw new InvariantError(`Step '${step.kind}' is not run by the step loop`)
    }
  }

  /**
   * Requires a clean working tree and records where to roll back to.
   * Failures here throw: nothing has been changed or persisted yet.
   */
  private async runInit(session: ReleaseSession): Promise<ReleaseSession> {
    const collected: ReleaseLogEntry[] = []
    const git = this.createGit(session, INIT_STEP_LABEL, collected)

    const clean = await git.isWorkingTreeClean()
    if (clean.kind !== 'ok') {
      throw this.toInitError(clean, 'status')
    }
    this.assertValid(ReleaseValidator.validateCleanWorkingTree(clean.value))

    const head = await git.resolveRef('HEAD')
    if (head.kind !== 'ok') {
      throw this.toInitError(head, 'rev-parse')
    }

    const branch = await git.currentBranch()
    if (branch.kind !== 'ok') {
      throw this.toInitError(branch, 'rev-parse')
    }

    const advanced = ReleaseStateMachine.advance({
      session,
      nowMs: this.now(),
      results: {
        preReleaseCommit: head.value,
        originalBranch: branch.value ?? undefined
      }
    })
    return ReleaseStateMachine.appendLog(advanced, collected)
  }

  private async checkoutRoot(
    session: ReleaseSession,
    { git }: StepContext
  ): Promise<ReleaseSession> {
    const fetched = await git.fetch(session.remote)
    if (fetched.kind !== 'ok') {
      return this.failWith(session, fetched)
    }

    const rootRef = `${session.remote}/${session.rootBranch}`
    const checkout = await git.checkout(rootRef, { createBranch: session.releaseBranch })
    switch (checkout.kind) {
      case 'checked-out':
        return ReleaseStateMachine.advance({ session, nowMs: this.now() })
      case 'branch-not-found':
        return ReleaseStateMachine.fail({
          session,
          failure: { kind: 'branch-not-found', message: `Root branch '${rootRef}' not found` },
          nowMs: this.now()
        })
      default:
        return this.failWith(session, checkout)
    }
  }

  /**
   * Merges one source branch. When recovering, an unfinished merge left by
   * the previous attempt is inspected first: remaining unmerged paths
   * re-suspend the session; otherwise the operator's resolution is committed
   * and the merge re-run reports the branch as already merged.
   */
  private async mergeBranch(
    session: ReleaseSession,
    index: number,
    { git, recovering }: StepContext
  ): Promise<ReleaseSession> {
    const mr = session.mergeRequests[index]
    if (!mr) {
      throw new InvariantError(`No merge request at index ${index}`)
    }

    if (recovering) {
      const inProgress = await git.isMergeInProgress()
      if (inProgress.kind !== 'ok') {
        return this.failWith(session, inProgress)
      }

      if (inProgress.value) {
        const unmerged = await git.listUnmergedPaths()
        if (unmerged.kind !== 'ok') {
          return this.failWith(session, unmerged)
        }
        if (unmerged.value.length > 0) {
          return this.suspendForConflict(session, mr.sourceBranch, unmerged.value)
        }

        const concluded = await git.concludeMerge()
        if (concluded.kind === 'git-error' || concluded.kind === 'spawn-error') {
          return this.failWith(session, concluded)
        }
      }
    }

    const merged = await git.merge(`${session.remote}/${mr.sourceBranch}`)
    switch (merged.kind) {
      case 'merge-ok':
        log.info(
          `[ReleaseExecutor] Merged ${mr.sourceBranch}${merged.alreadyUpToDate ? ' (already up to date)' : ''}`
        )
        return ReleaseStateMachine.advance({ session, nowMs: this.now() })
      case 'merge-conflict':
        return this.suspendForConflict(session, mr.sourceBranch, merged.conflictedPaths)
      default:
        return this.failWith(session, merged)
    }
  }

  private async excludeFiles(
    session: ReleaseSession,
    { git }: StepContext
  ): Promise<ReleaseSession> {
    const excluded = await applyExclusions(git, session.excludePatterns)
    if (excluded.kind !== 'ok') {
      return this.failWith(session, excluded)
    }

    const removedPaths = [...(session.removedPaths ?? [])]
    for (const path of excluded.removedPaths) {
      if (!removedPaths.includes(path)) removedPaths.push(path)
    }
    return ReleaseStateMachine.advance({ session, nowMs: this.now(), results: { removedPaths } })
  }

  private async commitRelease(
    session: ReleaseSession,
    { git }: StepContext
  ): Promise<ReleaseSession> {
    const message = ReleaseNaming.commitMessage(
      session.version,
      session.environment,
      session.mergeRequests
    )
    const committed = await git.commitAll(message)

    switch (committed.kind) {
      case 'committed':
        return ReleaseStateMachine.advance({
          session,
          nowMs: this.now(),
          results: { commitSha: committed.sha }
        })
      case 'nothing-to-commit':
        log.info('[ReleaseExecutor] Nothing to commit; continuing to push')
        return ReleaseStateMachine.advance({ session, nowMs: this.now() })
      default:
        return this.failWith(session, committed)
    }
  }

  private async pushRelease(
    session: ReleaseSession,
    { git }: StepContext
  ): Promise<ReleaseSession> {
    const pushed = await git.push(session.remote, session.releaseBranch)
    switch (pushed.kind) {
      case 'pushed':
        return ReleaseStateMachine.advance({ session, nowMs: this.now() })
      case 'push-rejected':
        log.warn(`[ReleaseExecutor] Push of ${session.releaseBranch} was rejected`)
        return ReleaseStateMachine.suspend({
          session,
          reason: { kind: 'push-rejected', detail: pushed.detail },
          nowMs: this.now()
        })
      default:
        return this.failWith(session, pushed)
    }
  }

  /**
   * Opens the release MR. A failure leaves the pushed branch in place and
   * suspends at this step, so a retry only repeats the API call.
   */
  private async createRemoteMergeRequest(
    session: ReleaseSession,
    { collected }: StepContext
  ): Promise<ReleaseSession> {
    const label = ReleaseNaming.stepLabel(session.currentStep)
    const command = `POST /projects/${session.projectId}/merge_requests (${session.releaseBranch} -> ${session.rootBranch})`
    const forge = this.deps.forge

    if (!forge) {
      const message = 'GitLab is not configured; set GITLAB_URL and GITLAB_TOKEN, then retry'
      collected.push(this.apiLogEntry(label, command, 'remote-mr-failed', message))
      return this.suspendForRemoteMr(session, message)
    }

    try {
      const mr = await forge.createMergeRequest(
        session.projectId,
        session.releaseBranch,
        session.rootBranch,
        ReleaseNaming.mergeRequestTitle(session.version, session.environment, session.rootBranch),
        ReleaseNaming.mergeRequestDescription(
          session.version,
          session.environment,
          session.mergeRequests
        )
      )
      collected.push(this.apiLogEntry(label, command, 'mr-created', mr.webUrl))
      log.info(`[ReleaseExecutor] Release MR created: ${mr.webUrl}`)
      return ReleaseStateMachine.advance({
        session,
        nowMs: this.now(),
        results: { mergeRequestUrl: mr.webUrl }
      })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      collected.push(this.apiLogEntry(label, command, 'remote-mr-failed', message))
      log.warn(`[ReleaseExecutor] Release MR creation failed: ${message}`)
      return this.suspendForRemoteMr(session, message)
    }
  }

  // ============================================================================
  // Abort and Completion
  // ============================================================================

  /**
   * Best-effort rollback: reset to the pre-release commit, remove untracked
   * files, return to the original branch and delete the local release branch.
   * The remote branch is left alone.
   */
  private async performAbort(session: ReleaseSession): Promise<ReleaseRunResult> {
    const collected: ReleaseLogEntry[] = []
    const git = this.createGit(session, ABORT_STEP_LABEL, collected)
    log.info(`[ReleaseExecutor] Aborting release ${session.id}`)

    if (session.preReleaseCommit) {
      await git.resetHard(session.preReleaseCommit)
      await git.clean()

      const returnTo = session.originalBranch ?? session.preReleaseCommit
      if (returnTo !== session.releaseBranch) {
        await git.switchBranch(returnTo)

        const exists = await git.branchExists(session.releaseBranch)
        if (exists.kind === 'ok' && exists.value) {
          await git.deleteBranch(session.releaseBranch)
        }
      }
    } else {
      collected.push(
        this.apiLogEntry(
          ABORT_STEP_LABEL,
          'rollback',
          'unrecoverable-state',
          'No pre-release commit was recorded; the working copy was not reset'
        )
      )
    }

    const aborted = ReleaseStateMachine.appendLog(
      ReleaseStateMachine.markAborted({ session, nowMs: this.now() }),
      collected
    )
    await this.commit(aborted)
    return this.finalize(aborted)
  }

  /**
   * Completion hand-off: the terminal snapshot is already saved; archive it
   * (a no-op when the id is already archived), then clear the session.
   */
  private async finalize(session: ReleaseSession): Promise<ReleaseRunResult> {
    const { entry, detail } = ReleaseStateMachine.toHistoryRecord(session, this.captureTheme())
    const appended = await this.deps.historyStore.append(entry, detail)
    if (!appended) {
      log.warn(`[ReleaseExecutor] Release ${session.id} was already archived`)
    }
    await this.deps.sessionStore.clear()
    this.session = null

    if (session.status === 'completed') {
      log.info(`[ReleaseExecutor] Release ${entry.tag} completed`)
      return { status: 'completed', session, historyEntry: entry }
    }

    const cleanupFailures = session.log
      .filter((logEntry) => logEntry.step === ABORT_STEP_LABEL && logEntry.outcome === 'unrecoverable-state')
      .map((logEntry) => `${logEntry.command}: ${logEntry.excerpt}`)

    if (cleanupFailures.length > 0) {
      log.warn('[ReleaseExecutor] Abort finished with errors; manual cleanup required')
    }

    return {
      status: 'aborted',
      session,
      historyEntry: entry,
      manualCleanupRequired: cleanupFailures.length > 0,
      cleanupFailures
    }
  }

  /**
   * Archives a terminal session found in the store before a new start.
   */
  private async finalizeLeftoverSession(): Promise<void> {
    const loaded = await this.deps.sessionStore.load()
    if (loaded.found && ReleaseStateMachine.isTerminal(loaded.session.status)) {
      log.warn(`[ReleaseExecutor] ${loaded.warning ?? 'Archiving a finished session'}`)
      await this.finalize(loaded.session)
    }
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  /**
   * Persists `next` and makes it current. On a failed save the previous
   * session stays current and the StorageError propagates.
   */
  private async commit(next: ReleaseSession): Promise<void> {
    await this.deps.sessionStore.save(next)
    this.session = next
  }

  private async exclusive(work: () => Promise<ReleaseRunResult>): Promise<ReleaseRunResult> {
    const running = work()
    this.running = running
    try {
      return await running
    } finally {
      if (this.running === running) {
        this.running = null
        this.abortRequested = false
      }
    }
  }

  /**
   * Refuses `command` while another command is running a step.
   */
  private assertIdleFor(command: Exclude<ReleaseCommand, 'abort'>): void {
    if (this.running && !ReleaseStateMachine.canAccept(this.session, command, { inFlight: true })) {
      throw new SessionBusyError(this.session?.id ?? 'pending')
    }
  }

  private assertValid(result: ValidationResult): void {
    if (!result.valid) {
      throw new ValidationError(result.message, result.field)
    }
  }

  private async loadCurrent(): Promise<ReleaseSession | null> {
    if (this.session) {
      return this.session
    }
    const loaded = await this.deps.sessionStore.load()
    if (loaded.found) {
      this.session = loaded.session
      return loaded.session
    }
    return null
  }

  private async requireSession(action: string): Promise<ReleaseSession> {
    const session = await this.loadCurrent()
    if (!session) {
      throw new InvariantError(`No release session to ${action}`)
    }
    return session
  }

  private requireLoaded(): ReleaseSession {
    if (!this.session) {
      throw new InvariantError('No release session is loaded')
    }
    return this.session
  }

  private describe(session: ReleaseSession): ReleaseRunResult {
    if (session.status === 'suspended' && session.suspension) {
      return { status: 'suspended', session, reason: session.suspension }
    }
    if (session.status === 'failed' && session.failure) {
      return { status: 'failed', session, failure: session.failure }
    }
    throw new InvariantError(`Release ${session.id} is ${session.status} without a reason`)
  }

  private createStepContext(
    session: ReleaseSession,
    label: string,
    recovering: boolean
  ): StepContext {
    const collected: ReleaseLogEntry[] = []
    return { git: this.createGit(session, label, collected), collected, recovering }
  }

  private createGit(
    session: ReleaseSession,
    label: string,
    collected: ReleaseLogEntry[]
  ): GitOperations {
    return createGitOperations(
      session.repoPath,
      (command) => {
        collected.push(toLogEntry(command, label, this.now()))
      },
      this.deps.runner
    )
  }

  private apiLogEntry(
    step: string,
    command: string,
    outcome: string,
    detail: string
  ): ReleaseLogEntry {
    return { timestampMs: this.now(), step, command, outcome, excerpt: excerptOutput(detail) }
  }

  private failWith(session: ReleaseSession, failure: GitFailure): ReleaseSession {
    log.error(`[ReleaseExecutor] ${ReleaseNaming.stepLabel(session.currentStep)} failed: ${failure.message}`)
    return ReleaseStateMachine.fail({
      session,
      failure: { kind: failure.kind, message: failure.message },
      nowMs: this.now()
    })
  }

  private suspendForConflict(
    session: ReleaseSession,
    branch: string,
    conflictedPaths: string[]
  ): ReleaseSession {
    log.warn(`[ReleaseExecutor] Merge conflict on ${branch}: ${conflictedPaths.join(', ')}`)
    return ReleaseStateMachine.suspend({
      session,
      reason: { kind: 'merge-conflict', branch, conflictedPaths },
      nowMs: this.now()
    })
  }

  private suspendForRemoteMr(session: ReleaseSession, message: string): ReleaseSession {
    return ReleaseStateMachine.suspend({
      session,
      reason: { kind: 'remote-mr-failed', message },
      nowMs: this.now()
    })
  }

  private toInitError(failure: GitFailure, operation: string): GitCommandError {
    return new GitCommandError(
      `Cannot inspect the working copy: ${failure.message}`,
      operation,
      failure.kind === 'git-error' ? failure.exitCode : undefined
    )
  }
}
