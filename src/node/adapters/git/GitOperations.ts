/**
 * Git Operations
 *
 * Named git actions used by the release engine, built on a CommandRunner.
 * Every method resolves with a typed outcome; none of them throws for a git
 * failure. Each command issued is reported exactly once to the command
 * listener, which is how the engine keeps one log entry per command.
 */

import { log } from '@shared/logger'
import { SpawnError } from '../../shared/errors'
import type { CommandRunner } from './CommandRunner'
import {
  CHECKOUT_RULES,
  COMMIT_RULES,
  MERGE_RULES,
  PUSH_RULES,
  RECOVERY_RULES,
  SIMPLE_RULES,
  classify,
  combinedOutput,
  parseCommitSha,
  parseConflictPaths,
  splitNullTerminated
} from './OutcomeClassifier'
import type {
  CheckoutOptions,
  CheckoutOutcome,
  CommandListener,
  CommandResult,
  CommitOutcome,
  GitFailure,
  GitQueryOutcome,
  MergeOutcome,
  OkOutcome,
  PushOutcome,
  RecoveryOutcome,
  SpawnErrorOutcome
} from './types'

type Invocation = { result: CommandResult } | { spawnError: SpawnErrorOutcome }

const GLOB_CHARS = /[*?[]/

export class GitOperations {
  constructor(
    private readonly runner: CommandRunner,
    readonly repoPath: string,
    private readonly onCommand?: CommandListener,
    private readonly program = 'git'
  ) {}

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  async resolveRef(ref: string): Promise<GitQueryOutcome<string>> {
    return this.query(['rev-parse', '--verify', ref], (stdout) => stdout.trim())
  }

  /**
   * Current branch name, or null when HEAD is detached.
   */
  async currentBranch(): Promise<GitQueryOutcome<string | null>> {
    return this.query(['rev-parse', '--abbrev-ref', 'HEAD'], (stdout) => {
      const name = stdout.trim()
      return name === 'HEAD' ? null : name
    })
  }

  /**
   * Untracked files count as dirty: the release commit stages everything.
   */
  async isWorkingTreeClean(): Promise<GitQueryOutcome<boolean>> {
    return this.query(['status', '--porcelain'], (stdout) => stdout.trim().length === 0)
  }

  async isMergeInProgress(): Promise<GitQueryOutcome<boolean>> {
    return this.verifyRef('MERGE_HEAD', 'merge-in-progress', 'no-merge-in-progress')
  }

  async branchExists(branch: string): Promise<GitQueryOutcome<boolean>> {
    return this.verifyRef(`refs/heads/${branch}`, 'branch-exists', 'no-such-branch')
  }

  /**
   * `diff --cached --quiet` exits 1 when the index differs from HEAD.
   */
  async hasStagedChanges(): Promise<GitQueryOutcome<boolean>> {
    const args = ['diff', '--cached', '--quiet']
    const invocation = await this.invoke(args)
    if ('spawnError' in invocation) {
      return this.reportSpawnError(args, invocation.spawnError)
    }

    const { result } = invocation
    if (result.exitCode === 0) {
      this.report(args, 'nothing-staged', result)
      return { kind: 'ok', value: false }
    }
    if (result.exitCode === 1) {
      this.report(args, 'changes-staged', result)
      return { kind: 'ok', value: true }
    }
    return this.gitError(args, result)
  }

  async listUnmergedPaths(): Promise<GitQueryOutcome<string[]>> {
    return this.query(['diff', '--name-only', '--diff-filter=U', '-z'], splitNullTerminated)
  }

  /**
   * Lists tracked files matching a pattern. Patterns containing glob
   * characters use git's glob pathspec magic (`**` crosses directories);
   * anything else is a literal path or directory prefix.
   */
  async listFiles(pattern: string): Promise<GitQueryOutcome<string[]>> {
    const magic = GLOB_CHARS.test(pattern) ? 'glob' : 'literal'
    return this.query(['ls-files', '-z', '--', `:(${magic})${pattern}`], splitNullTerminated)
  }

  // ============================================================================
  // Repository Mutation
  // ============================================================================

  async fetch(remote: string): Promise<OkOutcome | GitFailure> {
    return this.simple(['fetch', '--prune', remote])
  }

  async checkout(ref: string, options: CheckoutOptions = {}): Promise<CheckoutOutcome> {
    const args = options.createBranch
      ? ['checkout', '-B', options.createBranch, ref]
      : ['checkout', ref]

    const invocation = await this.invoke(args)
    if ('spawnError' in invocation) {
      return this.reportSpawnError(args, invocation.spawnError)
    }

    const { result } = invocation
    const outcome = classify(CHECKOUT_RULES, result)
    if (outcome === 'git-error') {
      return this.gitError(args, result)
    }

    this.report(args, outcome, result)
    return outcome === 'checked-out' ? { kind: 'checked-out' } : { kind: 'branch-not-found', ref }
  }

  /**
   * Merges `ref` into the current branch with a merge commit.
   *
   * A non-zero exit is checked against the index first: unmerged paths mean a
   * conflict whatever language git printed its messages in. Only when that
   * query is unavailable does the output decide.
   */
  async merge(ref: string): Promise<MergeOutcome> {
    const args = ['merge', '--no-ff', '--no-edit', ref]
    const invocation = await this.invoke(args)
    if ('spawnError' in invocation) {
      return this.reportSpawnError(args, invocation.spawnError)
    }

    const { result } = invocation
    const outcome = classify(MERGE_RULES, result)
    this.report(args, outcome, result)

    if (outcome === 'merge-ok') {
      return {
        kind: 'merge-ok',
        alreadyUpToDate: /Already up[ -]to[ -]date/i.test(result.stdout)
      }
    }

    const unmerged = await this.listUnmergedPaths()
    if (unmerged.kind === 'ok' && unmerged.value.length > 0) {
      return { kind: 'merge-conflict', conflictedPaths: unmerged.value }
    }

    if (outcome === 'merge-conflict') {
      return { kind: 'merge-conflict', conflictedPaths: parseConflictPaths(combinedOutput(result)) }
    }

    return { kind: 'git-error', message: this.describeFailure(args, result), exitCode: result.exitCode }
  }

  /**
   * Commits a merge whose conflicts were resolved and staged by the operator.
   */
  async concludeMerge(): Promise<CommitOutcome> {
    return this.commitWith(['commit', '--no-edit'])
  }

  /**
   * Removes paths from the index and the working tree, staging the deletion.
   */
  async removePaths(paths: string[]): Promise<OkOutcome | GitFailure> {
    if (paths.length === 0) {
      return { kind: 'ok' }
    }
    return this.simple(['rm', '-r', '-q', '--ignore-unmatch', '--', ...paths])
  }

  async stageAll(): Promise<OkOutcome | GitFailure> {
    return this.simple(['add', '--all'])
  }

  async commit(message: string): Promise<CommitOutcome> {
    return this.commitWith(['commit', '-m', message])
  }

  /**
   * Stages every change and commits. An index equal to HEAD is
   * `nothing-to-commit`, which callers treat as success; no commit is attempted.
   */
  async commitAll(message: string): Promise<CommitOutcome> {
    const staged = await this.stageAll()
    if (staged.kind !== 'ok') {
      return staged
    }

    const changes = await this.hasStagedChanges()
    if (changes.kind !== 'ok') {
      return changes
    }
    if (!changes.value) {
      return { kind: 'nothing-to-commit' }
    }
    return this.commit(message)
  }

  async push(remote: string, branch: string): Promise<PushOutcome> {
    const args = ['push', '--set-upstream', remote, branch]
    const invocation = await this.invoke(args)
    if ('spawnError' in invocation) {
      return this.reportSpawnError(args, invocation.spawnError)
    }

    const { result } = invocation
    const outcome = classify(PUSH_RULES, result)
    if (outcome === 'git-error') {
      return this.gitError(args, result)
    }

    this.report(args, outcome, result)
    return outcome === 'pushed'
      ? { kind: 'pushed' }
      : { kind: 'push-rejected', detail: combinedOutput(result).trim() }
  }

  // ============================================================================
  // Recovery (Abort only)
  // ============================================================================

  async resetHard(ref: string): Promise<RecoveryOutcome> {
    return this.recovery(['reset', '--hard', ref])
  }

  /**
   * Removes untracked files and directories. Ignored files are kept.
   */
  async clean(): Promise<RecoveryOutcome> {
    return this.recovery(['clean', '-fd'])
  }

  async switchBranch(branch: string): Promise<RecoveryOutcome> {
    return this.recovery(['checkout', branch])
  }

  async deleteBranch(branch: string): Promise<RecoveryOutcome> {
    return this.recovery(['branch', '-D', branch])
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  private async invoke(args: string[]): Promise<Invocation> {
    try {
      const result = await this.runner.run(this.repoPath, this.program, args)
      return { result }
    } catch (error) {
      if (error instanceof SpawnError) {
        return { spawnError: { kind: 'spawn-error', message: error.message } }
      }
      throw error
    }
  }

  private async query<T>(
    args: string[],
    parse: (stdout: string) => T
  ): Promise<GitQueryOutcome<T>> {
    const invocation = await this.invoke(args)
    if ('spawnError' in invocation) {
      return this.reportSpawnError(args, invocation.spawnError)
    }

    const { result } = invocation
    if (classify(SIMPLE_RULES, result) === 'git-error') {
      return this.gitError(args, result)
    }

    this.report(args, 'ok', result)
    return { kind: 'ok', value: parse(result.stdout) }
  }

  /**
   * `rev-parse -q --verify` exits 1 without output when the ref is absent.
   */
  private async verifyRef(
    ref: string,
    presentOutcome: string,
    absentOutcome: string
  ): Promise<GitQueryOutcome<boolean>> {
    const args = ['rev-parse', '-q', '--verify', ref]
    const invocation = await this.invoke(args)
    if ('spawnError' in invocation) {
      return this.reportSpawnError(args, invocation.spawnError)
    }

    const { result } = invocation
    if (result.exitCode === 0) {
      this.report(args, presentOutcome, result)
      return { kind: 'ok', value: true }
    }
    if (result.exitCode === 1) {
      this.report(args, absentOutcome, result)
      return { kind: 'ok', value: false }
    }
    return this.gitError(args, result)
  }

  private async simple(args: string[]): Promise<OkOutcome | GitFailure> {
    const outcome = await this.query(args, () => undefined)
    return outcome.kind === 'ok' ? { kind: 'ok' } : outcome
  }

  private async commitWith(args: string[]): Promise<CommitOutcome> {
    const invocation = await this.invoke(args)
    if ('spawnError' in invocation) {
      return this.reportSpawnError(args, invocation.spawnError)
    }

    const { result } = invocation
    const outcome = classify(COMMIT_RULES, result)
    if (outcome === 'git-error') {
      return this.gitError(args, result)
    }

    this.report(args, outcome, result)
    return outcome === 'committed'
      ? { kind: 'committed', sha: parseCommitSha(result.stdout) }
      : { kind: 'nothing-to-commit' }
  }

  private async recovery(args: string[]): Promise<RecoveryOutcome> {
    const invocation = await this.invoke(args)
    if ('spawnError' in invocation) {
      this.report(args, 'unrecoverable-state', undefined, invocation.spawnError.message)
      return { kind: 'unrecoverable-state', message: invocation.spawnError.message }
    }

    const { result } = invocation
    const outcome = classify(RECOVERY_RULES, result)
    this.report(args, outcome, result)
    return outcome === 'ok'
      ? { kind: 'ok' }
      : { kind: 'unrecoverable-state', message: this.describeFailure(args, result) }
  }

  private gitError(args: string[], result: CommandResult): GitFailure {
    this.report(args, 'git-error', result)
    return { kind: 'git-error', message: this.describeFailure(args, result), exitCode: result.exitCode }
  }

  private reportSpawnError(args: string[], spawnError: SpawnErrorOutcome): SpawnErrorOutcome {
    this.report(args, 'spawn-error', undefined, spawnError.message)
    return spawnError
  }

  private report(
    args: string[],
    outcome: string,
    result?: CommandResult,
    spawnError?: string
  ): void {
    log.debug(`[GitOperations] git ${args.join(' ')} -> ${outcome}`)
    this.onCommand?.({
      program: this.program,
      args,
      cwd: this.repoPath,
      outcome,
      result,
      spawnError
    })
  }

  private describeFailure(args: string[], result: CommandResult): string {
    const output = combinedOutput(result).trim()
    const summary = output.split('\n').find((line) => line.trim().length > 0)
    return `git ${args[0]} exited with code ${result.exitCode}${summary ? `: ${summary.trim()}` : ''}`
  }
}
