/**
 * Git Adapter Factory
 *
 * Provides a centralized way to create the command runner and the git
 * operations bound to a working copy.
 */

import { log } from '@shared/logger'
import { ProcessCommandRunner, type CommandRunner } from './CommandRunner'
import { GitOperations } from './GitOperations'
import type { CommandListener } from './types'

/**
 * Singleton runner instance
 */
let cachedRunner: CommandRunner | null = null

/**
 * Get the singleton command runner.
 *
 * @param env - Environment for spawned processes (only used on first call)
 */
export function getCommandRunner(env?: NodeJS.ProcessEnv): CommandRunner {
  if (cachedRunner) {
    return cachedRunner
  }

  log.debug('[GitAdapter] Creating process command runner')
  cachedRunner = new ProcessCommandRunner(env)
  return cachedRunner
}

/**
 * Create git operations for one working copy.
 */
export function createGitOperations(
  repoPath: string,
  onCommand?: CommandListener,
  runner: CommandRunner = getCommandRunner()
): GitOperations {
  return new GitOperations(runner, repoPath, onCommand)
}
