/**
 * Git Adapter Module
 *
 * Runs the git binary and classifies its results into typed outcomes.
 */

export type { CommandRunner } from './CommandRunner'
export { ProcessCommandRunner } from './CommandRunner'
export { createGitOperations, getCommandRunner } from './factory'
export { GitOperations } from './GitOperations'
export {
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
export type { OutcomeRule, OutcomeTable } from './OutcomeClassifier'
export type * from './types'
