/**
 * Release Validator
 *
 * Pure validation logic for starting a release.
 * Checks that need git (a clean working tree) take the already-fetched
 * answer as input.
 */

import { isEnvironment } from '@shared/types'
import type { ReleaseSession, StartReleaseParams } from '@shared/types'
import { isValidVersion } from '@shared/version'
import path from 'path'
import { ReleaseStateMachine } from './ReleaseStateMachine'

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Result of a validation check
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; code: ValidationErrorCode; message: string; field?: string }

/**
 * Validation error codes for programmatic handling
 */
export type ValidationErrorCode =
  | 'INVALID_REPO_PATH'
  | 'INVALID_ENVIRONMENT'
  | 'INVALID_VERSION'
  | 'NO_MERGE_REQUESTS'
  | 'MIXED_PROJECTS'
  | 'DUPLICATE_MERGE_REQUEST'
  | 'INVALID_BRANCH'
  | 'INVALID_REMOTE'
  | 'DIRTY_WORKING_TREE'
  | 'SESSION_EXISTS'

// ============================================================================
// ReleaseValidator Class
// ============================================================================

/**
 * Pure validator for release operations.
 * All methods are static and synchronous - they only examine data.
 */
export class ReleaseValidator {
  private constructor() {
    // Static-only class
  }

  static validateStartParams(params: StartReleaseParams): ValidationResult {
    if (!path.isAbsolute(params.repoPath)) {
      return {
        valid: false,
        code: 'INVALID_REPO_PATH',
        message: `Repository path must be absolute: ${params.repoPath}`,
        field: 'repoPath'
      }
    }

    if (!isEnvironment(params.environment)) {
      return {
        valid: false,
        code: 'INVALID_ENVIRONMENT',
        message: `Unknown environment '${params.environment}'`,
        field: 'environment'
      }
    }

    if (!isValidVersion(params.version)) {
      return {
        valid: false,
        code: 'INVALID_VERSION',
        message: `Version must look like X.Y.Z, got '${params.version}'`,
        field: 'version'
      }
    }

    if (params.remote !== undefined && !/^[^\s/][^\s]*$/.test(params.remote)) {
      return {
        valid: false,
        code: 'INVALID_REMOTE',
        message: `Invalid remote name '${params.remote}'`,
        field: 'remote'
      }
    }

    return ReleaseValidator.validateMergeRequests(params)
  }

  /**
   * At least one merge request, all from one project, no duplicates, and
   * source branch names git would accept.
   */
  static validateMergeRequests({ mergeRequests }: StartReleaseParams): ValidationResult {
    const [first] = mergeRequests
    if (!first) {
      return {
        valid: false,
        code: 'NO_MERGE_REQUESTS',
        message: 'Select at least one merge request',
        field: 'mergeRequests'
      }
    }

    const seen = new Set<number>()
    for (const mr of mergeRequests) {
      if (mr.projectId !== first.projectId) {
        return {
          valid: false,
          code: 'MIXED_PROJECTS',
          message: `All merge requests must belong to project ${first.projectId}; !${mr.iid} belongs to ${mr.projectId}`,
          field: 'mergeRequests'
        }
      }
      if (seen.has(mr.iid)) {
        return {
          valid: false,
          code: 'DUPLICATE_MERGE_REQUEST',
          message: `Merge request !${mr.iid} is selected more than once`,
          field: 'mergeRequests'
        }
      }
      seen.add(mr.iid)

      if (!ReleaseValidator.isValidBranchName(mr.sourceBranch)) {
        return {
          valid: false,
          code: 'INVALID_BRANCH',
          message: `Invalid source branch '${mr.sourceBranch}' for !${mr.iid}`,
          field: 'mergeRequests'
        }
      }
    }

    return { valid: true }
  }

  static validateCleanWorkingTree(isClean: boolean): ValidationResult {
    if (!isClean) {
      return {
        valid: false,
        code: 'DIRTY_WORKING_TREE',
        message:
          'Working tree has uncommitted or untracked changes. Commit, stash or remove them before starting a release.'
      }
    }
    return { valid: true }
  }

  /**
   * A new release needs the store to hold no Active, Suspended or Failed
   * session.
   */
  static validateNoActiveSession(existing: ReleaseSession | null): ValidationResult {
    if (existing && !ReleaseStateMachine.canAccept(existing, 'start')) {
      return {
        valid: false,
        code: 'SESSION_EXISTS',
        message: `Release ${existing.id} is ${existing.status}. Resume, retry or abort it before starting another.`
      }
    }
    return { valid: true }
  }

  /**
   * Subset of `git check-ref-format` rules.
   */
  static isValidBranchName(name: string): boolean {
    if (!name || name.startsWith('-') || name.startsWith('/') || name.endsWith('/')) {
      return false
    }
    if (name.endsWith('.lock') || name.endsWith('.') || name.includes('..') || name.includes('@{')) {
      return false
    }
    return !/[\s~^:?*[\\\x00-\x1f\x7f]/.test(name)
  }
}
