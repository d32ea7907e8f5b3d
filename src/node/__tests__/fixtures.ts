/**
 * Builders for release test data.
 */

import type { MergeRequestRef, ReleaseSession, StartReleaseParams } from '@shared/types'

export const REPO_PATH = '/work/shop'
export const PROJECT_ID = 42

export function createMergeRequest(
  iid: number,
  sourceBranch: string,
  overrides: Partial<MergeRequestRef> = {}
): MergeRequestRef {
  return {
    projectId: PROJECT_ID,
    sourceBranch,
    targetBranch: 'master',
    iid,
    title: `Feature ${sourceBranch}`,
    ...overrides
  }
}

export function createStartParams(overrides: Partial<StartReleaseParams> = {}): StartReleaseParams {
  return {
    repoPath: REPO_PATH,
    mergeRequests: [createMergeRequest(11, 'feature-a'), createMergeRequest(12, 'feature-b')],
    environment: 'PROD',
    version: '1.2.0',
    excludePatterns: ['.gitlab-ci.yml'],
    ...overrides
  }
}

export function createSession(overrides: Partial<ReleaseSession> = {}): ReleaseSession {
  return {
    id: 'rel-1000-abcdef',
    repoPath: REPO_PATH,
    projectId: PROJECT_ID,
    mergeRequests: [createMergeRequest(11, 'feature-a'), createMergeRequest(12, 'feature-b')],
    environment: 'PROD',
    rootBranch: 'master',
    releaseBranch: 'release/v1.2.0-prod',
    remote: 'origin',
    version: '1.2.0',
    excludePatterns: ['.gitlab-ci.yml'],
    currentStep: { kind: 'checkout-root' },
    status: 'active',
    preReleaseCommit: 'abc123',
    originalBranch: 'main',
    log: [],
    createdAtMs: 1_000,
    updatedAtMs: 1_000,
    ...overrides
  }
}
