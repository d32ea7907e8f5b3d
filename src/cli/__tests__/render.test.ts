import type { ForgeMergeRequest, HistoryEntry, ThemeColorSnapshot } from '@shared/types'
import { describe, expect, it } from 'vitest'
import { createSession } from '../../node/__tests__/fixtures'
import { ANSI_RESET } from '../../node/core/theme'
import {
  renderAllMergeRequests,
  renderHistoryIndex,
  renderProjects,
  renderReleasePipeline,
  renderRunResult,
  renderSession
} from '../render'

const markers: ThemeColorSnapshot = {
  accent: '<a>',
  success: '<s>',
  warning: '<w>',
  error: '<e>',
  foreground: '<f>'
}

function entry(id: string, dateTimeMs: number, status: HistoryEntry['status']): HistoryEntry {
  return { id, tag: 'v1.2.0-prod', environment: 'PROD', dateTimeMs, mrCount: 2, status }
}

describe('renderHistoryIndex', () => {
  it('lists the most recent release first', () => {
    const rendered = renderHistoryIndex([
      entry('rel-old', Date.UTC(2026, 0, 1), 'completed'),
      entry('rel-new', Date.UTC(2026, 0, 2), 'aborted')
    ])

    expect(rendered.split('\n')).toEqual([
      '2026-01-02T00:00:00.000Z  v1.2.0-prod        aborted   2 MR(s)  rel-new',
      '2026-01-01T00:00:00.000Z  v1.2.0-prod        completed 2 MR(s)  rel-old'
    ])
  })

  it('says so when nothing is recorded', () => {
    expect(renderHistoryIndex([])).toBe('No releases recorded yet.')
  })
})

describe('renderRunResult', () => {
  it('lists conflicted paths of a suspended merge', () => {
    const session = createSession({
      status: 'suspended',
      currentStep: { kind: 'merge-branches', index: 1 }
    })

    const rendered = renderRunResult(
      {
        status: 'suspended',
        session,
        reason: { kind: 'merge-conflict', branch: 'feature-b', conflictedPaths: ['cart.ts'] }
      },
      markers
    )

    expect(rendered.split('\n')).toEqual([
      `<w>Merge conflict while merging feature-b:${ANSI_RESET}`,
      '  cart.ts',
      'Resolve the conflicts in the working copy, then run `relix retry` (or `relix abort`).'
    ])
  })

  it('tells the operator how to recover from a rejected push', () => {
    const session = createSession({ status: 'suspended', currentStep: { kind: 'push' } })

    const rendered = renderRunResult(
      {
        status: 'suspended',
        session,
        reason: {
          kind: 'push-rejected',
          detail: ' ! [rejected]  release/v1.2.0-prod (fetch first)\nerror: failed to push'
        }
      },
      markers
    )

    expect(rendered.split('\n')).toEqual([
      `<w>Push of release/v1.2.0-prod was rejected:${ANSI_RESET}`,
      '   ! [rejected]  release/v1.2.0-prod (fetch first)',
      '  error: failed to push',
      'Fetch and rebase the release branch, then run `relix retry` (or `relix abort`).'
    ])
  })

  it('lists rollback failures of an abort', () => {
    const session = createSession({ status: 'aborted' })

    const rendered = renderRunResult(
      {
        status: 'aborted',
        session,
        historyEntry: entry(session.id, 0, 'aborted'),
        manualCleanupRequired: true,
        cleanupFailures: ['git reset --hard abc123: fatal: bad object']
      },
      markers
    )

    expect(rendered.split('\n')).toEqual([
      `<w>Release v1.2.0 (PROD) aborted${ANSI_RESET}`,
      `<e>Rollback did not finish; manual cleanup required:${ANSI_RESET}`,
      '  git reset --hard abc123: fatal: bad object',
      'Recorded as rel-1000-abcdef'
    ])
  })
})

describe('renderSession', () => {
  it('shows the step and merge requests in order', () => {
    const rendered = renderSession(createSession({ currentStep: { kind: 'merge-branches', index: 0 } }))

    expect(rendered).toContain('Step:        merge-branches[0]')
    expect(rendered).toContain('  1. !11 Feature feature-a (feature-a)')
    expect(rendered).toContain('  2. !12 Feature feature-b (feature-b)')
  })
})

function mergeRequest(iid: number, webUrl: string, title: string): ForgeMergeRequest {
  return {
    id: 1_000 + iid,
    iid,
    projectId: 42,
    title,
    description: '',
    state: 'opened',
    sourceBranch: `feature-${iid}`,
    targetBranch: 'master',
    webUrl,
    createdAt: '2026-01-01T00:00:00Z'
  }
}

describe('renderAllMergeRequests', () => {
  it('names each merge request by its project path', () => {
    const rendered = renderAllMergeRequests([
      mergeRequest(7, 'https://gitlab.example.com/acme/shop/-/merge_requests/7', 'Add checkout'),
      mergeRequest(12, 'https://gitlab.example.com/tools/ci/-/merge_requests/12', 'Cache images')
    ])

    expect(rendered.split('\n')).toEqual([
      'acme/shop!7  feature-7 -> master  Add checkout',
      'tools/ci!12  feature-12 -> master  Cache images'
    ])
  })

  it('says so when nothing is open', () => {
    expect(renderAllMergeRequests([])).toBe('No open merge requests.')
  })
})

describe('renderProjects', () => {
  it('lists id and path', () => {
    expect(
      renderProjects([
        { id: 42, name: 'shop', pathWithNamespace: 'acme/shop', webUrl: 'https://gitlab.example.com/acme/shop' }
      ])
    ).toBe('42       acme/shop')
  })
})

describe('renderReleasePipeline', () => {
  const releaseMergeRequest = {
    ...mergeRequest(90, 'https://gitlab.example.com/acme/shop/-/merge_requests/90', 'Release v1.2.0 (PROD)'),
    sourceBranch: 'release/v1.2.0-prod'
  }

  it('shows the merge request, its latest pipeline and the jobs', () => {
    const rendered = renderReleasePipeline(
      {
        mergeRequest: releaseMergeRequest,
        pipeline: {
          id: 7001,
          sha: 'c0ffee1',
          ref: 'release/v1.2.0-prod',
          status: 'failed',
          webUrl: 'https://gitlab.example.com/acme/shop/-/pipelines/7001',
          createdAt: '2026-01-01T00:05:00Z'
        },
        jobs: [
          { id: 1, name: 'compile', stage: 'build', status: 'success', webUrl: 'https://gitlab.example.com/j/1' },
          { id: 2, name: 'unit-tests', stage: 'test', status: 'failed', webUrl: 'https://gitlab.example.com/j/2' },
          { id: 3, name: 'deploy', stage: 'release', status: 'manual', webUrl: 'https://gitlab.example.com/j/3' }
        ]
      },
      markers
    )

    expect(rendered.split('\n')).toEqual([
      `<a>!90 Release v1.2.0 (PROD)${ANSI_RESET}`,
      'State:    opened',
      'Branches: release/v1.2.0-prod -> master',
      'URL:      https://gitlab.example.com/acme/shop/-/merge_requests/90',
      `Pipeline: #7001 <e>failed${ANSI_RESET}`,
      '          https://gitlab.example.com/acme/shop/-/pipelines/7001',
      'Jobs:',
      `  build    compile     <s>success${ANSI_RESET}`,
      `  test     unit-tests  <e>failed${ANSI_RESET}`,
      '  release  deploy      manual'
    ])
  })

  it('says so when no pipeline has run', () => {
    const rendered = renderReleasePipeline(
      { mergeRequest: { ...releaseMergeRequest, state: 'merged' }, pipeline: null, jobs: [] },
      markers
    )

    expect(rendered.split('\n').slice(1)).toEqual([
      'State:    merged',
      'Branches: release/v1.2.0-prod -> master',
      'URL:      https://gitlab.example.com/acme/shop/-/merge_requests/90',
      'No pipeline has run for this merge request.'
    ])
  })
})
