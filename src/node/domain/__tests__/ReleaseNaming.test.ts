import { describe, expect, it } from 'vitest'
import { createMergeRequest } from '../../__tests__/fixtures'
import { ReleaseNaming } from '../ReleaseNaming'

const mergeRequests = [
  createMergeRequest(11, 'feature-a', { title: 'Add checkout' }),
  createMergeRequest(12, 'feature-b', { title: 'Fix totals' })
]

describe('ReleaseNaming', () => {
  it('derives tag and release branch from version and environment', () => {
    expect(ReleaseNaming.tag('1.2.0', 'PROD')).toBe('v1.2.0-prod')
    expect(ReleaseNaming.releaseBranch('1.2.0', 'PROD')).toBe('release/v1.2.0-prod')
    expect(ReleaseNaming.releaseBranch('0.9.3', 'DEVELOP')).toBe('release/v0.9.3-develop')
  })

  it('builds the commit message with one line per merge request', () => {
    expect(ReleaseNaming.commitMessage('1.2.0', 'PROD', mergeRequests)).toBe(
      'Release v1.2.0 (PROD)\n\n- !11 Add checkout\n- !12 Fix totals'
    )
  })

  it('builds the merge request title and description', () => {
    expect(ReleaseNaming.mergeRequestTitle('1.2.0', 'STAGE', 'stable')).toBe(
      'Release v1.2.0 (STAGE) into stable'
    )
    expect(ReleaseNaming.mergeRequestDescription('1.2.0', 'STAGE', mergeRequests)).toBe(
      '## Release v1.2.0 (STAGE)\n\nIncluded merge requests:\n\n- !11 Add checkout\n- !12 Fix totals'
    )
  })

  it('labels merge steps with their index', () => {
    expect(ReleaseNaming.stepLabel({ kind: 'merge-branches', index: 1 })).toBe('merge-branches[1]')
    expect(ReleaseNaming.stepLabel({ kind: 'create-remote-mr' })).toBe('create-remote-mr')
  })
})
