import { describe, expect, it } from 'vitest'
import { GitLabAdapter } from '../../adapters/forge'
import { createForge, resolveForgeSettings } from '../ForgeService'

describe('resolveForgeSettings', () => {
  const storedUrl = { getGitlabUrl: () => 'https://stored.example.com' }

  it('prefers the environment URL over the stored one', () => {
    expect(
      resolveForgeSettings(
        { dataDir: '/data', gitlabUrl: 'https://env.example.com', gitlabToken: 'test-token' },
        storedUrl
      )
    ).toEqual({ gitlabUrl: 'https://env.example.com', token: 'test-token' })
  })

  it('falls back to the stored URL', () => {
    expect(resolveForgeSettings({ dataDir: '/data' }, storedUrl)).toEqual({
      gitlabUrl: 'https://stored.example.com',
      token: undefined
    })
  })
})

describe('createForge', () => {
  it('builds a GitLab adapter when URL and token are set', () => {
    const forge = createForge({ gitlabUrl: 'https://gitlab.example.com', token: 'test-token' })
    expect(forge).toBeInstanceOf(GitLabAdapter)
  })

  it('returns null without a token', () => {
    expect(createForge({ gitlabUrl: 'https://gitlab.example.com' })).toBeNull()
  })

  it('returns null without a URL', () => {
    expect(createForge({ token: 'test-token' })).toBeNull()
  })
})
