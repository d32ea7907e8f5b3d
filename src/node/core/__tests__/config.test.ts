import os from 'os'
import path from 'path'
import { describe, expect, it } from 'vitest'
import { loadConfiguration } from '../config'

describe('loadConfiguration', () => {
  it('defaults the data directory to ~/.relix', () => {
    expect(loadConfiguration({})).toEqual({
      dataDir: path.join(os.homedir(), '.relix'),
      gitlabUrl: undefined,
      gitlabToken: undefined
    })
  })

  it('reads RELIX_HOME and the GitLab settings', () => {
    expect(
      loadConfiguration({
        RELIX_HOME: '/var/lib/relix',
        GITLAB_URL: ' https://gitlab.example.com ',
        GITLAB_TOKEN: 'test-token'
      })
    ).toEqual({
      dataDir: '/var/lib/relix',
      gitlabUrl: 'https://gitlab.example.com',
      gitlabToken: 'test-token'
    })
  })

  it('resolves a relative RELIX_HOME', () => {
    expect(loadConfiguration({ RELIX_HOME: 'data' }).dataDir).toBe(path.resolve('data'))
  })

  it('treats blank values as unset', () => {
    const configuration = loadConfiguration({ RELIX_HOME: '  ', GITLAB_TOKEN: '' })
    expect(configuration.dataDir).toBe(path.join(os.homedir(), '.relix'))
    expect(configuration.gitlabToken).toBeUndefined()
  })
})
