import { beforeEach, describe, expect, it } from 'vitest'
import { GitOperations } from '../../adapters/git'
import { FakeCommandRunner } from '../../adapters/git/__tests__/test-utils'
import { applyExclusions, parseExclusionPatterns } from '../exclusion-applier'

describe('parseExclusionPatterns', () => {
  it('splits lines and drops blanks and comments', () => {
    const source = '# CI config\n.gitlab-ci.yml\n\n  deploy/**  \r\n# trailing'
    expect(parseExclusionPatterns(source)).toEqual(['.gitlab-ci.yml', 'deploy/**'])
  })

  it('strips leading slashes and removes duplicates', () => {
    expect(parseExclusionPatterns(['/.env', '.env', 'docs\n/docs'])).toEqual(['.env', 'docs'])
  })

  it('returns an empty list for empty input', () => {
    expect(parseExclusionPatterns('')).toEqual([])
    expect(parseExclusionPatterns([])).toEqual([])
  })
})

describe('applyExclusions', () => {
  let runner: FakeCommandRunner
  let git: GitOperations

  beforeEach(() => {
    runner = new FakeCommandRunner()
    git = new GitOperations(runner, '/work/shop')
  })

  it('removes nothing when no tracked file matches', async () => {
    await expect(applyExclusions(git, ['.gitlab-ci.yml'])).resolves.toEqual({
      kind: 'ok',
      removedPaths: []
    })
    expect(runner.commands()).toEqual(['ls-files -z -- :(literal).gitlab-ci.yml'])
  })

  it('removes matches pattern by pattern', async () => {
    runner
      .on(['ls-files', '-z', '--', ':(literal).gitlab-ci.yml'], { stdout: '.gitlab-ci.yml\0' })
      .on(['ls-files', '-z', '--', ':(glob)deploy/**'], { stdout: 'deploy/a.sh\0deploy/b.sh\0' })

    await expect(applyExclusions(git, ['.gitlab-ci.yml', 'deploy/**'])).resolves.toEqual({
      kind: 'ok',
      removedPaths: ['.gitlab-ci.yml', 'deploy/a.sh', 'deploy/b.sh']
    })
    expect(runner.commands()).toEqual([
      'ls-files -z -- :(literal).gitlab-ci.yml',
      'rm -r -q --ignore-unmatch -- .gitlab-ci.yml',
      'ls-files -z -- :(glob)deploy/**',
      'rm -r -q --ignore-unmatch -- deploy/a.sh deploy/b.sh'
    ])
  })

  it('does not remove a path twice when patterns overlap', async () => {
    runner.on(['ls-files'], { stdout: 'deploy/a.sh\0' })

    const result = await applyExclusions(git, ['deploy', 'deploy/*.sh'])

    expect(result).toEqual({ kind: 'ok', removedPaths: ['deploy/a.sh'] })
    expect(runner.commands().filter((command) => command.startsWith('rm'))).toHaveLength(1)
  })

  it('stops at the first git failure', async () => {
    runner.on(['ls-files'], { exitCode: 128, stderr: 'fatal: not a git repository' })

    const result = await applyExclusions(git, ['a', 'b'])

    expect(result).toEqual({
      kind: 'git-error',
      message: 'git ls-files exited with code 128: fatal: not a git repository',
      exitCode: 128
    })
    expect(runner.calls).toHaveLength(1)
  })
})
