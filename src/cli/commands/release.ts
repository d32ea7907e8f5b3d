/**
 * Release commands: start, retry, resume, abort and status.
 */

import { log } from '@shared/logger'
import { ENVIRONMENT_BRANCHES, isEnvironment, type MergeRequestRef } from '@shared/types'
import type { Command } from 'commander'
import path from 'path'
import { captureThemeSnapshot } from '../../node/core/theme'
import type { ReleaseRunResult } from '../../node/operations/ReleaseExecutor'
import { ValidationError } from '../../node/shared/errors'
import type { CliContext } from '../context'
import { renderRunResult, renderSession } from '../render'
import { collectInteger, collectString, parseInteger } from './options'

type ContextProvider = () => CliContext

type StartOptions = {
  env: string
  release: string
  project: number
  mr: number[]
  repo?: string
  remote?: string
  exclude: string[]
}

export function registerReleaseCommands(program: Command, getContext: ContextProvider): void {
  program
    .command('start')
    .description('Merge the selected MRs into a new release branch and open a release MR')
    .requiredOption('-e, --env <environment>', 'DEVELOP, TEST, STAGE or PROD')
    .requiredOption('-r, --release <version>', 'Release version (X.Y.Z)')
    .requiredOption('-p, --project <id>', 'GitLab project id', parseInteger)
    .requiredOption('-m, --mr <iid>', 'MR iid, in merge order (repeatable)', collectInteger, [])
    .option('--repo <path>', 'Working copy (default: current directory)')
    .option('--remote <name>', 'Remote to fetch from and push to')
    .option(
      '-x, --exclude <pattern>',
      'Exclusion pattern, replaces the configured list (repeatable)',
      collectString,
      []
    )
    .action(async (options: StartOptions) => {
      const context = getContext()
      const environment = options.env.toUpperCase()
      if (!isEnvironment(environment)) {
        throw new ValidationError(`Unknown environment '${options.env}'`, 'environment')
      }

      const mergeRequests = await resolveMergeRequests(
        context,
        options.project,
        options.mr,
        ENVIRONMENT_BRANCHES[environment]
      )
      const excludePatterns =
        options.exclude.length > 0 ? options.exclude : context.configStore.getExcludePatterns()

      const result = await context.executor.start({
        repoPath: path.resolve(options.repo ?? process.cwd()),
        mergeRequests,
        environment,
        version: options.release,
        excludePatterns,
        remote: options.remote ?? context.configStore.getRemote()
      })
      report(context, result)
    })

  program
    .command('retry')
    .description('Retry the step a suspended release stopped at')
    .action(async () => {
      const context = getContext()
      report(context, await context.executor.retry())
    })

  program
    .command('resume')
    .description('Continue a release interrupted by a restart')
    .action(async () => {
      const context = getContext()
      report(context, await context.executor.resume())
    })

  program
    .command('abort')
    .description('Abort the current release and restore the working copy')
    .action(async () => {
      const context = getContext()
      report(context, await context.executor.abort())
    })

  program
    .command('status')
    .description('Show the current release session')
    .action(async () => {
      const context = getContext()
      const loaded = await context.executor.status()
      if (!loaded.found) {
        console.log('No release in progress.')
        return
      }
      if (loaded.warning) {
        log.warn(loaded.warning)
      }
      console.log(renderSession(loaded.session))
    })
}

/**
 * Looks up each `!iid` in GitLab, keeping the order given.
 */
async function resolveMergeRequests(
  context: CliContext,
  projectId: number,
  iids: number[],
  rootBranch: string
): Promise<MergeRequestRef[]> {
  const forge = context.requireForge()
  const refs: MergeRequestRef[] = []

  for (const iid of iids) {
    const mr = await forge.getMergeRequest(projectId, iid)
    if (mr.state !== 'opened') {
      log.warn(`!${iid} is ${mr.state}`)
    }
    if (mr.targetBranch !== rootBranch) {
      log.warn(`!${iid} targets ${mr.targetBranch}, not ${rootBranch}`)
    }
    refs.push({
      projectId: mr.projectId,
      sourceBranch: mr.sourceBranch,
      targetBranch: mr.targetBranch,
      iid: mr.iid,
      title: mr.title
    })
  }

  return refs
}

function report(context: CliContext, result: ReleaseRunResult): void {
  const theme = captureThemeSnapshot(context.configStore.getActiveTheme())
  console.log(renderRunResult(result, theme))

  if (result.status === 'suspended') {
    process.exitCode = 2
  } else if (result.status === 'failed') {
    process.exitCode = 1
  }
}
