import type { Command } from 'commander'
import { captureThemeSnapshot } from '../../node/core/theme'
import { loadReleasePipeline } from '../../node/services'
import { ValidationError } from '../../node/shared/errors'
import type { CliContext } from '../context'
import {
  renderAllMergeRequests,
  renderMergeRequests,
  renderProjects,
  renderReleasePipeline
} from '../render'
import { parseInteger } from './options'

type MrsOptions = {
  project?: number
}

type PipelineOptions = {
  project?: number
  branch?: string
}

type AuthOptions = {
  email: string
}

export function registerGitLabCommands(program: Command, getContext: () => CliContext): void {
  program
    .command('mrs')
    .description('List open merge requests of a project, or of every project without -p')
    .option('-p, --project <id>', 'GitLab project id', parseInteger)
    .action(async (options: MrsOptions) => {
      const forge = getContext().requireForge()
      if (options.project === undefined) {
        console.log(renderAllMergeRequests(await forge.listAllOpenMergeRequests()))
        return
      }
      console.log(renderMergeRequests(await forge.listOpenMergeRequests(options.project)))
    })

  program
    .command('projects')
    .description('List your GitLab projects, most recently active first')
    .action(async () => {
      console.log(renderProjects(await getContext().requireForge().listProjects()))
    })

  program
    .command('pipeline')
    .description('Show the release merge request with the jobs of its latest pipeline')
    .option('-p, --project <id>', 'GitLab project id (default: the current release)', parseInteger)
    .option('-b, --branch <name>', 'Release branch (default: current or last recorded release)')
    .action(async (options: PipelineOptions) => {
      const context = getContext()
      const forge = context.requireForge()
      const { projectId, releaseBranch } = await resolveReleaseTarget(context, options)
      const report = await loadReleasePipeline(forge, projectId, releaseBranch)
      const theme = captureThemeSnapshot(context.configStore.getActiveTheme())
      console.log(renderReleasePipeline(report, theme))
    })

  program
    .command('auth')
    .description('Check that the GitLab token works and belongs to the given email')
    .requiredOption('--email <email>', 'Email of your GitLab account')
    .action(async (options: AuthOptions) => {
      await getContext().requireForge().validateCredentials(options.email)
      console.log('GitLab credentials are valid.')
    })
}

/**
 * Options win; then the session in progress; then, for the branch only, the
 * most recent history record, which does not keep the project id.
 */
async function resolveReleaseTarget(
  context: CliContext,
  options: PipelineOptions
): Promise<{ projectId: number; releaseBranch: string }> {
  const loaded = await context.executor.status()
  const session = loaded.found ? loaded.session : undefined

  const projectId = options.project ?? session?.projectId
  if (projectId === undefined) {
    throw new ValidationError('No release in progress: pass -p <project id>', 'project')
  }

  const releaseBranch = options.branch ?? session?.releaseBranch ?? (await lastReleaseBranch(context))
  if (!releaseBranch) {
    throw new ValidationError('No release recorded yet: pass -b <release branch>', 'branch')
  }
  return { projectId, releaseBranch }
}

async function lastReleaseBranch(context: CliContext): Promise<string | undefined> {
  const entries = await context.historyStore.loadIndex()
  const [latest] = entries.sort((a, b) => b.dateTimeMs - a.dateTimeMs)
  if (!latest) {
    return undefined
  }
  return (await context.historyStore.loadDetail(latest.id)).releaseBranch
}
