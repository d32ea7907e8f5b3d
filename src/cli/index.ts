/**
 * relix CLI entry point.
 */

import { log } from '@shared/logger'
import { Command } from 'commander'
import { AppError } from '../node/shared/errors'
import { registerConfigCommand } from './commands/config'
import { registerExclusionsCommand } from './commands/exclusions'
import { registerGitLabCommands } from './commands/gitlab'
import { registerHistoryCommand } from './commands/history'
import { registerReleaseCommands } from './commands/release'
import { createCliContext, type CliContext } from './context'

export function createProgram(getContext: () => CliContext): Command {
  const program = new Command()
  program
    .name('relix')
    .description('Resumable GitLab release engine')
    .version('0.1.0', '-V, --cli-version')

  registerReleaseCommands(program, getContext)
  registerHistoryCommand(program, getContext)
  registerExclusionsCommand(program, getContext)
  registerGitLabCommands(program, getContext)
  registerConfigCommand(program, getContext)

  return program
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  let context: CliContext | null = null
  const getContext = (): CliContext => {
    context ??= createCliContext()
    return context
  }

  try {
    await createProgram(getContext).parseAsync(argv)
  } catch (error) {
    if (error instanceof AppError) {
      log.error(`${error.name}: ${error.message}`)
    } else {
      log.error('Unexpected error:', error)
    }
    process.exitCode = 1
  }
}
