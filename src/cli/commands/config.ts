import type { Command } from 'commander'
import type { CliContext } from '../context'

export function registerConfigCommand(program: Command, getContext: () => CliContext): void {
  const config = program.command('config').description('Show or change persisted settings')

  config
    .command('show', { isDefault: true })
    .description('Print the current settings')
    .action(() => {
      const { configStore, configuration } = getContext()
      console.log(
        [
          `Config file:  ${configStore.path}`,
          `Data dir:     ${configuration.dataDir}`,
          `GitLab URL:   ${configuration.gitlabUrl ?? configStore.getGitlabUrl() ?? '(not set)'}`,
          `Token:        ${configuration.gitlabToken ? 'set' : '(not set)'}`,
          `Remote:       ${configStore.getRemote()}`,
          `Theme:        ${configStore.getSelectedThemeName()}`
        ].join('\n')
      )
    })

  config
    .command('set-url <url>')
    .description('Store the GitLab base URL')
    .action((url: string) => {
      getContext().configStore.setGitlabUrl(url)
    })

  config
    .command('set-remote <name>')
    .description('Store the default remote')
    .action((name: string) => {
      getContext().configStore.setRemote(name)
    })

  config
    .command('theme <name>')
    .description('Select a configured colour theme')
    .action((name: string) => {
      getContext().configStore.selectTheme(name)
    })
}
