import type { Command } from 'commander'
import type { CliContext } from '../context'
import { renderHistoryDetail, renderHistoryIndex } from '../render'

export function registerHistoryCommand(program: Command, getContext: () => CliContext): void {
  const history = program.command('history').description('Browse completed and aborted releases')

  history
    .command('list', { isDefault: true })
    .description('List recorded releases, most recent first')
    .action(async () => {
      const entries = await getContext().historyStore.loadIndex()
      console.log(renderHistoryIndex(entries))
    })

  history
    .command('show <id>')
    .description('Show one release with its full log')
    .action(async (id: string) => {
      const detail = await getContext().historyStore.loadDetail(id)
      console.log(renderHistoryDetail(detail))
    })
}
