import type { Command } from 'commander'
import { readFile } from 'fs/promises'
import type { CliContext } from '../context'

type SetOptions = {
  file?: string
}

export function registerExclusionsCommand(program: Command, getContext: () => CliContext): void {
  const exclusions = program
    .command('exclusions')
    .description('Files removed from every release branch before the release commit')

  exclusions
    .command('list', { isDefault: true })
    .description('Show the configured exclusion patterns')
    .action(() => {
      const patterns = getContext().configStore.getExcludePatterns()
      console.log(patterns.length > 0 ? patterns.join('\n') : 'No exclusion patterns configured.')
    })

  exclusions
    .command('set [patterns...]')
    .description('Replace the exclusion patterns (arguments, or one pattern per line of a file)')
    .option('-f, --file <path>', 'Read patterns from a file')
    .action(async (patterns: string[], options: SetOptions) => {
      const source = options.file ? await readFile(options.file, 'utf8') : patterns
      const saved = getContext().configStore.setExcludePatterns(source)
      console.log(`Saved ${saved.length} exclusion pattern(s).`)
    })
}
