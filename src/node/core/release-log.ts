/**
 * Conversion of issued commands into release log entries.
 */

import type { ReleaseLogEntry } from '@shared/types'
import { combinedOutput } from '../adapters/git/OutcomeClassifier'
import type { IssuedCommand } from '../adapters/git/types'
import { LOG_EXCERPT_MAX_CHARS, LOG_EXCERPT_MAX_LINES } from '../shared/constants'

const SAFE_ARG = /^[\w@%+=:,./~-]+$/

/**
 * Shell-style rendering of a command line, for display only.
 *
 * @example
 * formatCommand('git', ['commit', '-m', "it's done"]) // git commit -m 'it'\''s done'
 */
export function formatCommand(program: string, args: string[]): string {
  return [program, ...args.map(quoteArg)].join(' ')
}

function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) {
    return arg
  }
  const escaped = arg.replace(/'/g, `'\\''`).replace(/\n/g, '\\n')
  return `'${escaped}'`
}

/**
 * First lines of a command's output, capped in length.
 */
export function excerptOutput(output: string): string {
  const lines = output.replace(/\r\n/g, '\n').trimEnd().split('\n')
  let excerpt = lines.slice(0, LOG_EXCERPT_MAX_LINES).join('\n')
  if (lines.length > LOG_EXCERPT_MAX_LINES) {
    excerpt += `\n... (${lines.length - LOG_EXCERPT_MAX_LINES} more lines)`
  }
  return excerpt.length > LOG_EXCERPT_MAX_CHARS
    ? `${excerpt.slice(0, LOG_EXCERPT_MAX_CHARS)}...`
    : excerpt
}

export function toLogEntry(
  command: IssuedCommand,
  step: string,
  timestampMs: number
): ReleaseLogEntry {
  const output = command.result ? combinedOutput(command.result) : (command.spawnError ?? '')
  return {
    timestampMs,
    step,
    command: formatCommand(command.program, command.args),
    outcome: command.outcome,
    excerpt: excerptOutput(output)
  }
}
