/**
 * Command Runner
 *
 * Runs one external program and reports its exit code and output.
 * A non-zero exit is a normal result (a merge conflict exits non-zero), so it
 * is returned as data. Only a failure to start the process is thrown.
 */

import { spawn } from 'child_process'
import { SpawnError } from '../../shared/errors'
import type { CommandResult } from './types'

export interface CommandRunner {
  run(cwd: string, program: string, args: string[]): Promise<CommandResult>
}

export class ProcessCommandRunner implements CommandRunner {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  run(cwd: string, program: string, args: string[]): Promise<CommandResult> {
    const startedAt = performance.now()

    return new Promise((resolve, reject) => {
      const child = spawn(program, args, {
        cwd,
        env: {
          ...this.env,
          // Outcome rules match git's English messages
          LC_ALL: 'C',
          LANGUAGE: '',
          // Keep git from waiting on an editor or a credential prompt
          GIT_TERMINAL_PROMPT: '0',
          GIT_EDITOR: 'true'
        },
        stdio: ['ignore', 'pipe', 'pipe']
      })
      // Decoded once on close: a multibyte character may straddle two chunks
      const stdout: Buffer[] = []
      const stderr: Buffer[] = []

      child.stdout.on('data', (data: Buffer) => {
        stdout.push(data)
      })
      child.stderr.on('data', (data: Buffer) => {
        stderr.push(data)
      })

      child.on('error', (error: NodeJS.ErrnoException) => {
        reject(
          new SpawnError(
            `Failed to start '${program}': ${error.message}`,
            program,
            error.code,
            error
          )
        )
      })
      child.on('close', (code, signal) => {
        resolve({
          // null code means the process was killed by a signal
          exitCode: code ?? (signal ? 128 : 1),
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
          durationMs: Math.round(performance.now() - startedAt)
        })
      })
    })
  }
}
