/**
 * External command execution
 *
 * Every tool the installer drives (git, patch, tar, cc, make, cmake, lua,
 * pkg-config) runs through a `CommandRunner`, so tests can substitute a
 * fake and cancellation reaches every child process.
 *
 * @module core/process
 */

import { spawn } from 'node:child_process'
import { AbortedError, ToolExitNonZeroError, ToolNotFoundError } from '../errors/index.js'
import { logger } from '../logger.js'

// ============================================================================
// TYPES
// ============================================================================

export interface RunOptions {
  cwd?: string
  /** Merged over the parent environment */
  env?: Record<string, string | undefined>
  /** Written to stdin, which is then closed */
  input?: string
  /** Milliseconds before the child receives SIGTERM */
  timeout?: number
  /** Aborting sends SIGTERM to the child */
  signal?: AbortSignal
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
  /** stdout and stderr interleaved in arrival order */
  output: string
  timedOut: boolean
  aborted: boolean
}

export interface CommandRunner {
  /**
   * Run `command` with `args`. Resolves with the result whatever the exit
   * code; rejects with `ToolNotFoundError` when the command does not exist.
   */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>
}

// ============================================================================
// IMPLEMENTATION
// ============================================================================

/**
 * `CommandRunner` backed by `child_process.spawn`
 */
export class NodeCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const { signal } = options
    if (signal?.aborted) {
      return Promise.resolve({ exitCode: -1, stdout: '', stderr: '', output: '', timedOut: false, aborted: true })
    }

    logger.debug(`$ ${[command, ...args].join(' ')}`, { cwd: options.cwd })

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['pipe', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      let output = ''
      let timedOut = false
      let aborted = false

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString()
        output += data.toString()
      })
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString()
        output += data.toString()
      })

      const timer =
        options.timeout !== undefined
          ? setTimeout(() => {
              timedOut = true
              child.kill('SIGTERM')
            }, options.timeout)
          : undefined

      const onAbort = (): void => {
        aborted = true
        child.kill('SIGTERM')
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      const cleanup = (): void => {
        if (timer) clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
      }

      child.on('error', (error: NodeJS.ErrnoException) => {
        cleanup()
        reject(error.code === 'ENOENT' ? new ToolNotFoundError(command) : error)
      })

      child.on('close', (code) => {
        cleanup()
        resolve({ exitCode: code ?? -1, stdout, stderr, output, timedOut, aborted })
      })

      if (options.input !== undefined) {
        child.stdin.end(options.input)
      } else {
        child.stdin.end()
      }
    })
  }
}

/**
 * Run a command and require exit code 0.
 *
 * @throws AbortedError when `options.signal` fired
 * @throws ToolExitNonZeroError on any other failure
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  const result = await runner.run(command, args, options)
  if (result.aborted) {
    throw new AbortedError()
  }
  if (result.exitCode !== 0) {
    throw new ToolExitNonZeroError([command, ...args].join(' '), result.exitCode, result.output)
  }
  return result
}

/**
 * Whether `command` can be started. Probes with `--version`.
 */
export async function commandExists(runner: CommandRunner, command: string): Promise<boolean> {
  try {
    await runner.run(command, ['--version'])
    return true
  } catch (error) {
    if (error instanceof ToolNotFoundError) return false
    throw error
  }
}
