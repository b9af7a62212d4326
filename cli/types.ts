/**
 * CLI Types for rockyard
 */

import type { CommandRunner } from '../core/process/index.js'
import type { ManifestClient } from '../core/registry/index.js'

/**
 * Result of executing a CLI command
 */
export interface CommandResult {
  exitCode: number
  output?: string
  error?: string
}

/**
 * Everything a command touches outside the process. The binary passes the
 * real streams and environment; tests pass fakes.
 */
export interface CLIContext {
  stdout: (text: string) => void
  stderr: (text: string) => void
  cwd: string
  env: Record<string, string | undefined>
  /** Aborts running installs (SIGINT) */
  signal?: AbortSignal
  /** Defaults to a RegistryClient built from the loaded config */
  client?: ManifestClient
  /** Defaults to NodeCommandRunner */
  runner?: CommandRunner
  fetch?: typeof fetch
}

/**
 * Options after cac parsing, camel-cased
 */
export type ParsedOptions = Record<string, unknown>
