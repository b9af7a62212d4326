/**
 * rockyard - dependency resolution, lockfiles and builds for Lua rocks
 *
 * @example
 * ```typescript
 * import { loadConfig, RegistryClient, NodeCommandRunner, operations } from 'rockyard'
 *
 * const config = await loadConfig()
 * const { report } = await operations.install({
 *   config,
 *   client: RegistryClient.fromConfig(config),
 *   runner: new NodeCommandRunner(),
 *   projectDir: process.cwd(),
 * })
 * ```
 *
 * @example CLI
 * ```bash
 * rockyard add luasocket
 * rockyard lock update
 * rockyard pin luasocket
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Re-export core
// =============================================================================

export * from './core/index.js'

// =============================================================================
// CLI exports
// =============================================================================

export {
  createCLI,
  runCLI,
  formatInstallReport,
  formatLockDiff,
  formatFailure,
  formatPinned,
} from './cli/index.js'

export type { CLIContext, CommandResult as CLIResult } from './cli/index.js'
