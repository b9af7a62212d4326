/**
 * CLI for rockyard
 *
 * Commands:
 * - install [packages...]      - install the project's rocks
 * - add <packages...>          - install and record in rockyard.toml
 * - remove <packages...>       - drop from rockyard.toml and the tree
 * - build [packages...]        - rebuild rocks
 * - lock update [packages...]  - re-resolve ignoring locked versions
 * - pin <package>              - keep a rock at its locked version
 * - unpin <package>            - release a pinned rock
 */

import { cac, type CAC } from 'cac'
import { loadConfig } from '../core/config/index.js'
import { exitCodeFor, exitCodeForCode, ValidationError } from '../core/errors/index.js'
import type { InstallFailure } from '../core/install/index.js'
import { setLogLevel, silenceLogger } from '../core/logger.js'
import {
  add,
  build,
  install,
  pin,
  remove,
  unpin,
  update,
  type OperationContext,
  type OperationResult,
} from '../core/operations/index.js'
import { NodeCommandRunner } from '../core/process/index.js'
import { PROJECT_FILE } from '../core/project/index.js'
import { RegistryClient } from '../core/registry/index.js'
import { getCommandHelp, mainHelp } from './help.js'
import type { CLIContext, CommandResult, ParsedOptions } from './types.js'
import {
  booleanOption,
  configOverrides,
  formatError,
  formatFailure,
  formatInstallReport,
  formatPinned,
  missingArgumentError,
  stringOption,
  unknownCommandError,
} from './utils/index.js'
import { VERSION } from './version.js'

export { formatInstallReport, formatLockDiff, formatFailure, formatPinned } from './utils/index.js'
export type { CLIContext, CommandResult } from './types.js'

/**
 * CLI instance type
 */
export interface CLIInstance {
  name: string
  commands: string[]
  cli: CAC
}

const COMMANDS = ['install', 'i', 'add', 'remove', 'rm', 'build', 'lock', 'pin', 'unpin']

/**
 * Create the cac instance with every command and option registered. It is
 * used for parsing only; `runCLI` dispatches.
 */
export function createCLI(): CLIInstance {
  const cli = cac('rockyard')

  cli
    .option('--lua <version>', 'Target Lua version')
    .option('--tree <dir>', 'Install tree')
    .option('--jobs <n>', 'Concurrent builds')
    .option('--server <url>', 'Registry server(s)')
    .option('--config <path>', 'Config file')
    .option('--quiet', 'Only print results and errors')
    .option('--verbose', 'Debug logging')

  cli
    .command('install [...packages]', 'install the project rocks')
    .alias('i')
    .option('--dev', 'Allow development versions')
    .option('--force', 'Rebuild installed rocks')

  cli.command('add <...packages>', 'install and record packages').option('--dev', 'Allow development versions')

  cli.command('remove <...packages>', 'drop packages from the project').alias('rm')

  cli.command('build [...packages]', 'rebuild rocks')

  cli.command('lock <action> [...packages]', 'lockfile maintenance')

  cli.command('pin <package>', 'pin a rock')

  cli.command('unpin <package>', 'unpin a rock')

  return {
    name: 'rockyard',
    commands: ['install', 'add', 'remove', 'build', 'lock', 'pin', 'unpin'],
    cli,
  }
}

interface ParsedCommand {
  name: string
  args: string[]
  options: ParsedOptions
}

/**
 * @throws CACError for unknown options or missing option values
 */
function parseCommand(args: string[]): ParsedCommand {
  const { cli } = createCLI()
  const parsed = cli.parse(['node', 'rockyard', ...args], { run: false })
  const command = cli.matchedCommand
  if (!command) {
    throw new ValidationError(`unknown command '${args[0] ?? ''}'`)
  }
  command.checkUnknownOptions()
  command.checkOptionValue()
  const options: ParsedOptions = parsed.options
  return { name: command.name, args: [...parsed.args], options }
}

/**
 * Execute a CLI command with the given arguments and context
 */
export async function runCLI(args: string[], context: CLIContext): Promise<CommandResult> {
  const { stdout, stderr } = context

  if (args.includes('--version') || args.includes('-v')) {
    stdout(VERSION)
    return { exitCode: 0 }
  }

  if (args.length === 0 || (args.length === 1 && (args[0] === '--help' || args[0] === '-h'))) {
    stdout(mainHelp())
    return { exitCode: 0 }
  }

  const command = args[0] ?? ''
  const restArgs = args.slice(1)

  if (restArgs.includes('--help') || restArgs.includes('-h')) {
    const helpText = getCommandHelp(command)
    if (helpText) {
      stdout(helpText)
      return { exitCode: 0 }
    }
  }

  if (!COMMANDS.includes(command)) {
    stderr(unknownCommandError(command))
    return { exitCode: 1, error: `unknown command '${command}'` }
  }

  try {
    const parsed = parseCommand(args)
    if (booleanOption(parsed.options, 'quiet')) silenceLogger()
    if (booleanOption(parsed.options, 'verbose')) setLogLevel('debug')

    switch (parsed.name) {
      case 'install':
        return await executeInstall(parsed, context)
      case 'add':
        return await executeAdd(parsed, context)
      case 'remove':
        return await executeRemove(parsed, context)
      case 'build':
        return await executeBuild(parsed, context)
      case 'lock':
        return await executeLock(parsed, context)
      case 'pin':
      case 'unpin':
        return await executePin(parsed, context)
      default:
        stderr(unknownCommandError(command))
        return { exitCode: 1, error: `unknown command '${command}'` }
    }
  } catch (err: unknown) {
    const message = formatError(command, err)
    stderr(message)
    return { exitCode: exitCodeFor(err), error: message }
  }
}

// =============================================================================
// Commands
// =============================================================================

async function operationContext(parsed: ParsedCommand, context: CLIContext): Promise<OperationContext> {
  const config = await loadConfig({
    cwd: context.cwd,
    env: context.env,
    configPath: stringOption(parsed.options, 'config'),
    overrides: configOverrides(parsed.options),
  })
  return {
    config,
    client: context.client ?? RegistryClient.fromConfig(config, { fetch: context.fetch }),
    runner: context.runner ?? new NodeCommandRunner(),
    projectDir: context.cwd,
    signal: context.signal,
    fetch: context.fetch,
    env: context.env,
  }
}

/**
 * The failure that decides the exit code: the first one that is not just
 * a consequence of another
 */
function primaryFailure(failures: readonly InstallFailure[]): InstallFailure | undefined {
  return failures.find((failure) => failure.code !== 'EDEPFAILED') ?? failures[0]
}

function report(result: OperationResult, context: CLIContext, done?: string): CommandResult {
  const { failures } = result.report
  if (failures.length > 0) {
    for (const failure of failures) {
      context.stderr(formatFailure(failure))
    }
    const primary = primaryFailure(failures)
    const error = `${failures.length} of ${result.graph.nodes.size} rocks failed`
    context.stderr(error)
    return { exitCode: primary ? exitCodeForCode(primary.code) : 1, error }
  }

  const output = formatInstallReport(result.report)
  context.stdout(output)
  if (done) context.stdout(done)
  return { exitCode: 0, output }
}

async function executeInstall(parsed: ParsedCommand, context: CLIContext): Promise<CommandResult> {
  const ctx = await operationContext(parsed, context)
  const result = await install(ctx, {
    packages: parsed.args,
    includeDev: booleanOption(parsed.options, 'dev'),
    force: booleanOption(parsed.options, 'force'),
  })
  return report(result, context)
}

async function executeAdd(parsed: ParsedCommand, context: CLIContext): Promise<CommandResult> {
  if (parsed.args.length === 0) {
    context.stderr(missingArgumentError('add', 'package'))
    return { exitCode: 1, error: 'missing package argument' }
  }
  const ctx = await operationContext(parsed, context)
  const result = await add(ctx, parsed.args, { includeDev: booleanOption(parsed.options, 'dev') })
  return report(result, context, `saved ${parsed.args.length} to ${PROJECT_FILE}`)
}

async function executeRemove(parsed: ParsedCommand, context: CLIContext): Promise<CommandResult> {
  if (parsed.args.length === 0) {
    context.stderr(missingArgumentError('remove', 'package'))
    return { exitCode: 1, error: 'missing package argument' }
  }
  const ctx = await operationContext(parsed, context)
  const result = await remove(ctx, parsed.args)
  return report(result, context, `removed ${parsed.args.length} from ${PROJECT_FILE}`)
}

async function executeBuild(parsed: ParsedCommand, context: CLIContext): Promise<CommandResult> {
  const ctx = await operationContext(parsed, context)
  return report(await build(ctx, { packages: parsed.args }), context)
}

async function executeLock(parsed: ParsedCommand, context: CLIContext): Promise<CommandResult> {
  const [action, ...packages] = parsed.args
  if (action !== 'update') {
    const error = `rockyard lock: unknown action '${action ?? ''}' (expected 'update')`
    context.stderr(error)
    return { exitCode: 1, error }
  }
  const ctx = await operationContext(parsed, context)
  return report(await update(ctx, { packages }), context)
}

async function executePin(parsed: ParsedCommand, context: CLIContext): Promise<CommandResult> {
  const name = parsed.args[0]
  if (!name) {
    context.stderr(missingArgumentError(parsed.name, 'package'))
    return { exitCode: 1, error: 'missing package argument' }
  }
  const ctx = await operationContext(parsed, context)
  const entry = parsed.name === 'pin' ? await pin(ctx, name) : await unpin(ctx, name)
  const output = formatPinned(name, entry)
  context.stdout(output)
  return { exitCode: 0, output }
}
