/**
 * Help text for CLI commands
 */

import { VERSION } from './version.js'

const GLOBAL_OPTIONS = `Global options:
  --lua <version>   Target Lua version (5.1 - 5.4)
  --tree <dir>      Install tree (default: ./lua_modules)
  --jobs <n>        Concurrent builds
  --server <url>    Registry server; comma separated for several
  --config <path>   Config file
  --quiet           Only print results and errors
  --verbose         Debug logging
  -h, --help        Display this message`

/**
 * Main help text shown with --help or no arguments
 */
export function mainHelp(): string {
  return `rockyard/${VERSION}

Usage:
  $ rockyard <command> [options]

Commands:
  install [packages...]      install the project's rocks and any given packages
  i [packages...]            alias for install
  add <packages...>          install packages and record them in rockyard.toml
  remove <packages...>       drop packages from rockyard.toml and the tree
  build [packages...]        rebuild rocks even when installed
  lock update [packages...]  re-resolve, ignoring locked versions
  pin <package>              keep a rock at its locked version
  unpin <package>            release a pinned rock

For more info, run any command with the --help flag:
  $ rockyard install --help
  $ rockyard lock --help

Options:
  -v, --version  Display version number
  -h, --help     Display this message
`
}

export function installHelp(): string {
  return `rockyard/${VERSION}

Usage:
  $ rockyard install [packages...]

Options:
  --dev             Allow development versions (scm, dev)
  --force           Rebuild rocks that are already installed
${GLOBAL_OPTIONS}

Description:
  Resolve rockyard.toml dependencies plus the given packages, build
  what is missing and write rockyard.lock. Locked versions are kept
  while they still satisfy the constraints.

Examples:
  $ rockyard install
  $ rockyard install luasocket
  $ rockyard i "lpeg >= 1.1" --lua 5.3
`
}

export function addHelp(): string {
  return `rockyard/${VERSION}

Usage:
  $ rockyard add <packages...>

Options:
  --dev             Allow development versions (scm, dev)
${GLOBAL_OPTIONS}

Description:
  Install packages and record them under [dependencies] in
  rockyard.toml. Without a constraint the resolved version is recorded
  as a lower bound. Nothing is recorded when a build fails.

Examples:
  $ rockyard add luafilesystem
  $ rockyard add "penlight ~> 1.13" argparse@0.7
`
}

export function removeHelp(): string {
  return `rockyard/${VERSION}

Usage:
  $ rockyard remove <packages...>

Options:
${GLOBAL_OPTIONS}

Description:
  Drop packages from rockyard.toml, re-resolve what is left and remove
  rocks no longer in rockyard.lock from the tree.

Examples:
  $ rockyard remove luasocket
  $ rockyard rm lpeg argparse
`
}

export function buildHelp(): string {
  return `rockyard/${VERSION}

Usage:
  $ rockyard build [packages...]

Options:
${GLOBAL_OPTIONS}

Description:
  Rebuild the named rocks, or every rock of the project, even when the
  tree already holds them.

Examples:
  $ rockyard build
  $ rockyard build lpeg
`
}

export function lockHelp(): string {
  return `rockyard/${VERSION}

Usage:
  $ rockyard lock update [packages...]

Options:
${GLOBAL_OPTIONS}

Description:
  Re-resolve the project ignoring locked versions of the named rocks,
  or of every rock. Pinned rocks keep their version.

Examples:
  $ rockyard lock update
  $ rockyard lock update luasocket
`
}

export function pinHelp(): string {
  return `rockyard/${VERSION}

Usage:
  $ rockyard pin <package>
  $ rockyard unpin <package>

Options:
${GLOBAL_OPTIONS}

Description:
  Mark a rock in rockyard.lock so lock update keeps its version, or
  clear the mark.
`
}

/**
 * Help text for a command, or null for an unknown one
 */
export function getCommandHelp(command: string): string | null {
  switch (command) {
    case 'install':
    case 'i':
      return installHelp()
    case 'add':
      return addHelp()
    case 'remove':
    case 'rm':
      return removeHelp()
    case 'build':
      return buildHelp()
    case 'lock':
      return lockHelp()
    case 'pin':
    case 'unpin':
      return pinHelp()
    default:
      return null
  }
}
