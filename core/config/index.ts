/**
 * Configuration
 *
 * Builds the immutable `Config` context value passed to the resolver,
 * build backends and orchestrator. Sources, lowest precedence first:
 * built-in defaults, `config.toml`, `ROCKYARD_*` environment variables,
 * explicit overrides.
 *
 * @module core/config
 */

import { readFile } from 'node:fs/promises'
import { homedir, availableParallelism } from 'node:os'
import { join, resolve } from 'node:path'
import * as TOML from 'smol-toml'
import { ValidationError, ParseError } from '../errors/index.js'
import { logger } from '../logger.js'

// =============================================================================
// Types
// =============================================================================

export type Platform = 'linux' | 'macosx' | 'windows' | 'freebsd' | 'unix'

export interface Config {
  /**
   * Registry servers, queried in order.
   * @default ['https://luarocks.org']
   */
  servers: string[]

  /**
   * Root of the install tree.
   * @default '<cwd>/lua_modules'
   */
  tree: string

  /**
   * Download and header cache.
   * @default '~/.cache/rockyard'
   */
  cacheDir: string

  /**
   * Target Lua runtime version (`5.1` … `5.4`).
   * @default '5.4'
   */
  luaVersion: string

  /** Prefix of a local Lua installation (`<luaDir>/include`, `<luaDir>/lib`) */
  luaDir?: string

  /**
   * Interpreter used for build scripts.
   * @default 'lua'
   */
  luaInterpreter: string

  /**
   * Maximum concurrent node builds.
   * @default availableParallelism()
   */
  jobs: number

  /**
   * Request timeout in milliseconds.
   * @default 30000
   */
  timeout: number

  /**
   * Retry attempts for retryable registry failures.
   * @default 3
   */
  retries: number

  /**
   * Base delay for exponential backoff in milliseconds.
   * @default 500
   */
  retryDelay: number

  /**
   * Seconds before a cached manifest is refetched.
   * @default 3600
   */
  manifestTtl: number

  /**
   * Build script timeout in milliseconds.
   * @default 60000
   */
  scriptTimeout: number

  /**
   * Re-resolutions allowed per package name.
   * @default 3
   */
  maxReResolutions: number

  /** Extra build variables, e.g. `CC`, `CFLAGS`, `OPENSSL_DIR` */
  variables: Record<string, string>

  /** Prefixes searched for external dependencies and Lua headers */
  searchPrefixes: string[]

  platform: Platform
}

export interface LoadConfigOptions {
  /** Explicit config file path. Defaults to `ROCKYARD_CONFIG` or `~/.config/rockyard/config.toml` */
  configPath?: string
  /** Environment to read. Defaults to `process.env` */
  env?: Record<string, string | undefined>
  /** Highest-precedence values, usually from CLI flags */
  overrides?: Partial<Config>
  cwd?: string
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_SERVER = 'https://luarocks.org'

export function detectPlatform(platform: NodeJS.Platform = process.platform): Platform {
  switch (platform) {
    case 'linux':
      return 'linux'
    case 'darwin':
      return 'macosx'
    case 'win32':
      return 'windows'
    case 'freebsd':
      return 'freebsd'
    default:
      return 'unix'
  }
}

export function defaultConfig(cwd: string = process.cwd()): Config {
  return {
    servers: [DEFAULT_SERVER],
    tree: join(cwd, 'lua_modules'),
    cacheDir: join(homedir(), '.cache', 'rockyard'),
    luaVersion: '5.4',
    luaInterpreter: 'lua',
    jobs: availableParallelism(),
    timeout: 30000,
    retries: 3,
    retryDelay: 500,
    manifestTtl: 3600,
    scriptTimeout: 60000,
    maxReResolutions: 3,
    variables: {},
    searchPrefixes: ['/usr/local', '/usr', '/opt/homebrew', '/opt/local'],
    platform: detectPlatform(),
  }
}

/**
 * Defaults merged with overrides, without touching the filesystem or env.
 */
export function createConfig(overrides: Partial<Config> = {}, cwd?: string): Config {
  const config = { ...defaultConfig(cwd), ...stripUndefined(overrides) }
  validateConfig(config)
  return Object.freeze(config)
}

// =============================================================================
// Loading
// =============================================================================

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const path = options.configPath ?? env.ROCKYARD_CONFIG ?? join(homedir(), '.config', 'rockyard', 'config.toml')

  const fromFile = await readConfigFile(path)
  const fromEnv = configFromEnv(env)

  const config: Config = {
    ...defaultConfig(cwd),
    ...fromFile,
    ...fromEnv,
    ...stripUndefined(options.overrides ?? {}),
  }
  config.tree = resolve(cwd, config.tree)
  validateConfig(config)
  logger.debug(`Config: tree=${config.tree} lua=${config.luaVersion} servers=${config.servers.join(',')}`)
  return Object.freeze(config)
}

async function readConfigFile(path: string): Promise<Partial<Config>> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug(`Config file not found at ${path}, using defaults`)
      return {}
    }
    throw error
  }

  logger.debug(`Loading config from: ${path}`)
  let table: Record<string, unknown>
  try {
    table = TOML.parse(text)
  } catch (error) {
    throw new ParseError(error instanceof Error ? error.message : String(error), { path })
  }
  return configFromTable(table, path)
}

/**
 * Map a parsed `config.toml` table onto Config fields
 */
export function configFromTable(table: Record<string, unknown>, path = 'config.toml'): Partial<Config> {
  const out: Partial<Config> = {}
  const str = (key: string): string | undefined => {
    const value = table[key]
    if (value === undefined) return undefined
    if (typeof value !== 'string') throw new ValidationError(`${key} must be a string`, { path })
    return value
  }
  const num = (key: string): number | undefined => {
    const value = table[key]
    if (value === undefined) return undefined
    if (typeof value !== 'number') throw new ValidationError(`${key} must be a number`, { path })
    return value
  }
  const strList = (key: string): string[] | undefined => {
    const value = table[key]
    if (value === undefined) return undefined
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
      throw new ValidationError(`${key} must be a list of strings`, { path })
    }
    return value
  }

  out.servers = strList('servers')
  out.tree = str('tree')
  out.cacheDir = str('cache_dir')
  out.luaVersion = str('lua_version')
  out.luaDir = str('lua_dir')
  out.luaInterpreter = str('lua_interpreter')
  out.jobs = num('jobs')
  out.timeout = num('timeout')
  out.retries = num('retries')
  out.retryDelay = num('retry_delay')
  out.manifestTtl = num('manifest_ttl')
  out.scriptTimeout = num('script_timeout')
  out.maxReResolutions = num('max_re_resolutions')
  out.searchPrefixes = strList('search_prefixes')

  const variables = table.variables
  if (variables !== undefined) {
    if (typeof variables !== 'object' || variables === null || Array.isArray(variables)) {
      throw new ValidationError('variables must be a table', { path })
    }
    const vars: Record<string, string> = {}
    for (const [key, value] of Object.entries(variables)) {
      if (typeof value !== 'string') {
        throw new ValidationError(`variables.${key} must be a string`, { path })
      }
      vars[key] = value
    }
    out.variables = vars
  }

  return stripUndefined(out)
}

export function configFromEnv(env: Record<string, string | undefined>): Partial<Config> {
  const out: Partial<Config> = {}
  if (env.ROCKYARD_SERVER) {
    out.servers = env.ROCKYARD_SERVER.split(',').map((s) => s.trim()).filter(Boolean)
  }
  if (env.ROCKYARD_TREE) out.tree = env.ROCKYARD_TREE
  if (env.ROCKYARD_CACHE_DIR) out.cacheDir = env.ROCKYARD_CACHE_DIR
  if (env.ROCKYARD_LUA_VERSION) out.luaVersion = env.ROCKYARD_LUA_VERSION
  if (env.ROCKYARD_LUA_DIR) out.luaDir = env.ROCKYARD_LUA_DIR
  if (env.ROCKYARD_JOBS) {
    const jobs = Number(env.ROCKYARD_JOBS)
    if (!Number.isInteger(jobs)) {
      throw new ValidationError(`ROCKYARD_JOBS must be an integer, got "${env.ROCKYARD_JOBS}"`)
    }
    out.jobs = jobs
  }
  return out
}

export function validateConfig(config: Config): void {
  if (config.servers.length === 0) {
    throw new ValidationError('At least one server must be configured')
  }
  if (!/^5\.[1-4]$/.test(config.luaVersion)) {
    throw new ValidationError(`Unsupported Lua version: ${config.luaVersion}`)
  }
  if (!Number.isInteger(config.jobs) || config.jobs < 1) {
    throw new ValidationError(`jobs must be a positive integer, got ${config.jobs}`)
  }
  if (config.retries < 0 || config.maxReResolutions < 0) {
    throw new ValidationError('retries and max_re_resolutions must not be negative')
  }
}

// =============================================================================
// Helpers
// =============================================================================

function stripUndefined<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {}
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      out[key] = value[key]
    }
  }
  return out
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
