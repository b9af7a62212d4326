/**
 * Rockspec Parser
 *
 * Turns rockspec text into an immutable PackageDescriptor:
 * - Evaluates the Lua literal tables (no code runs)
 * - Applies `platforms` overrides for the target platform
 * - Splits the `lua` runtime constraint out of the dependency list
 * - Classifies the build table into a tagged BuildSpec
 *
 * @module core/rockspec/parser
 */

import { basename } from 'node:path'
import type { Platform } from '../config/index.js'
import { ParseError } from '../errors/index.js'
import { parseVersion } from '../version/index.js'
import type { Constraint } from '../version/index.js'
import { evaluateLua, isTable, LuaTable, type LuaValue } from './lua-table.js'
import { normalizePackageName, parseDependency, type DependencySpec } from './name.js'
import type {
  BuildSpec,
  DescriptionSpec,
  ExternalDependencySpec,
  InstallSpec,
  NativeModule,
  PackageDescriptor,
  SourceSpec,
} from './types.js'

export interface ParseRockspecOptions {
  /** Platform whose `platforms` overrides apply */
  platform?: Platform
  /** File path, for error messages */
  path?: string
}

const OVERRIDABLE_SECTIONS = [
  'dependencies',
  'build_dependencies',
  'test_dependencies',
  'external_dependencies',
  'source',
  'build',
] as const

/**
 * Platform names that apply to a target, least specific first
 */
export function platformNames(platform: Platform): string[] {
  switch (platform) {
    case 'linux':
      return ['unix', 'linux']
    case 'macosx':
      return ['unix', 'bsd', 'macosx', 'macos']
    case 'freebsd':
      return ['unix', 'bsd', 'freebsd']
    case 'windows':
      return ['windows', 'win32']
    case 'unix':
      return ['unix']
  }
}

// =============================================================================
// Entry point
// =============================================================================

export function parseRockspec(text: string, options: ParseRockspecOptions = {}): PackageDescriptor {
  const path = options.path
  const globals = evaluateLua(text, path)
  const platform = options.platform ?? 'linux'
  const read = new Reader(path)

  for (const section of OVERRIDABLE_SECTIONS) {
    const value = globals.get(section)
    if (isTable(value)) {
      globals.set(section, applyPlatformOverrides(value, platform))
    }
  }

  const name = normalizePackageName(read.requiredString(globals, 'package'))
  const version = parseVersion(read.requiredString(globals, 'version'))

  const dependencies: DependencySpec[] = []
  let luaConstraint: Constraint | undefined
  for (const dep of read.dependencyList(globals, 'dependencies')) {
    if (dep.name === 'lua') {
      luaConstraint = dep.constraint
    } else {
      dependencies.push(dep)
    }
  }

  const descriptor: PackageDescriptor = {
    name,
    version,
    rockspecFormat: read.optionalString(globals, 'rockspec_format'),
    dependencies,
    luaConstraint,
    buildDependencies: read.dependencyList(globals, 'build_dependencies').filter((d) => d.name !== 'lua'),
    testDependencies: read.dependencyList(globals, 'test_dependencies').filter((d) => d.name !== 'lua'),
    externalDependencies: read.externalDependencies(globals),
    supportedPlatforms: read.stringList(globals, 'supported_platforms'),
    source: read.source(globals),
    build: read.build(globals),
    description: read.description(globals),
    rockspec: text,
  }

  return deepFreeze(descriptor)
}

/**
 * Whether `supported_platforms` admits the target platform.
 * Entries may be negated with `!`.
 */
export function supportsPlatform(descriptor: Pick<PackageDescriptor, 'supportedPlatforms'>, platform: Platform): boolean {
  const names = platformNames(platform)
  const entries = descriptor.supportedPlatforms
  if (entries.some((e) => e.startsWith('!') && names.includes(e.slice(1)))) {
    return false
  }
  const positive = entries.filter((e) => !e.startsWith('!'))
  return positive.length === 0 || positive.some((e) => names.includes(e))
}

// =============================================================================
// Platform overrides
// =============================================================================

export function applyPlatformOverrides(section: LuaTable, platform: Platform): LuaTable {
  const platforms = section.get('platforms')
  let result = copyWithout(section, 'platforms')
  if (!isTable(platforms)) {
    return result
  }
  for (const name of platformNames(platform)) {
    const override = platforms.get(name)
    if (isTable(override)) {
      result = mergeTables(result, override)
    }
  }
  return result
}

function copyWithout(table: LuaTable, skip: string): LuaTable {
  const out = new LuaTable()
  for (const [key, value] of table.entries) {
    if (key !== skip) out.set(key, value)
  }
  return out
}

/**
 * Lists concatenate; other tables merge key by key, recursing into tables
 */
function mergeTables(base: LuaTable, override: LuaTable): LuaTable {
  if (base.isList && override.isList) {
    const out = new LuaTable()
    ;[...base.list(), ...override.list()].forEach((value, i) => out.set(i + 1, value))
    return out
  }
  const out = copyWithout(base, '')
  for (const [key, value] of override.entries) {
    const current = out.get(key)
    out.set(key, isTable(current) && isTable(value) ? mergeTables(current, value) : value)
  }
  return out
}

// =============================================================================
// Field readers
// =============================================================================

class Reader {
  constructor(private readonly path: string | undefined) {}

  private fail(reason: string): ParseError {
    return new ParseError(reason, { path: this.path })
  }

  requiredString(table: LuaTable, key: string, where = ''): string {
    const value = this.optionalString(table, key, where)
    if (value === undefined) {
      throw this.fail(`missing required field ${where}${key}`)
    }
    return value
  }

  optionalString(table: LuaTable, key: string, where = ''): string | undefined {
    const value = table.get(key)
    if (value === undefined) return undefined
    if (typeof value === 'number') return String(value)
    if (typeof value !== 'string') {
      throw this.fail(`${where}${key} must be a string`)
    }
    return value
  }

  optionalBoolean(table: LuaTable, key: string, fallback: boolean, where = ''): boolean {
    const value = table.get(key)
    if (value === undefined) return fallback
    if (typeof value !== 'boolean') {
      throw this.fail(`${where}${key} must be a boolean`)
    }
    return value
  }

  optionalTable(table: LuaTable, key: string, where = ''): LuaTable | undefined {
    const value = table.get(key)
    if (value === undefined) return undefined
    if (!isTable(value)) {
      throw this.fail(`${where}${key} must be a table`)
    }
    return value
  }

  stringList(table: LuaTable, key: string, where = ''): string[] {
    const list = this.optionalTable(table, key, where)
    if (!list) return []
    return list.list().map((value) => this.asString(value, `${where}${key}`))
  }

  /**
   * `{ KEY = "value" }` tables; numbers are stringified
   */
  stringMap(table: LuaTable, key: string, where = ''): Record<string, string> {
    const map = this.optionalTable(table, key, where)
    const out: Record<string, string> = {}
    if (!map) return out
    for (const [k, value] of map.fields()) {
      out[k] = this.asString(value, `${where}${key}.${k}`)
    }
    return out
  }

  private asString(value: LuaValue, where: string): string {
    if (typeof value === 'string') return value
    if (typeof value === 'number') return String(value)
    throw this.fail(`${where} must contain strings`)
  }

  dependencyList(table: LuaTable, key: string): DependencySpec[] {
    return this.stringList(table, key).map((text) => {
      try {
        return parseDependency(text)
      } catch (error) {
        if (error instanceof ParseError) {
          throw new ParseError(`${key}: ${error.message}`, { offset: error.offset, path: this.path })
        }
        throw error
      }
    })
  }

  externalDependencies(globals: LuaTable): Record<string, ExternalDependencySpec> {
    const table = this.optionalTable(globals, 'external_dependencies')
    const out: Record<string, ExternalDependencySpec> = {}
    if (!table) return out
    for (const [name, value] of table.fields()) {
      if (!isTable(value)) {
        throw this.fail(`external_dependencies.${name} must be a table`)
      }
      const where = `external_dependencies.${name}.`
      out[name] = {
        header: this.optionalString(value, 'header', where),
        library: this.optionalString(value, 'library', where),
      }
    }
    return out
  }

  source(globals: LuaTable): SourceSpec {
    const table = this.optionalTable(globals, 'source')
    if (!table) {
      throw this.fail('missing required field source')
    }
    const url = this.requiredString(table, 'url', 'source.')
    const dir = this.optionalString(table, 'dir', 'source.')
    const hash = this.optionalString(table, 'hash', 'source.')
    const integrity = hash !== undefined && /^sha(256|384|512)-/.test(hash) ? hash : undefined

    if (url.startsWith('git+') || url.startsWith('git://')) {
      const ref =
        this.optionalString(table, 'tag', 'source.') ??
        this.optionalString(table, 'branch', 'source.') ??
        this.optionalString(table, 'commit', 'source.')
      return { kind: 'git', url: url.startsWith('git+') ? url.slice(4) : url, ref, dir, integrity }
    }
    if (url.startsWith('file://')) {
      return { kind: 'file', path: url.slice('file://'.length), dir, integrity }
    }
    return { kind: 'url', url, dir, integrity }
  }

  description(globals: LuaTable): DescriptionSpec {
    const table = this.optionalTable(globals, 'description')
    if (!table) return {}
    const where = 'description.'
    return {
      summary: this.optionalString(table, 'summary', where),
      detailed: this.optionalString(table, 'detailed', where),
      homepage: this.optionalString(table, 'homepage', where),
      license: this.optionalString(table, 'license', where),
    }
  }

  install(build: LuaTable): InstallSpec {
    const install = this.optionalTable(build, 'install', 'build.')
    const empty: InstallSpec = { lua: {}, lib: {}, bin: {}, conf: {} }
    if (!install) return empty
    const section = (key: keyof InstallSpec): Record<string, string> => {
      const table = this.optionalTable(install, key, 'build.install.')
      const out: Record<string, string> = {}
      if (!table) return out
      for (const [k, value] of table.entries) {
        const source = this.asString(value, `build.install.${key}`)
        const dest = typeof k === 'string' ? k : installName(key, source)
        out[dest] = source
      }
      return out
    }
    return { lua: section('lua'), lib: section('lib'), bin: section('bin'), conf: section('conf') }
  }

  build(globals: LuaTable): BuildSpec {
    const build = this.optionalTable(globals, 'build') ?? new LuaTable()
    const type = this.optionalString(build, 'type', 'build.') ?? 'builtin'
    const where = 'build.'
    const base = {
      install: this.install(build),
      copyDirectories: this.stringList(build, 'copy_directories', where),
      patches: this.stringMap(build, 'patches', where),
    }

    switch (type) {
      case 'builtin':
      case 'module': {
        const { modules, nativeModules } = this.modules(build)
        if (nativeModules.length > 0) {
          return { kind: 'compiled-extension', modules, nativeModules, ...base }
        }
        return { kind: 'builtin', modules, autodetect: true, ...base }
      }
      case 'none':
        return { kind: 'builtin', modules: {}, autodetect: false, ...base }
      case 'make':
        return {
          kind: 'external-tool',
          tool: 'make',
          makefile: this.optionalString(build, 'makefile', where),
          buildTarget: this.optionalString(build, 'build_target', where) ?? '',
          buildPass: this.optionalBoolean(build, 'build_pass', true, where),
          installTarget: this.optionalString(build, 'install_target', where) ?? 'install',
          installPass: this.optionalBoolean(build, 'install_pass', true, where),
          buildVariables: this.stringMap(build, 'build_variables', where),
          installVariables: this.stringMap(build, 'install_variables', where),
          variables: this.stringMap(build, 'variables', where),
          ...base,
        }
      case 'cmake':
        return {
          kind: 'external-tool',
          tool: 'cmake',
          cmakeLists: this.optionalString(build, 'cmake', where),
          buildPass: this.optionalBoolean(build, 'build_pass', true, where),
          installPass: this.optionalBoolean(build, 'install_pass', true, where),
          variables: this.stringMap(build, 'variables', where),
          ...base,
        }
      case 'command':
        return {
          kind: 'external-tool',
          tool: 'command',
          buildCommand: this.optionalString(build, 'build_command', where),
          installCommand: this.optionalString(build, 'install_command', where),
          ...base,
        }
      case 'script': {
        const timeout = build.get('timeout')
        if (timeout !== undefined && typeof timeout !== 'number') {
          throw this.fail('build.timeout must be a number of seconds')
        }
        return {
          kind: 'user-script',
          script: this.requiredString(build, 'script', where),
          timeout: timeout === undefined ? undefined : timeout * 1000,
          ...base,
        }
      }
      default:
        return { kind: 'unsupported', type }
    }
  }

  /**
   * `build.modules` entries are either a `.lua` path, a C source path, a
   * list of C sources, or a table with `sources` and compiler settings.
   */
  private modules(build: LuaTable): { modules: Record<string, string>; nativeModules: NativeModule[] } {
    const table = this.optionalTable(build, 'modules', 'build.')
    const modules: Record<string, string> = {}
    const nativeModules: NativeModule[] = []
    if (!table) return { modules, nativeModules }

    for (const [name, value] of table.fields()) {
      const where = `build.modules.${name}.`
      if (typeof value === 'string') {
        if (value.endsWith('.lua')) {
          modules[name] = value
        } else {
          nativeModules.push(nativeModule(name, [value]))
        }
        continue
      }
      if (!isTable(value)) {
        throw this.fail(`build.modules.${name} must be a path or a table`)
      }
      if (value.get('sources') === undefined) {
        nativeModules.push(nativeModule(name, value.list().map((v) => this.asString(v, `build.modules.${name}`))))
        continue
      }
      const sources = value.get('sources')
      nativeModules.push({
        name,
        sources: typeof sources === 'string' ? [sources] : this.stringList(value, 'sources', where),
        libraries: this.stringList(value, 'libraries', where),
        defines: this.stringList(value, 'defines', where),
        incdirs: this.stringList(value, 'incdirs', where),
        libdirs: this.stringList(value, 'libdirs', where),
      })
    }
    return { modules, nativeModules }
  }
}

function nativeModule(name: string, sources: string[]): NativeModule {
  return { name, sources, libraries: [], defines: [], incdirs: [], libdirs: [] }
}

/**
 * Destination for positional `build.install` entries
 */
function installName(section: keyof InstallSpec, source: string): string {
  const file = basename(source)
  if (section === 'lua') {
    return file.replace(/\.lua$/, '')
  }
  return file
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}
