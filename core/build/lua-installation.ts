/**
 * Lua headers and libraries for native builds
 *
 * Lookup order: the configured Lua dir, the header cache, pkg-config, the
 * search prefixes, and finally the official source tarball, whose headers
 * are kept in the cache for later runs.
 */

import { copyFile, mkdir, mkdtemp, readFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import type { Config } from '../config/index.js'
import { AbortedError, HeaderNotFoundError, ToolNotFoundError } from '../errors/index.js'
import { logger } from '../logger.js'
import type { CommandResult, CommandRunner } from '../process/index.js'
import { download, extractArchive } from '../source/index.js'
import { isFile } from './collect.js'
import type { LuaRuntime } from './types.js'

/** Latest release of each supported series */
export const LUA_RELEASES: Record<string, string> = {
  '5.1': '5.1.5',
  '5.2': '5.2.4',
  '5.3': '5.3.6',
  '5.4': '5.4.7',
}

const HEADERS = ['lua.h', 'luaconf.h', 'lualib.h', 'lauxlib.h', 'lua.hpp']

export interface DetectLuaOptions {
  fetch?: typeof fetch
  signal?: AbortSignal
}

/**
 * `5.4` from the `LUA_VERSION_NUM` of a lua.h
 */
export function headerVersion(text: string): string | undefined {
  const match = /#define\s+LUA_VERSION_NUM\s+(\d+)/.exec(text)
  if (!match) return undefined
  const num = Number(match[1])
  return `${Math.floor(num / 100)}.${num % 100}`
}

export class LuaInstallation {
  private config: Config
  private runner: CommandRunner
  private options: DetectLuaOptions
  private searched: string[] = []

  private constructor(config: Config, runner: CommandRunner, options: DetectLuaOptions) {
    this.config = config
    this.runner = runner
    this.options = options
  }

  static async detect(config: Config, runner: CommandRunner, options: DetectLuaOptions = {}): Promise<LuaRuntime> {
    return new LuaInstallation(config, runner, options).find()
  }

  get cacheIncludeDir(): string {
    return join(this.config.cacheDir, 'lua', this.config.luaVersion, 'include')
  }

  private async find(): Promise<LuaRuntime> {
    const version = this.config.luaVersion
    const interpreter = this.config.luaInterpreter

    if (this.config.luaDir !== undefined) {
      const dir = this.config.luaDir
      for (const incdir of [join(dir, 'include'), dir]) {
        if (await this.matches(incdir)) {
          return { version, incdir, libdir: join(dir, 'lib'), bindir: join(dir, 'bin'), interpreter, origin: 'config' }
        }
      }
    }

    if (await this.matches(this.cacheIncludeDir)) {
      return { version, incdir: this.cacheIncludeDir, interpreter, origin: 'cache' }
    }

    const fromPkgConfig = await this.fromPkgConfig()
    if (fromPkgConfig) {
      return { version, ...fromPkgConfig, interpreter, origin: 'pkg-config' }
    }

    for (const prefix of this.config.searchPrefixes) {
      for (const incdir of this.prefixCandidates(prefix)) {
        if (await this.matches(incdir)) {
          return { version, incdir, libdir: join(prefix, 'lib'), bindir: join(prefix, 'bin'), interpreter, origin: 'prefix' }
        }
      }
    }

    if (await this.downloadHeaders()) {
      return { version, incdir: this.cacheIncludeDir, interpreter, origin: 'download' }
    }

    throw new HeaderNotFoundError(version, this.searched)
  }

  /**
   * `dir/lua.h` exists and is for the configured version
   */
  private async matches(dir: string): Promise<boolean> {
    this.searched.push(dir)
    const header = join(dir, 'lua.h')
    if (!(await isFile(header))) return false
    const found = headerVersion(await readFile(header, 'utf8'))
    if (found !== this.config.luaVersion) {
      logger.debug(`Skipping ${header}: Lua ${found ?? 'unknown'}`)
      return false
    }
    return true
  }

  private prefixCandidates(prefix: string): string[] {
    const v = this.config.luaVersion
    return [
      join(prefix, 'include', `lua${v}`),
      join(prefix, 'include', `lua-${v}`),
      join(prefix, 'include', `lua${v.replace('.', '')}`),
      join(prefix, 'include'),
    ]
  }

  private async fromPkgConfig(): Promise<{ incdir: string; libdir?: string } | undefined> {
    const v = this.config.luaVersion
    const names = [`lua${v}`, `lua-${v}`, `lua${v.replace('.', '')}`, 'lua']
    if (v === '5.1') names.push('luajit')

    for (const name of names) {
      let cflags: CommandResult
      try {
        cflags = await this.runner.run('pkg-config', ['--cflags-only-I', name], { signal: this.options.signal })
      } catch (error) {
        if (error instanceof ToolNotFoundError) {
          logger.debug('pkg-config not available')
          return undefined
        }
        throw error
      }
      if (cflags.exitCode !== 0) continue

      const dirs = cflags.stdout
        .split(/\s+/)
        .filter((flag) => flag.startsWith('-I'))
        .map((flag) => flag.slice(2))
      if (dirs.length === 0) {
        const includedir = await this.runner.run('pkg-config', ['--variable=includedir', name])
        if (includedir.exitCode === 0 && includedir.stdout.trim() !== '') dirs.push(includedir.stdout.trim())
      }

      for (const incdir of dirs) {
        if (await this.matches(incdir)) {
          const libdir = await this.runner.run('pkg-config', ['--variable=libdir', name])
          const dir = libdir.exitCode === 0 ? libdir.stdout.trim() : ''
          return dir === '' ? { incdir } : { incdir, libdir: dir }
        }
      }
    }
    return undefined
  }

  private async downloadHeaders(): Promise<boolean> {
    const release = LUA_RELEASES[this.config.luaVersion]
    if (release === undefined) return false
    const url = `https://www.lua.org/ftp/lua-${release}.tar.gz`
    this.searched.push(url)

    const root = join(this.config.cacheDir, 'lua')
    await mkdir(root, { recursive: true })
    const tmp = await mkdtemp(join(root, '.download-'))
    try {
      logger.info(`Downloading Lua ${release} headers`)
      const bytes = await download(url, {
        fetch: this.options.fetch,
        signal: this.options.signal,
        timeout: this.config.timeout,
      })
      await extractArchive(bytes, tmp, { fileName: `lua-${release}.tar.gz`, runner: this.runner })

      const srcDir = join(tmp, `lua-${release}`, 'src')
      await mkdir(this.cacheIncludeDir, { recursive: true })
      for (const header of HEADERS) {
        if (await isFile(join(srcDir, header))) {
          await copyFile(join(srcDir, header), join(this.cacheIncludeDir, header))
        }
      }
      return this.matches(this.cacheIncludeDir)
    } catch (error) {
      if (error instanceof AbortedError) throw error
      logger.warn(`Could not fetch Lua headers from ${url}: ${error instanceof Error ? error.message : String(error)}`)
      return false
    } finally {
      await rm(tmp, { recursive: true, force: true })
    }
  }
}
