/**
 * Mapping source files onto the rock layout
 */

import { stat } from 'node:fs/promises'
import { basename, extname, join, relative, sep } from 'node:path'
import { MissingFileError } from '../errors/index.js'
import { listFiles } from '../integrity/index.js'
import type { BuildSpec, PackageDescriptor } from '../rockspec/index.js'
import { LAYOUT_DIRS, type InstalledFile, type InstalledFiles } from './types.js'

const EXECUTABLE = 0o755

/**
 * `foo.bar` -> `foo/bar.lua`. A source named `init.lua` keeps that name
 * under the module directory.
 */
export function luaModulePath(module: string, source?: string): string {
  const path = module.replace(/\./g, '/')
  if (source !== undefined && basename(source) === 'init.lua' && !module.endsWith('.init')) {
    return `${path}/init.lua`
  }
  return `${path}.lua`
}

/**
 * `socket.core` -> `socket/core.so`
 */
export function libModulePath(module: string, extension: string): string {
  return `${module.replace(/\./g, '/')}.${extension}`
}

function toPosix(path: string): string {
  return path.split(sep).join('/')
}

export async function isFile(path: string): Promise<boolean> {
  const info = await stat(path).catch(() => undefined)
  return info?.isFile() ?? false
}

export async function isDirectory(path: string): Promise<boolean> {
  const info = await stat(path).catch(() => undefined)
  return info?.isDirectory() ?? false
}

/**
 * Accumulates installed files; a later file replaces an earlier one at the
 * same path
 */
export class FileCollector {
  private files = new Map<string, InstalledFile>()
  private binaries = new Set<string>()

  add(file: InstalledFile): void {
    this.files.set(file.path, file)
  }

  addBinary(name: string, from: string): void {
    this.add({ path: `bin/${name}`, from, mode: EXECUTABLE })
    this.binaries.add(name)
  }

  /**
   * Every file under `root`, at `<prefix>/<relative path>`
   */
  async addTree(root: string, prefix: string): Promise<void> {
    if (!(await isDirectory(root))) return
    for (const file of await listFiles(root)) {
      this.add({ path: `${prefix}/${toPosix(relative(root, file))}`, from: file })
    }
  }

  /**
   * Files an external tool or script left under an install prefix. Paths
   * outside the layout dirs land under `etc/`.
   */
  async addPrefix(prefix: string, skip: ReadonlySet<string> = new Set()): Promise<void> {
    if (!(await isDirectory(prefix))) return
    for (const file of await listFiles(prefix)) {
      const rel = toPosix(relative(prefix, file))
      if (skip.has(rel)) continue
      const top = rel.split('/')[0]
      if (top === 'bin') {
        this.addBinary(rel.slice('bin/'.length), file)
      } else if (LAYOUT_DIRS.some((dir) => dir === top)) {
        this.add({ path: rel, from: file })
      } else {
        this.add({ path: `etc/${rel}`, from: file })
      }
    }
  }

  toInstalled(): InstalledFiles {
    const files = [...this.files.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    return { files, binaries: [...this.binaries].sort() }
  }
}

async function requireFile(sourceDir: string, path: string, packageName: string): Promise<string> {
  const full = join(sourceDir, path)
  if (!(await isFile(full))) {
    throw new MissingFileError(path, packageName)
  }
  return full
}

/**
 * Copy declared Lua modules to `src/`
 */
export async function collectLuaModules(
  collector: FileCollector,
  sourceDir: string,
  modules: Record<string, string>,
  packageName: string
): Promise<void> {
  for (const [module, source] of Object.entries(modules)) {
    const from = await requireFile(sourceDir, source, packageName)
    collector.add({ path: `src/${luaModulePath(module, source)}`, from })
  }
}

/**
 * `build.install` entries, `copy_directories` and docs; shared by every
 * backend
 */
export async function collectInstallSection(
  collector: FileCollector,
  sourceDir: string,
  build: Exclude<BuildSpec, { kind: 'unsupported' }>,
  packageName: string
): Promise<void> {
  const { install } = build

  await collectLuaModules(collector, sourceDir, install.lua, packageName)
  for (const [module, source] of Object.entries(install.lib)) {
    const from = await requireFile(sourceDir, source, packageName)
    collector.add({ path: `lib/${module.replace(/\./g, '/')}${extname(source)}`, from })
  }
  for (const [name, source] of Object.entries(install.bin)) {
    collector.addBinary(name, await requireFile(sourceDir, source, packageName))
  }
  for (const [name, source] of Object.entries(install.conf)) {
    collector.add({ path: `conf/${name}`, from: await requireFile(sourceDir, source, packageName) })
  }

  for (const dir of build.copyDirectories) {
    if (dir === 'doc' || dir === 'docs') continue
    await collector.addTree(join(sourceDir, dir), 'etc')
  }

  const docDir = (await isDirectory(join(sourceDir, 'doc'))) ? 'doc' : 'docs'
  await collector.addTree(join(sourceDir, docDir), 'doc')
}

export function rockspecFile(descriptor: PackageDescriptor): InstalledFile {
  return {
    path: `${descriptor.name.replace(/\//g, '_')}-${descriptor.version.toString()}.rockspec`,
    contents: new TextEncoder().encode(descriptor.rockspec),
  }
}
