/**
 * Install tree
 *
 * Layout under `<tree>/<lua version>/`:
 *
 * ```
 * rocks/<name>/<version>/{src,lib,bin,conf,doc,etc}/...
 * rocks/<name>/<version>/rock_manifest.json
 * bin/<binary>
 * ```
 *
 * A build is staged next to the rocks and renamed into place, so a rock
 * dir is either absent or complete. Binaries are copied into the shared
 * `bin/`; a binary owned by another rock is replaced and a warning logged.
 *
 * @module core/tree
 */

import { randomBytes } from 'node:crypto'
import type { Dirent } from 'node:fs'
import { chmod, copyFile, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import type { InstalledFiles } from '../build/index.js'
import { isMissingFile } from '../config/index.js'
import { ParseError } from '../errors/index.js'
import { logger } from '../logger.js'
import type { PackageName } from '../rockspec/index.js'
import { KeyedMutex } from './mutex.js'

export { KeyedMutex } from './mutex.js'

export const ROCK_MANIFEST = 'rock_manifest.json'

export interface RockManifest {
  name: PackageName
  version: string
  files: string[]
  binaries: string[]
}

export interface InstalledRock extends RockManifest {
  dir: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function toManifest(value: unknown): RockManifest | undefined {
  if (!isRecord(value)) return undefined
  const { name, version, files, binaries } = value
  if (typeof name !== 'string' || typeof version !== 'string') return undefined
  if (!isStringList(files) || !isStringList(binaries)) return undefined
  return { name, version, files, binaries }
}

export class RockTree {
  readonly root: string
  private readonly mutex = new KeyedMutex()
  private readonly binOwners = new Map<string, PackageName>()

  /**
   * @param tree - Tree directory, usually `config.tree`
   * @param luaVersion - Runtime series the tree holds rocks for
   */
  constructor(tree: string, luaVersion: string) {
    this.root = join(tree, luaVersion)
  }

  get rocksDir(): string {
    return join(this.root, 'rocks')
  }

  get binDir(): string {
    return join(this.root, 'bin')
  }

  rockDir(name: PackageName, version: string): string {
    return join(this.rocksDir, name, version)
  }

  async manifest(name: PackageName, version: string): Promise<RockManifest | undefined> {
    const path = join(this.rockDir(name, version), ROCK_MANIFEST)
    let text: string
    try {
      text = await readFile(path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return undefined
      throw error
    }
    let value: unknown
    try {
      value = JSON.parse(text)
    } catch (error) {
      throw new ParseError(error instanceof Error ? error.message : String(error), { path })
    }
    const manifest = toManifest(value)
    if (!manifest) {
      throw new ParseError('invalid rock manifest', { path })
    }
    return manifest
  }

  async isInstalled(name: PackageName, version: string): Promise<boolean> {
    return (await this.manifest(name, version)) !== undefined
  }

  /**
   * Copy a build's files into the rock dir and its binaries into the
   * shared bin dir. An existing install of the same version is replaced.
   */
  async promote(name: PackageName, version: string, installed: InstalledFiles): Promise<InstalledRock> {
    const dir = this.rockDir(name, version)

    await this.mutex.run(dir, async () => {
      const staging = join(this.root, '.staging', `${name.replace(/\//g, '_')}-${randomBytes(6).toString('hex')}`)
      try {
        for (const file of installed.files) {
          const target = join(staging, file.path)
          await mkdir(dirname(target), { recursive: true })
          if ('from' in file) {
            await copyFile(file.from, target)
          } else {
            await writeFile(target, file.contents)
          }
          if (file.mode !== undefined) {
            await chmod(target, file.mode)
          }
        }
        const manifest: RockManifest = {
          name,
          version,
          files: installed.files.map((file) => file.path),
          binaries: installed.binaries,
        }
        await writeFile(join(staging, ROCK_MANIFEST), `${JSON.stringify(manifest, null, 2)}\n`)

        await rm(dir, { recursive: true, force: true })
        await mkdir(dirname(dir), { recursive: true })
        await rename(staging, dir)
      } finally {
        await rm(staging, { recursive: true, force: true })
      }
    })

    await mkdir(this.binDir, { recursive: true })
    for (const binary of installed.binaries) {
      const target = join(this.binDir, binary)
      await this.mutex.run(target, async () => {
        const owner = this.binOwners.get(binary)
        if (owner !== undefined && owner !== name) {
          logger.warn(`Binary ${binary} from ${owner} is replaced by ${name}`)
        }
        await copyFile(join(dir, 'bin', binary), target)
        await chmod(target, 0o755)
        this.binOwners.set(binary, name)
      })
    }

    logger.debug(`Promoted ${name}@${version} into ${dir}`)
    return { name, version, files: installed.files.map((file) => file.path), binaries: installed.binaries, dir }
  }

  /**
   * Remove a rock dir and the shared binaries it installed
   */
  async remove(name: PackageName, version: string): Promise<boolean> {
    const manifest = await this.manifest(name, version)
    if (!manifest) return false
    const dir = this.rockDir(name, version)

    await this.mutex.run(dir, () => rm(dir, { recursive: true, force: true }))
    for (const binary of manifest.binaries) {
      const target = join(this.binDir, binary)
      await this.mutex.run(target, () => rm(target, { force: true }))
      this.binOwners.delete(binary)
    }
    return true
  }

  /**
   * Every complete rock in the tree, sorted by name then version
   */
  async list(): Promise<InstalledRock[]> {
    const rocks: InstalledRock[] = []
    for (const version of await this.versionDirs()) {
      const manifest = await this.manifest(version.name, version.version)
      if (manifest) rocks.push({ ...manifest, dir: this.rockDir(manifest.name, manifest.version) })
    }
    return rocks
  }

  private async versionDirs(): Promise<Array<{ name: string; version: string }>> {
    const found: Array<{ name: string; version: string }> = []
    const walk = async (prefix: string[]): Promise<void> => {
      const dir = join(this.rocksDir, ...prefix)
      let entries: Dirent[]
      try {
        entries = await readdir(dir, { withFileTypes: true })
      } catch (error) {
        if (isMissingFile(error)) return
        throw error
      }
      for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
        if (!entry.isDirectory()) continue
        if (prefix.length > 0 && (await this.hasManifest([...prefix, entry.name]))) {
          found.push({ name: prefix.join('/'), version: entry.name })
        } else if (prefix.length < 2) {
          await walk([...prefix, entry.name])
        }
      }
    }
    await walk([])
    return found
  }

  private async hasManifest(parts: string[]): Promise<boolean> {
    try {
      await readFile(join(this.rocksDir, ...parts, ROCK_MANIFEST))
      return true
    } catch (error) {
      if (isMissingFile(error)) return false
      throw error
    }
  }
}
