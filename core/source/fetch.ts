/**
 * Source fetching
 *
 * Materializes a descriptor's source into a fresh scratch directory:
 * downloads and unpacks archives, clones git refs, or copies local paths,
 * then applies the rockspec's patches. The returned digest is taken
 * before patching.
 *
 * @module core/source/fetch
 */

import { cp, mkdir, mkdtemp, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import { basename, dirname, isAbsolute, join, resolve } from 'node:path'
import { AbortedError, IntegrityViolationError, SourceError } from '../errors/index.js'
import { algorithmOf, calculateIntegrity, hashDirectory, integrityEquals, verifyIntegrity } from '../integrity/index.js'
import type { Integrity } from '../integrity/index.js'
import { logger } from '../logger.js'
import { runChecked, type CommandRunner } from '../process/index.js'
import type { GitSource, PackageDescriptor, SourceSpec } from '../rockspec/index.js'
import { extractArchive } from './archive.js'

export interface DownloadOptions {
  /** Download timeout in milliseconds. @default 30000 */
  timeout?: number
  signal?: AbortSignal
  fetch?: typeof fetch
}

export interface FetchSourceOptions extends DownloadOptions {
  /** Parent directory for the per-source scratch directory */
  scratchRoot: string
  /** Downloaded archives are kept here by name and version, with their digest */
  cacheDir?: string
  runner: CommandRunner
  /** Base for relative `file` sources */
  baseDir?: string
}

export interface FetchedSource {
  /** Root of the rock's sources (after `source.dir` and single-directory detection) */
  dir: string
  /** Scratch directory holding everything fetched; the caller removes it */
  workDir: string
  /** Digest of the archive bytes, or of the tree for git and directory sources */
  integrity: Integrity
}

export async function fetchSource(descriptor: PackageDescriptor, options: FetchSourceOptions): Promise<FetchedSource> {
  const id = `${descriptor.name}@${descriptor.version.toString()}`
  const source = descriptor.source
  await mkdir(options.scratchRoot, { recursive: true })
  const workDir = await mkdtemp(join(options.scratchRoot, 'source-'))
  const unpackDir = join(workDir, 'unpacked')
  await mkdir(unpackDir)

  logger.debug(`Fetching source of ${id} (${source.kind})`)

  try {
    let integrity: Integrity
    switch (source.kind) {
      case 'url':
        if (isRemote(source.url)) {
          const bytes = await downloadCached(descriptor, source.url, options)
          integrity = await unpackBytes(bytes, fileNameOf(source.url), unpackDir, source, options)
        } else {
          integrity = await fetchLocal(source.url, unpackDir, source, options)
        }
        break
      case 'file':
        integrity = await fetchLocal(source.path, unpackDir, source, options)
        break
      case 'git':
        integrity = await cloneGit(source, unpackDir, options)
        break
    }

    if (source.integrity !== undefined && !integrityEquals(source.integrity, integrity)) {
      throw new IntegrityViolationError(descriptor.name, 'source', source.integrity, integrity)
    }

    const dir = await sourceRoot(unpackDir, source)
    await applyPatches(descriptor, dir, workDir, options)
    return { dir, workDir, integrity }
  } catch (error) {
    await rm(workDir, { recursive: true, force: true })
    throw error
  }
}

// =============================================================================
// Kinds
// =============================================================================

function isRemote(url: string): boolean {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(url)
}

function fileNameOf(url: string): string {
  const path = url.split(/[?#]/)[0]
  return path.slice(path.lastIndexOf('/') + 1)
}

/**
 * GET over http(s) into memory
 */
export async function download(url: string, options: DownloadOptions = {}): Promise<Uint8Array> {
  if (!/^https?:\/\//i.test(url)) {
    throw new SourceError(`unsupported source URL scheme: ${url}`)
  }
  const controller = new AbortController()
  const timeout = options.timeout ?? 30000
  const timeoutId = setTimeout(() => controller.abort(), timeout)
  const onAbort = (): void => controller.abort()
  options.signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const response = await (options.fetch ?? globalThis.fetch)(url, { signal: controller.signal })
    if (!response.ok) {
      throw new SourceError(`GET ${url} failed with status ${response.status}`)
    }
    return new Uint8Array(await response.arrayBuffer())
  } catch (error) {
    if (options.signal?.aborted) {
      throw new AbortedError()
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw new SourceError(`download of ${url} timed out after ${timeout}ms`)
    }
    if (error instanceof SourceError) throw error
    throw new SourceError(`download of ${url} failed: ${error instanceof Error ? error.message : String(error)}`)
  } finally {
    clearTimeout(timeoutId)
    options.signal?.removeEventListener('abort', onAbort)
  }
}

/**
 * Archive bytes from the cache when present, else downloaded and cached.
 * Cached bytes that no longer match their `.sri` sibling fail the fetch.
 */
async function downloadCached(descriptor: PackageDescriptor, url: string, options: FetchSourceOptions): Promise<Uint8Array> {
  if (options.cacheDir === undefined) {
    return download(url, options)
  }
  const path = join(options.cacheDir, descriptor.name, descriptor.version.toString(), fileNameOf(url))
  const cached = await Promise.all([readFile(path), readFile(`${path}.sri`, 'utf8')]).catch(missOn)
  if (cached !== undefined) {
    const [bytes, sri] = cached
    const expected = sri.trim()
    if (!verifyIntegrity(bytes, expected)) {
      throw new IntegrityViolationError(descriptor.name, 'source', expected, calculateIntegrity(bytes, algorithmOf(expected)))
    }
    logger.debug(`Source cache hit: ${path}`)
    return new Uint8Array(bytes)
  }

  const bytes = await download(url, options)
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, bytes)
    await writeFile(`${path}.sri`, calculateIntegrity(bytes))
  } catch (error) {
    logger.warn(`Could not cache ${url}: ${error instanceof Error ? error.message : String(error)}`)
  }
  return bytes
}

function missOn(error: unknown): undefined {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return undefined
  }
  throw error
}

async function unpackBytes(
  bytes: Uint8Array,
  fileName: string,
  unpackDir: string,
  source: SourceSpec,
  options: FetchSourceOptions
): Promise<Integrity> {
  const integrity = calculateIntegrity(bytes, algorithmOf(source.integrity))
  await extractArchive(bytes, unpackDir, { fileName, runner: options.runner })
  return integrity
}

async function fetchLocal(
  path: string,
  unpackDir: string,
  source: SourceSpec,
  options: FetchSourceOptions
): Promise<Integrity> {
  const full = isAbsolute(path) ? path : resolve(options.baseDir ?? process.cwd(), path)
  const info = await stat(full).catch(() => undefined)
  if (!info) {
    throw new SourceError(`source path ${full} does not exist`, { path: full })
  }

  if (info.isDirectory()) {
    await cp(full, unpackDir, { recursive: true, filter: notGitDir })
    return hashDirectory(unpackDir, algorithmOf(source.integrity))
  }
  return unpackBytes(await readFile(full), fileNameOf(full), unpackDir, source, options)
}

function isSha(ref: string): boolean {
  return /^[0-9a-f]{7,40}$/i.test(ref)
}

async function cloneGit(source: GitSource, unpackDir: string, options: FetchSourceOptions): Promise<Integrity> {
  const { runner, signal } = options
  const { url, ref } = source
  const git = (args: string[], cwd?: string) => runChecked(runner, 'git', args, { cwd, signal })

  if (ref && isSha(ref)) {
    // SHA: shallow clone default branch, then fetch the sha
    await git(['clone', '--depth', '1', url, unpackDir])
    await git(['fetch', '--depth', '1', 'origin', ref], unpackDir)
    await git(['checkout', ref], unpackDir)
  } else if (ref) {
    await git(['clone', '--depth', '1', '--branch', ref, url, unpackDir])
  } else {
    await git(['clone', '--depth', '1', url, unpackDir])
  }

  await cp(unpackDir, `${unpackDir}.tmp`, { recursive: true, filter: notGitDir })
  await replaceDir(`${unpackDir}.tmp`, unpackDir)
  logger.debug(`Cloned ${url}${ref ? `#${ref}` : ''}`)
  return hashDirectory(unpackDir, algorithmOf(source.integrity))
}

function notGitDir(src: string): boolean {
  return basename(src) !== '.git'
}

async function replaceDir(from: string, to: string): Promise<void> {
  await rm(to, { recursive: true, force: true })
  await rename(from, to)
}

// =============================================================================
// Layout and patches
// =============================================================================

/**
 * `source.dir` when given, else the single top-level directory an archive
 * usually wraps its contents in, else the unpack dir itself
 */
async function sourceRoot(unpackDir: string, source: SourceSpec): Promise<string> {
  if (source.dir !== undefined) {
    const dir = resolve(unpackDir, source.dir)
    const info = await stat(dir).catch(() => undefined)
    if (!info?.isDirectory()) {
      throw new SourceError(`source.dir "${source.dir}" not found in the unpacked source`, { path: dir })
    }
    return dir
  }

  const entries = await readdir(unpackDir, { withFileTypes: true })
  if (entries.length === 1 && entries[0].isDirectory()) {
    return join(unpackDir, entries[0].name)
  }
  return unpackDir
}

async function applyPatches(
  descriptor: PackageDescriptor,
  dir: string,
  workDir: string,
  options: FetchSourceOptions
): Promise<void> {
  if (descriptor.build.kind === 'unsupported') return
  const patches = Object.entries(descriptor.build.patches).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  if (patches.length === 0) return

  const patchDir = join(workDir, 'patches')
  await mkdir(patchDir, { recursive: true })
  for (const [name, diff] of patches) {
    const file = join(patchDir, name.replace(/[\\/]/g, '_'))
    await writeFile(file, diff)
    logger.debug(`Applying patch ${name} to ${descriptor.name}`)
    await runChecked(options.runner, 'patch', ['-p1', '-i', file], { cwd: dir, signal: options.signal })
  }
}
