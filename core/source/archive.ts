/**
 * Source archive extraction
 *
 * gzip, tar and zip are handled in-process; bzip2 and xz archives are
 * handed to the system `tar`.
 *
 * @module core/source/archive
 */

import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, isAbsolute, join, normalize, relative, resolve, sep } from 'node:path'
import { gunzipSync, inflateRawSync } from 'node:zlib'
import { SourceError } from '../errors/index.js'
import { logger } from '../logger.js'
import { runChecked, type CommandRunner } from '../process/index.js'
import { readTar, type TarEntry } from './tar.js'

export type ArchiveFormat = 'tar' | 'gzip' | 'zip' | 'tar.bz2' | 'tar.xz'

/**
 * Format from magic bytes
 */
export function detectFormat(bytes: Uint8Array): ArchiveFormat | undefined {
  if (bytes[0] === 0x1f && bytes[1] === 0x8b) {
    return 'gzip'
  }
  if (bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04) {
    return 'zip'
  }
  if (bytes[0] === 0x42 && bytes[1] === 0x5a && bytes[2] === 0x68) {
    return 'tar.bz2'
  }
  if (bytes[0] === 0xfd && bytes[1] === 0x37 && bytes[2] === 0x7a && bytes[3] === 0x58 && bytes[4] === 0x5a) {
    return 'tar.xz'
  }
  if (bytes.length >= 262 && String.fromCharCode(...bytes.subarray(257, 262)) === 'ustar') {
    return 'tar'
  }
  return undefined
}

export interface ExtractOptions {
  /** Archive file name, used to name single-file downloads */
  fileName?: string
  /** Needed for bzip2 and xz */
  runner?: CommandRunner
}

/**
 * Unpack `bytes` into `dest`. Entries that would land outside `dest`
 * fail the extraction.
 */
export async function extractArchive(bytes: Uint8Array, dest: string, options: ExtractOptions = {}): Promise<void> {
  const fileName = options.fileName ?? ''
  const format = detectFormat(bytes)
  logger.debug(`Extracting ${fileName || 'archive'} (${format ?? 'unknown'}) into ${dest}`)
  await mkdir(dest, { recursive: true })

  switch (format) {
    case 'tar':
      return writeEntries(readTar(bytes), dest)
    case 'gzip': {
      const inner = gunzipSync(bytes)
      if (detectFormat(inner) === 'tar') {
        return writeEntries(readTar(inner), dest)
      }
      const name = safeName(fileName.replace(/\.gz$/i, '')) || 'source'
      return writeEntries([{ path: name, type: 'file', mode: 0o644, linkname: '', data: inner }], dest)
    }
    case 'zip':
      return writeEntries(readZip(bytes), dest)
    case 'tar.bz2':
    case 'tar.xz':
      return extractWithSystemTar(bytes, dest, format, options.runner)
    case undefined:
      // A plain file (e.g. a single .lua module)
      if (fileName && !/\.(tar|tgz|zip|gz|bz2|xz)$/i.test(fileName)) {
        await writeFile(join(dest, safeName(fileName)), bytes)
        return
      }
      throw new SourceError(`unrecognised archive format for ${fileName || 'download'}`)
  }
}

async function extractWithSystemTar(
  bytes: Uint8Array,
  dest: string,
  format: 'tar.bz2' | 'tar.xz',
  runner: CommandRunner | undefined
): Promise<void> {
  if (!runner) {
    throw new SourceError(`${format} archives need the system tar`)
  }
  const scratch = await mkdtemp(join(tmpdir(), 'rockyard-archive-'))
  try {
    const file = join(scratch, `source.${format}`)
    await writeFile(file, bytes)
    await runChecked(runner, 'tar', [format === 'tar.bz2' ? '-xjf' : '-xJf', file, '-C', dest])
  } finally {
    await rm(scratch, { recursive: true, force: true })
  }
}

async function writeEntries(entries: TarEntry[], dest: string): Promise<void> {
  const root = resolve(dest)
  for (const entry of entries) {
    const target = safeJoin(root, entry.path)
    switch (entry.type) {
      case 'directory':
        await mkdir(target, { recursive: true })
        break
      case 'file':
        await mkdir(dirname(target), { recursive: true })
        await writeFile(target, entry.data, { mode: entry.mode & 0o777 || 0o644 })
        break
      case 'symlink': {
        const resolved = resolve(dirname(target), entry.linkname)
        if (isAbsolute(entry.linkname) || !isInside(root, resolved)) {
          logger.warn(`Skipping symlink ${entry.path} -> ${entry.linkname} pointing outside the source`)
          break
        }
        await mkdir(dirname(target), { recursive: true })
        await symlink(entry.linkname, target)
        break
      }
      case 'other':
        logger.debug(`Skipping special archive entry ${entry.path}`)
        break
    }
  }
}

function safeJoin(root: string, entryPath: string): string {
  const cleaned = entryPath.replace(/\\/g, '/')
  if (isAbsolute(cleaned) || /^[a-zA-Z]:/.test(cleaned)) {
    throw new SourceError(`archive entry "${entryPath}" has an absolute path`)
  }
  const target = resolve(root, normalize(cleaned))
  if (!isInside(root, target)) {
    throw new SourceError(`archive entry "${entryPath}" escapes the extraction directory`)
  }
  return target
}

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target)
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel))
}

function safeName(fileName: string): string {
  return fileName.split(/[\\/]/).pop() || 'source'
}

// =============================================================================
// Zip
// =============================================================================

const EOCD_SIGNATURE = 0x06054b50
const CENTRAL_SIGNATURE = 0x02014b50
const LOCAL_SIGNATURE = 0x04034b50

/**
 * Read a zip archive through its central directory. Stored and deflated
 * entries are supported.
 */
export function readZip(bytes: Uint8Array): TarEntry[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let eocd = -1
  for (let i = bytes.length - 22; i >= Math.max(0, bytes.length - 22 - 0xffff); i--) {
    if (view.getUint32(i, true) === EOCD_SIGNATURE) {
      eocd = i
      break
    }
  }
  if (eocd === -1) {
    throw new SourceError('zip archive has no central directory')
  }

  const count = view.getUint16(eocd + 10, true)
  let offset = view.getUint32(eocd + 16, true)
  const entries: TarEntry[] = []
  const decoder = new TextDecoder('utf-8')

  for (let n = 0; n < count; n++) {
    if (view.getUint32(offset, true) !== CENTRAL_SIGNATURE) {
      throw new SourceError(`corrupt zip central directory at byte ${offset}`)
    }
    const method = view.getUint16(offset + 10, true)
    const compressedSize = view.getUint32(offset + 20, true)
    const nameLength = view.getUint16(offset + 28, true)
    const extraLength = view.getUint16(offset + 30, true)
    const commentLength = view.getUint16(offset + 32, true)
    const externalAttributes = view.getUint32(offset + 38, true)
    const localOffset = view.getUint32(offset + 42, true)
    const name = decoder.decode(bytes.subarray(offset + 46, offset + 46 + nameLength))
    offset += 46 + nameLength + extraLength + commentLength

    if (view.getUint32(localOffset, true) !== LOCAL_SIGNATURE) {
      throw new SourceError(`corrupt zip entry "${name}"`)
    }
    const dataStart = localOffset + 30 + view.getUint16(localOffset + 26, true) + view.getUint16(localOffset + 28, true)
    const raw = bytes.subarray(dataStart, dataStart + compressedSize)
    const mode = (externalAttributes >>> 16) & 0o777

    if (name.endsWith('/')) {
      entries.push({ path: name, type: 'directory', mode: mode || 0o755, linkname: '', data: new Uint8Array(0) })
      continue
    }

    let data: Uint8Array
    if (method === 0) {
      data = raw
    } else if (method === 8) {
      data = inflateRawSync(raw)
    } else {
      throw new SourceError(`zip entry "${name}" uses unsupported compression method ${method}`)
    }
    entries.push({ path: name, type: 'file', mode: mode || 0o644, linkname: '', data })
  }

  return entries
}
