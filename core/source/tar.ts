/**
 * Tar reading and writing
 *
 * Supports USTAR, PAX extended headers and GNU long names, which covers
 * the source archives rock authors publish.
 */

import { SourceError } from '../errors/index.js'

const TAR_BLOCK_SIZE = 512

const textDecoder = new TextDecoder('utf-8')
const textEncoder = new TextEncoder()

export type TarEntryType = 'file' | 'directory' | 'symlink' | 'other'

export interface TarEntry {
  path: string
  type: TarEntryType
  mode: number
  linkname: string
  data: Uint8Array
}

interface RawHeader {
  name: string
  mode: number
  size: number
  typeflag: string
  linkname: string
}

/**
 * Parse a whole tar archive into entries. PAX and GNU metadata records
 * are folded into the entry that follows them.
 */
export function readTar(archive: Uint8Array): TarEntry[] {
  const entries: TarEntry[] = []
  let offset = 0
  let pax: Record<string, string> = {}
  let longName: string | undefined
  let longLink: string | undefined

  while (offset + TAR_BLOCK_SIZE <= archive.length) {
    const block = archive.subarray(offset, offset + TAR_BLOCK_SIZE)
    if (block.every((byte) => byte === 0)) {
      break
    }

    const header = parseTarHeader(block, offset)
    const size = pax.size !== undefined ? parseInt(pax.size, 10) : header.size
    const dataStart = offset + TAR_BLOCK_SIZE
    if (dataStart + size > archive.length) {
      throw new SourceError(`tar entry "${header.name}" is truncated`)
    }
    const data = archive.subarray(dataStart, dataStart + size)
    offset = dataStart + Math.ceil(size / TAR_BLOCK_SIZE) * TAR_BLOCK_SIZE

    switch (header.typeflag) {
      case 'x':
        pax = { ...pax, ...parsePaxHeaders(data) }
        continue
      case 'g':
        continue
      case 'L':
        longName = parseString(data, 0, data.length)
        continue
      case 'K':
        longLink = parseString(data, 0, data.length)
        continue
    }

    entries.push({
      path: pax.path ?? longName ?? header.name,
      type: entryType(header.typeflag),
      mode: header.mode,
      linkname: pax.linkpath ?? longLink ?? header.linkname,
      data,
    })
    pax = {}
    longName = undefined
    longLink = undefined
  }

  return entries
}

function parseTarHeader(block: Uint8Array, offset: number): RawHeader {
  const checksum = parseOctal(block, 148, 8)
  if (!validateChecksum(block, checksum)) {
    throw new SourceError(`corrupt tar header at byte ${offset}`)
  }

  const name = parseString(block, 0, 100)
  const magic = parseString(block, 257, 6)
  const prefix = magic.startsWith('ustar') ? parseString(block, 345, 155) : ''

  return {
    name: prefix ? `${prefix}/${name}` : name,
    mode: parseOctal(block, 100, 8),
    size: parseOctal(block, 124, 12),
    typeflag: String.fromCharCode(block[156] || 0x30),
    linkname: parseString(block, 157, 100),
  }
}

function entryType(typeflag: string): TarEntryType {
  switch (typeflag) {
    case '0':
    case '7':
      return 'file'
    case '5':
      return 'directory'
    case '2':
      return 'symlink'
    default:
      return 'other'
  }
}

/**
 * Parse a null-terminated string from a buffer
 */
function parseString(buffer: Uint8Array, offset: number, length: number): string {
  const slice = buffer.subarray(offset, offset + length)
  const nullIndex = slice.indexOf(0)
  return textDecoder.decode(nullIndex === -1 ? slice : slice.subarray(0, nullIndex))
}

/**
 * Parse an octal number from a buffer
 */
function parseOctal(buffer: Uint8Array, offset: number, length: number): number {
  // Binary big-endian (GNU extension for large sizes)
  if (buffer[offset] === 0x80) {
    let value = 0n
    for (let i = 1; i < length; i++) {
      value = (value << 8n) | BigInt(buffer[offset + i])
    }
    return Number(value)
  }

  const str = parseString(buffer, offset, length).trim()
  return str ? parseInt(str, 8) || 0 : 0
}

/**
 * Validate tar header checksum
 */
function validateChecksum(header: Uint8Array, expected: number): boolean {
  return headerChecksum(header) === expected
}

function headerChecksum(header: Uint8Array): number {
  let sum = 0
  for (let i = 0; i < TAR_BLOCK_SIZE; i++) {
    // Checksum field counts as spaces
    sum += i >= 148 && i < 156 ? 32 : header[i]
  }
  return sum
}

/**
 * Parse PAX extended header content
 *
 * Format: "length key=value\n" for each entry
 */
export function parsePaxHeaders(content: Uint8Array): Record<string, string> {
  const text = textDecoder.decode(content)
  const headers: Record<string, string> = {}
  let offset = 0

  while (offset < text.length) {
    const spaceIndex = text.indexOf(' ', offset)
    if (spaceIndex === -1) break

    const length = parseInt(text.substring(offset, spaceIndex), 10)
    if (isNaN(length) || length <= 0) break

    const record = text.substring(spaceIndex + 1, offset + length - 1)
    const equalsIndex = record.indexOf('=')
    if (equalsIndex !== -1) {
      headers[record.substring(0, equalsIndex)] = record.substring(equalsIndex + 1)
    }
    offset += length
  }

  return headers
}

// =============================================================================
// Writing
// =============================================================================

export interface TarInput {
  path: string
  /** Omit for directories */
  data?: Uint8Array | string
  mode?: number
}

/**
 * Build a USTAR archive. Paths longer than 100 bytes are not supported.
 */
export function packTar(inputs: TarInput[]): Uint8Array {
  const blocks: Uint8Array[] = []
  for (const input of inputs) {
    const isDirectory = input.data === undefined
    const data = typeof input.data === 'string' ? textEncoder.encode(input.data) : input.data ?? new Uint8Array(0)
    blocks.push(createTarHeader(input.path, data.length, input.mode ?? (isDirectory ? 0o755 : 0o644), isDirectory))
    blocks.push(padToBlockSize(data))
  }
  blocks.push(new Uint8Array(TAR_BLOCK_SIZE * 2))

  const out = new Uint8Array(blocks.reduce((n, b) => n + b.length, 0))
  let offset = 0
  for (const block of blocks) {
    out.set(block, offset)
    offset += block.length
  }
  return out
}

function createTarHeader(name: string, size: number, mode: number, isDirectory: boolean): Uint8Array {
  const header = new Uint8Array(TAR_BLOCK_SIZE)
  writeString(header, 0, name, 100)
  writeOctal(header, 100, mode, 8)
  writeOctal(header, 108, 0, 8)
  writeOctal(header, 116, 0, 8)
  writeOctal(header, 124, size, 12)
  writeOctal(header, 136, 0, 12)
  header[156] = (isDirectory ? '5' : '0').charCodeAt(0)
  writeString(header, 257, 'ustar\0', 6)
  writeString(header, 263, '00', 2)

  writeOctal(header, 148, headerChecksum(header), 8)
  header[155] = 32
  return header
}

function writeString(header: Uint8Array, offset: number, str: string, length: number): void {
  const encoded = textEncoder.encode(str)
  header.set(encoded.subarray(0, Math.min(encoded.length, length)), offset)
}

function writeOctal(header: Uint8Array, offset: number, value: number, length: number): void {
  writeString(header, offset, value.toString(8).padStart(length - 1, '0'), length - 1)
  header[offset + length - 1] = 0
}

function padToBlockSize(data: Uint8Array): Uint8Array {
  const remainder = data.length % TAR_BLOCK_SIZE
  if (remainder === 0) return data
  const padded = new Uint8Array(data.length + (TAR_BLOCK_SIZE - remainder))
  padded.set(data)
  return padded
}
