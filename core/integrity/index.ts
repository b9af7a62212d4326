/**
 * Integrity digests
 *
 * Subresource Integrity (SRI) strings: `algorithm-base64digest`, e.g.
 * `sha256-47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU=`. Several digests
 * may be joined by spaces; a match on any of them counts.
 *
 * Source trees are hashed as a whole: every regular file, sorted by
 * relative path, contributes its path and its bytes.
 *
 * @module core/integrity
 */

import { createHash } from 'node:crypto'
import { readdir, readFile } from 'node:fs/promises'
import { join, relative, sep } from 'node:path'

export type HashAlgorithm = 'sha512' | 'sha256' | 'sha1'

/** SRI string */
export type Integrity = string

export interface ParsedIntegrity {
  algorithm: HashAlgorithm
  digest: string
}

export const DEFAULT_ALGORITHM: HashAlgorithm = 'sha256'

/**
 * SRI digest of `data`
 */
export function calculateIntegrity(data: Uint8Array | string, algorithm: HashAlgorithm = DEFAULT_ALGORITHM): Integrity {
  const digest = createHash(algorithm).update(data).digest('base64')
  return `${algorithm}-${digest}`
}

/**
 * Parse an SRI string into its digests. Unknown algorithms are skipped.
 */
export function parseIntegrity(hash: Integrity): ParsedIntegrity[] {
  const results: ParsedIntegrity[] = []
  for (const single of hash.trim().split(/\s+/)) {
    const match = /^(sha[0-9]+)-(.+)$/.exec(single)
    if (!match) continue

    const algorithm = match[1]
    if (isValidAlgorithm(algorithm)) {
      results.push({ algorithm, digest: match[2] })
    }
  }
  return results
}

export function isIntegrity(value: string): boolean {
  return parseIntegrity(value).length > 0
}

/**
 * True when `data` matches any digest in `hash`
 */
export function verifyIntegrity(data: Uint8Array | string, hash: Integrity): boolean {
  for (const { algorithm, digest } of parseIntegrity(hash)) {
    if (calculateIntegrity(data, algorithm) === `${algorithm}-${digest}`) {
      return true
    }
  }
  return false
}

/**
 * True when the two strings share at least one algorithm+digest pair
 */
export function integrityEquals(hash1: Integrity, hash2: Integrity): boolean {
  const parsed2 = parseIntegrity(hash2)
  return parseIntegrity(hash1).some((h1) =>
    parsed2.some((h2) => h1.algorithm === h2.algorithm && h1.digest === h2.digest)
  )
}

/**
 * Algorithm of the first digest in `hash`, falling back to the default
 */
export function algorithmOf(hash: Integrity | undefined): HashAlgorithm {
  return (hash && parseIntegrity(hash)[0]?.algorithm) || DEFAULT_ALGORITHM
}

function isValidAlgorithm(algorithm: string): algorithm is HashAlgorithm {
  return algorithm === 'sha512' || algorithm === 'sha256' || algorithm === 'sha1'
}

// =============================================================================
// Files and directories
// =============================================================================

export async function hashFile(path: string, algorithm: HashAlgorithm = DEFAULT_ALGORITHM): Promise<Integrity> {
  return calculateIntegrity(await readFile(path), algorithm)
}

/**
 * Digest of a directory tree. Paths are `/`-separated and sorted, so the
 * result does not depend on readdir order or the host separator.
 * Symlinks and other special files are ignored.
 */
export async function hashDirectory(dir: string, algorithm: HashAlgorithm = DEFAULT_ALGORITHM): Promise<Integrity> {
  const files = await listFiles(dir)
  const hash = createHash(algorithm)
  for (const file of files) {
    const rel = relative(dir, file).split(sep).join('/')
    hash.update(rel)
    hash.update('\0')
    hash.update(await readFile(file))
    hash.update('\0')
  }
  return `${algorithm}-${hash.digest('base64')}`
}

/**
 * Regular files under `dir`, absolute, sorted by relative path
 */
export async function listFiles(dir: string): Promise<string[]> {
  const out: string[] = []
  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true })
    for (const entry of entries) {
      const full = join(current, entry.name)
      if (entry.isDirectory()) {
        await walk(full)
      } else if (entry.isFile()) {
        out.push(full)
      }
    }
  }
  await walk(dir)
  return out.sort((a, b) => {
    const ra = relative(dir, a).split(sep).join('/')
    const rb = relative(dir, b).split(sep).join('/')
    return ra < rb ? -1 : ra > rb ? 1 : 0
  })
}
