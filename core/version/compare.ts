/**
 * Version Comparison Functions
 *
 * Release versions order by modrev (semver precedence), then specrev.
 * Development versions sort below every release; two of them order by
 * specrev, then modrev text.
 */

import semver from 'semver'
import type { CompareResult } from './types.js'
import { Version, parseVersion } from './parse.js'

function sign(n: number): CompareResult {
  return n < 0 ? -1 : n > 0 ? 1 : 0
}

function toVersion(v: string | Version): Version {
  return v instanceof Version ? v : parseVersion(v)
}

/**
 * Compare modrevs only, ignoring specrev
 */
export function compareModrev(v1: string | Version, v2: string | Version): CompareResult {
  const a = toVersion(v1)
  const b = toVersion(v2)

  if (a.semver && b.semver) {
    return semver.compare(a.semver, b.semver)
  }
  if (a.semver) return 1
  if (b.semver) return -1
  return a.modrev < b.modrev ? -1 : a.modrev > b.modrev ? 1 : 0
}

/**
 * Compare two versions.
 * Returns:
 *  - -1 if v1 < v2
 *  -  0 if v1 == v2
 *  -  1 if v1 > v2
 */
export function compare(v1: string | Version, v2: string | Version): CompareResult {
  const a = toVersion(v1)
  const b = toVersion(v2)

  if (a.isDev && b.isDev) {
    const bySpecrev = sign(a.specrev - b.specrev)
    return bySpecrev !== 0 ? bySpecrev : compareModrev(a, b)
  }

  const byModrev = compareModrev(a, b)
  return byModrev !== 0 ? byModrev : sign(a.specrev - b.specrev)
}

export function rcompare(v1: string | Version, v2: string | Version): CompareResult {
  return compare(v2, v1)
}

export function eq(v1: string | Version, v2: string | Version): boolean {
  return compare(v1, v2) === 0
}

export function gt(v1: string | Version, v2: string | Version): boolean {
  return compare(v1, v2) === 1
}

export function lt(v1: string | Version, v2: string | Version): boolean {
  return compare(v1, v2) === -1
}

/**
 * Ascending sort. Returns a new array.
 */
export function sort<T extends string | Version>(versions: readonly T[]): T[] {
  return [...versions].sort((a, b) => compare(a, b))
}

/**
 * Descending sort. Returns a new array.
 */
export function rsort<T extends string | Version>(versions: readonly T[]): T[] {
  return [...versions].sort((a, b) => rcompare(a, b))
}
