/**
 * Lockfile types
 */

import type { Integrity } from '../integrity/index.js'
import type { PackageName } from '../rockspec/index.js'

export const LOCKFILE_NAME = 'rockyard.lock'
export const LOCKFILE_VERSION = '1.0.0'

export interface LockHashes {
  /** Digest of the rockspec text */
  rockspec?: Integrity
  /** Digest of the source archive, or of the tree for git and directory sources */
  source?: Integrity
}

export interface LockEntry {
  version: string
  /** Pinned entries keep their version through `lock update` */
  pinned: boolean
  /** Every constraint on the name, as resolved */
  constraint: string
  /** Where the source came from (URL, `git+URL#ref`, or path) */
  source: string
  hashes: LockHashes
  /** Dependency name -> locked version */
  dependencies: Record<PackageName, string>
  /** Commands installed into the shared bin dir */
  binaries: string[]
}

export interface LockData {
  version: string
  /** Root name -> requested constraint */
  entrypoints: Record<PackageName, string>
  rocks: Record<PackageName, LockEntry>
}

export type LoadResult = { status: 'absent' } | { status: 'loaded'; data: LockData }

export interface LockDiff {
  added: Array<{ name: PackageName; version: string }>
  removed: Array<{ name: PackageName; version: string }>
  changed: Array<{ name: PackageName; from: string; to: string }>
}

/**
 * What an install learned about one rock
 */
export interface LockRecord {
  hashes: LockHashes
  binaries: string[]
}

export interface SyncPlan {
  /** Root names whose request is new or changed */
  toAdd: PackageName[]
  /** Entrypoints no longer requested */
  toRemove: PackageName[]
}

export interface LockValidation {
  valid: boolean
  errors: string[]
  warnings: string[]
}
