/**
 * Install orchestration types
 */

import type { Config } from '../config/index.js'
import type { RockErrorCode } from '../errors/index.js'
import type { LockData, LockDiff } from '../lockfile/index.js'
import type { CommandRunner } from '../process/index.js'
import type { ManifestClient } from '../backend.js'
import type { PackageName } from '../rockspec/index.js'
import type { RockTree } from '../tree/index.js'

export type NodeState = 'pending' | 'resolving-sources' | 'building' | 'installed' | 'failed'

export interface InstallOptions {
  config: Config
  runner: CommandRunner
  /** @default new RockTree(config.tree, config.luaVersion) */
  tree?: RockTree
  /** Lockfile written on full success; nothing is written when omitted */
  lockfilePath?: string
  /** Lock data the graph was resolved against; its hashes are verified */
  previous?: LockData
  /** Resolves build dependencies; required when a rock declares any */
  client?: ManifestClient
  /** Skip rocks already in the tree even without a lock entry */
  reuseInstalled?: boolean
  /** Rebuild rocks already in the tree: all of them, or the named ones */
  force?: boolean | ReadonlySet<PackageName>
  signal?: AbortSignal
  fetch?: typeof fetch
  /** Environment for external dependency probing. @default process.env */
  env?: Record<string, string | undefined>
  /** Base for relative `file` sources. @default process.cwd() */
  baseDir?: string
  onStateChange?: (name: PackageName, state: NodeState) => void
}

export interface InstallFailure {
  name: PackageName
  version: string
  code: RockErrorCode
  message: string
  error: unknown
}

export interface InstallReport {
  /** Rocks built and promoted, in completion order */
  built: PackageName[]
  /** Rocks already in the tree with a matching lock entry */
  skipped: PackageName[]
  failures: InstallFailure[]
  /** Lock data that was written; absent unless every node installed */
  lock?: LockData
  diff?: LockDiff
}
