/**
 * Resolver types
 */

import type { Platform } from '../config/index.js'
import type { PackageDescriptor, PackageName } from '../rockspec/index.js'
import type { Constraint, Version } from '../version/index.js'

/**
 * A root request: `name` must resolve to a version satisfying `constraint`
 */
export interface ResolutionRequest {
  name: PackageName
  constraint: Constraint
}

export interface ResolvedNode {
  name: PackageName
  version: Version
  descriptor: PackageDescriptor
  /** Dependency names, in rockspec order */
  dependencies: PackageName[]
  /** Dependency name -> constraint text of the edge */
  constraints: Record<PackageName, string>
}

/**
 * Single version per name; every edge resolves inside the graph and the
 * graph is acyclic
 */
export interface ResolvedGraph {
  /** Insertion order is breadth-first from the roots */
  nodes: ReadonlyMap<PackageName, ResolvedNode>
  roots: readonly ResolutionRequest[]
}

export interface ResolveOptions {
  /** Target Lua runtime, e.g. `5.4` */
  luaVersion: string

  /**
   * Platform for `supported_platforms` checks.
   * @default 'linux'
   */
  platform?: Platform

  /** Consider dev/scm versions even when no constraint names them */
  includeDev?: boolean

  /**
   * Times one name may change its chosen version.
   * @default 3
   */
  maxReResolutions?: number

  /** Versions from the current lockfile, preferred when still acceptable */
  locked?: ReadonlyMap<PackageName, Version>

  /** Names whose locked version is ignored; `true` ignores them all */
  upgrade?: ReadonlySet<PackageName> | true
}

export interface ResolutionStats {
  /** Names popped off the worklist */
  steps: number
  /** Choices replaced because a new constraint excluded them */
  reResolutions: number
  /** Choices taken from the lockfile */
  lockedReused: number
}

export interface ResolutionResult {
  graph: ResolvedGraph
  stats: ResolutionStats
}
