/**
 * rockyard core
 *
 * Main entry point for the library: version constraints, registry
 * clients, resolution, lockfiles, build backends, the install tree and
 * the operations the CLI runs.
 */

// Versions - modrev-specrev parsing and constraint matching
export * as version from './version/index.js'
export type { Constraint, Comparator, DevModrev } from './version/index.js'
export { Version, ConstraintSet, parseVersion, parseConstraint, satisfies } from './version/index.js'

// Rockspecs - descriptor parsing and package names
export * as rockspec from './rockspec/index.js'
export type { PackageDescriptor, PackageName, BuildSpec, SourceSpec } from './rockspec/index.js'

// Registry - manifest clients
export * as registry from './registry/index.js'
export type { ManifestClient, RegistryClientOptions, Manifest } from './registry/index.js'
export { RegistryClient, MemoryRegistry } from './registry/index.js'

// Resolver - dependency graph resolution
export * as resolver from './resolver/index.js'
export type {
  ResolutionRequest,
  ResolvedNode,
  ResolvedGraph,
  ResolveOptions,
  ResolutionStats,
} from './resolver/index.js'
export { Resolver } from './resolver/index.js'

// Lockfile - rockyard.lock
export * as lockfile from './lockfile/index.js'
export type { LockData, LockEntry, LockDiff } from './lockfile/index.js'

// Build - build backends and Lua detection
export * as build from './build/index.js'
export type { BuildContext, InstalledFiles, LuaRuntime } from './build/index.js'

// Sources - download, unpack, clone
export * as source from './source/index.js'

// Tree and installation
export { RockTree, type RockManifest, type InstalledRock } from './tree/index.js'
export { InstallOrchestrator } from './install/index.js'
export type { InstallOptions, InstallReport, InstallFailure, NodeState } from './install/index.js'

// Projects and operations
export * as project from './project/index.js'
export type { Project } from './project/index.js'
export * as operations from './operations/index.js'
export type { OperationContext, OperationResult } from './operations/index.js'

// Configuration, processes, logging
export { createConfig, loadConfig, defaultConfig, type Config, type Platform } from './config/index.js'
export { NodeCommandRunner, type CommandRunner, type CommandResult } from './process/index.js'
export { logger, setLogLevel, silenceLogger } from './logger.js'

// Integrity - content digests
export * as integrity from './integrity/index.js'

// Errors - structured error types
export * from './errors/index.js'

// Cache - bounded and single-flight caches
export { LRUCache, type CacheOptions, type CacheStats } from './cache/lru.js'
export { SingleFlightCache } from './cache/single-flight.js'
