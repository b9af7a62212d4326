/**
 * Operations behind the CLI commands
 *
 * Each one resolves against the current lockfile, hands the graph to an
 * InstallOrchestrator and lets it write the lockfile on full success.
 * Resolution failures throw before anything on disk changes.
 *
 * @module core/operations
 */

import { join } from 'node:path'
import type { Config } from '../config/index.js'
import { ValidationError } from '../errors/index.js'
import { InstallOrchestrator, type InstallReport } from '../install/index.js'
import {
  LOCKFILE_NAME,
  load,
  lockedVersions,
  pinnedNames,
  save,
  setPinned,
  syncPlan,
  type LockData,
  type LockEntry,
} from '../lockfile/index.js'
import { logger } from '../logger.js'
import type { CommandRunner } from '../process/index.js'
import type { ManifestClient } from '../registry/index.js'
import {
  Resolver,
  type ResolutionRequest,
  type ResolutionStats,
  type ResolvedGraph,
} from '../resolver/index.js'
import { normalizePackageName, parseDependency, type PackageName } from '../rockspec/index.js'
import {
  checkLuaVersion,
  emptyProject,
  loadProject,
  projectRequests,
  saveProject,
  type Project,
} from '../project/index.js'
import type { RockTree } from '../tree/index.js'
import { parseConstraint } from '../version/index.js'

export interface OperationContext {
  config: Config
  client: ManifestClient
  runner: CommandRunner
  /** Directory holding rockyard.toml and rockyard.lock */
  projectDir: string
  tree?: RockTree
  signal?: AbortSignal
  fetch?: typeof fetch
  env?: Record<string, string | undefined>
}

export interface OperationResult {
  graph: ResolvedGraph
  stats: ResolutionStats
  report: InstallReport
}

/**
 * A command-line request with the constraint text as the user wrote it
 */
export interface PackageRequest extends ResolutionRequest {
  text: string
}

/**
 * `name`, `name@1.2`, or `name >= 1.0, < 2.0`
 */
export function parseRequest(spec: string): PackageRequest {
  const trimmed = spec.trim()
  const at = trimmed.indexOf('@')
  if (at > 0) {
    const text = trimmed.slice(at + 1).trim()
    return { name: normalizePackageName(trimmed.slice(0, at)), constraint: parseConstraint(text), text }
  }
  const dep = parseDependency(trimmed)
  const text = trimmed.replace(/^[^\s<>=~@,]+/, '').trim()
  return { name: dep.name, constraint: dep.constraint, text }
}

// =============================================================================
// Shared pipeline
// =============================================================================

interface RunOptions {
  /** Resolve an empty root set, which empties the lockfile */
  allowEmpty?: boolean
  includeDev?: boolean
  upgrade?: ReadonlySet<PackageName> | true
  force?: boolean | ReadonlySet<PackageName>
}

function lockfilePath(ctx: OperationContext): string {
  return join(ctx.projectDir, LOCKFILE_NAME)
}

async function loadLock(ctx: OperationContext): Promise<LockData | undefined> {
  const loaded = await load(lockfilePath(ctx))
  return loaded.status === 'loaded' ? loaded.data : undefined
}

/**
 * Requested names replace project entries of the same name
 */
function mergeRequests(base: readonly ResolutionRequest[], extra: readonly ResolutionRequest[]): ResolutionRequest[] {
  const names = new Set(extra.map((request) => request.name))
  return [...base.filter((request) => !names.has(request.name)), ...extra]
}

async function run(ctx: OperationContext, roots: ResolutionRequest[], options: RunOptions = {}): Promise<OperationResult> {
  const { config } = ctx
  if (roots.length === 0 && options.allowEmpty !== true) {
    throw new ValidationError('Nothing to install: no packages given and no dependencies in the project')
  }

  const previous = await loadLock(ctx)
  if (previous) {
    const plan = syncPlan(previous, roots)
    if (plan.toAdd.length > 0) logger.info(`New or changed requests: ${plan.toAdd.join(', ')}`)
    if (plan.toRemove.length > 0) logger.info(`No longer requested: ${plan.toRemove.join(', ')}`)
  }

  const resolver = new Resolver(ctx.client, {
    luaVersion: config.luaVersion,
    platform: config.platform,
    includeDev: options.includeDev,
    maxReResolutions: config.maxReResolutions,
    locked: previous ? lockedVersions(previous) : undefined,
    upgrade: options.upgrade,
  })
  const { graph, stats } = await resolver.resolve(roots)
  logger.info(`Resolved ${graph.nodes.size} rocks in ${stats.steps} steps`)

  const orchestrator = new InstallOrchestrator({
    config,
    client: ctx.client,
    runner: ctx.runner,
    tree: ctx.tree,
    lockfilePath: lockfilePath(ctx),
    previous,
    force: options.force,
    signal: ctx.signal,
    fetch: ctx.fetch,
    env: ctx.env,
    baseDir: ctx.projectDir,
  })
  const report = await orchestrator.install(graph)
  if (previous && report.lock) {
    await prune(orchestrator.tree, previous, report.lock)
  }
  return { graph, stats, report }
}

/**
 * Remove rocks the new lockfile dropped or moved to another version
 */
async function prune(tree: RockTree, before: LockData, after: LockData): Promise<void> {
  for (const [name, entry] of Object.entries(before.rocks)) {
    if (after.rocks[name]?.version === entry.version) continue
    if (await tree.remove(name, entry.version)) {
      logger.info(`Removed ${name}@${entry.version} from the tree`)
    }
  }
}

async function projectOf(ctx: OperationContext): Promise<Project> {
  const project = (await loadProject(ctx.projectDir)) ?? emptyProject(ctx.projectDir)
  checkLuaVersion(project, ctx.config.luaVersion)
  return project
}

// =============================================================================
// Operations
// =============================================================================

export interface InstallOperationOptions {
  /** Installed alongside the project's dependencies */
  packages?: string[]
  includeDev?: boolean
  force?: boolean | ReadonlySet<PackageName>
}

export async function install(ctx: OperationContext, options: InstallOperationOptions = {}): Promise<OperationResult> {
  const project = await projectOf(ctx)
  const requested = (options.packages ?? []).map(parseRequest)
  return run(ctx, mergeRequests(projectRequests(project), requested), {
    includeDev: options.includeDev,
    force: options.force,
  })
}

export interface AddResult extends OperationResult {
  project: Project
}

/**
 * Install packages and record them in rockyard.toml. A request without a
 * constraint is recorded as `>= <resolved version>`.
 */
export async function add(
  ctx: OperationContext,
  specs: string[],
  options: { includeDev?: boolean } = {}
): Promise<AddResult> {
  if (specs.length === 0) {
    throw new ValidationError('add needs at least one package')
  }
  const project = await projectOf(ctx)
  const requested = specs.map(parseRequest)
  const result = await run(ctx, mergeRequests(projectRequests(project), requested), options)
  if (result.report.failures.length > 0) {
    return { ...result, project }
  }

  const dependencies = { ...project.dependencies }
  for (const request of requested) {
    const node = result.graph.nodes.get(request.name)
    let text = request.text
    if (text === '' && node) {
      text = node.version.isDev ? `== ${node.version.modrev}` : `>= ${node.version.modrev}`
    }
    dependencies[request.name] = text
  }
  const updated: Project = { ...project, dependencies }
  await saveProject(updated)
  return { ...result, project: updated }
}

/**
 * Rebuild the project's rocks, or only the named ones. Without project
 * dependencies the named packages become the roots.
 */
export async function build(ctx: OperationContext, options: { packages?: string[] } = {}): Promise<OperationResult> {
  const project = await projectOf(ctx)
  const requested = (options.packages ?? []).map(parseRequest)
  const force: true | ReadonlySet<PackageName> =
    requested.length > 0 ? new Set(requested.map((request) => request.name)) : true
  const roots = projectRequests(project)
  return run(ctx, roots.length > 0 ? roots : requested, { force })
}

/**
 * Re-resolve ignoring locked versions, except for pinned rocks. With
 * `packages`, only those are unlocked.
 */
export async function update(ctx: OperationContext, options: { packages?: string[] } = {}): Promise<OperationResult> {
  const project = await projectOf(ctx)
  const previous = await loadLock(ctx)
  const pinned = previous ? pinnedNames(previous) : new Set<PackageName>()

  const requested = (options.packages ?? []).map(normalizePackageName)
  const candidates = requested.length > 0 ? requested : Object.keys(previous?.rocks ?? {})
  const upgrade = new Set<PackageName>()
  for (const name of candidates) {
    if (pinned.has(name)) {
      logger.warn(`${name} is pinned; keeping its locked version`)
    } else {
      upgrade.add(name)
    }
  }

  return run(ctx, projectRequests(project), { upgrade })
}

export interface RemoveResult extends OperationResult {
  project: Project
}

/**
 * Drop packages from rockyard.toml, re-resolve what is left and remove rocks
 * nothing needs any more
 */
export async function remove(ctx: OperationContext, names: string[]): Promise<RemoveResult> {
  if (names.length === 0) {
    throw new ValidationError('remove needs at least one package')
  }
  const project = await projectOf(ctx)
  const dependencies = { ...project.dependencies }
  const buildDependencies = { ...project.buildDependencies }
  for (const name of names.map(normalizePackageName)) {
    if (!(name in dependencies) && !(name in buildDependencies)) {
      throw new ValidationError(`${name} is not a dependency of the project`, { path: project.path })
    }
    delete dependencies[name]
    delete buildDependencies[name]
  }

  const updated: Project = { ...project, dependencies, buildDependencies }
  const result = await run(ctx, projectRequests(updated), { allowEmpty: true })
  if (result.report.failures.length > 0) {
    return { ...result, project }
  }
  await saveProject(updated)
  return { ...result, project: updated }
}

async function changePin(ctx: OperationContext, name: string, pinned: boolean): Promise<LockEntry> {
  const key = normalizePackageName(name)
  const previous = await loadLock(ctx)
  if (!previous) {
    throw new ValidationError(`No ${LOCKFILE_NAME} in ${ctx.projectDir}; run install first`)
  }
  const next = setPinned(previous, key, pinned)
  await save(lockfilePath(ctx), next)
  logger.info(`${pinned ? 'Pinned' : 'Unpinned'} ${key}@${next.rocks[key].version}`)
  return next.rocks[key]
}

export function pin(ctx: OperationContext, name: string): Promise<LockEntry> {
  return changePin(ctx, name, true)
}

export function unpin(ctx: OperationContext, name: string): Promise<LockEntry> {
  return changePin(ctx, name, false)
}
