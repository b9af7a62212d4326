/**
 * Install orchestrator
 *
 * Walks a resolved graph leaves first. A node enters the worker pool once
 * every dependency is installed; independent subtrees build concurrently
 * up to `config.jobs`. Per node:
 *
 *   pending -> resolving-sources -> building -> installed | failed
 *
 * A failed node fails all of its dependents without building them. The
 * lockfile is written once, after every node is terminal, and only when
 * none failed.
 *
 * @module core/install/orchestrator
 */

import { mkdir, rm } from 'node:fs/promises'
import { join } from 'node:path'
import PQueue from 'p-queue'
import {
  dispatchBuild,
  interpreterRuntime,
  LuaInstallation,
  needsLuaHeaders,
  probeExternalDependencies,
  type LuaRuntime,
} from '../build/index.js'
import {
  AbortedError,
  BuildDependencyError,
  DependencyFailedError,
  isRockError,
  ValidationError,
  wrapError,
} from '../errors/index.js'
import { calculateIntegrity } from '../integrity/index.js'
import { diff, fromGraph, save, verifyEntry, type LockEntry, type LockRecord } from '../lockfile/index.js'
import { logger } from '../logger.js'
import { resolve, type ResolvedGraph, type ResolvedNode } from '../resolver/index.js'
import type { PackageName } from '../rockspec/index.js'
import { fetchSource } from '../source/index.js'
import { RockTree } from '../tree/index.js'
import type { InstallFailure, InstallOptions, InstallReport, NodeState } from './types.js'

/** Tree under `config.tree` that holds build dependencies */
export const BUILD_TREE = '.build'

type NodeOutcome = { kind: 'built'; record: LockRecord } | { kind: 'skipped' }

function isTerminal(state: NodeState | undefined): boolean {
  return state === 'installed' || state === 'failed'
}

export class InstallOrchestrator {
  readonly tree: RockTree
  private readonly options: InstallOptions
  private readonly queue: PQueue
  private readonly builds = new Map<string, Promise<NodeOutcome>>()
  private lua?: Promise<LuaRuntime>
  private buildDeps?: InstallOrchestrator

  constructor(options: InstallOptions) {
    this.options = options
    this.tree = options.tree ?? new RockTree(options.config.tree, options.config.luaVersion)
    this.queue = new PQueue({ concurrency: options.config.jobs })
  }

  async install(graph: ResolvedGraph): Promise<InstallReport> {
    const { signal } = this.options
    const states = new Map<PackageName, NodeState>()
    const waiting = new Map<PackageName, number>()
    const dependents = new Map<PackageName, PackageName[]>()
    const records = new Map<PackageName, LockRecord>()
    const failures: InstallFailure[] = []
    const built: PackageName[] = []
    const skipped: PackageName[] = []
    const tasks: Promise<void>[] = []
    // p-queue rejects an aborted task at once; the build itself may still be cleaning up
    const running: Promise<NodeOutcome>[] = []

    for (const node of graph.nodes.values()) {
      states.set(node.name, 'pending')
      waiting.set(node.name, node.dependencies.length)
      for (const dep of node.dependencies) {
        dependents.set(dep, [...(dependents.get(dep) ?? []), node.name])
      }
    }

    const setState = (name: PackageName, state: NodeState): void => {
      states.set(name, state)
      logger.debug(`${name}: ${state}`)
      this.options.onStateChange?.(name, state)
    }

    const fail = (node: ResolvedNode, error: unknown): void => {
      if (isTerminal(states.get(node.name))) return
      setState(node.name, 'failed')
      const wrapped = wrapError(error, 'EBUILD')
      failures.push({
        name: node.name,
        version: node.version.toString(),
        code: wrapped.code,
        message: wrapped.message,
        error,
      })
    }

    const propagate = (failed: ResolvedNode): void => {
      const queue = [...(dependents.get(failed.name) ?? [])]
      for (let i = 0; i < queue.length; i++) {
        const node = graph.nodes.get(queue[i])
        if (!node || isTerminal(states.get(node.name))) continue
        fail(node, new DependencyFailedError(node.name, failed.name))
        queue.push(...(dependents.get(node.name) ?? []))
      }
    }

    const admit = (node: ResolvedNode): void => {
      if (signal?.aborted) return
      const task = this.queue
        .add(
          () => {
            const build = this.build(node, setState)
            running.push(build)
            return build
          },
          { signal, throwOnTimeout: true }
        )
        .then(
          (outcome) => {
            setState(node.name, 'installed')
            if (outcome.kind === 'built') {
              records.set(node.name, outcome.record)
              built.push(node.name)
            } else {
              skipped.push(node.name)
            }
            for (const name of dependents.get(node.name) ?? []) {
              const left = (waiting.get(name) ?? 0) - 1
              waiting.set(name, left)
              const next = graph.nodes.get(name)
              if (left === 0 && next && states.get(name) === 'pending') admit(next)
            }
          },
          (error: unknown) => {
            const cause = signal?.aborted && !isRockError(error) ? new AbortedError(node.name) : error
            fail(node, cause)
            if (!(cause instanceof AbortedError)) propagate(node)
          }
        )
      tasks.push(task)
    }

    logger.info(`Installing ${graph.nodes.size} rocks into ${this.tree.root}`)
    for (const node of graph.nodes.values()) {
      if (node.dependencies.length === 0) admit(node)
    }
    for (let i = 0; i < tasks.length; i++) {
      await tasks[i]
    }
    await Promise.allSettled(running)

    for (const node of graph.nodes.values()) {
      if (!isTerminal(states.get(node.name))) {
        fail(node, new AbortedError(node.name))
      }
    }

    const report: InstallReport = { built, skipped, failures }
    if (failures.length > 0) {
      logger.warn(`${failures.length} of ${graph.nodes.size} rocks failed; lockfile left unchanged`)
      return report
    }

    const lock = fromGraph(graph, records, this.options.previous)
    if (this.options.lockfilePath !== undefined) {
      await save(this.options.lockfilePath, lock)
      logger.debug(`Wrote ${this.options.lockfilePath}`)
    }
    report.lock = lock
    report.diff = diff(this.options.previous, lock)
    logger.info(`Installed ${built.length} rocks (${skipped.length} up to date)`)
    return report
  }

  /**
   * One build per `name@version` for the lifetime of the orchestrator. A
   * failed build is forgotten so the next install tries again.
   */
  private build(node: ResolvedNode, setState: (name: PackageName, state: NodeState) => void): Promise<NodeOutcome> {
    const key = `${node.name}@${node.version.toString()}`
    const existing = this.builds.get(key)
    if (existing) return existing
    const promise = this.buildNode(node, setState).catch((error: unknown) => {
      this.builds.delete(key)
      throw error
    })
    this.builds.set(key, promise)
    return promise
  }

  private async buildNode(
    node: ResolvedNode,
    setState: (name: PackageName, state: NodeState) => void
  ): Promise<NodeOutcome> {
    const { config, runner, signal } = this.options
    const { name, descriptor } = node
    const version = node.version.toString()
    const rockspecHash = calculateIntegrity(descriptor.rockspec)
    const locked = this.lockedEntry(name, version)

    if (locked) {
      verifyEntry(name, locked, { rockspec: rockspecHash })
    }
    if ((locked || this.options.reuseInstalled) && !this.isForced(name) && (await this.tree.isInstalled(name, version))) {
      logger.debug(`${name}@${version} is up to date`)
      return { kind: 'skipped' }
    }

    setState(name, 'resolving-sources')
    const fetched = await fetchSource(descriptor, {
      scratchRoot: join(config.cacheDir, 'scratch'),
      cacheDir: join(config.cacheDir, 'sources'),
      runner,
      signal,
      fetch: this.options.fetch,
      timeout: config.timeout,
      baseDir: this.options.baseDir,
    })

    try {
      if (locked) {
        verifyEntry(name, locked, { source: fetched.integrity })
      }
      if (descriptor.buildDependencies.length > 0) {
        await this.installBuildDependencies(node)
      }

      setState(name, 'building')
      const externalDeps = await probeExternalDependencies(descriptor, {
        config,
        runner,
        env: this.options.env,
        signal,
      })
      const lua = needsLuaHeaders(descriptor.build) ? await this.luaRuntime() : interpreterRuntime(config)
      const scratchDir = join(fetched.workDir, 'build')
      await mkdir(scratchDir, { recursive: true })

      const installed = await dispatchBuild({
        descriptor,
        sourceDir: fetched.dir,
        scratchDir,
        lua,
        externalDeps,
        config,
        runner,
        signal,
      })

      if (signal?.aborted) {
        throw new AbortedError(name)
      }
      await this.tree.promote(name, version, installed)
      return {
        kind: 'built',
        record: { hashes: { rockspec: rockspecHash, source: fetched.integrity }, binaries: installed.binaries },
      }
    } finally {
      await rm(fetched.workDir, { recursive: true, force: true })
    }
  }

  /**
   * Build dependencies resolve into their own graph and install into the
   * build tree. They are not part of the lockfile.
   */
  private async installBuildDependencies(node: ResolvedNode): Promise<void> {
    const { client, config } = this.options
    const requests = node.descriptor.buildDependencies.map((dep) => ({ name: dep.name, constraint: dep.constraint }))
    if (!client) {
      throw new ValidationError(`${node.name} has build dependencies but no registry client was given`)
    }

    const graph = await resolve(client, requests, {
      luaVersion: config.luaVersion,
      platform: config.platform,
      maxReResolutions: config.maxReResolutions,
    })
    logger.debug(`Installing ${graph.nodes.size} build dependencies of ${node.name}`)

    this.buildDeps ??= new InstallOrchestrator({
      ...this.options,
      tree: new RockTree(join(config.tree, BUILD_TREE), config.luaVersion),
      lockfilePath: undefined,
      previous: undefined,
      force: false,
      reuseInstalled: true,
      onStateChange: undefined,
    })
    const report = await this.buildDeps.install(graph)
    const cause = report.failures.find((failure) => failure.code !== 'EDEPFAILED') ?? report.failures.at(0)
    if (cause?.code === 'EABORTED') {
      throw new AbortedError(node.name)
    }
    if (cause) {
      throw new BuildDependencyError(node.name, cause.name, cause.message)
    }
  }

  private lockedEntry(name: PackageName, version: string): LockEntry | undefined {
    const entry = this.options.previous?.rocks[name]
    return entry?.version === version ? entry : undefined
  }

  private isForced(name: PackageName): boolean {
    const { force } = this.options
    return force === true || (typeof force === 'object' && force.has(name))
  }

  /**
   * Lua headers are looked up once, on the first build that needs them
   */
  private luaRuntime(): Promise<LuaRuntime> {
    this.lua ??= LuaInstallation.detect(this.options.config, this.options.runner, {
      fetch: this.options.fetch,
      signal: this.options.signal,
    })
    return this.lua
  }
}
