/**
 * Dependency Resolver
 *
 * Worklist resolution to a single version per name:
 * - Constraints accumulate per name from every requester
 * - Newest satisfying version wins, locked versions first
 * - A choice excluded by a later constraint is re-resolved, up to a cap
 * - Lua runtime and platform restrictions filter candidates
 * - Unreachable names are pruned and cycles rejected at the end
 */

import type { ManifestClient } from '../backend.js'
import type { ConstraintOrigin } from '../errors/index.js'
import { ConstraintConflictError, ResolutionDidNotConvergeError } from '../errors/index.js'
import { logger } from '../logger.js'
import { supportsPlatform } from '../rockspec/index.js'
import type { PackageDescriptor, PackageName } from '../rockspec/index.js'
import { bestMatch, eq, formatConstraint, intersect, parseVersion, satisfies } from '../version/index.js'
import type { Constraint, ConstraintSet, Version } from '../version/index.js'
import { assertAcyclic, reachableFrom } from './graph.js'
import type {
  ResolutionRequest,
  ResolutionResult,
  ResolutionStats,
  ResolvedGraph,
  ResolvedNode,
  ResolveOptions,
} from './types.js'

export const ROOT_REQUESTER = 'root'

const DEFAULT_MAX_RE_RESOLUTIONS = 3

interface Edge {
  /** `name@version` of the requiring rock, or ROOT_REQUESTER */
  requester: string
  constraint: Constraint
}

interface Choice {
  version: Version
  descriptor: PackageDescriptor
}

interface ResolveContext {
  /** Current choice per name */
  choices: Map<PackageName, Choice>
  /** Constraints pointing at each name */
  incoming: Map<PackageName, Edge[]>
  /** Re-resolutions per name */
  attempts: Map<PackageName, number>
  roots: PackageName[]
  queue: PackageName[]
  queued: Set<PackageName>
  stats: ResolutionStats
}

function constraintText(constraint: Constraint): string {
  return constraint.raw || formatConstraint(constraint)
}

export class Resolver {
  private client: ManifestClient
  private options: ResolveOptions
  private runtime: Version

  constructor(client: ManifestClient, options: ResolveOptions) {
    this.client = client
    this.options = options
    this.runtime = parseVersion(options.luaVersion)
  }

  async resolve(roots: readonly ResolutionRequest[]): Promise<ResolutionResult> {
    const ctx: ResolveContext = {
      choices: new Map(),
      incoming: new Map(),
      attempts: new Map(),
      roots: roots.map((r) => r.name),
      queue: [],
      queued: new Set(),
      stats: { steps: 0, reResolutions: 0, lockedReused: 0 },
    }

    // Every root constraint is known before the first choice is made
    for (const root of roots) {
      this.addEdge(ctx, root.name, { requester: ROOT_REQUESTER, constraint: root.constraint })
    }
    for (const root of roots) {
      this.enqueue(ctx, root.name)
    }

    let name = ctx.queue.shift()
    while (name !== undefined) {
      ctx.queued.delete(name)
      ctx.stats.steps++
      await this.step(ctx, name)
      name = ctx.queue.shift()
    }

    const graph = this.buildGraph(ctx, roots)
    logger.debug(
      `Resolved ${graph.nodes.size} rocks in ${ctx.stats.steps} steps (${ctx.stats.reResolutions} re-resolutions)`
    )
    return { graph, stats: ctx.stats }
  }

  // ===========================================================================
  // Worklist
  // ===========================================================================

  private async step(ctx: ResolveContext, name: PackageName): Promise<void> {
    const edges = ctx.incoming.get(name) ?? []
    if (edges.length === 0) return

    const constraints = intersect(edges.map((e) => e.constraint))
    const current = ctx.choices.get(name)
    if (current && constraints.satisfies(current.version)) return

    const chosen = await this.choose(ctx, name, constraints, edges)

    if (current) {
      if (eq(current.version, chosen.version)) return
      const attempts = (ctx.attempts.get(name) ?? 0) + 1
      ctx.attempts.set(name, attempts)
      ctx.stats.reResolutions++
      if (attempts > (this.options.maxReResolutions ?? DEFAULT_MAX_RE_RESOLUTIONS)) {
        throw new ResolutionDidNotConvergeError(name, attempts)
      }
      logger.debug(`Re-resolving ${name}: ${current.version.toString()} -> ${chosen.version.toString()}`)
      this.withdraw(ctx, current.descriptor)
    }

    ctx.choices.set(name, chosen)
    const requester = `${name}@${chosen.version.toString()}`
    for (const dep of chosen.descriptor.dependencies) {
      this.addEdge(ctx, dep.name, { requester, constraint: dep.constraint })
      const existing = ctx.choices.get(dep.name)
      if (!existing || !satisfies(dep.constraint, existing.version)) {
        this.enqueue(ctx, dep.name)
      }
    }

    if (current) {
      this.prune(ctx)
    }
  }

  /**
   * Drop every choice the roots no longer reach, with the edges it
   * contributed. Targets of those edges are looked at again.
   */
  private prune(ctx: ResolveContext): void {
    const live = new Set(
      reachableFrom(ctx.roots, (n) => ctx.choices.get(n)?.descriptor.dependencies.map((d) => d.name) ?? [])
    )
    for (const [name, choice] of [...ctx.choices]) {
      if (live.has(name)) continue
      logger.debug(`Dropping ${name}@${choice.version.toString()}: no longer required`)
      ctx.choices.delete(name)
      for (const target of this.withdraw(ctx, choice.descriptor)) {
        if (live.has(target)) this.enqueue(ctx, target)
      }
    }
  }

  /**
   * Newest acceptable version, preferring the locked one
   */
  private async choose(
    ctx: ResolveContext,
    name: PackageName,
    constraints: ConstraintSet,
    edges: readonly Edge[]
  ): Promise<Choice> {
    const available = await this.client.listVersions(name)
    const candidates = this.rankCandidates(name, constraints, available)

    for (const version of candidates) {
      const descriptor = await this.client.fetchDescriptor(name, version)
      if (descriptor.luaConstraint && !satisfies(descriptor.luaConstraint, this.runtime)) {
        logger.debug(`Skipping ${name}@${version.toString()}: needs lua ${constraintText(descriptor.luaConstraint)}`)
        continue
      }
      if (!supportsPlatform(descriptor, this.options.platform ?? 'linux')) {
        logger.debug(`Skipping ${name}@${version.toString()}: unsupported platform`)
        continue
      }
      const locked = this.options.locked?.get(name)
      if (locked && eq(version, locked)) {
        ctx.stats.lockedReused++
      }
      return { version, descriptor }
    }

    const origins: ConstraintOrigin[] = edges.map((e) => ({
      constraint: constraintText(e.constraint),
      requiredBy: e.requester,
    }))
    throw new ConstraintConflictError(
      name,
      origins,
      available.map((v) => v.toString())
    )
  }

  /**
   * Satisfying versions, best first. A locked version still satisfying the
   * constraints leads unless the name is being upgraded.
   */
  private rankCandidates(name: PackageName, constraints: ConstraintSet, available: readonly Version[]): Version[] {
    const includeDev = this.options.includeDev === true
    const remaining = [...available]
    const ranked: Version[] = []
    let best = bestMatch(constraints, remaining, { includeDev })
    while (best) {
      const picked = best
      ranked.push(picked)
      remaining.splice(remaining.findIndex((v) => eq(v, picked)), 1)
      best = bestMatch(constraints, remaining, { includeDev })
    }

    const locked = this.options.locked?.get(name)
    const upgrade = this.options.upgrade
    const upgrading = upgrade === true || (upgrade?.has(name) ?? false)
    if (locked && !upgrading && constraints.satisfies(locked) && available.some((v) => eq(v, locked))) {
      return [locked, ...ranked.filter((v) => !eq(v, locked))]
    }
    return ranked
  }

  private addEdge(ctx: ResolveContext, target: PackageName, edge: Edge): void {
    const edges = ctx.incoming.get(target)
    if (edges) {
      edges.push(edge)
    } else {
      ctx.incoming.set(target, [edge])
    }
  }

  /**
   * Drop the edges a replaced choice contributed, returning their targets
   */
  private withdraw(ctx: ResolveContext, descriptor: PackageDescriptor): PackageName[] {
    const requester = `${descriptor.name}@${descriptor.version.toString()}`
    const targets: PackageName[] = []
    for (const dep of descriptor.dependencies) {
      targets.push(dep.name)
      const edges = ctx.incoming.get(dep.name)
      if (edges) {
        ctx.incoming.set(
          dep.name,
          edges.filter((e) => e.requester !== requester)
        )
      }
    }
    return targets
  }

  private enqueue(ctx: ResolveContext, name: PackageName): void {
    if (ctx.queued.has(name)) return
    ctx.queued.add(name)
    ctx.queue.push(name)
  }

  // ===========================================================================
  // Graph
  // ===========================================================================

  private buildGraph(ctx: ResolveContext, roots: readonly ResolutionRequest[]): ResolvedGraph {
    const dependenciesOf = (name: PackageName): PackageName[] => {
      const choice = ctx.choices.get(name)
      if (!choice) return []
      return [...new Set(choice.descriptor.dependencies.map((d) => d.name))]
    }

    const nodes = new Map<PackageName, ResolvedNode>()
    for (const name of reachableFrom(roots.map((r) => r.name), dependenciesOf)) {
      const choice = ctx.choices.get(name)
      if (!choice) continue
      const constraints: Record<PackageName, string> = {}
      for (const dep of choice.descriptor.dependencies) {
        const text = constraintText(dep.constraint)
        const previous = constraints[dep.name]
        constraints[dep.name] = previous ? `${previous}, ${text}` : text
      }
      nodes.set(name, {
        name,
        version: choice.version,
        descriptor: choice.descriptor,
        dependencies: dependenciesOf(name),
        constraints,
      })
    }

    assertAcyclic(nodes)
    return { nodes, roots: [...roots] }
  }
}

/**
 * Resolve root requests against a manifest client
 */
export async function resolve(
  client: ManifestClient,
  roots: readonly ResolutionRequest[],
  options: ResolveOptions
): Promise<ResolvedGraph> {
  const result = await new Resolver(client, options).resolve(roots)
  return result.graph
}
