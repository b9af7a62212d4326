/**
 * Graph queries over a ResolvedGraph
 */

import { CyclicDependencyError } from '../errors/index.js'
import type { PackageName } from '../rockspec/index.js'
import type { ResolvedGraph, ResolvedNode } from './types.js'

/**
 * First cycle found by DFS in node order, as a path that starts and ends
 * on the same name (`[a, b, a]`), or undefined
 */
export function findCycle(nodes: ReadonlyMap<PackageName, Pick<ResolvedNode, 'dependencies'>>): PackageName[] | undefined {
  const done = new Set<PackageName>()
  const stack: PackageName[] = []
  const onStack = new Set<PackageName>()

  const visit = (name: PackageName): PackageName[] | undefined => {
    stack.push(name)
    onStack.add(name)
    for (const dep of nodes.get(name)?.dependencies ?? []) {
      if (onStack.has(dep)) {
        return [...stack.slice(stack.indexOf(dep)), dep]
      }
      if (!done.has(dep) && nodes.has(dep)) {
        const cycle = visit(dep)
        if (cycle) return cycle
      }
    }
    stack.pop()
    onStack.delete(name)
    done.add(name)
    return undefined
  }

  for (const name of nodes.keys()) {
    if (!done.has(name)) {
      const cycle = visit(name)
      if (cycle) return cycle
    }
  }
  return undefined
}

export function assertAcyclic(nodes: ReadonlyMap<PackageName, Pick<ResolvedNode, 'dependencies'>>): void {
  const cycle = findCycle(nodes)
  if (cycle) {
    throw new CyclicDependencyError(cycle)
  }
}

/**
 * Dependencies before dependents. Ties keep graph order, so the result is
 * deterministic.
 */
export function topologicalOrder(graph: ResolvedGraph): PackageName[] {
  const order: PackageName[] = []
  const seen = new Set<PackageName>()
  const visit = (name: PackageName): void => {
    if (seen.has(name)) return
    seen.add(name)
    for (const dep of graph.nodes.get(name)?.dependencies ?? []) {
      visit(dep)
    }
    order.push(name)
  }
  for (const name of graph.nodes.keys()) {
    visit(name)
  }
  return order
}

/**
 * Every node that depends on `name`, directly or transitively
 */
export function dependentsOf(graph: ResolvedGraph, name: PackageName): Set<PackageName> {
  const reverse = new Map<PackageName, PackageName[]>()
  for (const node of graph.nodes.values()) {
    for (const dep of node.dependencies) {
      const list = reverse.get(dep) ?? []
      list.push(node.name)
      reverse.set(dep, list)
    }
  }

  const out = new Set<PackageName>()
  const queue = [...(reverse.get(name) ?? [])]
  while (queue.length > 0) {
    const next = queue.shift()
    if (next === undefined || out.has(next)) continue
    out.add(next)
    queue.push(...(reverse.get(next) ?? []))
  }
  return out
}

/**
 * Names reachable from `starts`, breadth-first
 */
export function reachableFrom(
  starts: Iterable<PackageName>,
  dependencies: (name: PackageName) => readonly PackageName[]
): PackageName[] {
  const order: PackageName[] = []
  const seen = new Set<PackageName>()
  const queue = [...starts]
  while (queue.length > 0) {
    const name = queue.shift()
    if (name === undefined || seen.has(name)) continue
    seen.add(name)
    order.push(name)
    queue.push(...dependencies(name))
  }
  return order
}
