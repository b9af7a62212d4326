/**
 * Dependency resolution
 *
 * @module core/resolver
 */

export type {
  ResolutionRequest,
  ResolvedNode,
  ResolvedGraph,
  ResolveOptions,
  ResolutionStats,
  ResolutionResult,
} from './types.js'

export { Resolver, resolve, ROOT_REQUESTER } from './resolver.js'
export { findCycle, assertAcyclic, topologicalOrder, dependentsOf, reachableFrom } from './graph.js'
