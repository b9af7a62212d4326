/**
 * Version Types
 *
 * Rock versions are `modrev-specrev`: the upstream module revision and the
 * rockspec revision. `dev`, `scm` and `git` modrevs mark development
 * versions built from a repository head.
 */

import type { Version } from './parse.js'

/**
 * Modrevs that identify development versions
 */
export type DevModrev = 'dev' | 'scm' | 'git'

export const DEV_MODREVS: readonly DevModrev[] = ['dev', 'scm', 'git']

/**
 * Comparator operators. `~=` is "not equal" as in Lua.
 * `~>` is expanded into a `>=`/`<` pair when parsed.
 */
export type ComparatorOperator = '==' | '~=' | '>=' | '<=' | '>' | '<'

/**
 * Comparison result: -1 (less), 0 (equal), 1 (greater)
 */
export type CompareResult = -1 | 0 | 1

/**
 * A single comparator (operator + version)
 */
export interface Comparator {
  operator: ComparatorOperator
  version: Version
  /** Whether the constraint text named a specrev. If not, only modrevs are compared. */
  hasSpecrev: boolean
}

/**
 * Matches every release version
 */
export interface AnyConstraint {
  kind: 'any'
  raw: string
}

/**
 * Conjunction of comparators over release versions
 */
export interface RangeConstraint {
  kind: 'range'
  comparators: Comparator[]
  raw: string
}

/**
 * Matches one development modrev
 */
export interface DevConstraint {
  kind: 'dev'
  modrev: DevModrev
  raw: string
}

export type Constraint = AnyConstraint | RangeConstraint | DevConstraint

export interface BestMatchOptions {
  /** Let development versions match constraints that do not name one */
  includeDev?: boolean
}
