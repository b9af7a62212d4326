/**
 * Rock versions and constraints
 *
 * `modrev-specrev` parsing, ordering and LuaRocks constraint matching.
 */

// Types
export type {
  DevModrev,
  ComparatorOperator,
  CompareResult,
  Comparator,
  AnyConstraint,
  RangeConstraint,
  DevConstraint,
  Constraint,
  BestMatchOptions,
} from './types.js'
export { DEV_MODREVS } from './types.js'

// Parsing
export {
  Version,
  parseVersion,
  tryParseVersion,
  isDevModrev,
  correctModrev,
} from './parse.js'

// Comparison
export { compare, compareModrev, rcompare, eq, gt, lt, sort, rsort } from './compare.js'

// Constraints
export {
  ANY,
  ConstraintSet,
  parseConstraint,
  tryParseConstraint,
  satisfies,
  bestMatch,
  intersect,
  formatConstraint,
  formatComparator,
  decodeEntities,
} from './constraint.js'
