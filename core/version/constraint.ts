/**
 * Constraint parsing and matching
 *
 * Grammar: a comma (or whitespace) separated list of clauses, each an
 * optional operator followed by a version. A bare version or `@version`
 * means `==`. `~> x.y` expands to `>= x.y, < x.(y+1)`. Development
 * versions may only appear alone with `==`.
 */

import { ParseError } from '../errors/index.js'
import { compare, compareModrev } from './compare.js'
import { Version, isDevModrev, parseVersion } from './parse.js'
import type {
  AnyConstraint,
  BestMatchOptions,
  Comparator,
  Constraint,
  DevModrev,
} from './types.js'

// =============================================================================
// Parsing
// =============================================================================

const TWO_CHAR_OPS = ['==', '~=', '>=', '<=', '~>'] as const
const ONE_CHAR_OPS = ['>', '<', '=', '@'] as const

type RawOperator = (typeof TWO_CHAR_OPS)[number] | (typeof ONE_CHAR_OPS)[number] | ''

const VERSION_CHAR = /[A-Za-z0-9._+-]/
const SPACE = /\s/

export const ANY: AnyConstraint = Object.freeze({ kind: 'any', raw: '' })

const ENTITIES: Record<string, string> = {
  gt: '>',
  lt: '<',
  amp: '&',
  quot: '"',
  apos: "'",
  tilde: '~',
}

/**
 * Decode the HTML entities some manifests carry in constraint strings
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (match, body: string) => {
    if (body.startsWith('#x')) {
      return String.fromCodePoint(parseInt(body.slice(2), 16))
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(parseInt(body.slice(1), 10))
    }
    return ENTITIES[body.toLowerCase()] ?? match
  })
}

/**
 * Parse constraint text. Empty text is the `any` constraint.
 * Throws ParseError with the offset of the offending character.
 */
export function parseConstraint(input: string): Constraint {
  const text = decodeEntities(input)
  if (text.trim() === '') {
    return { kind: 'any', raw: input.trim() }
  }

  const comparators: Comparator[] = []
  let dev: { modrev: DevModrev; offset: number } | undefined
  let pos = 0

  const skipSpace = (): void => {
    while (pos < text.length && SPACE.test(text[pos])) pos++
  }

  while (true) {
    skipSpace()
    if (pos >= text.length) {
      throw new ParseError('expected version', { offset: pos, input })
    }

    const opOffset = pos
    const op = readOperator(text, pos)
    pos += op.length
    skipSpace()

    const start = pos
    while (pos < text.length && VERSION_CHAR.test(text[pos])) pos++
    const token = text.slice(start, pos)
    if (token === '') {
      const found = pos < text.length ? `"${text[pos]}"` : 'end of input'
      throw new ParseError(`expected version, found ${found}`, { offset: pos, input })
    }

    let version: Version
    try {
      version = parseVersion(token)
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(error.reason, { offset: start + (error.offset ?? 0), input })
      }
      throw error
    }

    if (version.isDev) {
      if (op !== '' && op !== '==' && op !== '=' && op !== '@') {
        throw new ParseError(`operator ${op} cannot be used with a development version`, {
          offset: opOffset,
          input,
        })
      }
      if (dev || comparators.length > 0) {
        throw new ParseError('a development version must be the only clause', { offset: opOffset, input })
      }
      if (isDevModrev(version.modrev)) {
        dev = { modrev: version.modrev, offset: opOffset }
      }
    } else {
      if (dev) {
        throw new ParseError('a development version must be the only clause', { offset: opOffset, input })
      }
      comparators.push(...toComparators(op, version, token))
    }

    skipSpace()
    if (pos >= text.length) break
    if (text[pos] === ',') {
      pos++
      continue
    }
    if (!isClauseStart(text[pos])) {
      throw new ParseError(`unexpected character "${text[pos]}"`, { offset: pos, input })
    }
  }

  const raw = input.trim()
  if (dev) {
    return { kind: 'dev', modrev: dev.modrev, raw }
  }
  return { kind: 'range', comparators, raw }
}

/**
 * Parse, returning undefined instead of throwing
 */
export function tryParseConstraint(input: string): Constraint | undefined {
  try {
    return parseConstraint(input)
  } catch {
    return undefined
  }
}

function readOperator(text: string, pos: number): RawOperator {
  const two = text.slice(pos, pos + 2)
  for (const op of TWO_CHAR_OPS) {
    if (two === op) return op
  }
  const one = text[pos]
  for (const op of ONE_CHAR_OPS) {
    if (one === op) return op
  }
  return ''
}

function isClauseStart(ch: string): boolean {
  return VERSION_CHAR.test(ch) || ch === '=' || ch === '~' || ch === '>' || ch === '<' || ch === '@'
}

function toComparators(op: RawOperator, version: Version, token: string): Comparator[] {
  const hasSpecrev = token.includes('-')
  switch (op) {
    case '':
    case '=':
    case '@':
    case '==':
      return [{ operator: '==', version, hasSpecrev }]
    case '~=':
    case '>=':
    case '<=':
    case '>':
    case '<':
      return [{ operator: op, version, hasSpecrev }]
    case '~>':
      return [
        { operator: '>=', version, hasSpecrev },
        { operator: '<', version: pessimisticUpperBound(version), hasSpecrev: false },
      ]
  }
}

/**
 * `~> 1` -> `2`, `~> 1.2` -> `1.3`, `~> 1.2.3` -> `1.2.4`
 */
function pessimisticUpperBound(version: Version): Version {
  const sv = version.semver
  if (!sv) {
    return version
  }
  const components = version.modrev.split('.').length
  if (components === 1) {
    return parseVersion(`${sv.major + 1}`)
  }
  if (components === 2) {
    return parseVersion(`${sv.major}.${sv.minor + 1}`)
  }
  return parseVersion(`${sv.major}.${sv.minor}.${sv.patch + 1}`)
}

// =============================================================================
// Matching
// =============================================================================

function testComparator(comparator: Comparator, version: Version): boolean {
  const order = comparator.hasSpecrev
    ? compare(version, comparator.version)
    : compareModrev(version, comparator.version)

  switch (comparator.operator) {
    case '==':
      return order === 0
    case '~=':
      return order !== 0
    case '>=':
      return order >= 0
    case '<=':
      return order <= 0
    case '>':
      return order > 0
    case '<':
      return order < 0
  }
}

/**
 * Whether a version satisfies a constraint. Development versions only
 * match `any` and the dev constraint naming their modrev.
 */
export function satisfies(constraint: Constraint | ConstraintSet, version: Version): boolean {
  if (constraint instanceof ConstraintSet) {
    return constraint.satisfies(version)
  }
  switch (constraint.kind) {
    case 'any':
      return true
    case 'dev':
      return version.isDev && version.modrev === constraint.modrev
    case 'range':
      return !version.isDev && constraint.comparators.every((c) => testComparator(c, version))
  }
}

/**
 * Highest candidate satisfying the constraint (ties broken by specrev),
 * or undefined. Development versions are skipped unless the constraint
 * names one or `includeDev` is set.
 */
export function bestMatch(
  constraint: Constraint | ConstraintSet,
  candidates: Iterable<Version>,
  options: BestMatchOptions = {}
): Version | undefined {
  const allowDev = options.includeDev === true || namesDev(constraint)
  let best: Version | undefined
  for (const candidate of candidates) {
    if (candidate.isDev && !allowDev) continue
    if (!satisfies(constraint, candidate)) continue
    if (!best || compare(candidate, best) > 0) {
      best = candidate
    }
  }
  return best
}

function namesDev(constraint: Constraint | ConstraintSet): boolean {
  return constraint instanceof ConstraintSet ? constraint.namesDev : constraint.kind === 'dev'
}

// =============================================================================
// Formatting
// =============================================================================

export function formatComparator(comparator: Comparator): string {
  const v = comparator.version
  return `${comparator.operator} ${comparator.hasSpecrev ? v.toString() : v.modrev}`
}

/**
 * Canonical text of a constraint (`~>` appears expanded)
 */
export function formatConstraint(constraint: Constraint): string {
  switch (constraint.kind) {
    case 'any':
      return ''
    case 'dev':
      return `== ${constraint.modrev}`
    case 'range':
      return constraint.comparators.map(formatComparator).join(', ')
  }
}

// =============================================================================
// ConstraintSet
// =============================================================================

/**
 * Conjunction of constraints accumulated against one package name
 */
export class ConstraintSet {
  readonly constraints: readonly Constraint[]

  constructor(constraints: readonly Constraint[] = []) {
    this.constraints = constraints
  }

  static parse(text: string): ConstraintSet {
    return new ConstraintSet([parseConstraint(text)])
  }

  get namesDev(): boolean {
    return this.constraints.some((c) => c.kind === 'dev')
  }

  get isAny(): boolean {
    return this.constraints.every((c) => c.kind === 'any')
  }

  satisfies(version: Version): boolean {
    return this.constraints.every((c) => satisfies(c, version))
  }

  with(constraint: Constraint): ConstraintSet {
    return new ConstraintSet([...this.constraints, constraint])
  }

  toString(): string {
    return this.constraints
      .filter((c) => c.kind !== 'any')
      .map((c) => c.raw || formatConstraint(c))
      .join(', ')
  }
}

export function intersect(constraints: Iterable<Constraint>): ConstraintSet {
  return new ConstraintSet([...constraints])
}
