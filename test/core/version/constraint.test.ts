/**
 * Constraint parsing, matching and best-match selection
 */

import { describe, it, expect } from 'vitest'
import {
  parseConstraint,
  tryParseConstraint,
  satisfies,
  bestMatch,
  intersect,
  formatConstraint,
  parseVersion,
  compare,
  ConstraintSet,
} from '../../../core/version/index.js'
import { ParseError } from '../../../core/errors/index.js'

const v = parseVersion
const versions = (...texts: string[]) => texts.map((t) => parseVersion(t))

function offsetOf(input: string): number | undefined {
  try {
    parseConstraint(input)
  } catch (error) {
    if (error instanceof ParseError) return error.offset
    throw error
  }
  return undefined
}

describe('parseConstraint', () => {
  it('treats empty text as any', () => {
    expect(parseConstraint('').kind).toBe('any')
    expect(parseConstraint('   ').kind).toBe('any')
  })

  it('reads a conjunctive comparator list', () => {
    const c = parseConstraint('>= 1.0, < 2.0')
    expect(formatConstraint(c)).toBe('>= 1.0, < 2.0')
  })

  it('accepts clauses without commas', () => {
    expect(formatConstraint(parseConstraint('>= 5.1 < 5.5'))).toBe('>= 5.1, < 5.5')
  })

  it('reads a bare or @ version as ==', () => {
    expect(formatConstraint(parseConstraint('1.2'))).toBe('== 1.2')
    expect(formatConstraint(parseConstraint('@1.2'))).toBe('== 1.2')
    expect(formatConstraint(parseConstraint('= 1.2'))).toBe('== 1.2')
  })

  it('expands ~> by the number of components given', () => {
    expect(formatConstraint(parseConstraint('~> 1'))).toBe('>= 1, < 2')
    expect(formatConstraint(parseConstraint('~> 1.2'))).toBe('>= 1.2, < 1.3')
    expect(formatConstraint(parseConstraint('~> 1.2.3'))).toBe('>= 1.2.3, < 1.2.4')
  })

  it('keeps a specrev written in the constraint', () => {
    expect(formatConstraint(parseConstraint('>= 1.0-2'))).toBe('>= 1.0-2')
  })

  it('decodes HTML entities', () => {
    expect(formatConstraint(parseConstraint('&gt;= 1.0, &lt; 2'))).toBe('>= 1.0, < 2')
  })

  it('parses development constraints', () => {
    expect(parseConstraint('scm')).toEqual({ kind: 'dev', modrev: 'scm', raw: 'scm' })
    expect(parseConstraint('== dev')).toEqual({ kind: 'dev', modrev: 'dev', raw: '== dev' })
  })

  it('reports the offset of malformed input', () => {
    expect(offsetOf('>= 1.0,')).toBe(7)
    expect(offsetOf('>= 1.0 !')).toBe(7)
    expect(offsetOf('>= ')).toBe(3)
    expect(offsetOf('>> 1')).toBe(1)
    expect(offsetOf('>= 1.0-x')).toBe(7)
  })

  it('rejects ordering operators on development versions', () => {
    expect(offsetOf('>= scm')).toBe(0)
    expect(offsetOf('>= 1.0, scm')).toBe(8)
  })

  it('never throws anything but ParseError', () => {
    const inputs = ['~>', '==', ',', '1..2', '>=1,,2', '\u0000', '~> scm', '1.0-', '@', 'a b c']
    for (const input of inputs) {
      try {
        parseConstraint(input)
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError)
      }
    }
    expect(tryParseConstraint('==')).toBeUndefined()
  })
})

describe('satisfies', () => {
  it('checks every comparator', () => {
    const c = parseConstraint('>= 1.0, < 2.0')
    expect(satisfies(c, v('1.0-1'))).toBe(true)
    expect(satisfies(c, v('1.9.9-1'))).toBe(true)
    expect(satisfies(c, v('2.0-1'))).toBe(false)
    expect(satisfies(c, v('0.9-1'))).toBe(false)
  })

  it('compares modrevs only when the constraint has no specrev', () => {
    expect(satisfies(parseConstraint('== 1.0'), v('1.0-3'))).toBe(true)
    expect(satisfies(parseConstraint('>= 1.0'), v('1.0-1'))).toBe(true)
    expect(satisfies(parseConstraint('>= 1.0-2'), v('1.0-1'))).toBe(false)
    expect(satisfies(parseConstraint('>= 1.0-2'), v('1.0-2'))).toBe(true)
  })

  it('supports ~= as not-equal', () => {
    const c = parseConstraint('~= 1.0')
    expect(satisfies(c, v('1.1-1'))).toBe(true)
    expect(satisfies(c, v('1.0-2'))).toBe(false)
  })

  it('matches development versions only against dev constraints or any', () => {
    expect(satisfies(parseConstraint('scm'), v('scm-1'))).toBe(true)
    expect(satisfies(parseConstraint('scm'), v('dev-1'))).toBe(false)
    expect(satisfies(parseConstraint('scm'), v('1.0-1'))).toBe(false)
    expect(satisfies(parseConstraint('>= 0'), v('scm-1'))).toBe(false)
    expect(satisfies(parseConstraint(''), v('scm-1'))).toBe(true)
  })
})

describe('bestMatch', () => {
  it('picks the highest satisfying version', () => {
    const c = parseConstraint('>= 1.0, < 2.0')
    const best = bestMatch(c, versions('1.0.0', '1.5.0', '2.0.0'))
    expect(best?.toString()).toBe('1.5.0-1')
  })

  it('breaks ties by specrev', () => {
    expect(bestMatch(parseConstraint('1.0'), versions('1.0-1', '1.0-3', '1.0-2'))?.toString()).toBe('1.0-3')
  })

  it('returns undefined when nothing matches', () => {
    expect(bestMatch(parseConstraint('> 3'), versions('1.0', '2.0'))).toBeUndefined()
  })

  it('excludes development versions unless asked', () => {
    const candidates = versions('scm-1', '1.0-1')
    expect(bestMatch(parseConstraint(''), candidates)?.toString()).toBe('1.0-1')
    expect(bestMatch(parseConstraint(''), versions('scm-1'))).toBeUndefined()
    expect(bestMatch(parseConstraint(''), versions('scm-1'), { includeDev: true })?.toString()).toBe('scm-1')
    expect(bestMatch(parseConstraint('scm'), candidates)?.toString()).toBe('scm-1')
  })

  it('returns a member that no larger member beats', () => {
    const pool = versions('0.9-1', '1.0-1', '1.0-2', '1.2.3-1', '1.3-1', '2.0-1', '2.1-1', 'scm-1')
    const constraints = ['', '>= 1.0', '< 1.3', '~> 1', '~> 1.2', '== 1.0', '~= 2.0', '> 2.1', 'scm']
    for (const text of constraints) {
      const c = parseConstraint(text)
      const best = bestMatch(c, pool)
      if (best === undefined) {
        expect(pool.filter((p) => (!p.isDev || c.kind === 'dev') && satisfies(c, p))).toEqual([])
        continue
      }
      expect(pool).toContain(best)
      expect(satisfies(c, best)).toBe(true)
      const larger = pool.filter((p) => compare(p, best) > 0 && satisfies(c, p) && (!p.isDev || c.kind === 'dev'))
      expect(larger).toEqual([])
    }
  })
})

describe('ConstraintSet', () => {
  it('intersects constraints from several requesters', () => {
    const set = intersect([parseConstraint('>= 1.0'), parseConstraint('< 1.3')])
    expect(set.satisfies(v('1.2-1'))).toBe(true)
    expect(set.satisfies(v('1.3-1'))).toBe(false)
    expect(bestMatch(set, versions('1.0', '1.2.3', '1.3'))?.toString()).toBe('1.2.3-1')
    expect(set.toString()).toBe('>= 1.0, < 1.3')
  })

  it('is any when empty', () => {
    const set = new ConstraintSet()
    expect(set.isAny).toBe(true)
    expect(set.with(parseConstraint('1.0')).isAny).toBe(false)
  })
})
