/**
 * Package names and dependency strings
 *
 * Rock names are case-insensitive and optionally namespaced
 * (`namespace/name`). Namespaced rocks live under `manifests/<namespace>/`
 * on the server.
 *
 * @example
 * ```typescript
 * parsePackageName('LuaSocket')          // => { name: 'luasocket', full: 'luasocket' }
 * parsePackageName('neorg/neorg-core')   // => { namespace: 'neorg', name: 'neorg-core', ... }
 * parseDependency('luafilesystem >= 1.8, < 2')
 * ```
 */

import { ParseError } from '../errors/index.js'
import { parseConstraint } from '../version/index.js'
import type { Constraint } from '../version/index.js'

/**
 * Lower-cased rock name, `name` or `namespace/name`
 */
export type PackageName = string

export interface ParsedPackageName {
  namespace?: string
  name: string
  /** Normalized full name, the unique key in the index */
  full: PackageName
}

const NAME_PATTERN = /^[a-z0-9_.+-]+$/

export function parsePackageName(input: string): ParsedPackageName {
  const text = input.trim().toLowerCase()
  if (text === '') {
    throw new ParseError('empty package name', { offset: 0, input })
  }

  const slash = text.indexOf('/')
  if (slash !== -1 && text.indexOf('/', slash + 1) !== -1) {
    throw new ParseError('package name has more than one "/"', { offset: text.indexOf('/', slash + 1), input })
  }

  const namespace = slash === -1 ? undefined : text.slice(0, slash)
  const name = slash === -1 ? text : text.slice(slash + 1)

  if (namespace !== undefined) {
    checkSegment(namespace, 0, input)
  }
  checkSegment(name, slash + 1, input)

  return { namespace, name, full: namespace ? `${namespace}/${name}` : name }
}

function checkSegment(segment: string, start: number, input: string): void {
  if (segment === '') {
    throw new ParseError('empty name segment', { offset: start, input })
  }
  if (!NAME_PATTERN.test(segment)) {
    const bad = [...segment].findIndex((ch) => !NAME_PATTERN.test(ch))
    throw new ParseError(`invalid character "${segment[bad]}" in package name`, { offset: start + bad, input })
  }
}

export function normalizePackageName(input: string): PackageName {
  return parsePackageName(input).full
}

export function isValidPackageName(input: string): boolean {
  try {
    parsePackageName(input)
    return true
  } catch {
    return false
  }
}

// =============================================================================
// Dependency strings
// =============================================================================

export interface DependencySpec {
  name: PackageName
  constraint: Constraint
  /** Text as written in the rockspec */
  raw: string
}

/**
 * `"luafilesystem >= 1.8, < 2"` -> name + constraint.
 * Constraint offsets in errors are relative to the whole string.
 */
export function parseDependency(input: string): DependencySpec {
  const text = input.trim()
  const match = /^([^\s<>=~@,]+)\s*(.*)$/s.exec(text)
  if (!match) {
    throw new ParseError('expected a package name', { offset: 0, input })
  }

  const name = normalizePackageName(match[1])
  const rest = match[2]
  let constraint: Constraint
  try {
    constraint = parseConstraint(rest)
  } catch (error) {
    if (error instanceof ParseError) {
      const shift = text.length - rest.length
      throw new ParseError(error.reason, { offset: (error.offset ?? 0) + shift, input })
    }
    throw error
  }

  return { name, constraint, raw: text }
}
