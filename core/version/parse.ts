/**
 * Version parsing
 *
 * Modrevs are brought into semver shape before parsing: missing minor and
 * patch components become `.0`, and components past the third become a
 * pre-release (`1.0.0.10` parses as `1.0.0-10`).
 */

import semver from 'semver'
import type { SemVer } from 'semver'
import { ParseError } from '../errors/index.js'
import { DEV_MODREVS, type DevModrev } from './types.js'

export class Version {
  /** Module revision as written, e.g. `1.0` or `scm` */
  readonly modrev: string
  /** Rockspec revision; 1 when the text has none */
  readonly specrev: number
  /** Semver view of a release modrev; undefined for development versions */
  readonly semver: SemVer | undefined

  constructor(modrev: string, specrev: number, parsed: SemVer | undefined) {
    this.modrev = modrev
    this.specrev = specrev
    this.semver = parsed
  }

  get isDev(): boolean {
    return this.semver === undefined
  }

  toString(): string {
    return `${this.modrev}-${this.specrev}`
  }

  toJSON(): string {
    return this.toString()
  }
}

export function isDevModrev(text: string): text is DevModrev {
  return DEV_MODREVS.some((m) => m === text)
}

/**
 * Parse `modrev[-specrev]`. Throws ParseError on malformed input.
 */
export function parseVersion(input: string): Version {
  const text = input.trim()
  if (text === '') {
    throw new ParseError('empty version', { offset: 0, input })
  }

  const { modrev, specrev } = splitSpecrev(text, input)

  if (isDevModrev(modrev)) {
    return new Version(modrev, specrev, undefined)
  }

  return new Version(modrev, specrev, parseModrev(modrev, input))
}

/**
 * Parse, returning undefined instead of throwing
 */
export function tryParseVersion(input: string): Version | undefined {
  try {
    return parseVersion(input)
  } catch {
    return undefined
  }
}

export function splitSpecrev(text: string, input: string = text): { modrev: string; specrev: number } {
  const dash = text.lastIndexOf('-')
  if (dash === -1) {
    return { modrev: text, specrev: 1 }
  }

  const specrevText = text.slice(dash + 1)
  if (specrevText === '' || !/^\d+$/.test(specrevText)) {
    throw new ParseError(`specrev "${specrevText}" must be numeric`, { offset: dash + 1, input })
  }
  if (dash === 0) {
    throw new ParseError('missing modrev', { offset: 0, input })
  }

  return { modrev: text.slice(0, dash), specrev: Number(specrevText) }
}

export function parseModrev(modrev: string, input: string = modrev): SemVer {
  const parsed = semver.parse(correctModrev(modrev))
  if (!parsed) {
    throw new ParseError(`invalid modrev "${modrev}"`, { offset: 0, input })
  }
  return parsed
}

/**
 * `1` -> `1.0.0`, `1.2.3.4` -> `1.2.3-4`
 */
export function correctModrev(modrev: string): string {
  let text = modrev
  while ((text.match(/\./g) ?? []).length < 2) {
    text = `${text}.0`
  }
  const parts = text.split('.')
  if (parts.length > 3) {
    return `${parts[0]}.${parts[1]}.${parts[2]}-${parts.slice(3).join('.')}`
  }
  return text
}
