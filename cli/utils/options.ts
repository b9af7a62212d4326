/**
 * Narrowing of cac-parsed option values into config overrides
 */

import type { Config } from '../../core/config/index.js'
import { ValidationError } from '../../core/errors/index.js'
import type { ParsedOptions } from '../types.js'

/**
 * mri turns numeric-looking values into numbers (`--lua 5.3`), so both
 * are accepted
 */
export function stringOption(options: ParsedOptions, key: string): string | undefined {
  const value = options[key]
  if (value === undefined) return undefined
  if (typeof value === 'string' || typeof value === 'number') return String(value)
  throw new ValidationError(`--${key} needs a value`)
}

export function integerOption(options: ParsedOptions, key: string): number | undefined {
  const value = options[key]
  if (value === undefined) return undefined
  const number = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN
  if (!Number.isInteger(number)) {
    throw new ValidationError(`--${key} must be an integer`)
  }
  return number
}

export function booleanOption(options: ParsedOptions, key: string): boolean {
  return options[key] === true
}

/**
 * Config fields set by global flags
 */
export function configOverrides(options: ParsedOptions): Partial<Config> {
  const server = stringOption(options, 'server')
  return {
    luaVersion: stringOption(options, 'lua'),
    tree: stringOption(options, 'tree'),
    jobs: integerOption(options, 'jobs'),
    servers: server
      ?.split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  }
}
