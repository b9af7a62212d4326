/**
 * Rock Error Types
 *
 * Structured error types for resolution, build and install operations with:
 * - Typed error codes for programmatic handling
 * - Context naming the package, version or path involved
 * - JSON serialization for reports
 */

// =============================================================================
// Error Code Types
// =============================================================================

/**
 * Error codes for rock operations
 */
export type RockErrorCode =
  | 'EPARSE'         // Malformed version, constraint, rockspec, lockfile
  | 'ENOTFOUND'      // Package/version not present in any configured server
  | 'ENETWORK'       // Transport failure or unexpected HTTP status
  | 'EMALFORMED'     // Registry served an unreadable manifest
  | 'ETIMEOUT'       // Request timed out
  | 'ECONFLICT'      // No version satisfies the accumulated constraints
  | 'ECYCLE'         // Dependency cycle
  | 'ENOCONVERGE'    // Re-resolution cap exceeded
  | 'EBUILD'         // Build backend failure
  | 'EINTEGRITY'     // Hash mismatch against the lockfile
  | 'EDEPFAILED'     // A dependency of this node failed
  | 'EABORTED'       // Cancelled before completion
  | 'EVALIDATION'    // Invalid input/configuration

/**
 * Broad category of an error, used for exit codes and reporting
 */
export type ErrorCategory =
  | 'usage'
  | 'resolution'
  | 'build'
  | 'integrity'
  | 'registry'
  | 'cancelled'

// =============================================================================
// Error Context Types
// =============================================================================

/**
 * Context for rock-related errors
 */
export interface RockErrorContext {
  package?: string
  version?: string
  server?: string
  path?: string
  cause?: string
}

/**
 * JSON-serializable error representation
 */
export interface RockErrorJSON {
  name: string
  code: RockErrorCode
  message: string
  context?: RockErrorContext
  stack?: string
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for rock operations
 */
export class RockError extends Error {
  readonly code: RockErrorCode
  readonly context?: RockErrorContext

  constructor(
    code: RockErrorCode,
    message: string,
    context?: RockErrorContext
  ) {
    super(message)
    this.name = 'RockError'
    this.code = code
    this.context = context

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): RockErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    }
  }

  static fromJSON(json: RockErrorJSON): RockError {
    const error = new RockError(json.code, json.message, json.context)
    if (json.stack) {
      error.stack = json.stack
    }
    return error
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parsing failed (version, constraint, rockspec, manifest, lockfile)
 *
 * `offset` is the character position in the input where parsing stopped,
 * when one is meaningful.
 */
export class ParseError extends RockError {
  readonly reason: string
  readonly offset?: number

  constructor(reason: string, options?: { offset?: number; input?: string; path?: string }) {
    const where = options?.offset !== undefined ? ` at offset ${options.offset}` : ''
    const what = options?.input !== undefined ? ` in "${options.input}"` : ''
    super('EPARSE', `${reason}${where}${what}`, { path: options?.path })
    this.name = 'ParseError'
    this.reason = reason
    this.offset = options?.offset
  }
}

/**
 * Invalid input or configuration
 */
export class ValidationError extends RockError {
  constructor(message: string, context?: RockErrorContext) {
    super('EVALIDATION', message, context)
    this.name = 'ValidationError'
  }
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Package or version not found in any configured server
 */
export class PackageNotFoundError extends RockError {
  constructor(packageName: string, version?: string) {
    const message = version
      ? `Package not found: ${packageName}@${version}`
      : `Package not found: ${packageName}`

    super('ENOTFOUND', message, { package: packageName, version })
    this.name = 'PackageNotFoundError'
  }
}

/**
 * Transport failure or unexpected HTTP status
 */
export class NetworkError extends RockError {
  readonly status?: number
  readonly retryable: boolean

  constructor(message: string, options: { retryable: boolean; status?: number; server?: string }) {
    super('ENETWORK', message, { server: options.server })
    this.name = 'NetworkError'
    this.status = options.status
    this.retryable = options.retryable
  }
}

/**
 * The server returned a manifest that could not be read
 */
export class MalformedIndexError extends RockError {
  constructor(message: string, server?: string) {
    super('EMALFORMED', message, { server })
    this.name = 'MalformedIndexError'
  }
}

/**
 * Operation timed out
 */
export class TimeoutError extends RockError {
  readonly timeoutMs?: number

  constructor(message: string, timeoutMs?: number) {
    super('ETIMEOUT', message)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * A constraint together with the package that imposed it
 */
export interface ConstraintOrigin {
  constraint: string
  requiredBy: string
}

/**
 * No available version satisfies every constraint on a name
 */
export class ConstraintConflictError extends RockError {
  readonly packageName: string
  readonly constraints: ConstraintOrigin[]

  constructor(packageName: string, constraints: ConstraintOrigin[], available: string[] = []) {
    const detail = constraints
      .map((c) => `${c.constraint || '*'} (from ${c.requiredBy})`)
      .join(', ')
    const tail = available.length > 0 ? `; available: ${available.join(', ')}` : ''
    super('ECONFLICT', `No version of ${packageName} satisfies ${detail}${tail}`, {
      package: packageName,
    })
    this.name = 'ConstraintConflictError'
    this.packageName = packageName
    this.constraints = constraints
  }
}

/**
 * The resolved graph contains a cycle
 */
export class CyclicDependencyError extends RockError {
  readonly cycle: string[]

  constructor(cycle: string[]) {
    super('ECYCLE', `Dependency cycle: ${cycle.join(' -> ')}`, { package: cycle[0] })
    this.name = 'CyclicDependencyError'
    this.cycle = cycle
  }
}

/**
 * A name kept changing its chosen version past the re-resolution cap
 */
export class ResolutionDidNotConvergeError extends RockError {
  readonly packageName: string
  readonly attempts: number

  constructor(packageName: string, attempts: number) {
    super(
      'ENOCONVERGE',
      `Resolution of ${packageName} did not converge after ${attempts} re-resolutions`,
      { package: packageName }
    )
    this.name = 'ResolutionDidNotConvergeError'
    this.packageName = packageName
    this.attempts = attempts
  }
}

// =============================================================================
// Build
// =============================================================================

export type BuildErrorKind =
  | 'missing-file'
  | 'header-not-found'
  | 'external-dependency-not-found'
  | 'compile'
  | 'tool-not-found'
  | 'tool-exit'
  | 'script'
  | 'script-timeout'
  | 'unsupported-build-type'
  | 'source'
  | 'build-dependency'

/**
 * Base class for build backend failures
 */
export class BuildError extends RockError {
  readonly kind: BuildErrorKind

  constructor(kind: BuildErrorKind, message: string, context?: RockErrorContext) {
    super('EBUILD', message, context)
    this.name = 'BuildError'
    this.kind = kind
  }
}

export class MissingFileError extends BuildError {
  constructor(path: string, packageName?: string) {
    super('missing-file', `Missing file: ${path}`, { path, package: packageName })
    this.name = 'MissingFileError'
  }
}

export class HeaderNotFoundError extends BuildError {
  constructor(luaVersion: string, searched: string[] = []) {
    const where = searched.length > 0 ? ` (searched ${searched.join(', ')})` : ''
    super('header-not-found', `Lua ${luaVersion} headers not found${where}`)
    this.name = 'HeaderNotFoundError'
  }
}

export class ExternalDependencyNotFoundError extends BuildError {
  readonly dependency: string

  constructor(dependency: string, packageName?: string) {
    super(
      'external-dependency-not-found',
      `External dependency not found: ${dependency}`,
      { package: packageName }
    )
    this.name = 'ExternalDependencyNotFoundError'
    this.dependency = dependency
  }
}

export class CompileError extends BuildError {
  readonly output: string

  constructor(message: string, output: string, packageName?: string) {
    super('compile', message, { package: packageName })
    this.name = 'CompileError'
    this.output = output
  }
}

export class ToolNotFoundError extends BuildError {
  readonly tool: string

  constructor(tool: string) {
    super('tool-not-found', `Build tool not found: ${tool}`)
    this.name = 'ToolNotFoundError'
    this.tool = tool
  }
}

export class ToolExitNonZeroError extends BuildError {
  readonly exitCode: number
  readonly output: string

  constructor(command: string, exitCode: number, output: string) {
    super('tool-exit', `${command} exited with code ${exitCode}`)
    this.name = 'ToolExitNonZeroError'
    this.exitCode = exitCode
    this.output = output
  }
}

export class ScriptError extends BuildError {
  constructor(message: string, packageName?: string) {
    super('script', message, { package: packageName })
    this.name = 'ScriptError'
  }
}

export class ScriptTimeoutError extends BuildError {
  readonly timeoutMs: number

  constructor(timeoutMs: number, packageName?: string) {
    super('script-timeout', `Build script timed out after ${timeoutMs}ms`, { package: packageName })
    this.name = 'ScriptTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export class UnsupportedBuildTypeError extends BuildError {
  readonly buildType: string

  constructor(buildType: string, packageName?: string) {
    super('unsupported-build-type', `Unsupported build type: ${buildType}`, { package: packageName })
    this.name = 'UnsupportedBuildTypeError'
    this.buildType = buildType
  }
}

/**
 * Source could not be fetched or unpacked
 */
export class SourceError extends BuildError {
  constructor(message: string, context?: RockErrorContext) {
    super('source', message, context)
    this.name = 'SourceError'
  }
}

// =============================================================================
// Install
// =============================================================================

export type IntegrityKind = 'rockspec' | 'source'

/**
 * Fetched content does not match the hash recorded in the lockfile
 */
export class IntegrityViolationError extends RockError {
  readonly kind: IntegrityKind
  readonly expected: string
  readonly actual: string

  constructor(packageName: string, kind: IntegrityKind, expected: string, actual: string) {
    super(
      'EINTEGRITY',
      `Integrity mismatch for ${packageName} ${kind}: expected ${expected}, got ${actual}`,
      { package: packageName }
    )
    this.name = 'IntegrityViolationError'
    this.kind = kind
    this.expected = expected
    this.actual = actual
  }
}

export class BuildDependencyError extends BuildError {
  readonly dependency: string

  constructor(packageName: string, dependency: string, reason: string) {
    super('build-dependency', `Build dependency ${dependency} of ${packageName} failed: ${reason}`, {
      package: packageName,
    })
    this.name = 'BuildDependencyError'
    this.dependency = dependency
  }
}

/**
 * Node was skipped because a dependency failed
 */
export class DependencyFailedError extends RockError {
  readonly dependency: string

  constructor(packageName: string, dependency: string) {
    super('EDEPFAILED', `${packageName} skipped: dependency ${dependency} failed`, {
      package: packageName,
    })
    this.name = 'DependencyFailedError'
    this.dependency = dependency
  }
}

export class AbortedError extends RockError {
  constructor(packageName?: string) {
    super('EABORTED', packageName ? `Aborted before ${packageName} completed` : 'Aborted', {
      package: packageName,
    })
    this.name = 'AbortedError'
  }
}

// =============================================================================
// Error Type Guards
// =============================================================================

export function isRockError(error: unknown): error is RockError {
  return error instanceof RockError
}

export function hasErrorCode(error: unknown, code: RockErrorCode): boolean {
  return isRockError(error) && error.code === code
}

export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Wrap an unknown error as a RockError
 */
export function wrapError(error: unknown, code: RockErrorCode = 'EVALIDATION'): RockError {
  if (isRockError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new RockError(code, error.message, { cause: error.message })
  }

  return new RockError(code, String(error))
}

const CATEGORIES: Record<RockErrorCode, ErrorCategory> = {
  EPARSE: 'usage',
  EVALIDATION: 'usage',
  ENOTFOUND: 'registry',
  ENETWORK: 'registry',
  EMALFORMED: 'registry',
  ETIMEOUT: 'registry',
  ECONFLICT: 'resolution',
  ECYCLE: 'resolution',
  ENOCONVERGE: 'resolution',
  EBUILD: 'build',
  EDEPFAILED: 'build',
  EINTEGRITY: 'integrity',
  EABORTED: 'cancelled',
}

export function errorCategory(error: unknown): ErrorCategory {
  return isRockError(error) ? CATEGORIES[error.code] : 'usage'
}

/**
 * Process exit code for an error that ended a command
 */
export function exitCodeFor(error: unknown): number {
  return exitCodeForCategory(errorCategory(error))
}

/**
 * Exit code for a node failure recorded by its code
 */
export function exitCodeForCode(code: RockErrorCode): number {
  return exitCodeForCategory(CATEGORIES[code])
}

function exitCodeForCategory(category: ErrorCategory): number {
  switch (category) {
    case 'resolution':
      return 2
    case 'build':
      return 3
    case 'integrity':
      return 4
    case 'registry':
      return 5
    case 'cancelled':
      return 130
    case 'usage':
      return 1
  }
}
