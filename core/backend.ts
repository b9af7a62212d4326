/**
 * ManifestClient interface and an in-memory implementation.
 *
 * The resolver talks to the registry only through `ManifestClient`:
 * list the published versions of a name, then fetch the descriptor of
 * one of them. `RegistryClient` (core/registry) speaks HTTP;
 * `MemoryRegistry` below serves rockspecs held in memory and backs
 * tests and offline use.
 */

import { PackageNotFoundError, MalformedIndexError, ParseError } from './errors/index.js'
import { parseRockspec } from './rockspec/parser.js'
import { normalizePackageName } from './rockspec/name.js'
import type { PackageDescriptor, PackageName } from './rockspec/index.js'
import { sort, parseVersion } from './version/index.js'
import type { Version } from './version/index.js'
import type { Platform } from './config/index.js'

// =============================================================================
// ManifestClient Interface
// =============================================================================

/**
 * Read access to a package index.
 *
 * Both methods fail with `PackageNotFoundError`, `NetworkError`,
 * `TimeoutError` or `MalformedIndexError`. Results are immutable and
 * stable for the lifetime of the client: asking twice returns the same
 * object.
 */
export interface ManifestClient {
  /**
   * Published versions of `name`, ascending
   */
  listVersions(name: PackageName): Promise<readonly Version[]>

  /**
   * Parsed, platform-resolved descriptor for one published version
   */
  fetchDescriptor(name: PackageName, version: Version): Promise<PackageDescriptor>
}

// =============================================================================
// MemoryRegistry Implementation
// =============================================================================

export interface MemoryRegistryOptions {
  /**
   * Platform used to resolve rockspec `platforms` overrides.
   * @default 'linux'
   */
  platform?: Platform
}

/**
 * In-memory index built from rockspec texts.
 *
 * Counts calls per method so tests can assert how often the index was
 * consulted.
 */
export class MemoryRegistry implements ManifestClient {
  private readonly platform: Platform
  private readonly rockspecs = new Map<PackageName, Map<string, string>>()
  private readonly versionLists = new Map<PackageName, readonly Version[]>()
  private readonly descriptors = new Map<string, PackageDescriptor>()

  readonly calls = { listVersions: 0, fetchDescriptor: 0 }

  constructor(options: MemoryRegistryOptions = {}) {
    this.platform = options.platform ?? 'linux'
  }

  async listVersions(name: PackageName): Promise<readonly Version[]> {
    this.calls.listVersions++
    const key = normalizePackageName(name)
    const cached = this.versionLists.get(key)
    if (cached) return cached

    const texts = this.rockspecs.get(key)
    if (!texts) {
      throw new PackageNotFoundError(key)
    }
    const versions = Object.freeze(sort([...texts.keys()].map((v) => parseVersion(v))))
    this.versionLists.set(key, versions)
    return versions
  }

  async fetchDescriptor(name: PackageName, version: Version): Promise<PackageDescriptor> {
    this.calls.fetchDescriptor++
    const key = normalizePackageName(name)
    const id = `${key}@${version.toString()}`
    const cached = this.descriptors.get(id)
    if (cached) return cached

    const text = this.rockspecs.get(key)?.get(version.toString())
    if (text === undefined) {
      throw new PackageNotFoundError(key, version.toString())
    }

    let descriptor: PackageDescriptor
    try {
      descriptor = parseRockspec(text, { platform: this.platform, path: `${id}.rockspec` })
    } catch (error) {
      if (error instanceof ParseError) {
        throw new MalformedIndexError(`${id}: ${error.message}`)
      }
      throw error
    }
    this.descriptors.set(id, descriptor)
    return descriptor
  }

  // =========================================================================
  // Test Helper Methods
  // =========================================================================

  /**
   * Add a rockspec. Name and version are read from its `package` and
   * `version` fields.
   */
  addRockspec(text: string): PackageDescriptor {
    const descriptor = parseRockspec(text, { platform: this.platform })
    const versions = this.rockspecs.get(descriptor.name) ?? new Map<string, string>()
    versions.set(descriptor.version.toString(), text)
    this.rockspecs.set(descriptor.name, versions)
    this.versionLists.delete(descriptor.name)
    return descriptor
  }

  has(name: PackageName): boolean {
    return this.rockspecs.has(normalizePackageName(name))
  }
}
