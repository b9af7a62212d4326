/**
 * LuaRocks Registry Client
 *
 * Fetch-based HTTP client for LuaRocks-compatible servers.
 * Implements the ManifestClient interface with:
 * - Several servers, the first that lists a name wins
 * - Timeout/retry support with exponential backoff
 * - On-disk cache for manifests (TTL) and rockspecs (digest-checked)
 * - Single-flight in-memory caches
 *
 * @module core/registry/client
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import type { ManifestClient } from '../backend.js'
import { SingleFlightCache } from '../cache/single-flight.js'
import type { Config, Platform } from '../config/index.js'
import {
  IntegrityViolationError,
  MalformedIndexError,
  NetworkError,
  PackageNotFoundError,
  ParseError,
  TimeoutError,
} from '../errors/index.js'
import { algorithmOf, calculateIntegrity, verifyIntegrity } from '../integrity/index.js'
import { logger } from '../logger.js'
import { parsePackageName, parseRockspec } from '../rockspec/index.js'
import type { PackageDescriptor, PackageName, ParsedPackageName } from '../rockspec/index.js'
import type { Version } from '../version/index.js'
import { parseManifest, type Manifest } from './manifest.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration options for RegistryClient.
 */
export interface RegistryClientOptions {
  /**
   * Server base URLs, queried in order.
   * @default ['https://luarocks.org']
   */
  servers?: string[]

  /**
   * Lua version whose manifest is read (`manifest-5.4`).
   * @default '5.4'
   */
  luaVersion?: string

  /**
   * Platform used to resolve rockspec `platforms` overrides.
   * @default 'linux'
   */
  platform?: Platform

  /**
   * Request timeout in milliseconds.
   * @default 30000 (30 seconds)
   */
  timeout?: number

  /**
   * Number of attempts for retryable failures.
   * @default 3
   */
  retries?: number

  /**
   * Base delay between retries in milliseconds.
   * Attempt n waits retryDelay * 2^(n-1).
   * @default 500
   */
  retryDelay?: number

  /**
   * Directory for the on-disk cache. No disk cache when unset.
   */
  cacheDir?: string

  /**
   * Seconds a cached manifest stays fresh.
   * @default 3600
   */
  manifestTtl?: number

  /**
   * Maximum descriptors held in memory.
   * @default 500
   */
  cacheSize?: number

  /**
   * User agent string for HTTP requests.
   * @default 'rockyard/0.1.0'
   */
  userAgent?: string

  /**
   * Custom fetch function (useful for testing or custom implementations).
   * @default globalThis.fetch
   */
  fetch?: typeof fetch
}

interface TextResponse {
  status: number
  ok: boolean
  text: string
}

interface Located {
  server: string
  versions: readonly Version[]
}

// =============================================================================
// RegistryClient Implementation
// =============================================================================

export class RegistryClient implements ManifestClient {
  private readonly servers: string[]
  private readonly luaVersion: string
  private readonly platform: Platform
  private readonly timeout: number
  private readonly retries: number
  private readonly retryDelay: number
  private readonly cacheDir: string | undefined
  private readonly manifestTtl: number
  private readonly userAgent: string
  private readonly _fetch: typeof fetch

  private readonly manifests: SingleFlightCache<string, Manifest>
  private readonly locations: SingleFlightCache<PackageName, Located>
  private readonly descriptors: SingleFlightCache<string, PackageDescriptor>

  constructor(options: RegistryClientOptions = {}) {
    this.servers = (options.servers ?? ['https://luarocks.org']).map((s) => s.replace(/\/+$/, ''))
    this.luaVersion = options.luaVersion ?? '5.4'
    this.platform = options.platform ?? 'linux'
    this.timeout = options.timeout ?? 30000
    this.retries = options.retries ?? 3
    this.retryDelay = options.retryDelay ?? 500
    this.cacheDir = options.cacheDir
    this.manifestTtl = options.manifestTtl ?? 3600
    this.userAgent = options.userAgent ?? 'rockyard/0.1.0'
    this._fetch = options.fetch ?? globalThis.fetch.bind(globalThis)

    const maxSize = options.cacheSize ?? 500
    this.manifests = new SingleFlightCache({ maxSize: 64 })
    this.locations = new SingleFlightCache({ maxSize })
    this.descriptors = new SingleFlightCache({ maxSize })
  }

  static fromConfig(config: Config, options: Pick<RegistryClientOptions, 'fetch' | 'userAgent'> = {}): RegistryClient {
    return new RegistryClient({
      servers: config.servers,
      luaVersion: config.luaVersion,
      platform: config.platform,
      timeout: config.timeout,
      retries: config.retries,
      retryDelay: config.retryDelay,
      cacheDir: config.cacheDir,
      manifestTtl: config.manifestTtl,
      ...options,
    })
  }

  // =========================================================================
  // ManifestClient Implementation
  // =========================================================================

  async listVersions(name: PackageName): Promise<readonly Version[]> {
    const located = await this.locate(name)
    return located.versions
  }

  async fetchDescriptor(name: PackageName, version: Version): Promise<PackageDescriptor> {
    const parsed = parsePackageName(name)
    const id = `${parsed.full}@${version.toString()}`
    return this.descriptors.get(id, () => this.loadDescriptor(parsed, version))
  }

  // =========================================================================
  // Private Methods
  // =========================================================================

  /**
   * First server whose manifest lists `name`. A server that fails is
   * skipped; its error is thrown only if no later server lists the name.
   */
  private locate(name: PackageName): Promise<Located> {
    const parsed = parsePackageName(name)
    return this.locations.get(parsed.full, async () => {
      let firstError: unknown
      for (const server of this.servers) {
        let manifest: Manifest
        try {
          manifest = await this.manifest(server, parsed.namespace)
        } catch (error) {
          logger.warn(`Manifest from ${server} unavailable: ${describe(error)}`)
          firstError ??= error
          continue
        }
        const versions = manifest.get(parsed.name)
        if (versions && versions.length > 0) {
          logger.debug(`Found ${parsed.full} on ${server} (${versions.length} versions)`)
          return { server, versions }
        }
      }
      if (firstError !== undefined) {
        throw firstError
      }
      throw new PackageNotFoundError(parsed.full)
    })
  }

  private manifest(server: string, namespace: string | undefined): Promise<Manifest> {
    const url = `${this.baseUrl(server, namespace)}/manifest-${this.luaVersion}`
    return this.manifests.get(url, async () => {
      const cachePath = this.cachePath('manifests', encodeURIComponent(url))
      const cached = await this.readFresh(cachePath)
      if (cached !== undefined) {
        logger.debug(`Manifest cache hit: ${url}`)
        return parseManifest(cached, url)
      }

      logger.debug(`Fetching manifest ${url}`)
      const text = await this.fetchText(url, server)
      if (text === undefined) {
        // Servers without a namespace directory answer 404
        return new Map()
      }
      const manifest = parseManifest(text, url)
      await this.writeCache(cachePath, text)
      return manifest
    })
  }

  private async loadDescriptor(parsed: ParsedPackageName, version: Version): Promise<PackageDescriptor> {
    const { server, versions } = await this.locate(parsed.full)
    if (!versions.some((v) => v.toString() === version.toString())) {
      throw new PackageNotFoundError(parsed.full, version.toString())
    }

    const file = `${parsed.name}-${version.toString()}.rockspec`
    const url = `${this.baseUrl(server, parsed.namespace)}/${file}`
    const cachePath = this.cachePath('rockspecs', ...(parsed.namespace ? [parsed.namespace, file] : [file]))

    let text = await this.readVerified(cachePath, parsed.full)
    if (text === undefined) {
      logger.debug(`Fetching rockspec ${url}`)
      text = await this.fetchText(url, server)
      if (text === undefined) {
        throw new PackageNotFoundError(parsed.full, version.toString())
      }
      await this.writeCache(cachePath, text)
      await this.writeCache(`${cachePath}.sri`, calculateIntegrity(text))
    } else {
      logger.debug(`Rockspec cache hit: ${file}`)
    }

    let descriptor: PackageDescriptor
    try {
      descriptor = parseRockspec(text, { platform: this.platform, path: url })
    } catch (error) {
      if (error instanceof ParseError) {
        throw new MalformedIndexError(`${file}: ${error.message}`, server)
      }
      throw error
    }

    if (descriptor.name !== parsed.full && descriptor.name !== parsed.name) {
      throw new MalformedIndexError(`${file} declares package "${descriptor.name}"`, server)
    }
    if (descriptor.version.toString() !== version.toString()) {
      throw new MalformedIndexError(`${file} declares version "${descriptor.version.toString()}"`, server)
    }
    return descriptor
  }

  private baseUrl(server: string, namespace: string | undefined): string {
    return namespace ? `${server}/manifests/${encodeURIComponent(namespace)}` : server
  }

  /**
   * GET `url` as text. Returns undefined on 404.
   */
  private async fetchText(url: string, server: string): Promise<string | undefined> {
    const response = await this.fetchWithRetry(url, server)
    if (response.status === 404) {
      return undefined
    }
    if (!response.ok) {
      throw new NetworkError(`GET ${url} failed with status ${response.status}`, {
        retryable: false,
        status: response.status,
        server,
      })
    }
    return response.text
  }

  /**
   * Fetch with timeout and retry support. The timeout covers reading the
   * body as well.
   */
  private async fetchWithRetry(url: string, server: string, attempt: number = 1): Promise<TextResponse> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeout)

    let response: TextResponse
    try {
      const res = await this._fetch(url, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
      })
      response = { status: res.status, ok: res.ok, text: await res.text() }
    } catch (error) {
      clearTimeout(timeoutId)

      if (attempt < this.retries) {
        logger.warn(`GET ${url} failed (${describe(error)}), retrying (${attempt}/${this.retries - 1})`)
        await this.delay(this.backoff(attempt))
        return this.fetchWithRetry(url, server, attempt + 1)
      }

      // Handle abort (timeout)
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError(`Request to ${url} timed out after ${this.timeout}ms`, this.timeout)
      }
      throw new NetworkError(`GET ${url} failed: ${describe(error)}`, { retryable: true, server })
    }
    clearTimeout(timeoutId)

    if (isRetryableStatus(response.status)) {
      if (attempt < this.retries) {
        logger.warn(`GET ${url} returned ${response.status}, retrying (${attempt}/${this.retries - 1})`)
        await this.delay(this.backoff(attempt))
        return this.fetchWithRetry(url, server, attempt + 1)
      }
      throw new NetworkError(`GET ${url} failed with status ${response.status}`, {
        retryable: true,
        status: response.status,
        server,
      })
    }

    return response
  }

  private backoff(attempt: number): number {
    return this.retryDelay * 2 ** (attempt - 1)
  }

  /**
   * Delay for a given number of milliseconds.
   */
  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
  }

  // =========================================================================
  // Disk cache
  // =========================================================================

  private cachePath(...segments: string[]): string | undefined {
    return this.cacheDir === undefined ? undefined : join(this.cacheDir, ...segments)
  }

  /**
   * Cached text if younger than the manifest TTL
   */
  private async readFresh(path: string | undefined): Promise<string | undefined> {
    if (path === undefined) return undefined
    try {
      const info = await stat(path)
      if (Date.now() - info.mtimeMs > this.manifestTtl * 1000) {
        return undefined
      }
      return await readFile(path, 'utf8')
    } catch (error) {
      return missOn(error)
    }
  }

  /**
   * Cached text, checked against its `.sri` sibling. A mismatch is an
   * integrity violation, not a miss.
   */
  private async readVerified(path: string | undefined, name: PackageName): Promise<string | undefined> {
    if (path === undefined) return undefined
    const cached = await Promise.all([readFile(path, 'utf8'), readFile(`${path}.sri`, 'utf8')]).catch(missOn)
    if (cached === undefined) return undefined
    const [text, sri] = cached
    const expected = sri.trim()
    if (!verifyIntegrity(text, expected)) {
      throw new IntegrityViolationError(name, 'rockspec', expected, calculateIntegrity(text, algorithmOf(expected)))
    }
    return text
  }

  private async writeCache(path: string | undefined, text: string): Promise<void> {
    if (path === undefined) return
    try {
      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, text)
    } catch (error) {
      logger.warn(`Could not write cache file ${path}: ${describe(error)}`)
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500
}

function missOn(error: unknown): undefined {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return undefined
  }
  throw error
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
