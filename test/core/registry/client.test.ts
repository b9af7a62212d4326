/**
 * RegistryClient Tests
 *
 * Tests for the LuaRocks HTTP client.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { RegistryClient } from '../../../core/registry/client.js'
import { parseManifest } from '../../../core/registry/manifest.js'
import {
  IntegrityViolationError,
  MalformedIndexError,
  NetworkError,
  PackageNotFoundError,
  TimeoutError,
} from '../../../core/errors/index.js'
import { calculateIntegrity } from '../../../core/integrity/index.js'
import { parseVersion } from '../../../core/version/index.js'
import { silenceLogger } from '../../../core/logger.js'

// =============================================================================
// Mock Response Helpers
// =============================================================================

type Route = string | number

function createMockFetch(routes: Record<string, Route>) {
  return vi.fn(async (input: Parameters<typeof fetch>[0]): Promise<Response> => {
    const url = String(input)
    const route = routes[url]
    if (route === undefined) {
      return new Response('not found', { status: 404 })
    }
    if (typeof route === 'number') {
      return new Response('error', { status: route })
    }
    return new Response(route, { status: 200 })
  })
}

const MANIFEST = `
repository = {
  foo = {
    ["1.2-1"] = { { arch = "rockspec" }, { arch = "src" } },
    ["1.0-1"] = { { arch = "rockspec" } },
    ["2.0-1"] = { { arch = "linux-x86_64" } },
  },
}
`

function rockspec(name: string, version: string): string {
  return `
package = "${name}"
version = "${version}"
source = { url = "https://example.test/${name}-${version}.tar.gz" }
build = { type = "builtin", modules = { ${name} = "${name}.lua" } }
`
}

const SERVER = 'https://rocks.test'

function fooRoutes(server = SERVER): Record<string, Route> {
  return {
    [`${server}/manifest-5.4`]: MANIFEST,
    [`${server}/foo-1.2-1.rockspec`]: rockspec('foo', '1.2-1'),
  }
}

beforeEach(() => {
  silenceLogger()
})

afterEach(() => {
  silenceLogger(false)
})

// =============================================================================
// Tests
// =============================================================================

describe('parseManifest', () => {
  it('lists only versions that ship a rockspec, ascending', () => {
    const manifest = parseManifest(MANIFEST)
    expect(manifest.get('foo')?.map((v) => v.toString())).toEqual(['1.0-1', '1.2-1'])
  })

  it('rejects a manifest without a repository table', () => {
    expect(() => parseManifest('modules = {}')).toThrow(MalformedIndexError)
  })

  it('rejects text that is not Lua', () => {
    expect(() => parseManifest('repository = {')).toThrow(MalformedIndexError)
  })
})

describe('RegistryClient', () => {
  describe('listVersions', () => {
    it('reads the manifest for the configured Lua version', async () => {
      const mockFetch = createMockFetch(fooRoutes())
      const client = new RegistryClient({ servers: [SERVER], fetch: mockFetch })

      const versions = await client.listVersions('foo')

      expect(versions.map((v) => v.toString())).toEqual(['1.0-1', '1.2-1'])
      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(String(mockFetch.mock.calls[0][0])).toBe('https://rocks.test/manifest-5.4')
    })

    it('should strip trailing slash from server URL', async () => {
      const mockFetch = createMockFetch(fooRoutes())
      const client = new RegistryClient({ servers: [`${SERVER}/`], fetch: mockFetch })

      await client.listVersions('foo')

      expect(String(mockFetch.mock.calls[0][0])).toBe('https://rocks.test/manifest-5.4')
    })

    it('returns the same array on every call', async () => {
      const client = new RegistryClient({ servers: [SERVER], fetch: createMockFetch(fooRoutes()) })
      const first = await client.listVersions('foo')
      const second = await client.listVersions('FOO')
      expect(second).toBe(first)
    })

    it('throws PackageNotFoundError for an unknown name', async () => {
      const client = new RegistryClient({ servers: [SERVER], fetch: createMockFetch(fooRoutes()) })
      await expect(client.listVersions('bar')).rejects.toThrow(PackageNotFoundError)
    })

    it('takes a name from the first server that lists it', async () => {
      const other = 'https://mirror.test'
      const mockFetch = createMockFetch({
        [`${SERVER}/manifest-5.4`]: 'repository = { baz = { ["1.0-1"] = { { arch = "rockspec" } } } }',
        ...fooRoutes(other),
      })
      const client = new RegistryClient({ servers: [SERVER, other], fetch: mockFetch })

      const descriptor = await client.fetchDescriptor('foo', parseVersion('1.2-1'))

      expect(descriptor.name).toBe('foo')
      expect(mockFetch.mock.calls.map((call) => String(call[0]))).toEqual([
        'https://rocks.test/manifest-5.4',
        'https://mirror.test/manifest-5.4',
        'https://mirror.test/foo-1.2-1.rockspec',
      ])
    })

    it('looks up namespaced names under manifests/<namespace>', async () => {
      const mockFetch = createMockFetch({
        [`${SERVER}/manifests/team/manifest-5.4`]:
          'repository = { bar = { ["0.3-1"] = { { arch = "rockspec" } } } }',
        [`${SERVER}/manifests/team/bar-0.3-1.rockspec`]: rockspec('bar', '0.3-1'),
      })
      const client = new RegistryClient({ servers: [SERVER], fetch: mockFetch })

      const descriptor = await client.fetchDescriptor('team/bar', parseVersion('0.3-1'))

      expect(descriptor.version.toString()).toBe('0.3-1')
      expect(String(mockFetch.mock.calls[1][0])).toBe('https://rocks.test/manifests/team/bar-0.3-1.rockspec')
    })
  })

  describe('fetchDescriptor', () => {
    it('parses the rockspec of a listed version', async () => {
      const client = new RegistryClient({ servers: [SERVER], fetch: createMockFetch(fooRoutes()) })
      const descriptor = await client.fetchDescriptor('foo', parseVersion('1.2-1'))

      expect(descriptor.source).toEqual({ kind: 'url', url: 'https://example.test/foo-1.2-1.tar.gz' })
      expect(descriptor.build.kind).toBe('builtin')
    })

    it('throws PackageNotFoundError for an unlisted version', async () => {
      const client = new RegistryClient({ servers: [SERVER], fetch: createMockFetch(fooRoutes()) })
      await expect(client.fetchDescriptor('foo', parseVersion('9.9-1'))).rejects.toThrow(PackageNotFoundError)
    })

    it('throws MalformedIndexError when the rockspec names another version', async () => {
      const client = new RegistryClient({
        servers: [SERVER],
        fetch: createMockFetch({
          [`${SERVER}/manifest-5.4`]: MANIFEST,
          [`${SERVER}/foo-1.0-1.rockspec`]: rockspec('foo', '1.2-1'),
        }),
      })
      await expect(client.fetchDescriptor('foo', parseVersion('1.0-1'))).rejects.toThrow(MalformedIndexError)
    })

    it('shares one fetch between concurrent callers', async () => {
      const mockFetch = createMockFetch(fooRoutes())
      const client = new RegistryClient({ servers: [SERVER], fetch: mockFetch })
      const version = parseVersion('1.2-1')

      const [a, b] = await Promise.all([
        client.fetchDescriptor('foo', version),
        client.fetchDescriptor('foo', version),
      ])

      expect(a).toBe(b)
      const rockspecCalls = mockFetch.mock.calls.filter((call) => String(call[0]).endsWith('.rockspec'))
      expect(rockspecCalls).toHaveLength(1)
    })
  })

  describe('retries', () => {
    it('retries a 503 and then succeeds', async () => {
      let calls = 0
      const mockFetch = vi.fn(async (): Promise<Response> => {
        calls++
        return calls === 1 ? new Response('busy', { status: 503 }) : new Response(MANIFEST, { status: 200 })
      })
      const client = new RegistryClient({ servers: [SERVER], fetch: mockFetch, retryDelay: 0 })

      const versions = await client.listVersions('foo')

      expect(versions).toHaveLength(2)
      expect(mockFetch).toHaveBeenCalledTimes(2)
    })

    it('gives up after the configured attempts with a retryable NetworkError', async () => {
      const mockFetch = createMockFetch({ [`${SERVER}/manifest-5.4`]: 500 })
      const client = new RegistryClient({ servers: [SERVER], fetch: mockFetch, retries: 3, retryDelay: 0 })

      const error = await client.listVersions('foo').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(NetworkError)
      expect(error).toMatchObject({ retryable: true, status: 500 })
      expect(mockFetch).toHaveBeenCalledTimes(3)
    })

    it('retries 429', async () => {
      const mockFetch = createMockFetch({ [`${SERVER}/manifest-5.4`]: 429 })
      const client = new RegistryClient({ servers: [SERVER], fetch: mockFetch, retries: 2, retryDelay: 0 })

      await expect(client.listVersions('foo')).rejects.toThrow(NetworkError)
      expect(mockFetch).toHaveBeenCalledTimes(2)
    })

    it('does not retry other client errors', async () => {
      const mockFetch = createMockFetch({ [`${SERVER}/manifest-5.4`]: 403 })
      const client = new RegistryClient({ servers: [SERVER], fetch: mockFetch, retryDelay: 0 })

      const error = await client.listVersions('foo').catch((e: unknown) => e)

      expect(error).toMatchObject({ retryable: false, status: 403 })
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('surfaces a TimeoutError when every attempt times out', async () => {
      const hanging = vi.fn(
        (_input: Parameters<typeof fetch>[0], init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const error = new Error('aborted')
              error.name = 'AbortError'
              reject(error)
            })
          })
      )
      const client = new RegistryClient({ servers: [SERVER], fetch: hanging, timeout: 5, retries: 2, retryDelay: 0 })

      await expect(client.listVersions('foo')).rejects.toThrow(TimeoutError)
      expect(hanging).toHaveBeenCalledTimes(2)
    })

    it('times out a body that stops arriving', async () => {
      const stalled = vi.fn(async (_input: Parameters<typeof fetch>[0], init?: RequestInit) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('repository = {'))
            init?.signal?.addEventListener('abort', () => {
              const error = new Error('aborted')
              error.name = 'AbortError'
              controller.error(error)
            })
          },
        })
        return new Response(body, { status: 200 })
      })
      const client = new RegistryClient({ servers: [SERVER], fetch: stalled, timeout: 5, retries: 1, retryDelay: 0 })

      await expect(client.listVersions('foo')).rejects.toThrow(TimeoutError)
      expect(stalled).toHaveBeenCalledTimes(1)
    })
  })

  describe('disk cache', () => {
    let cacheDir: string

    beforeEach(async () => {
      cacheDir = await mkdtemp(join(tmpdir(), 'rockyard-registry-'))
    })

    afterEach(async () => {
      await rm(cacheDir, { recursive: true, force: true })
    })

    it('serves manifests and rockspecs from disk on the next run', async () => {
      const first = new RegistryClient({ servers: [SERVER], fetch: createMockFetch(fooRoutes()), cacheDir })
      await first.fetchDescriptor('foo', parseVersion('1.2-1'))

      const offline = createMockFetch({})
      const second = new RegistryClient({ servers: [SERVER], fetch: offline, cacheDir })
      const descriptor = await second.fetchDescriptor('foo', parseVersion('1.2-1'))

      expect(descriptor.version.toString()).toBe('1.2-1')
      expect(offline).not.toHaveBeenCalled()
    })

    it('stores a digest beside each cached rockspec', async () => {
      const client = new RegistryClient({ servers: [SERVER], fetch: createMockFetch(fooRoutes()), cacheDir })
      await client.fetchDescriptor('foo', parseVersion('1.2-1'))

      const sri = await readFile(join(cacheDir, 'rockspecs', 'foo-1.2-1.rockspec.sri'), 'utf8')
      expect(sri).toMatch(/^sha256-/)
    })

    it('fails on a cached rockspec that no longer matches its digest', async () => {
      const first = new RegistryClient({ servers: [SERVER], fetch: createMockFetch(fooRoutes()), cacheDir })
      await first.fetchDescriptor('foo', parseVersion('1.2-1'))
      const sri = await readFile(join(cacheDir, 'rockspecs', 'foo-1.2-1.rockspec.sri'), 'utf8')
      await writeFile(join(cacheDir, 'rockspecs', 'foo-1.2-1.rockspec'), 'tampered')

      const mockFetch = createMockFetch(fooRoutes())
      const second = new RegistryClient({ servers: [SERVER], fetch: mockFetch, cacheDir })
      const error = await second.fetchDescriptor('foo', parseVersion('1.2-1')).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(IntegrityViolationError)
      if (!(error instanceof IntegrityViolationError)) return
      expect(error.code).toBe('EINTEGRITY')
      expect(error.kind).toBe('rockspec')
      expect(error.expected).toBe(sri)
      expect(error.actual).toBe(calculateIntegrity('tampered'))
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('refetches a manifest older than the TTL', async () => {
      const first = new RegistryClient({ servers: [SERVER], fetch: createMockFetch(fooRoutes()), cacheDir })
      await first.listVersions('foo')

      const mockFetch = createMockFetch(fooRoutes())
      const second = new RegistryClient({ servers: [SERVER], fetch: mockFetch, cacheDir, manifestTtl: -1 })
      await second.listVersions('foo')

      expect(mockFetch).toHaveBeenCalledTimes(1)
    })
  })
})
