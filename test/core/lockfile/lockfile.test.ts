/**
 * Lock File Tests
 *
 * Covers load/save, fromGraph, diff, pinning, sync planning and validation.
 */

import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  LOCKFILE_NAME,
  diff,
  fromGraph,
  load,
  lockedVersions,
  save,
  serialize,
  setPinned,
  syncPlan,
  validate,
  verifyEntry,
  type LockData,
  type LockEntry,
} from '../../../core/lockfile/index.js'
import { IntegrityViolationError, ParseError, ValidationError } from '../../../core/errors/index.js'
import { calculateIntegrity } from '../../../core/integrity/index.js'
import { resolve } from '../../../core/resolver/index.js'
import { parseConstraint } from '../../../core/version/index.js'
import { registryOf, rockspec } from '../../helpers/rockspecs.js'

function entry(version: string, opts: Partial<LockEntry> = {}): LockEntry {
  return {
    version,
    pinned: false,
    constraint: '',
    source: `https://rocks.test/${version}.tar.gz`,
    hashes: { rockspec: 'sha256-r', source: 'sha256-s' },
    dependencies: {},
    binaries: [],
    ...opts,
  }
}

function lock(rocks: Record<string, LockEntry>, entrypoints: Record<string, string> = {}): LockData {
  return { version: '1.0.0', entrypoints, rocks }
}

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'rockyard-lock-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

// ============================================================================
// load / save
// ============================================================================

describe('load and save', () => {
  it('reports a missing lockfile as absent', async () => {
    expect(await load(join(dir, LOCKFILE_NAME))).toEqual({ status: 'absent' })
  })

  it('round-trips through disk and leaves no temp files', async () => {
    const path = join(dir, LOCKFILE_NAME)
    const data = lock({ foo: entry('1.0-1', { dependencies: { bar: '2.0-1' } }), bar: entry('2.0-1') }, { foo: '>= 1.0' })

    await save(path, data)

    expect(await load(path)).toEqual({ status: 'loaded', data })
    expect(await readdir(dir)).toEqual([LOCKFILE_NAME])
  })

  it('writes sorted keys with a trailing newline', async () => {
    const path = join(dir, LOCKFILE_NAME)
    await save(path, lock({ zlib: entry('1.0-1'), abc: entry('1.0-1') }))

    const text = await readFile(path, 'utf8')
    const parsed: unknown = JSON.parse(text)
    expect(text.endsWith('}\n')).toBe(true)
    expect(text.startsWith('{\n  "entrypoints": {},\n  "rocks": {\n    "abc": {\n      "binaries": [],\n')).toBe(true)
    expect(parsed && typeof parsed === 'object' && Object.keys(parsed)).toEqual(['entrypoints', 'rocks', 'version'])
  })

  it('serializes equal data to equal bytes', () => {
    const a = lock({ a: entry('1.0-1'), b: entry('1.0-1') })
    const b = lock({ b: entry('1.0-1'), a: entry('1.0-1') })
    expect(serialize(a)).toBe(serialize(b))
  })

  it('rejects malformed content', async () => {
    const path = join(dir, LOCKFILE_NAME)

    await writeFile(path, '{ not json')
    await expect(load(path)).rejects.toThrow(ParseError)

    await writeFile(path, JSON.stringify({ version: '2.0.0', entrypoints: {}, rocks: {} }))
    await expect(load(path)).rejects.toThrow('unsupported lockfile version "2.0.0"')

    await writeFile(path, JSON.stringify({ version: '1.0.0', entrypoints: { foo: '>> 1' }, rocks: {} }))
    await expect(load(path)).rejects.toThrow(ParseError)

    await writeFile(path, JSON.stringify({ version: '1.0.0', entrypoints: {}, rocks: { foo: { version: '1.0-1' } } }))
    await expect(load(path)).rejects.toThrow('rocks.foo.pinned must be a boolean')
  })

  it('keeps rocks whose names collide with object internals', async () => {
    const path = join(dir, LOCKFILE_NAME)
    const rock = JSON.stringify(entry('1.0-1'))
    await writeFile(
      path,
      `{"version":"1.0.0","entrypoints":{"__proto__":""},"rocks":{"__proto__":${rock},"foo":${rock}}}`
    )

    const loaded = await load(path)

    expect(loaded.status).toBe('loaded')
    if (loaded.status !== 'loaded') return
    expect(Object.keys(loaded.data.rocks)).toEqual(['__proto__', 'foo'])
    expect(Object.keys(loaded.data.entrypoints)).toEqual(['__proto__'])
    expect(Object.getPrototypeOf(loaded.data.rocks)).toBe(Object.prototype)
    expect(Object.keys(JSON.parse(serialize(loaded.data)).rocks)).toEqual(['__proto__', 'foo'])
    expect(validate(loaded.data).errors).toEqual([])
  })
})

// ============================================================================
// fromGraph
// ============================================================================

describe('fromGraph', () => {
  const registry = registryOf({
    app: { '1.0-1': { dependencies: ['json >= 1.0'] } },
    json: { '1.0-1': {}, '1.2-1': {} },
  })
  const roots = [{ name: 'app', constraint: parseConstraint('') }]

  it('records versions, edges, sources and hashes', async () => {
    const graph = await resolve(registry, roots, { luaVersion: '5.4' })
    const records = new Map([['json', { hashes: { source: 'sha256-src' }, binaries: ['zq', 'jq'] }]])

    const data = fromGraph(graph, records)

    expect(data.entrypoints).toEqual({ app: '' })
    expect(data.rocks.app).toEqual({
      version: '1.0-1',
      pinned: false,
      constraint: '',
      source: 'https://rocks.test/app-1.0-1.tar.gz',
      hashes: { rockspec: calculateIntegrity(rockspec('app', '1.0-1', { dependencies: ['json >= 1.0'] })) },
      dependencies: { json: '1.2-1' },
      binaries: [],
    })
    expect(data.rocks.json.constraint).toBe('>= 1.0')
    expect(data.rocks.json.hashes.source).toBe('sha256-src')
    expect(data.rocks.json.binaries).toEqual(['jq', 'zq'])
  })

  it('keeps pins and unchanged hashes from the previous lock', async () => {
    const graph = await resolve(registry, roots, { luaVersion: '5.4' })
    const prev = lock({ json: entry('1.2-1', { pinned: true, binaries: ['jq'] }), gone: entry('0.1-1') })

    const data = fromGraph(graph, new Map(), prev)

    expect(data.rocks.json.pinned).toBe(true)
    expect(data.rocks.json.hashes.source).toBe('sha256-s')
    expect(data.rocks.json.binaries).toEqual(['jq'])
    expect(Object.keys(data.rocks).sort()).toEqual(['app', 'json'])
  })

  it('exposes locked versions for the resolver', () => {
    const versions = lockedVersions(lock({ foo: entry('1.5.0-2') }))
    expect(versions.get('foo')?.toString()).toBe('1.5.0-2')
  })
})

// ============================================================================
// diff / pin / sync / verify / validate
// ============================================================================

describe('diff', () => {
  it('lists added, removed and changed rocks by name', () => {
    const before = lock({ c: entry('1.0-1'), a: entry('1.0-1'), b: entry('1.0-1') })
    const after = lock({ d: entry('1.0-1'), b: entry('2.0-1'), a: entry('1.0-1') })

    expect(diff(before, after)).toEqual({
      added: [{ name: 'd', version: '1.0-1' }],
      removed: [{ name: 'c', version: '1.0-1' }],
      changed: [{ name: 'b', from: '1.0-1', to: '2.0-1' }],
    })
  })

  it('treats a missing lockfile as empty', () => {
    expect(diff(undefined, lock({ a: entry('1.0-1') })).added).toEqual([{ name: 'a', version: '1.0-1' }])
  })
})

describe('setPinned', () => {
  it('returns updated data without touching the input', () => {
    const data = lock({ foo: entry('1.0-1') })
    const pinned = setPinned(data, 'foo', true)
    expect(pinned.rocks.foo.pinned).toBe(true)
    expect(data.rocks.foo.pinned).toBe(false)
    expect(setPinned(pinned, 'foo', false).rocks.foo.pinned).toBe(false)
  })

  it('rejects names that are not locked', () => {
    expect(() => setPinned(lock({}), 'foo', true)).toThrow(ValidationError)
  })
})

describe('syncPlan', () => {
  it('finds new and dropped entrypoints', () => {
    const data = lock({ app: entry('1.0-1'), json: entry('1.0-1') }, { app: '', json: '>= 1.0' })
    const plan = syncPlan(data, [
      { name: 'app', constraint: parseConstraint('') },
      { name: 'http', constraint: parseConstraint('') },
    ])
    expect(plan).toEqual({ toAdd: ['http'], toRemove: ['json'] })
  })

  it('flags an entrypoint whose constraint changed', () => {
    const data = lock({ app: entry('1.0-1') }, { app: '>= 1.0' })
    expect(syncPlan(data, [{ name: 'app', constraint: parseConstraint('>= 2.0') }])).toEqual({
      toAdd: ['app'],
      toRemove: [],
    })
  })
})

describe('verifyEntry', () => {
  it('throws on a digest mismatch', () => {
    const error = (() => {
      try {
        verifyEntry('foo', entry('1.0-1'), { source: 'sha256-other' })
      } catch (e) {
        return e
      }
      return undefined
    })()
    expect(error).toBeInstanceOf(IntegrityViolationError)
    if (!(error instanceof IntegrityViolationError)) return
    expect(error.kind).toBe('source')
    expect(error.expected).toBe('sha256-s')
    expect(error.actual).toBe('sha256-other')
  })

  it('accepts matching digests and skips unrecorded ones', () => {
    expect(() => verifyEntry('foo', entry('1.0-1'), { rockspec: 'sha256-r', source: 'sha256-s' })).not.toThrow()
    expect(() => verifyEntry('foo', entry('1.0-1', { hashes: {} }), { source: 'sha256-x' })).not.toThrow()
  })
})

describe('validate', () => {
  it('reports dangling edges, version drift and missing hashes', () => {
    const data = lock(
      {
        app: entry('1.0-1', { dependencies: { json: '1.0-1', http: '0.4-1' } }),
        json: entry('1.2-1', { hashes: { rockspec: 'sha256-r' } }),
      },
      { app: '', cli: '' }
    )

    expect(validate(data)).toEqual({
      valid: false,
      errors: [
        'Entrypoint cli has no locked rock',
        'app expects json@1.0-1 but 1.2-1 is locked',
        'app depends on http, which is not locked',
      ],
      warnings: ['Missing source hash for json'],
    })
  })
})
