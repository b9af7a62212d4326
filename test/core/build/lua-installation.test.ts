/**
 * Lua header detection and external dependency probing
 */

import { access, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { gzipSync } from 'node:zlib'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  headerVersion,
  LuaInstallation,
  probeExternalDependencies,
  probeExternalDependency,
} from '../../../core/build/index.js'
import { createConfig, type Config } from '../../../core/config/index.js'
import { ExternalDependencyNotFoundError, HeaderNotFoundError } from '../../../core/errors/index.js'
import { silenceLogger } from '../../../core/logger.js'
import { parseRockspec } from '../../../core/rockspec/index.js'
import { packTar } from '../../../core/source/index.js'
import { FakeCommandRunner } from '../../helpers/fake-runner.js'

let root: string

beforeEach(async () => {
  silenceLogger()
  root = await mkdtemp(join(tmpdir(), 'rockyard-lua-'))
})

afterEach(async () => {
  await rm(root, { recursive: true, force: true })
})

async function touch(path: string, contents = ''): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, contents)
}

const LUA_54 = '#define LUA_VERSION_NUM\t504\n'

function config(overrides: Partial<Config> = {}): Config {
  return createConfig(
    { platform: 'linux', luaVersion: '5.4', cacheDir: join(root, 'cache'), searchPrefixes: [], ...overrides },
    root
  )
}

const offline = vi.fn(async () => new Response('not found', { status: 404 }))

describe('headerVersion', () => {
  it('reads LUA_VERSION_NUM', () => {
    expect(headerVersion('#define LUA_VERSION_NUM 501')).toBe('5.1')
    expect(headerVersion(LUA_54)).toBe('5.4')
    expect(headerVersion('/* nothing */')).toBeUndefined()
  })
})

describe('LuaInstallation.detect', () => {
  it('uses the configured Lua dir', async () => {
    const dir = join(root, 'lua')
    await touch(join(dir, 'include', 'lua.h'), LUA_54)

    const lua = await LuaInstallation.detect(config({ luaDir: dir }), new FakeCommandRunner())

    expect(lua).toEqual({
      version: '5.4',
      incdir: join(dir, 'include'),
      libdir: join(dir, 'lib'),
      bindir: join(dir, 'bin'),
      interpreter: 'lua',
      origin: 'config',
    })
  })

  it('skips headers of another version and asks pkg-config', async () => {
    const dir = join(root, 'lua')
    await touch(join(dir, 'include', 'lua.h'), '#define LUA_VERSION_NUM 503')
    const incdir = join(root, 'pkg', 'include')
    await touch(join(incdir, 'lua.h'), LUA_54)

    const runner = new FakeCommandRunner({
      'pkg-config': (args) => {
        if (args[1] !== 'lua5.4') return { exitCode: 1 }
        if (args[0] === '--cflags-only-I') return { stdout: `-I${incdir} \n` }
        if (args[0] === '--variable=libdir') return { stdout: '/usr/lib/x86_64-linux-gnu\n' }
        return { exitCode: 1 }
      },
    })
    const lua = await LuaInstallation.detect(config({ luaDir: dir }), runner)

    expect(lua).toEqual({
      version: '5.4',
      incdir,
      libdir: '/usr/lib/x86_64-linux-gnu',
      interpreter: 'lua',
      origin: 'pkg-config',
    })
  })

  it('searches versioned include dirs under the prefixes', async () => {
    const prefix = join(root, 'usr')
    await touch(join(prefix, 'include', 'lua5.4', 'lua.h'), LUA_54)

    const lua = await LuaInstallation.detect(config({ searchPrefixes: [prefix] }), new FakeCommandRunner(), {
      fetch: offline,
    })

    expect(lua).toMatchObject({ incdir: join(prefix, 'include', 'lua5.4'), libdir: join(prefix, 'lib'), origin: 'prefix' })
  })

  it('downloads headers once and reuses the cache', async () => {
    const archive = gzipSync(
      packTar([
        { path: 'lua-5.4.7/src/lua.h', data: LUA_54 },
        { path: 'lua-5.4.7/src/lauxlib.h', data: '/* aux */' },
      ])
    )
    const fetchLua = vi.fn(async (_url: string | URL | Request) => new Response(archive))
    const cfg = config()

    const first = await LuaInstallation.detect(cfg, new FakeCommandRunner(), { fetch: fetchLua })
    const cached = join(root, 'cache', 'lua', '5.4', 'include')
    expect(first).toEqual({ version: '5.4', incdir: cached, interpreter: 'lua', origin: 'download' })
    expect(fetchLua).toHaveBeenCalledTimes(1)
    expect(fetchLua.mock.calls[0][0]).toBe('https://www.lua.org/ftp/lua-5.4.7.tar.gz')
    await expect(access(join(cached, 'lauxlib.h'))).resolves.toBeUndefined()

    const second = await LuaInstallation.detect(cfg, new FakeCommandRunner(), { fetch: fetchLua })
    expect(second.origin).toBe('cache')
    expect(fetchLua).toHaveBeenCalledTimes(1)
  })

  it('fails when no headers can be found', async () => {
    const promise = LuaInstallation.detect(config(), new FakeCommandRunner(), { fetch: offline })

    await expect(promise).rejects.toThrow(HeaderNotFoundError)
    await expect(promise).rejects.toThrow('Lua 5.4 headers not found')
  })
})

// =============================================================================
// External dependencies
// =============================================================================

describe('external dependencies', () => {
  it('uses NAME_DIR from the environment', async () => {
    const dir = join(root, 'ssl')
    await touch(join(dir, 'include', 'openssl', 'ssl.h'))
    await touch(join(dir, 'lib', 'libssl.so'))

    const info = await probeExternalDependency(
      'OPENSSL',
      { header: 'openssl/ssl.h', library: 'ssl' },
      { config: config(), runner: new FakeCommandRunner(), env: { OPENSSL_DIR: dir } }
    )

    expect(info).toEqual({ dir, incdir: join(dir, 'include'), libdir: join(dir, 'lib') })
  })

  it('rejects a configured dir without the header', async () => {
    const dir = join(root, 'ssl')
    await mkdir(dir, { recursive: true })

    const info = await probeExternalDependency(
      'OPENSSL',
      { header: 'openssl/ssl.h' },
      { config: config(), runner: new FakeCommandRunner(), env: { OPENSSL_DIR: dir } }
    )

    expect(info).toBeUndefined()
  })

  it('asks pkg-config first', async () => {
    const values: Record<string, string> = {
      '--variable=prefix': '/usr\n',
      '--variable=includedir': '/usr/include\n',
      '--variable=libdir': '/usr/lib\n',
    }
    const runner = new FakeCommandRunner({
      'pkg-config': (args) => (args[1] === 'zlib' ? { stdout: values[args[0]] ?? '' } : { exitCode: 1 }),
    })

    const info = await probeExternalDependency('ZLIB', { header: 'zlib.h' }, { config: config(), runner, env: {} })

    expect(info).toEqual({ dir: '/usr', incdir: '/usr/include', libdir: '/usr/lib' })
    expect(runner.commands()[0]).toBe('pkg-config --exists zlib')
  })

  it('finds libraries in lib64 under a search prefix', async () => {
    const prefix = join(root, 'opt')
    await touch(join(prefix, 'include', 'yaml.h'))
    await touch(join(prefix, 'lib64', 'libyaml.a'))
    const descriptor = parseRockspec(`package = "lyaml"
version = "6.2-1"
source = { url = "https://rocks.test/lyaml.tar.gz" }
external_dependencies = { yaml = { header = "yaml.h", library = "yaml" } }
`)

    const found = await probeExternalDependencies(descriptor, {
      config: config({ searchPrefixes: [prefix] }),
      runner: new FakeCommandRunner(),
      env: {},
    })

    expect(found).toEqual({ YAML: { dir: prefix, incdir: join(prefix, 'include'), libdir: join(prefix, 'lib64') } })
  })

  it('fails for a dependency that cannot be found', async () => {
    const descriptor = parseRockspec(`package = "foo"
version = "1.0-1"
source = { url = "https://rocks.test/foo.tar.gz" }
external_dependencies = { NOPE = { header = "nope.h" } }
`)
    const error = await probeExternalDependencies(descriptor, {
      config: config(),
      runner: new FakeCommandRunner(),
      env: {},
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ExternalDependencyNotFoundError)
    expect(error).toMatchObject({ dependency: 'NOPE', message: 'External dependency not found: NOPE' })
  })
})
