/**
 * Rockspec parsing
 */

import { describe, it, expect } from 'vitest'
import {
  parseRockspec,
  supportsPlatform,
  evaluateLua,
  decodeLuaString,
  isTable,
} from '../../../core/rockspec/index.js'
import { formatConstraint } from '../../../core/version/index.js'
import { ParseError } from '../../../core/errors/index.js'

const LUASOCKET = `
package = "LuaSocket"
version = "3.1.0-1"
source = {
  url = "git+https://github.com/lunarmodules/luasocket.git",
  tag = "v3.1.0",
}
description = { summary = "Network support for the Lua language", license = "MIT" }
dependencies = { "lua >= 5.1", "luafilesystem ~> 1.8" }
build = {
  type = "builtin",
  modules = {
    ["socket.core"] = {
      sources = { "src/luasocket.c", "src/timeout.c" },
      defines = { "LUASOCKET_DEBUG" },
    },
    ["socket.http"] = "src/http.lua",
  },
}
`

describe('parseRockspec', () => {
  it('reads identity, dependencies and source', () => {
    const d = parseRockspec(LUASOCKET)
    expect(d.name).toBe('luasocket')
    expect(d.version.toString()).toBe('3.1.0-1')
    expect(d.luaConstraint && formatConstraint(d.luaConstraint)).toBe('>= 5.1')
    expect(d.dependencies.map((dep) => dep.name)).toEqual(['luafilesystem'])
    expect(formatConstraint(d.dependencies[0].constraint)).toBe('>= 1.8, < 1.9')
    expect(d.source).toEqual({
      kind: 'git',
      url: 'https://github.com/lunarmodules/luasocket.git',
      ref: 'v3.1.0',
    })
    expect(d.description.license).toBe('MIT')
    expect(d.rockspec).toBe(LUASOCKET)
  })

  it('classifies C modules as a compiled extension', () => {
    const { build } = parseRockspec(LUASOCKET)
    expect(build.kind).toBe('compiled-extension')
    if (build.kind !== 'compiled-extension') return
    expect(build.modules).toEqual({ 'socket.http': 'src/http.lua' })
    expect(build.nativeModules).toEqual([
      {
        name: 'socket.core',
        sources: ['src/luasocket.c', 'src/timeout.c'],
        defines: ['LUASOCKET_DEBUG'],
        libraries: [],
        incdirs: [],
        libdirs: [],
      },
    ])
  })

  it('freezes the descriptor', () => {
    const d = parseRockspec(LUASOCKET)
    expect(Object.isFrozen(d)).toBe(true)
    expect(Object.isFrozen(d.dependencies)).toBe(true)
  })

  it('applies platform overrides for the target platform', () => {
    const text = `
package = "foo"
version = "1.0-1"
source = { url = "https://example.com/foo-1.0.tar.gz" }
dependencies = { "bar", platforms = { linux = { "baz >= 2" }, windows = { "winapi" } } }
build = {
  type = "builtin",
  modules = { foo = "foo.lua" },
  platforms = { unix = { modules = { ["foo.unix"] = "unix.lua" } } },
}
`
    const linux = parseRockspec(text, { platform: 'linux' })
    expect(linux.dependencies.map((d) => d.name)).toEqual(['bar', 'baz'])
    expect(linux.build.kind === 'builtin' && linux.build.modules).toEqual({
      foo: 'foo.lua',
      'foo.unix': 'unix.lua',
    })

    const windows = parseRockspec(text, { platform: 'windows' })
    expect(windows.dependencies.map((d) => d.name)).toEqual(['bar', 'winapi'])
    expect(windows.build.kind === 'builtin' && windows.build.modules).toEqual({ foo: 'foo.lua' })
  })

  it('evaluates concatenation and earlier names', () => {
    const d = parseRockspec(`
local v = "1.2"
package = "foo"
version = v .. "-1"
source = { url = "https://example.com/foo-" .. v .. ".tar.gz" }
source.dir = "foo-" .. v
`)
    expect(d.version.toString()).toBe('1.2-1')
    expect(d.source).toEqual({ kind: 'url', url: 'https://example.com/foo-1.2.tar.gz', dir: 'foo-1.2' })
  })

  it('reads make, script, none and unknown build types', () => {
    const head = 'package = "foo"\nversion = "1.0-1"\nsource = { url = "file:///tmp/foo" }\n'

    const make = parseRockspec(`${head}build = { type = "make", install_variables = { PREFIX = "$(PREFIX)" } }`)
    expect(make.source).toEqual({ kind: 'file', path: '/tmp/foo' })
    expect(make.build).toMatchObject({
      kind: 'external-tool',
      tool: 'make',
      buildTarget: '',
      installTarget: 'install',
      buildPass: true,
      installVariables: { PREFIX: '$(PREFIX)' },
    })

    const script = parseRockspec(`${head}build = { type = "script", script = "build.lua", timeout = 5 }`)
    expect(script.build).toMatchObject({ kind: 'user-script', script: 'build.lua', timeout: 5000 })

    const none = parseRockspec(`${head}build = { type = "none", copy_directories = { "doc" } }`)
    expect(none.build).toMatchObject({ kind: 'builtin', autodetect: false, copyDirectories: ['doc'] })

    const unknown = parseRockspec(`${head}build = { type = "rust-mlua" }`)
    expect(unknown.build).toEqual({ kind: 'unsupported', type: 'rust-mlua' })
  })

  it('names positional install entries after the file', () => {
    const d = parseRockspec(`
package = "foo"
version = "1.0-1"
source = { url = "https://example.com/foo.tar.gz" }
build = {
  type = "builtin",
  modules = {},
  install = { bin = { "bin/foo-tool" }, lua = { ["foo.defaults"] = "cfg/defaults.lua" } },
}
`)
    expect(d.build.kind === 'builtin' && d.build.install).toEqual({
      lua: { 'foo.defaults': 'cfg/defaults.lua' },
      lib: {},
      bin: { 'foo-tool': 'bin/foo-tool' },
      conf: {},
    })
  })

  it('rejects missing fields, code and syntax errors', () => {
    expect(() => parseRockspec('version = "1.0-1"')).toThrow('missing required field package')
    expect(() => parseRockspec('package = os.getenv("X")')).toThrow(ParseError)
    expect(() => parseRockspec('package = ')).toThrow(ParseError)
    expect(() =>
      parseRockspec('package = "foo"\nversion = "1.0-1"\nsource = { url = "x" }\ndependencies = { "bar >= x.y" }')
    ).toThrow(ParseError)
  })
})

describe('supportsPlatform', () => {
  it('honours negated and positive entries', () => {
    expect(supportsPlatform({ supportedPlatforms: ['!windows'] }, 'linux')).toBe(true)
    expect(supportsPlatform({ supportedPlatforms: ['!windows'] }, 'windows')).toBe(false)
    expect(supportsPlatform({ supportedPlatforms: ['macosx'] }, 'linux')).toBe(false)
    expect(supportsPlatform({ supportedPlatforms: ['unix'] }, 'macosx')).toBe(true)
    expect(supportsPlatform({ supportedPlatforms: [] }, 'windows')).toBe(true)
  })
})

describe('evaluateLua', () => {
  it('reads manifest-shaped tables', () => {
    const globals = evaluateLua('repository = { foo = { ["1.0-1"] = { { arch = "rockspec" } } } }')
    const repository = globals.get('repository')
    expect(isTable(repository)).toBe(true)
    if (!isTable(repository)) return
    const foo = repository.get('foo')
    expect(isTable(foo) && [...foo.entries.keys()]).toEqual(['1.0-1'])
  })

  it('keeps positional and keyed fields apart', () => {
    const t = evaluateLua('t = { "a", "b", n = 2, [10] = "x" }').get('t')
    if (!isTable(t)) throw new Error('expected a table')
    expect(t.list()).toEqual(['a', 'b'])
    expect(t.fields()).toEqual([['n', 2]])
    expect(t.get(10)).toBe('x')
  })
})

describe('decodeLuaString', () => {
  it('decodes escapes and long brackets', () => {
    expect(decodeLuaString('"a\\tb"')).toBe('a\tb')
    expect(decodeLuaString("'\\65\\x42'")).toBe('AB')
    expect(decodeLuaString('[[line one]]')).toBe('line one')
    expect(decodeLuaString('[==[a]]b]==]')).toBe('a]]b')
  })
})
