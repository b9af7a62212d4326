/**
 * Source fetching and archives
 */

import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { gzipSync } from 'node:zlib'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { extractArchive, fetchSource, packTar, readTar, readZip } from '../../../core/source/index.js'
import { IntegrityViolationError, SourceError } from '../../../core/errors/index.js'
import { calculateIntegrity } from '../../../core/integrity/index.js'
import { parseRockspec } from '../../../core/rockspec/index.js'
import { silenceLogger } from '../../../core/logger.js'
import { FakeCommandRunner } from '../../helpers/fake-runner.js'

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes)

/**
 * Minimal zip writer (stored entries only)
 */
function storedZip(files: [string, string][]): Uint8Array {
  const encoder = new TextEncoder()
  const locals: Uint8Array[] = []
  const centrals: Uint8Array[] = []
  let offset = 0
  for (const [name, contents] of files) {
    const nameBytes = encoder.encode(name)
    const data = encoder.encode(contents)
    const local = new Uint8Array(30 + nameBytes.length + data.length)
    const lv = new DataView(local.buffer)
    lv.setUint32(0, 0x04034b50, true)
    lv.setUint32(18, data.length, true)
    lv.setUint32(22, data.length, true)
    lv.setUint16(26, nameBytes.length, true)
    local.set(nameBytes, 30)
    local.set(data, 30 + nameBytes.length)

    const central = new Uint8Array(46 + nameBytes.length)
    const cv = new DataView(central.buffer)
    cv.setUint32(0, 0x02014b50, true)
    cv.setUint32(20, data.length, true)
    cv.setUint32(24, data.length, true)
    cv.setUint16(28, nameBytes.length, true)
    cv.setUint32(42, offset, true)
    central.set(nameBytes, 46)

    locals.push(local)
    centrals.push(central)
    offset += local.length
  }
  const centralSize = centrals.reduce((n, c) => n + c.length, 0)
  const eocd = new Uint8Array(22)
  const ev = new DataView(eocd.buffer)
  ev.setUint32(0, 0x06054b50, true)
  ev.setUint16(8, files.length, true)
  ev.setUint16(10, files.length, true)
  ev.setUint32(12, centralSize, true)
  ev.setUint32(16, offset, true)

  const parts = [...locals, ...centrals, eocd]
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0))
  let at = 0
  for (const part of parts) {
    out.set(part, at)
    at += part.length
  }
  return out
}

let root: string

beforeEach(async () => {
  silenceLogger()
  root = await mkdtemp(join(tmpdir(), 'rockyard-source-'))
})

afterEach(async () => {
  silenceLogger(false)
  await rm(root, { recursive: true, force: true })
})

describe('tar', () => {
  it('reads back what packTar writes', () => {
    const entries = readTar(packTar([{ path: 'foo-1.0/' }, { path: 'foo-1.0/foo.lua', data: 'return {}' }]))
    expect(entries.map((e) => [e.path, e.type])).toEqual([
      ['foo-1.0/', 'directory'],
      ['foo-1.0/foo.lua', 'file'],
    ])
    expect(text(entries[1].data)).toBe('return {}')
  })

  it('rejects a header whose checksum does not match', () => {
    const archive = packTar([{ path: 'a.lua', data: 'x' }])
    archive[0] = 'b'.charCodeAt(0)
    expect(() => readTar(archive)).toThrow(SourceError)
  })
})

describe('extractArchive', () => {
  it('unpacks a gzipped tarball', async () => {
    const bytes = gzipSync(packTar([{ path: 'pkg/src/a.lua', data: 'return 1' }]))
    await extractArchive(bytes, join(root, 'out'), { fileName: 'pkg.tar.gz' })
    expect(await readFile(join(root, 'out', 'pkg', 'src', 'a.lua'), 'utf8')).toBe('return 1')
  })

  it('unpacks a zip with stored entries', async () => {
    const bytes = storedZip([['pkg/init.lua', 'return "zip"']])
    expect(readZip(bytes).map((e) => e.path)).toEqual(['pkg/init.lua'])

    await extractArchive(bytes, join(root, 'out'), { fileName: 'pkg.zip' })
    expect(await readFile(join(root, 'out', 'pkg', 'init.lua'), 'utf8')).toBe('return "zip"')
  })

  it('refuses entries that escape the destination', async () => {
    const bytes = packTar([{ path: '../evil.lua', data: 'x' }])
    await expect(extractArchive(bytes, join(root, 'out'))).rejects.toThrow(SourceError)
    await expect(access(join(root, 'evil.lua'))).rejects.toThrow()
  })

  it('saves a plain file download under its own name', async () => {
    await extractArchive(new TextEncoder().encode('return 42'), join(root, 'out'), { fileName: 'single.lua' })
    expect(await readFile(join(root, 'out', 'single.lua'), 'utf8')).toBe('return 42')
  })
})

describe('fetchSource', () => {
  function descriptor(source: string, build = '{ type = "builtin", modules = { foo = "foo.lua" } }') {
    return parseRockspec(`
package = "foo"
version = "1.0-1"
source = ${source}
build = ${build}
`)
  }

  async function archive(): Promise<{ path: string; bytes: Uint8Array }> {
    const bytes = gzipSync(packTar([{ path: 'foo-1.0/' }, { path: 'foo-1.0/foo.lua', data: 'return "foo"' }]))
    const path = join(root, 'foo-1.0.tar.gz')
    await writeFile(path, bytes)
    return { path, bytes }
  }

  it('unpacks a local archive and enters its single top-level directory', async () => {
    const { path, bytes } = await archive()
    const runner = new FakeCommandRunner()

    const fetched = await fetchSource(descriptor(`{ url = "file://${path}" }`), {
      scratchRoot: join(root, 'scratch'),
      runner,
    })

    expect(fetched.dir).toBe(join(fetched.workDir, 'unpacked', 'foo-1.0'))
    expect(await readFile(join(fetched.dir, 'foo.lua'), 'utf8')).toBe('return "foo"')
    expect(fetched.integrity).toBe(calculateIntegrity(bytes))
    expect(runner.calls).toEqual([])
  })

  it('honours source.dir', async () => {
    const { path } = await archive()
    const fetched = await fetchSource(descriptor(`{ url = "file://${path}", dir = "foo-1.0" }`), {
      scratchRoot: join(root, 'scratch'),
      runner: new FakeCommandRunner(),
    })
    expect(fetched.dir).toBe(join(fetched.workDir, 'unpacked', 'foo-1.0'))
  })

  it('fails when source.dir is missing', async () => {
    const { path } = await archive()
    const promise = fetchSource(descriptor(`{ url = "file://${path}", dir = "nope" }`), {
      scratchRoot: join(root, 'scratch'),
      runner: new FakeCommandRunner(),
    })
    await expect(promise).rejects.toThrow(SourceError)
  })

  it('rejects an archive that does not match the rockspec hash', async () => {
    const { path } = await archive()
    const wrong = calculateIntegrity('something else')
    const promise = fetchSource(descriptor(`{ url = "file://${path}", hash = "${wrong}" }`), {
      scratchRoot: join(root, 'scratch'),
      runner: new FakeCommandRunner(),
    })
    await expect(promise).rejects.toThrow(IntegrityViolationError)
  })

  it('downloads http sources through the injected fetch', async () => {
    const { bytes } = await archive()
    const fetched = await fetchSource(descriptor('{ url = "https://example.test/foo-1.0.tar.gz" }'), {
      scratchRoot: join(root, 'scratch'),
      runner: new FakeCommandRunner(),
      fetch: async () => new Response(bytes, { status: 200 }),
    })
    expect(await readFile(join(fetched.dir, 'foo.lua'), 'utf8')).toBe('return "foo"')
  })

  it('clones git sources at the requested tag and drops .git', async () => {
    const runner = new FakeCommandRunner({
      git: async (args) => {
        const target = args[args.length - 1]
        await mkdir(join(target, '.git'), { recursive: true })
        await writeFile(join(target, 'foo.lua'), 'return "git"')
        return undefined
      },
    })

    const fetched = await fetchSource(descriptor('{ url = "git+https://example.test/foo.git", tag = "v1.0" }'), {
      scratchRoot: join(root, 'scratch'),
      runner,
    })

    expect(runner.commands()).toEqual([
      `git clone --depth 1 --branch v1.0 https://example.test/foo.git ${join(fetched.workDir, 'unpacked')}`,
    ])
    expect(await readFile(join(fetched.dir, 'foo.lua'), 'utf8')).toBe('return "git"')
    await expect(access(join(fetched.dir, '.git'))).rejects.toThrow()
  })

  it('applies patches in name order from the source root', async () => {
    const { path } = await archive()
    const runner = new FakeCommandRunner({ patch: () => undefined })

    const fetched = await fetchSource(
      descriptor(
        `{ url = "file://${path}" }`,
        `{ type = "builtin", modules = { foo = "foo.lua" }, patches = { ["b.diff"] = "B", ["a.diff"] = "A" } }`
      ),
      { scratchRoot: join(root, 'scratch'), runner }
    )

    expect(runner.calls.map((c) => c.args)).toEqual([
      ['-p1', '-i', join(fetched.workDir, 'patches', 'a.diff')],
      ['-p1', '-i', join(fetched.workDir, 'patches', 'b.diff')],
    ])
    expect(runner.calls[0].options.cwd).toBe(fetched.dir)
    expect(await readFile(join(fetched.workDir, 'patches', 'a.diff'), 'utf8')).toBe('A')
  })
})
