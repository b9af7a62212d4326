import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ParseError, ValidationError } from '../../../core/errors/index.js'
import { silenceLogger } from '../../../core/logger.js'
import {
  checkLuaVersion,
  emptyProject,
  loadProject,
  parseProject,
  PROJECT_FILE,
  projectRequests,
  saveProject,
  serializeProject,
} from '../../../core/project/index.js'
import { formatConstraint } from '../../../core/version/index.js'

const TEXT = `
package = "app"
version = "0.1.0"
lua = ">= 5.1"

[dependencies]
LuaSocket = "~> 3.0"
json = ">= 1.0"

[build_dependencies]
json = ">= 1.2"
luafilesystem = "1.8.0"
`

describe('parseProject', () => {
  it('reads fields and normalizes dependency names', () => {
    const project = parseProject(TEXT, '/p/rockyard.toml')

    expect(project).toEqual({
      path: '/p/rockyard.toml',
      package: 'app',
      version: '0.1.0',
      lua: '>= 5.1',
      dependencies: { luasocket: '~> 3.0', json: '>= 1.0' },
      buildDependencies: { json: '>= 1.2', luafilesystem: '1.8.0' },
    })
  })

  it('defaults missing tables to empty', () => {
    expect(parseProject('package = "x"\n', 'p')).toEqual({
      path: 'p',
      package: 'x',
      version: undefined,
      lua: undefined,
      dependencies: {},
      buildDependencies: {},
    })
  })

  it('rejects malformed TOML', () => {
    expect(() => parseProject('dependencies = [', 'p')).toThrow(ParseError)
  })

  it('rejects non-string constraints', () => {
    expect(() => parseProject('[dependencies]\njson = 1\n', 'p')).toThrow(
      'dependencies.json must be a constraint string'
    )
  })

  it('rejects a non-table dependency list', () => {
    expect(() => parseProject('dependencies = "json"\n', 'p')).toThrow(ValidationError)
  })

  it('rejects invalid constraint text', () => {
    expect(() => parseProject('[dependencies]\njson = ">="\n', 'p')).toThrow(ParseError)
  })
})

describe('projectRequests', () => {
  it('lists dependencies, then build dependencies not already listed', () => {
    const requests = projectRequests(parseProject(TEXT, 'p'))

    expect(requests.map((r) => [r.name, formatConstraint(r.constraint)])).toEqual([
      ['luasocket', '>= 3.0, < 3.1'],
      ['json', '>= 1.0'],
      ['luafilesystem', '== 1.8.0'],
    ])
  })
})

describe('checkLuaVersion', () => {
  it('accepts a runtime inside the constraint and rejects one outside', () => {
    const project = parseProject('lua = ">= 5.3"\n', 'p')

    expect(() => checkLuaVersion(project, '5.4')).not.toThrow()
    expect(() => checkLuaVersion(project, '5.1')).toThrow(
      "Lua 5.1 does not satisfy the project's lua constraint >= 5.3"
    )
  })

  it('accepts anything without a constraint', () => {
    expect(() => checkLuaVersion(emptyProject('/p'), '5.1')).not.toThrow()
  })
})

describe('loading and saving', () => {
  let dir: string

  beforeEach(async () => {
    silenceLogger()
    dir = await mkdtemp(join(tmpdir(), 'rockyard-project-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('returns undefined without a project file', async () => {
    expect(await loadProject(dir)).toBeUndefined()
  })

  it('writes sorted tables that load back unchanged', async () => {
    const project = {
      ...emptyProject(dir),
      package: 'app',
      dependencies: { zlib: '>= 1.0', argparse: '~> 0.7' },
    }
    await saveProject(project)

    const text = await readFile(join(dir, PROJECT_FILE), 'utf8')
    expect(text.indexOf('argparse')).toBeLessThan(text.indexOf('zlib'))
    expect(text).not.toContain('build_dependencies')
    expect(text.endsWith('"\n')).toBe(true)
    expect(await loadProject(dir)).toEqual({
      ...project,
      version: undefined,
      lua: undefined,
      dependencies: { argparse: '~> 0.7', zlib: '>= 1.0' },
    })
  })

  it('keeps build dependencies when present', async () => {
    await writeFile(join(dir, PROJECT_FILE), TEXT)
    const project = await loadProject(dir)
    expect(project).toBeDefined()
    if (!project) return

    expect(parseProject(serializeProject(project), project.path)).toEqual(project)
  })
})
