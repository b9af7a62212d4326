/**
 * UserScript backend
 *
 * Runs `build.script` in the Lua interpreter behind a prelude that removes
 * process control, C and bytecode loading, the debug library and file
 * access outside the source and target dirs. `install(src, dest)` calls
 * are recorded in a manifest and copied once the script exits.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { isAbsolute, join, normalize, relative, resolve, sep } from 'node:path'
import { AbortedError, MissingFileError, ScriptError, ScriptTimeoutError } from '../errors/index.js'
import { logger } from '../logger.js'
import type { UserScriptBuild } from '../rockspec/index.js'
import { collectInstallSection, FileCollector, isFile } from './collect.js'
import { LAYOUT_DIRS, type BuildBackend } from './types.js'
import { prefixDir } from './variables.js'

export const INSTALL_MANIFEST = '.install-manifest'

/**
 * Lua string literal
 */
export function luaString(value: string): string {
  return `"${value.replace(/[\\"\n\r\0]/g, (c) => {
    switch (c) {
      case '\n':
        return '\\n'
      case '\r':
        return '\\r'
      case '\0':
        return '\\0'
      default:
        return `\\${c}`
    }
  })}"`
}

export interface PreludeOptions {
  sourceDir: string
  targetDir: string
  luaVersion: string
  script: string
}

export function sandboxPrelude(options: PreludeOptions): string {
  return `local SOURCE_DIR = ${luaString(options.sourceDir)}
local TARGET_DIR = ${luaString(options.targetDir)}
local SCRIPT = ${luaString(options.script)}
local MANIFEST = TARGET_DIR .. "/${INSTALL_MANIFEST}"

local real_open, real_lines = io.open, io.lines
local real_input, real_output = io.input, io.output
local real_remove, real_rename = os.remove, os.rename
local real_load, real_loadstring = load, loadstring
local load_script = loadfile

local function normalize(path)
  if path:sub(1, 1) ~= "/" then path = SOURCE_DIR .. "/" .. path end
  local parts = {}
  for part in path:gmatch("[^/]+") do
    if part == ".." then table.remove(parts) elseif part ~= "." then parts[#parts + 1] = part end
  end
  return "/" .. table.concat(parts, "/")
end

local function within(path, root)
  return path == root or path:sub(1, #root + 1) == root .. "/"
end

local function checked(path)
  local full = normalize(tostring(path))
  if not (within(full, SOURCE_DIR) or within(full, TARGET_DIR)) then
    error("sandbox: " .. tostring(path) .. " is outside the build directories", 3)
  end
  return full
end

local function text_only(chunk)
  if type(chunk) == "string" and chunk:byte(1) == 27 then
    error("sandbox: binary chunks are not allowed", 3)
  end
end

io.open = function(path, mode) return real_open(checked(path), mode) end
io.lines = function(path, ...)
  if path == nil then return real_lines() end
  return real_lines(checked(path), ...)
end
-- A file name is checked; handles and queries pass through
io.input = function(file)
  if type(file) == "string" then return real_input(checked(file)) end
  return real_input(file)
end
io.output = function(file)
  if type(file) == "string" then return real_output(checked(file)) end
  return real_output(file)
end
os.remove = function(path) return real_remove(checked(path)) end
os.rename = function(from, to) return real_rename(checked(from), checked(to)) end
load = function(chunk, ...)
  text_only(chunk)
  return real_load(chunk, ...)
end
if real_loadstring then
  loadstring = function(chunk, ...)
    text_only(chunk)
    return real_loadstring(chunk, ...)
  end
end

os.execute = nil
os.exit = nil
os.tmpname = nil
io.popen = nil
loadfile = nil
dofile = nil
debug = nil
package.loaded.debug = nil
string.dump = nil
package.loadlib = nil
package.cpath = ""

-- Lua modules come from the source dir only, whatever package.path says later
local LUA_PATH = SOURCE_DIR .. "/?.lua;" .. SOURCE_DIR .. "/?/init.lua"
package.path = LUA_PATH
local searchers = package.searchers or package.loaders
searchers[2] = function(name)
  local file = name:gsub("%.", "/")
  local tried = {}
  for template in LUA_PATH:gmatch("[^;]+") do
    local path = (template:gsub("%?", function() return file end))
    local handle = real_open(path, "r")
    if handle then
      handle:close()
      local chunk, err = load_script(path, "t")
      if not chunk then error(err, 2) end
      return chunk, path
    end
    tried[#tried + 1] = "\\n\\tno file '" .. path .. "'"
  end
  return table.concat(tried)
end
searchers[3] = nil
searchers[4] = nil

function install(src, dest)
  local from = checked(src)
  if type(dest) ~= "string" or dest:sub(1, 1) == "/" or dest:find("%.%.") then
    error("install: invalid destination " .. tostring(dest), 2)
  end
  local manifest = assert(real_open(MANIFEST, "a"))
  manifest:write(from, "\\t", dest, "\\n")
  manifest:close()
end

_G.SOURCE_DIR = SOURCE_DIR
_G.TARGET_DIR = TARGET_DIR
_G.LUA_VERSION = ${luaString(options.luaVersion)}

local chunk, err = load_script(SCRIPT, "t")
if not chunk then error(err, 0) end
chunk()
`
}

function toPosix(path: string): string {
  return path.split(sep).join('/')
}

/**
 * `src\tdest` lines written by `install()`
 */
async function readManifest(path: string): Promise<Array<{ from: string; dest: string }>> {
  if (!(await isFile(path))) return []
  const text = await readFile(path, 'utf8')
  return text
    .split('\n')
    .filter((line) => line !== '')
    .map((line) => {
      const tab = line.indexOf('\t')
      return { from: line.slice(0, tab), dest: line.slice(tab + 1) }
    })
}

export const buildUserScript: BuildBackend<UserScriptBuild> = async (ctx, spec) => {
  const { descriptor, runner, signal } = ctx
  const sourceDir = resolve(ctx.sourceDir)
  const targetDir = resolve(prefixDir(ctx.scratchDir))
  for (const dir of LAYOUT_DIRS) {
    await mkdir(join(targetDir, dir), { recursive: true })
  }

  const script = join(sourceDir, spec.script)
  if (!(await isFile(script))) {
    throw new MissingFileError(spec.script, descriptor.name)
  }

  const preludePath = join(ctx.scratchDir, 'sandbox.lua')
  await writeFile(
    preludePath,
    sandboxPrelude({ sourceDir, targetDir, luaVersion: ctx.lua.version, script })
  )

  const timeout = spec.timeout ?? ctx.config.scriptTimeout
  logger.debug(`Running build script ${spec.script} for ${descriptor.name}`)
  const result = await runner.run(ctx.lua.interpreter, [preludePath], { cwd: sourceDir, timeout, signal })

  if (result.aborted) throw new AbortedError(descriptor.name)
  if (result.timedOut) throw new ScriptTimeoutError(timeout, descriptor.name)
  if (result.exitCode !== 0) {
    const message = result.stderr.trim() || `exited with code ${result.exitCode}`
    throw new ScriptError(`Build script ${spec.script} failed: ${message}`, descriptor.name)
  }

  const collector = new FileCollector()
  const manifestPath = join(targetDir, INSTALL_MANIFEST)
  await collector.addPrefix(targetDir, new Set([INSTALL_MANIFEST]))

  for (const { from, dest } of await readManifest(manifestPath)) {
    const rel = relative(sourceDir, from)
    const inside = !rel.startsWith('..') && !isAbsolute(rel)
    if (!inside && relative(targetDir, from).startsWith('..')) {
      throw new ScriptError(`install: ${from} is outside the build directories`, descriptor.name)
    }
    if (!(await isFile(from))) {
      throw new MissingFileError(from, descriptor.name)
    }
    const path = toPosix(normalize(dest))
    const top = path.split('/')[0]
    if (top === 'bin') {
      collector.addBinary(path.slice('bin/'.length), from)
    } else {
      collector.add({ path: LAYOUT_DIRS.some((dir) => dir === top) ? path : `etc/${path}`, from })
    }
  }

  await collectInstallSection(collector, ctx.sourceDir, spec, descriptor.name)
  return collector.toInstalled()
}
