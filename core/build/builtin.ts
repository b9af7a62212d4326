/**
 * BuiltinCopy backend
 *
 * Pure-Lua rocks: declared modules are copied to `src/`. With no modules
 * declared, `.lua` files are picked up from `src/`, `lua/` or `lib/`.
 */

import { join, relative, sep } from 'node:path'
import { listFiles } from '../integrity/index.js'
import { logger } from '../logger.js'
import type { BuiltinBuild } from '../rockspec/index.js'
import { collectInstallSection, collectLuaModules, FileCollector, isDirectory } from './collect.js'
import type { BuildBackend } from './types.js'

const AUTODETECT_DIRS = ['src', 'lua', 'lib']
const IGNORED_DIRS = new Set(['spec', 'test', 'tests', '.git'])

/**
 * Module name -> source path for the `.lua` files of an undeclared layout
 */
export async function autodetectModules(sourceDir: string): Promise<Record<string, string>> {
  let base = sourceDir
  for (const dir of AUTODETECT_DIRS) {
    if (await isDirectory(join(sourceDir, dir))) {
      base = join(sourceDir, dir)
      break
    }
  }

  const modules: Record<string, string> = {}
  for (const file of await listFiles(base)) {
    const rel = relative(base, file).split(sep)
    if (!file.endsWith('.lua') || IGNORED_DIRS.has(rel[0])) continue
    const module = rel.join('.').replace(/\.lua$/, '')
    modules[module] = relative(sourceDir, file).split(sep).join('/')
  }
  return modules
}

export const buildBuiltin: BuildBackend<BuiltinBuild> = async (ctx, spec) => {
  const { descriptor, sourceDir } = ctx
  const collector = new FileCollector()

  let modules = spec.modules
  if (Object.keys(modules).length === 0 && spec.autodetect) {
    modules = await autodetectModules(sourceDir)
    logger.debug(`Autodetected ${Object.keys(modules).length} modules for ${descriptor.name}`)
  }

  await collectLuaModules(collector, sourceDir, modules, descriptor.name)
  await collectInstallSection(collector, sourceDir, spec, descriptor.name)
  return collector.toInstalled()
}
