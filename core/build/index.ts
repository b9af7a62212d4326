/**
 * Build backends
 *
 * `dispatchBuild` picks the backend for a descriptor's build spec and adds
 * the rockspec itself to the installed files.
 *
 * @module core/build
 */

import type { Config } from '../config/index.js'
import { UnsupportedBuildTypeError } from '../errors/index.js'
import type { BuildSpec } from '../rockspec/index.js'
import { buildBuiltin } from './builtin.js'
import { rockspecFile } from './collect.js'
import { buildCompiled } from './compiled.js'
import { buildExternalTool } from './external-tool.js'
import type { BuildContext, InstalledFiles, LuaRuntime } from './types.js'
import { buildUserScript } from './user-script.js'

export type {
  BuildBackend,
  BuildContext,
  ExternalDependencyInfo,
  InstalledFile,
  InstalledFiles,
  LayoutDir,
  LuaRuntime,
} from './types.js'
export { LAYOUT_DIRS } from './types.js'
export { buildVariables, substitute, substituteAll, toolchainDefaults, prefixDir, splitFlags } from './variables.js'
export type { BuildVariables } from './variables.js'
export { FileCollector, luaModulePath, libModulePath, rockspecFile } from './collect.js'
export { LuaInstallation, LUA_RELEASES, headerVersion, type DetectLuaOptions } from './lua-installation.js'
export { probeExternalDependencies, probeExternalDependency, type ProbeOptions } from './external-deps.js'
export { buildBuiltin, autodetectModules } from './builtin.js'
export { buildCompiled } from './compiled.js'
export { buildExternalTool } from './external-tool.js'
export { buildUserScript, sandboxPrelude, luaString, INSTALL_MANIFEST } from './user-script.js'

/**
 * Whether a build needs Lua headers and libraries
 */
export function needsLuaHeaders(spec: BuildSpec): boolean {
  return spec.kind === 'compiled-extension' || spec.kind === 'external-tool'
}

/**
 * Runtime description for builds that only need the interpreter
 */
export function interpreterRuntime(config: Config): LuaRuntime {
  return { version: config.luaVersion, interpreter: config.luaInterpreter, origin: 'interpreter' }
}

export async function dispatchBuild(ctx: BuildContext): Promise<InstalledFiles> {
  const { descriptor } = ctx
  const spec = descriptor.build
  let installed: InstalledFiles

  switch (spec.kind) {
    case 'builtin':
      installed = await buildBuiltin(ctx, spec)
      break
    case 'compiled-extension':
      installed = await buildCompiled(ctx, spec)
      break
    case 'external-tool':
      installed = await buildExternalTool(ctx, spec)
      break
    case 'user-script':
      installed = await buildUserScript(ctx, spec)
      break
    case 'unsupported':
      throw new UnsupportedBuildTypeError(spec.type, descriptor.name)
  }

  return { files: [...installed.files, rockspecFile(descriptor)], binaries: installed.binaries }
}
