/**
 * Build variables and `$(VAR)` substitution
 */

import { join } from 'node:path'
import type { Platform } from '../config/index.js'
import type { BuildContext } from './types.js'

export type BuildVariables = Record<string, string>

interface Toolchain {
  CC: string
  CFLAGS: string
  LIBFLAG: string
  LIB_EXTENSION: string
  OBJ_EXTENSION: string
}

export function toolchainDefaults(platform: Platform): Toolchain {
  switch (platform) {
    case 'windows':
      return { CC: 'cl', CFLAGS: '/nologo /MD /O2', LIBFLAG: '/nologo /dll', LIB_EXTENSION: 'dll', OBJ_EXTENSION: 'obj' }
    case 'macosx':
      return {
        CC: 'cc',
        CFLAGS: '-O2 -fPIC',
        LIBFLAG: '-bundle -undefined dynamic_lookup -all_load',
        LIB_EXTENSION: 'so',
        OBJ_EXTENSION: 'o',
      }
    default:
      return { CC: 'cc', CFLAGS: '-O2 -fPIC', LIBFLAG: '-shared', LIB_EXTENSION: 'so', OBJ_EXTENSION: 'o' }
  }
}

/**
 * Install prefix inside the scratch dir. Its layout mirrors the rock dir.
 */
export function prefixDir(scratchDir: string): string {
  return join(scratchDir, 'prefix')
}

/**
 * Variables visible to external tools. Paths point into the scratch
 * prefix; configured variables override the toolchain defaults.
 */
export function buildVariables(ctx: BuildContext): BuildVariables {
  const prefix = prefixDir(ctx.scratchDir)
  const vars: BuildVariables = {
    ...toolchainDefaults(ctx.config.platform),
    ...ctx.config.variables,
    PREFIX: prefix,
    LUADIR: join(prefix, 'src'),
    LIBDIR: join(prefix, 'lib'),
    BINDIR: join(prefix, 'bin'),
    CONFDIR: join(prefix, 'conf'),
    DOCDIR: join(prefix, 'doc'),
    LUA: ctx.lua.interpreter,
    LUA_BINDIR: ctx.lua.bindir ?? '',
    LUA_INCDIR: ctx.lua.incdir ?? '',
    LUA_LIBDIR: ctx.lua.libdir ?? '',
    LUA_VERSION: ctx.lua.version,
  }

  for (const [name, info] of Object.entries(ctx.externalDeps)) {
    if (info.dir !== undefined) vars[`${name}_DIR`] = info.dir
    if (info.incdir !== undefined) vars[`${name}_INCDIR`] = info.incdir
    if (info.libdir !== undefined) vars[`${name}_LIBDIR`] = info.libdir
  }
  return vars
}

/**
 * Replace `$(NAME)` references. Unknown names are left as written.
 */
export function substitute(text: string, vars: BuildVariables): string {
  return text.replace(/\$\(([A-Za-z_][A-Za-z0-9_]*)\)/g, (match, name: string) => vars[name] ?? match)
}

export function substituteAll(values: Record<string, string>, vars: BuildVariables): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(values)) {
    out[key] = substitute(value, vars)
  }
  return out
}

/**
 * Whitespace-separated flags
 */
export function splitFlags(text: string): string[] {
  return text.split(/\s+/).filter((flag) => flag !== '')
}
