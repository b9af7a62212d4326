/**
 * CompiledExtension backend
 *
 * Each native module is compiled source by source with `$(CC) -c`, then
 * linked into `lib/<module path>.<ext>`. Lua modules in the same spec are
 * copied as for builtin builds.
 */

import { mkdir } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import { AbortedError, CompileError, HeaderNotFoundError, MissingFileError } from '../errors/index.js'
import { logger } from '../logger.js'
import type { CompiledExtensionBuild, NativeModule } from '../rockspec/index.js'
import { collectInstallSection, collectLuaModules, FileCollector, isFile, libModulePath } from './collect.js'
import type { BuildBackend, BuildContext } from './types.js'
import { buildVariables, splitFlags, substitute, type BuildVariables } from './variables.js'

async function compileModule(
  ctx: BuildContext,
  module: NativeModule,
  vars: BuildVariables,
  collector: FileCollector
): Promise<void> {
  const { descriptor, sourceDir, runner, signal } = ctx
  const cc = vars.CC
  const objDir = join(ctx.scratchDir, 'obj', module.name)
  await mkdir(objDir, { recursive: true })

  if (ctx.lua.incdir === undefined) {
    throw new HeaderNotFoundError(ctx.lua.version)
  }
  const includes = [
    ctx.lua.incdir,
    ...module.incdirs.map((dir) => join(sourceDir, substitute(dir, vars))),
    ...Object.values(ctx.externalDeps).flatMap((dep) => (dep.incdir !== undefined ? [dep.incdir] : [])),
  ]
  const compileFlags = [
    ...splitFlags(vars.CFLAGS),
    ...includes.map((dir) => `-I${dir}`),
    ...module.defines.map((define) => `-D${substitute(define, vars)}`),
  ]

  const objects: string[] = []
  for (const [index, source] of module.sources.entries()) {
    if (!(await isFile(join(sourceDir, source)))) {
      throw new MissingFileError(source, descriptor.name)
    }
    const object = join(objDir, `${index}-${basename(source, extname(source))}.${vars.OBJ_EXTENSION}`)
    const result = await runner.run(cc, [...compileFlags, '-c', source, '-o', object], { cwd: sourceDir, signal })
    if (result.aborted) throw new AbortedError(descriptor.name)
    if (result.exitCode !== 0) {
      throw new CompileError(`Compiling ${source} for ${module.name} failed`, result.output, descriptor.name)
    }
    objects.push(object)
  }

  const target = join(ctx.scratchDir, 'lib', libModulePath(module.name, vars.LIB_EXTENSION))
  await mkdir(dirname(target), { recursive: true })

  const libdirs = [
    ...(ctx.lua.libdir !== undefined ? [ctx.lua.libdir] : []),
    ...module.libdirs.map((dir) => join(sourceDir, substitute(dir, vars))),
    ...Object.values(ctx.externalDeps).flatMap((dep) => (dep.libdir !== undefined ? [dep.libdir] : [])),
  ]
  const linkArgs = [
    ...splitFlags(vars.LIBFLAG),
    '-o',
    target,
    ...objects,
    ...libdirs.map((dir) => `-L${dir}`),
    ...module.libraries.map((lib) => `-l${substitute(lib, vars)}`),
  ]
  const linked = await runner.run(cc, linkArgs, { cwd: sourceDir, signal })
  if (linked.aborted) throw new AbortedError(descriptor.name)
  if (linked.exitCode !== 0) {
    throw new CompileError(`Linking ${module.name} failed`, linked.output, descriptor.name)
  }

  logger.debug(`Built native module ${module.name} for ${descriptor.name}`)
  collector.add({ path: `lib/${libModulePath(module.name, vars.LIB_EXTENSION)}`, from: target })
}

export const buildCompiled: BuildBackend<CompiledExtensionBuild> = async (ctx, spec) => {
  const { descriptor, sourceDir } = ctx
  const vars = buildVariables(ctx)
  const collector = new FileCollector()

  await collectLuaModules(collector, sourceDir, spec.modules, descriptor.name)
  for (const module of spec.nativeModules) {
    await compileModule(ctx, module, vars, collector)
  }
  await collectInstallSection(collector, sourceDir, spec, descriptor.name)
  return collector.toInstalled()
}
