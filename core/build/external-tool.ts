/**
 * ExternalTool backend: make, cmake, or shell commands
 *
 * Tools install into the scratch prefix; whatever lands there becomes the
 * rock's files.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { logger } from '../logger.js'
import { runChecked } from '../process/index.js'
import type { CMakeBuild, CommandBuild, ExternalToolBuild, MakeBuild } from '../rockspec/index.js'
import { collectInstallSection, FileCollector } from './collect.js'
import { LAYOUT_DIRS, type BuildBackend, type BuildContext } from './types.js'
import { buildVariables, prefixDir, substitute, substituteAll, type BuildVariables } from './variables.js'

function assignments(values: Record<string, string>): string[] {
  return Object.entries(values).map(([key, value]) => `${key}=${value}`)
}

async function runMake(ctx: BuildContext, spec: MakeBuild, vars: BuildVariables): Promise<void> {
  const run = (args: string[]) => runChecked(ctx.runner, 'make', args, { cwd: ctx.sourceDir, signal: ctx.signal })
  const makefile = spec.makefile !== undefined ? ['-f', substitute(spec.makefile, vars)] : []
  const common = substituteAll(spec.variables, vars)

  if (spec.buildPass) {
    const target = spec.buildTarget !== '' ? [substitute(spec.buildTarget, vars)] : []
    await run([...makefile, ...target, ...assignments({ ...common, ...substituteAll(spec.buildVariables, vars) })])
  }
  if (spec.installPass) {
    const target = spec.installTarget !== '' ? [substitute(spec.installTarget, vars)] : []
    await run([...makefile, ...target, ...assignments({ ...common, ...substituteAll(spec.installVariables, vars) })])
  }
}

async function runCMake(ctx: BuildContext, spec: CMakeBuild, vars: BuildVariables): Promise<void> {
  const run = (args: string[]) => runChecked(ctx.runner, 'cmake', args, { cwd: ctx.sourceDir, signal: ctx.signal })
  const buildDir = join(ctx.scratchDir, 'cmake-build')

  if (spec.cmakeLists !== undefined) {
    await writeFile(join(ctx.sourceDir, 'CMakeLists.txt'), spec.cmakeLists)
  }

  const defines = Object.entries(substituteAll(spec.variables, vars)).map(([key, value]) => `-D${key}=${value}`)
  await run([
    '-S',
    '.',
    '-B',
    buildDir,
    `-DCMAKE_INSTALL_PREFIX=${vars.PREFIX}`,
    '-DCMAKE_BUILD_TYPE=Release',
    ...defines,
  ])
  if (spec.buildPass) {
    await run(['--build', buildDir, '--config', 'Release'])
  }
  if (spec.installPass) {
    await run(['--install', buildDir, '--config', 'Release'])
  }
}

async function runCommands(ctx: BuildContext, spec: CommandBuild, vars: BuildVariables): Promise<void> {
  const windows = ctx.config.platform === 'windows'
  const shell = windows ? 'cmd' : 'sh'
  const flag = windows ? '/c' : '-c'

  for (const command of [spec.buildCommand, spec.installCommand]) {
    if (command === undefined || command.trim() === '') continue
    await runChecked(ctx.runner, shell, [flag, substitute(command, vars)], {
      cwd: ctx.sourceDir,
      signal: ctx.signal,
    })
  }
}

export const buildExternalTool: BuildBackend<ExternalToolBuild> = async (ctx, spec) => {
  const vars = buildVariables(ctx)
  const prefix = prefixDir(ctx.scratchDir)
  for (const dir of LAYOUT_DIRS) {
    await mkdir(join(prefix, dir), { recursive: true })
  }

  logger.debug(`Running ${spec.tool} build for ${ctx.descriptor.name}`)
  switch (spec.tool) {
    case 'make':
      await runMake(ctx, spec, vars)
      break
    case 'cmake':
      await runCMake(ctx, spec, vars)
      break
    case 'command':
      await runCommands(ctx, spec, vars)
      break
  }

  const collector = new FileCollector()
  await collector.addPrefix(prefix)
  await collectInstallSection(collector, ctx.sourceDir, spec, ctx.descriptor.name)
  return collector.toInstalled()
}
