/**
 * Build backend types
 */

import type { Config } from '../config/index.js'
import type { CommandRunner } from '../process/index.js'
import type { BuildSpec, PackageDescriptor } from '../rockspec/index.js'

/**
 * Top-level directories of an installed rock
 */
export const LAYOUT_DIRS = ['src', 'lib', 'bin', 'conf', 'doc', 'etc'] as const
export type LayoutDir = (typeof LAYOUT_DIRS)[number]

/**
 * Headers, libraries and interpreter of the target Lua
 */
export interface LuaRuntime {
  /** `5.1` … `5.4` */
  version: string
  /** Absent when no native build asked for headers */
  incdir?: string
  libdir?: string
  bindir?: string
  interpreter: string
  /** Where the headers were found */
  origin: 'config' | 'cache' | 'pkg-config' | 'prefix' | 'download' | 'interpreter'
}

export interface ExternalDependencyInfo {
  dir?: string
  incdir?: string
  libdir?: string
}

export interface BuildContext {
  descriptor: PackageDescriptor
  /** Unpacked, patched sources */
  sourceDir: string
  /** Private to this build; nothing is written outside it */
  scratchDir: string
  lua: LuaRuntime
  /** Probed `external_dependencies`, by upper-case name */
  externalDeps: Record<string, ExternalDependencyInfo>
  config: Config
  runner: CommandRunner
  signal?: AbortSignal
}

/**
 * One file of the installed rock, relative to the rock directory
 */
export type InstalledFile =
  | { path: string; from: string; mode?: number }
  | { path: string; contents: Uint8Array; mode?: number }

export interface InstalledFiles {
  files: InstalledFile[]
  /** Commands to expose in the tree's shared bin dir */
  binaries: string[]
}

/**
 * Common contract of every build backend
 */
export type BuildBackend<S extends BuildSpec> = (ctx: BuildContext, spec: S) => Promise<InstalledFiles>
