/**
 * Package descriptor types
 *
 * A PackageDescriptor is the parsed, platform-resolved form of a rockspec.
 * Descriptors are frozen once created.
 */

import type { Constraint, Version } from '../version/index.js'
import type { DependencySpec, PackageName } from './name.js'

// =============================================================================
// Source
// =============================================================================

interface SourceBase {
  /** Directory inside the unpacked source that holds the rock */
  dir?: string
  /** SRI digest the rockspec pins for the archive */
  integrity?: string
}

export interface UrlSource extends SourceBase {
  kind: 'url'
  url: string
}

export interface GitSource extends SourceBase {
  kind: 'git'
  url: string
  /** Tag, branch or commit */
  ref?: string
}

export interface FileSource extends SourceBase {
  kind: 'file'
  path: string
}

export type SourceSpec = UrlSource | GitSource | FileSource

// =============================================================================
// Build
// =============================================================================

/**
 * `build.install` maps: destination (module name or file name) -> source path
 */
export interface InstallSpec {
  lua: Record<string, string>
  lib: Record<string, string>
  bin: Record<string, string>
  conf: Record<string, string>
}

interface BuildBase {
  install: InstallSpec
  copyDirectories: string[]
  /** Patch file name -> unified diff text */
  patches: Record<string, string>
}

export interface NativeModule {
  /** Dotted module name, e.g. `socket.core` */
  name: string
  sources: string[]
  libraries: string[]
  defines: string[]
  incdirs: string[]
  libdirs: string[]
}

export interface BuiltinBuild extends BuildBase {
  kind: 'builtin'
  /** Dotted module name -> `.lua` source path */
  modules: Record<string, string>
  /** Look for modules under src/, lua/ and lib/ when none are declared */
  autodetect: boolean
}

export interface CompiledExtensionBuild extends BuildBase {
  kind: 'compiled-extension'
  modules: Record<string, string>
  nativeModules: NativeModule[]
}

export interface MakeBuild extends BuildBase {
  kind: 'external-tool'
  tool: 'make'
  makefile?: string
  buildTarget: string
  buildPass: boolean
  installTarget: string
  installPass: boolean
  buildVariables: Record<string, string>
  installVariables: Record<string, string>
  variables: Record<string, string>
}

export interface CMakeBuild extends BuildBase {
  kind: 'external-tool'
  tool: 'cmake'
  /** Inline CMakeLists.txt content written before configuring */
  cmakeLists?: string
  buildPass: boolean
  installPass: boolean
  variables: Record<string, string>
}

export interface CommandBuild extends BuildBase {
  kind: 'external-tool'
  tool: 'command'
  buildCommand?: string
  installCommand?: string
}

export type ExternalToolBuild = MakeBuild | CMakeBuild | CommandBuild

export interface UserScriptBuild extends BuildBase {
  kind: 'user-script'
  /** Lua file, relative to the source dir */
  script: string
  /** Milliseconds; falls back to the configured script timeout */
  timeout?: number
}

export interface UnsupportedBuild {
  kind: 'unsupported'
  type: string
}

export type BuildSpec =
  | BuiltinBuild
  | CompiledExtensionBuild
  | ExternalToolBuild
  | UserScriptBuild
  | UnsupportedBuild

export type BuildKind = BuildSpec['kind']

// =============================================================================
// Descriptor
// =============================================================================

/**
 * How to find a system library or header
 */
export interface ExternalDependencySpec {
  header?: string
  library?: string
}

export interface DescriptionSpec {
  summary?: string
  detailed?: string
  homepage?: string
  license?: string
}

export interface PackageDescriptor {
  name: PackageName
  version: Version
  rockspecFormat?: string
  dependencies: DependencySpec[]
  /** Constraint on the `lua` runtime itself, split out of dependencies */
  luaConstraint?: Constraint
  buildDependencies: DependencySpec[]
  testDependencies: DependencySpec[]
  externalDependencies: Record<string, ExternalDependencySpec>
  supportedPlatforms: string[]
  source: SourceSpec
  build: BuildSpec
  description: DescriptionSpec
  /** Rockspec text the descriptor was parsed from */
  rockspec: string
}
