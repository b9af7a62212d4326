/**
 * Rockspec parsing and package names
 */

export type {
  PackageDescriptor,
  SourceSpec,
  UrlSource,
  GitSource,
  FileSource,
  BuildSpec,
  BuildKind,
  BuiltinBuild,
  CompiledExtensionBuild,
  ExternalToolBuild,
  MakeBuild,
  CMakeBuild,
  CommandBuild,
  UserScriptBuild,
  UnsupportedBuild,
  NativeModule,
  InstallSpec,
  ExternalDependencySpec,
  DescriptionSpec,
} from './types.js'

export {
  parsePackageName,
  normalizePackageName,
  isValidPackageName,
  parseDependency,
} from './name.js'
export type { PackageName, ParsedPackageName, DependencySpec } from './name.js'

export {
  parseRockspec,
  supportsPlatform,
  applyPlatformOverrides,
  platformNames,
} from './parser.js'
export type { ParseRockspecOptions } from './parser.js'

export { evaluateLua, decodeLuaString, LuaTable, isTable } from './lua-table.js'
export type { LuaValue, LuaKey } from './lua-table.js'
