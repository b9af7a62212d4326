/**
 * Rockspec text builders for tests
 */

import { MemoryRegistry } from '../../core/backend.js'

export interface RockFixture {
  dependencies?: string[]
  buildDependencies?: string[]
  platforms?: string[]
  source?: string
  build?: string
}

export function rockspec(name: string, version: string, fixture: RockFixture = {}): string {
  const lines = [
    `package = "${name}"`,
    `version = "${version}"`,
    `source = ${fixture.source ?? `{ url = "https://rocks.test/${name}-${version}.tar.gz" }`}`,
  ]
  if (fixture.dependencies) {
    lines.push(`dependencies = { ${fixture.dependencies.map((d) => `"${d}"`).join(', ')} }`)
  }
  if (fixture.buildDependencies) {
    lines.push(`build_dependencies = { ${fixture.buildDependencies.map((d) => `"${d}"`).join(', ')} }`)
  }
  if (fixture.platforms) {
    lines.push(`supported_platforms = { ${fixture.platforms.map((p) => `"${p}"`).join(', ')} }`)
  }
  lines.push(`build = ${fixture.build ?? `{ type = "builtin", modules = { ["${name}"] = "${name}.lua" } }`}`)
  return `${lines.join('\n')}\n`
}

/**
 * Registry seeded from `name -> version -> fixture`
 */
export function registryOf(rocks: Record<string, Record<string, RockFixture>>): MemoryRegistry {
  const registry = new MemoryRegistry()
  for (const [name, versions] of Object.entries(rocks)) {
    for (const [version, fixture] of Object.entries(versions)) {
      registry.addRockspec(rockspec(name, version, fixture))
    }
  }
  return registry
}
