/**
 * Source archives served by an in-process fetch
 */

import { gzipSync } from 'node:zlib'
import { packTar } from '../../core/source/index.js'

export function sourceUrl(name: string, version: string): string {
  return `https://rocks.test/${name}-${version}.tar.gz`
}

/**
 * `.tar.gz` with every file under `<name>-<version>/`. Defaults to one
 * module, `<name>.lua`.
 */
export function sourceArchive(name: string, version: string, files?: Record<string, string>): Uint8Array {
  const contents = files ?? { [`${name}.lua`]: `return "${name} ${version}"` }
  return gzipSync(
    packTar(Object.entries(contents).map(([path, data]) => ({ path: `${name}-${version}/${path}`, data })))
  )
}

export interface ArchiveServer {
  fetch: typeof fetch
  /** URLs in request order */
  requests: string[]
  /** Called before each response; may delay or abort */
  before?: (url: string) => Promise<void> | void
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input
  return input instanceof URL ? input.href : input.url
}

export function archiveServer(archives: Map<string, Uint8Array>): ArchiveServer {
  const server: ArchiveServer = {
    requests: [],
    fetch: async (input) => {
      const url = urlOf(input)
      server.requests.push(url)
      await server.before?.(url)
      const bytes = archives.get(url)
      return bytes ? new Response(bytes) : new Response('not found', { status: 404 })
    },
  }
  return server
}

/**
 * Archives for `name -> versions`, at the default rockspec source URLs
 */
export function archivesFor(rocks: Record<string, string[]>): Map<string, Uint8Array> {
  const archives = new Map<string, Uint8Array>()
  for (const [name, versions] of Object.entries(rocks)) {
    for (const version of versions) {
      archives.set(sourceUrl(name, version), sourceArchive(name, version))
    }
  }
  return archives
}
