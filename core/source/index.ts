/**
 * Source fetching and archive handling
 *
 * @module core/source
 */

export { fetchSource, download, type DownloadOptions, type FetchSourceOptions, type FetchedSource } from './fetch.js'
export { extractArchive, detectFormat, readZip, type ArchiveFormat, type ExtractOptions } from './archive.js'
export { readTar, packTar, parsePaxHeaders, type TarEntry, type TarEntryType, type TarInput } from './tar.js'
