/**
 * LuaRocks Registry Client
 *
 * Fetch-based HTTP client for LuaRocks-compatible servers.
 *
 * @module core/registry
 */

export { RegistryClient, type RegistryClientOptions } from './client.js'
export { parseManifest, type Manifest } from './manifest.js'
export { MemoryRegistry, type ManifestClient, type MemoryRegistryOptions } from '../backend.js'
