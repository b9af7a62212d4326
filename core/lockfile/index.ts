/**
 * Lockfile
 *
 * @module core/lockfile
 */

export type {
  LockHashes,
  LockEntry,
  LockData,
  LoadResult,
  LockDiff,
  LockRecord,
  SyncPlan,
  LockValidation,
} from './types.js'
export { LOCKFILE_NAME, LOCKFILE_VERSION } from './types.js'

export {
  load,
  save,
  parseLockData,
  serialize,
  emptyLock,
  sourceLocator,
  fromGraph,
  diff,
  lockedVersions,
  pinnedNames,
  verifyEntry,
  setPinned,
  syncPlan,
  validate,
} from './lockfile.js'
