/**
 * Output formatting utilities for CLI
 */

import type { InstallFailure, InstallReport } from '../../core/install/index.js'
import type { LockDiff, LockEntry } from '../../core/lockfile/index.js'

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/**
 * One line per failed rock
 */
export function formatFailure(failure: InstallFailure): string {
  return `failed ${failure.name}@${failure.version} (${failure.code}): ${failure.message}`
}

/**
 * Lockfile changes, e.g. `added 2 rocks, updated 1 rock`
 */
export function formatLockDiff(diff: LockDiff): string {
  const parts: string[] = []
  if (diff.added.length > 0) {
    parts.push(`added ${plural(diff.added.length, 'rock')}`)
  }
  if (diff.removed.length > 0) {
    parts.push(`removed ${plural(diff.removed.length, 'rock')}`)
  }
  if (diff.changed.length > 0) {
    parts.push(`updated ${plural(diff.changed.length, 'rock')}`)
  }

  if (parts.length === 0) {
    return 'up to date'
  }
  return parts.join(', ')
}

/**
 * Changed versions, one per line: `lpeg 1.0-1 -> 1.1-1`
 */
export function formatVersionChanges(diff: LockDiff): string[] {
  return [
    ...diff.added.map((entry) => `+ ${entry.name} ${entry.version}`),
    ...diff.changed.map((entry) => `  ${entry.name} ${entry.from} -> ${entry.to}`),
    ...diff.removed.map((entry) => `- ${entry.name} ${entry.version}`),
  ]
}

/**
 * Summary of a successful install
 */
export function formatInstallReport(report: InstallReport): string {
  const lines = report.diff ? formatVersionChanges(report.diff) : []
  const built = `built ${plural(report.built.length, 'rock')}, ${report.skipped.length} up to date`
  lines.push(report.diff ? `${formatLockDiff(report.diff)}; ${built}` : built)
  return lines.join('\n')
}

export function formatPinned(name: string, entry: LockEntry): string {
  return `${entry.pinned ? 'pinned' : 'unpinned'} ${name}@${entry.version}`
}
