/**
 * CLI utilities - barrel export
 */

export { formatFailure, formatLockDiff, formatVersionChanges, formatInstallReport, formatPinned } from './format.js'
export { formatError, missingArgumentError, unknownCommandError, getErrorMessage } from './errors.js'
export { stringOption, integerOption, booleanOption, configOverrides } from './options.js'
