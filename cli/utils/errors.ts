/**
 * Error formatting utilities for CLI
 */

import { isRockError } from '../../core/errors/index.js'

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

/**
 * Format: rockyard <command>: <message> [CODE]
 */
export function formatError(command: string, err: unknown): string {
  const code = isRockError(err) ? ` [${err.code}]` : ''
  return `rockyard ${command}: ${getErrorMessage(err)}${code}`
}

export function missingArgumentError(command: string, argName: string): string {
  return `rockyard ${command}: missing ${argName} argument`
}

export function unknownCommandError(command: string): string {
  return `rockyard: unknown command '${command}'`
}
