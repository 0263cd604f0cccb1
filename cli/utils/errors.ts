/**
 * Error formatting utilities for CLI
 */

import { getErrorMessage } from '../../core/errors.js'

/**
 * Format error for CLI output
 *
 * Format: drivepath <command>: <message>
 */
export function formatError(command: string, err: unknown): string {
  return `drivepath ${command}: ${getErrorMessage(err)}`
}

/**
 * Create a missing argument error message
 */
export function missingArgumentError(command: string, argName: string): string {
  return `drivepath ${command}: missing ${argName} argument`
}

/**
 * Create an unknown command error message
 */
export function unknownCommandError(command: string): string {
  return `drivepath: unknown command '${command}'`
}
