/**
 * CLI utilities
 */

export { formatDate, displayName, formatLsOutput, formatObject } from './format.js'
export { formatError, missingArgumentError, unknownCommandError } from './errors.js'
