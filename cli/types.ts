/**
 * CLI Types for drivepath
 */

import type { DrivePath } from '../core/drive-path.js'

/**
 * Result of executing a CLI command
 */
export interface CommandResult {
  exitCode: number
  output?: string
  error?: string
}

/**
 * What a command needs to know to build its drive
 */
export interface DriveFactoryOptions {
  /** Use an empty in-memory store instead of the remote service */
  memory: boolean
}

/**
 * CLI context for dependency injection
 */
export interface CLIContext {
  /** Called once per command, after argument checks pass */
  createDrive: (options: DriveFactoryOptions) => DrivePath
  stdout: (text: string) => void
  stderr: (text: string) => void
}

/**
 * Options for ls output formatting
 */
export interface LsFormatOptions {
  long?: boolean
}
