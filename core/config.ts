/**
 * drivepath Configuration Module
 *
 * Configuration is validated, normalized, and frozen for immutability.
 *
 * @module core/config
 */

import {
  CACHE_TTL_MS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  ROOT_ID,
  TMP_FOLDER,
} from './constants.js'
import { EINVAL } from './errors.js'
import { canonicalPath } from './path.js'

/**
 * Retry settings for remote calls
 */
export interface RetryConfig {
  /** Total attempts per remote call, including the first */
  readonly maxAttempts: number
  /** Step of the linear backoff in milliseconds */
  readonly baseDelayMs: number
}

/**
 * drivepath configuration
 */
export interface DrivePathConfig {
  /** Id of the root folder; the store resolves it without traversal */
  readonly rootId: string

  /** Folder (relative to the root) that holds uploads before they are moved into place */
  readonly tmpFolder: string

  /** Lifetime of cached resolutions in milliseconds */
  readonly cacheTtlMs: number

  readonly retry: RetryConfig
}

/**
 * Configuration options (partial, for user input)
 */
export interface DrivePathConfigOptions {
  rootId?: string
  tmpFolder?: string
  cacheTtlMs?: number
  retry?: Partial<RetryConfig>
}

/**
 * Default configuration values
 */
export const defaultConfig: DrivePathConfig = Object.freeze({
  rootId: ROOT_ID,
  tmpFolder: TMP_FOLDER,
  cacheTtlMs: CACHE_TTL_MS,
  retry: Object.freeze({
    maxAttempts: RETRY_MAX_ATTEMPTS,
    baseDelayMs: RETRY_BASE_DELAY_MS,
  }),
})

function validateRootId(rootId: unknown): string {
  if (typeof rootId !== 'string' || rootId.trim() === '') {
    throw new EINVAL('createConfig', 'rootId', undefined, 'rootId must be a non-empty string')
  }
  return rootId
}

function validateTmpFolder(tmpFolder: unknown): string {
  const folder = typeof tmpFolder === 'string' ? canonicalPath(tmpFolder) : ''
  if (folder === '') {
    throw new EINVAL('createConfig', 'tmpFolder', undefined, 'tmpFolder must name a folder below the root')
  }
  return folder
}

function validateDuration(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new EINVAL('createConfig', name, undefined, `${name} must be a finite number >= 0`)
  }
  return value
}

function validateAttempts(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new EINVAL('createConfig', 'retry.maxAttempts', undefined, 'retry.maxAttempts must be an integer >= 1')
  }
  return value
}

/**
 * Create a new drivepath configuration
 *
 * Any invalid option throws EINVAL.
 *
 * @throws {EINVAL} If any option is invalid
 *
 * @example
 * ```typescript
 * const config = createConfig({ tmpFolder: '/staging/', cacheTtlMs: 0 })
 * config.tmpFolder  // 'staging'
 * ```
 */
export function createConfig(options: DrivePathConfigOptions = {}): DrivePathConfig {
  const retry = options.retry ?? {}
  const config: DrivePathConfig = {
    rootId: options.rootId !== undefined ? validateRootId(options.rootId) : defaultConfig.rootId,
    tmpFolder: options.tmpFolder !== undefined ? validateTmpFolder(options.tmpFolder) : defaultConfig.tmpFolder,
    cacheTtlMs:
      options.cacheTtlMs !== undefined ? validateDuration(options.cacheTtlMs, 'cacheTtlMs') : defaultConfig.cacheTtlMs,
    retry: Object.freeze({
      maxAttempts:
        retry.maxAttempts !== undefined ? validateAttempts(retry.maxAttempts) : defaultConfig.retry.maxAttempts,
      baseDelayMs:
        retry.baseDelayMs !== undefined
          ? validateDuration(retry.baseDelayMs, 'retry.baseDelayMs')
          : defaultConfig.retry.baseDelayMs,
    }),
  }

  return Object.freeze(config)
}

/**
 * Parse a numeric environment variable; blank and missing values are ignored.
 */
function envNumber(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (Number.isNaN(value)) {
    throw new EINVAL('configFromEnv', name, undefined, `${name} must be a number, got '${raw}'`)
  }
  return value
}

/**
 * Build configuration options from DRIVEPATH_* environment variables.
 *
 * | Variable                   | Option                |
 * |----------------------------|-----------------------|
 * | DRIVEPATH_ROOT_ID          | rootId                |
 * | DRIVEPATH_TMP_FOLDER       | tmpFolder             |
 * | DRIVEPATH_CACHE_TTL_MS     | cacheTtlMs            |
 * | DRIVEPATH_RETRY_ATTEMPTS   | retry.maxAttempts     |
 * | DRIVEPATH_RETRY_DELAY_MS   | retry.baseDelayMs     |
 *
 * The result still goes through {@link createConfig}.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): DrivePathConfig {
  const options: DrivePathConfigOptions = {}
  const rootId = env.DRIVEPATH_ROOT_ID
  const tmpFolder = env.DRIVEPATH_TMP_FOLDER
  if (rootId) options.rootId = rootId
  if (tmpFolder) options.tmpFolder = tmpFolder
  options.cacheTtlMs = envNumber(env, 'DRIVEPATH_CACHE_TTL_MS')
  options.retry = {
    maxAttempts: envNumber(env, 'DRIVEPATH_RETRY_ATTEMPTS'),
    baseDelayMs: envNumber(env, 'DRIVEPATH_RETRY_DELAY_MS'),
  }
  return createConfig(options)
}
