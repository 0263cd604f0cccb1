/**
 * Drive construction for the CLI
 */

import { configFromEnv } from '../core/config.js'
import { DrivePath } from '../core/drive-path.js'
import { EINVAL } from '../core/errors.js'
import { HttpDriveStore } from '../storage/http-store.js'
import { MemoryStore } from '../storage/memory-store.js'
import { createLogger, defaultLogLevel } from '../utils/logger.js'
import type { DriveFactoryOptions } from './types.js'

export const ACCESS_TOKEN_ENV = 'DRIVEPATH_ACCESS_TOKEN'

/**
 * Build a DrivePath from environment variables.
 *
 * `--memory` gets an empty MemoryStore; otherwise the remote service is used
 * with the token from DRIVEPATH_ACCESS_TOKEN.
 *
 * @throws {EINVAL} When no token is set, or a DRIVEPATH_* setting is invalid
 */
export function createDriveFromEnv(
  env: Record<string, string | undefined>,
  options: DriveFactoryOptions
): DrivePath {
  const config = configFromEnv(env)
  const logger = createLogger('[drivepath]', { level: defaultLogLevel(env) })

  if (options.memory) {
    return new DrivePath({ store: new MemoryStore({ rootId: config.rootId }), config, logger })
  }

  const accessToken = env[ACCESS_TOKEN_ENV]?.trim()
  if (!accessToken) {
    throw new EINVAL('createDrive', ACCESS_TOKEN_ENV, undefined, 'not set (pass --memory to use an in-memory drive)')
  }
  return new DrivePath({ store: new HttpDriveStore({ accessToken }), config, logger })
}
