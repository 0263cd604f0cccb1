#!/usr/bin/env node
/**
 * drivepath CLI entry point
 *
 * Usage:
 *   DRIVEPATH_ACCESS_TOKEN=... drivepath ls -l reports
 *   drivepath --memory mkdir -p a/b/c
 */

import { createDriveFromEnv, runCLI } from './index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('[drivepath-cli]')

const context = {
  createDrive: (options: { memory: boolean }) => createDriveFromEnv(process.env, options),
  stdout: (text: string) => process.stdout.write(text + '\n'),
  stderr: (text: string) => process.stderr.write(text + '\n'),
}

runCLI(process.argv.slice(2), context)
  .then((result) => {
    process.exitCode = result.exitCode
  })
  .catch((err: unknown) => {
    logger.error('Fatal error:', err)
    process.exitCode = 1
  })
