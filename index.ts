/**
 * drivepath - Unix-style paths on a parent-referenced cloud object store
 *
 * @example
 * ```typescript
 * import { DrivePath, HttpDriveStore } from 'drivepath'
 *
 * const drive = new DrivePath({
 *   store: new HttpDriveStore({ accessToken: process.env.DRIVEPATH_ACCESS_TOKEN ?? '' }),
 * })
 *
 * await drive.insertFile('./report.pdf', 'reports/2024/report.pdf')
 * ```
 *
 * @example CLI
 * ```bash
 * drivepath ls -l reports/2024
 * drivepath get reports/2024/report.pdf ./report.pdf
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index.js'
export * from './storage/index.js'

export {
  type LogLevel,
  type Logger,
  type LoggerOptions,
  LOG_LEVELS,
  isLogLevel,
  createLogger,
  defaultLogLevel,
} from './utils/logger.js'
