/**
 * DrivePath - Unix-style paths over a flat remote object store
 *
 * The primary interface of the library. Wraps a RemoteStore in retries,
 * owns the resolution caches and exposes path operations.
 *
 * @example
 * ```typescript
 * import { DrivePath, HttpDriveStore } from 'drivepath'
 *
 * const drive = new DrivePath({
 *   store: new HttpDriveStore({ accessToken: process.env.DRIVEPATH_ACCESS_TOKEN ?? '' }),
 * })
 *
 * await drive.mkdir('backups/2024', { recursive: true })
 * await drive.insertFile('./db.dump', 'backups/2024/db.dump')
 *
 * for (const entry of await drive.listDir('backups/2024')) {
 *   console.log(entry.title, entry.fileSize)
 * }
 * ```
 *
 * A DrivePath is not safe for overlapping use: operations read and write its
 * caches between awaits. Serialize calls when sharing an instance.
 *
 * @module
 */

import { createConfig, type DrivePathConfig, type DrivePathConfigOptions } from './config.js'
import { download, downloadToFile } from './fs/download.js'
import { randomTempName, type DriveContext } from './fs/context.js'
import { insert, insertFile, insertInPlace, type InsertFileOptions, type InsertOptions } from './fs/insert.js'
import { listDir } from './fs/listDir.js'
import { mkdir, type MkdirOptions } from './fs/mkdir.js'
import { move } from './fs/move.js'
import { setModifiedDate } from './fs/setModifiedDate.js'
import { stat, statDir } from './fs/stat.js'
import { ObjectCache } from './object-cache.js'
import { linearBackoff, type BackoffPolicy, type RetryPredicate } from './retry.js'
import type { ChildReference, ObjectContent, RemoteObject, RemoteStore } from './types.js'
import { RetryingStore } from '../storage/retrying-store.js'
import { createLogger, type LogLevel, type Logger } from '../utils/logger.js'

// =============================================================================
// Options
// =============================================================================

/**
 * Options for {@link DrivePath}
 */
export interface DrivePathOptions {
  /** The remote store; every call to it is retried on 5xx failures */
  store: RemoteStore
  /** Configuration overrides; see createConfig */
  config?: DrivePathConfigOptions
  /** Logger (default: console logger with a [drivepath] prefix) */
  logger?: Logger
  /** Cache clock in milliseconds (default: Date.now) */
  now?: () => number
  /** Temporary upload names (default: temp-<n>-<n>) */
  tempName?: () => string
  /** Retry delay policy (default: linear, config.retry.baseDelayMs step) */
  backoff?: BackoffPolicy
  /** Which failures to retry (default: 5xx statuses) */
  isRetryable?: RetryPredicate
  /** Sleep used between retries */
  sleep?: (ms: number) => Promise<void>
}

// =============================================================================
// DrivePath
// =============================================================================

export class DrivePath {
  /** Validated, frozen configuration */
  readonly config: DrivePathConfig

  private readonly ctx: DriveContext

  constructor(options: DrivePathOptions) {
    const config = createConfig(options.config)
    const logger = options.logger ?? createLogger('[drivepath]')
    const cacheOptions = { ttlMs: config.cacheTtlMs, now: options.now }

    this.config = config
    this.ctx = {
      config,
      logger,
      store: new RetryingStore(options.store, {
        maxAttempts: config.retry.maxAttempts,
        backoff: options.backoff ?? linearBackoff(config.retry.baseDelayMs),
        isRetryable: options.isRetryable,
        sleep: options.sleep,
        logger,
      }),
      objects: new ObjectCache<RemoteObject>(cacheOptions),
      children: new ObjectCache<ChildReference>(cacheOptions),
      tempName: options.tempName ?? randomTempName,
    }
  }

  // ===========================================================================
  // Resolution
  // ===========================================================================

  /**
   * Resolve a path to its object. '/' is the root folder.
   *
   * @throws {EINVAL} For blank input
   * @throws {ENOENT} When the path does not exist
   * @throws {ENOTDIR} When a directory component is a file
   * @throws {EDUPLICATE} When a component matches several siblings
   */
  stat(path: string): Promise<RemoteObject> {
    return stat(this.ctx, path)
  }

  /**
   * Resolve a directory path to its folder; '' and '/' are the root.
   */
  statDir(path: string): Promise<RemoteObject> {
    return statDir(this.ctx, path)
  }

  /**
   * Fetch the children of a folder, filtered by `query`
   * (default: `trashed = false`).
   */
  listDir(path: string, query?: string): Promise<RemoteObject[]> {
    return listDir(this.ctx, path, query)
  }

  // ===========================================================================
  // Mutation
  // ===========================================================================

  /**
   * Create a folder; an existing folder is returned unchanged.
   */
  mkdir(path: string, options?: MkdirOptions): Promise<RemoteObject> {
    return mkdir(this.ctx, path, options)
  }

  /**
   * Move or rename an object, replacing a file at the destination.
   */
  move(src: string, dst: string): Promise<RemoteObject> {
    return move(this.ctx, src, dst)
  }

  /**
   * Upload through the temporary folder, then move into place.
   */
  insert(dst: string, content: ObjectContent, options?: InsertOptions): Promise<RemoteObject> {
    return insert(this.ctx, dst, content, options)
  }

  /**
   * Trash the destination and upload straight to it.
   */
  insertInPlace(dst: string, content: ObjectContent, options?: InsertOptions): Promise<RemoteObject> {
    return insertInPlace(this.ctx, dst, content, options)
  }

  /**
   * Upload a local file and copy its modification time.
   */
  insertFile(localPath: string, dst: string, options?: InsertFileOptions): Promise<RemoteObject> {
    return insertFile(this.ctx, localPath, dst, options)
  }

  /**
   * Set the modification time, at whole-second precision.
   */
  setModifiedDate(path: string, time: Date): Promise<RemoteObject> {
    return setModifiedDate(this.ctx, path, time)
  }

  // ===========================================================================
  // Content
  // ===========================================================================

  /**
   * Open a file's content as a byte stream.
   */
  download(path: string): Promise<AsyncIterable<Uint8Array>> {
    return download(this.ctx, path)
  }

  /**
   * Copy a file to the local filesystem.
   *
   * @returns Number of bytes written
   */
  downloadToFile(path: string, localFile: string): Promise<number> {
    return downloadToFile(this.ctx, path, localFile)
  }

  // ===========================================================================
  // Housekeeping
  // ===========================================================================

  /**
   * Forget every cached resolution.
   */
  clearCache(): void {
    this.ctx.objects.clear()
    this.ctx.children.clear()
  }

  setLogLevel(level: LogLevel): void {
    this.ctx.logger.setLevel(level)
  }
}
