/**
 * Shared state handed to every path operation
 *
 * @module core/fs/context
 */

import { randomInt } from 'node:crypto'
import type { DrivePathConfig } from '../config.js'
import type { ObjectCache } from '../object-cache.js'
import { ROOT_PATH, canonicalPath, isRootPath } from '../path.js'
import type { ChildReference, RemoteObject, RemoteStore } from '../types.js'
import type { Logger } from '../../utils/logger.js'

/**
 * Everything a path operation needs: the store (already retrying), both
 * caches, configuration and a logger.
 *
 * One context belongs to one DrivePath; operations on it must not overlap.
 */
export interface DriveContext {
  readonly store: RemoteStore
  readonly config: DrivePathConfig
  /** Resolved objects keyed by canonical path ('/' for the root) */
  readonly objects: ObjectCache<RemoteObject>
  /** Resolved folders keyed by directory prefix */
  readonly children: ObjectCache<ChildReference>
  readonly logger: Logger
  /** Produces leaf names for temporary uploads */
  readonly tempName: () => string
}

/**
 * Default temporary name: `temp-<n>-<n>` with two random 31-bit integers.
 */
export function randomTempName(): string {
  return `temp-${randomInt(2 ** 31)}-${randomInt(2 ** 31)}`
}

/**
 * Object-cache key for a path: '/' for root input, otherwise canonical.
 */
export function cacheKey(pathName: string): string {
  return isRootPath(pathName) ? ROOT_PATH : canonicalPath(pathName)
}

/**
 * Drop a path and everything cached below it from both caches.
 */
export function forgetTree(ctx: DriveContext, path: string): void {
  const removed = ctx.objects.deleteTree(path) + ctx.children.deleteTree(path)
  if (removed > 0) {
    ctx.logger.debug('evicted', removed, 'cache entries under', path)
  }
}
