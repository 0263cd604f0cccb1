/**
 * mkdir - Create a folder
 *
 * Idempotent: whatever already sits at the path is returned as it is, file
 * or folder. Creating parents is opt-in through `recursive`.
 *
 * @module core/fs/mkdir
 */

import { FOLDER_MIME_TYPE } from '../constants.js'
import { EINVAL, isObjectNotFound, withOperationContext } from '../errors.js'
import { splitPath } from '../path.js'
import type { RemoteObject } from '../types.js'
import type { DriveContext } from './context.js'
import { stat, statDir } from './stat.js'

/**
 * Options for mkdir
 */
export interface MkdirOptions {
  /**
   * Create missing parent folders as well.
   * @default false
   */
  recursive?: boolean
}

/**
 * Create a folder, or return the object already at `pathName`.
 *
 * @throws {EINVAL} For blank or root input
 * @throws {ENOENT} When the parent is missing and `recursive` is off
 *
 * @example
 * ```typescript
 * const backups = await mkdir(ctx, 'backups/2024', { recursive: true })
 * ```
 */
export async function mkdir(ctx: DriveContext, pathName: string, options: MkdirOptions = {}): Promise<RemoteObject> {
  const { dir, name, path } = splitPath(pathName)
  if (path === '') {
    throw new EINVAL('mkdir', pathName, undefined, 'empty path')
  }

  let existing: RemoteObject | undefined
  try {
    existing = await stat(ctx, path, 'mkdir')
  } catch (error) {
    if (!isObjectNotFound(error)) throw error
  }
  if (existing) {
    return existing
  }

  const parent = options.recursive && dir !== '' ? await mkdir(ctx, dir, options) : await statDir(ctx, dir, 'mkdir')

  let folder: RemoteObject
  try {
    folder = await ctx.store.insertObject({ title: name, parentId: parent.id, mimeType: FOLDER_MIME_TYPE })
  } catch (error) {
    throw withOperationContext(error, 'mkdir', path)
  }

  ctx.objects.put(path, folder)
  ctx.children.put(path, { id: folder.id })
  ctx.logger.debug('created folder', path, folder.id)
  return folder
}
