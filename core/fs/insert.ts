/**
 * insert, insertInPlace, insertFile - Upload content to a path
 *
 * Two strategies:
 *
 * - `insert` uploads under the temporary folder with a throwaway name and
 *   then moves the result over the destination. The destination is only
 *   touched once the upload has fully succeeded.
 * - `insertInPlace` trashes whatever sits at the destination and uploads
 *   straight into the parent. One round-trip cheaper, but a failed upload
 *   leaves nothing at the destination.
 *
 * @module core/fs/insert
 */

import { createReadStream } from 'node:fs'
import { stat as statLocal } from 'node:fs/promises'
import { EINVAL, EISDIR, ENOENT, isObjectNotFound, withOperationContext } from '../errors.js'
import { joinPath, splitPath } from '../path.js'
import type { ObjectContent, RemoteObject } from '../types.js'
import { forgetTree, type DriveContext } from './context.js'
import { mkdir } from './mkdir.js'
import { move } from './move.js'
import { setModifiedDate } from './setModifiedDate.js'
import { stat, statDir } from './stat.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Options for uploads
 */
export interface InsertOptions {
  /** MIME type of the new object (default: application/octet-stream) */
  mimeType?: string
}

/**
 * Options for {@link insertFile}
 */
export interface InsertFileOptions extends InsertOptions {
  /**
   * Upload straight to the destination instead of going through the
   * temporary folder.
   * @default false
   */
  inPlace?: boolean
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Trash whatever sits at `path` (file or folder).
 *
 * @returns Whether something was trashed
 */
async function trashIfExists(ctx: DriveContext, path: string, syscall: string): Promise<boolean> {
  let existing: RemoteObject
  try {
    existing = await stat(ctx, path, syscall)
  } catch (error) {
    if (isObjectNotFound(error)) return false
    throw error
  }

  try {
    await ctx.store.trashObject(existing.id)
  } catch (error) {
    throw withOperationContext(error, syscall, path)
  }
  forgetTree(ctx, path)
  ctx.logger.debug('trashed', path, existing.id)
  return true
}

/**
 * Stream a local file, opening it only once the upload starts reading.
 */
async function* readLocalFile(localPath: string): AsyncGenerator<Uint8Array> {
  yield* createReadStream(localPath)
}

async function upload(
  ctx: DriveContext,
  syscall: string,
  path: string,
  parentId: string,
  content: ObjectContent,
  options: InsertOptions
): Promise<RemoteObject> {
  const { name } = splitPath(path)
  let uploaded: RemoteObject
  try {
    uploaded = await ctx.store.insertObject({ title: name, parentId, mimeType: options.mimeType, content })
  } catch (error) {
    throw withOperationContext(error, syscall, path)
  }
  ctx.objects.put(path, uploaded)
  ctx.logger.debug('uploaded', path, uploaded.id)
  return uploaded
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Upload `content` to `dst` through the temporary folder.
 *
 * The destination folder must exist before anything is uploaded. The
 * temporary folder is created when missing. When the final move fails the
 * upload stays in the temporary folder; that is logged, and the error is
 * rethrown.
 *
 * @returns The object at `dst`
 */
export async function insert(
  ctx: DriveContext,
  dst: string,
  content: ObjectContent,
  options: InsertOptions = {}
): Promise<RemoteObject> {
  const to = splitPath(dst)
  if (to.path === '') {
    throw new EINVAL('insert', dst, undefined, 'empty destination path')
  }

  await statDir(ctx, to.dir, 'insert')

  const tmpFolder = await mkdir(ctx, ctx.config.tmpFolder, { recursive: true })
  const tmpPath = joinPath(ctx.config.tmpFolder, ctx.tempName())

  await trashIfExists(ctx, tmpPath, 'insert')
  await upload(ctx, 'insert', tmpPath, tmpFolder.id, content, options)

  try {
    return await move(ctx, tmpPath, to.path)
  } catch (error) {
    ctx.logger.warn(`upload for '${to.path}' left behind at '${tmpPath}'`)
    throw error
  }
}

/**
 * Upload `content` directly to `dst`, trashing what was there.
 *
 * @returns The object at `dst`
 */
export async function insertInPlace(
  ctx: DriveContext,
  dst: string,
  content: ObjectContent,
  options: InsertOptions = {}
): Promise<RemoteObject> {
  const to = splitPath(dst)
  if (to.path === '') {
    throw new EINVAL('insertInPlace', dst, undefined, 'empty destination path')
  }

  const parent = await statDir(ctx, to.dir, 'insertInPlace')
  await trashIfExists(ctx, to.path, 'insertInPlace')
  return upload(ctx, 'insertInPlace', to.path, parent.id, content, options)
}

/**
 * Upload a local file to `dst` and copy its modification time.
 *
 * @throws {ENOENT} When the local file does not exist
 * @throws {EISDIR} When the local path is not a regular file
 */
export async function insertFile(
  ctx: DriveContext,
  localPath: string,
  dst: string,
  options: InsertFileOptions = {}
): Promise<RemoteObject> {
  if (localPath === '') {
    throw new EINVAL('insertFile', localPath, dst, 'empty local path')
  }

  const info = await statLocal(localPath).catch((error: unknown) => {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ENOENT('insertFile', localPath, dst, 'local file not found')
    }
    throw error
  })
  if (!info.isFile()) {
    throw new EISDIR('insertFile', localPath, dst, 'not a regular file')
  }

  const uploaded = options.inPlace
    ? await insertInPlace(ctx, dst, readLocalFile(localPath), options)
    : await insert(ctx, dst, readLocalFile(localPath), options)

  ctx.logger.debug('uploaded', localPath, 'as', uploaded.id)
  return setModifiedDate(ctx, dst, info.mtime)
}
